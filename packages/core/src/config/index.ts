export {
  loadConfig,
  validateVersion,
  validateStringList,
  DEFAULT_CONFIG,
  BUILTIN_PLUGIN_NAMES,
} from './ConfigLoader.js';
export type { LayoutForgeConfig } from './ConfigLoader.js';
