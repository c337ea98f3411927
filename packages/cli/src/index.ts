/**
 * @layoutforge/cli - programmatic entry points behind the commands
 */

export { compileRules, renderFeatures, CompileFailure } from './commands/compile.js';
export type { CompileOptions, CompileResult } from './commands/compile.js';
export { renderClasses } from './commands/classes.js';
export { renderVerbs } from './commands/verbs.js';
export { generateConfigYAML, initProject } from './commands/init.js';
export type { InitResult } from './commands/init.js';
export { loadCustomPlugins, pluginExport, customPluginDirectory } from './plugins/pluginLoader.js';
export type { LoadedPlugin } from './plugins/pluginLoader.js';
export { openSession, fontPathFor } from './utils/session.js';
export type { OpenedSession, SessionFlags } from './utils/session.js';
export { formatError, exitWithError, exitWithFailure } from './utils/errorFormatter.js';
