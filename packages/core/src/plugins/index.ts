/**
 * Built-in verb plugins
 */

import { AttachPlugin } from './Attach.js';
import { ChainPlugin } from './Chain.js';
import { ClassDefinitionPlugin } from './ClassDefinition.js';
import { ConditionalPlugin } from './Conditional.js';
import { DebugPlugin } from './Debug.js';
import { FeaturePlugin } from './Feature.js';
import { IncludePlugin } from './Include.js';
import { PositionPlugin } from './Position.js';
import { RoutinePlugin } from './Routine.js';
import { SubstitutePlugin } from './Substitute.js';
import type { RulePlugin } from './types.js';
import { VariablesPlugin } from './Variables.js';

/** Registration order used when no plugin list is configured */
export const BUILTIN_PLUGINS: Readonly<Record<string, RulePlugin>> = {
  ClassDefinition: ClassDefinitionPlugin,
  Debug: DebugPlugin,
  Variables: VariablesPlugin,
  Feature: FeaturePlugin,
  Routine: RoutinePlugin,
  Substitute: SubstitutePlugin,
  Position: PositionPlugin,
  Chain: ChainPlugin,
  Attach: AttachPlugin,
  Include: IncludePlugin,
  Conditional: ConditionalPlugin,
};

/**
 * Built-in plugins by name, in the given order. Unknown names are skipped;
 * the config loader rejects them before this point.
 */
export function builtinPlugins(names: readonly string[] = Object.keys(BUILTIN_PLUGINS)): RulePlugin[] {
  const plugins: RulePlugin[] = [];
  for (const name of names) {
    const plugin = BUILTIN_PLUGINS[name];
    if (plugin) plugins.push(plugin);
  }
  return plugins;
}

export { BaseTransformer } from './BaseTransformer.js';
export { definePlugin, defineVerb } from './types.js';
export type {
  BlockArguments,
  PluginOptions,
  RulePlugin,
  VerbContext,
  VerbDefinition,
  VerbTransformer,
} from './types.js';
export { isRulePlugin, pluginLabel, pluginProblems } from './PluginValidator.js';
export { splitSequence } from './sequence.js';
export type { SequenceItem, SplitSequence } from './sequence.js';
export { bodyValues } from './blockBody.js';
export type { Condition } from './Conditional.js';
export {
  AttachPlugin,
  ChainPlugin,
  ClassDefinitionPlugin,
  ConditionalPlugin,
  DebugPlugin,
  FeaturePlugin,
  IncludePlugin,
  PositionPlugin,
  RoutinePlugin,
  SubstitutePlugin,
  VariablesPlugin,
};
