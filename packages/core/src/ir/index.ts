export { FontFeatures } from './FontFeatures.js';
export type { VariableValue, FontFeaturesJSON } from './FontFeatures.js';
export { Routine } from './Routine.js';
export type { RoutineOptions, RoutineJSON } from './Routine.js';
export * from './rules.js';
