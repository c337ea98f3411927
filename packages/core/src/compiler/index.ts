export { CompilationSession } from './CompilationSession.js';
export type { SessionOptions, VerbInfo } from './CompilationSession.js';
export { StatementDispatcher } from './StatementDispatcher.js';
export type { DispatchEnvironment } from './StatementDispatcher.js';
export { handledValues } from './outcomes.js';
export type { ArgumentItem, StatementOutcome, StatementValue } from './outcomes.js';
