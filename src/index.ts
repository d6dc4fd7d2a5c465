/**
 * Main entry point - exports all public APIs
 */

export * from './overlay';
export * from './backend';
export { createLogger, setCorrelation, clearCorrelation } from './logger';
export type { Logger, LogLevel } from './logger';
export { LazySqlitePreferenceStore, MemoryPreferenceStore, SqlitePreferenceStore } from './preferences';
export type { PreferenceStore } from './preferences';
export { SpawnToolInvoker, redactArgs, splitLines } from './tool_invoker';
export type { ToolInvoker, ToolRunOptions, ToolRunResult, SpawnToolInvokerOptions } from './tool_invoker';
export { ToolLocator, findExecutableOnPath } from './tool_locator';
export {
    OverlayError,
    OverlayConfigError,
    createStructuredError,
    recoveryHintsFor,
} from './structured_error';
export type { ErrorCode, StructuredError, RecoveryHint } from './structured_error';
