/**
 * scope-log: a small diagnostic logger for Node.
 * Message lines to a rotating file and/or the console, plus a scope tracer
 * whose diagnostics file tells the next run whether this one crashed mid-scope.
 */

export { MessageLog, MessageLogger, createMessageLogger, NO_SPACE, SPACE } from './message';
export type { MessageLogOptions, MessageLoggerOptions, SpacingToken } from './message';
export { Tracer, ScopeTracer, createTracer } from './scope';
export type { TracerOptions, ScopeStep } from './scope';
export { RotatingFileSink, rotateIfTooLarge, BACKUP_SUFFIX } from './file';
export type { RotatingFileSinkOptions } from './file';
export { DiagnosticsSink, CRASH_SENTINEL, detectPreviousCrash, readLastLine } from './diagnostics';
export type { DiagnosticsSinkOptions } from './diagnostics';
export { ScopeDepth } from './depth';
export { SharedMutex } from './mutex';
export type { SharedMutexOptions } from './mutex';
export {
  StreamConsoleSink,
  InspectorConsoleSink,
  TeeConsoleSink,
  MemoryConsoleSink,
  NoOpConsoleSink,
  selectConsoleSink,
} from './sinks';
export type { TextWritable } from './sinks';
export { configure, getConfig, resetConfig, resolveConfig, DEFAULT_CONFIG } from './config';
export type { LoggingConfig, Env } from './config';
export {
  formatTimestamp,
  formatValue,
  formatMessageLine,
  formatScopeLine,
  parseDepthSuffix,
  hashThreadId,
  threadTag,
} from './format';
export { LogSinkError, ScopeDepthError } from './errors';
export type { LogSinkErrorCode } from './errors';
export type { Clock, ConsoleSink, ConsoleFormat, LineSink, ScopePhase, ScopeSite, SinkErrorHandler } from './types';
export {
  messageLogger,
  tracer,
  messageSink,
  diagnosticsSink,
  logMessage,
  log,
  traceScope,
  terminate,
} from './defaults';
