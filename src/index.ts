/**
 * jsonline-log: structured JSON-lines logging with values pulled from
 * an immutable context
 */

export {
  Logger,
  DefaultLogger,
  log,
  debug,
  info,
  warning,
  error,
  loggerFromEnv,
  contextWithLogger,
  loggerFromContextOrDefault,
  currentLogger,
} from './logger';
export { Context, Key, background, createContextKey, currentContext, runWithContext } from './context';
export { StreamSink, MemorySink } from './sinks';
export { LogError, SerializationError, SinkWriteError } from './errors';
export { levelName, parseLogLevel, resolveLevel } from './levels';
export { formatTimestamp, systemClock } from './time';
export { formatRecord } from './format';
export { LogLevel } from './types';
export type { Env, ResolveLevelOptions } from './levels';
export type { Clock, ContextKey, LogLevelName, LogRecord, LogSink, LoggerConfig } from './types';
