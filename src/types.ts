import type { Context } from './context';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * String representation of log levels, as written in the `level` field
 */
export type LogLevelName = 'debug' | 'info' | 'warning' | 'error';

/**
 * Any non-nullish token usable as a context key. Keys are compared by identity
 * (the same equality `Map` uses), so `42` and `'42'` are different keys.
 */
export type ContextKey = string | number | bigint | boolean | symbol | object;

/**
 * One serialized log line. `data` and `context` are left out when absent.
 */
export interface LogRecord {
  /** Empty for a level outside `LogLevel`. */
  level: LogLevelName | '';
  time: string;
  message: string;
  data?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Destination for serialized lines. `write` receives one complete,
 * newline-terminated JSON line and throws when it cannot take it.
 */
export interface LogSink {
  write(line: string): void;
}

/** Nanoseconds since the Unix epoch. */
export type Clock = () => bigint;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Where lines go. Default: standard output
   */
  sink?: LogSink;
  /**
   * Minimum log level to output. Default: INFO
   */
  level?: LogLevel;
  /**
   * Context values are looked up from. Default: the background context
   */
  context?: Context;
  /**
   * Context key to output field name
   */
  contextKeys?: ReadonlyMap<ContextKey, string>;
  /**
   * Time source for the `time` field
   */
  clock?: Clock;
}
