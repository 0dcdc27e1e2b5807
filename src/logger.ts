import { type Context, background, createContextKey, currentContext } from './context';
import { SinkWriteError, errorMessage } from './errors';
import { formatRecord } from './format';
import { type Env, levelName, resolveLevel } from './levels';
import { StreamSink } from './sinks';
import { formatTimestamp, systemClock } from './time';
import { LogLevel, type Clock, type ContextKey, type LogRecord, type LogSink, type LoggerConfig } from './types';

const NO_CONTEXT_KEYS: ReadonlyMap<ContextKey, string> = new Map();

// One sink, so stdout carries a single error listener however many loggers exist.
const stdoutSink = new StreamSink(process.stdout);

/**
 * Immutable JSON-lines logger. Every `with*` method returns a new Logger and
 * leaves the receiver as it was, so loggers can be shared freely.
 */
export class Logger {
  readonly sink: LogSink;
  readonly level: LogLevel;
  /** Context key to output field name. Not copied: do not mutate a map after passing it in. */
  readonly contextKeys: ReadonlyMap<ContextKey, string>;
  readonly context: Context;
  private readonly clock: Clock;

  constructor(config: LoggerConfig = {}) {
    this.sink = config.sink ?? stdoutSink;
    this.level = config.level ?? LogLevel.INFO;
    this.contextKeys = config.contextKeys ?? NO_CONTEXT_KEYS;
    this.context = config.context ?? background();
    this.clock = config.clock ?? systemClock;
    Object.freeze(this);
  }

  /**
   * Log a debug message
   */
  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  /**
   * Log an info message
   */
  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  /**
   * Log a warning message
   */
  warning(message: string, data?: unknown): void {
    this.log(LogLevel.WARNING, message, data);
  }

  /**
   * Log an error message
   */
  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  /**
   * Write one record unless `level` is below the threshold. `message` is kept
   * verbatim; `data` is left out of the record when `undefined`.
   * Throws `SerializationError` or `SinkWriteError`; nothing is retried.
   */
  log(level: LogLevel, message: string, data?: unknown): void {
    // Skip if below minimum level
    if (!this.isEnabled(level)) {
      return;
    }

    const record: LogRecord = {
      level: levelName(level),
      time: formatTimestamp(this.clock()),
      message,
    };
    if (data !== undefined) record.data = data;
    const context = this.contextValues();
    if (context) record.context = context;

    const line = formatRecord(record);
    try {
      this.sink.write(line);
    } catch (e) {
      if (e instanceof SinkWriteError) throw e;
      throw new SinkWriteError(`sink write failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  /** Whether a message at `level` would be written. */
  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * New logger writing to `sink`
   */
  withWriter(sink: LogSink): Logger {
    return this.derive({ sink });
  }

  /**
   * New logger with minimum level `level`
   */
  withLevel(level: LogLevel): Logger {
    return this.derive({ level });
  }

  /**
   * New logger reading context values from `context`
   */
  withContext(context: Context): Logger {
    return this.derive({ context });
  }

  /**
   * New logger that also writes the context value at `key` under
   * `context.<outputName>`. Mapping a key twice keeps the last name.
   */
  withContextKey(key: ContextKey, outputName: string): Logger {
    const contextKeys = this.contextKeys.size === 0
      ? new Map<ContextKey, string>([[key, outputName]])
      : new Map<ContextKey, string>(this.contextKeys).set(key, outputName);
    return this.derive({ contextKeys });
  }

  /**
   * New logger stamping records with times from `clock`
   */
  withClock(clock: Clock): Logger {
    return this.derive({ clock });
  }

  private derive(patch: LoggerConfig): Logger {
    return new Logger({
      sink: this.sink,
      level: this.level,
      contextKeys: this.contextKeys,
      context: this.context,
      clock: this.clock,
      ...patch,
    });
  }

  /**
   * Values found in the context for every mapped key, under their output names.
   * Missing (undefined or null) values are skipped; `undefined` when nothing is found.
   * Two keys sharing an output name: the one iterated last wins.
   */
  private contextValues(): Record<string, unknown> | undefined {
    if (this.contextKeys.size === 0) return undefined;

    const found = new Map<string, unknown>();
    for (const [key, outputName] of this.contextKeys) {
      const value = this.context.value(key);
      if (value !== undefined && value !== null) found.set(outputName, value);
    }
    return found.size > 0 ? Object.fromEntries(found) : undefined;
  }
}

/* ------------------------------ Default logger ----------------------------- */

/**
 * Writes to standard output at INFO with the background context. Never changes;
 * derive from it instead.
 */
export const DefaultLogger: Logger = new Logger();

/** Log on the default logger. */
export function log(level: LogLevel, message: string, data?: unknown): void {
  DefaultLogger.log(level, message, data);
}

/** Debug on the default logger. */
export function debug(message: string, data?: unknown): void {
  DefaultLogger.debug(message, data);
}

/** Info on the default logger. */
export function info(message: string, data?: unknown): void {
  DefaultLogger.info(message, data);
}

/** Warning on the default logger. */
export function warning(message: string, data?: unknown): void {
  DefaultLogger.warning(message, data);
}

/** Error on the default logger. */
export function error(message: string, data?: unknown): void {
  DefaultLogger.error(message, data);
}

/**
 * The default logger at the level found in `env` (`DEBUG_MODE`, then `LOG_LEVEL`).
 */
export function loggerFromEnv(env?: Env): Logger {
  return DefaultLogger.withLevel(resolveLevel({ env }));
}

/* ---------------------------- Logger in context ---------------------------- */

const loggerKey = createContextKey<Logger>('logger');

/** New context carrying `logger`; read it back with `loggerFromContextOrDefault`. */
export function contextWithLogger(ctx: Context, logger: Logger): Context {
  return ctx.withValue(loggerKey, logger);
}

/** The logger stored in `ctx`, or the default logger. */
export function loggerFromContextOrDefault(ctx: Context): Logger {
  const logger = ctx.value(loggerKey);
  return logger instanceof Logger ? logger : DefaultLogger;
}

/** The logger stored in the current ambient context, or the default logger. */
export function currentLogger(): Logger {
  return loggerFromContextOrDefault(currentContext());
}
