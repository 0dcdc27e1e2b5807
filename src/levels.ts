import { LogLevel, type LogLevelName } from './types';

/* --------------------------------- Labels ---------------------------------- */

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
    [LogLevel.DEBUG]:   'debug',
    [LogLevel.INFO]:    'info',
    [LogLevel.WARNING]: 'warning',
    [LogLevel.ERROR]:   'error',
};

/** The label written in the `level` field; `''` for a number outside the enum. */
export function levelName(level: LogLevel): LogLevelName | '' {
    return LEVEL_NAMES[level] ?? '';
}

/* ------------------------------- Env helpers ------------------------------- */

export type Env = Record<string, string | undefined>;

/**
 * Resolve a string into a `LogLevel`.
 * Accepts: 'debug'|'info'|'warning'|'warn'|'error' in any case, or a number as string
 * (clamped to 0..3).
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseLogLevel(s?: string): LogLevel | undefined {
    if (!s) return undefined;
    switch (s.trim().toLowerCase())
    {
        case 'debug': return LogLevel.DEBUG;
        case 'info': return LogLevel.INFO;
        case 'warn':
        case 'warning': return LogLevel.WARNING;
        case 'error': return LogLevel.ERROR;
    }
    if (s.trim() === '') return undefined;
    const n = Number(s);
    if (!Number.isFinite(n)) return undefined;
    switch (Math.max(0, Math.min(3, Math.trunc(n)))) {
        case 0: return LogLevel.DEBUG;
        case 1: return LogLevel.INFO;
        case 2: return LogLevel.WARNING;
        default: return LogLevel.ERROR;
    }
}

export type ResolveLevelOptions = {
    /** Wins over anything found in the environment. */
    level?: LogLevel;
    /** Environment bag; defaults to `process.env`. */
    env?: Env;
};

/**
 * Resolve the threshold in the following order:
 * 1) Explicit `level`
 * 2) `DEBUG_MODE=1|true|yes|on` → DEBUG
 * 3) `LOG_LEVEL=<debug|info|warning|warn|error|0..3>`
 * 4) INFO
 */
export function resolveLevel(options: ResolveLevelOptions = {}): LogLevel {
    if (options.level != null) return options.level;

    const env = options.env ?? process.env;

    const dm = env.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return LogLevel.DEBUG;

    return parseLogLevel(env.LOG_LEVEL) ?? LogLevel.INFO;
}
