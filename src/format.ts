import { SerializationError, errorMessage } from './errors';
import type { LogRecord } from './types';

/* ----------------------------- Record encoding ----------------------------- */

/**
 * Serialize a record as a single JSON line, `\n` terminated.
 * Keys come out as `level, time, message, data, context`; `data` and `context`
 * only when the record carries them.
 * Throws `SerializationError` when the payload or a context value has no JSON form.
 */
export function formatRecord(record: LogRecord): string {
    const out: LogRecord = { level: record.level, time: record.time, message: record.message };
    if (record.data !== undefined) out.data = record.data;
    if (record.context !== undefined) out.context = record.context;

    let json: string;
    try {
        json = JSON.stringify(out, rejectUnsupported);
    } catch (e) {
        throw new SerializationError(`cannot serialize log record: ${errorMessage(e)}`, { cause: e });
    }
    return json + '\n';
}

/**
 * `JSON.stringify` would otherwise write non-finite numbers as `null` and drop
 * functions and symbols without a trace.
 */
function rejectUnsupported(_key: string, value: unknown): unknown {
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new TypeError(`unsupported value: ${value}`);
    }
    if (typeof value === 'function' || typeof value === 'symbol') {
        throw new TypeError(`unsupported type: ${typeof value}`);
    }
    return value;
}
