import type { Clock } from './types';

const NS_PER_SECOND = 1_000_000_000n;
const NS_PER_MS = 1_000_000n;

// Wall time sampled once, advanced with the monotonic high-resolution timer.
const anchorWallNs = BigInt(Date.now()) * NS_PER_MS;
const anchorHrNs = process.hrtime.bigint();

/** Nanosecond wall clock. */
export const systemClock: Clock = () => anchorWallNs + (process.hrtime.bigint() - anchorHrNs);

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * Render nanoseconds since the epoch as RFC 3339 with nanosecond precision:
 * `2024-03-01T12:30:05.123456789+01:00`.
 * - Fraction loses its trailing zeros, and the dot too when it is zero.
 * - Offset is `Z` for UTC, `±hh:mm` otherwise.
 * - `offsetMinutes` is east of UTC; defaults to the local zone at that instant.
 */
export function formatTimestamp(epochNs: bigint, offsetMinutes?: number): string {
    let seconds = epochNs / NS_PER_SECOND;
    let nanos = epochNs % NS_PER_SECOND;
    if (nanos < 0n) {
        nanos += NS_PER_SECOND;
        seconds -= 1n;
    }

    const utcMs = Number(seconds) * 1000;
    const offset = offsetMinutes ?? -new Date(utcMs).getTimezoneOffset();
    const local = new Date(utcMs + offset * 60_000);

    const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
    const clock = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
    const fraction = nanos === 0n ? '' : '.' + nanos.toString().padStart(9, '0').replace(/0+$/, '');

    return `${date}T${clock}${fraction}${formatOffset(offset)}`;
}

function formatOffset(offsetMinutes: number): string {
    if (offsetMinutes === 0) return 'Z';
    const sign = offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(offsetMinutes);
    return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}
