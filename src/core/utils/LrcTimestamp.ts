/** Tag written for lines that have never been timestamped. */
export const DEFAULT_TIMESTAMP_TAG = '[00:00.00]';

/** Placeholder shown in previews for lines still awaiting a timestamp. */
export const UNSYNCED_TAG = '[-]';

const TAG_REGEX = /^\[(\d+):(\d{2})(?:\.(\d{2,3}))?\]$/;

function pad2(value: number): string {
    return value.toString().padStart(2, '0');
}

/**
 * Normalizes a playback position to a whole, non-negative millisecond count.
 */
export function toTimestampMs(ms: number): number {
    if (!Number.isFinite(ms) || ms < 0) return 0;
    return Math.floor(ms);
}

/**
 * Formats milliseconds as an LRC time tag `[mm:ss.cc]`.
 * Minutes are not wrapped into hours, so 100 minutes renders as `[100:00.00]`.
 */
export function formatTimestamp(ms: number): string {
    return `[${formatClock(ms)}]`;
}

/**
 * Same as {@link formatTimestamp} without the brackets, for status displays.
 */
export function formatClock(ms: number): string {
    const value = toTimestampMs(ms);
    const totalSeconds = Math.floor(value / 1000);
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;
    const hundredths = Math.floor((value % 1000) / 10);
    return `${pad2(minutes)}:${pad2(seconds)}.${pad2(hundredths)}`;
}

/**
 * Parses an LRC time tag back to milliseconds.
 * Accepts hundredths (`[01:02.50]`), milliseconds (`[01:02.500]`) or whole seconds (`[1:02]`).
 * @returns null if the tag is malformed.
 */
export function parseTimestamp(tag: string): number | null {
    const match = tag.trim().match(TAG_REGEX);
    if (!match) return null;

    const minutes = parseInt(match[1], 10);
    const seconds = parseInt(match[2], 10);
    if (seconds > 59) return null;

    const fraction = match[3] ?? '';
    const fractionMs = fraction.length === 2 ? parseInt(fraction, 10) * 10 : Number(fraction);

    return (minutes * 60 + seconds) * 1000 + fractionMs;
}

/**
 * Formats a duration for the `[length:]` header tag (`mm:ss`).
 */
export function formatLength(ms: number): string {
    const totalSeconds = Math.floor(toTimestampMs(ms) / 1000);
    return `${pad2(Math.floor(totalSeconds / 60))}:${pad2(totalSeconds % 60)}`;
}
