/**
 * Date utility functions for the processing timestamps stamped on index documents.
 * Supports the naive `YYYY-MM-DD HH:MM:SS` form and ISO 8601 instants.
 */

import { InvalidTimestampError } from '../types/errors.js';

/**
 * Local-naive processing time: `YYYY-MM-DD HH:MM:SS`
 */
export const NAIVE_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const ISO_INSTANT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

function pad(value: number, width: number = 2): string {
    return String(value).padStart(width, '0');
}

/**
 * Format a date as `YYYY-MM-DDTHH:MM:SSZ` (UTC, milliseconds dropped)
 */
export function formatCanonicalUtc(date: Date): string {
    return `${formatNaiveUtc(date).replace(' ', 'T')}Z`;
}

/**
 * Format a date's UTC wall time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatNaiveUtc(date: Date): string {
    return (
        `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    );
}

/**
 * Parse a processing timestamp into a Date.
 *
 * The naive form carries no zone and is read as UTC wall time, so
 * `2025-07-30 21:01:11` becomes `2025-07-30T21:01:11Z`. ISO 8601 strings must carry
 * `Z` or an explicit offset.
 *
 * @throws {InvalidTimestampError} if the value matches neither form or names an impossible date
 */
export function parseProcessingTimestamp(value: string): Date {
    const trimmed = value.trim();

    const naive = trimmed.match(NAIVE_TIMESTAMP_PATTERN);
    if (naive) {
        const [year, month, day, hours, minutes, seconds] = naive.slice(1).map((part) => parseInt(part, 10));
        // setUTCFullYear keeps years 0-99 as given (Date.UTC maps them to 19xx)
        const date = new Date(0);
        date.setUTCFullYear(year, month - 1, day);
        date.setUTCHours(hours, minutes, seconds, 0);
        // 2025-02-30 rolls over into March; reject instead
        if (
            date.getUTCFullYear() !== year ||
            date.getUTCMonth() !== month - 1 ||
            date.getUTCDate() !== day ||
            date.getUTCHours() !== hours ||
            date.getUTCMinutes() !== minutes ||
            date.getUTCSeconds() !== seconds
        ) {
            throw new InvalidTimestampError(value);
        }
        return date;
    }

    if (ISO_INSTANT_PATTERN.test(trimmed)) {
        const date = new Date(trimmed);
        if (!isNaN(date.getTime())) {
            return date;
        }
    }

    throw new InvalidTimestampError(value);
}

/**
 * Whether `parseProcessingTimestamp` accepts the value
 */
export function isProcessingTimestamp(value: string): boolean {
    try {
        parseProcessingTimestamp(value);
        return true;
    } catch (error) {
        if (error instanceof InvalidTimestampError) {
            return false;
        }
        throw error;
    }
}

/**
 * Normalize a processing timestamp to `YYYY-MM-DDTHH:MM:SSZ`
 *
 * @throws {InvalidTimestampError} if the value cannot be parsed
 */
export function toCanonicalUtc(value: string): string {
    return formatCanonicalUtc(parseProcessingTimestamp(value));
}
