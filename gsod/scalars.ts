/**
 * GSOD Records — Scalar Conversion Helpers
 *
 * Leaf utilities shared by the station and weather parsers.
 * All functions are pure; malformed non-null input throws.
 */

import { DateParseError, MalformedIndicatorError, NumericParseError } from './errors';
import type { CalendarDate, IndicatorField, WeatherIndicators } from './types';

/** Indicator positions in the FRSHTT token, left to right */
export const INDICATOR_FIELDS = ['fog', 'rain', 'snow', 'hail', 'thunder', 'tornado'] as const satisfies readonly IndicatorField[];

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse an 8-digit YYYYMMDD token into a CalendarDate.
 * Null or empty input yields null.
 */
export function parseDateYyyymmdd(token: string | null | undefined): CalendarDate | null {
    if (token === null || token === undefined || token === '') return null;
    if (!/^\d{8}$/.test(token)) {
        throw new DateParseError(token);
    }

    const year = Number(token.slice(0, 4));
    const month = Number(token.slice(4, 6));
    const day = Number(token.slice(6, 8));

    // setUTCFullYear avoids the two-digit year mapping of Date.UTC
    const probe = new Date(0);
    probe.setUTCFullYear(year, month - 1, day);
    if (
        year < 1 ||
        probe.getUTCFullYear() !== year ||
        probe.getUTCMonth() !== month - 1 ||
        probe.getUTCDate() !== day
    ) {
        throw new DateParseError(token);
    }

    return `${token.slice(0, 4)}-${token.slice(4, 6)}-${token.slice(6, 8)}`;
}

/**
 * Remove one leading '+' if present. Does not validate the rest.
 */
export function stripSign(token: string): string {
    return token.startsWith('+') ? token.slice(1) : token;
}

/**
 * Remove the trailing run of characters drawn from `alphabet`.
 * A token without flags is returned unchanged.
 */
export function stripQualityFlags(token: string, alphabet: string): string {
    let end = token.length;
    while (end > 0 && alphabet.includes(token[end - 1])) {
        end--;
    }
    return token.slice(0, end);
}

export function fahrenheitToCelsius(value: number | null): number | null {
    if (value === null) return null;
    return ((value - 32) * 5) / 9;
}

/**
 * Strict decimal parse: optional sign, digits, optional fraction.
 * Rejects what Number() would silently accept ('', '0x10', '1e3', 'Infinity').
 */
export function parseDecimal(token: string, field: string): number {
    if (!DECIMAL_PATTERN.test(token)) {
        throw new NumericParseError(field, token);
    }
    return Number(token);
}

/**
 * Strip quality flags, map sentinels to null, parse the rest as a decimal.
 * Sentinel detection is an exact string match after flag stripping.
 */
export function parseSentinelDecimal(
    token: string,
    field: string,
    sentinels: readonly string[],
    flags: string
): number | null {
    const value = stripQualityFlags(token, flags);
    if (sentinels.includes(value)) return null;
    if (!DECIMAL_PATTERN.test(value)) {
        throw new NumericParseError(field, token);
    }
    return Number(value);
}

/**
 * Decode the six-position 0/1 indicator token (FRSHTT).
 */
export function decodeIndicators(token: string): WeatherIndicators {
    if (!/^[01]{6}$/.test(token)) {
        throw new MalformedIndicatorError(token);
    }
    return {
        fog: token[0] === '1',
        rain: token[1] === '1',
        snow: token[2] === '1',
        hail: token[3] === '1',
        thunder: token[4] === '1',
        tornado: token[5] === '1'
    };
}
