/**
 * GSOD Records — Archive Line Parser
 *
 * One archive line is one station-day:
 *   STN WBAN YEARMODA TEMP n DEWP n SLP n STP n VISIB n WDSP n MXSPD GUST MAX MIN PRCP SNDP FRSHTT
 *
 * The two identity tokens are dropped; the rest map positionally onto
 * WEATHER_SLOTS. Observation counts ("n") are parsed for alignment only.
 */

import { DateParseError, RowArityError } from './errors';
import {
    INDICATOR_FIELDS,
    decodeIndicators,
    fahrenheitToCelsius,
    parseDateYyyymmdd,
    parseSentinelDecimal
} from './scalars';
import type { CalendarDate, WeatherIndicators, WeatherNumericField, WeatherRecord, WeatherSlot } from './types';

/** Leading station identity tokens (USAF, WBAN) */
const IDENTITY_TOKENS = 2;

/** "No observation" encodings, matched exactly after flag stripping */
export const MISSING_SENTINELS: readonly string[] = ['9999.9', '99.99', '999.9'];

const TEMPERATURE_FLAGS = '*';
const PRECIPITATION_FLAGS = 'ABCDEFGHI';

export const WEATHER_SLOTS: readonly WeatherSlot[] = [
    { kind: 'date', name: 'date' },
    { kind: 'numeric', name: 'temp', field: 'temp', flags: '' },
    { kind: 'ignored', name: 'temp_count' },
    { kind: 'numeric', name: 'dew_point', field: 'dewPoint', flags: '' },
    { kind: 'ignored', name: 'dew_point_count' },
    { kind: 'numeric', name: 'sea_level_pressure', field: 'seaLevelPressure', flags: '' },
    { kind: 'ignored', name: 'sea_level_pressure_count' },
    { kind: 'numeric', name: 'station_pressure', field: 'stationPressure', flags: '' },
    { kind: 'ignored', name: 'station_pressure_count' },
    { kind: 'numeric', name: 'visibility', field: 'visibility', flags: '' },
    { kind: 'ignored', name: 'visibility_count' },
    { kind: 'numeric', name: 'wind_speed', field: 'windSpeed', flags: '' },
    { kind: 'ignored', name: 'wind_speed_count' },
    { kind: 'numeric', name: 'max_wind_speed', field: 'maxWindSpeed', flags: '' },
    { kind: 'numeric', name: 'max_wind_gust', field: 'maxWindGust', flags: '' },
    { kind: 'numeric', name: 'max_temp', field: 'maxTemp', flags: TEMPERATURE_FLAGS },
    { kind: 'numeric', name: 'min_temp', field: 'minTemp', flags: TEMPERATURE_FLAGS },
    { kind: 'numeric', name: 'precipitation', field: 'precipitation', flags: PRECIPITATION_FLAGS },
    { kind: 'numeric', name: 'snow_depth', field: 'snowDepth', flags: '' },
    { kind: 'indicators', name: 'indicators' }
];

/** Minimum whitespace-delimited tokens per line */
export const WEATHER_LINE_TOKENS = IDENTITY_TOKENS + WEATHER_SLOTS.length;

/**
 * Parse one archive line into a WeatherRecord.
 * Throws on the first malformed token.
 */
export function parseWeatherLine(line: string): WeatherRecord {
    const trimmed = line.trim();
    const tokens = trimmed === '' ? [] : trimmed.split(/\s+/);
    if (tokens.length < WEATHER_LINE_TOKENS) {
        throw new RowArityError(WEATHER_LINE_TOKENS, tokens.length, line);
    }
    const slots = tokens.slice(IDENTITY_TOKENS);

    let date: CalendarDate | undefined;
    let indicators: WeatherIndicators | undefined;
    const numeric: Partial<Record<WeatherNumericField, number | null>> = {};

    for (const [i, slot] of WEATHER_SLOTS.entries()) {
        const token = slots[i];
        switch (slot.kind) {
            case 'date': {
                const parsed = parseDateYyyymmdd(token);
                if (parsed === null) throw new DateParseError(token);
                date = parsed;
                break;
            }
            case 'numeric':
                numeric[slot.field] = parseSentinelDecimal(token, slot.name, MISSING_SENTINELS, slot.flags);
                break;
            case 'indicators':
                indicators = decodeIndicators(token);
                break;
            case 'ignored':
                break;
        }
    }

    if (date === undefined || indicators === undefined) {
        throw new Error('WEATHER_SLOTS must define a date and an indicators slot');
    }

    const value = (field: WeatherNumericField): number | null => numeric[field] ?? null;
    const flags: WeatherIndicators = indicators;

    const temp = value('temp');
    const maxTemp = value('maxTemp');
    const minTemp = value('minTemp');

    return {
        date,
        temp,
        dewPoint: value('dewPoint'),
        seaLevelPressure: value('seaLevelPressure'),
        stationPressure: value('stationPressure'),
        visibility: value('visibility'),
        windSpeed: value('windSpeed'),
        maxWindSpeed: value('maxWindSpeed'),
        maxWindGust: value('maxWindGust'),
        maxTemp,
        minTemp,
        precipitation: value('precipitation'),
        snowDepth: value('snowDepth'),
        tempC: fahrenheitToCelsius(temp),
        maxTempC: fahrenheitToCelsius(maxTemp),
        minTempC: fahrenheitToCelsius(minTemp),
        ...flags,
        weatherOk: !INDICATOR_FIELDS.some((field) => flags[field])
    };
}

/**
 * Lazily parse archive lines. Blank lines are skipped; the embedded archive
 * header must already be removed (see readArchiveLines).
 */
export function* parseWeatherLines(lines: Iterable<string>): Generator<WeatherRecord> {
    for (const line of lines) {
        if (line.trim() === '') continue;
        yield parseWeatherLine(line);
    }
}
