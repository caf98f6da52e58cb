/**
 * GSOD Records — Core Type Definitions
 *
 * These types describe the normalized records produced from the GSOD station
 * directory and the yearly station archives. Records are plain immutable
 * values: produced, returned, discarded.
 */

/** ISO calendar date without time of day (YYYY-MM-DD). */
export type CalendarDate = string;

// =============================================================================
// Station Directory
// =============================================================================

/**
 * One station-directory row keyed by normalized header names.
 * Blank cells are null; `begin`/`end` hold CalendarDate strings.
 */
export type StationRow = Record<string, string | null>;

/**
 * Fixed-shape station descriptor mapped from a StationRow.
 * The column set of the directory is treated as a stable external contract.
 */
export interface StationRecord {
    usaf: string | null;
    wban: string | null;
    stationName: string | null;
    country: string | null;
    state: string | null;
    icao: string | null;

    /** Decimal degrees, null when absent or "no data" */
    latitude: number | null;
    longitude: number | null;

    /** Meters as supplied by the directory, null when absent or "no data" */
    elevation: number | null;

    begin: CalendarDate | null;
    end: CalendarDate | null;
}

// =============================================================================
// Daily Observations
// =============================================================================

export type WeatherNumericField =
    | 'temp'
    | 'dewPoint'
    | 'seaLevelPressure'
    | 'stationPressure'
    | 'visibility'
    | 'windSpeed'
    | 'maxWindSpeed'
    | 'maxWindGust'
    | 'maxTemp'
    | 'minTemp'
    | 'precipitation'
    | 'snowDepth';

export type IndicatorField = 'fog' | 'rain' | 'snow' | 'hail' | 'thunder' | 'tornado';

export type WeatherIndicators = Record<IndicatorField, boolean>;

/**
 * One station-day from a GSOD archive line.
 *
 * Temperatures are °F, pressures mbar, visibility miles, wind knots,
 * precipitation and snow depth inches. Missing observations are null.
 */
export interface WeatherRecord extends WeatherIndicators {
    date: CalendarDate;

    temp: number | null;
    dewPoint: number | null;
    seaLevelPressure: number | null;
    stationPressure: number | null;
    visibility: number | null;
    windSpeed: number | null;
    maxWindSpeed: number | null;
    maxWindGust: number | null;
    maxTemp: number | null;
    minTemp: number | null;
    precipitation: number | null;
    snowDepth: number | null;

    /** Celsius companions of temp/maxTemp/minTemp */
    tempC: number | null;
    maxTempC: number | null;
    minTempC: number | null;

    /** True iff none of the six indicators is set */
    weatherOk: boolean;
}

// =============================================================================
// Archive Line Schema
// =============================================================================

/**
 * One positional slot of an archive line (after the two identity tokens).
 *
 * - `date`: YYYYMMDD
 * - `numeric`: decimal, "no observation" sentinel, optional trailing quality flags
 * - `ignored`: parsed for alignment only (observation counts)
 * - `indicators`: six-character 0/1 token
 */
export type WeatherSlot =
    | { kind: 'date'; name: string }
    | { kind: 'numeric'; name: string; field: WeatherNumericField; flags: string }
    | { kind: 'ignored'; name: string }
    | { kind: 'indicators'; name: string };
