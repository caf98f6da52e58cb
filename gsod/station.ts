/**
 * GSOD Records — Station Directory Parser
 *
 * Converts the station directory CSV (isd-history.csv) into normalized rows.
 * Keys come from the header row; `toStationRecord` maps a row onto the
 * fixed StationRecord shape once the header has been asserted.
 */

import { parse } from 'csv-parse/sync';
import { MalformedHeaderError, RowArityError } from './errors';
import { parseDateYyyymmdd, parseDecimal, stripSign } from './scalars';
import type { StationRecord, StationRow } from './types';

/** Dimensional-suffix marker used by older directory headers, e.g. "ELEV(.1M)" */
const HEADER_SUFFIX_MARKER = '(.1m)';

const LOCATION_KEYS = new Set(['lat', 'lon', 'elev', 'elev(m)']);
const DATE_KEYS = new Set(['begin', 'end']);

const REQUIRED_KEYS = ['usaf', 'wban', 'station_name', 'ctry', 'state', 'lat', 'lon', 'begin', 'end'] as const;
const ELEVATION_KEYS = ['elev(m)', 'elev'] as const;

/** "No data" encodings seen in the location columns */
const LOCATION_SENTINELS = new Set([-99999, -999.9, -999]);

// =============================================================================
// Header & Row
// =============================================================================

/**
 * Normalize header cells into field keys:
 * lower-case, spaces to underscores, suffix marker removed.
 */
export function parseHeader(header: readonly string[]): string[] {
    const keys: string[] = [];
    const seen = new Set<string>();

    for (const cell of header) {
        const key = cell.trim().toLowerCase().replaceAll(' ', '_').replaceAll(HEADER_SUFFIX_MARKER, '');
        if (!key) {
            throw new MalformedHeaderError(`Empty field key derived from header cell '${cell}'`, header.join(','));
        }
        if (seen.has(key)) {
            throw new MalformedHeaderError(`Duplicate field key '${key}'`, header.join(','));
        }
        seen.add(key);
        keys.push(key);
    }

    return keys;
}

/**
 * Zip keys with cells. Blank cells become null, location values lose a
 * leading '+', begin/end become CalendarDates. Extra trailing cells are ignored.
 */
export function parseRow(keys: readonly string[], row: readonly string[]): StationRow {
    if (row.length < keys.length) {
        throw new RowArityError(keys.length, row.length, row.join(','));
    }

    const result: StationRow = {};
    keys.forEach((key, i) => {
        const cell = row[i].trim();
        const value = cell === '' ? null : cell;

        if (value === null) {
            result[key] = null;
        } else if (LOCATION_KEYS.has(key)) {
            result[key] = stripSign(value);
        } else if (DATE_KEYS.has(key)) {
            result[key] = parseDateYyyymmdd(value);
        } else {
            result[key] = value;
        }
    });

    return result;
}

// =============================================================================
// Fixed Struct
// =============================================================================

/**
 * Fail fast when the directory layout drifts from the expected columns.
 */
export function assertStationHeader(keys: readonly string[]): void {
    const present = new Set(keys);
    const missing: string[] = REQUIRED_KEYS.filter((key) => !present.has(key));
    if (!ELEVATION_KEYS.some((key) => present.has(key))) {
        missing.push(ELEVATION_KEYS[0]);
    }
    if (missing.length > 0) {
        throw new MalformedHeaderError(`Station header is missing: ${missing.join(', ')}`, keys.join(','));
    }
}

function locationOrNull(row: StationRow, key: string): number | null {
    const raw = row[key] ?? null;
    if (raw === null) return null;
    const value = parseDecimal(raw, key);
    return LOCATION_SENTINELS.has(value) ? null : value;
}

function elevationKey(row: StationRow): string {
    return ELEVATION_KEYS.find((key) => key in row) ?? ELEVATION_KEYS[0];
}

/**
 * Map a parsed row onto the fixed StationRecord shape.
 */
export function toStationRecord(row: StationRow): StationRecord {
    const text = (key: string): string | null => row[key] ?? null;

    return {
        usaf: text('usaf'),
        wban: text('wban'),
        stationName: text('station_name'),
        country: text('ctry'),
        state: text('state'),
        icao: text('icao'),
        latitude: locationOrNull(row, 'lat'),
        longitude: locationOrNull(row, 'lon'),
        elevation: locationOrNull(row, elevationKey(row)),
        begin: text('begin'),
        end: text('end')
    };
}

// =============================================================================
// Whole Directory
// =============================================================================

function readCsv(text: string): string[][] {
    const parsed: unknown = parse(text, {
        relax_column_count: true,
        skip_empty_lines: true
    });
    if (!Array.isArray(parsed)) return [];

    return parsed.map((record: unknown, i) => {
        if (!Array.isArray(record) || !record.every((cell: unknown) => typeof cell === 'string')) {
            throw new Error(`Unexpected CSV record at index ${i}`);
        }
        return record.map(String);
    });
}

/**
 * Parse a whole station directory document. The first record is the header.
 * Rows are normalized lazily; a bad row aborts the sequence when reached.
 */
export function* parseStationDirectory(text: string): Generator<StationRow> {
    const [header, ...rows] = readCsv(text);
    if (!header) return;

    const keys = parseHeader(header);
    for (const row of rows) {
        yield parseRow(keys, row);
    }
}

/**
 * Like parseStationDirectory, but asserts the header and yields StationRecords.
 */
export function* parseStations(text: string): Generator<StationRecord> {
    const [header, ...rows] = readCsv(text);
    if (!header) return;

    const keys = parseHeader(header);
    assertStationHeader(keys);
    for (const row of rows) {
        yield toStationRecord(parseRow(keys, row));
    }
}
