/**
 * GSOD Records — Loaders
 *
 * Glue between an ArchiveSource and the parsers: fetch, decode, then yield
 * normalized records one by one. Parse failures propagate and end the sequence.
 */
/* eslint-disable no-console */

import { readArchiveLines } from '../archive';
import { ArchiveNotFoundError } from '../errors';
import { parseStations } from '../station';
import type { StationRecord, WeatherRecord } from '../types';
import { parseWeatherLines } from '../weather';
import { stationDirectoryKey, weatherArchiveKey, type ArchiveSource, type StationYear } from './source';

export type StationId = Omit<StationYear, 'year'>;

/**
 * Yield every station of the directory. A missing directory is an error.
 */
export async function* loadStations(source: ArchiveSource): AsyncGenerator<StationRecord> {
    const key = stationDirectoryKey();
    const text = await source.getStationDirectory(key);
    if (text === null) {
        throw new ArchiveNotFoundError(key);
    }

    console.log(`[gsod] Loaded station directory ${key}`);
    yield* parseStations(text);
}

/**
 * Yield the daily records of one station-year.
 * A missing archive yields nothing (stations do not report every year).
 */
export async function* loadWeather(source: ArchiveSource, stationYear: StationYear): AsyncGenerator<WeatherRecord> {
    const key = weatherArchiveKey(stationYear);
    const bytes = await source.getArchive(key);
    if (bytes === null) {
        console.warn(`[gsod] No archive for ${key}`);
        return;
    }

    const lines = await readArchiveLines(bytes);
    console.log(`[gsod] Decoded ${lines.length} lines from ${key}`);
    yield* parseWeatherLines(lines);
}

/**
 * Yield the daily records of a station over several years, in the given order.
 */
export async function* loadWeatherYears(
    source: ArchiveSource,
    station: StationId,
    years: Iterable<number>
): AsyncGenerator<WeatherRecord> {
    for (const year of years) {
        yield* loadWeather(source, { ...station, year });
    }
}
