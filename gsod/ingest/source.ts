/**
 * GSOD Records — Archive Source
 *
 * The parsers never fetch anything. Transport (HTTP, FTP, a local mirror)
 * lives behind ArchiveSource, supplied by the caller.
 */

import { getArchiveKeyTemplate, getStationsKey } from '../config';

// =============================================================================
// Source Interface (abstract over HTTP/mirror/local)
// =============================================================================

export interface ArchiveSource {
    /** Station directory CSV text, or null if not found */
    getStationDirectory(key: string): Promise<string | null>;

    /** Raw gzip bytes of a station-year archive, or null if not found */
    getArchive(key: string): Promise<Uint8Array | null>;
}

export interface StationYear {
    usaf: string;
    wban: string;
    year: number;
}

// =============================================================================
// Locators
// =============================================================================

export function stationDirectoryKey(): string {
    return getStationsKey();
}

/**
 * Locator of one station-year archive, e.g. "2020/722950-23174-2020.op.gz".
 */
export function weatherArchiveKey({ usaf, wban, year }: StationYear): string {
    if (!Number.isInteger(year) || year < 1) {
        throw new Error(`Invalid archive year: ${year}`);
    }
    return getArchiveKeyTemplate()
        .replaceAll('{year}', String(year))
        .replaceAll('{usaf}', usaf)
        .replaceAll('{wban}', wban);
}

// =============================================================================
// In-Memory Source (for testing and offline use)
// =============================================================================

/**
 * Simple in-memory source backed by two maps.
 */
export class MemoryArchiveSource implements ArchiveSource {
    private directories = new Map<string, string>();
    private archives = new Map<string, Uint8Array>();

    async getStationDirectory(key: string): Promise<string | null> {
        return this.directories.get(key) ?? null;
    }

    async getArchive(key: string): Promise<Uint8Array | null> {
        return this.archives.get(key) ?? null;
    }

    putStationDirectory(key: string, text: string): void {
        this.directories.set(key, text);
    }

    putArchive(key: string, data: Uint8Array): void {
        this.archives.set(key, data);
    }

    /** Get all keys (for debugging) */
    keys(): string[] {
        return [...this.directories.keys(), ...this.archives.keys()];
    }
}
