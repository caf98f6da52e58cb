/**
 * Centralized configuration for GSOD archive locators.
 *
 * All environment-dependent values should be accessed through this module.
 */

export const DEFAULT_STATIONS_KEY = 'isd-history.csv';
export const DEFAULT_ARCHIVE_KEY_TEMPLATE = '{year}/{usaf}-{wban}-{year}.op.gz';

const TEMPLATE_PLACEHOLDERS = ['{year}', '{usaf}', '{wban}'] as const;

function readEnv(name: string): string {
    const raw = typeof process !== 'undefined' ? process.env?.[name] : undefined;
    return typeof raw === 'string' ? raw.trim() : '';
}

/**
 * Get the locator of the station directory CSV.
 *
 * Priority:
 * 1. GSOD_STATIONS_KEY environment variable
 * 2. DEFAULT_STATIONS_KEY
 */
export function getStationsKey(): string {
    return readEnv('GSOD_STATIONS_KEY') || DEFAULT_STATIONS_KEY;
}

/**
 * Get the locator template of station-year archives.
 *
 * - GSOD_ARCHIVE_KEY_TEMPLATE overrides the default.
 * - Throws if the override drops one of {year}, {usaf}, {wban}.
 */
export function getArchiveKeyTemplate(): string {
    const template = readEnv('GSOD_ARCHIVE_KEY_TEMPLATE');
    if (!template) return DEFAULT_ARCHIVE_KEY_TEMPLATE;

    const missing = TEMPLATE_PLACEHOLDERS.filter((p) => !template.includes(p));
    if (missing.length > 0) {
        throw new Error(`Invalid GSOD_ARCHIVE_KEY_TEMPLATE: missing ${missing.join(', ')}`);
    }
    return template;
}
