/**
 * GSOD Records — Archive Decoding
 *
 * A station-year archive (*.op.gz) is a gzip'd text file whose first line is
 * a column header. This module turns the raw bytes into data lines.
 */

import { decompress } from './compress';

const utf8 = new TextDecoder('utf-8');

/**
 * Split decoded archive text into data lines: the embedded header line and
 * trailing blank lines are dropped.
 */
export function splitArchiveText(text: string): string[] {
    const lines = text.split(/\r?\n/);
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
        lines.pop();
    }
    return lines.slice(1);
}

/**
 * Decompress and decode a station-year archive into data lines.
 */
export async function readArchiveLines(bytes: Uint8Array): Promise<string[]> {
    const raw = await decompress(bytes);
    return splitArchiveText(utf8.decode(raw));
}
