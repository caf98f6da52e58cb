/**
 * GSOD Records — Compression Utilities
 *
 * gzip over the web streams API (CompressionStream / DecompressionStream),
 * available as globals on Node 18+.
 */

/**
 * Compress data using gzip.
 */
export async function compress(data: Uint8Array): Promise<Uint8Array> {
    if (typeof CompressionStream === 'undefined') {
        throw new Error('CompressionStream not available: cannot produce gzip archives in this environment.');
    }
    return pipeThrough(new CompressionStream('gzip'), data);
}

/**
 * Decompress a gzip archive. Corrupt input rejects.
 */
export async function decompress(data: Uint8Array): Promise<Uint8Array> {
    if (typeof DecompressionStream === 'undefined') {
        throw new Error('DecompressionStream not available: cannot read gzip archives in this environment.');
    }
    return pipeThrough(new DecompressionStream('gzip'), data);
}

// =============================================================================
// Stream Plumbing
// =============================================================================

async function pipeThrough(
    transform: CompressionStream | DecompressionStream,
    data: Uint8Array
): Promise<Uint8Array> {
    const writer = transform.writable.getWriter();
    const reader = transform.readable.getReader();

    // Write in background so we can read concurrently (avoids deadlock on backpressure)
    const writePromise = (async () => {
        await writer.write(new Uint8Array(data));
        await writer.close();
    })();

    const chunks: Uint8Array[] = [];
    const readPromise = (async () => {
        while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            if (value) chunks.push(value);
        }
    })();

    // Both sides reject on corrupt input; surface the first failure
    await Promise.all([writePromise, readPromise]);

    return concatChunks(chunks);
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
    const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const chunk of chunks) {
        result.set(chunk, offset);
        offset += chunk.length;
    }
    return result;
}
