/**
 * GSOD Records — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';

// Error taxonomy
export * from './errors';

// Parsers
export * from './scalars';
export * from './station';
export * from './weather';

// Archive decoding
export * from './compress';
export * from './archive';

// Configuration & loaders
export * from './config';
export * from './ingest/source';
export * from './ingest/loader';
