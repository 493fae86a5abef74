/**
 * Redis module - Cache storage and retrieval
 *
 * This module provides:
 * - A single-connection session speaking RESP over TLS
 * - Best-effort record caching for ingest
 * - Point lookups with distinct miss, auth and availability outcomes
 */

export * from './types';
export * from './errors';
export * from './session';
export * from './operations';
