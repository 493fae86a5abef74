/**
 * RESP module - Request encoding and reply decoding
 */

export * from './codec';
