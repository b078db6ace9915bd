/**
 * dccscan CBOR package
 *
 * Decoder, encoder and typed value model for the binary layers of a
 * health certificate.
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './decoder.js';
export * from './encoder.js';
export * from './builders.js';
export * from './accessors.js';
export * from './diagnostic.js';
