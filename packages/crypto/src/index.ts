/**
 * Transport and envelope primitives for health certificates
 *
 * Base45 (RFC 9285), zlib, COSE_Sign1 parsing and signature checks.
 *
 * @packageDocumentation
 */

export * from './base45.js';
export * from './compression.js';
export * from './cose.js';
export * from './hash.js';
export * from './verify.js';
