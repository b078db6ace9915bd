/**
 * Tests for hash and key identifier helpers
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { bytesToHex, hexToBytes, keyIdFromCertificate, sha256 } from '../src/hash.js';

describe('sha256', () => {
  it('hashes the FIPS 180-2 "abc" vector', () => {
    expect(bytesToHex(sha256('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});

describe('hex helpers', () => {
  it('converts both ways', () => {
    expect(hexToBytes('00ff10')).toEqual(new Uint8Array([0x00, 0xff, 0x10]));
    expect(bytesToHex(new Uint8Array([0x06, 0x51, 0x78]))).toBe('065178');
  });

  it('rejects odd length and non-hex input', () => {
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex string');
  });
});

describe('keyIdFromCertificate', () => {
  it('takes the first 8 bytes of the DER digest', () => {
    const der = new TextEncoder().encode('abc');
    expect(bytesToHex(keyIdFromCertificate(der))).toBe('ba7816bf8f01cfea');
  });

  it('reads a PEM certificate', () => {
    const pem = readFileSync(new URL('./fixtures/test-signer.crt.pem', import.meta.url), 'utf8');
    expect(bytesToHex(keyIdFromCertificate(pem))).toBe('104cd3870602b9fb');
  });
});
