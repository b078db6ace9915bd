/**
 * Tests for the verify command
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { generateTestKey } from '@dccscan/crypto/testkit';
import { buildClaims, issueCertificate, vaccinationHcert } from '@dccscan/protocol/testkit';
import { loadValueSets } from '@dccscan/schema';
import { VerifyCommand } from '../src/commands/verify.js';
import { SAMPLE_TOKEN_URL } from '../src/input.js';
import { createColors, exitCode, formatVerify } from '../src/utils.js';

const SAMPLE_FILE = fileURLToPath(SAMPLE_TOKEN_URL);
const SIGNER_CERT = fileURLToPath(
  new URL('../../crypto/tests/fixtures/test-signer.crt.pem', import.meta.url)
);
const KID = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);

async function issued() {
  const key = await generateTestKey('EdDSA');
  const token = await issueCertificate(
    buildClaims({ issuer: 'XX', issuedAt: 1622548800, hcert: vaccinationHcert() }),
    { key, kid: KID }
  );
  return { key, token };
}

describe('VerifyCommand', () => {
  const command = new VerifyCommand();

  it('accepts a payload signed by the given key', async () => {
    const { key, token } = await issued();
    const result = await command.verify(token, key.publicKey);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.algorithm).toBe('EdDSA');
    expect(result.data.kid).toBe('0102030405060708');
    expect(result.data.certificate.record.issuer).toEqual({ present: true, value: 'XX' });
    expect(exitCode(result)).toBe(0);
  });

  it('rejects a payload signed by another key', async () => {
    const { token } = await issued();
    const other = await generateTestKey('EdDSA');
    const result = await command.verify(token, other.publicKey);

    expect(result).toMatchObject({
      success: false,
      kind: 'signature',
      code: 'E_INVALID_SIGNATURE',
      error: 'EdDSA signature does not match',
    });
    expect(exitCode(result)).toBe(1);
  });

  it('checks the sample against a signer certificate file', async () => {
    const result = await command.execute(SAMPLE_FILE, SIGNER_CERT);

    expect(result).toMatchObject({
      success: false,
      kind: 'signature',
      code: 'E_INVALID_SIGNATURE',
      error: 'ES256 signature does not match',
    });
  });

  it('reports decode failures with their stage code', async () => {
    const { key } = await issued();
    const result = await command.verify('HC1:BB8A', key.publicKey);

    expect(result).toMatchObject({ success: false, kind: 'decode', code: 'E_BASE45_LENGTH' });
  });

  it('fails with an input error when the key file is missing', async () => {
    const result = await command.execute(SAMPLE_FILE, '/nonexistent/signer.pem');

    expect(result).toMatchObject({ success: false, kind: 'input' });
    expect(exitCode(result)).toBe(2);
  });
});

describe('formatVerify', () => {
  it('leads with the signature line', async () => {
    const { key, token } = await issued();
    const result = await new VerifyCommand().verify(token, key.publicKey);
    const lines = formatVerify(result, {
      colors: createColors(false),
      valueSets: loadValueSets(),
    }).split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'Signature valid (EdDSA, kid 0102030405060708)',
      '',
      '# Identity Info',
      'SURNAME(S): Testperson',
    ]);
    expect(lines).toContain('Issue Date: 2021-06-01T12:00:00.000Z');
    expect(lines).toContain('Expire Date: <absent>');
  });
});
