/**
 * Tests for the decode command
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { generateTestKey } from '@dccscan/crypto/testkit';
import { buildClaims, issueCertificate, vaccinationHcert } from '@dccscan/protocol/testkit';
import { DecodeCommand, selectField } from '../src/commands/decode.js';
import { SAMPLE_TOKEN_URL, readSampleToken } from '../src/input.js';
import { exitCode } from '../src/utils.js';

async function* chunks(
  ...parts: Array<string | Uint8Array>
): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) yield part;
}

describe('DecodeCommand', () => {
  const command = new DecodeCommand();

  it('decodes a payload with surrounding whitespace', async () => {
    const token = await readSampleToken();
    const result = await command.execute(`  ${token}\n`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.certificate.record.issuer).toEqual({ present: true, value: 'IE' });
    expect(result.timing?.duration).toBeGreaterThanOrEqual(0);
    expect(exitCode(result)).toBe(0);
  });

  it('decodes the built-in sample', async () => {
    const result = await command.executeSample();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.certificate.record.certificate.identity.surname).toEqual({
      present: true,
      value: 'Bloggs',
    });
  });

  it('reads the payload from a file', async () => {
    const result = await command.executeFromFile(fileURLToPath(SAMPLE_TOKEN_URL));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.certificate.envelope.algorithm).toBe(-7);
  });

  it('reads the payload from a stream in several chunks', async () => {
    const token = await readSampleToken();
    const result = await command.executeFromStdin(
      {},
      chunks(token.slice(0, 100), new TextEncoder().encode(token.slice(100) + '\n'))
    );

    expect(result.success).toBe(true);
  });

  it('fails with an input error when stdin is empty', async () => {
    const result = await command.executeFromStdin({}, chunks(' \n'));

    expect(result).toMatchObject({ success: false, kind: 'input', error: 'No payload in stdin' });
    expect(exitCode(result)).toBe(2);
  });

  it('fails with an input error when the file cannot be read', async () => {
    const result = await command.executeFromFile('/nonexistent/token.txt');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.kind).toBe('input');
    expect(result.code).toBeUndefined();
    expect(result.error.startsWith('Cannot read /nonexistent/token.txt: ')).toBe(true);
    expect(exitCode(result)).toBe(2);
  });

  it('reports the code of the failing stage', async () => {
    const result = await command.execute('HC1:BB8A');

    expect(result).toMatchObject({ success: false, kind: 'decode', code: 'E_BASE45_LENGTH' });
    expect(exitCode(result)).toBe(1);
  });

  it('passes decode limits through', async () => {
    const result = await command.executeSample({ maxInflatedBytes: 100 });

    expect(result).toMatchObject({ success: false, kind: 'decode', code: 'E_DECOMPRESS_LIMIT' });
  });
});

describe('selectField', () => {
  const command = new DecodeCommand();

  it('selects a text field', async () => {
    const result = selectField(await command.executeSample(), 'identity.surname');

    expect(result).toMatchObject({
      success: true,
      data: { name: 'identity.surname', value: 'Bloggs' },
    });
  });

  it('renders dates as ISO 8601', async () => {
    const result = selectField(await command.executeSample(), 'expiresAt');

    expect(result).toMatchObject({
      success: true,
      data: { name: 'expiresAt', value: '2021-06-14T09:00:00.000Z' },
    });
  });

  it('selects entry fields by index', async () => {
    const result = await command.executeSample();

    expect(selectField(result, 'vaccinations.0.doseNumber')).toMatchObject({
      success: true,
      data: { name: 'vaccinations.0.doseNumber', value: '1' },
    });
    expect(selectField(result, 'vaccinations.0.product')).toMatchObject({
      success: true,
      data: { value: 'EU/1/20/1528' },
    });
    expect(selectField(result, 'vaccinations.1.doseNumber')).toMatchObject({
      success: false,
      kind: 'input',
    });
  });

  it('rejects an unknown field name as a usage error', async () => {
    const result = selectField(await command.executeSample(), 'identity.nickname');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.kind).toBe('input');
    expect(result.error).toBe(
      'Unknown field identity.nickname, expected one of: issuer, issuedAt, expiresAt, version, ' +
        'identity.surname, identity.forename, identity.surnameTransliterated, ' +
        'identity.forenameTransliterated, identity.dateOfBirth, ' +
        'or vaccinations|tests|recoveries.<index>.<field>'
    );
    expect(exitCode(result)).toBe(2);
  });

  it('fails with the schema error of an absent field', async () => {
    const key = await generateTestKey('EdDSA');
    const token = await issueCertificate(
      buildClaims({
        issuer: 'XX',
        hcert: vaccinationHcert({ nam: { fn: 'Testperson', fnt: 'TESTPERSON' } }),
      }),
      { key }
    );
    const result = selectField(await command.execute(token), 'identity.forename');

    expect(result).toEqual({
      success: false,
      kind: 'decode',
      code: 'E_FIELD_MISSING',
      error: '/-260/1/nam/gn is missing',
    });
  });

  it('passes decode failures through', async () => {
    const failed = await command.execute('HC1:BB8A');

    expect(selectField(failed, 'issuer')).toBe(failed);
  });
});
