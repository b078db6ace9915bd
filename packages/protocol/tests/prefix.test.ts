/**
 * Tests for the scheme prefix
 */

import { describe, it, expect } from 'vitest';
import { FormatError } from '@dccscan/kernel';
import { stripPrefix } from '../src/prefix.js';

function formatError(token: string): FormatError {
  try {
    stripPrefix(token);
  } catch (err) {
    if (err instanceof FormatError) return err;
    throw err;
  }
  throw new Error('expected a FormatError');
}

describe('stripPrefix', () => {
  it('returns the remainder after HC1:', () => {
    expect(stripPrefix('HC1:NCFE70')).toBe('NCFE70');
    expect(stripPrefix('HC1:')).toBe('');
  });

  it('rejects another version of a well-formed marker', () => {
    const err = formatError('HC2:NCFE70');
    expect(err.code).toBe('E_UNSUPPORTED_VERSION');
    expect(err.stage).toBe('prefix');
    expect(err.details).toEqual({ prefix: 'HC2:' });
  });

  it('is case sensitive', () => {
    expect(formatError('hc1:NCFE70').code).toBe('E_MISSING_PREFIX');
  });

  it('does not trim whitespace', () => {
    expect(formatError(' HC1:NCFE70').code).toBe('E_MISSING_PREFIX');
  });

  it('rejects an empty token', () => {
    const err = formatError('');
    expect(err.code).toBe('E_MISSING_PREFIX');
    expect(err.message).toBe('Payload does not start with HC1:');
  });
});
