/**
 * Tests for the sample command
 */

import { describe, it, expect } from 'vitest';
import { loadValueSets } from '@dccscan/schema';
import { SampleCommand } from '../src/commands/sample.js';
import { createColors, formatSample } from '../src/utils.js';

describe('SampleCommand', () => {
  it('returns the built-in payload', async () => {
    const result = await new SampleCommand().execute();

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.token.startsWith('HC1:NCF')).toBe(true);
    expect(result.data.token).toHaveLength(514);
  });

  it('prints the bare payload, or JSON', async () => {
    const result = await new SampleCommand().execute();
    const options = { colors: createColors(false), valueSets: loadValueSets() };

    expect(formatSample(result, options)).toMatch(/^HC1:\S+$/);
    expect(JSON.parse(formatSample(result, { ...options, json: true }))).toMatchObject({
      success: true,
    });
  });
});
