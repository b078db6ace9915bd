/**
 * Tests for environment configuration and the CLI logger
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'warn',
      valueSetsDir: undefined,
      maxInflatedBytes: 65536,
      maxDepth: 32,
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        DCC_LOG_LEVEL: 'debug',
        DCC_VALUESETS_DIR: '/srv/valuesets',
        DCC_MAX_INFLATED_BYTES: '4096',
        DCC_MAX_DEPTH: '8',
      })
    ).toEqual({
      logLevel: 'debug',
      valueSetsDir: '/srv/valuesets',
      maxInflatedBytes: 4096,
      maxDepth: 8,
    });
  });

  it('names the variable that does not parse', () => {
    const err = thrown(() => loadConfig({ DCC_MAX_DEPTH: 'deep' }));

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty('variable', 'DCC_MAX_DEPTH');
    expect(err).toHaveProperty('message', 'Invalid DCC_MAX_DEPTH: Expected number, received nan');
  });

  it('rejects unknown log levels', () => {
    const err = thrown(() => loadConfig({ DCC_LOG_LEVEL: 'loud' }));

    expect(err).toHaveProperty('variable', 'DCC_LOG_LEVEL');
  });

  it('rejects limits below one', () => {
    const err = thrown(() => loadConfig({ DCC_MAX_INFLATED_BYTES: '0' }));

    expect(err).toHaveProperty('variable', 'DCC_MAX_INFLATED_BYTES');
  });
});

describe('createLogger', () => {
  it('writes JSON records at the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger({ logLevel: 'info' }, { write: (line) => lines.push(line) });

    logger.debug('hidden');
    logger.info({ stage: 'prefix' }, 'shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 30,
      name: 'dcc',
      stage: 'prefix',
      msg: 'shown',
    });
  });
});
