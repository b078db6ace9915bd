/**
 * Environment configuration for the dcc CLI
 */

import { z } from 'zod';
import { LIMITS } from '@dccscan/kernel';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const EnvSchema = z.object({
  DCC_LOG_LEVEL: LogLevel.default('warn'),
  DCC_VALUESETS_DIR: z.string().min(1).optional(),
  DCC_MAX_INFLATED_BYTES: z.coerce.number().int().positive().default(LIMITS.maxInflatedBytes),
  DCC_MAX_DEPTH: z.coerce.number().int().positive().default(LIMITS.maxDepth),
});

export interface CliConfig {
  logLevel: z.infer<typeof LogLevel>;
  /** Value-set directory; the schema package's own when unset */
  valueSetsDir?: string;
  maxInflatedBytes: number;
  maxDepth: number;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read configuration from environment variables
 *
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const [issue] = result.error.issues;
    const variable = issue === undefined ? 'environment' : issue.path.join('.');
    const reason = issue === undefined ? 'invalid' : issue.message;
    throw new ConfigError(`Invalid ${variable}: ${reason}`, variable);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.DCC_LOG_LEVEL,
    valueSetsDir: parsed.DCC_VALUESETS_DIR,
    maxInflatedBytes: parsed.DCC_MAX_INFLATED_BYTES,
    maxDepth: parsed.DCC_MAX_DEPTH,
  };
}
