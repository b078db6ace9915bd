/**
 * @dccscan/cli - dcc command line
 * Decode, verify and sample commands with their formatters
 */

export { DecodeCommand, selectField } from './commands/decode.js';
export { VerifyCommand } from './commands/verify.js';
export { SampleCommand } from './commands/sample.js';
export { ConfigError, loadConfig, type CliConfig } from './config.js';
export { createLogger } from './logger.js';
export {
  InputError,
  SAMPLE_TOKEN_URL,
  readKeyFile,
  readSampleToken,
  readTokenFile,
  readTokenStream,
} from './input.js';
export {
  ABSENT,
  createColors,
  exitCode,
  formatDecode,
  formatFailure,
  formatField,
  formatRecord,
  formatSample,
  formatVerify,
  handleError,
  jsonReplacer,
  type FormatOptions,
} from './utils.js';
export type {
  CLIOptions,
  CommandFailure,
  CommandResult,
  CommandSuccess,
  DecodeResult,
  FailureKind,
  FieldResult,
  SampleResult,
  Timing,
  VerifyResult,
} from './types.js';
