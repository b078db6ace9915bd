/**
 * Types for the dcc CLI
 */

import type { CoseAlgorithmName } from '@dccscan/kernel';
import type { DecodedCertificate } from '@dccscan/protocol';

/**
 * Global options; commander sets `color` to false for `--no-color`
 */
export type CLIOptions = {
  json?: boolean;
  color?: boolean;
};

export interface Timing {
  started: number;
  completed: number;
  duration: number;
}

/**
 * Why a command failed; decides the exit code
 *
 * `decode` and `signature` exit 1, `input` exits 2.
 */
export type FailureKind = 'decode' | 'signature' | 'input';

export interface CommandSuccess<T> {
  success: true;
  data: T;
  timing?: Timing;
}

export interface CommandFailure {
  success: false;
  kind: FailureKind;
  /** Kernel error code, when the failure came from the pipeline */
  code?: string;
  error: string;
  timing?: Timing;
}

export type CommandResult<T> = CommandSuccess<T> | CommandFailure;

export interface DecodeResult {
  certificate: DecodedCertificate;
}

export interface VerifyResult {
  algorithm: CoseAlgorithmName;
  kid?: string;
  certificate: DecodedCertificate;
}

export interface SampleResult {
  token: string;
}

export interface FieldResult {
  name: string;
  value: string;
}
