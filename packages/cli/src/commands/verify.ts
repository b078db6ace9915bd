/**
 * dcc verify: decode a payload and check its signature
 */

import { getError } from '@dccscan/kernel';
import type { VerificationKey } from '@dccscan/crypto';
import { verifyCertificate, type DecodeOptions } from '@dccscan/protocol';
import { readKeyFile, readTokenFile } from '../input.js';
import type { CommandResult, VerifyResult } from '../types.js';
import { handleError, timing, type Clock } from '../utils.js';

export class VerifyCommand {
  /**
   * Verify the payload in `tokenFile` against the key or certificate in `keyFile`
   */
  async execute(
    tokenFile: string,
    keyFile: string,
    options: DecodeOptions = {}
  ): Promise<CommandResult<VerifyResult>> {
    const clock = timing();
    let token: string;
    let key: VerificationKey;
    try {
      token = await readTokenFile(tokenFile);
      key = await readKeyFile(keyFile);
    } catch (error) {
      return handleError(error, clock);
    }
    return this.verify(token, key, options, clock);
  }

  async verify(
    token: string,
    key: VerificationKey,
    options: DecodeOptions = {},
    clock: Clock = timing()
  ): Promise<CommandResult<VerifyResult>> {
    const result = await verifyCertificate(token.trim(), key, options);
    if (!result.valid) {
      return {
        success: false,
        kind: getError(result.code)?.stage === 'signature' ? 'signature' : 'decode',
        code: result.code,
        error: result.message,
        timing: clock.end(),
      };
    }
    return {
      success: true,
      data: { algorithm: result.algorithm, kid: result.kid, certificate: result.certificate },
      timing: clock.end(),
    };
  }
}
