/**
 * dcc decode: QR payload to certificate record
 */

import { decodeCertificate, type DecodeOptions } from '@dccscan/protocol';
import { RECORD_FIELD_NAMES, lookupField } from '@dccscan/schema';
import { readSampleToken, readTokenFile, readTokenStream } from '../input.js';
import type { CommandResult, DecodeResult, FieldResult } from '../types.js';
import { handleError, timing, type Clock } from '../utils.js';

export class DecodeCommand {
  /**
   * Decode a payload already in memory
   */
  async execute(
    token: string,
    options: DecodeOptions = {}
  ): Promise<CommandResult<DecodeResult>> {
    return this.run(async () => token.trim(), options);
  }

  async executeFromFile(
    file: string,
    options: DecodeOptions = {}
  ): Promise<CommandResult<DecodeResult>> {
    return this.run(() => readTokenFile(file), options);
  }

  async executeFromStdin(
    options: DecodeOptions = {},
    stdin: AsyncIterable<Uint8Array | string> = process.stdin
  ): Promise<CommandResult<DecodeResult>> {
    return this.run(() => readTokenStream(stdin), options);
  }

  async executeSample(options: DecodeOptions = {}): Promise<CommandResult<DecodeResult>> {
    return this.run(readSampleToken, options);
  }

  private async run(
    source: () => Promise<string>,
    options: DecodeOptions
  ): Promise<CommandResult<DecodeResult>> {
    const clock: Clock = timing();
    try {
      const token = await source();
      const certificate = decodeCertificate(token, options);
      return { success: true, data: { certificate }, timing: clock.end() };
    } catch (error) {
      return handleError(error, clock);
    }
  }
}

/**
 * Narrow a decode result to one named record field
 *
 * An unknown name, or an entry index past the end of its list, is a
 * usage error; an absent field fails with the schema error that
 * explains it.
 */
export function selectField(
  result: CommandResult<DecodeResult>,
  name: string
): CommandResult<FieldResult> {
  if (!result.success) return result;
  const field = lookupField(result.data.certificate.record, name);
  if (field === undefined) {
    return {
      success: false,
      kind: 'input',
      error:
        `Unknown field ${name}, expected one of: ${RECORD_FIELD_NAMES.join(', ')}, ` +
        'or vaccinations|tests|recoveries.<index>.<field>',
    };
  }
  if (!field.present) {
    return { success: false, kind: 'decode', code: field.error.code, error: field.error.message };
  }
  const value = field.value instanceof Date ? field.value.toISOString() : String(field.value);
  return { success: true, data: { name, value }, timing: result.timing };
}
