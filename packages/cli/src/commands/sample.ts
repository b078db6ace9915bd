/**
 * dcc sample: print the built-in sample payload
 */

import { readSampleToken } from '../input.js';
import type { CommandResult, SampleResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export class SampleCommand {
  async execute(): Promise<CommandResult<SampleResult>> {
    const clock = timing();
    try {
      return { success: true, data: { token: await readSampleToken() }, timing: clock.end() };
    } catch (error) {
      return handleError(error, clock);
    }
  }
}
