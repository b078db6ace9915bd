#!/usr/bin/env node
/**
 * dcc: EU Digital COVID Certificate decoder
 * Commands: decode, verify, sample
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import type { DecodeOptions } from '@dccscan/protocol';
import { RECORD_FIELD_NAMES, loadValueSets } from '@dccscan/schema';
import { DecodeCommand, selectField } from './commands/decode.js';
import { SampleCommand } from './commands/sample.js';
import { VerifyCommand } from './commands/verify.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import type { CLIOptions, CommandResult } from './types.js';
import {
  createColors,
  createExitHandler,
  exitCode,
  formatDecode,
  formatFailure,
  formatField,
  formatSample,
  formatVerify,
  handleError,
  type FormatOptions,
} from './utils.js';

const program = new Command();
const exit = createExitHandler();

program
  .name('dcc')
  .description('Decode and verify EU Digital COVID Certificate QR payloads')
  .version('0.3.0');

// Global options
program.option('-j, --json', 'output in JSON format').option('--no-color', 'disable colors');

interface Context {
  logger: Logger;
  decode: DecodeOptions;
  format: FormatOptions;
}

/**
 * Configuration, logger and value sets for one run
 */
function prepare(): CommandResult<Context> {
  const globalOptions = program.opts<CLIOptions>();
  try {
    const config = loadConfig();
    const logger = createLogger(config);
    return {
      success: true,
      data: {
        logger,
        decode: { logger, maxDepth: config.maxDepth, maxInflatedBytes: config.maxInflatedBytes },
        format: {
          json: globalOptions.json,
          colors: createColors(globalOptions.color !== false),
          valueSets: loadValueSets(config.valueSetsDir),
        },
      },
    };
  } catch (error) {
    return handleError(error);
  }
}

function emit(result: CommandResult<unknown>, output: string): void {
  if (result.success) {
    console.log(output);
  } else {
    console.error(output);
  }
  exit(exitCode(result));
}

async function withContext(action: (context: Context) => Promise<void>): Promise<void> {
  const prepared = prepare();
  if (!prepared.success) {
    const globalOptions = program.opts<CLIOptions>();
    emit(
      prepared,
      formatFailure(prepared, {
        json: globalOptions.json,
        colors: createColors(globalOptions.color !== false),
      })
    );
    return;
  }
  await action(prepared.data);
}

interface DecodeCliOptions {
  sample?: boolean;
  raw?: boolean;
  field?: string;
}

// dcc decode [file]
program
  .command('decode [file]')
  .description('Decode a QR payload from a file, stdin or the built-in sample')
  .option('-s, --sample', 'decode the built-in sample certificate')
  .option('-r, --raw', 'print the CWT claims in CBOR diagnostic notation')
  .option(
    '-f, --field <name>',
    `print one field (${RECORD_FIELD_NAMES.join(', ')}, or e.g. vaccinations.0.doseNumber)`
  )
  .action(async (file: string | undefined, options: DecodeCliOptions) =>
    withContext(async ({ logger, decode, format }) => {
      const command = new DecodeCommand();
      const result = options.sample
        ? await command.executeSample(decode)
        : file === undefined
          ? await command.executeFromStdin(decode)
          : await command.executeFromFile(file, decode);
      logger.debug({ success: result.success, timing: result.timing }, 'decode finished');

      if (options.field !== undefined) {
        const selected = selectField(result, options.field);
        emit(selected, formatField(selected, format));
        return;
      }
      emit(result, formatDecode(result, { ...format, raw: options.raw }));
    })
  );

// dcc verify <file> --key <pem>
program
  .command('verify <file>')
  .description('Decode a QR payload and check its signature')
  .requiredOption('-k, --key <file>', 'signer certificate or public key (PEM or DER)')
  .action(async (file: string, options: { key: string }) =>
    withContext(async ({ decode, format }) => {
      const result = await new VerifyCommand().execute(file, options.key, decode);
      emit(result, formatVerify(result, format));
    })
  );

// dcc sample
program
  .command('sample')
  .description('Print the built-in sample payload')
  .action(async () =>
    withContext(async ({ format }) => {
      const result = await new SampleCommand().execute();
      emit(result, formatSample(result, format));
    })
  );

// Handle unknown commands
program.on('command:*', () => {
  console.error('Invalid command. See --help for available commands.');
  exit(2);
});

// If no command provided, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
  exit(0);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  exit(1);
});
