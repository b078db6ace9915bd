/**
 * CLI utilities and formatting
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { diagnose } from '@dccscan/cbor';
import { bytesToHex } from '@dccscan/crypto';
import { SchemaError, getError, isDccError } from '@dccscan/kernel';
import {
  ValueSetLoadError,
  describeCode,
  type CertificateRecord,
  type Field,
  type Recovery,
  type TestResult,
  type Vaccination,
  type ValueSetName,
  type ValueSets,
} from '@dccscan/schema';
import { ConfigError } from './config.js';
import { InputError } from './input.js';
import type {
  CommandFailure,
  CommandResult,
  DecodeResult,
  FieldResult,
  SampleResult,
  Timing,
  VerifyResult,
} from './types.js';

export const ABSENT = '<absent>';

export interface FormatOptions {
  json?: boolean;
  raw?: boolean;
  colors: ChalkInstance;
  valueSets: ValueSets;
}

export function createColors(enabled: boolean): ChalkInstance {
  return enabled ? chalk : new Chalk({ level: 0 });
}

export function createExitHandler() {
  return (code: number) => {
    process.exit(code);
  };
}

export function exitCode(result: CommandResult<unknown>): number {
  if (result.success) return 0;
  return result.kind === 'input' ? 2 : 1;
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: (): Timing => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}

export type Clock = ReturnType<typeof timing>;

export function handleError(error: unknown, clock?: Clock): CommandFailure {
  const timingInfo = clock?.end();
  if (isDccError(error)) {
    return {
      success: false,
      kind: getError(error.code)?.stage === 'signature' ? 'signature' : 'decode',
      code: error.code,
      error: error.message,
      timing: timingInfo,
    };
  }
  if (
    error instanceof InputError ||
    error instanceof ConfigError ||
    error instanceof ValueSetLoadError
  ) {
    return { success: false, kind: 'input', error: error.message, timing: timingInfo };
  }
  return {
    success: false,
    kind: 'decode',
    error: error instanceof Error ? error.message : String(error),
    timing: timingInfo,
  };
}

/**
 * JSON replacer rendering schema errors as plain objects
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof SchemaError) {
    return { code: value.code, pointer: value.pointer, message: value.message };
  }
  return value;
}

export function formatFailure(
  result: CommandFailure,
  options: Pick<FormatOptions, 'json' | 'colors'>
): string {
  if (options.json) {
    const { success, kind, code, error } = result;
    return JSON.stringify({ success, kind, code, error }, null, 2);
  }
  const prefix = result.kind === 'signature' ? 'Signature invalid' : 'Error';
  const code = result.code === undefined ? '' : `[${result.code}] `;
  return options.colors.red(`${prefix}: ${code}${result.error}`);
}

function show<T>(field: Field<T>, render: (value: T) => string): string {
  return field.present ? render(field.value) : ABSENT;
}

const asText = (value: string): string => value;
const asNumber = (value: number): string => String(value);
const asDate = (value: Date): string => value.toISOString();

/**
 * Human-readable certificate, one `LABEL: value` line per field
 */
export function formatRecord(
  record: CertificateRecord,
  valueSets: ValueSets,
  colors: ChalkInstance = createColors(false)
): string {
  const line = (label: string, value: string): string => `${colors.bold(`${label}:`)} ${value}`;
  const heading = (title: string): string => colors.cyan(`# ${title}`);
  const code = (field: Field<string>, set: ValueSetName): string =>
    show(field, (value) => describeCode(valueSets, set, value));

  const { identity, vaccinations, tests, recoveries, version } = record.certificate;
  const lines = [
    heading('Identity Info'),
    line('SURNAME(S)', show(identity.surname, asText)),
    line('FORENAME(S)', show(identity.forename, asText)),
    line('ID SURNAME(S)', show(identity.surnameTransliterated, asText)),
    line('ID FORENAME(S)', show(identity.forenameTransliterated, asText)),
    line('DOB', show(identity.dateOfBirth, asText)),
  ];

  const vaccination = (v: Vaccination): string[] => [
    heading('Vaccine Info'),
    line('Disease', code(v.disease, 'diseases')),
    line('Vaccine Type', code(v.prophylaxis, 'prophylaxis')),
    line('Product', code(v.product, 'products')),
    line('Manufacturer', code(v.manufacturer, 'manufacturers')),
    line('Doses (rcvd/rqrd)', `${show(v.doseNumber, asNumber)}/${show(v.totalDoses, asNumber)}`),
    line('Latest Dose Date', show(v.date, asText)),
    line('Country', code(v.country, 'countries')),
    line('Certificate Issuer', show(v.issuer, asText)),
    line('Certificate ID', show(v.certificateId, asText)),
  ];

  const test = (t: TestResult): string[] => [
    heading('Test Info'),
    line('Disease', code(t.disease, 'diseases')),
    line('Test Type', code(t.testType, 'testTypes')),
    line('Test Name', show(t.testName, asText)),
    line('Test Device', show(t.manufacturer, asText)),
    line('Sample Date', show(t.sampledAt, asDate)),
    line('Result', code(t.result, 'testResults')),
    line('Testing Centre', show(t.testingCentre, asText)),
    line('Country', code(t.country, 'countries')),
    line('Certificate Issuer', show(t.issuer, asText)),
    line('Certificate ID', show(t.certificateId, asText)),
  ];

  const recovery = (r: Recovery): string[] => [
    heading('Recovery Info'),
    line('Disease', code(r.disease, 'diseases')),
    line('First Positive', show(r.firstPositive, asText)),
    line('Country', code(r.country, 'countries')),
    line('Certificate Issuer', show(r.issuer, asText)),
    line('Valid From', show(r.validFrom, asText)),
    line('Valid Until', show(r.validUntil, asText)),
    line('Certificate ID', show(r.certificateId, asText)),
  ];

  for (const entry of vaccinations) lines.push('', ...vaccination(entry));
  for (const entry of tests) lines.push('', ...test(entry));
  for (const entry of recoveries) lines.push('', ...recovery(entry));

  lines.push(
    '',
    heading('Cert Info'),
    line('Issuer', code(record.issuer, 'countries')),
    line('Issue Date', show(record.issuedAt, asDate)),
    line('Expire Date', show(record.expiresAt, asDate)),
    line('Schema Version', show(version, asText))
  );

  if (record.issues.length > 0) {
    lines.push('', colors.yellow('# Issues'));
    for (const issue of record.issues) {
      lines.push(colors.yellow(`${issue.code}: ${issue.message}`));
    }
  }

  return lines.join('\n');
}

function envelopeSummary(data: DecodeResult) {
  const { envelope } = data.certificate;
  return {
    tagged: envelope.tagged,
    algorithm: envelope.algorithm,
    kid: envelope.keyId === undefined ? undefined : bytesToHex(envelope.keyId),
  };
}

export function formatDecode(result: CommandResult<DecodeResult>, options: FormatOptions): string {
  if (!result.success) return formatFailure(result, options);
  const { certificate } = result.data;
  if (options.raw) {
    return diagnose(certificate.claims);
  }
  if (options.json) {
    return JSON.stringify(
      { success: true, envelope: envelopeSummary(result.data), record: certificate.record },
      jsonReplacer,
      2
    );
  }
  return formatRecord(certificate.record, options.valueSets, options.colors);
}

export function formatVerify(result: CommandResult<VerifyResult>, options: FormatOptions): string {
  if (!result.success) return formatFailure(result, options);
  const { algorithm, kid, certificate } = result.data;
  if (options.json) {
    return JSON.stringify(
      { success: true, valid: true, algorithm, kid, record: certificate.record },
      jsonReplacer,
      2
    );
  }
  const signer = kid === undefined ? algorithm : `${algorithm}, kid ${kid}`;
  return [
    options.colors.green(`Signature valid (${signer})`),
    '',
    formatRecord(certificate.record, options.valueSets, options.colors),
  ].join('\n');
}

export function formatField(result: CommandResult<FieldResult>, options: FormatOptions): string {
  if (!result.success) return formatFailure(result, options);
  if (options.json) {
    return JSON.stringify({ success: true, ...result.data }, null, 2);
  }
  return result.data.value;
}

export function formatSample(result: CommandResult<SampleResult>, options: FormatOptions): string {
  if (!result.success) return formatFailure(result, options);
  if (options.json) {
    return JSON.stringify({ success: true, ...result.data }, null, 2);
  }
  return result.data.token;
}
