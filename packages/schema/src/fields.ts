/**
 * Typed access to record fields by dotted name
 */

import type { CertificateRecord, Field, Recovery, TestResult, Vaccination } from './types.js';

/**
 * Value type of each named field
 *
 * Fields of vaccination, test and recovery entries are reached through
 * `lookupField` with an index, e.g. `vaccinations.0.doseNumber`.
 */
export interface RecordFields {
  issuer: string;
  issuedAt: Date;
  expiresAt: Date;
  version: string;
  'identity.surname': string;
  'identity.forename': string;
  'identity.surnameTransliterated': string;
  'identity.forenameTransliterated': string;
  'identity.dateOfBirth': string;
}

export type RecordFieldName = keyof RecordFields;

const ACCESSORS: { [N in RecordFieldName]: (record: CertificateRecord) => Field<RecordFields[N]> } = {
  issuer: (record) => record.issuer,
  issuedAt: (record) => record.issuedAt,
  expiresAt: (record) => record.expiresAt,
  version: (record) => record.certificate.version,
  'identity.surname': (record) => record.certificate.identity.surname,
  'identity.forename': (record) => record.certificate.identity.forename,
  'identity.surnameTransliterated': (record) => record.certificate.identity.surnameTransliterated,
  'identity.forenameTransliterated': (record) =>
    record.certificate.identity.forenameTransliterated,
  'identity.dateOfBirth': (record) => record.certificate.identity.dateOfBirth,
};

export const RECORD_FIELD_NAMES = Object.keys(ACCESSORS).filter(isRecordFieldName);

export function isRecordFieldName(name: string): name is RecordFieldName {
  return Object.prototype.hasOwnProperty.call(ACCESSORS, name);
}

export function getField<N extends RecordFieldName>(
  record: CertificateRecord,
  name: N
): Field<RecordFields[N]> {
  return ACCESSORS[name](record);
}

/**
 * Value of a field, or `fallback` when it is absent
 */
export function fieldValue<T, F>(field: Field<T>, fallback: F): T | F {
  return field.present ? field.value : fallback;
}

/**
 * Entry list of a certificate and the fields each of its entries carries
 */
export interface EntryFields {
  vaccinations: Vaccination;
  tests: TestResult;
  recoveries: Recovery;
}

export type EntryListName = keyof EntryFields;

const ENTRY_KEYS: { [L in EntryListName]: Record<keyof EntryFields[L], true> } = {
  vaccinations: {
    disease: true,
    prophylaxis: true,
    product: true,
    manufacturer: true,
    doseNumber: true,
    totalDoses: true,
    date: true,
    country: true,
    issuer: true,
    certificateId: true,
  },
  tests: {
    disease: true,
    testType: true,
    testName: true,
    manufacturer: true,
    sampledAt: true,
    result: true,
    testingCentre: true,
    country: true,
    issuer: true,
    certificateId: true,
  },
  recoveries: {
    disease: true,
    firstPositive: true,
    country: true,
    issuer: true,
    validFrom: true,
    validUntil: true,
    certificateId: true,
  },
};

const ENTRY_NAME = /^(vaccinations|tests|recoveries)\.(0|[1-9]\d*)\.([A-Za-z]+)$/;

export type FieldValue = RecordFields[RecordFieldName] | number;

function hasKey<T extends object>(keys: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(keys, key);
}

function entryField(
  record: CertificateRecord,
  list: string,
  index: number,
  key: string
): Field<FieldValue> | undefined {
  const { certificate } = record;
  switch (list) {
    case 'vaccinations': {
      const entry: Vaccination | undefined = certificate.vaccinations[index];
      return entry && hasKey(ENTRY_KEYS.vaccinations, key) ? entry[key] : undefined;
    }
    case 'tests': {
      const entry: TestResult | undefined = certificate.tests[index];
      return entry && hasKey(ENTRY_KEYS.tests, key) ? entry[key] : undefined;
    }
    case 'recoveries': {
      const entry: Recovery | undefined = certificate.recoveries[index];
      return entry && hasKey(ENTRY_KEYS.recoveries, key) ? entry[key] : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Field by name: one of `RECORD_FIELD_NAMES`, or `<list>.<index>.<field>`
 * for an entry of `vaccinations`, `tests` or `recoveries`
 *
 * Returns undefined when the name denotes no field of this record,
 * including an index past the end of the list.
 */
export function lookupField(
  record: CertificateRecord,
  name: string
): Field<FieldValue> | undefined {
  if (isRecordFieldName(name)) {
    return getField(record, name);
  }
  const match = ENTRY_NAME.exec(name);
  if (!match) {
    return undefined;
  }
  const [, list = '', index = '', key = ''] = match;
  return entryField(record, list, Number(index), key);
}
