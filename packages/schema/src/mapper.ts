/**
 * CWT claims to CertificateRecord
 *
 * Missing or mistyped values degrade one field at a time. Each problem
 * becomes a SchemaError on the field and in `record.issues`, pointing at
 * the claim with a JSON Pointer such as `/-260/1/nam/fn`.
 */

import { CWT_CLAIMS, HCERT_DCC_V1, SchemaError, type SchemaErrorCode } from '@dccscan/kernel';
import { asArray, asMap, asNumber, asText, mapGet, type CborMap, type TypedValue } from '@dccscan/cbor';
import type { z } from 'zod';
import type {
  CertificateRecord,
  Field,
  HealthCertificate,
  Identity,
  Recovery,
  TestResult,
  Vaccination,
} from './types.js';
import {
  BirthDate,
  CertificateId,
  Code,
  CountryCode,
  DoseCount,
  IsoDate,
  Issuer,
  NumericDate,
  PersonName,
  SchemaVersion,
  Timestamp,
  TransliteratedName,
} from './validators.js';

type Key = string | number;

/**
 * A map being read, or the error that made it unreadable
 *
 * Fields under an unreadable map share its error instead of adding
 * issues of their own.
 */
type Scope =
  | { readonly ok: true; readonly pointer: string; readonly map: CborMap }
  | { readonly ok: false; readonly pointer: string; readonly error: SchemaError };

/**
 * How to read one field: pick the variant, then check the format
 */
interface FieldType<R, T> {
  /** Variant description used in E_FIELD_TYPE messages */
  readonly expected: string;
  read(value: TypedValue): R | undefined;
  readonly format: z.ZodType<T, z.ZodTypeDef, R>;
}

function textField<T>(format: z.ZodType<T, z.ZodTypeDef, string>): FieldType<string, T> {
  return { expected: 'text', read: asText, format };
}

const code = textField(Code);
const issuer = textField(Issuer);
const country = textField(CountryCode);
const certificateId = textField(CertificateId);
const isoDate = textField(IsoDate);

const doseCount: FieldType<number, number> = {
  expected: 'a number',
  read: asNumber,
  format: DoseCount,
};

const numericDate: FieldType<number, Date> = {
  expected: 'epoch seconds',
  read: (value) => (value.kind === 'date' ? value.value.getTime() / 1000 : asNumber(value)),
  format: NumericDate,
};

function escapeToken(key: Key): string {
  return String(key).replace(/~/g, '~0').replace(/\//g, '~1');
}

class FieldMapper {
  readonly issues: SchemaError[] = [];

  private issue(code: SchemaErrorCode, pointer: string, message: string): SchemaError {
    const error = new SchemaError(code, pointer, message);
    this.issues.push(error);
    return error;
  }

  private missing(pointer: string, optional: boolean): SchemaError {
    const message = `${pointer} is missing`;
    return optional
      ? new SchemaError('E_FIELD_MISSING', pointer, message)
      : this.issue('E_FIELD_MISSING', pointer, message);
  }

  private scopeOf(pointer: string, value: TypedValue): Scope {
    const map = asMap(value);
    if (map) {
      return { ok: true, pointer, map };
    }
    const name = pointer || 'claims';
    const error = this.issue('E_FIELD_TYPE', pointer, `${name} must be a map, found ${value.kind}`);
    return { ok: false, pointer, error };
  }

  root(claims: TypedValue): Scope {
    return this.scopeOf('', claims);
  }

  child(scope: Scope, key: Key): Scope {
    const pointer = `${scope.pointer}/${escapeToken(key)}`;
    if (!scope.ok) {
      return { ok: false, pointer, error: scope.error };
    }
    const value = mapGet(scope.map, key);
    if (value === undefined) {
      return { ok: false, pointer, error: this.missing(pointer, false) };
    }
    return this.scopeOf(pointer, value);
  }

  /**
   * Entries of an optional array of maps; absent arrays are empty
   */
  list(scope: Scope, key: Key): Scope[] {
    const pointer = `${scope.pointer}/${escapeToken(key)}`;
    const value = scope.ok ? mapGet(scope.map, key) : undefined;
    if (value === undefined) {
      return [];
    }
    const items = asArray(value);
    if (!items) {
      this.issue('E_FIELD_TYPE', pointer, `${pointer} must be an array, found ${value.kind}`);
      return [];
    }
    return items.map((item, index) => this.scopeOf(`${pointer}/${index}`, item));
  }

  field<R, T>(scope: Scope, key: Key, type: FieldType<R, T>, optional = false): Field<T> {
    const pointer = `${scope.pointer}/${escapeToken(key)}`;
    if (!scope.ok) {
      return { present: false, error: scope.error };
    }
    const value = mapGet(scope.map, key);
    if (value === undefined) {
      return { present: false, error: this.missing(pointer, optional) };
    }
    const raw = type.read(value);
    if (raw === undefined) {
      const message = `${pointer} must be ${type.expected}, found ${value.kind}`;
      return { present: false, error: this.issue('E_FIELD_TYPE', pointer, message) };
    }
    const parsed = type.format.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid value';
      return {
        present: false,
        error: this.issue('E_FIELD_FORMAT', pointer, `${pointer} is malformed: ${reason}`),
      };
    }
    return { present: true, value: parsed.data };
  }
}

function mapIdentity(m: FieldMapper, hcert: Scope): Identity {
  const name = m.child(hcert, 'nam');
  return {
    surname: m.field(name, 'fn', textField(PersonName)),
    forename: m.field(name, 'gn', textField(PersonName), true),
    surnameTransliterated: m.field(name, 'fnt', textField(TransliteratedName)),
    forenameTransliterated: m.field(name, 'gnt', textField(TransliteratedName), true),
    dateOfBirth: m.field(hcert, 'dob', textField(BirthDate)),
  };
}

function mapVaccination(m: FieldMapper, entry: Scope): Vaccination {
  return {
    disease: m.field(entry, 'tg', code),
    prophylaxis: m.field(entry, 'vp', code),
    product: m.field(entry, 'mp', code),
    manufacturer: m.field(entry, 'ma', code),
    doseNumber: m.field(entry, 'dn', doseCount),
    totalDoses: m.field(entry, 'sd', doseCount),
    date: m.field(entry, 'dt', isoDate),
    country: m.field(entry, 'co', country),
    issuer: m.field(entry, 'is', issuer),
    certificateId: m.field(entry, 'ci', certificateId),
  };
}

function mapTest(m: FieldMapper, entry: Scope): TestResult {
  return {
    disease: m.field(entry, 'tg', code),
    testType: m.field(entry, 'tt', code),
    testName: m.field(entry, 'nm', code, true),
    manufacturer: m.field(entry, 'ma', code, true),
    sampledAt: m.field(entry, 'sc', textField(Timestamp)),
    result: m.field(entry, 'tr', code),
    testingCentre: m.field(entry, 'tc', code, true),
    country: m.field(entry, 'co', country),
    issuer: m.field(entry, 'is', issuer),
    certificateId: m.field(entry, 'ci', certificateId),
  };
}

function mapRecovery(m: FieldMapper, entry: Scope): Recovery {
  return {
    disease: m.field(entry, 'tg', code),
    firstPositive: m.field(entry, 'fr', isoDate),
    country: m.field(entry, 'co', country),
    issuer: m.field(entry, 'is', issuer),
    validFrom: m.field(entry, 'df', isoDate),
    validUntil: m.field(entry, 'du', isoDate),
    certificateId: m.field(entry, 'ci', certificateId),
  };
}

function mapHealthCertificate(m: FieldMapper, hcert: Scope): HealthCertificate {
  const certificate: HealthCertificate = {
    version: m.field(hcert, 'ver', textField(SchemaVersion)),
    identity: mapIdentity(m, hcert),
    vaccinations: m.list(hcert, 'v').map((entry) => mapVaccination(m, entry)),
    tests: m.list(hcert, 't').map((entry) => mapTest(m, entry)),
    recoveries: m.list(hcert, 'r').map((entry) => mapRecovery(m, entry)),
  };
  if (
    hcert.ok &&
    certificate.vaccinations.length + certificate.tests.length + certificate.recoveries.length === 0
  ) {
    m.issues.push(
      new SchemaError(
        'E_FIELD_MISSING',
        hcert.pointer,
        `${hcert.pointer} has no vaccination, test or recovery entry`
      )
    );
  }
  return certificate;
}

/**
 * Map decoded CWT claims to a CertificateRecord
 *
 * Never throws: every problem is reported on the affected field and in
 * `issues`.
 */
export function mapCertificate(claims: TypedValue): CertificateRecord {
  const m = new FieldMapper();
  const root = m.root(claims);

  const issuerField = m.field(root, CWT_CLAIMS.issuer, country);
  const expiresAt = m.field(root, CWT_CLAIMS.expiresAt, numericDate);
  const issuedAt = m.field(root, CWT_CLAIMS.issuedAt, numericDate);
  const hcert = m.child(m.child(root, CWT_CLAIMS.hcert), HCERT_DCC_V1);

  return {
    issuer: issuerField,
    issuedAt,
    expiresAt,
    certificate: mapHealthCertificate(m, hcert),
    issues: m.issues,
  };
}
