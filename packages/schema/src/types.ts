/**
 * Certificate record types
 *
 * Read-only projection of the CWT claims of an EU Digital COVID
 * Certificate. Every leaf is a `Field`, so a single bad value never
 * hides the rest of the record.
 */

import type { SchemaError } from '@dccscan/kernel';

/**
 * A mapped value, or the reason it is absent
 */
export type Field<T> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false; readonly error: SchemaError };

/**
 * Holder identity (`nam` and `dob`)
 */
export interface Identity {
  /** Surname(s) (`fn`) */
  readonly surname: Field<string>;
  /** Forename(s) (`gn`, optional) */
  readonly forename: Field<string>;
  /** ICAO 9303 transliterated surname(s) (`fnt`) */
  readonly surnameTransliterated: Field<string>;
  /** ICAO 9303 transliterated forename(s) (`gnt`, optional) */
  readonly forenameTransliterated: Field<string>;
  /** `YYYY-MM-DD`, `YYYY-MM`, `YYYY` or empty (`dob`) */
  readonly dateOfBirth: Field<string>;
}

/**
 * Vaccination entry (`v`)
 */
export interface Vaccination {
  readonly disease: Field<string>;
  readonly prophylaxis: Field<string>;
  readonly product: Field<string>;
  readonly manufacturer: Field<string>;
  readonly doseNumber: Field<number>;
  readonly totalDoses: Field<number>;
  readonly date: Field<string>;
  readonly country: Field<string>;
  readonly issuer: Field<string>;
  readonly certificateId: Field<string>;
}

/**
 * Test entry (`t`)
 */
export interface TestResult {
  readonly disease: Field<string>;
  readonly testType: Field<string>;
  /** NAA test name (`nm`, optional) */
  readonly testName: Field<string>;
  /** RAT device identifier (`ma`, optional) */
  readonly manufacturer: Field<string>;
  readonly sampledAt: Field<Date>;
  readonly result: Field<string>;
  /** Testing centre or facility (`tc`, optional) */
  readonly testingCentre: Field<string>;
  readonly country: Field<string>;
  readonly issuer: Field<string>;
  readonly certificateId: Field<string>;
}

/**
 * Recovery entry (`r`)
 */
export interface Recovery {
  readonly disease: Field<string>;
  readonly firstPositive: Field<string>;
  readonly country: Field<string>;
  readonly issuer: Field<string>;
  readonly validFrom: Field<string>;
  readonly validUntil: Field<string>;
  readonly certificateId: Field<string>;
}

/**
 * HCERT v1 content (claim -260, key 1)
 */
export interface HealthCertificate {
  readonly version: Field<string>;
  readonly identity: Identity;
  readonly vaccinations: readonly Vaccination[];
  readonly tests: readonly TestResult[];
  readonly recoveries: readonly Recovery[];
}

export interface CertificateRecord {
  /** Issuing country (claim 1) */
  readonly issuer: Field<string>;
  /** Claim 6 */
  readonly issuedAt: Field<Date>;
  /** Claim 4 */
  readonly expiresAt: Field<Date>;
  readonly certificate: HealthCertificate;
  /** Every degradation recorded while mapping, in mapping order */
  readonly issues: readonly SchemaError[];
}
