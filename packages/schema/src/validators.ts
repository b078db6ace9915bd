/**
 * Zod validators for certificate field formats
 *
 * Formats follow the eHealth Network DCC JSON schema 1.3.
 */
import { z } from 'zod';

export const SchemaVersion = z.string().regex(/^\d+\.\d+\.\d+$/, 'expected MAJOR.MINOR.PATCH');

export const CountryCode = z.string().regex(/^[A-Z]{2}$/, 'expected an ISO 3166 alpha-2 code');

export const Code = z.string().min(1).max(80);

export const Issuer = z.string().min(1).max(80);

export const CertificateId = z.string().min(1).max(80);

export const PersonName = z.string().max(80);

export const TransliteratedName = z
  .string()
  .max(80)
  .regex(/^[A-Z<]*$/, 'expected ICAO 9303 characters A-Z and <');

export const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const BirthDate = z
  .string()
  .regex(/^(?:\d{4}(?:-\d{2}(?:-\d{2})?)?)?$/, 'expected YYYY-MM-DD, YYYY-MM, YYYY or empty');

export const DoseCount = z.number().int().positive().max(9);

/**
 * RFC 3339 timestamp (test sample collection) to Date
 */
export const Timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

/**
 * NumericDate (seconds since the epoch) to Date
 */
export const NumericDate = z
  .number()
  .finite()
  .transform((seconds) => new Date(seconds * 1000))
  .refine((date) => !Number.isNaN(date.getTime()), 'date is out of range');

