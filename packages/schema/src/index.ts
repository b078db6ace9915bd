/**
 * dccscan schema package
 * Certificate record types, field mapping and value sets
 */

export type {
  CertificateRecord,
  Field,
  HealthCertificate,
  Identity,
  Recovery,
  TestResult,
  Vaccination,
} from './types.js';

export { mapCertificate } from './mapper.js';

export {
  getField,
  fieldValue,
  isRecordFieldName,
  lookupField,
  RECORD_FIELD_NAMES,
  type EntryFields,
  type EntryListName,
  type FieldValue,
  type RecordFieldName,
  type RecordFields,
} from './fields.js';

export {
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

export {
  VALUE_SET_FILES,
  ValueSetFileSchema,
  ValueSetLoadError,
  createValueSets,
  defaultValueSetsDir,
  describeCode,
  loadValueSets,
  readValueSetFile,
  type ValueSet,
  type ValueSetFile,
  type ValueSetName,
  type ValueSets,
} from './valuesets.js';
