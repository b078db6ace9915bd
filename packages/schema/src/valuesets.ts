/**
 * Value sets
 *
 * Lookup tables from certificate codes (manufacturer, product, country,
 * ...) to display names. Loaded from eHealth Network value-set JSON files,
 * immutable once built, and passed explicitly to whoever renders codes.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import { createRequire } from 'node:module';
import * as path from 'node:path';
import { z, ZodError } from 'zod';

/**
 * File name of each value set inside a value-set directory
 */
export const VALUE_SET_FILES = {
  manufacturers: 'manufacturers.json',
  products: 'products.json',
  prophylaxis: 'prophylaxis.json',
  diseases: 'diseases.json',
  testTypes: 'test-types.json',
  testResults: 'test-results.json',
  countries: 'countries.json',
} as const;

export type ValueSetName = keyof typeof VALUE_SET_FILES;

export type ValueSet = ReadonlyMap<string, string>;

export type ValueSets = Readonly<Record<ValueSetName, ValueSet>>;

const VALUE_SET_NAMES: readonly ValueSetName[] = [
  'manufacturers',
  'products',
  'prophylaxis',
  'diseases',
  'testTypes',
  'testResults',
  'countries',
];

export const ValueSetFileSchema = z.object({
  valueSetId: z.string().min(1),
  valueSetDate: z.string().optional(),
  valueSetValues: z.record(
    z.object({
      display: z.string().min(1),
      lang: z.string().optional(),
      active: z.boolean().optional(),
      system: z.string().optional(),
      version: z.string().optional(),
    })
  ),
});

export type ValueSetFile = z.infer<typeof ValueSetFileSchema>;

/**
 * Value set load error
 */
export class ValueSetLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error | ZodError
  ) {
    super(message);
    this.name = 'ValueSetLoadError';
  }
}

/**
 * Build value sets from code → display tables; missing sets are empty
 */
export function createValueSets(
  tables: Partial<Record<ValueSetName, Record<string, string>>> = {}
): ValueSets {
  const table = (name: ValueSetName): ValueSet => new Map(Object.entries(tables[name] ?? {}));
  return Object.freeze({
    manufacturers: table('manufacturers'),
    products: table('products'),
    prophylaxis: table('prophylaxis'),
    diseases: table('diseases'),
    testTypes: table('testTypes'),
    testResults: table('testResults'),
    countries: table('countries'),
  });
}

/**
 * Directory of the value sets shipped with this package
 */
export function defaultValueSetsDir(): string {
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve('@dccscan/schema/package.json')), 'valuesets');
}

/**
 * Parse one value-set file
 *
 * @throws ValueSetLoadError on read or JSON failure, or when the content does not validate
 */
export function readValueSetFile(file: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ValueSetLoadError(
      `Failed to read value set ${file}: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined
    );
  }
  const result = ValueSetFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ValueSetLoadError(`Invalid value set ${file}: ${issues}`, result.error);
  }
  return Object.fromEntries(
    Object.entries(result.data.valueSetValues).map(([code, entry]) => [code, entry.display])
  );
}

/**
 * Load every value set from a directory
 *
 * A missing file leaves that set empty; an unreadable or invalid one throws.
 */
export function loadValueSets(dir: string = defaultValueSetsDir()): ValueSets {
  const tables: Partial<Record<ValueSetName, Record<string, string>>> = {};
  for (const name of VALUE_SET_NAMES) {
    const file = path.join(dir, VALUE_SET_FILES[name]);
    if (fs.existsSync(file)) {
      tables[name] = readValueSetFile(file);
    }
  }
  return createValueSets(tables);
}

/**
 * Display name of a code, or the code itself when the set does not list it
 */
export function describeCode(valueSets: ValueSets, set: ValueSetName, code: string): string {
  return valueSets[set].get(code) ?? code;
}
