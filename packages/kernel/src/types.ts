/**
 * dccscan kernel types
 */

/**
 * Pipeline stage that raised an error
 */
export type Stage = 'prefix' | 'base45' | 'decompress' | 'envelope' | 'cbor' | 'schema' | 'signature';

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  stage: Stage;
  /** Recoverable errors degrade a single field instead of aborting the decode */
  recoverable: boolean;
}
