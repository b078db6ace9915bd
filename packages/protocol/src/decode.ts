/**
 * Certificate decode pipeline
 *
 * prefix → Base45 → zlib → COSE_Sign1 → CBOR claims → CertificateRecord
 *
 * Every stage up to the claims fails fast with the error of the stage
 * that broke. Field mapping degrades per field instead.
 */

import type { Logger } from 'pino';
import { LIMITS } from '@dccscan/kernel';
import { decode, type TypedValue } from '@dccscan/cbor';
import { base45Decode, decompress, parseCoseSign1, type CoseSign1 } from '@dccscan/crypto';
import { mapCertificate, type CertificateRecord } from '@dccscan/schema';
import { stripPrefix } from './prefix.js';

export interface DecodeOptions {
  /** Receives one debug record per stage and a warning per schema issue */
  logger?: Logger;
  /** Maximum CBOR nesting depth (default 32) */
  maxDepth?: number;
  /** Maximum inflated envelope size in bytes (default 64 KiB) */
  maxInflatedBytes?: number;
}

export interface DecodedCertificate {
  record: CertificateRecord;
  envelope: CoseSign1;
  /** Raw CWT claims, for diagnostic output */
  claims: TypedValue;
}

/**
 * Decode an `HC1:` QR payload
 *
 * Pure and synchronous; shares nothing between calls.
 *
 * @throws FormatError, DecodeError, DecompressError or EnvelopeError from the failing stage
 */
export function decodeCertificate(token: string, options: DecodeOptions = {}): DecodedCertificate {
  const { logger } = options;
  const maxDepth = options.maxDepth ?? LIMITS.maxDepth;

  const body = stripPrefix(token);
  logger?.debug({ stage: 'prefix', chars: body.length }, 'prefix stripped');

  const compressed = base45Decode(body);
  logger?.debug({ stage: 'base45', bytes: compressed.length }, 'base45 decoded');

  const raw = decompress(compressed, { maxInflatedBytes: options.maxInflatedBytes });
  logger?.debug(
    { stage: 'decompress', bytes: raw.length, inflated: raw !== compressed },
    raw === compressed ? 'payload not compressed' : 'payload inflated'
  );

  const envelope = parseCoseSign1(raw, { maxDepth });
  logger?.debug(
    {
      stage: 'envelope',
      tagged: envelope.tagged,
      algorithm: envelope.algorithm,
      payloadBytes: envelope.payload.length,
    },
    'envelope parsed'
  );

  const claims = decode(envelope.payload, { maxDepth });
  logger?.debug({ stage: 'cbor', kind: claims.kind }, 'claims decoded');

  const record = mapCertificate(claims);
  for (const issue of record.issues) {
    logger?.warn({ stage: 'schema', code: issue.code, pointer: issue.pointer }, issue.message);
  }

  return { record, envelope, claims };
}
