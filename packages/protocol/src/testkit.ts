/**
 * Certificate issuance for TEST FIXTURES ONLY
 *
 * Builds `HC1:` tokens the way an issuer would: CBOR claims, COSE_Sign1,
 * zlib, Base45. Not exported from the main entry point.
 *
 * Import path: @dccscan/protocol/testkit
 */

import { CWT_CLAIMS, HCERT_DCC_V1, PREFIX } from '@dccscan/kernel';
import { encode, fromJS, int, map, text, type JsValue, type TypedValue } from '@dccscan/cbor';
import { base45Encode, compress } from '@dccscan/crypto';
import { signCoseSign1, type TestSigningKey } from '@dccscan/crypto/testkit';

export interface ClaimsInput {
  /** Issuing country (claim 1) */
  issuer?: string;
  /** Epoch seconds (claim 6) */
  issuedAt?: number;
  /** Epoch seconds (claim 4) */
  expiresAt?: number;
  /** HCERT v1 content, as plain data */
  hcert: JsValue;
}

/**
 * CWT claims map with the HCERT under -260 → 1
 */
export function buildClaims(input: ClaimsInput): TypedValue {
  const entries: Array<[TypedValue, TypedValue]> = [];
  if (input.expiresAt !== undefined) {
    entries.push([int(CWT_CLAIMS.expiresAt), int(input.expiresAt)]);
  }
  if (input.issuedAt !== undefined) {
    entries.push([int(CWT_CLAIMS.issuedAt), int(input.issuedAt)]);
  }
  if (input.issuer !== undefined) {
    entries.push([int(CWT_CLAIMS.issuer), text(input.issuer)]);
  }
  entries.push([int(CWT_CLAIMS.hcert), map([[int(HCERT_DCC_V1), fromJS(input.hcert)]])]);
  return map(entries);
}

export interface IssueOptions {
  key: TestSigningKey;
  /** Key identifier for the protected header */
  kid?: Uint8Array;
  /** Deflate the envelope (default true) */
  compress?: boolean;
  /** Wrap the envelope in tag 18 (default true) */
  tagged?: boolean;
}

/**
 * Sign and encode claims into an `HC1:` token
 */
export async function issueCertificate(claims: TypedValue, options: IssueOptions): Promise<string> {
  const envelope = await signCoseSign1(encode(claims), options.key, {
    kid: options.kid,
    tagged: options.tagged,
  });
  const body = options.compress === false ? envelope : compress(envelope);
  return PREFIX.current + base45Encode(body);
}

/**
 * HCERT content of a one-dose-of-two vaccination, for fixtures
 *
 * `overrides` replace top-level keys, `omit` drops them.
 */
export function vaccinationHcert(
  overrides: { [key: string]: JsValue } = {},
  omit: readonly string[] = []
): JsValue {
  const hcert: { [key: string]: JsValue } = {
    ver: '1.3.0',
    nam: { fn: 'Testperson', fnt: 'TESTPERSON', gn: 'Alex', gnt: 'ALEX' },
    dob: '1990-01-31',
    v: [
      {
        tg: '840539006',
        vp: '1119349007',
        mp: 'EU/1/20/1528',
        ma: 'ORG-100030215',
        dn: 1,
        sd: 2,
        dt: '2021-06-01',
        co: 'XX',
        is: 'Test Issuer',
        ci: 'URN:UVCI:01:XX:TESTCERTIFICATE0001#0',
      },
    ],
    ...overrides,
  };
  for (const key of omit) {
    delete hcert[key];
  }
  return hcert;
}
