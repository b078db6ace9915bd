import { FormatError, PREFIX } from '@dccscan/kernel';

/**
 * Remove the `HC1:` scheme marker from a QR payload
 *
 * Case sensitive. Whitespace is the caller's business: a token with
 * leading blanks has no prefix.
 *
 * @throws FormatError E_UNSUPPORTED_VERSION for a well-formed marker of another version,
 *   E_MISSING_PREFIX otherwise
 */
export function stripPrefix(token: string): string {
  if (token.startsWith(PREFIX.current)) {
    return token.slice(PREFIX.length);
  }
  const marker = token.slice(0, PREFIX.length);
  if (PREFIX.pattern.test(marker)) {
    throw new FormatError(
      'E_UNSUPPORTED_VERSION',
      `Unsupported payload scheme ${marker}, expected ${PREFIX.current}`,
      { prefix: marker }
    );
  }
  throw new FormatError('E_MISSING_PREFIX', `Payload does not start with ${PREFIX.current}`);
}
