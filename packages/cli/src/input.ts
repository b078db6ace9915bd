/**
 * Token and key input
 */

import { readFile } from 'node:fs/promises';

/**
 * Built-in sample certificate, beside both `src/` and the `dist/` bundle
 */
export const SAMPLE_TOKEN_URL = new URL('../samples/sample-token.txt', import.meta.url);

export class InputError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InputError';
  }
}

async function read(source: string | URL): Promise<Buffer> {
  try {
    return await readFile(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(
      `Cannot read ${String(source)}: ${reason}`,
      err instanceof Error ? err : undefined
    );
  }
}

function token(text: string, source: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new InputError(`No payload in ${source}`);
  }
  return trimmed;
}

/**
 * Read a QR payload from a file, without surrounding whitespace
 */
export async function readTokenFile(source: string | URL): Promise<string> {
  const bytes = await read(source);
  return token(bytes.toString('utf8'), String(source));
}

/**
 * Read a QR payload from a stream such as stdin
 */
export async function readTokenStream(stream: AsyncIterable<Uint8Array | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return token(Buffer.concat(chunks).toString('utf8'), 'stdin');
}

export function readSampleToken(): Promise<string> {
  return readTokenFile(SAMPLE_TOKEN_URL);
}

/**
 * Read a verification key: PEM text, or DER bytes
 */
export async function readKeyFile(source: string): Promise<string | Uint8Array> {
  const bytes = await read(source);
  const text = bytes.toString('utf8');
  return text.includes('-----BEGIN ') ? text : new Uint8Array(bytes);
}
