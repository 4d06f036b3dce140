import { readFile } from 'node:fs/promises';
import { ReadError, describeError } from '../common/errors';

const BINARY_SNIFF_BYTES = 4096;

export function looksBinary(buffer: Buffer): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i += 1) {
    if (buffer[i] === 0) {
      return true;
    }
  }
  return false;
}

/**
 * Read a file as UTF-8 text. Binary content (a NUL byte near the start) and
 * byte sequences that are not valid UTF-8 are rejected rather than mangled.
 */
export async function readTextFile(absolutePath: string, displayPath = absolutePath): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await readFile(absolutePath);
  } catch (error) {
    throw new ReadError(displayPath, describeError(error));
  }

  if (looksBinary(buffer)) {
    throw new ReadError(displayPath, 'binary content');
  }

  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
  } catch {
    throw new ReadError(displayPath, 'invalid UTF-8');
  }
}
