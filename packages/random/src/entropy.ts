import { randomBytes } from '@noble/hashes/utils.js';
import { EntropyUnavailableError } from './errors.js';
import { INT64_BYTES } from './constants.js';

/**
 * Read `length` bytes from the platform CSPRNG (`crypto.getRandomValues`).
 *
 * A provider failure is rethrown as `EntropyUnavailableError`. There is no
 * retry and no fallback source.
 */
export function fillRandomBytes(length: number): Uint8Array {
  try {
    return randomBytes(length);
  } catch (error: unknown) {
    throw new EntropyUnavailableError(
      `Secure random source failed to supply ${String(length)} bytes`,
      { cause: error }
    );
  }
}

export function readInt64Bytes(): DataView {
  const bytes = fillRandomBytes(INT64_BYTES);
  if (bytes.length !== INT64_BYTES) {
    throw new EntropyUnavailableError(
      `Secure random source returned ${String(bytes.length)} bytes, expected ${String(INT64_BYTES)}`
    );
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
