/**
 * Encode an unsigned 64-bit value as the 8 big-endian bytes the sampler
 * reads, for queueing exact draws behind a mocked entropy source.
 */
export function uint64Bytes(value: bigint): Uint8Array {
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, value, false);
  return bytes;
}
