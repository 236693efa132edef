import { readInt64Bytes } from './entropy.js';
import { UINT64_RANGE } from './constants.js';
import { assertInt64Range, assertSafeIntegerRange } from './validation.js';

/**
 * Exclusive upper bound on accepted unsigned 64-bit draws for a given span.
 *
 * The accepted band `[0, limit)` holds a whole number of copies of the span,
 * so `draw % span` is exactly uniform. A single draw is rejected with
 * probability `(2^64 mod span) / 2^64`, which is below `span / 2^64` and
 * never above 1/2: the expected number of draws stays under 2 and needing
 * more than `k` draws happens with probability below `2^-k`.
 */
export function acceptanceLimit(span: bigint): bigint {
  return UINT64_RANGE - (UINT64_RANGE % span);
}

/** Uniform over the full signed 64-bit range, big-endian. */
export function secureInt64(): bigint {
  return readInt64Bytes().getBigInt64(0, false);
}

/**
 * Uniform integer in the closed interval `[min, max]` by rejection sampling.
 * `min === max` returns immediately without reading entropy.
 */
export function secureInt64InRange(min: bigint, max: bigint): bigint {
  assertInt64Range(min, max);
  if (min === max) return min;

  // bigint arithmetic: the full int64 span (2^64) cannot overflow
  const span = max - min + 1n;
  const limit = acceptanceLimit(span);

  for (;;) {
    const draw = readInt64Bytes().getBigUint64(0, false);
    if (draw < limit) {
      return min + (draw % span);
    }
  }
}

export function secureIntInRange(min: number, max: number): number {
  assertSafeIntegerRange(min, max);
  return Number(secureInt64InRange(BigInt(min), BigInt(max)));
}
