import { secureIntInRange } from './integer.js';
import { EmptySequenceError, InvalidLengthError } from './errors.js';
import { safeIntegerSchema } from './validation.js';

/**
 * Uniform index in `[0, length)`.
 */
export function secureIndex(length: number): number {
  if (length === 0) {
    throw new EmptySequenceError('Cannot pick an index from an empty sequence');
  }
  if (!safeIntegerSchema.positive().safeParse(length).success) {
    throw new InvalidLengthError(`Length must be a positive integer, got ${String(length)}`);
  }
  return secureIntInRange(0, length - 1);
}

/**
 * Pick one element uniformly at random. The input is not modified.
 */
export function securePick<T>(sequence: readonly T[]): T {
  if (sequence.length === 0) {
    throw new EmptySequenceError('Cannot pick an element from an empty sequence');
  }
  return sequence[secureIndex(sequence.length)] as T;
}
