import { secureIntInRange } from './integer.js';

/**
 * Fisher-Yates shuffle in place. Every one of the `n!` orderings is equally
 * likely.
 *
 * Only swaps are performed, so if a draw throws the array is still a
 * permutation of its input, in no particular order.
 */
export function secureShuffle<T>(sequence: T[]): void {
  for (let index = sequence.length - 1; index > 0; index--) {
    const swapIndex = secureIntInRange(0, index);
    const current = sequence[index] as T;
    sequence[index] = sequence[swapIndex] as T;
    sequence[swapIndex] = current;
  }
}
