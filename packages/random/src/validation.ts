import { z } from 'zod';
import { INT64_MAX, INT64_MIN } from './constants.js';
import { InvalidCharsetError, InvalidLengthError, InvalidRangeError } from './errors.js';

export const int64Schema = z.bigint().gte(INT64_MIN).lte(INT64_MAX);

export const safeIntegerSchema = z.number().int().safe();

export const lengthSchema = safeIntegerSchema.nonnegative();

export const charsetSchema = z.string().min(1);

export function assertInt64Range(min: bigint, max: bigint): void {
  if (!int64Schema.safeParse(min).success || !int64Schema.safeParse(max).success) {
    throw new InvalidRangeError(
      `Range bounds must be signed 64-bit integers, got [${String(min)}, ${String(max)}]`
    );
  }
  if (min > max) {
    throw new InvalidRangeError(`min (${String(min)}) must not exceed max (${String(max)})`);
  }
}

export function assertSafeIntegerRange(min: number, max: number): void {
  if (!safeIntegerSchema.safeParse(min).success || !safeIntegerSchema.safeParse(max).success) {
    throw new InvalidRangeError(
      `Range bounds must be safe integers, got [${String(min)}, ${String(max)}]`
    );
  }
  if (min > max) {
    throw new InvalidRangeError(`min (${String(min)}) must not exceed max (${String(max)})`);
  }
}

export function assertLength(length: number): void {
  if (!lengthSchema.safeParse(length).success) {
    throw new InvalidLengthError(`Length must be a non-negative integer, got ${String(length)}`);
  }
}

/**
 * Split a charset into code points. Duplicates are kept: each position is
 * one equally likely outcome.
 */
export function parseCharset(charset: string): string[] {
  if (!charsetSchema.safeParse(charset).success) {
    throw new InvalidCharsetError('Charset must contain at least one character');
  }
  return Array.from(charset);
}
