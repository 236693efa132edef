export const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
export const DIGITS = '0123456789';
export const ALPHABETIC = UPPERCASE + LOWERCASE;
export const ALPHANUMERIC = ALPHABETIC + DIGITS;
export const HEX_LOWER = '0123456789abcdef';

/** Length of strings produced by `secureString()` */
export const DEFAULT_LENGTH = 32;

/** Charset used when the caller does not supply one (62 characters) */
export const DEFAULT_CHARSET = ALPHANUMERIC;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/** Size of the sampler's native output space: one unsigned 64-bit draw */
export const UINT64_RANGE = 2n ** 64n;

/** Bytes read from the entropy source per integer draw */
export const INT64_BYTES = 8;
