import { describe, it, expect } from 'vitest';

describe('index barrel exports', () => {
  it('exports all expected functions and constants', async () => {
    const module_ = await import('./index.js');

    // Errors
    expect(typeof module_.RandomError).toBe('function');
    expect(typeof module_.InvalidRangeError).toBe('function');
    expect(typeof module_.InvalidLengthError).toBe('function');
    expect(typeof module_.InvalidCharsetError).toBe('function');
    expect(typeof module_.EmptySequenceError).toBe('function');
    expect(typeof module_.EntropyUnavailableError).toBe('function');

    // Integers
    expect(typeof module_.secureInt64).toBe('function');
    expect(typeof module_.secureInt64InRange).toBe('function');
    expect(typeof module_.secureIntInRange).toBe('function');
    expect(typeof module_.acceptanceLimit).toBe('function');
    expect(typeof module_.fillRandomBytes).toBe('function');

    // Strings
    expect(typeof module_.secureString).toBe('function');
    expect(typeof module_.secureStringWithLength).toBe('function');
    expect(typeof module_.secureStringWithCharset).toBe('function');

    // Selection and permutation
    expect(typeof module_.secureIndex).toBe('function');
    expect(typeof module_.securePick).toBe('function');
    expect(typeof module_.secureShuffle).toBe('function');

    // Constants
    expect(module_.DEFAULT_LENGTH).toBe(32);
    expect(module_.DEFAULT_CHARSET).toBe(module_.ALPHANUMERIC);
    expect(module_.ALPHANUMERIC).toHaveLength(62);
    expect(module_.ALPHABETIC).toHaveLength(52);
    expect(module_.UPPERCASE).toHaveLength(26);
    expect(module_.LOWERCASE).toHaveLength(26);
    expect(module_.DIGITS).toBe('0123456789');
    expect(module_.HEX_LOWER).toBe('0123456789abcdef');
    expect(module_.INT64_MIN).toBe(-9_223_372_036_854_775_808n);
    expect(module_.INT64_MAX).toBe(9_223_372_036_854_775_807n);
  });
});
