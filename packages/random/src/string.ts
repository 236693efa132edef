import { DEFAULT_CHARSET, DEFAULT_LENGTH } from './constants.js';
import { secureIndex } from './select.js';
import { assertLength, parseCharset } from './validation.js';

export function secureString(): string {
  return secureStringWithLength(DEFAULT_LENGTH);
}

export function secureStringWithLength(length: number): string {
  return secureStringWithCharset(length, DEFAULT_CHARSET);
}

/**
 * Random string of `length` code points, each drawn independently from
 * `charset`. The charset is validated before the length, so an empty
 * charset is rejected even for a zero-length request.
 */
export function secureStringWithCharset(length: number, charset: string): string {
  const characters = parseCharset(charset);
  assertLength(length);

  let result = '';
  for (let position = 0; position < length; position++) {
    result += characters[secureIndex(characters.length)] as string;
  }
  return result;
}
