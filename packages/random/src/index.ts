// Errors
export {
  RandomError,
  InvalidRangeError,
  InvalidLengthError,
  InvalidCharsetError,
  EmptySequenceError,
  EntropyUnavailableError,
} from './errors.js';

// Defaults and charset presets
export {
  ALPHABETIC,
  ALPHANUMERIC,
  DEFAULT_CHARSET,
  DEFAULT_LENGTH,
  DIGITS,
  HEX_LOWER,
  INT64_MAX,
  INT64_MIN,
  LOWERCASE,
  UPPERCASE,
} from './constants.js';

// Entropy
export { fillRandomBytes } from './entropy.js';

// Integers
export { acceptanceLimit, secureInt64, secureInt64InRange, secureIntInRange } from './integer.js';

// Strings
export { secureString, secureStringWithLength, secureStringWithCharset } from './string.js';

// Selection and permutation
export { secureIndex, securePick } from './select.js';
export { secureShuffle } from './shuffle.js';
