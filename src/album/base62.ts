/**
 * Base-62 decoding (alphabet 0-9, A-Z, a-z).
 */

import { Base62DecodeError } from '../exceptions';

export const BASE62_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

/**
 * Decode a base-62 string to an integer, most significant digit first.
 *
 * @throws {Base62DecodeError} For an empty string or a character outside the alphabet
 */
export function base62Decode(text: string): number {
  if (text.length === 0) {
    throw new Base62DecodeError('Cannot decode an empty base62 string');
  }

  let value = 0;
  for (const char of text) {
    const digit = BASE62_ALPHABET.indexOf(char);
    if (digit === -1) {
      throw new Base62DecodeError(`Invalid base62 character: '${char}' in '${text}'`);
    }
    value = value * 62 + digit;
  }
  return value;
}
