/**
 * Shared album URL parsing.
 */

import { Base62DecodeError, ConfigurationError } from '../exceptions';
import type { StreamIdentity } from '../models/stream';
import { base62Decode } from './base62';

export const ALBUM_URL_PREFIX = 'https://www.icloud.com/sharedalbum/#';

const TOKEN_PATTERN = /^[A-Za-z0-9]+$/;

/**
 * Decode the server partition carried in an album token.
 *
 * Tokens starting with `A` carry it in their second character, all others
 * in their second and third characters. A two-character token such as `B2`
 * decodes its single partition character.
 *
 * @throws {ConfigurationError} If the token is too short or not base62
 */
export function streamPartition(token: string): number {
  const encoded = token.startsWith('A') ? token.slice(1, 2) : token.slice(1, 3);
  if (encoded.length === 0) {
    throw new ConfigurationError(
      `The shared album token '${token}' is too short. Double-check the URL.`
    );
  }

  try {
    return base62Decode(encoded);
  } catch (error) {
    if (error instanceof Base62DecodeError) {
      throw new ConfigurationError(
        `Could not compute the album partition from '${token}': ${error.message}`
      );
    }
    throw error;
  }
}

/**
 * Derive the stream identity from a public shared album URL.
 *
 * @param albumUrl - e.g. `https://www.icloud.com/sharedalbum/#B2D...`
 * @throws {ConfigurationError} If the URL or its token is malformed
 */
export function parseStreamIdentity(albumUrl: string): StreamIdentity {
  const url = albumUrl.trim();
  if (!url.startsWith(ALBUM_URL_PREFIX)) {
    throw new ConfigurationError(
      `Please provide a full shared album URL, e.g. ${ALBUM_URL_PREFIX}B2D...`
    );
  }

  const token = url.slice(ALBUM_URL_PREFIX.length).trim();
  if (!TOKEN_PATTERN.test(token)) {
    throw new ConfigurationError(
      `The shared album token appears invalid (expected letters and digits after ${ALBUM_URL_PREFIX}). ` +
        'Double-check the URL.'
    );
  }

  const partition = streamPartition(token);
  console.debug(`Album token ${token} maps to partition ${partition}`);

  return {
    token,
    partition,
    baseUrl: `https://p${partition}-sharedstreams.icloud.com/${token}/sharedstreams`,
  };
}
