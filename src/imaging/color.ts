/**
 * Background color parsing.
 */

import { ConfigurationError } from '../exceptions';
import type { Rgb } from '../models/image';

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

const NAMED_COLORS: Record<string, Rgb> = {
  white: WHITE,
  black: { r: 0, g: 0, b: 0 },
  red: { r: 255, g: 0, b: 0 },
  green: { r: 0, g: 128, b: 0 },
  blue: { r: 0, g: 0, b: 255 },
  yellow: { r: 255, g: 255, b: 0 },
  orange: { r: 255, g: 165, b: 0 },
  gray: { r: 128, g: 128, b: 128 },
  grey: { r: 128, g: 128, b: 128 },
};

/**
 * Parse `#rgb`, `#rrggbb`, `rgb(r, g, b)` or a basic color name.
 *
 * @throws {ConfigurationError} If the string is not a recognized color
 */
export function parseColor(value: string): Rgb {
  const text = value.trim().toLowerCase();

  const named = NAMED_COLORS[text];
  if (named) {
    return { ...named };
  }

  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(text);
  if (short) {
    const [r, g, b] = short.slice(1).map((c) => parseInt(c + c, 16));
    return { r, g, b };
  }

  const long = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/.exec(text);
  if (long) {
    const [r, g, b] = long.slice(1).map((c) => parseInt(c, 16));
    return { r, g, b };
  }

  const fn = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/.exec(text);
  if (fn) {
    const [r, g, b] = fn.slice(1).map((c) => parseInt(c, 10));
    if (r <= 255 && g <= 255 && b <= 255) {
      return { r, g, b };
    }
  }

  throw new ConfigurationError(`Unrecognized color: '${value}'`);
}

/**
 * Resolve a background color, falling back to white when the value is
 * missing or cannot be parsed.
 */
export function resolveBackground(value: unknown): Rgb {
  if (value === undefined || value === null || value === '') {
    return { ...WHITE };
  }
  if (typeof value !== 'string') {
    console.warn(`Invalid background color ${JSON.stringify(value)}, defaulting to white`);
    return { ...WHITE };
  }
  try {
    return parseColor(value);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    console.warn(`Invalid background color '${value}', defaulting to white`);
    return { ...WHITE };
  }
}
