/**
 * Injectable randomness.
 */

/**
 * Returns a number in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Pick one element uniformly.
 *
 * @throws {Error} If `items` is empty
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = defaultRandom): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}
