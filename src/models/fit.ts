/**
 * Fit configuration model.
 */

import { FitPreserve, FitStrategy } from './enums';

export interface FitConfig {
  strategy: FitStrategy;
  preserve: FitPreserve;
}

export namespace FitConfig {
  export const DEFAULT: FitConfig = {
    strategy: FitStrategy.DEFAULT,
    preserve: FitPreserve.NONE,
  };

  function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  function parseStrategy(value: unknown): FitStrategy {
    const normalized = String(value).toLowerCase();
    const match = Object.values(FitStrategy).find((s) => s === normalized);
    return match ?? FitStrategy.DEFAULT;
  }

  function parsePreserve(value: unknown): FitPreserve {
    const normalized = String(value).toLowerCase();
    const match = Object.values(FitPreserve).find((p) => p === normalized);
    return match ?? FitPreserve.NONE;
  }

  /**
   * Build a FitConfig from loosely-typed settings.
   *
   * Accepts `{ strategy, preserve }` or the same keys nested under `fit`.
   * Values are lower-cased; unknown strategies fall back to cover and
   * unknown preserve values to none.
   */
  export function fromSettings(value: unknown): FitConfig {
    if (value === undefined || value === null || value === '') {
      return { ...DEFAULT };
    }
    if (!isRecord(value)) {
      console.warn(`Unsupported photo fit format ${JSON.stringify(value)}; expected an object`);
      return { ...DEFAULT };
    }

    const candidate = isRecord(value.fit) ? value.fit : value;
    return {
      strategy: 'strategy' in candidate ? parseStrategy(candidate.strategy) : FitStrategy.DEFAULT,
      preserve: 'preserve' in candidate ? parsePreserve(candidate.preserve) : FitPreserve.NONE,
    };
  }
}
