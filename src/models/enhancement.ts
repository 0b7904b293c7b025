/**
 * Image enhancement settings.
 */

/**
 * Multipliers relative to the current image. 1.0 leaves the image unchanged.
 */
export interface EnhancementSettings {
  brightness?: number;
  contrast?: number;
  saturation?: number;
  sharpness?: number;
}

export namespace EnhancementSettings {
  export const KEYS = ['brightness', 'contrast', 'saturation', 'sharpness'] as const;

  /**
   * Read enhancement settings from a settings value.
   *
   * Numeric strings are accepted; anything else non-numeric is ignored.
   */
  export function fromSettings(value: unknown): EnhancementSettings {
    if (typeof value !== 'object' || value === null) {
      return {};
    }

    const settings: EnhancementSettings = {};
    for (const key of KEYS) {
      const raw: unknown = Reflect.get(value, key);
      const parsed = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
      if (typeof parsed === 'number' && !Number.isNaN(parsed)) {
        settings[key] = parsed;
      }
    }
    return settings;
  }
}
