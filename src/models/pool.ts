/**
 * Photo catalog and rotation pool models.
 */

/**
 * Remote catalog: photo id to the checksum of its largest derivative.
 */
export type Catalog = ReadonlyMap<string, string>;

export interface CatalogEntry {
  /** Stable identity of a remote photo */
  id: string;

  /** Checksum of the derivative to download */
  checksum: string;

  /** Selected since the last exhaustion reset */
  viewed: boolean;
}

/**
 * Rotation pool keyed by photo id.
 */
export type PersistedPool = ReadonlyMap<string, CatalogEntry>;

/**
 * Shape stored in the settings under `photos`.
 */
export type StoredPool = Record<string, { checksum: string; viewed: boolean }>;

export namespace PersistedPool {
  export function empty(): PersistedPool {
    return new Map();
  }

  /**
   * Read the pool from its stored form. Malformed entries are skipped.
   */
  export function fromSettings(value: unknown): PersistedPool {
    const pool = new Map<string, CatalogEntry>();
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return pool;
    }

    for (const [id, raw] of Object.entries(value)) {
      if (typeof raw !== 'object' || raw === null) {
        console.warn(`Ignoring malformed pool entry for ${id}`);
        continue;
      }
      const checksum: unknown = Reflect.get(raw, 'checksum');
      const viewed: unknown = Reflect.get(raw, 'viewed');
      if (typeof checksum !== 'string') {
        console.warn(`Ignoring pool entry ${id} without a checksum`);
        continue;
      }
      pool.set(id, { id, checksum, viewed: viewed === true });
    }
    return pool;
  }

  export function toSettings(pool: PersistedPool): StoredPool {
    const stored: StoredPool = {};
    for (const entry of pool.values()) {
      stored[entry.id] = { checksum: entry.checksum, viewed: entry.viewed };
    }
    return stored;
  }

  /**
   * Compare two pools entry by entry.
   */
  export function equals(a: PersistedPool, b: PersistedPool): boolean {
    if (a.size !== b.size) {
      return false;
    }
    for (const [id, entry] of a) {
      const other = b.get(id);
      if (!other || other.checksum !== entry.checksum || other.viewed !== entry.viewed) {
        return false;
      }
    }
    return true;
  }
}
