/**
 * Photo rotation: every photo in the album is shown once before any repeats.
 */

import { ConfigurationError, DataError } from '../exceptions';
import type { SettingsStore } from '../config/settings-store';
import { PersistedPool, type Catalog, type CatalogEntry } from '../models/pool';
import { AlbumStreamClient } from '../album/client';
import { parseStreamIdentity } from '../album/stream-identity';
import { defaultRandom, pickRandom, type RandomSource } from './random';

export interface SyncResult {
  pool: PersistedPool;
  changed: boolean;
  added: number;
  updated: number;
  removed: number;
}

export interface Selection {
  id: string;

  /** Pool after any exhaustion reset, before the choice is marked viewed */
  pool: PersistedPool;

  /** Every flag was cleared to make the pool eligible again */
  reset: boolean;

  /** Number of eligible photos the choice was drawn from */
  eligible: number;
}

export interface CycleResult {
  id: string;
  checksum: string;
  url: string;

  /** Unviewed photos left after this selection */
  remaining: number;

  /** Photos in the pool */
  total: number;
}

/**
 * Replace the pool with the catalog's ids, keeping each surviving id's
 * viewed flag. Ids missing from the catalog are dropped.
 */
export function syncPool(previous: PersistedPool, catalog: Catalog): SyncResult {
  const pool = new Map<string, CatalogEntry>();
  let added = 0;
  let updated = 0;

  for (const [id, checksum] of catalog) {
    const prior = previous.get(id);
    if (!prior) {
      added++;
    } else if (prior.checksum !== checksum) {
      updated++;
    }
    pool.set(id, { id, checksum, viewed: prior?.viewed ?? false });
  }

  let removed = 0;
  for (const id of previous.keys()) {
    if (!pool.has(id)) {
      removed++;
    }
  }

  return { pool, changed: !PersistedPool.equals(previous, pool), added, updated, removed };
}

/**
 * Choose an unviewed photo uniformly at random, clearing every flag first
 * if all photos have been viewed.
 *
 * @throws {DataError} If the pool is empty
 */
export function selectPhoto(pool: PersistedPool, random: RandomSource = defaultRandom): Selection {
  let current = pool;
  let unseen = [...current.values()].filter((entry) => !entry.viewed).map((entry) => entry.id);
  let reset = false;

  if (unseen.length === 0 && current.size > 0) {
    console.log('All photos viewed; resetting viewed flags.');
    current = new Map(
      [...current].map(([id, entry]): [string, CatalogEntry] => [id, { ...entry, viewed: false }])
    );
    unseen = [...current.keys()];
    reset = true;
  }

  if (unseen.length === 0) {
    throw new DataError('No photos available after refresh. Please check the album or network.');
  }

  return { id: pickRandom(unseen, random), pool: current, reset, eligible: unseen.length };
}

/**
 * Copy of the pool with one entry marked viewed.
 */
export function markViewed(pool: PersistedPool, id: string): PersistedPool {
  const entry = pool.get(id);
  if (!entry) {
    throw new DataError(`Photo ${id} is not in the pool`);
  }
  const next = new Map(pool);
  next.set(id, { ...entry, viewed: true });
  return next;
}

export interface RotationEngineOptions {
  client?: AlbumStreamClient;
  random?: RandomSource;
}

/**
 * Drives one rotation cycle per display refresh.
 *
 * Reads `album_url` and `photos` from the settings store and writes `photos`
 * back at most once, after the chosen photo's URL has been resolved. A
 * failure at any earlier step leaves the store untouched. Callers must not
 * run two cycles against the same store at once.
 */
export class RotationEngine {
  private readonly client: AlbumStreamClient;
  private readonly random: RandomSource;

  constructor(options: RotationEngineOptions = {}) {
    this.client = options.client ?? new AlbumStreamClient();
    this.random = options.random ?? defaultRandom;
  }

  /**
   * Sync the pool with the album, pick the next photo and resolve its URL.
   *
   * @throws {ConfigurationError} If `album_url` is missing or malformed
   * @throws {DataError} If the album has nothing to show
   * @throws {TransportError} On network failure
   */
  async runCycle(store: SettingsStore): Promise<CycleResult> {
    const albumUrl = store.get('album_url');
    if (typeof albumUrl !== 'string' || albumUrl.trim() === '') {
      throw new ConfigurationError(
        'Missing album URL. Please set the shared album URL in the settings.'
      );
    }

    const identity = parseStreamIdentity(albumUrl);
    const catalog = await this.client.fetchCatalog(identity);

    const previous = PersistedPool.fromSettings(store.get('photos'));
    const synced = syncPool(previous, catalog);
    if (synced.changed) {
      console.log(
        `Merged photos: ${synced.added} added, ${synced.updated} updated, ` +
          `${synced.removed} removed (total now ${synced.pool.size})`
      );
    }

    const selection = selectPhoto(synced.pool, this.random);
    const entry = selection.pool.get(selection.id);
    if (!entry) {
      throw new DataError(`Selected photo ${selection.id} vanished from the pool`);
    }
    console.log(
      `Selected ${entry.id} (unseen remaining: ${selection.eligible}, ` +
        `total photos online: ${catalog.size})`
    );

    const url = await this.client.resolveUrl(identity, entry.id, entry.checksum);

    const next = markViewed(selection.pool, entry.id);
    store.set('photos', PersistedPool.toSettings(next));
    console.debug(`Persisted state with ${next.size} total photos`);

    return {
      id: entry.id,
      checksum: entry.checksum,
      url,
      remaining: selection.eligible - 1,
      total: next.size,
    };
  }
}
