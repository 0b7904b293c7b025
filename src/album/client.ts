/**
 * Client for the public shared-album stream API.
 */

import { DataError } from '../exceptions';
import type { Catalog } from '../models/pool';
import type { StreamIdentity } from '../models/stream';
import { defaultRandom, pickRandom, type RandomSource } from '../rotation/random';
import { HttpTransport } from './http';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Checksum of the widest derivative of one photo, or null if it has none.
 */
export function largestDerivativeChecksum(derivatives: unknown): string | null {
  if (!isObject(derivatives)) {
    return null;
  }

  let best: { width: number; checksum: string } | null = null;
  for (const derivative of Object.values(derivatives)) {
    if (!isObject(derivative) || !isString(derivative.checksum)) {
      continue;
    }
    const width = Number(derivative.width);
    if (!Number.isFinite(width)) {
      continue;
    }
    if (!best || width > best.width) {
      best = { width, checksum: derivative.checksum };
    }
  }
  return best?.checksum ?? null;
}

export interface AlbumStreamClientOptions {
  transport?: HttpTransport;

  /** Picks among equivalent mirror hosts */
  random?: RandomSource;
}

/**
 * Fetches a shared album's catalog and resolves download URLs.
 *
 * @example
 * ```typescript
 * const client = new AlbumStreamClient();
 * const identity = parseStreamIdentity(albumUrl);
 * const catalog = await client.fetchCatalog(identity);
 * const [id, checksum] = catalog.entries().next().value;
 * const url = await client.resolveUrl(identity, id, checksum);
 * ```
 */
export class AlbumStreamClient {
  private readonly transport: HttpTransport;
  private readonly random: RandomSource;

  constructor(options: AlbumStreamClientOptions = {}) {
    this.transport = options.transport ?? new HttpTransport();
    this.random = options.random ?? defaultRandom;
  }

  /**
   * Fetch the album's photo ids with the checksum of each one's largest
   * derivative.
   *
   * @throws {DataError} If the album has no photos or none has a derivative
   * @throws {TransportError} On network failure
   */
  async fetchCatalog(identity: StreamIdentity): Promise<Catalog> {
    const data = await this.transport.postJson(`${identity.baseUrl}/webstream`, {
      streamCtag: null,
    });

    const photos = isObject(data) && Array.isArray(data.photos) ? data.photos : [];
    console.debug(`Stream returned ${photos.length} photo entries`);
    if (photos.length === 0) {
      throw new DataError('No photos found in the shared album.');
    }

    const catalog = new Map<string, string>();
    for (const photo of photos) {
      if (!isObject(photo) || !isString(photo.photoGuid)) {
        continue;
      }
      const checksum = largestDerivativeChecksum(photo.derivatives);
      if (checksum) {
        catalog.set(photo.photoGuid, checksum);
      }
    }

    if (catalog.size === 0) {
      throw new DataError('No derivatives found for any photo in the shared album.');
    }
    return catalog;
  }

  /**
   * Resolve a download URL for one photo.
   *
   * @param identity - Album identity
   * @param id - Photo id from the catalog
   * @param checksum - Derivative checksum from the catalog
   * @throws {DataError} If the response has no asset for the checksum
   * @throws {TransportError} On network failure
   */
  async resolveUrl(identity: StreamIdentity, id: string, checksum: string): Promise<string> {
    console.debug(`Resolving download URL for ${id}`);
    const data = await this.transport.postJson(`${identity.baseUrl}/webasseturls`, {
      photoGuids: [id],
    });

    const items = isObject(data) && isObject(data.items) ? data.items : {};
    const item = items[checksum];
    if (!isObject(item) || !isString(item.url_location) || !isString(item.url_path)) {
      throw new DataError(`Could not find an asset matching checksum ${checksum} for photo ${id}.`);
    }

    const locations = isObject(data) && isObject(data.locations) ? data.locations : {};
    const location = locations[item.url_location];
    const scheme = isObject(location) && isString(location.scheme) ? location.scheme : 'https';
    const offered =
      isObject(location) && Array.isArray(location.hosts) ? location.hosts.filter(isString) : [];
    const hosts = offered.length > 0 ? offered : [item.url_location];

    const host = pickRandom(hosts, this.random);
    console.debug(`Resolved download host ${host} for location ${item.url_location}`);
    return `${scheme}://${host}${item.url_path}`;
  }
}
