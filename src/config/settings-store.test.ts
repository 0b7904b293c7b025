import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../exceptions';
import { tempDir } from '../testing/fixtures';
import { JsonFileSettingsStore, MemorySettingsStore } from './settings-store';

describe('MemorySettingsStore', () => {
  it('reads seeded values and records writes', () => {
    const store = new MemorySettingsStore({ album_url: 'x' });
    store.set('photos', {});
    expect(store.toJSON()).toEqual({ album_url: 'x', photos: {} });
  });
});

describe('JsonFileSettingsStore', () => {
  it('starts empty when the file is missing and persists writes', () => {
    const path = join(tempDir(), 'nested', 'settings.json');
    const store = JsonFileSettingsStore.open(path);
    expect(store.get('photos')).toBeUndefined();

    store.set('photos', { A: { checksum: 'a', viewed: true } });

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
      photos: { A: { checksum: 'a', viewed: true } },
    });
    expect(JsonFileSettingsStore.open(path).get('photos')).toEqual({
      A: { checksum: 'a', viewed: true },
    });
  });

  it('keeps existing keys when writing', () => {
    const path = join(tempDir(), 'settings.json');
    writeFileSync(path, JSON.stringify({ album_url: 'https://example.com' }));

    JsonFileSettingsStore.open(path).set('photos', {});

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
      album_url: 'https://example.com',
      photos: {},
    });
  });

  it('rejects files that are not JSON objects', () => {
    const path = join(tempDir(), 'settings.json');
    writeFileSync(path, '[1, 2]');
    expect(() => JsonFileSettingsStore.open(path)).toThrow(ConfigurationError);
  });
});
