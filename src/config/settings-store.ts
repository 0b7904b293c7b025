/**
 * Mutable key-value settings shared with the rotation engine.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { ConfigurationError } from '../exceptions';

export interface SettingsStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
}

/**
 * In-memory store, optionally seeded.
 */
export class MemorySettingsStore implements SettingsStore {
  private readonly values: Map<string, unknown>;

  constructor(initial: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Store persisted as a pretty-printed JSON file, rewritten on every set.
 */
export class JsonFileSettingsStore implements SettingsStore {
  private values: Record<string, unknown>;

  private constructor(
    readonly path: string,
    values: Record<string, unknown>
  ) {
    this.values = values;
  }

  /**
   * Open a store; a missing file starts empty.
   *
   * @throws {ConfigurationError} If the file exists but is not a JSON object
   */
  static open(path: string): JsonFileSettingsStore {
    if (!existsSync(path)) {
      return new JsonFileSettingsStore(path, {});
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Could not read settings ${path}: ${detail}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`Settings file ${path} must contain a JSON object`);
    }
    return new JsonFileSettingsStore(path, { ...parsed });
  }

  get(key: string): unknown {
    return this.values[key];
  }

  set(key: string, value: unknown): void {
    this.values = { ...this.values, [key]: value };
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(this.values, null, 2), 'utf-8');
  }
}
