/**
 * Persisted counters used to name batch files.
 *
 * get/set are a plain read-modify-write: callers incrementing from more
 * than one place must serialize those calls themselves. DirectoryStore
 * runs its increment inside the same exclusion chain as appends.
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import pino from 'pino';
import { StorageError, isMissingFileError } from '../errors';

const logger = pino({ name: 'index-store', level: process.env.LOG_LEVEL || 'info' });

export interface IndexStore {
  /** Current value for `key`, 0 when it was never set. */
  get(key: string): Promise<number>;
  set(key: string, value: number): Promise<void>;
}

export class MemoryIndexStore implements IndexStore {
  private values = new Map<string, number>();

  async get(key: string): Promise<number> {
    return this.values.get(key) ?? 0;
  }

  async set(key: string, value: number): Promise<void> {
    this.values.set(key, value);
  }
}

const IndexFileSchema = z.record(z.string(), z.number().int().nonnegative());

/**
 * JSON file of key → counter. Writes go to a temp file that is synced and
 * renamed over the target, so a crash leaves either the old or the new
 * contents.
 */
export class FileIndexStore implements IndexStore {
  readonly path: string;
  private cache: Record<string, number> | null = null;

  constructor(path: string) {
    this.path = path;
  }

  async get(key: string): Promise<number> {
    const values = await this.load();
    return values[key] ?? 0;
  }

  async set(key: string, value: number): Promise<void> {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Index value must be a non-negative integer, got ${value}`);
    }

    const values = { ...(await this.loadForUpdate()), [key]: value };
    await this.persist(values);
    this.cache = values;
  }

  private async load(): Promise<Record<string, number>> {
    if (this.cache) {
      return this.cache;
    }

    const raw = await fs.readFile(this.path, 'utf-8').catch((error: unknown) => {
      if (isMissingFileError(error)) {
        return '';
      }
      throw new StorageError('storage_unable_to_open', `Unable to read index file ${this.path}`, {
        path: this.path,
        cause: error,
      });
    });
    if (!raw.trim()) {
      this.cache = {};
      return this.cache;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError('storage_invalid', `Invalid index file at ${this.path}: not valid JSON`, {
        path: this.path,
        cause: error,
      });
    }

    const result = IndexFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError('storage_invalid', `Invalid index file at ${this.path}: ${result.error.message}`, {
        path: this.path,
      });
    }

    this.cache = result.data;
    return this.cache;
  }

  /** Current values, or none when the file is corrupt so a write replaces it. */
  private async loadForUpdate(): Promise<Record<string, number>> {
    try {
      return await this.load();
    } catch (error) {
      if (error instanceof StorageError && error.code === 'storage_invalid') {
        logger.warn({ err: error, path: this.path }, 'Overwriting corrupt index file');
        return {};
      }
      throw error;
    }
  }

  private async persist(values: Record<string, number>): Promise<void> {
    const tmpPath = join(dirname(this.path), `.${uuidv4()}.tmp`);
    try {
      await fs.mkdir(dirname(this.path), { recursive: true });
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(`${JSON.stringify(values, null, 2)}\n`, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.path);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      logger.error({ err: error, path: this.path }, 'Failed to persist index');
      throw new StorageError('storage_unable_to_write', `Unable to write index file ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }
  }
}

export function defaultIndexPath(storageLocation: string, writeKey: string): string {
  const safeKey = writeKey.replace(/[^A-Za-z0-9_-]/g, '_');
  return join(dirname(storageLocation), `${safeKey}.index.json`);
}
