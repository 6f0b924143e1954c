import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { StorageError } from '../errors';

export const LINE_DELIMITER = '\n';

/**
 * Appends newline-terminated lines to a single file and keeps an exact
 * count of the bytes it holds.
 */
export class LineStreamWriter {
  readonly path: string;
  private handle: FileHandle | null;
  private written: number;

  private constructor(path: string, handle: FileHandle, size: number) {
    this.path = path;
    this.handle = handle;
    this.written = size;
  }

  /**
   * Open (creating if needed) and position at the file's real size, as
   * reported by the filesystem.
   */
  static async open(path: string): Promise<LineStreamWriter> {
    let handle: FileHandle;
    try {
      handle = await fs.open(path, 'a+');
    } catch (error) {
      throw new StorageError('storage_unable_to_open', `Unable to open ${path} for writing`, {
        path,
        cause: error,
      });
    }

    try {
      const { size } = await handle.stat();
      return new LineStreamWriter(path, handle, size);
    } catch (error) {
      await handle.close().catch(() => undefined);
      throw new StorageError('storage_unable_to_open', `Unable to stat ${path}`, { path, cause: error });
    }
  }

  get bytesWritten(): number {
    return this.written;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  async writeLine(text: string): Promise<void> {
    const handle = this.requireHandle();
    const data = Buffer.from(text + LINE_DELIMITER, 'utf8');
    try {
      const { bytesWritten } = await handle.write(data, 0, data.length);
      this.written += bytesWritten;
      if (bytesWritten !== data.length) {
        throw new Error(`Short write: ${bytesWritten} of ${data.length} bytes`);
      }
    } catch (error) {
      throw new StorageError('storage_unable_to_write', `Unable to write to ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }
  }

  async truncate(size: number): Promise<void> {
    const handle = this.requireHandle();
    try {
      await handle.truncate(size);
      this.written = size;
    } catch (error) {
      throw new StorageError('storage_unable_to_write', `Unable to truncate ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }
  }

  // Drops anything past the logical end (sparse tails left by earlier seeks).
  async truncateToCurrentSize(): Promise<void> {
    await this.truncate(this.written);
  }

  async synchronize(): Promise<void> {
    const handle = this.requireHandle();
    try {
      await handle.sync();
    } catch (error) {
      throw new StorageError('storage_unable_to_write', `Unable to sync ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;

    try {
      await handle.sync().finally(() => handle.close());
    } catch (error) {
      throw new StorageError('storage_unable_to_close', `Unable to close ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new StorageError('storage_unable_to_write', `Writer for ${this.path} is closed`, {
        path: this.path,
      });
    }
    return this.handle;
  }
}
