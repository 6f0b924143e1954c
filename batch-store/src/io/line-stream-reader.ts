import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { StorageError } from '../errors';

const DELIMITER_BYTE = 0x0a;

/**
 * Reads a file one `\n`-delimited line at a time. Memory stays at roughly
 * bufferSize plus the longest line, whatever the size of the file.
 */
export class LineStreamReader {
  readonly path: string;
  readonly bufferSize: number;
  private handle: FileHandle | null;
  private buffer: Buffer = Buffer.alloc(0);
  private position = 0;
  private eof = false;

  private constructor(path: string, handle: FileHandle, bufferSize: number) {
    this.path = path;
    this.handle = handle;
    this.bufferSize = bufferSize;
  }

  static async open(path: string, bufferSize = 4096): Promise<LineStreamReader> {
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new RangeError(`bufferSize must be a positive integer, got ${bufferSize}`);
    }

    try {
      // Create the file if it does not exist yet, then open read-only.
      await (await fs.open(path, 'a')).close();
      const handle = await fs.open(path, 'r');
      return new LineStreamReader(path, handle, bufferSize);
    } catch (error) {
      throw new StorageError('storage_unable_to_open', `Unable to open ${path} for reading`, {
        path,
        cause: error,
      });
    }
  }

  /**
   * Next line without its delimiter, or null once the file is exhausted.
   * A final line without a trailing delimiter is still returned.
   */
  async readLine(): Promise<string | null> {
    if (this.eof) {
      return null;
    }

    for (;;) {
      const index = this.buffer.indexOf(DELIMITER_BYTE);
      if (index !== -1) {
        const line = this.buffer.subarray(0, index).toString('utf8');
        this.buffer = this.buffer.subarray(index + 1);
        return line;
      }

      const chunk = await this.readChunk();
      if (chunk.length === 0) {
        this.eof = true;
        if (this.buffer.length === 0) {
          return null;
        }
        const rest = this.buffer.toString('utf8');
        this.buffer = Buffer.alloc(0);
        return rest;
      }
      this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    }
  }

  reset(): void {
    this.position = 0;
    this.buffer = Buffer.alloc(0);
    this.eof = false;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<string> {
    for (let line = await this.readLine(); line !== null; line = await this.readLine()) {
      yield line;
    }
  }

  private async readChunk(): Promise<Buffer> {
    if (!this.handle) {
      throw new StorageError('storage_unable_to_open', `Reader for ${this.path} is closed`, { path: this.path });
    }

    const chunk = Buffer.alloc(this.bufferSize);
    const { bytesRead } = await this.handle.read(chunk, 0, this.bufferSize, this.position);
    this.position += bytesRead;
    return chunk.subarray(0, bytesRead);
  }
}
