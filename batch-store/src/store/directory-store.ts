/**
 * Directory-backed batch queue
 *
 * Events are appended to one active file shaped as the prefix of
 *
 *   { "batch": [
 *   <event>
 *   ,<event>
 *   ],"sentAt":"<iso>","writeKey":"<key>"}
 *
 * Sealing writes the footer, syncs, and renames `<index>-<base>` to
 * `<index>-<base>.temp`, which marks it ready for delivery. The index lives
 * in an IndexStore so names keep increasing across restarts.
 */

import { promises as fs } from 'fs';
import { basename, extname, join } from 'path';
import pino from 'pino';
import { StoreConfiguration } from '../config';
import { ErrorReporter, StorageError, errorMessage, isMissingFileError, noopErrorReporter } from '../errors';
import { FileIndexStore, IndexStore, defaultIndexPath } from '../index-store/index-store';
import { LineStreamWriter } from '../io/line-stream-writer';

const logger = pino({ name: 'directory-store', level: process.env.LOG_LEVEL || 'info' });

export const BATCH_HEADER = '{ "batch": [';
export const SEALED_EXTENSION = 'temp';

const TAIL_WINDOW = 256;
const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d]);
const OPEN_BRACKET = 0x5b;
const NEWLINE = 0x0a;

/** Called with the final path of every sealed file, before it is marked ready. */
export interface BatchFileValidator {
  validate(path: string): void | Promise<void>;
}

export const noopFileValidator: BatchFileValidator = {
  validate: () => {},
};

export interface DirectoryStoreOptions {
  indexStore?: IndexStore;
  errorReporter?: ErrorReporter;
  fileValidator?: BatchFileValidator;
  now?: () => Date;
}

export interface DataResult {
  dataFiles: string[];
  removable: string[];
}

export interface ListFilesOptions {
  /** true: sealed files only. false: every file in the directory. */
  onlyReady: boolean;
}

export class DirectoryStore {
  readonly config: StoreConfiguration;
  readonly transactionType = 'file' as const;

  private readonly indexStore: IndexStore;
  private readonly errorReporter: ErrorReporter;
  private readonly fileValidator: BatchFileValidator;
  private readonly now: () => Date;

  private writer: LineStreamWriter | null = null;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(config: StoreConfiguration, options: DirectoryStoreOptions = {}) {
    this.config = config;
    this.indexStore =
      options.indexStore ?? new FileIndexStore(defaultIndexPath(config.storageLocation, config.writeKey));
    this.errorReporter = options.errorReporter ?? noopErrorReporter;
    this.fileValidator = options.fileValidator ?? noopFileValidator;
    this.now = options.now ?? (() => new Date());
  }

  static async create(config: StoreConfiguration, options: DirectoryStoreOptions = {}): Promise<DirectoryStore> {
    const store = new DirectoryStore(config, options);
    await store.initialize();
    return store;
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.config.storageLocation, { recursive: true });
    } catch (error) {
      throw new StorageError('storage_unable_to_create', `Unable to create ${this.config.storageLocation}`, {
        path: this.config.storageLocation,
        cause: error,
      });
    }

    logger.info({ storageLocation: this.config.storageLocation, maxFileSize: this.config.maxFileSize }, 'Batch store initialized');
  }

  /** Path of the file currently receiving events, if any. */
  get activeFile(): string | null {
    return this.writer?.path ?? null;
  }

  /**
   * Queue one serialized event. Never rejects: I/O failures drop the event
   * and go to the error reporter.
   */
  append(event: string): Promise<void> {
    return this.exclusive(async () => {
      try {
        await this.appendUnlocked(event);
      } catch (error) {
        this.report(error, 'storage_unable_to_write', 'Failed to append event');
      }
    });
  }

  /**
   * Seal the active file if it holds events, then return sealed files in
   * index order, limited by total size (strictly below maxBytes) and count.
   */
  fetch(count?: number, maxBytes?: number): Promise<DataResult | null> {
    return this.exclusive(async () => {
      await this.sealPendingFile();

      let files = await this.listFiles({ onlyReady: true });
      if (maxBytes !== undefined) {
        files = await this.upToSize(maxBytes, files);
      }
      if (count !== undefined && count <= files.length) {
        files = files.slice(0, Math.max(0, count));
      }

      if (files.length === 0) {
        return null;
      }
      return { dataFiles: files, removable: [...files] };
    });
  }

  /** Delete the given files. Files that are already gone are skipped. */
  remove(files: readonly string[]): Promise<void> {
    return this.exclusive(() => this.removeUnlocked(files));
  }

  /** Drop every file in the directory, including the unsealed one. */
  reset(): Promise<void> {
    return this.exclusive(async () => {
      await this.closeWriter();
      const files = await this.listFiles({ onlyReady: false });
      await this.removeUnlocked(files);
      logger.info({ removed: files.length }, 'Batch store reset');
    });
  }

  /** Release the active file without sealing it. A later store reopens it. */
  close(): Promise<void> {
    return this.exclusive(() => this.closeWriter());
  }

  async count(): Promise<number> {
    return (await this.listFiles({ onlyReady: false })).length;
  }

  async hasData(): Promise<boolean> {
    return (await this.count()) > 0;
  }

  async listFiles(options: ListFilesOptions = { onlyReady: true }): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.config.storageLocation, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .filter((name) => !options.onlyReady || extname(name) === `.${SEALED_EXTENSION}`)
        .sort(compareBatchNames)
        .map((name) => join(this.config.storageLocation, name));
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.report(error, 'storage_unable_to_open', 'Failed to list batch directory');
      }
      return [];
    }
  }

  // --- append path

  private async appendUnlocked(event: string): Promise<void> {
    const writer = await this.startFileIfNeeded();
    const needsComma = await this.needsCommaBeforeNextItem(writer);
    const line = (needsComma ? ',' : '') + toSingleLine(event);

    // A file that already holds events is sealed before it would pass the
    // cap. An empty file takes the event whatever its size.
    if (needsComma && writer.bytesWritten + Buffer.byteLength(line, 'utf8') + 1 > this.config.maxFileSize) {
      if (!(await this.sealActiveFile())) {
        throw new StorageError('storage_unable_to_write', `Unable to rotate ${writer.path}`, { path: writer.path });
      }
      return this.appendUnlocked(event);
    }

    await writer.writeLine(line);
  }

  private async startFileIfNeeded(): Promise<LineStreamWriter> {
    if (this.writer) {
      return this.writer;
    }

    const index = await this.allocateIndex();
    const path = this.activePath(index);
    const writer = await LineStreamWriter.open(path);

    try {
      if (writer.bytesWritten === 0) {
        await this.writeHeader(writer);
      } else if (!(await this.fileBeginsWithBatchHeader(writer))) {
        logger.warn({ path, size: writer.bytesWritten }, 'Batch file has no valid header, discarding its contents');
        this.errorReporter.reportInternalError(
          new StorageError('storage_invalid', `Batch file ${path} has no valid header`, { path }),
        );
        await this.writeHeader(writer);
      } else if (await this.fileEndsWithFooter(writer)) {
        // Footer was written but the rename never happened.
        logger.info({ path }, 'Completing interrupted seal');
        await writer.close();
        await this.validateSealed(path);
        await this.markReady(path);
        await this.indexStore.set(this.config.indexKey, index + 1);
        return this.startFileIfNeeded();
      } else {
        await this.dropPartialLine(writer);
      }
    } catch (error) {
      await writer.close().catch((closeError: unknown) => {
        logger.warn({ err: closeError, path }, 'Failed to close batch file after open error');
      });
      throw error;
    }

    this.writer = writer;
    return writer;
  }

  private async writeHeader(writer: LineStreamWriter): Promise<void> {
    await writer.truncate(0);
    await writer.writeLine(BATCH_HEADER);
  }

  /**
   * Current index, skipped past any index that already has a sealed file
   * (a crash between rename and increment leaves one behind).
   */
  private async allocateIndex(): Promise<number> {
    const stored = await this.readIndex();
    let index = stored;
    while (await pathExists(this.readyPath(this.activePath(index)))) {
      index++;
    }
    if (index !== stored) {
      logger.warn({ stored, index }, 'Index was behind sealed files, advancing');
      await this.indexStore.set(this.config.indexKey, index);
    }
    return index;
  }

  /**
   * Stored index, or, when the index store cannot be read, the highest
   * index found in the directory. The rebuilt value is written back.
   */
  private async readIndex(): Promise<number> {
    try {
      return await this.indexStore.get(this.config.indexKey);
    } catch (error) {
      this.report(error, 'storage_invalid', 'Failed to read batch index, rebuilding it from the directory');
    }

    const indexes = (await this.listFiles({ onlyReady: false }))
      .map((file) => parseInt(basename(file), 10))
      .filter((index) => !Number.isNaN(index));
    const index = indexes.length > 0 ? Math.max(...indexes) : 0;
    await this.indexStore.set(this.config.indexKey, index);
    logger.warn({ index }, 'Batch index rebuilt');
    return index;
  }

  private async fileBeginsWithBatchHeader(writer: LineStreamWriter): Promise<boolean> {
    const want = Buffer.byteLength(BATCH_HEADER, 'utf8');
    const head = await readRange(writer.path, 0, want);
    return head.toString('utf8') === BATCH_HEADER;
  }

  private async fileEndsWithFooter(writer: LineStreamWriter): Promise<boolean> {
    const tail = await this.readTail(writer);
    const footer = new RegExp(`\\],"sentAt":"[^"]*","writeKey":${escapeRegExp(JSON.stringify(this.config.writeKey))}\\}\\s*$`);
    return footer.test(tail.toString('utf8'));
  }

  /**
   * Every complete write ends in a newline. Anything after the last one is
   * an event cut short by a crash and is cut off.
   */
  private async dropPartialLine(writer: LineStreamWriter): Promise<void> {
    let end = writer.bytesWritten;
    if (end === 0) {
      return;
    }

    while (end > 0) {
      const start = Math.max(0, end - TAIL_WINDOW);
      const chunk = await readRange(writer.path, start, end - start);
      const newline = chunk.lastIndexOf(NEWLINE);
      if (newline !== -1) {
        const keep = start + newline + 1;
        if (keep < writer.bytesWritten) {
          logger.warn({ path: writer.path, dropped: writer.bytesWritten - keep }, 'Dropping partially written event');
          await writer.truncate(keep);
        }
        return;
      }
      end = start;
    }
  }

  /** Tail-scan: a comma is needed unless the last non-blank byte is `[`. */
  private async needsCommaBeforeNextItem(writer: LineStreamWriter): Promise<boolean> {
    const tail = await this.readTail(writer);
    for (let i = tail.length - 1; i >= 0; i--) {
      const byte = tail[i];
      if (WHITESPACE.has(byte)) {
        continue;
      }
      return byte !== OPEN_BRACKET;
    }
    return false;
  }

  private readTail(writer: LineStreamWriter): Promise<Buffer> {
    const start = Math.max(0, writer.bytesWritten - TAIL_WINDOW);
    return readRange(writer.path, start, writer.bytesWritten - start);
  }

  // --- sealing

  private async sealPendingFile(): Promise<void> {
    try {
      if (!this.writer && (await pathExists(this.activePath(await this.allocateIndex())))) {
        // Left over from an earlier process.
        await this.startFileIfNeeded();
      }
      if (this.writer && (await this.needsCommaBeforeNextItem(this.writer))) {
        await this.sealActiveFile();
      }
    } catch (error) {
      this.report(error, 'storage_unknown', 'Failed to seal pending batch file');
    }
  }

  /** Seal the active file now, whether or not it reached the size cap. */
  finishFile(): Promise<boolean> {
    return this.exclusive(() => this.sealActiveFile());
  }

  /**
   * Close the JSON document, sync, mark the file ready and advance the
   * index. Failures are reported and leave no active writer behind.
   */
  private async sealActiveFile(): Promise<boolean> {
    const writer = this.writer;
    if (!writer) {
      logger.warn('No active batch file to finish');
      return false;
    }

    const path = writer.path;
    try {
      const sentAt = this.now().toISOString();
      await writer.writeLine(`],"sentAt":${JSON.stringify(sentAt)},"writeKey":${JSON.stringify(this.config.writeKey)}}`);
      await writer.synchronize();
      await writer.truncateToCurrentSize();

      await this.validateSealed(path);

      await writer.close();
      this.writer = null;
      const readyPath = await this.markReady(path);

      const index = await this.readIndex();
      await this.indexStore.set(this.config.indexKey, index + 1);

      logger.debug({ path: readyPath, size: writer.bytesWritten, index }, 'Sealed batch file');
      return true;
    } catch (error) {
      this.report(error, 'storage_unknown', 'Failed to seal batch file');
      await this.closeWriter();
      return false;
    }
  }

  private async validateSealed(path: string): Promise<void> {
    try {
      await this.fileValidator.validate(path);
    } catch (error) {
      this.report(error, 'storage_invalid', 'Batch file validator failed');
    }
  }

  private async markReady(path: string): Promise<string> {
    const readyPath = this.readyPath(path);
    try {
      await fs.rename(path, readyPath);
    } catch (error) {
      throw new StorageError('storage_unable_to_rename', `Unable to rename ${path}`, { path, cause: error });
    }
    return readyPath;
  }

  // --- helpers

  private async upToSize(maxBytes: number, files: string[]): Promise<string[]> {
    const result: string[] = [];
    let accumulated = 0;

    for (const file of files) {
      let size: number;
      try {
        size = (await fs.stat(file)).size;
      } catch (error) {
        logger.debug({ err: error, file }, 'Skipping file that could not be sized');
        continue;
      }

      if (accumulated + size < maxBytes) {
        result.push(file);
        accumulated += size;
      }
    }
    return result;
  }

  private async removeUnlocked(files: readonly string[]): Promise<void> {
    for (const file of files) {
      try {
        await fs.unlink(file);
      } catch (error) {
        if (isMissingFileError(error)) {
          continue;
        }
        this.errorReporter.reportInternalError(
          new StorageError('storage_unable_to_remove', `Unable to remove ${file}`, { path: file, cause: error }),
        );
        logger.warn({ err: error, file }, 'Failed to remove batch file');
      }
    }
  }

  private async closeWriter(): Promise<void> {
    const writer = this.writer;
    this.writer = null;
    if (!writer) {
      return;
    }
    try {
      await writer.close();
    } catch (error) {
      this.report(error, 'storage_unable_to_close', 'Failed to close batch file');
    }
  }

  private activePath(index: number): string {
    return join(this.config.storageLocation, `${index}-${this.config.baseFilename}`);
  }

  private readyPath(path: string): string {
    return `${path}.${SEALED_EXTENSION}`;
  }

  private report(error: unknown, fallback: StorageError['code'], message: string): void {
    const storageError =
      error instanceof StorageError ? error : new StorageError(fallback, `${message}: ${errorMessage(error)}`, { cause: error });
    logger.error({ err: storageError, code: storageError.code, path: storageError.path }, message);
    this.errorReporter.reportInternalError(storageError);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task, task);
    // The caller sees the failure through `run`; the chain only orders work.
    this.chain = run.catch(() => undefined);
    return run;
  }
}

/** Orders `<index>-<base>[.temp]` names by numeric index, then by name. */
export function compareBatchNames(left: string, right: string): number {
  const l = parseInt(basename(left), 10);
  const r = parseInt(basename(right), 10);
  if (!Number.isNaN(l) && !Number.isNaN(r) && l !== r) {
    return l - r;
  }
  if (Number.isNaN(l) !== Number.isNaN(r)) {
    return Number.isNaN(l) ? 1 : -1;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

async function readRange(path: string, position: number, length: number): Promise<Buffer> {
  if (length <= 0) {
    return Buffer.alloc(0);
  }
  const handle = await fs.open(path, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Every write must be exactly one line for partial-line recovery to hold.
 * Raw line breaks in valid JSON are insignificant whitespace, so they become
 * spaces; the byte length is unchanged.
 */
function toSingleLine(event: string): string {
  return event.replace(/[\r\n]/g, ' ');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
