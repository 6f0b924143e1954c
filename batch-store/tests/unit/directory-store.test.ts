import { promises as fs } from 'fs';
import { join } from 'path';
import {
  BATCH_HEADER,
  DirectoryStore,
  DirectoryStoreOptions,
  FileIndexStore,
  MemoryIndexStore,
  StorageError,
  compareBatchNames,
  createStoreConfiguration,
} from '../../src';
import { makeTempDir, readText, removeTempDir } from '../helpers';

const SENT_AT = '2024-01-02T03:04:05.000Z';
const FOOTER = `],"sentAt":"${SENT_AT}","writeKey":"test-key"}\n`;

interface SealedBatch {
  batch: unknown[];
  sentAt: string;
  writeKey: string;
}

describe('DirectoryStore', () => {
  let dir: string;
  let storage: string;
  let errors: Error[];
  let indexStore: MemoryIndexStore;
  let stores: DirectoryStore[];

  beforeEach(async () => {
    dir = await makeTempDir('directory-store-');
    storage = join(dir, 'batches');
    errors = [];
    indexStore = new MemoryIndexStore();
    stores = [];
  });

  afterEach(async () => {
    await Promise.all(stores.map((store) => store.close()));
    await removeTempDir(dir);
  });

  async function createStore(maxFileSize?: number, options: DirectoryStoreOptions = {}): Promise<DirectoryStore> {
    const config = createStoreConfiguration({
      writeKey: 'test-key',
      storageLocation: storage,
      baseFilename: 'events',
      maxFileSize,
    });
    const store = await DirectoryStore.create(config, {
      indexStore,
      errorReporter: { reportInternalError: (error) => errors.push(error) },
      now: () => new Date(SENT_AT),
      ...options,
    });
    stores.push(store);
    return store;
  }

  async function writeBatchFile(name: string, contents: string): Promise<string> {
    await fs.mkdir(storage, { recursive: true });
    const path = join(storage, name);
    await fs.writeFile(path, contents);
    return path;
  }

  async function parseBatch(path: string): Promise<SealedBatch> {
    return JSON.parse(await readText(path));
  }

  describe('append and fetch', () => {
    it('writes appended events into one sealed JSON document', async () => {
      const store = await createStore();
      await store.append('{"n":1}');
      await store.append('{"n":2}');
      await store.append('{"n":3}');

      const result = await store.fetch();
      const sealed = join(storage, '0-events.temp');
      expect(result).toEqual({ dataFiles: [sealed], removable: [sealed] });
      expect(await readText(sealed)).toBe(`${BATCH_HEADER}\n{"n":1}\n,{"n":2}\n,{"n":3}\n${FOOTER}`);
      expect(await parseBatch(sealed)).toEqual({
        batch: [{ n: 1 }, { n: 2 }, { n: 3 }],
        sentAt: SENT_AT,
        writeKey: 'test-key',
      });
      expect(errors).toEqual([]);
    });

    it('keeps the order of concurrent appends', async () => {
      const store = await createStore();
      const events = Array.from({ length: 50 }, (_, n) => ({ n }));
      await Promise.all(events.map((event) => store.append(JSON.stringify(event))));

      const result = await store.fetch();
      expect(result?.dataFiles).toHaveLength(1);
      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual(events);
    });

    it('writes a multi-line event as one line', async () => {
      const store = await createStore();
      await store.append('{\r\n  "n": 1\n}');

      expect(await readText(join(storage, '0-events'))).toBe(`${BATCH_HEADER}\n{    "n": 1 }\n`);
    });

    it('returns null when nothing has been written', async () => {
      const store = await createStore();
      expect(await store.fetch()).toBeNull();
    });

    it('advances the index after sealing', async () => {
      const store = await createStore();
      await store.append('{"n":1}');
      await store.fetch();
      await store.append('{"n":2}');

      expect(store.activeFile).toBe(join(storage, '1-events'));
      expect(await indexStore.get('batchline.index')).toBe(1);
    });
  });

  describe('rotation', () => {
    // Header line is 13 bytes and each '{"n":k}' line 8, or 9 with its comma.
    it('seals the active file before an event would pass the size cap', async () => {
      const store = await createStore(30);
      await store.append('{"n":1}');
      await store.append('{"n":2}');
      await store.append('{"n":3}');

      expect(await store.listFiles({ onlyReady: true })).toEqual([join(storage, '0-events.temp')]);
      expect(store.activeFile).toBe(join(storage, '1-events'));

      const result = await store.fetch();
      expect(result?.dataFiles).toEqual([join(storage, '0-events.temp'), join(storage, '1-events.temp')]);
      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual([{ n: 1 }, { n: 2 }]);
      expect((await parseBatch(join(storage, '1-events.temp'))).batch).toEqual([{ n: 3 }]);
    });

    it('accepts an oversized event into an empty file', async () => {
      const store = await createStore(30);
      const big = JSON.stringify('x'.repeat(100));
      await store.append(big);

      await store.fetch();
      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual(['x'.repeat(100)]);
      expect(errors).toEqual([]);
    });
  });

  describe('recovery', () => {
    it('rewrites a file whose header is damaged', async () => {
      await writeBatchFile('0-events', 'garbage\n');
      const store = await createStore();
      await store.append('{"n":1}');
      await store.fetch();

      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual([{ n: 1 }]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(StorageError);
      expect(errors[0]).toMatchObject({ code: 'storage_invalid' });
    });

    it('appends without a comma to a file holding only the header', async () => {
      const path = await writeBatchFile('0-events', `${BATCH_HEADER}\n`);
      const store = await createStore();
      await store.append('{"n":1}');

      expect(await readText(path)).toBe(`${BATCH_HEADER}\n{"n":1}\n`);
    });

    it('continues a file left by an earlier store', async () => {
      const first = await createStore();
      await first.append('{"n":1}');
      await first.close();

      const second = await createStore();
      await second.append('{"n":2}');
      await second.fetch();

      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual([{ n: 1 }, { n: 2 }]);
    });

    it('cuts off an event that was only partly written', async () => {
      await writeBatchFile('0-events', `${BATCH_HEADER}\n{"n":1}\n,{"n":`);
      const store = await createStore();
      await store.append('{"n":2}');
      await store.fetch();

      expect(await readText(join(storage, '0-events.temp'))).toBe(`${BATCH_HEADER}\n{"n":1}\n,{"n":2}\n${FOOTER}`);
    });

    it('recovers from a crash partway through a multi-line event', async () => {
      const first = await createStore();
      await first.append('{"n":1}');
      await first.append('{\n  "n": 2\n}');
      await first.close();

      // Cut the last event short, as a crash mid-write would.
      const path = join(storage, '0-events');
      const { size } = await fs.stat(path);
      await fs.truncate(path, size - 4);

      const second = await createStore();
      await second.append('{"n":3}');
      await second.fetch();

      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual([{ n: 1 }, { n: 3 }]);
    });

    it('completes a seal that stopped before the rename', async () => {
      await writeBatchFile('0-events', `${BATCH_HEADER}\n{"n":1}\n${FOOTER}`);
      const store = await createStore();
      await store.append('{"n":2}');

      expect(store.activeFile).toBe(join(storage, '1-events'));
      const result = await store.fetch();
      expect(result?.dataFiles).toEqual([join(storage, '0-events.temp'), join(storage, '1-events.temp')]);
      expect((await parseBatch(join(storage, '0-events.temp'))).batch).toEqual([{ n: 1 }]);
    });

    it('skips indexes that already have a sealed file', async () => {
      await writeBatchFile('0-events.temp', `${BATCH_HEADER}\n{"n":0}\n${FOOTER}`);
      const store = await createStore();
      await store.append('{"n":1}');

      expect(store.activeFile).toBe(join(storage, '1-events'));
      expect(await indexStore.get('batchline.index')).toBe(1);
    });

    it('seals a leftover active file on fetch', async () => {
      await writeBatchFile('0-events', `${BATCH_HEADER}\n{"n":1}\n`);
      const store = await createStore();

      const result = await store.fetch();
      expect(result?.dataFiles).toEqual([join(storage, '0-events.temp')]);
    });

    it('does not seal a leftover file that holds no events', async () => {
      await writeBatchFile('0-events', `${BATCH_HEADER}\n`);
      const store = await createStore();

      expect(await store.fetch()).toBeNull();
      expect(await store.listFiles({ onlyReady: false })).toEqual([join(storage, '0-events')]);
    });
  });

  describe('fetch limits', () => {
    async function sealedFiles(...sizes: number[]): Promise<string[]> {
      return Promise.all(sizes.map((size, i) => writeBatchFile(`${i}-events.temp`, 'x'.repeat(size))));
    }

    it('limits by total size and then by count', async () => {
      const [first, second] = await sealedFiles(400, 400, 400);
      const store = await createStore();

      expect(await store.fetch(2, 1000)).toEqual({ dataFiles: [first, second], removable: [first, second] });
    });

    it('keeps the total strictly below the byte limit', async () => {
      const [first] = await sealedFiles(400, 400, 400);
      const store = await createStore();

      expect((await store.fetch(undefined, 800))?.dataFiles).toEqual([first]);
    });

    it('skips a file that does not fit and keeps scanning', async () => {
      const [first, , third] = await sealedFiles(200, 900, 300);
      const store = await createStore();

      expect((await store.fetch(undefined, 1000))?.dataFiles).toEqual([first, third]);
    });

    it('returns null when no file fits', async () => {
      await sealedFiles(2000);
      const store = await createStore();

      expect(await store.fetch(undefined, 1000)).toBeNull();
    });

    it('orders files by numeric index', async () => {
      await writeBatchFile('10-events.temp', '{}');
      await writeBatchFile('9-events.temp', '{}');
      await writeBatchFile('2-events.temp', '{}');
      const store = await createStore();

      expect(await store.listFiles()).toEqual([
        join(storage, '2-events.temp'),
        join(storage, '9-events.temp'),
        join(storage, '10-events.temp'),
      ]);
    });
  });

  describe('remove and reset', () => {
    it('ignores files that are already gone', async () => {
      const path = await writeBatchFile('0-events.temp', '{}');
      const store = await createStore();

      await store.remove([path, join(storage, '7-events.temp')]);

      expect(await store.count()).toBe(0);
      expect(errors).toEqual([]);
    });

    it('removes every file, including the active one', async () => {
      const store = await createStore(30);
      await store.append('{"n":1}');
      await store.append('{"n":2}');
      await store.append('{"n":3}');
      expect(await store.count()).toBe(2);
      expect(await store.hasData()).toBe(true);

      await store.reset();

      expect(store.activeFile).toBeNull();
      expect(await store.count()).toBe(0);
      expect(await store.hasData()).toBe(false);

      await store.append('{"n":4}');
      expect(await store.count()).toBe(1);
    });
  });

  describe('finishFile', () => {
    it('seals the active file on demand', async () => {
      const store = await createStore();
      await store.append('{"n":1}');

      expect(await store.finishFile()).toBe(true);
      expect(store.activeFile).toBeNull();
      expect(await store.listFiles()).toEqual([join(storage, '0-events.temp')]);
    });

    it('reports false without an active file', async () => {
      const store = await createStore();
      expect(await store.finishFile()).toBe(false);
    });
  });

  describe('corrupt index', () => {
    it('rebuilds the index from the directory and keeps appending', async () => {
      const indexPath = join(dir, 'index.json');
      await fs.writeFile(indexPath, '{not json');
      await writeBatchFile('3-events.temp', `${BATCH_HEADER}\n{"n":0}\n${FOOTER}`);
      const store = await createStore(undefined, { indexStore: new FileIndexStore(indexPath) });

      await store.append('{"n":1}');

      expect(store.activeFile).toBe(join(storage, '4-events'));
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ code: 'storage_invalid' });
      expect(JSON.parse(await readText(indexPath))).toEqual({ 'batchline.index': 4 });

      await store.fetch();
      expect((await parseBatch(join(storage, '4-events.temp'))).batch).toEqual([{ n: 1 }]);
    });
  });

  describe('file validator', () => {
    it('sees each file before it is marked ready', async () => {
      const seen: string[] = [];
      const store = await createStore(undefined, { fileValidator: { validate: (path) => void seen.push(path) } });
      await store.append('{"n":1}');
      await store.fetch();

      expect(seen).toEqual([join(storage, '0-events')]);
    });

    it('sees a file whose interrupted seal is completed on reopen', async () => {
      await writeBatchFile('0-events', `${BATCH_HEADER}\n{"n":1}\n${FOOTER}`);
      const seen: string[] = [];
      const store = await createStore(undefined, { fileValidator: { validate: (path) => void seen.push(path) } });
      await store.append('{"n":2}');

      expect(seen).toEqual([join(storage, '0-events')]);
    });

    it('reports a validator failure and still seals the file', async () => {
      const store = await createStore(undefined, {
        fileValidator: {
          validate: () => {
            throw new Error('bad batch');
          },
        },
      });
      await store.append('{"n":1}');

      expect((await store.fetch())?.dataFiles).toEqual([join(storage, '0-events.temp')]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ code: 'storage_invalid', message: 'Batch file validator failed: bad batch' });
    });
  });

  describe('failures', () => {
    it('reports append failures instead of rejecting', async () => {
      const store = await createStore();
      await fs.rm(storage, { recursive: true, force: true });

      await expect(store.append('{"n":1}')).resolves.toBeUndefined();
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ code: 'storage_unable_to_open' });
    });
  });

  describe('default index store', () => {
    it('keeps file names increasing across stores', async () => {
      const config = createStoreConfiguration({ writeKey: 'test-key', storageLocation: storage, baseFilename: 'events' });
      const first = await DirectoryStore.create(config, { now: () => new Date(SENT_AT) });
      stores.push(first);
      await first.append('{"n":1}');
      const sealed = await first.fetch();
      await first.remove(sealed?.removable ?? []);

      expect(JSON.parse(await readText(join(dir, 'test-key.index.json')))).toEqual({ 'batchline.index': 1 });

      const second = await DirectoryStore.create(config, { now: () => new Date(SENT_AT) });
      stores.push(second);
      await second.append('{"n":2}');
      expect((await second.fetch())?.dataFiles).toEqual([join(storage, '1-events.temp')]);
    });
  });
});

describe('compareBatchNames', () => {
  it('orders by numeric prefix', () => {
    expect(['10-a.temp', '9-a.temp', '1-a'].sort(compareBatchNames)).toEqual(['1-a', '9-a.temp', '10-a.temp']);
  });

  it('puts names without an index last', () => {
    expect(['notes', '3-a'].sort(compareBatchNames)).toEqual(['3-a', 'notes']);
  });
});
