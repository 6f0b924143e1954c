import { createStoreConfiguration, loadStoreConfig } from '../../src';

describe('store configuration', () => {
  it('applies defaults', () => {
    const config = createStoreConfiguration({
      writeKey: 'test-key',
      storageLocation: '/tmp/batches',
      baseFilename: 'events',
    });

    expect(config).toEqual({
      writeKey: 'test-key',
      storageLocation: '/tmp/batches',
      baseFilename: 'events',
      maxFileSize: 486400,
      indexKey: 'batchline.index',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects a base filename containing a path separator', () => {
    expect(() =>
      createStoreConfiguration({ writeKey: 'test-key', storageLocation: '/tmp/batches', baseFilename: 'a/b' }),
    ).toThrow('baseFilename must not contain path separators');
  });

  it('rejects an empty write key', () => {
    expect(() => loadStoreConfig({})).toThrow();
  });

  it('reads BATCHLINE_* variables', () => {
    const config = loadStoreConfig({
      BATCHLINE_WRITE_KEY: 'test-key',
      BATCHLINE_STORAGE_DIR: '/srv/queue',
      BATCHLINE_BASE_FILENAME: 'analytics',
      BATCHLINE_MAX_FILE_SIZE: '1024',
    });

    expect(config).toEqual({
      writeKey: 'test-key',
      storageLocation: '/srv/queue',
      baseFilename: 'analytics',
      maxFileSize: 1024,
      indexKey: 'batchline.index',
    });
  });

  it('falls back to default locations', () => {
    const config = loadStoreConfig({ BATCHLINE_WRITE_KEY: 'test-key' });
    expect(config.storageLocation).toBe('./data/batches');
    expect(config.baseFilename).toBe('events');
  });
});
