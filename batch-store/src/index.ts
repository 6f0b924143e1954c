export {
  StoreConfiguration,
  StoreConfigurationInput,
  StoreConfigurationSchema,
  createStoreConfiguration,
  loadStoreConfig,
} from './config';
export {
  ErrorReporter,
  StorageError,
  StorageErrorCode,
  errorMessage,
  isMissingFileError,
  noopErrorReporter,
} from './errors';
export { FileIndexStore, IndexStore, MemoryIndexStore, defaultIndexPath } from './index-store/index-store';
export { LINE_DELIMITER, LineStreamWriter } from './io/line-stream-writer';
export { LineStreamReader } from './io/line-stream-reader';
export {
  BATCH_HEADER,
  BatchFileValidator,
  DataResult,
  DirectoryStore,
  DirectoryStoreOptions,
  ListFilesOptions,
  SEALED_EXTENSION,
  compareBatchNames,
  noopFileValidator,
} from './store/directory-store';
