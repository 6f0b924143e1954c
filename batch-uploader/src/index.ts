export { UploaderConfig, UploaderConfigSchema, loadUploaderConfig } from './config';
export { NetworkError, NetworkErrorCode } from './errors';
export {
  BatchFlusher,
  BatchFlusherOptions,
  BatchSource,
  BatchUploader,
  FlushReport,
  FlushSkipReason,
  RetryPolicy,
} from './flush/batch-flusher';
export {
  BATCH_PATH,
  CLIENT_NAME,
  CLIENT_VERSION,
  HTTPClient,
  HTTPClientOptions,
  RequestFactory,
  SettingsCompletion,
  UploadCompletion,
  authorizationHeaderForWriteKey,
} from './http/http-client';
export {
  DeliveryFailure,
  DeliveryOutcome,
  DeliverySuccess,
  FailureReason,
  classifyResponse,
  retriable,
  shouldRemoveBatch,
  success,
  terminal,
} from './http/outcome';
export {
  CompletionHandler,
  DataTask,
  HTTPMethod,
  HTTPRequest,
  HTTPSession,
  NodeHTTPSession,
  TaskCancelledError,
  TaskTimeoutError,
  TaskState,
} from './http/session';
export { DecodeResult, Settings, SettingsResult, SettingsSchema, decodeSettings } from './settings/settings';
export { UploaderService, createUploaderService } from './main';
