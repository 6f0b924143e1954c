/**
 * Delivery pipeline for sealed batch files.
 *
 * Each start* call makes exactly one attempt and reports a frozen
 * DeliveryOutcome. Retry scheduling belongs to the caller (BatchFlusher).
 */

import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { ErrorReporter, LineStreamReader, errorMessage, noopErrorReporter } from '@batchline/batch-store';
import { NetworkError } from '../errors';
import { SettingsResult, decodeSettings } from '../settings/settings';
import { DeliveryOutcome, classifyResponse, terminal } from './outcome';
import { DataTask, HTTPMethod, HTTPRequest, HTTPSession } from './session';

const logger = pino({ name: 'http-client', level: process.env.LOG_LEVEL || 'info' });

export const CLIENT_NAME = 'batchline';
export const CLIENT_VERSION = '1.0.0';
export const BATCH_PATH = '/b';

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_DIAGNOSTIC_LINES = 50;

export type RequestFactory = (request: HTTPRequest) => HTTPRequest;
export type UploadCompletion = (outcome: DeliveryOutcome) => void;
export type SettingsCompletion = (result: SettingsResult) => void;

export interface HTTPClientOptions {
  writeKey: string;
  apiHost: string;
  cdnHost: string;
  session: HTTPSession;
  /** Applied last, after the default headers; the place for auth headers. */
  requestFactory?: RequestFactory;
  errorReporter?: ErrorReporter;
  userAgent?: string;
  requestTimeoutMs?: number;
  /** Lines of a rejected (HTTP 400) batch written to the log. */
  diagnosticLines?: number;
}

type BatchSource = { kind: 'file'; path: string } | { kind: 'bytes'; data: Buffer };

/** Value for a Basic Authorization header: base64 of `<writeKey>:`. */
export function authorizationHeaderForWriteKey(writeKey: string): string {
  return Buffer.from(`${writeKey}:`, 'utf8').toString('base64');
}

export class HTTPClient {
  readonly writeKey: string;
  readonly apiHost: string;
  readonly cdnHost: string;
  readonly session: HTTPSession;

  private readonly requestFactory?: RequestFactory;
  private readonly errorReporter: ErrorReporter;
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly diagnosticLines: number;

  constructor(options: HTTPClientOptions) {
    this.writeKey = options.writeKey;
    this.apiHost = options.apiHost;
    this.cdnHost = options.cdnHost;
    this.session = options.session;
    this.requestFactory = options.requestFactory;
    this.errorReporter = options.errorReporter ?? noopErrorReporter;
    this.userAgent = options.userAgent ?? `${CLIENT_NAME}/${CLIENT_VERSION}`;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.diagnosticLines = options.diagnosticLines ?? DEFAULT_DIAGNOSTIC_LINES;
  }

  buildURL(host: string, path: string): URL | null {
    try {
      return new URL(`https://${host}${path}`);
    } catch {
      return null;
    }
  }

  configuredRequest(url: URL, method: HTTPMethod): HTTPRequest {
    const request: HTTPRequest = {
      url,
      method,
      headers: {
        'Content-Type': 'application/json; charset=utf-8',
        'User-Agent': this.userAgent,
        'Accept-Encoding': 'gzip',
      },
      timeoutMs: this.requestTimeoutMs,
    };

    return this.requestFactory ? this.requestFactory(request) : request;
  }

  /** Upload a sealed batch file, streamed from disk. */
  startBatchUpload(batch: string, completion: UploadCompletion): DataTask | null {
    return this.startUpload({ kind: 'file', path: batch }, completion);
  }

  /** Upload a batch already held in memory. */
  startBatchUploadData(data: Buffer, completion: UploadCompletion): DataTask | null {
    return this.startUpload({ kind: 'bytes', data }, completion);
  }

  /** GET the project settings for this client's write key. */
  settingsFor(completion: SettingsCompletion): DataTask | null {
    const url = this.buildURL(this.cdnHost, `/projects/${encodeURIComponent(this.writeKey)}/settings`);
    if (!url) {
      const error = new NetworkError('settings_fail', `Invalid settings host: ${this.cdnHost}`);
      this.errorReporter.reportInternalError(error);
      completion({ kind: 'network_failure', error });
      return null;
    }

    const request = this.configuredRequest(url, 'GET');
    const task = this.session.fetch(request, (data, statusCode, error) => {
      completion(this.handleSettingsResponse(url, data, statusCode, error));
    });
    task.resume();
    return task;
  }

  finishTasksAndInvalidate(): void {
    this.session.finishTasksAndInvalidate();
  }

  private startUpload(source: BatchSource, completion: UploadCompletion): DataTask | null {
    const url = this.buildURL(this.apiHost, BATCH_PATH);
    if (!url) {
      const error = new NetworkError('failed_to_open_batch', `Invalid upload host: ${this.apiHost}`);
      this.errorReporter.reportInternalError(error);
      completion(terminal('failed_to_open_batch', { error }));
      return null;
    }

    const attemptId = uuidv4();
    const request = this.configuredRequest(url, 'POST');
    const onComplete = (_data: Buffer | undefined, statusCode: number | undefined, error: Error | undefined) => {
      const outcome = this.handleUploadResponse(url, attemptId, statusCode, error);
      if (outcome.kind === 'terminal' && outcome.statusCode === 400) {
        this.logRejectedBatch(attemptId, source)
          .catch((logError: unknown) => {
            logger.warn({ err: logError, attemptId }, 'Unable to read rejected batch for diagnostics');
          })
          .finally(() => completion(outcome));
        return;
      }
      completion(outcome);
    };

    const task =
      source.kind === 'file'
        ? this.session.uploadFile(request, source.path, onComplete)
        : this.session.uploadBytes(request, source.data, onComplete);

    logger.debug(
      { attemptId, url: url.toString(), source: source.kind === 'file' ? source.path : `${source.data.length} bytes` },
      'Starting batch upload',
    );
    task.resume();
    return task;
  }

  private handleUploadResponse(
    url: URL,
    attemptId: string,
    statusCode: number | undefined,
    error: Error | undefined,
  ): DeliveryOutcome {
    const outcome = classifyResponse(statusCode, error);
    const context = { attemptId, url: url.toString(), statusCode, kind: outcome.kind };

    if (outcome.kind === 'success') {
      logger.debug(context, 'Batch delivered');
      return outcome;
    }

    let reported: NetworkError;
    switch (outcome.reason) {
      case 'unknown':
        logger.warn({ ...context, err: error }, `Error uploading batch: ${errorMessage(error)}`);
        reported = new NetworkError('network_unknown', `Upload failed: ${errorMessage(error)}`, { url, cause: error });
        break;
      case 'invalid_response':
        logger.warn(context, 'Upload finished without an HTTP status');
        reported = new NetworkError('network_invalid_data', 'Upload finished without an HTTP status', { url });
        break;
      case 'server_limited':
        logger.warn(context, 'Upload rate limited');
        reported = new NetworkError('network_server_limited', `Server limited upload (${statusCode})`, { url, statusCode });
        break;
      case 'unexpected_code':
        logger.warn(context, 'Unexpected HTTP status for upload');
        reported = new NetworkError('network_unexpected_http_code', `Unexpected HTTP status ${statusCode}`, {
          url,
          statusCode,
        });
        break;
      default:
        logger.warn(context, 'Server rejected upload');
        reported = new NetworkError('network_server_rejected', `Server rejected upload (${statusCode})`, {
          url,
          statusCode,
        });
    }

    this.errorReporter.reportInternalError(reported);
    return outcome;
  }

  private async logRejectedBatch(attemptId: string, source: BatchSource): Promise<void> {
    const lines: string[] = [];

    if (source.kind === 'bytes') {
      lines.push(...source.data.toString('utf8').split('\n').slice(0, this.diagnosticLines));
    } else {
      const reader = await LineStreamReader.open(source.path);
      try {
        for await (const line of reader) {
          lines.push(line);
          if (lines.length >= this.diagnosticLines) {
            break;
          }
        }
      } finally {
        await reader.close();
      }
    }

    logger.warn({ attemptId, source: source.kind === 'file' ? source.path : 'memory', lines }, 'Batch rejected as malformed, dropping it');
  }

  private handleSettingsResponse(
    url: URL,
    data: Buffer | undefined,
    statusCode: number | undefined,
    error: Error | undefined,
  ): SettingsResult {
    if (error) {
      const cause = new NetworkError('network_unknown', `Settings request failed: ${error.message}`, { url, cause: error });
      this.reportSettingsFailure(cause);
      return { kind: 'network_failure', error: cause };
    }

    if (statusCode === undefined || statusCode > 300) {
      const cause = new NetworkError('network_unexpected_http_code', `Unexpected HTTP status ${statusCode}`, {
        url,
        statusCode,
      });
      this.reportSettingsFailure(cause);
      return { kind: 'network_failure', statusCode, error: cause };
    }

    if (!data || data.length === 0) {
      const cause = new NetworkError('network_invalid_data', 'Settings response had no body', { url, statusCode });
      this.reportSettingsFailure(cause);
      return { kind: 'network_failure', statusCode, error: cause };
    }

    const decoded = decodeSettings(data);
    if (!decoded.ok) {
      const cause = new NetworkError('json_unable_to_deserialize', `Unable to decode settings: ${decoded.error.message}`, {
        url,
        statusCode,
        cause: decoded.error,
      });
      this.reportSettingsFailure(cause);
      return { kind: 'decode_failure', error: cause };
    }

    logger.debug({ url: url.toString() }, 'Settings received');
    return { kind: 'success', settings: decoded.settings };
  }

  private reportSettingsFailure(cause: NetworkError): void {
    logger.warn({ err: cause, code: cause.code, url: cause.url }, 'Settings fetch failed');
    this.errorReporter.reportInternalError(
      new NetworkError('settings_fail', cause.message, { url: cause.url, statusCode: cause.statusCode, cause }),
    );
  }
}
