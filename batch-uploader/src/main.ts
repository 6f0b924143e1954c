/**
 * Batch Uploader Service
 *
 * Periodically ships sealed batch files from the queue directory to the
 * ingestion endpoint. Configured from BATCHLINE_* environment variables,
 * optionally loaded from a .env file.
 */

import * as path from 'path';
import { config as loadEnv } from 'dotenv';
import { pino } from 'pino';
import { DirectoryStore, ErrorReporter, loadStoreConfig } from '@batchline/batch-store';
import { loadUploaderConfig } from './config';
import { BatchFlusher } from './flush/batch-flusher';
import { HTTPClient, authorizationHeaderForWriteKey } from './http/http-client';
import { NodeHTTPSession } from './http/session';

const logger = pino({
  name: 'batch-uploader',
  level: process.env.LOG_LEVEL || 'info',
  transport:
    process.env.LOG_PRETTY === 'true'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export interface UploaderService {
  store: DirectoryStore;
  client: HTTPClient;
  flusher: BatchFlusher;
  shutdown(): Promise<void>;
}

const loggingReporter: ErrorReporter = {
  reportInternalError: (error) => {
    logger.warn({ err: error, code: 'code' in error ? error.code : undefined }, 'Internal error reported');
  },
};

/** Build the store, client and flusher without starting anything. */
export async function createUploaderService(env: NodeJS.ProcessEnv = process.env): Promise<UploaderService> {
  const storeConfig = loadStoreConfig(env);
  const uploaderConfig = loadUploaderConfig(env);

  const store = await DirectoryStore.create(storeConfig, { errorReporter: loggingReporter });
  const client = new HTTPClient({
    writeKey: storeConfig.writeKey,
    apiHost: uploaderConfig.apiHost,
    cdnHost: uploaderConfig.cdnHost,
    session: new NodeHTTPSession(),
    userAgent: uploaderConfig.userAgent,
    requestTimeoutMs: uploaderConfig.requestTimeoutMs,
    errorReporter: loggingReporter,
    requestFactory: (request) => ({
      ...request,
      headers: { ...request.headers, Authorization: `Basic ${authorizationHeaderForWriteKey(storeConfig.writeKey)}` },
    }),
  });
  const flusher = new BatchFlusher({
    store,
    client,
    maxFiles: uploaderConfig.maxFilesPerFlush,
    maxBytes: uploaderConfig.maxBatchBytes,
    intervalMs: uploaderConfig.flushIntervalMs,
    retry: uploaderConfig.retry,
  });

  return {
    store,
    client,
    flusher,
    async shutdown() {
      await flusher.stop();
      client.finishTasksAndInvalidate();
      await store.close();
    },
  };
}

async function main(): Promise<void> {
  loadEnv({ path: process.env.BATCHLINE_ENV_FILE || path.join(process.cwd(), '.env') });

  const service = await createUploaderService();
  logger.info(
    { storageLocation: service.store.config.storageLocation, apiHost: service.client.apiHost },
    'Batch uploader starting',
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully...');
    service.flusher
      .stop()
      .then(() => service.flusher.flush())
      .then((report) => logger.info(report, 'Final flush finished'))
      .then(() => service.shutdown())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await service.flusher.flush();
  service.flusher.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, 'Failed to start batch uploader');
    process.exit(1);
  });
}
