/**
 * Batch Flusher
 *
 * Drives fetch → upload → remove cycles over a batch store. Successful and
 * terminally rejected batches are removed; retriable ones stay on disk for
 * a later cycle, which waits out an exponential backoff first.
 */

import pino from 'pino';
import { DataResult } from '@batchline/batch-store';
import { DeliveryOutcome, shouldRemoveBatch } from '../http/outcome';
import { DataTask } from '../http/session';
import { UploadCompletion } from '../http/http-client';

const logger = pino({ name: 'batch-flusher', level: process.env.LOG_LEVEL || 'info' });

export interface BatchSource {
  fetch(count?: number, maxBytes?: number): Promise<DataResult | null>;
  remove(files: readonly string[]): Promise<void>;
}

export interface BatchUploader {
  startBatchUpload(batch: string, completion: UploadCompletion): DataTask | null;
}

export interface RetryPolicy {
  backoffMs: number;
  maxBackoffMs: number;
  multiplier: number;
}

export interface BatchFlusherOptions {
  store: BatchSource;
  client: BatchUploader;
  /** Most files uploaded per cycle. */
  maxFiles?: number;
  /** Total size of the files uploaded per cycle stays below this. */
  maxBytes?: number;
  intervalMs?: number;
  retry?: Partial<RetryPolicy>;
  now?: () => number;
  random?: () => number;
}

export type FlushSkipReason = 'busy' | 'backoff';

export interface FlushReport {
  skipped?: FlushSkipReason;
  attempted: number;
  delivered: number;
  dropped: number;
  retained: number;
  nextRetryAt?: number;
}

const EMPTY_REPORT: FlushReport = { attempted: 0, delivered: 0, dropped: 0, retained: 0 };

export class BatchFlusher {
  private readonly store: BatchSource;
  private readonly client: BatchUploader;
  private readonly maxFiles?: number;
  private readonly maxBytes?: number;
  private readonly intervalMs: number;
  private readonly retry: RetryPolicy;
  private readonly now: () => number;
  private readonly random: () => number;

  private timer: NodeJS.Timeout | null = null;
  private running: Promise<FlushReport> | null = null;
  private readonly inFlight = new Set<DataTask>();
  private consecutiveFailures = 0;
  private nextRetryAt = 0;

  constructor(options: BatchFlusherOptions) {
    this.store = options.store;
    this.client = options.client;
    this.maxFiles = options.maxFiles;
    this.maxBytes = options.maxBytes;
    this.intervalMs = options.intervalMs ?? 30000;
    this.retry = {
      backoffMs: options.retry?.backoffMs ?? 1000,
      maxBackoffMs: options.retry?.maxBackoffMs ?? 30000,
      multiplier: options.retry?.multiplier ?? 2,
    };
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  get isBackingOff(): boolean {
    return this.now() < this.nextRetryAt;
  }

  /** Run one cycle now, unless one is running or the backoff window is open. */
  flush(): Promise<FlushReport> {
    if (this.running) {
      return Promise.resolve({ ...EMPTY_REPORT, skipped: 'busy' });
    }
    if (this.isBackingOff) {
      logger.debug({ nextRetryAt: this.nextRetryAt }, 'Flush skipped, backing off');
      return Promise.resolve({ ...EMPTY_REPORT, skipped: 'backoff', nextRetryAt: this.nextRetryAt });
    }

    const run = this.runCycle().finally(() => {
      this.running = null;
    });
    this.running = run;
    return run;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.flush().catch((error: unknown) => {
        logger.error({ err: error }, 'Periodic flush failed');
      });
    }, this.intervalMs);
    logger.info({ intervalMs: this.intervalMs }, 'Batch flusher started');
  }

  /** Stop the interval and wait for a running cycle to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
    logger.info('Batch flusher stopped');
  }

  /** Abort uploads in progress. Their files stay on disk. */
  cancelInFlight(): void {
    for (const task of this.inFlight) {
      task.cancel();
    }
  }

  private async runCycle(): Promise<FlushReport> {
    const result = await this.store.fetch(this.maxFiles, this.maxBytes);
    if (!result) {
      return { ...EMPTY_REPORT };
    }

    const outcomes = await Promise.all(result.dataFiles.map((file) => this.upload(file)));

    const removable = result.removable.filter((_file, i) => shouldRemoveBatch(outcomes[i]));
    if (removable.length > 0) {
      await this.store.remove(removable);
    }

    const report: FlushReport = {
      attempted: outcomes.length,
      delivered: outcomes.filter((o) => o.kind === 'success').length,
      dropped: outcomes.filter((o) => o.kind === 'terminal').length,
      retained: outcomes.filter((o) => o.kind === 'retriable').length,
    };

    if (report.retained > 0) {
      this.scheduleRetry();
      report.nextRetryAt = this.nextRetryAt;
    } else {
      this.consecutiveFailures = 0;
      this.nextRetryAt = 0;
    }

    logger.info(report, 'Flush cycle finished');
    return report;
  }

  private upload(file: string): Promise<DeliveryOutcome> {
    return new Promise((resolve) => {
      let task: DataTask | null = null;
      task = this.client.startBatchUpload(file, (outcome) => {
        if (task) {
          this.inFlight.delete(task);
        }
        resolve(outcome);
      });
      if (task && task.state === 'running') {
        this.inFlight.add(task);
      }
    });
  }

  private scheduleRetry(): void {
    this.consecutiveFailures++;
    const base = Math.min(
      this.retry.backoffMs * Math.pow(this.retry.multiplier, this.consecutiveFailures - 1),
      this.retry.maxBackoffMs,
    );
    // ±20% jitter
    const jitter = base * 0.4 * (this.random() - 0.5);
    const delay = Math.max(0, Math.round(base + jitter));
    this.nextRetryAt = this.now() + delay;

    logger.warn({ consecutiveFailures: this.consecutiveFailures, delayMs: delay }, 'Retriable upload failures, backing off');
  }
}
