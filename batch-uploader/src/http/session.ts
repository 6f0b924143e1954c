/**
 * HTTP session capability
 *
 * Requests are described as plain values and executed through tasks that
 * start suspended: nothing goes on the wire until resume(). Completion is
 * reported once, through the handler given when the task was created.
 */

import { promises as fs } from 'fs';
import type { ReadStream } from 'fs';
import pino from 'pino';

const logger = pino({ name: 'http-session', level: process.env.LOG_LEVEL || 'info' });

export type HTTPMethod = 'GET' | 'POST';

export interface HTTPRequest {
  readonly url: URL;
  readonly method: HTTPMethod;
  readonly headers: Readonly<Record<string, string>>;
  /** Deadline for the whole exchange, body included. */
  readonly timeoutMs: number;
}

export type CompletionHandler = (
  data: Buffer | undefined,
  statusCode: number | undefined,
  error: Error | undefined,
) => void;

export type TaskState = 'suspended' | 'running' | 'completed' | 'cancelled';

export interface DataTask {
  readonly state: TaskState;
  resume(): void;
  cancel(): void;
}

export interface HTTPSession {
  uploadFile(request: HTTPRequest, filePath: string, onComplete: CompletionHandler): DataTask;
  uploadBytes(request: HTTPRequest, bytes: Buffer, onComplete: CompletionHandler): DataTask;
  fetch(request: HTTPRequest, onComplete: CompletionHandler): DataTask;
  /** Let running tasks finish; tasks resumed afterwards fail immediately. */
  finishTasksAndInvalidate(): void;
}

export class TaskCancelledError extends Error {
  constructor(url: URL) {
    super(`Request to ${url.toString()} was cancelled`);
    this.name = 'TaskCancelledError';
  }
}

export class TaskTimeoutError extends Error {
  constructor(url: URL, timeoutMs: number) {
    super(`Request to ${url.toString()} timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

type RequestBody = { kind: 'none' } | { kind: 'bytes'; bytes: Buffer } | { kind: 'file'; path: string };

class FetchDataTask implements DataTask {
  private current: TaskState = 'suspended';
  private settled = false;
  private readonly controller = new AbortController();
  private deadline: NodeJS.Timeout | null = null;
  private fileStream: ReadStream | null = null;

  constructor(
    private readonly request: HTTPRequest,
    private readonly body: RequestBody,
    private readonly onComplete: CompletionHandler,
    private readonly session: NodeHTTPSession,
  ) {}

  get state(): TaskState {
    return this.current;
  }

  resume(): void {
    if (this.current !== 'suspended') {
      return;
    }
    this.current = 'running';

    if (this.session.invalidated) {
      this.finish(undefined, undefined, new Error('Session has been invalidated'));
      return;
    }

    this.session.track(this);
    this.deadline = setTimeout(() => {
      this.finish(undefined, undefined, new TaskTimeoutError(this.request.url, this.request.timeoutMs));
    }, this.request.timeoutMs);

    this.start().catch((error: unknown) => {
      this.finish(undefined, undefined, error instanceof Error ? error : new Error(String(error)));
    });
  }

  cancel(): void {
    if (this.settled) {
      return;
    }
    this.current = 'cancelled';
    this.finish(undefined, undefined, new TaskCancelledError(this.request.url));
  }

  private async start(): Promise<void> {
    const init: RequestInit = {
      method: this.request.method,
      headers: { ...this.request.headers },
      signal: this.controller.signal,
    };

    if (this.body.kind === 'file') {
      // Opened up front so a missing file fails before anything is sent.
      const handle = await fs.open(this.body.path, 'r');
      const stream = handle.createReadStream();
      if (this.settled) {
        stream.destroy();
        return;
      }
      this.fileStream = stream;
      init.body = stream;
      init.duplex = 'half';
    } else if (this.body.kind === 'bytes') {
      init.body = this.body.bytes;
    }

    const response = await fetch(this.request.url, init);
    const data = Buffer.from(await response.arrayBuffer());
    this.finish(data, response.status, undefined);
  }

  /** Settles once; aborts the exchange and releases the file either way. */
  private finish(data: Buffer | undefined, statusCode: number | undefined, error: Error | undefined): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    if (this.current !== 'cancelled') {
      this.current = 'completed';
    }
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = null;
    }
    if (error) {
      this.controller.abort(error);
    }
    this.fileStream?.destroy();
    this.fileStream = null;
    this.session.untrack(this);

    try {
      this.onComplete(data, statusCode, error);
    } catch (handlerError) {
      logger.error({ err: handlerError, url: this.request.url.toString() }, 'Completion handler threw');
    }
  }
}

/**
 * Session over the global fetch. File bodies are streamed from disk, never
 * loaded whole, and gzip responses come back decoded.
 */
export class NodeHTTPSession implements HTTPSession {
  private readonly tasks = new Set<DataTask>();
  private isInvalidated = false;

  get invalidated(): boolean {
    return this.isInvalidated;
  }

  get activeTaskCount(): number {
    return this.tasks.size;
  }

  uploadFile(request: HTTPRequest, filePath: string, onComplete: CompletionHandler): DataTask {
    return new FetchDataTask(request, { kind: 'file', path: filePath }, onComplete, this);
  }

  uploadBytes(request: HTTPRequest, bytes: Buffer, onComplete: CompletionHandler): DataTask {
    return new FetchDataTask(request, { kind: 'bytes', bytes }, onComplete, this);
  }

  fetch(request: HTTPRequest, onComplete: CompletionHandler): DataTask {
    return new FetchDataTask(request, { kind: 'none' }, onComplete, this);
  }

  finishTasksAndInvalidate(): void {
    this.isInvalidated = true;
    logger.debug({ running: this.tasks.size }, 'Session invalidated');
  }

  /** @internal */
  track(task: DataTask): void {
    this.tasks.add(task);
  }

  /** @internal */
  untrack(task: DataTask): void {
    this.tasks.delete(task);
  }
}
