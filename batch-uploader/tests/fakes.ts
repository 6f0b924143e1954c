import { CompletionHandler, DataTask, HTTPRequest, HTTPSession, TaskState } from '../src/http/session';

export class FakeTask implements DataTask {
  state: TaskState = 'suspended';

  resume(): void {
    if (this.state === 'suspended') {
      this.state = 'running';
    }
  }

  cancel(): void {
    this.state = 'cancelled';
  }
}

export interface RecordedCall {
  kind: 'file' | 'bytes' | 'fetch';
  request: HTTPRequest;
  filePath?: string;
  bytes?: Buffer;
  onComplete: CompletionHandler;
  task: FakeTask;
}

/** Records requests; tests answer them by calling `onComplete`. */
export class FakeSession implements HTTPSession {
  readonly calls: RecordedCall[] = [];
  invalidated = false;

  uploadFile(request: HTTPRequest, filePath: string, onComplete: CompletionHandler): DataTask {
    return this.record({ kind: 'file', request, filePath, onComplete, task: new FakeTask() });
  }

  uploadBytes(request: HTTPRequest, bytes: Buffer, onComplete: CompletionHandler): DataTask {
    return this.record({ kind: 'bytes', request, bytes, onComplete, task: new FakeTask() });
  }

  fetch(request: HTTPRequest, onComplete: CompletionHandler): DataTask {
    return this.record({ kind: 'fetch', request, onComplete, task: new FakeTask() });
  }

  finishTasksAndInvalidate(): void {
    this.invalidated = true;
  }

  lastCall(): RecordedCall {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error('No request was made');
    }
    return call;
  }

  private record(call: RecordedCall): DataTask {
    this.calls.push(call);
    return call.task;
  }
}
