import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import type { FrameRenderer, FrameTask, RenderedFrame } from '../../domain/meme-template/index.js';
import { AppError, RenderAbortedError } from '../../shared/errors/index.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import {
  fromFrameFailedMessage,
  isWorkerResponse,
  type CompositorWorkerData,
  type WorkerRequest,
  type WorkerResponse,
} from './workers/protocol.js';

interface PendingFrame {
  readonly task: FrameTask;
  readonly resolve: (frame: RenderedFrame) => void;
  readonly reject: (error: unknown) => void;
  readonly detach: () => void;
  settled: boolean;
}

export interface WorkerFrameRendererOptions {
  readonly size: number;
  readonly textCacheEntries?: number;
}

/**
 * Fixed pool of compositor workers. Each worker holds at most one frame;
 * the rest wait in a FIFO queue. Completion order is arbitrary.
 */
export class WorkerFrameRenderer implements FrameRenderer {
  public readonly concurrency: number;

  private readonly logger = createChildLogger({ module: 'WorkerFrameRenderer' });

  private readonly workerUrl: URL;

  private readonly workerData: CompositorWorkerData;

  private readonly idle: Worker[] = [];

  private readonly busy = new Map<Worker, PendingFrame>();

  private readonly queue: PendingFrame[] = [];

  private readonly retired = new WeakSet<Worker>();

  private destroyed = false;

  public constructor(options: WorkerFrameRendererOptions) {
    this.concurrency = Math.max(1, Math.floor(options.size));
    this.workerUrl = resolveWorkerUrl();
    this.workerData = { textCacheEntries: options.textCacheEntries };

    for (let index = 0; index < this.concurrency; index += 1) {
      this.idle.push(this.spawnWorker());
    }
  }

  public renderFrame(task: FrameTask, signal?: AbortSignal): Promise<RenderedFrame> {
    if (this.destroyed) {
      return Promise.reject(
        AppError.unsupported('meme-renderer.pool-destroyed', 'Frame renderer pool has been destroyed'),
      );
    }

    if (signal?.aborted) {
      return Promise.reject(new RenderAbortedError(signal.reason));
    }

    return new Promise<RenderedFrame>((resolve, reject) => {
      const onAbort = () => {
        this.abandon(pending, new RenderAbortedError(signal?.reason));
      };

      const pending: PendingFrame = {
        task,
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
        settled: false,
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(pending);
      this.drain();
    });
  }

  public async destroy(): Promise<void> {
    if (this.destroyed) {
      return;
    }

    this.destroyed = true;

    for (const pending of this.queue.splice(0)) {
      this.settle(pending, () => pending.reject(new RenderAbortedError('renderer destroyed')));
    }

    for (const pending of this.busy.values()) {
      this.settle(pending, () => pending.reject(new RenderAbortedError('renderer destroyed')));
    }

    const workers = [...this.idle, ...this.busy.keys()];
    this.idle.length = 0;
    this.busy.clear();

    await Promise.all(
      workers.map(async (worker) => {
        const shutdown: WorkerRequest = { type: 'shutdown' };
        worker.postMessage(shutdown);
        await worker.terminate();
      }),
    );
  }

  private spawnWorker(): Worker {
    const worker = new Worker(this.workerUrl, {
      workerData: this.workerData,
      execArgv: this.workerUrl.pathname.endsWith('.ts') ? ['--import', 'tsx'] : undefined,
    });

    worker.on('message', (message: unknown) => {
      if (isWorkerResponse(message)) {
        this.handleResponse(worker, message);
      }
    });
    worker.on('error', (error) => {
      this.handleCrash(worker, error);
    });
    worker.on('exit', (exitCode) => {
      if (!this.destroyed) {
        this.handleCrash(worker, new Error(`Frame compositor worker exited with code ${exitCode}`));
      }
    });

    return worker;
  }

  private drain(): void {
    while (this.idle.length > 0 && this.queue.length > 0) {
      const worker = this.idle.pop();
      const pending = this.queue.shift();
      if (!worker || !pending) {
        return;
      }

      this.busy.set(worker, pending);
      const request: WorkerRequest = { type: 'compositeFrame', task: pending.task };
      worker.postMessage(request);
    }
  }

  private handleResponse(worker: Worker, response: WorkerResponse): void {
    const pending = this.busy.get(worker);
    this.busy.delete(worker);
    if (!this.destroyed) {
      this.idle.push(worker);
    }

    if (pending && pending.task.index === response.index) {
      if (response.type === 'frameComposited') {
        this.settle(pending, () => pending.resolve({ index: response.index, bitmap: response.bitmap }));
      } else {
        this.settle(pending, () => pending.reject(fromFrameFailedMessage(response)));
      }
    } else {
      this.logger.warn({ frameIndex: response.index }, 'Discarding unexpected worker response');
    }

    this.drain();
  }

  /** An `error` event is followed by `exit`; only the first one counts. */
  private handleCrash(worker: Worker, error: Error): void {
    if (this.retired.has(worker)) {
      return;
    }

    this.retired.add(worker);
    const idleAt = this.idle.indexOf(worker);
    if (idleAt >= 0) {
      this.idle.splice(idleAt, 1);
    }

    const pending = this.busy.get(worker);
    this.busy.delete(worker);
    this.logger.error({ error, frameIndex: pending?.task.index }, 'Frame compositor worker crashed');

    if (pending) {
      this.settle(pending, () => pending.reject(AppError.fromError(error, 'meme-renderer.worker-crashed')));
    }

    if (!this.destroyed) {
      this.idle.push(this.spawnWorker());
      this.drain();
    }
  }

  /** Rejects a frame now; a busy worker's late result is dropped by `settle`. */
  private abandon(pending: PendingFrame, error: RenderAbortedError): void {
    const queued = this.queue.indexOf(pending);
    if (queued >= 0) {
      this.queue.splice(queued, 1);
    }

    this.settle(pending, () => pending.reject(error));
  }

  private settle(pending: PendingFrame, action: () => void): void {
    if (pending.settled) {
      return;
    }

    pending.settled = true;
    pending.detach();
    action();
  }
}

function resolveWorkerUrl(): URL {
  // sources run through tsx, builds run plain .js
  const extension = path.extname(fileURLToPath(import.meta.url));
  return new URL(`./workers/frame-compositor.worker${extension}`, import.meta.url);
}
