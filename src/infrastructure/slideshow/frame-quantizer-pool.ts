import { existsSync } from 'node:fs';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import type { Frame, IndexedFrame, Palette } from '@domain/slideshow/index.js';

import { env } from '@/shared/config/env.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { quantize, type QuantizeOptions } from './quantization/quantizer.js';
import type { QuantizeFrameMessage, QuantizerReply } from './workers/frame-quantizer.worker.js';

export interface FrameQuantizer {
  /** Frames that may be in flight at once. */
  readonly concurrency: number;
  quantize(frame: Frame, options: QuantizeOptions, sharedPalette?: Palette): Promise<IndexedFrame>;
  destroy(): Promise<void>;
}

/** Quantizes on the calling thread, yielding to the event loop before each frame. */
export class InlineFrameQuantizer implements FrameQuantizer {
  public readonly concurrency = 1;

  public async quantize(frame: Frame, options: QuantizeOptions, sharedPalette?: Palette): Promise<IndexedFrame> {
    await yieldToEventLoop();
    return quantize(frame, options, sharedPalette);
  }

  public async destroy(): Promise<void> {}
}

interface PendingTask {
  readonly worker: Worker;
  readonly resolve: (frame: IndexedFrame) => void;
  readonly reject: (error: Error) => void;
}

const isQuantizerReply = (value: unknown): value is QuantizerReply =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  'id' in value &&
  (value.type === 'quantized' || value.type === 'failed') &&
  typeof value.id === 'number';

/**
 * Round-robin pool of quantizer threads. Replies are matched to tasks by id,
 * so several frames can be in flight on one worker.
 */
export class FrameQuantizerPool implements FrameQuantizer {
  private readonly logger = createChildLogger({ module: 'FrameQuantizerPool' });

  private readonly workers: Worker[];

  private readonly pending = new Map<number, PendingTask>();

  private roundRobinIndex = 0;

  private nextTaskId = 0;

  private destroyed = false;

  public constructor(size: number, spawn: () => Worker) {
    const poolSize = Math.max(1, size);
    this.workers = Array.from({ length: poolSize }, () => this.attach(spawn()));
  }

  public get concurrency(): number {
    return this.workers.length;
  }

  public quantize(frame: Frame, options: QuantizeOptions, sharedPalette?: Palette): Promise<IndexedFrame> {
    if (this.destroyed) {
      return Promise.reject(new Error('Frame quantizer pool has been destroyed'));
    }

    const worker = this.pickWorker();
    const id = this.nextTaskId;
    this.nextTaskId += 1;

    return new Promise<IndexedFrame>((resolvePromise, rejectPromise) => {
      this.pending.set(id, { worker, resolve: resolvePromise, reject: rejectPromise });

      const message: QuantizeFrameMessage = {
        type: 'quantize',
        id,
        frame,
        options: { quantization: options.quantization, dithering: options.dithering },
        sharedPalette,
      };
      try {
        worker.postMessage(message);
      } catch (error) {
        this.pending.delete(id);
        rejectPromise(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  public async destroy(): Promise<void> {
    if (this.destroyed) {
      return;
    }

    this.destroyed = true;
    this.rejectPending(new Error('Frame quantizer pool has been destroyed'));

    await Promise.all(
      this.workers.map(async (worker) => {
        worker.postMessage({ type: 'shutdown' });
        await worker.terminate();
      }),
    );
  }

  private attach(worker: Worker): Worker {
    worker.on('message', (message: unknown) => this.settle(message));
    worker.on('error', (error: Error) => {
      this.logger.warn({ error }, 'Frame quantizer worker failed');
      this.rejectPending(error, worker);
    });
    worker.on('exit', (exitCode: number) => {
      if (!this.destroyed) {
        this.rejectPending(new Error(`Frame quantizer worker exited with code ${exitCode}`), worker);
      }
    });
    return worker;
  }

  private settle(message: unknown): void {
    if (!isQuantizerReply(message)) {
      return;
    }

    const task = this.pending.get(message.id);
    if (!task) {
      return;
    }

    this.pending.delete(message.id);
    if (message.type === 'quantized') {
      task.resolve(message.frame);
    } else {
      task.reject(new Error(message.message));
    }
  }

  private rejectPending(error: Error, worker?: Worker): void {
    for (const [id, task] of this.pending) {
      if (worker === undefined || task.worker === worker) {
        this.pending.delete(id);
        task.reject(error);
      }
    }
  }

  private pickWorker(): Worker {
    const worker = this.workers[this.roundRobinIndex];
    if (!worker) {
      throw new Error('Frame quantizer pool does not contain workers');
    }
    this.roundRobinIndex = (this.roundRobinIndex + 1) % this.workers.length;
    return worker;
  }
}

const COMPILED_WORKER_URL = new URL('./workers/frame-quantizer.worker.js', import.meta.url);

const SOURCE_WORKER_URL = new URL('./workers/frame-quantizer.worker.ts', import.meta.url);

/**
 * The worker script next to this module: the compiled one after a build, or
 * the TypeScript source when running under tsx, whose loader worker threads
 * inherit through `execArgv`.
 */
export function resolveQuantizerWorkerUrl(): URL | undefined {
  if (existsSync(fileURLToPath(COMPILED_WORKER_URL))) {
    return COMPILED_WORKER_URL;
  }

  const underTsx = process.execArgv.some((argument) => argument.includes('tsx'));
  if (underTsx && existsSync(fileURLToPath(SOURCE_WORKER_URL))) {
    return SOURCE_WORKER_URL;
  }

  return undefined;
}

/** A worker pool of `threads` threads, or the inline quantizer for 0 or when no worker script is found. */
export function createFrameQuantizer(threads: number = env.QUANTIZER_THREADS): FrameQuantizer {
  if (threads < 1) {
    return new InlineFrameQuantizer();
  }

  const workerUrl = resolveQuantizerWorkerUrl();
  if (!workerUrl) {
    createChildLogger({ module: 'FrameQuantizerPool' }).debug('No quantizer worker script found; quantizing inline');
    return new InlineFrameQuantizer();
  }

  return new FrameQuantizerPool(threads, () => new Worker(workerUrl));
}
