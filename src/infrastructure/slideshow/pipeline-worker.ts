import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import {
  cropSize,
  isCropWithinBounds,
  resolveCropRegion,
  type Frame,
  type FrameSize,
  type IndexedFrame,
  type Palette,
  type PipelineConfig,
  type PipelineListener,
  type PipelineMetrics,
  type PipelineResult,
  type PipelineRunOptions,
  type PipelineState,
  type SlideshowJob,
} from '@domain/slideshow/index.js';

import {
  CancelledError,
  classifyPipelineError,
  EmptyInputError,
  InvalidCropError,
} from '@/shared/errors/pipeline.errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { planSlideshowDelays } from '@/shared/media/frameTiming.js';

import { fadeFrames } from './fade-interpolator.js';
import { createFrameQuantizer, type FrameQuantizer } from './frame-quantizer-pool.js';
import { GifEncoder, type GifEncoderSession } from './gif-encoder.js';
import { ImageFrameBuilder } from './image-frame-builder.js';
import { PaletteSampler } from './palette-sampler.js';
import { encodePosterFrame } from './poster-frame.js';

export interface PipelineWorkerDependencies {
  readonly frameBuilder?: ImageFrameBuilder;
  readonly encoder?: GifEncoder;
  readonly paletteSampler?: PaletteSampler;
  /** Called once per run; the quantizer is destroyed when the run ends. */
  readonly createQuantizer?: () => FrameQuantizer;
}

interface StageTimings {
  buildTimeMs: number;
  quantizeTimeMs: number;
  encodeTimeMs: number;
}

type CompletedResult = Extract<PipelineResult, { status: 'completed' }>;

type SettledFrame = { readonly ok: true; readonly frame: IndexedFrame } | { readonly ok: false; readonly error: unknown };

/**
 * Keeps up to `quantizer.concurrency` frames quantizing while writing them to
 * the session in submission order.
 */
class OrderedFrameWriter {
  private readonly inFlight: Promise<SettledFrame>[] = [];

  public constructor(
    private readonly session: GifEncoderSession,
    private readonly quantizer: FrameQuantizer,
    private readonly config: PipelineConfig,
    private readonly sharedPalette: Palette | undefined,
    private readonly timings: StageTimings,
  ) {}

  public async push(frame: Frame): Promise<void> {
    this.inFlight.push(
      this.quantizer.quantize(frame, this.config, this.sharedPalette).then(
        (indexed): SettledFrame => ({ ok: true, frame: indexed }),
        (error: unknown): SettledFrame => ({ ok: false, error }),
      ),
    );

    if (this.inFlight.length >= this.quantizer.concurrency) {
      await this.writeOldest();
    }
  }

  public async drain(): Promise<void> {
    while (this.inFlight.length > 0) {
      await this.writeOldest();
    }
  }

  private async writeOldest(): Promise<void> {
    const oldest = this.inFlight.shift();
    if (!oldest) {
      return;
    }

    const quantizeStartedAt = performance.now();
    const settled = await oldest;
    this.timings.quantizeTimeMs += performance.now() - quantizeStartedAt;

    if (!settled.ok) {
      throw settled.error;
    }

    const encodeStartedAt = performance.now();
    await this.session.write(settled.frame);
    this.timings.encodeTimeMs += performance.now() - encodeStartedAt;
  }
}

/**
 * Runs one slideshow job: idle, then running, then one of completed, failed
 * or cancelled. Frames are quantized and written as they are produced.
 * Cancellation is checked once per source image.
 */
export class PipelineWorker {
  private readonly logger = createChildLogger({ module: 'PipelineWorker' });

  private readonly frameBuilder: ImageFrameBuilder;

  private readonly encoder: GifEncoder;

  private readonly paletteSampler: PaletteSampler;

  private readonly createQuantizer: () => FrameQuantizer;

  private currentState: PipelineState = 'idle';

  private cancelRequested = false;

  public constructor(dependencies: PipelineWorkerDependencies = {}) {
    this.frameBuilder = dependencies.frameBuilder ?? new ImageFrameBuilder();
    this.encoder = dependencies.encoder ?? new GifEncoder();
    this.paletteSampler =
      dependencies.paletteSampler ?? new PaletteSampler({ frameBuilder: this.frameBuilder });
    this.createQuantizer = dependencies.createQuantizer ?? (() => createFrameQuantizer());
  }

  public get state(): PipelineState {
    return this.currentState;
  }

  /** Takes effect at the next image boundary. */
  public cancel(): void {
    if (this.currentState === 'idle' || this.currentState === 'running') {
      this.cancelRequested = true;
    }
  }

  public async run(job: SlideshowJob, options: PipelineRunOptions = {}): Promise<PipelineResult> {
    if (this.currentState !== 'idle') {
      throw new Error(`Pipeline worker already ${this.currentState}; create a new worker for another run`);
    }

    this.currentState = 'running';
    const { listener, signal } = options;
    const onAbort = () => this.cancel();

    if (signal?.aborted) {
      this.cancel();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.debug({ jobId: job.id, images: job.imageCount }, 'Pipeline run started');

    let result: PipelineResult;

    try {
      result = await this.execute(job, listener);
      this.currentState = 'completed';
    } catch (error) {
      if (error instanceof CancelledError) {
        this.currentState = 'cancelled';
        this.logger.info({ jobId: job.id }, 'Pipeline run cancelled');
        result = { status: 'cancelled' };
      } else {
        const classified = classifyPipelineError(error);
        this.currentState = 'failed';
        this.logger.warn({ jobId: job.id, code: classified.code, error }, 'Pipeline run failed');
        result = { status: 'failed', error: { code: classified.code, message: classified.message } };
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    this.notifyListener(job, result, listener);
    return result;
  }

  /** The run is already terminal here; a throwing callback is logged and does not change the result. */
  private notifyListener(job: SlideshowJob, result: PipelineResult, listener: PipelineListener | undefined): void {
    try {
      switch (result.status) {
        case 'completed':
          listener?.onComplete?.(result.outputPath, result.frameCount);
          break;
        case 'failed':
          listener?.onError?.(result.error.code, result.error.message);
          break;
        case 'cancelled':
          listener?.onCancelled?.();
          break;
      }
    } catch (error) {
      this.logger.warn({ jobId: job.id, status: result.status, error }, 'Pipeline listener threw');
    }
  }

  private async execute(job: SlideshowJob, listener: PipelineListener | undefined): Promise<CompletedResult> {
    const startedAt = performance.now();
    const { sources, config } = job;

    if (sources.length === 0) {
      throw new EmptyInputError();
    }

    this.throwIfCancelled();

    const canvas = await this.resolveCanvas(sources, config);
    const sharedPalette = await this.resolveSharedPalette(sources, config, canvas);
    const { fadeDelayMs } = planSlideshowDelays(config.holdDurationMs, config.fadeDurationMs, config.fadeSteps);
    const timings: StageTimings = { buildTimeMs: 0, quantizeTimeMs: 0, encodeTimeMs: 0 };

    const quantizer = this.createQuantizer();
    let session: GifEncoderSession;
    try {
      session = await this.encoder.open(job.outputPath, canvas, config);
    } catch (error) {
      await this.releaseQuantizer(job, quantizer);
      throw error;
    }
    const writer = new OrderedFrameWriter(session, quantizer, config, sharedPalette, timings);

    try {
      let current = await this.buildBaseFrame(sources, 0, config, canvas, timings);
      const posterFrame = config.output.poster
        ? await encodePosterFrame(current, config.output.poster.format, config.output)
        : undefined;

      for (let index = 0; index < sources.length; index += 1) {
        await writer.push(current);

        if (index + 1 < sources.length) {
          const next = await this.buildBaseFrame(sources, index + 1, config, canvas, timings);
          const fades = fadeFrames(current, next, config.fadeSteps, fadeDelayMs);

          while (true) {
            const fadeStartedAt = performance.now();
            const step = fades.next();
            timings.buildTimeMs += performance.now() - fadeStartedAt;
            if (step.done) {
              break;
            }
            await writer.push(step.value);
          }

          current = next;
        }

        await writer.drain();
        listener?.onProgress?.(index + 1, sources.length);
        await yieldToEventLoop();
        this.throwIfCancelled();
      }

      const encodeStartedAt = performance.now();
      const summary = await session.finish();
      timings.encodeTimeMs += performance.now() - encodeStartedAt;

      const metrics = this.buildMetrics(timings, startedAt, summary.sizeBytes, summary.frameCount);
      this.logger.debug({ jobId: job.id, frames: summary.frameCount, metrics }, 'Pipeline run completed');

      return {
        status: 'completed',
        outputPath: summary.outputPath,
        frameCount: summary.frameCount,
        metrics,
        posterFrame,
      };
    } catch (error) {
      await this.abortSession(job, session);
      throw error;
    } finally {
      await this.releaseQuantizer(job, quantizer);
    }
  }

  private async abortSession(job: SlideshowJob, session: GifEncoderSession): Promise<void> {
    try {
      await session.abort();
    } catch (error) {
      this.logger.warn({ jobId: job.id, error }, 'Failed to discard partial output');
    }
  }

  private async releaseQuantizer(job: SlideshowJob, quantizer: FrameQuantizer): Promise<void> {
    try {
      await quantizer.destroy();
    } catch (error) {
      this.logger.warn({ jobId: job.id, error }, 'Failed to stop frame quantizer');
    }
  }

  private throwIfCancelled(): void {
    if (this.cancelRequested) {
      throw new CancelledError();
    }
  }

  private async buildBaseFrame(
    sources: readonly string[],
    index: number,
    config: PipelineConfig,
    canvas: FrameSize,
    timings: StageTimings,
  ): Promise<Frame> {
    const path = sources[index];
    if (path === undefined) {
      throw new EmptyInputError(`No source image at position ${index}.`);
    }

    const startedAt = performance.now();
    const image = await this.frameBuilder.load(path);
    const frame = await this.frameBuilder.build(image, config, canvas);
    timings.buildTimeMs += performance.now() - startedAt;

    this.logger.debug({ path, index }, 'Base frame ready');
    return frame;
  }

  private async resolveCanvas(sources: readonly string[], config: PipelineConfig): Promise<FrameSize> {
    if (config.canvas.mode === 'fixed') {
      return { width: config.canvas.width, height: config.canvas.height };
    }

    let width = 0;
    let height = 0;

    for (const path of sources) {
      const { metadata } = await this.frameBuilder.inspect(path);
      const region = resolveCropRegion(config.crop, metadata);
      if (region && !isCropWithinBounds(region, metadata)) {
        throw new InvalidCropError(region, metadata);
      }

      const size = region ? cropSize(region) : metadata;
      width = Math.max(width, size.width);
      height = Math.max(height, size.height);
    }

    return { width, height };
  }

  private async resolveSharedPalette(
    sources: readonly string[],
    config: PipelineConfig,
    canvas: FrameSize,
  ): Promise<Palette | undefined> {
    if (config.palette.mode === 'per-frame') {
      return undefined;
    }

    return config.palette.palette ?? this.paletteSampler.sample(sources, config, canvas);
  }

  private buildMetrics(
    timings: StageTimings,
    startedAt: number,
    outputSizeBytes: number,
    frameCount: number,
  ): PipelineMetrics {
    const processingMs = timings.buildTimeMs + timings.quantizeTimeMs + timings.encodeTimeMs;

    return {
      buildTimeMs: timings.buildTimeMs,
      quantizeTimeMs: timings.quantizeTimeMs,
      encodeTimeMs: timings.encodeTimeMs,
      totalTimeMs: performance.now() - startedAt,
      outputSizeBytes,
      averageFrameProcessingMs: frameCount > 0 ? processingMs / frameCount : 0,
    };
  }
}
