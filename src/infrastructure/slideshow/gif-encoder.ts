import { randomUUID } from 'node:crypto';
import { open, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { performance } from 'node:perf_hooks';

import {
  sameSize,
  type FrameSize,
  type IndexedFrame,
  type PipelineConfig,
  type PipelineResult,
} from '@domain/slideshow/index.js';

import { DimensionMismatchError, EmptyInputError, EncodingError } from '@/shared/errors/pipeline.errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { GIFEncoder, type GIFEncoderInstance } from '@/shared/media/gifencInterop.js';

import { compactPalette, padPalette } from './quantization/palette.js';

/** NETSCAPE loop count: play forever. */
const LOOP_FOREVER = 0;

/** Restore to background before the next frame is drawn. */
const DISPOSE_TO_BACKGROUND = 2;

export interface GifEncodingSummary {
  readonly outputPath: string;
  readonly frameCount: number;
  readonly sizeBytes: number;
}

export interface GifEncoderSession {
  readonly framesWritten: number;
  write(frame: IndexedFrame): Promise<void>;
  finish(): Promise<GifEncodingSummary>;
  abort(): Promise<void>;
}

type EncoderSettings = Pick<PipelineConfig, 'output'>;

const partialPathFor = (outputPath: string): string =>
  join(dirname(outputPath), `.${basename(outputPath)}.${randomUUID()}.partial`);

class GifFileSession implements GifEncoderSession {
  private readonly logger = createChildLogger({ module: 'GifFileSession' });

  private readonly encoder: GIFEncoderInstance = GIFEncoder({ auto: false });

  private written = 0;

  private closed = false;

  public constructor(
    private readonly handle: FileHandle,
    private readonly partialPath: string,
    private readonly outputPath: string,
    private readonly size: FrameSize,
    private readonly settings: EncoderSettings,
  ) {
    this.encoder.writeHeader();
  }

  public get framesWritten(): number {
    return this.written;
  }

  public async write(frame: IndexedFrame): Promise<void> {
    if (this.closed) {
      throw new EncodingError(this.outputPath, new Error('Session is already closed'));
    }

    if (!sameSize(frame, this.size)) {
      throw new DimensionMismatchError(this.size, frame);
    }

    const prepared =
      this.settings.output.optimize && frame.paletteScope === 'local' ? compactPalette(frame) : frame;
    const first = this.written === 0;
    // Global frames after the first reuse the global colour table.
    const palette = first || prepared.paletteScope === 'local' ? padPalette(prepared.palette) : undefined;

    this.encoder.writeFrame(prepared.indices, prepared.width, prepared.height, {
      palette,
      first,
      delay: prepared.durationMs,
      repeat: LOOP_FOREVER,
      dispose: DISPOSE_TO_BACKGROUND,
    });

    await this.flush();
    this.written += 1;
  }

  public async finish(): Promise<GifEncodingSummary> {
    if (this.written === 0) {
      await this.discard();
      throw new EmptyInputError('No frames were written to the GIF.');
    }

    try {
      this.encoder.finish();
      await this.flush();
      this.closed = true;
      await this.handle.close();
      await rename(this.partialPath, this.outputPath);
      const { size } = await stat(this.outputPath);

      this.logger.debug({ outputPath: this.outputPath, frames: this.written, size }, 'GIF written');

      return { outputPath: this.outputPath, frameCount: this.written, sizeBytes: size };
    } catch (error) {
      await this.discard();
      throw error instanceof EncodingError ? error : new EncodingError(this.outputPath, error);
    }
  }

  public async abort(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      try {
        await this.handle.close();
      } catch (error) {
        this.logger.debug({ error, path: this.partialPath }, 'Failed to close partial GIF');
      }
    }

    await rm(this.partialPath, { force: true });
  }

  /** `abort` for error paths: a failed removal is logged and the caller's error stands. */
  private async discard(): Promise<void> {
    try {
      await this.abort();
    } catch (error) {
      this.logger.warn({ error, path: this.partialPath }, 'Failed to remove partial GIF');
    }
  }

  private async flush(): Promise<void> {
    const bytes = this.encoder.bytesView();

    try {
      let offset = 0;
      while (offset < bytes.byteLength) {
        const { bytesWritten } = await this.handle.write(bytes, offset, bytes.byteLength - offset);
        offset += bytesWritten;
      }
    } catch (error) {
      throw new EncodingError(this.outputPath, error);
    }

    this.encoder.reset();
  }
}

/**
 * Writes indexed frames to a looping GIF. Bytes go to a hidden sibling of
 * the target, which is renamed into place only once the trailer is written.
 */
export class GifEncoder {
  private readonly logger = createChildLogger({ module: 'GifEncoder' });

  public async open(outputPath: string, size: FrameSize, settings: EncoderSettings): Promise<GifEncoderSession> {
    const partialPath = partialPathFor(outputPath);

    let handle: FileHandle;
    try {
      handle = await open(partialPath, 'w');
    } catch (error) {
      throw new EncodingError(outputPath, error);
    }

    this.logger.debug({ outputPath, partialPath, size }, 'Opened GIF session');

    return new GifFileSession(handle, partialPath, outputPath, size, settings);
  }

  public async encode(
    frames: readonly IndexedFrame[],
    config: PipelineConfig,
    outputPath: string,
  ): Promise<Extract<PipelineResult, { status: 'completed' }>> {
    const [first] = frames;
    if (!first) {
      throw new EmptyInputError('No frames to encode.');
    }

    const startedAt = performance.now();
    const session = await this.open(outputPath, first, config);

    try {
      for (const frame of frames) {
        await session.write(frame);
      }
    } catch (error) {
      try {
        await session.abort();
      } catch (abortError) {
        this.logger.warn({ error: abortError, outputPath }, 'Failed to remove partial GIF');
      }
      throw error;
    }

    const summary = await session.finish();
    const encodeTimeMs = performance.now() - startedAt;

    return {
      status: 'completed',
      outputPath: summary.outputPath,
      frameCount: summary.frameCount,
      metrics: {
        buildTimeMs: 0,
        quantizeTimeMs: 0,
        encodeTimeMs,
        totalTimeMs: encodeTimeMs,
        outputSizeBytes: summary.sizeBytes,
        averageFrameProcessingMs: encodeTimeMs / summary.frameCount,
      },
    };
  }
}
