import type { FrameSize, Palette, PipelineConfig } from '@domain/slideshow/index.js';

import { env } from '@/shared/config/env.js';
import { EmptyInputError } from '@/shared/errors/pipeline.errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { containSize, ImageFrameBuilder } from './image-frame-builder.js';
import { flattenOnWhite } from './quantization/color-histogram.js';
import { buildPalette } from './quantization/quantizer.js';

export interface PaletteSamplerOptions {
  readonly sampleSize?: number;
  readonly frameBuilder?: ImageFrameBuilder;
}

/**
 * Derives one palette for a whole run from a scaled-down rendering of every
 * hold frame, letterbox included, so every frame can share it.
 */
export class PaletteSampler {
  private readonly logger = createChildLogger({ module: 'PaletteSampler' });

  private readonly sampleSize: number;

  private readonly frameBuilder: ImageFrameBuilder;

  public constructor(options: PaletteSamplerOptions = {}) {
    this.sampleSize = options.sampleSize ?? env.PALETTE_SAMPLE_SIZE;
    this.frameBuilder = options.frameBuilder ?? new ImageFrameBuilder();
  }

  public async sample(sources: readonly string[], config: PipelineConfig, canvas: FrameSize): Promise<Palette> {
    if (sources.length === 0) {
      throw new EmptyInputError();
    }

    const sampleBounds = { width: this.sampleSize, height: this.sampleSize };
    const thumbnailCanvas =
      canvas.width <= sampleBounds.width && canvas.height <= sampleBounds.height
        ? canvas
        : containSize(canvas, sampleBounds);
    const thumbnailConfig: PipelineConfig =
      thumbnailCanvas === canvas
        ? config
        : { ...config, canvas: { mode: 'fixed', ...thumbnailCanvas }, sharpenStrength: 0 };

    const thumbnails: Uint8Array[] = [];
    let byteLength = 0;

    for (const path of sources) {
      const image = await this.frameBuilder.load(path);
      const thumbnail = await this.frameBuilder.build(image, thumbnailConfig, thumbnailCanvas);
      const rgb = flattenOnWhite(thumbnail.data);
      thumbnails.push(rgb);
      byteLength += rgb.length;
    }

    const combined = new Uint8Array(byteLength);
    let offset = 0;
    for (const rgb of thumbnails) {
      combined.set(rgb, offset);
      offset += rgb.length;
    }

    const { palette, exact } = buildPalette(combined, config.quantization);

    this.logger.debug(
      { images: sources.length, colors: palette.length, exact, algorithm: config.quantization },
      'Derived shared palette',
    );

    return palette;
  }
}
