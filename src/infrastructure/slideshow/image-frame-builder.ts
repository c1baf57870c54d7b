import {
  cropSize,
  isCropWithinBounds,
  resolveCropRegion,
  sameSize,
  type CropRegion,
  type Frame,
  type FrameSize,
  type PipelineConfig,
  type ResamplingFilter,
  type SourceImage,
  type SourceImageInfo,
} from '@domain/slideshow/index.js';
import sharp from 'sharp';

import { env } from '@/shared/config/env.js';
import { DimensionMismatchError, InvalidCropError, UnsupportedFormatError } from '@/shared/errors/pipeline.errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { toGifDelayMs } from '@/shared/media/rounding.js';

import { loadSourceImage, inspectSourceImage } from './image-source-loader.js';

/** Four-channel RGBA pixels in the order sharp produces them. */
export interface Raster extends FrameSize {
  readonly data: Buffer;
}

const KERNELS: Readonly<Record<ResamplingFilter, keyof sharp.KernelEnum>> = {
  lanczos: 'lanczos3',
  bicubic: 'cubic',
  bilinear: 'linear',
  nearest: 'nearest',
};

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

/**
 * Intermediate sizes for a downscale. Each stage halves the previous one
 * until the remaining ratio is at most 2, then a final stage lands on the
 * target. Upscales and small downscales resize in one stage.
 */
export function planResizeStages(from: FrameSize, to: FrameSize): FrameSize[] {
  if (sameSize(from, to)) {
    return [];
  }

  const stages: FrameSize[] = [];
  let { width, height } = from;

  while (width / to.width > 2 || height / to.height > 2) {
    width = Math.max(to.width, Math.ceil(width / 2));
    height = Math.max(to.height, Math.ceil(height / 2));
    stages.push({ width, height });
  }

  const last = stages.at(-1);
  if (!last || !sameSize(last, to)) {
    stages.push({ width: to.width, height: to.height });
  }

  return stages;
}

/** Largest size with the source's aspect ratio that fits inside the bounds. */
export function containSize(source: FrameSize, bounds: FrameSize): FrameSize {
  const scale = Math.min(bounds.width / source.width, bounds.height / source.height);

  return {
    width: Math.min(bounds.width, Math.max(1, Math.round(source.width * scale))),
    height: Math.min(bounds.height, Math.max(1, Math.round(source.height * scale))),
  };
}

export interface ImageFrameBuilderOptions {
  readonly maxInputPixels?: number;
}

export class ImageFrameBuilder {
  private readonly logger = createChildLogger({ module: 'ImageFrameBuilder' });

  private readonly maxInputPixels: number;

  public constructor(options: ImageFrameBuilderOptions = {}) {
    this.maxInputPixels = options.maxInputPixels ?? env.MAX_INPUT_PIXELS;
  }

  public async load(path: string): Promise<SourceImage> {
    return loadSourceImage(path, { maxInputPixels: this.maxInputPixels });
  }

  public async inspect(path: string): Promise<SourceImageInfo> {
    return inspectSourceImage(path, { maxInputPixels: this.maxInputPixels });
  }

  /**
   * Turns one source image into a canvas-sized hold frame: decode, crop,
   * fit, then sharpen.
   */
  public async build(image: SourceImage, config: PipelineConfig, canvas: FrameSize): Promise<Frame> {
    const cropped = await this.decodeAndCrop(image, config);

    let raster =
      config.canvas.mode === 'fixed'
        ? await this.fitToCanvas(cropped, canvas, config.resampling)
        : await this.centerOnCanvas(cropped, canvas);

    if (config.sharpenStrength > 0) {
      raster = await this.sharpen(raster, config.sharpenStrength);
    }

    this.logger.debug(
      { path: image.path, source: `${image.metadata.width}x${image.metadata.height}`, canvas: `${canvas.width}x${canvas.height}` },
      'Built hold frame',
    );

    return {
      width: raster.width,
      height: raster.height,
      data: new Uint8ClampedArray(raster.data),
      durationMs: toGifDelayMs(config.holdDurationMs),
      kind: 'hold',
    };
  }

  public async decode(image: SourceImage): Promise<Raster> {
    const { pixels } = image;

    if (pixels.kind === 'raw') {
      const { data } = pixels;
      return {
        width: pixels.width,
        height: pixels.height,
        data: Buffer.from(data.buffer, data.byteOffset, data.byteLength),
      };
    }

    try {
      return await toRaster(
        sharp(pixels.buffer, { limitInputPixels: this.maxInputPixels }).rotate().toColourspace('srgb'),
      );
    } catch (error) {
      throw new UnsupportedFormatError(image.path, 'pixel data could not be decoded', error);
    }
  }

  public async crop(raster: Raster, region: CropRegion): Promise<Raster> {
    if (!isCropWithinBounds(region, raster)) {
      throw new InvalidCropError(region, raster);
    }

    const { width, height } = cropSize(region);
    if (width === raster.width && height === raster.height) {
      return raster;
    }

    return toRaster(fromRaster(raster).extract({ left: region.left, top: region.top, width, height }));
  }

  private async decodeAndCrop(image: SourceImage, config: PipelineConfig): Promise<Raster> {
    const decoded = await this.decode(image);
    const region = resolveCropRegion(config.crop, decoded);
    return region ? this.crop(decoded, region) : decoded;
  }

  private async fitToCanvas(raster: Raster, canvas: FrameSize, filter: ResamplingFilter): Promise<Raster> {
    const fitted = await this.resize(raster, containSize(raster, canvas), filter);
    return this.centerOnCanvas(fitted, canvas);
  }

  private async resize(raster: Raster, target: FrameSize, filter: ResamplingFilter): Promise<Raster> {
    let current = raster;

    for (const stage of planResizeStages(raster, target)) {
      current = await toRaster(
        fromRaster(current).resize(stage.width, stage.height, { kernel: KERNELS[filter], fit: 'fill' }),
      );
    }

    return current;
  }

  private async centerOnCanvas(raster: Raster, canvas: FrameSize): Promise<Raster> {
    if (raster.width > canvas.width || raster.height > canvas.height) {
      throw new DimensionMismatchError(raster, canvas);
    }

    if (sameSize(raster, canvas)) {
      return raster;
    }

    const left = Math.floor((canvas.width - raster.width) / 2);
    const top = Math.floor((canvas.height - raster.height) / 2);

    return toRaster(
      fromRaster(raster).extend({
        left,
        right: canvas.width - raster.width - left,
        top,
        bottom: canvas.height - raster.height - top,
        background: TRANSPARENT,
      }),
    );
  }

  private async sharpen(raster: Raster, strength: number): Promise<Raster> {
    return toRaster(fromRaster(raster).sharpen({ sigma: strength, m1: strength, m2: strength * 2, x1: 3 }));
  }
}

function fromRaster(raster: Raster): sharp.Sharp {
  return sharp(raster.data, { raw: { width: raster.width, height: raster.height, channels: 4 } });
}

async function toRaster(pipeline: sharp.Sharp): Promise<Raster> {
  const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });

  if (info.channels !== 4) {
    throw new Error(`Expected RGBA output but received ${info.channels} channels`);
  }

  return { width: info.width, height: info.height, data };
}
