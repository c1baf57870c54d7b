import { readFile } from 'node:fs/promises';

import {
  SUPPORTED_SOURCE_FORMATS,
  type SourceImage,
  type SourceImageFormat,
  type SourceImageMetadata,
  type SourceImageInfo,
  type SourcePixels,
} from '@domain/slideshow/index.js';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import sharp from 'sharp';

import { env } from '@/shared/config/env.js';
import { UnsupportedFormatError } from '@/shared/errors/pipeline.errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

const logger = createChildLogger({ module: 'ImageSourceLoader' });

export interface ImageSourceLoaderOptions {
  readonly maxInputPixels?: number;
}

// libvips has no BMP loader, so bitmaps go through canvas instead.
const isBitmap = (buffer: Buffer): boolean => buffer.length > 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;

const isSupportedFormat = (format: string): format is SourceImageFormat =>
  SUPPORTED_SOURCE_FORMATS.some((supported) => supported === format);

export async function loadSourceImage(
  path: string,
  options: ImageSourceLoaderOptions = {},
): Promise<SourceImage> {
  const buffer = await readSource(path);

  if (isBitmap(buffer)) {
    const bitmap = await decodeBitmap(path, buffer);
    return {
      path,
      format: 'bmp',
      metadata: {
        width: bitmap.width,
        height: bitmap.height,
        orientation: 1,
        hasIccProfile: false,
        colorSpace: 'srgb',
      },
      pixels: bitmap,
    };
  }

  const { format, metadata } = await inspectEncoded(path, buffer, options);

  if (metadata.hasIccProfile) {
    logger.debug({ path, colorSpace: metadata.colorSpace }, 'Embedded colour profile will be converted to sRGB');
  }

  return { path, format, metadata, pixels: { kind: 'encoded', buffer } };
}

export async function inspectSourceImage(
  path: string,
  options: ImageSourceLoaderOptions = {},
): Promise<SourceImageInfo> {
  const { format, metadata } = await loadSourceImage(path, options);
  return { path, format, metadata };
}

async function readSource(path: string): Promise<Buffer> {
  try {
    const buffer = await readFile(path);
    if (buffer.length === 0) {
      throw new UnsupportedFormatError(path, 'file is empty');
    }
    return buffer;
  } catch (error) {
    if (error instanceof UnsupportedFormatError) {
      throw error;
    }
    throw new UnsupportedFormatError(path, 'file could not be read', error);
  }
}

async function inspectEncoded(
  path: string,
  buffer: Buffer,
  options: ImageSourceLoaderOptions,
): Promise<{ format: SourceImageFormat; metadata: SourceImageMetadata }> {
  let metadata: sharp.Metadata;

  try {
    metadata = await sharp(buffer, {
      limitInputPixels: options.maxInputPixels ?? env.MAX_INPUT_PIXELS,
    }).metadata();
  } catch (error) {
    throw new UnsupportedFormatError(path, 'unrecognised image data', error);
  }

  const format = metadata.format ?? 'unknown';
  if (!isSupportedFormat(format)) {
    throw new UnsupportedFormatError(path, `${format} images are not supported`);
  }

  const { width, height } = metadata;
  if (!width || !height) {
    throw new UnsupportedFormatError(path, 'image has no dimensions');
  }

  const orientation = metadata.orientation ?? 1;
  const rotated = orientation >= 5;

  return {
    format,
    metadata: {
      width: rotated ? height : width,
      height: rotated ? width : height,
      orientation,
      hasIccProfile: metadata.icc !== undefined,
      colorSpace: metadata.space ?? 'srgb',
    },
  };
}

async function decodeBitmap(
  path: string,
  buffer: Buffer,
): Promise<Extract<SourcePixels, { kind: 'raw' }>> {
  try {
    const image = await loadImage(buffer);
    const canvas = createCanvas(image.width, image.height);
    const context = canvas.getContext('2d');
    context.drawImage(image, 0, 0);
    const imageData = context.getImageData(0, 0, image.width, image.height);

    return {
      kind: 'raw',
      data: new Uint8ClampedArray(imageData.data),
      width: image.width,
      height: image.height,
    };
  } catch (error) {
    throw new UnsupportedFormatError(path, 'bitmap data could not be decoded', error);
  }
}
