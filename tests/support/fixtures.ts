import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  createPipelineConfig,
  type Frame,
  type FrameKind,
  type PipelineConfig,
} from '@domain/slideshow/index.js';
import sharp from 'sharp';

export type Rgb = readonly [number, number, number];

export type Rgba = readonly [number, number, number, number];

export const createTempDir = (prefix: string): Promise<string> => mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

export async function writeSolidPng(
  directory: string,
  name: string,
  width: number,
  height: number,
  [r, g, b]: Rgb,
): Promise<string> {
  const filePath = path.join(directory, name);
  await sharp({ create: { width, height, channels: 3, background: { r, g, b } } }).png().toFile(filePath);
  return filePath;
}

/** Writes raw RGBA pixels as a PNG. */
export async function writeRgbaPng(
  directory: string,
  name: string,
  width: number,
  height: number,
  pixel: (x: number, y: number) => Rgba,
): Promise<string> {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      data.set(pixel(x, y), (y * width + x) * 4);
    }
  }

  const filePath = path.join(directory, name);
  await sharp(data, { raw: { width, height, channels: 4 } }).png().toFile(filePath);
  return filePath;
}

/** Writes RGB pixels through a sharp output chain such as `.jpeg()` or `.tiff()`. */
export async function writeEncodedImage(
  directory: string,
  name: string,
  width: number,
  height: number,
  pixel: (x: number, y: number) => Rgb,
  encode: (image: sharp.Sharp) => sharp.Sharp,
): Promise<string> {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      data.set(pixel(x, y), (y * width + x) * 3);
    }
  }

  const filePath = path.join(directory, name);
  await encode(sharp(data, { raw: { width, height, channels: 3 } })).toFile(filePath);
  return filePath;
}

/** Uncompressed 24-bit bottom-up BMP. */
export async function writeBmp(
  directory: string,
  name: string,
  width: number,
  height: number,
  pixel: (x: number, y: number) => Rgb,
): Promise<string> {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const buffer = Buffer.alloc(54 + pixelBytes);

  buffer.write('BM', 0, 'ascii');
  buffer.writeUInt32LE(buffer.length, 2);
  buffer.writeUInt32LE(54, 10);
  buffer.writeUInt32LE(40, 14);
  buffer.writeInt32LE(width, 18);
  buffer.writeInt32LE(height, 22);
  buffer.writeUInt16LE(1, 26);
  buffer.writeUInt16LE(24, 28);
  buffer.writeUInt32LE(0, 30);
  buffer.writeUInt32LE(pixelBytes, 34);

  for (let y = 0; y < height; y += 1) {
    const rowOffset = 54 + (height - 1 - y) * rowSize;
    for (let x = 0; x < width; x += 1) {
      const [r, g, b] = pixel(x, y);
      buffer[rowOffset + x * 3] = b;
      buffer[rowOffset + x * 3 + 1] = g;
      buffer[rowOffset + x * 3 + 2] = r;
    }
  }

  const filePath = path.join(directory, name);
  await writeFile(filePath, buffer);
  return filePath;
}

export function solidFrame(
  width: number,
  height: number,
  color: Rgba,
  durationMs = 100,
  kind: FrameKind = 'hold',
): Frame {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let offset = 0; offset < data.length; offset += 4) {
    data.set(color, offset);
  }
  return { width, height, data, durationMs, kind };
}

export function gradientFrame(width: number, height: number): Frame {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      data.set([(x * 8) % 256, (y * 8) % 256, ((x + y) * 4) % 256, 255], (y * width + x) * 4);
    }
  }
  return { width, height, data, durationMs: 100, kind: 'hold' };
}

/** RGBA of one pixel. */
export const pixelAt = (frame: { width: number; data: ArrayLike<number> }, x: number, y: number): number[] => {
  const offset = (y * frame.width + x) * 4;
  return [frame.data[offset], frame.data[offset + 1], frame.data[offset + 2], frame.data[offset + 3]].map(
    (value) => value ?? -1,
  );
};

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return createPipelineConfig({
    canvas: { mode: 'fixed', width: 8, height: 8 },
    resampling: 'nearest',
    quantization: 'median-cut',
    dithering: 'none',
    sharpenStrength: 0,
    fadeSteps: 2,
    holdDurationMs: 100,
    fadeDurationMs: 40,
    output: { quality: 90, optimize: true },
    palette: { mode: 'per-frame' },
    ...overrides,
  });
}
