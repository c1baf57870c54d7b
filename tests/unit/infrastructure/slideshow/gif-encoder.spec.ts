import fs from 'node:fs/promises';
import path from 'node:path';

import type { IndexedFrame, Palette } from '@domain/slideshow/index.js';
import { decompressFrames, parseGIF } from 'gifuct-js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { GifEncoder } from '@/infrastructure/slideshow/gif-encoder.js';
import { DimensionMismatchError, EmptyInputError, EncodingError } from '@/shared/errors/pipeline.errors.js';
import { analyzeGif } from '@/shared/media/gifToolkit.js';

import { createTempDir, testConfig } from '../../../support/fixtures.js';

const fourColors: Palette = [
  [255, 0, 0],
  [0, 255, 0],
  [0, 0, 255],
  [255, 255, 255],
];

const indexedFrame = (overrides: Partial<IndexedFrame> = {}): IndexedFrame => ({
  width: 2,
  height: 2,
  indices: new Uint8Array([0, 1, 1, 0]),
  palette: fourColors,
  paletteScope: 'local',
  durationMs: 1_000,
  kind: 'hold',
  ...overrides,
});

describe('GifEncoder', () => {
  let directory: string;
  const encoder = new GifEncoder();

  beforeEach(async () => {
    directory = await createTempDir('gif-encoder');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('writes a looping single-frame GIF', async () => {
    const outputPath = path.join(directory, 'single.gif');

    const result = await encoder.encode([indexedFrame()], testConfig(), outputPath);

    expect(result.status).toBe('completed');
    expect(result.frameCount).toBe(1);
    expect(result.outputPath).toBe(outputPath);

    const analysis = await analyzeGif(outputPath);
    expect(analysis.frameCount).toBe(1);
    expect(analysis.width).toBe(2);
    expect(analysis.delaysMs).toEqual([1_000]);
    expect(analysis.loopCount).toBe(0);
    expect(analysis.disposalModes).toEqual([2]);

    const { size } = await fs.stat(outputPath);
    expect(result.metrics.outputSizeBytes).toBe(size);
    expect(await fs.readdir(directory)).toEqual(['single.gif']);
  });

  it('refuses an empty frame list', async () => {
    await expect(encoder.encode([], testConfig(), path.join(directory, 'empty.gif'))).rejects.toBeInstanceOf(
      EmptyInputError,
    );
    expect(await fs.readdir(directory)).toEqual([]);
  });

  it('reports an unwritable destination as an encoding failure', async () => {
    const outputPath = path.join(directory, 'missing', 'out.gif');

    await expect(encoder.encode([indexedFrame()], testConfig(), outputPath)).rejects.toBeInstanceOf(EncodingError);
    expect(await fs.readdir(directory)).toEqual([]);
  });

  it('removes the partial file when a session is aborted', async () => {
    const outputPath = path.join(directory, 'aborted.gif');
    const session = await encoder.open(outputPath, { width: 2, height: 2 }, testConfig());

    await session.write(indexedFrame());
    expect(session.framesWritten).toBe(1);
    await session.abort();
    await session.abort();

    expect(await fs.readdir(directory)).toEqual([]);
  });

  it('finishing a session without frames fails and leaves nothing behind', async () => {
    const session = await encoder.open(path.join(directory, 'none.gif'), { width: 2, height: 2 }, testConfig());

    await expect(session.finish()).rejects.toBeInstanceOf(EmptyInputError);
    expect(await fs.readdir(directory)).toEqual([]);
  });

  it('rejects frames that do not match the canvas', async () => {
    const session = await encoder.open(path.join(directory, 'sized.gif'), { width: 4, height: 4 }, testConfig());

    await expect(session.write(indexedFrame())).rejects.toBeInstanceOf(DimensionMismatchError);
    await session.abort();
  });

  it('keeps the write error when removing the partial file fails', async () => {
    const local = new GifEncoder();
    const openSession = local.open.bind(local);
    const abort = vi.fn();
    vi.spyOn(local, 'open').mockImplementation(async (outputPath, size, settings) => {
      const session = await openSession(outputPath, size, settings);
      return {
        get framesWritten() {
          return session.framesWritten;
        },
        write: (frame: IndexedFrame) => session.write(frame),
        finish: () => session.finish(),
        abort: async () => {
          abort();
          await session.abort();
          throw new Error('disk gone');
        },
      };
    });
    const frames = [indexedFrame(), indexedFrame({ width: 1, height: 4 })];

    await expect(local.encode(frames, testConfig(), path.join(directory, 'mixed.gif'))).rejects.toBeInstanceOf(
      DimensionMismatchError,
    );
    expect(abort).toHaveBeenCalledTimes(1);
  });

  it('keeps the empty-session error when removing the partial file fails', async () => {
    const session = await encoder.open(path.join(directory, 'none.gif'), { width: 2, height: 2 }, testConfig());
    const abort = session.abort.bind(session);
    const failingAbort = vi.spyOn(session, 'abort').mockImplementation(async () => {
      await abort();
      throw new Error('disk gone');
    });

    await expect(session.finish()).rejects.toBeInstanceOf(EmptyInputError);
    expect(failingAbort).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(directory)).toEqual([]);
  });

  it('keeps frames on a shared palette in the global colour table', async () => {
    const outputPath = path.join(directory, 'global.gif');
    const frames = [0, 1, 2].map((offset) =>
      indexedFrame({
        paletteScope: 'global',
        indices: new Uint8Array([offset, offset, 3, 3]),
        durationMs: offset === 1 ? 20 : 1_000,
        kind: offset === 1 ? 'fade' : 'hold',
      }),
    );

    await encoder.encode(frames, testConfig(), outputPath);

    const analysis = await analyzeGif(outputPath);
    expect(analysis.frameCount).toBe(3);
    expect(analysis.delaysMs).toEqual([1_000, 20, 1_000]);
    expect(analysis.hasGlobalPalette).toBe(true);
    expect(analysis.localPaletteFrames).toBe(0);
  });

  it.each([
    [true, 2],
    [false, 4],
  ])('with optimize=%s writes a colour table of %i entries', async (optimize, tableSize) => {
    const outputPath = path.join(directory, `optimize-${String(optimize)}.gif`);
    const config = testConfig({ output: { quality: 90, optimize } });

    await encoder.encode([indexedFrame()], config, outputPath);

    const bytes = await fs.readFile(outputPath);
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    const [frame] = decompressFrames(parseGIF(copy), true);
    expect(frame?.colorTable).toHaveLength(tableSize);
  });
});
