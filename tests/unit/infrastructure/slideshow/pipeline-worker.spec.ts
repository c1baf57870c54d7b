import fs from 'node:fs/promises';
import path from 'node:path';

import {
  SlideshowJob,
  type Frame,
  type IndexedFrame,
  type Palette,
  type PipelineConfig,
  type PipelineState,
} from '@domain/slideshow/index.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InlineFrameQuantizer, type FrameQuantizer } from '@/infrastructure/slideshow/frame-quantizer-pool.js';
import { GifEncoder } from '@/infrastructure/slideshow/gif-encoder.js';
import { PipelineWorker } from '@/infrastructure/slideshow/pipeline-worker.js';
import type { QuantizeOptions } from '@/infrastructure/slideshow/quantization/quantizer.js';
import { analyzeGif } from '@/shared/media/gifToolkit.js';

import { createTempDir, testConfig, writeSolidPng } from '../../../support/fixtures.js';

const COLORS = [
  [220, 40, 40],
  [40, 220, 40],
  [40, 40, 220],
  [220, 220, 40],
  [40, 220, 220],
] as const;

describe('PipelineWorker', () => {
  let sourceDir: string;
  let outputDir: string;

  beforeEach(async () => {
    sourceDir = await createTempDir('pipeline-sources');
    outputDir = await createTempDir('pipeline-output');
  });

  afterEach(async () => {
    await fs.rm(sourceDir, { recursive: true, force: true });
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  const writeSources = (count: number, size = 8): Promise<string[]> =>
    Promise.all(
      COLORS.slice(0, count).map((color, index) => writeSolidPng(sourceDir, `slide-${index}.png`, size, size, color)),
    );

  const createJob = (sources: string[], config: PipelineConfig, name = 'out.gif'): SlideshowJob =>
    SlideshowJob.create({
      id: 'job-test',
      sources,
      outputPath: path.join(outputDir, name),
      config,
      createdAt: new Date(0),
    });

  it('writes holds and fades with their own delays', async () => {
    const sources = await writeSources(3);
    const job = createJob(sources, testConfig({ fadeSteps: 10, holdDurationMs: 1_000, fadeDurationMs: 200 }));
    const onComplete = vi.fn();

    const result = await new PipelineWorker().run(job, { listener: { onComplete } });

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;
    expect(result.frameCount).toBe(23);
    expect(result.posterFrame).toBeUndefined();
    expect(onComplete).toHaveBeenCalledWith(job.outputPath, 23);

    const analysis = await analyzeGif(result.outputPath);
    expect(analysis.frameCount).toBe(23);
    expect(analysis.width).toBe(8);
    expect(analysis.height).toBe(8);
    expect(analysis.loopCount).toBe(0);
    analysis.delaysMs.forEach((delay, index) => {
      expect(delay).toBe([0, 11, 22].includes(index) ? 1_000 : 20);
    });
    expect(result.metrics.outputSizeBytes).toBe((await fs.stat(result.outputPath)).size);
    expect(result.metrics.averageFrameProcessingMs).toBeGreaterThanOrEqual(0);
  });

  it.each([
    [1, 2, 1],
    [2, 2, 4],
    [4, 3, 13],
  ])('with %i images and %i steps writes %i frames', async (images, fadeSteps, expected) => {
    const job = createJob(await writeSources(images), testConfig({ fadeSteps }));

    const result = await new PipelineWorker().run(job);

    expect(result).toMatchObject({ status: 'completed', frameCount: expected });
  });

  it('reports progress once per image and moves through its states', async () => {
    const worker = new PipelineWorker();
    const job = createJob(await writeSources(3), testConfig());
    const seenStates: PipelineState[] = [];
    const onProgress = vi.fn(() => {
      seenStates.push(worker.state);
    });

    expect(worker.state).toBe('idle');
    await worker.run(job, { listener: { onProgress } });

    expect(onProgress.mock.calls).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(seenStates).toEqual(['running', 'running', 'running']);
    expect(worker.state).toBe('completed');
  });

  it('stops at the next image boundary when cancelled and leaves no file', async () => {
    const worker = new PipelineWorker();
    const job = createJob(await writeSources(5), testConfig());
    const onCancelled = vi.fn();
    const onProgress = vi.fn((processed: number) => {
      if (processed === 2) {
        worker.cancel();
      }
    });

    const result = await worker.run(job, { listener: { onProgress, onCancelled } });

    expect(result).toEqual({ status: 'cancelled' });
    expect(worker.state).toBe('cancelled');
    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onCancelled).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('cancels before any work when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const onProgress = vi.fn();

    const result = await new PipelineWorker().run(createJob(await writeSources(2), testConfig()), {
      signal: controller.signal,
      listener: { onProgress },
    });

    expect(result).toEqual({ status: 'cancelled' });
    expect(onProgress).not.toHaveBeenCalled();
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('keeps a completed result when onComplete throws', async () => {
    const worker = new PipelineWorker();
    const job = createJob(await writeSources(2), testConfig());
    const onError = vi.fn();
    const onComplete = vi.fn(() => {
      throw new Error('listener broke');
    });

    const result = await worker.run(job, { listener: { onComplete, onError } });

    expect(result).toMatchObject({ status: 'completed', frameCount: 4 });
    expect(worker.state).toBe('completed');
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onError).not.toHaveBeenCalled();
    expect(await fs.readdir(outputDir)).toEqual(['out.gif']);
  });

  it('keeps a failed result when onError throws', async () => {
    const worker = new PipelineWorker();
    const onError = vi.fn(() => {
      throw new Error('listener broke');
    });

    const result = await worker.run(createJob([], testConfig()), { listener: { onError } });

    expect(result).toMatchObject({ status: 'failed', error: { code: 'EMPTY_INPUT' } });
    expect(worker.state).toBe('failed');
  });

  it('refuses to run twice', async () => {
    const worker = new PipelineWorker();
    const job = createJob(await writeSources(1), testConfig());

    await worker.run(job);

    await expect(worker.run(job)).rejects.toThrow('Pipeline worker already completed');
  });

  describe('failures', () => {
    it('fails with EMPTY_INPUT when there are no images', async () => {
      const onError = vi.fn();

      const result = await new PipelineWorker().run(createJob([], testConfig()), { listener: { onError } });

      expect(result).toMatchObject({ status: 'failed', error: { code: 'EMPTY_INPUT' } });
      expect(onError).toHaveBeenCalledWith('EMPTY_INPUT', expect.any(String));
    });

    it('fails with UNSUPPORTED_FORMAT for an unreadable source', async () => {
      const [first] = await writeSources(1);
      const sources = [first ?? '', path.join(sourceDir, 'missing.png')];

      const worker = new PipelineWorker();
      const result = await worker.run(createJob(sources, testConfig()));

      expect(result).toMatchObject({ status: 'failed', error: { code: 'UNSUPPORTED_FORMAT' } });
      expect(worker.state).toBe('failed');
      expect(await fs.readdir(outputDir)).toEqual([]);
    });

    it('fails with INVALID_CROP for a region outside the image', async () => {
      const config = testConfig({ crop: { type: 'region', region: { left: 0, top: 0, right: 9, bottom: 8 } } });

      const result = await new PipelineWorker().run(createJob(await writeSources(2), config));

      expect(result).toMatchObject({ status: 'failed', error: { code: 'INVALID_CROP' } });
      expect(await fs.readdir(outputDir)).toEqual([]);
    });

    it('reports the original error when discarding the partial file also fails', async () => {
      const encoder = new GifEncoder();
      const openSession = encoder.open.bind(encoder);
      const abort = vi.fn();
      vi.spyOn(encoder, 'open').mockImplementation(async (outputPath, size, settings) => {
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
      const config = testConfig({ crop: { type: 'region', region: { left: 0, top: 0, right: 9, bottom: 8 } } });
      const worker = new PipelineWorker({ encoder });

      const result = await worker.run(createJob(await writeSources(2), config));

      expect(result).toMatchObject({ status: 'failed', error: { code: 'INVALID_CROP' } });
      expect(worker.state).toBe('failed');
      expect(abort).toHaveBeenCalledTimes(1);
    });

    it('fails with ENCODING_FAILED when the output directory is missing', async () => {
      const job = createJob(await writeSources(2), testConfig(), path.join('missing', 'out.gif'));

      const result = await new PipelineWorker().run(job);

      expect(result).toMatchObject({ status: 'failed', error: { code: 'ENCODING_FAILED' } });
    });
  });

  describe('quantizer', () => {
    const stubQuantizer = (failAt?: number) => {
      const inline = new InlineFrameQuantizer();
      let calls = 0;
      const quantizer: FrameQuantizer = {
        concurrency: 3,
        quantize: vi.fn(async (frame: Frame, options: QuantizeOptions, sharedPalette?: Palette) => {
          calls += 1;
          if (calls === failAt) {
            throw new Error('quantizer crashed');
          }
          return inline.quantize(frame, options, sharedPalette);
        }),
        destroy: vi.fn(async () => {}),
      };
      return quantizer;
    };

    it('quantizes every frame through the injected quantizer and releases it', async () => {
      const quantizer = stubQuantizer();
      const job = createJob(await writeSources(3), testConfig({ fadeSteps: 4 }));

      const result = await new PipelineWorker({ createQuantizer: () => quantizer }).run(job);

      expect(result).toMatchObject({ status: 'completed', frameCount: 11 });
      expect(quantizer.quantize).toHaveBeenCalledTimes(11);
      expect(quantizer.destroy).toHaveBeenCalledTimes(1);
      if (result.status !== 'completed') return;
      const analysis = await analyzeGif(result.outputPath);
      analysis.delaysMs.forEach((delay, index) => {
        expect(delay).toBe([0, 5, 10].includes(index) ? 100 : 10);
      });
    });

    it('fails the run and releases the quantizer when a frame cannot be quantized', async () => {
      const quantizer = stubQuantizer(3);
      const job = createJob(await writeSources(3), testConfig());

      const result = await new PipelineWorker({ createQuantizer: () => quantizer }).run(job);

      expect(result).toMatchObject({
        status: 'failed',
        error: { code: 'UNEXPECTED_ERROR', message: 'quantizer crashed' },
      });
      expect(quantizer.destroy).toHaveBeenCalledTimes(1);
      expect(await fs.readdir(outputDir)).toEqual([]);
    });
  });

  it('keeps every frame on one colour table with a global palette', async () => {
    const job = createJob(await writeSources(3), testConfig({ palette: { mode: 'global' } }));

    const result = await new PipelineWorker().run(job);
    if (result.status !== 'completed') throw new Error(`unexpected ${result.status}`);

    const analysis = await analyzeGif(result.outputPath);
    expect(analysis.hasGlobalPalette).toBe(true);
    expect(analysis.localPaletteFrames).toBe(0);
  });

  it('uses a supplied palette as the global colour table', async () => {
    const palette: Palette = COLORS.slice(0, 3);
    const job = createJob(await writeSources(3), testConfig({ palette: { mode: 'global', palette } }));

    const result = await new PipelineWorker().run(job);

    expect(result).toMatchObject({ status: 'completed', frameCount: 7 });
  });

  it('sizes a preserved canvas to the largest image', async () => {
    const small = await writeSolidPng(sourceDir, 'small.png', 4, 6, [10, 10, 10]);
    const large = await writeSolidPng(sourceDir, 'large.png', 8, 5, [200, 200, 200]);
    const job = createJob([small, large], testConfig({ canvas: { mode: 'preserve' } }));

    const result = await new PipelineWorker().run(job);
    if (result.status !== 'completed') throw new Error(`unexpected ${result.status}`);

    const analysis = await analyzeGif(result.outputPath);
    expect(analysis.width).toBe(8);
    expect(analysis.height).toBe(6);
  });

  it('returns a poster frame of the first image', async () => {
    const config = testConfig({ output: { quality: 90, optimize: true, poster: { format: 'png' } } });
    const job = createJob(await writeSources(2), config);

    const result = await new PipelineWorker().run(job);
    if (result.status !== 'completed') throw new Error(`unexpected ${result.status}`);

    expect(Array.from(result.posterFrame?.subarray(0, 4) ?? [])).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });
});
