import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import sharp from 'sharp';

import {
  CreateSlideshowCommand,
  CreateSlideshowHandler,
} from '@/application/slideshow/index.js';
import { SlideshowPipelineService } from '@/infrastructure/slideshow/index.js';
import { analyzeGif } from '@/shared/media/gifToolkit.js';

const SLIDES = [
  { name: 'sunrise.png', background: { r: 244, g: 162, b: 97 } },
  { name: 'lagoon.png', background: { r: 42, g: 157, b: 143 } },
  { name: 'dusk.png', background: { r: 38, g: 70, b: 83 } },
] as const;

async function renderSlides(directory: string): Promise<string[]> {
  return Promise.all(
    SLIDES.map(async ({ name, background }) => {
      const filePath = path.join(directory, name);
      await sharp({ create: { width: 640, height: 360, channels: 3, background } }).png().toFile(filePath);
      return filePath;
    }),
  );
}

async function main() {
  const workDir = await mkdtemp(path.join(tmpdir(), 'slideshow-example-'));
  const outDir = path.resolve('examples-output');
  await mkdir(outDir, { recursive: true });

  try {
    const sources = await renderSlides(workDir);
    const handler = new CreateSlideshowHandler(new SlideshowPipelineService());

    const command = new CreateSlideshowCommand({
      sources,
      outputPath: path.join(outDir, 'three-slides.gif'),
      options: {
        canvas: { mode: 'fixed', width: 320, height: 180 },
        fadeSteps: 10,
        holdDurationMs: 1_000,
        fadeDurationMs: 200,
        palette: { mode: 'global' },
        output: { poster: { format: 'png' } },
      },
    });

    const result = await handler.execute(command, {
      listener: {
        onProgress: (processed, total) => console.log(`Processed ${processed}/${total} slides`),
      },
    });

    if (result.status !== 'completed') {
      throw new Error(`Slideshow did not complete: ${JSON.stringify(result)}`);
    }

    const analysis = await analyzeGif(result.outputPath);
    console.log('Slideshow written to', result.outputPath);
    console.log('Frames', analysis.frameCount, 'delays', analysis.delaysMs);
    console.log('Pipeline metrics', result.metrics);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

main().catch((error) => {
  console.error('Failed to render sample slideshow', error);
  process.exitCode = 1;
});
