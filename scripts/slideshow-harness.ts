import fs from 'node:fs/promises';
import path from 'node:path';

import { CreateSlideshowCommand } from '../src/application/slideshow/commands/create-slideshow.command.js';
import type { CreateSlideshowInput } from '../src/application/slideshow/dto/create-slideshow.dto.js';
import { CreateSlideshowHandler } from '../src/application/slideshow/handlers/create-slideshow.handler.js';
import { SlideshowPipelineService } from '../src/infrastructure/slideshow/slideshow-pipeline.service.js';
import { analyzeGif } from '../src/shared/media/gifToolkit.js';

type HarnessOptions = CreateSlideshowInput & { report: boolean };

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const outputPath = path.resolve(options.outputPath);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n[slideshow-harness] cancelling after the current image...');
    controller.abort();
  });

  const handler = new CreateSlideshowHandler(new SlideshowPipelineService());
  const command = new CreateSlideshowCommand({
    sources: options.sources.map((source) => path.resolve(source)),
    outputPath,
    options: options.options,
  });

  const result = await handler.execute(command, {
    signal: controller.signal,
    listener: {
      onProgress: (processed, total) => console.log(`[slideshow-harness] ${processed}/${total} images`),
      onError: (code, message) => console.error(`[slideshow-harness] ${code}: ${message}`),
    },
  });

  if (result.status === 'cancelled') {
    console.log('[slideshow-harness] cancelled; no file written');
    process.exitCode = 130;
    return;
  }

  if (result.status === 'failed') {
    process.exitCode = 1;
    return;
  }

  const analysis = await analyzeGif(result.outputPath);

  console.log('Frames:', analysis.frameCount, `(${analysis.width}x${analysis.height})`);
  console.log('Delays (ms):', analysis.delaysMs.slice(0, 12));
  console.log('Duration:', `${analysis.durationMs} ms`, 'loop:', analysis.loopCount);
  console.log('Palette estimate:', analysis.paletteEstimate, 'local tables:', analysis.localPaletteFrames);
  console.log('Timings (ms):', {
    build: Math.round(result.metrics.buildTimeMs),
    quantize: Math.round(result.metrics.quantizeTimeMs),
    encode: Math.round(result.metrics.encodeTimeMs),
    total: Math.round(result.metrics.totalTimeMs),
  });
  console.log('File size:', formatBytes(result.metrics.outputSizeBytes));

  if (result.posterFrame) {
    const extension = options.options?.output?.poster?.format === 'jpeg' ? 'jpg' : 'png';
    const posterPath = outputPath.replace(/\.gif$/i, '') + `.poster.${extension}`;
    await fs.writeFile(posterPath, result.posterFrame);
    console.log('Poster:', posterPath);
  }

  if (options.report) {
    const reportPath = outputPath.replace(/\.gif$/i, '') + '.report.html';
    await fs.writeFile(
      reportPath,
      buildHtmlReport(path.basename(outputPath), analysis.frameCount, analysis.delaysMs, result.metrics.outputSizeBytes),
      'utf8',
    );
    console.log('Report:', reportPath);
  }
}

function parseArgs(argv: string[]): HarnessOptions {
  const sources: string[] = [];
  let outputPath: string | undefined;
  let report = false;
  const slideshow: NonNullable<CreateSlideshowInput['options']> = {};
  const output: { quality?: number; optimize?: boolean; poster?: { format: 'png' | 'jpeg' } } = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    const next = argv[i + 1] ?? '';

    if (!arg.startsWith('--')) {
      sources.push(arg);
      continue;
    }

    switch (arg) {
      case '--out':
        outputPath = next;
        i += 1;
        break;
      case '--size': {
        const [width, height] = next.split('x').map((value) => Number.parseInt(value, 10));
        slideshow.canvas = { mode: 'fixed', width: width ?? Number.NaN, height: height ?? Number.NaN };
        i += 1;
        break;
      }
      case '--preserve':
        slideshow.canvas = { mode: 'preserve' };
        break;
      case '--steps':
        slideshow.fadeSteps = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--hold':
        slideshow.holdDurationMs = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--fade':
        slideshow.fadeDurationMs = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--resample':
        slideshow.resampling = parseChoice(next, ['lanczos', 'bicubic', 'bilinear', 'nearest'], arg);
        i += 1;
        break;
      case '--quantize':
        slideshow.quantization = parseChoice(next, ['median-cut', 'maximum-coverage', 'fast-octree'], arg);
        i += 1;
        break;
      case '--dither':
        slideshow.dithering = parseChoice(next, ['floyd-steinberg', 'ordered', 'none'], arg);
        i += 1;
        break;
      case '--sharpen':
        slideshow.sharpenStrength = Number.parseFloat(next);
        i += 1;
        break;
      case '--global-palette':
        slideshow.palette = { mode: 'global' };
        break;
      case '--aspect':
        slideshow.crop = { type: 'aspect', ratio: parseChoice(next, ['16:9', '4:3', '1:1', '9:16', '21:9'], arg) };
        i += 1;
        break;
      case '--quality':
        output.quality = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--no-optimize':
        output.optimize = false;
        break;
      case '--poster':
        output.poster = { format: parseChoice(next, ['png', 'jpeg'], arg) };
        i += 1;
        break;
      case '--report':
        report = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (sources.length === 0 || !outputPath) {
    throw new Error(
      'Usage: npm run harness -- <image...> --out <file.gif> [--size 640x360 | --preserve] [--steps 15] [--hold 1000] [--fade 50] [--global-palette] [--poster png]',
    );
  }

  return { sources, outputPath, options: { ...slideshow, output }, report };
}

function parseChoice<const T extends string>(value: string, choices: readonly T[], flag: string): T {
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`${flag} expects one of ${choices.join(', ')}`);
  }
  return match;
}

function formatBytes(size: number): string {
  if (size === 0) return '0 B';
  const k = 1024;
  const units = ['B', 'KB', 'MB', 'GB'];
  const exponent = Math.min(Math.floor(Math.log(size) / Math.log(k)), units.length - 1);
  const value = size / k ** exponent;
  return `${value.toFixed(2)} ${units[exponent]}`;
}

function buildHtmlReport(gifName: string, frameCount: number, delaysMs: number[], sizeBytes: number): string {
  const rows = delaysMs.map((delay, index) => `<tr><td>${index}</td><td>${delay}</td></tr>`).join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <title>Slideshow Harness Report</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; padding: 2rem; background: #0f172a; color: #e2e8f0; }
    .media-frame { display: flex; justify-content: center; background: #020617; border-radius: 10px; padding: 0.5rem; }
    img { max-width: 100%; border-radius: 8px; }
    table { border-collapse: collapse; margin-top: 1rem; }
    th, td { border-bottom: 1px solid rgba(148, 163, 184, 0.2); padding: 0.25rem 0.75rem; text-align: left; }
  </style>
</head>
<body>
  <h1>Slideshow Harness Report</h1>
  <div class="media-frame"><img src="${gifName}" alt="Generated GIF" /></div>
  <p>${frameCount} frames, ${formatBytes(sizeBytes)}</p>
  <table><thead><tr><th>Frame</th><th>Delay (ms)</th></tr></thead><tbody>${rows}</tbody></table>
</body>
</html>`;
}

main().catch((error) => {
  console.error('[slideshow-harness] fatal:', error);
  process.exitCode = 1;
});
