import { promises as fs } from 'node:fs';

import { decompressFrames, parseGIF, type ParsedFrame, type ParsedGif } from 'gifuct-js';

import { calculateFrameTimingStats, type FrameTimingStats } from './frameTiming.js';
import { roundTo } from './rounding.js';

const NETSCAPE_APPLICATION_ID = 'NETSCAPE';

export interface GifAnalysis {
  width: number;
  height: number;
  frameCount: number;
  durationMs: number;
  delaysMs: number[];
  timing: FrameTimingStats;
  paletteEstimate: number;
  hasTransparency: boolean;
  disposalModes: number[];
  /** 0 means the animation loops forever; null when no loop block is present. */
  loopCount: number | null;
  hasGlobalPalette: boolean;
  localPaletteFrames: number;
}

const DEFAULT_SAMPLE_STRIDE = 4;

export async function analyzeGif(input: string | Buffer, sampleStride = DEFAULT_SAMPLE_STRIDE): Promise<GifAnalysis> {
  const buffer = await loadGifBuffer(input);
  const gif = parseGifBuffer(buffer);
  const frames = decompressFrames(gif, true);
  const delaysMs = frames.map((frame) => frame.delay);
  const durationMs = delaysMs.reduce((total, delay) => total + delay, 0);
  const disposalModes = Array.from(new Set(frames.map((frame) => frame.disposalType ?? 0))).sort(
    (a, b) => a - b,
  );

  return {
    width: gif.lsd.width,
    height: gif.lsd.height,
    frameCount: frames.length,
    durationMs: roundTo(durationMs, 3),
    delaysMs,
    timing: calculateFrameTimingStats(delaysMs),
    paletteEstimate: estimatePaletteSize(frames, sampleStride),
    hasTransparency: frames.some((frame) => frameHasTransparency(frame, sampleStride)),
    disposalModes,
    loopCount: extractLoopCount(gif),
    hasGlobalPalette: gif.lsd.gct.exists,
    localPaletteFrames: gif.frames.filter((block) => 'image' in block && block.image.descriptor.lct.exists).length,
  };
}

async function loadGifBuffer(input: string | Buffer): Promise<Buffer> {
  if (typeof input === 'string') {
    return fs.readFile(input);
  }

  if (Buffer.isBuffer(input)) {
    return input;
  }

  throw new TypeError('GIF input must be a file path or Buffer');
}

function parseGifBuffer(buffer: Buffer): ParsedGif {
  const arrayBuffer = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(arrayBuffer).set(buffer);
  return parseGIF(arrayBuffer);
}

function extractLoopCount(gif: ParsedGif): number | null {
  for (const block of gif.frames) {
    if (!('application' in block) || !block.application.id.startsWith(NETSCAPE_APPLICATION_ID)) {
      continue;
    }

    const { blocks } = block.application;
    if (blocks.length >= 3 && blocks[0] === 1) {
      return (blocks[1] ?? 0) | ((blocks[2] ?? 0) << 8);
    }
  }

  return null;
}

function estimatePaletteSize(frames: ParsedFrame[], stride: number): number {
  const colors = new Set<number>();

  for (const frame of frames) {
    const patch = frame.patch;

    for (let index = 0; index < patch.length; index += 4 * stride) {
      colors.add((patch[index] << 16) | (patch[index + 1] << 8) | patch[index + 2]);
    }
  }

  return colors.size;
}

function frameHasTransparency(frame: ParsedFrame, stride: number): boolean {
  const patch = frame.patch;

  for (let index = 3; index < patch.length; index += 4 * stride) {
    if (patch[index] < 255) {
      return true;
    }
  }

  return false;
}
