import type {
  DitheringMethod,
  Frame,
  IndexedFrame,
  Palette,
  QuantizationAlgorithm,
} from '@domain/slideshow/index.js';

import {
  buildBucketedHistogram,
  collectExactColors,
  flattenOnWhite,
  unpackRgb,
  type ColorEntry,
} from './color-histogram.js';
import { mapToPalette } from './dithering.js';
import { maximumCoveragePalette, medianCutPalette } from './median-cut.js';
import { octreePalette } from './octree.js';
import { MAX_PALETTE_SIZE } from './palette.js';

export interface QuantizeOptions {
  readonly quantization: QuantizationAlgorithm;
  readonly dithering: DitheringMethod;
}

const PALETTE_BUILDERS: Readonly<
  Record<QuantizationAlgorithm, (entries: readonly ColorEntry[], maxColors: number) => Palette>
> = {
  'median-cut': medianCutPalette,
  'maximum-coverage': maximumCoveragePalette,
  'fast-octree': octreePalette,
};

/**
 * Palette for a set of RGB pixels. When the pixels hold no more than
 * `maxColors` distinct colours they become the palette as-is; otherwise the
 * algorithm runs over a bucketed histogram.
 */
export function buildPalette(
  rgb: Uint8Array,
  algorithm: QuantizationAlgorithm,
  maxColors = MAX_PALETTE_SIZE,
): { palette: Palette; exact: boolean } {
  const exactColors = collectExactColors(rgb, maxColors);

  if (exactColors) {
    return { palette: exactColors.map(({ color }) => unpackRgb(color)), exact: true };
  }

  return { palette: PALETTE_BUILDERS[algorithm](buildBucketedHistogram(rgb), maxColors), exact: false };
}

/**
 * Reduces a frame to at most 256 colours. Alpha is composited onto white.
 * With a shared palette the frame is mapped onto it and marked global;
 * otherwise it gets its own local palette.
 */
export function quantize(frame: Frame, options: QuantizeOptions, sharedPalette?: Palette): IndexedFrame {
  const rgb = flattenOnWhite(frame.data);

  let palette: Palette;
  let dithering = options.dithering;

  if (sharedPalette) {
    palette = sharedPalette;
  } else {
    const built = buildPalette(rgb, options.quantization);
    palette = built.palette;
    // Exact palettes map without dithering.
    if (built.exact) {
      dithering = 'none';
    }
  }

  return {
    width: frame.width,
    height: frame.height,
    indices: mapToPalette(rgb, frame.width, frame.height, palette, dithering),
    palette,
    paletteScope: sharedPalette ? 'global' : 'local',
    durationMs: frame.durationMs,
    kind: frame.kind,
  };
}
