import type { CropSpec } from './crop-region.js';
import type { Palette } from './frame.js';

export type ResamplingFilter = 'lanczos' | 'bicubic' | 'bilinear' | 'nearest';

export type QuantizationAlgorithm = 'median-cut' | 'maximum-coverage' | 'fast-octree';

export type DitheringMethod = 'floyd-steinberg' | 'ordered' | 'none';

export type CanvasSpec =
  | { readonly mode: 'fixed'; readonly width: number; readonly height: number }
  | { readonly mode: 'preserve' };

/**
 * Per-frame palettes follow each frame's colours closely but may flicker
 * between dissimilar frames; a global palette is stable across the whole GIF.
 */
export type PaletteStrategy =
  | { readonly mode: 'per-frame' }
  | { readonly mode: 'global'; readonly palette?: Palette };

export type PosterFormat = 'png' | 'jpeg';

export interface OutputSettings {
  /** JPEG-style quality, only used when a poster frame is re-encoded as JPEG. */
  readonly quality: number;
  /** Drop unreferenced entries from local colour tables. */
  readonly optimize: boolean;
  readonly poster?: { readonly format: PosterFormat };
}

export interface PipelineConfig {
  readonly canvas: CanvasSpec;
  readonly resampling: ResamplingFilter;
  readonly quantization: QuantizationAlgorithm;
  readonly dithering: DitheringMethod;
  readonly sharpenStrength: number;
  readonly fadeSteps: number;
  readonly holdDurationMs: number;
  readonly fadeDurationMs: number;
  readonly output: OutputSettings;
  readonly palette: PaletteStrategy;
  readonly crop?: CropSpec;
}

export const SHARPEN_STRENGTH_RANGE = { min: 0, max: 2 } as const;

export function createPipelineConfig(config: PipelineConfig): PipelineConfig {
  if (config.canvas.mode === 'fixed' && (config.canvas.width <= 0 || config.canvas.height <= 0)) {
    throw new RangeError('Canvas dimensions must be positive');
  }

  if (!Number.isInteger(config.fadeSteps) || config.fadeSteps < 1) {
    throw new RangeError('Fade step count must be a positive integer');
  }

  if (config.holdDurationMs <= 0 || config.fadeDurationMs <= 0) {
    throw new RangeError('Hold and fade durations must be positive');
  }

  if (
    config.sharpenStrength < SHARPEN_STRENGTH_RANGE.min ||
    config.sharpenStrength > SHARPEN_STRENGTH_RANGE.max
  ) {
    throw new RangeError(
      `Sharpening strength must be between ${SHARPEN_STRENGTH_RANGE.min} and ${SHARPEN_STRENGTH_RANGE.max}`,
    );
  }

  if (config.palette.mode === 'global' && config.palette.palette) {
    const size = config.palette.palette.length;
    if (size === 0 || size > 256) {
      throw new RangeError('A shared palette must hold between 1 and 256 colours');
    }
  }

  return Object.freeze({
    ...config,
    canvas: Object.freeze({ ...config.canvas }),
    output: Object.freeze({ ...config.output }),
    palette: Object.freeze({ ...config.palette }),
  });
}
