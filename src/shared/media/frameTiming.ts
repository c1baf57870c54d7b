import { roundTo, toGifDelayMs } from './rounding.js';

export interface FrameTimingStats {
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  stdDeviationMs: number;
  fps: number;
}

export interface SlideshowDelays {
  readonly holdDelayMs: number;
  readonly fadeDelayMs: number;
}

export function calculateFrameTimingStats(delaysMs: number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const min = Math.min(...delaysMs);
  const max = Math.max(...delaysMs);
  const variance =
    delaysMs.reduce((acc, delay) => acc + (delay - average) ** 2, 0) / delaysMs.length;
  const stdDeviation = Math.sqrt(variance);
  const fps = average > 0 ? 1000 / average : 0;

  return {
    averageDelayMs: roundTo(average, 3),
    minDelayMs: roundTo(min, 3),
    maxDelayMs: roundTo(max, 3),
    stdDeviationMs: roundTo(stdDeviation, 3),
    fps: roundTo(fps, 3),
  };
}

/**
 * Hold frames keep their full duration; the fade duration is split evenly
 * across the fade steps. Both are rounded to the GIF delay unit.
 */
export function planSlideshowDelays(
  holdDurationMs: number,
  fadeDurationMs: number,
  fadeSteps: number,
): SlideshowDelays {
  if (fadeSteps < 1) {
    throw new RangeError('Fade step count must be at least 1');
  }

  return {
    holdDelayMs: toGifDelayMs(holdDurationMs),
    fadeDelayMs: toGifDelayMs(fadeDurationMs / fadeSteps),
  };
}
