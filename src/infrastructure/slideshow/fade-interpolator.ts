import { sameSize, type Frame } from '@domain/slideshow/index.js';

import { DimensionMismatchError } from '@/shared/errors/pipeline.errors.js';

/**
 * Lazily yields `steps` cross-fade frames strictly between `from` and `to`.
 * Step `i` (zero-based) blends with weight `(i + 1) / (steps + 1)` toward
 * `to`, so neither endpoint is repeated. Arguments are checked eagerly.
 */
export function fadeFrames(from: Frame, to: Frame, steps: number, durationMs: number): Generator<Frame, void, undefined> {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new RangeError(`Fade step count must be a positive integer, received ${steps}`);
  }

  if (!sameSize(from, to)) {
    throw new DimensionMismatchError(from, to);
  }

  return blendSequence(from, to, steps, durationMs);
}

export function interpolate(from: Frame, to: Frame, steps: number, durationMs: number): Frame[] {
  return Array.from(fadeFrames(from, to, steps, durationMs));
}

export function blendPixels(from: Uint8ClampedArray, to: Uint8ClampedArray, weight: number): Uint8ClampedArray {
  const output = new Uint8ClampedArray(from.length);
  const inverse = 1 - weight;

  for (let index = 0; index < from.length; index += 1) {
    output[index] = Math.round((from[index] ?? 0) * inverse + (to[index] ?? 0) * weight);
  }

  return output;
}

function* blendSequence(from: Frame, to: Frame, steps: number, durationMs: number): Generator<Frame, void, undefined> {
  for (let step = 0; step < steps; step += 1) {
    const weight = (step + 1) / (steps + 1);

    yield {
      width: from.width,
      height: from.height,
      data: blendPixels(from.data, to.data, weight),
      durationMs,
      kind: 'fade',
    };
  }
}
