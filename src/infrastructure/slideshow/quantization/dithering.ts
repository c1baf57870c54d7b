import type { DitheringMethod, Palette } from '@domain/slideshow/index.js';

import { packRgb } from './color-histogram.js';

const MATCH_BUCKET_BITS = 6;

const MATCH_SHIFT = 8 - MATCH_BUCKET_BITS;

const MATCH_CENTRE = 1 << (MATCH_SHIFT - 1);

/**
 * Nearest-colour lookup by squared Euclidean distance in RGB. Palette colours
 * match exactly; any other colour resolves through the centre of its 6-bit
 * bucket, which is computed once per bucket.
 */
export class PaletteMatcher {
  private readonly exact = new Map<number, number>();

  private readonly buckets = new Int16Array(1 << (MATCH_BUCKET_BITS * 3)).fill(-1);

  public constructor(private readonly palette: Palette) {
    if (palette.length === 0) {
      throw new RangeError('Cannot match colours against an empty palette');
    }

    palette.forEach(([r, g, b], index) => {
      const key = packRgb(r, g, b);
      if (!this.exact.has(key)) {
        this.exact.set(key, index);
      }
    });
  }

  public nearest(red: number, green: number, blue: number): number {
    const exact = this.exact.get(packRgb(red, green, blue));
    if (exact !== undefined) {
      return exact;
    }

    const r = red >> MATCH_SHIFT;
    const g = green >> MATCH_SHIFT;
    const b = blue >> MATCH_SHIFT;
    const bucket = (r << (MATCH_BUCKET_BITS * 2)) | (g << MATCH_BUCKET_BITS) | b;

    const cached = this.buckets[bucket] ?? -1;
    if (cached >= 0) {
      return cached;
    }

    const index = this.search((r << MATCH_SHIFT) + MATCH_CENTRE, (g << MATCH_SHIFT) + MATCH_CENTRE, (b << MATCH_SHIFT) + MATCH_CENTRE);
    this.buckets[bucket] = index;
    return index;
  }

  public color(index: number): readonly [number, number, number] {
    return this.palette[index] ?? [0, 0, 0];
  }

  private search(red: number, green: number, blue: number): number {
    let best = 0;
    let bestDistance = Number.POSITIVE_INFINITY;

    this.palette.forEach(([r, g, b], index) => {
      const distance = (red - r) ** 2 + (green - g) ** 2 + (blue - b) ** 2;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = index;
      }
    });

    return best;
  }
}

const clampByte = (value: number): number => Math.max(0, Math.min(255, Math.round(value)));

/**
 * Maps three-byte RGB pixels to palette indices using the requested
 * dithering. Output is one index per pixel.
 */
export function mapToPalette(
  rgb: Uint8Array,
  width: number,
  height: number,
  palette: Palette,
  method: DitheringMethod,
): Uint8Array {
  const matcher = new PaletteMatcher(palette);

  switch (method) {
    case 'none':
      return mapDirect(rgb, width * height, matcher);
    case 'ordered':
      return mapOrdered(rgb, width, height, matcher, palette.length);
    case 'floyd-steinberg':
      return mapFloydSteinberg(rgb, width, height, matcher);
    default: {
      const exhaustive: never = method;
      throw new RangeError(`Unknown dithering method: ${String(exhaustive)}`);
    }
  }
}

function mapDirect(rgb: Uint8Array, pixelCount: number, matcher: PaletteMatcher): Uint8Array {
  const indices = new Uint8Array(pixelCount);

  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const offset = pixel * 3;
    indices[pixel] = matcher.nearest(rgb[offset] ?? 0, rgb[offset + 1] ?? 0, rgb[offset + 2] ?? 0);
  }

  return indices;
}

function mapFloydSteinberg(rgb: Uint8Array, width: number, height: number, matcher: PaletteMatcher): Uint8Array {
  const indices = new Uint8Array(width * height);
  const work = Float32Array.from(rgb);

  const spread = (x: number, y: number, errors: readonly number[], factor: number) => {
    if (x < 0 || x >= width || y >= height) {
      return;
    }
    const offset = (y * width + x) * 3;
    for (let channel = 0; channel < 3; channel += 1) {
      work[offset + channel] = (work[offset + channel] ?? 0) + (errors[channel] ?? 0) * factor;
    }
  };

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const pixel = y * width + x;
      const offset = pixel * 3;
      const red = clampByte(work[offset] ?? 0);
      const green = clampByte(work[offset + 1] ?? 0);
      const blue = clampByte(work[offset + 2] ?? 0);

      const index = matcher.nearest(red, green, blue);
      indices[pixel] = index;

      const [pr, pg, pb] = matcher.color(index);
      const errors = [red - pr, green - pg, blue - pb];

      spread(x + 1, y, errors, 7 / 16);
      spread(x - 1, y + 1, errors, 3 / 16);
      spread(x, y + 1, errors, 5 / 16);
      spread(x + 1, y + 1, errors, 1 / 16);
    }
  }

  return indices;
}

function buildBayerMatrix(size: number): number[][] {
  if (size === 1) {
    return [[0]];
  }

  const half = buildBayerMatrix(size / 2);
  const matrix: number[][] = Array.from({ length: size }, () => new Array<number>(size).fill(0));

  for (let y = 0; y < size / 2; y += 1) {
    for (let x = 0; x < size / 2; x += 1) {
      const value = 4 * (half[y]?.[x] ?? 0);
      const top = matrix[y];
      const bottom = matrix[y + size / 2];
      if (!top || !bottom) {
        continue;
      }
      top[x] = value;
      top[x + size / 2] = value + 2;
      bottom[x] = value + 3;
      bottom[x + size / 2] = value + 1;
    }
  }

  return matrix;
}

const BAYER_SIZE = 8;
const BAYER = buildBayerMatrix(BAYER_SIZE);

/** Threshold offset in [-0.5, 0.5) for an 8x8 Bayer cell. */
export const bayerThreshold = (x: number, y: number): number =>
  ((BAYER[y % BAYER_SIZE]?.[x % BAYER_SIZE] ?? 0) + 0.5) / (BAYER_SIZE * BAYER_SIZE) - 0.5;

function mapOrdered(
  rgb: Uint8Array,
  width: number,
  height: number,
  matcher: PaletteMatcher,
  paletteSize: number,
): Uint8Array {
  const indices = new Uint8Array(width * height);
  // Roughly the gap between neighbouring levels of an evenly spread palette.
  const amplitude = 255 / Math.max(1, Math.cbrt(paletteSize));

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const pixel = y * width + x;
      const offset = pixel * 3;
      const shift = bayerThreshold(x, y) * amplitude;

      indices[pixel] = matcher.nearest(
        clampByte((rgb[offset] ?? 0) + shift),
        clampByte((rgb[offset + 1] ?? 0) + shift),
        clampByte((rgb[offset + 2] ?? 0) + shift),
      );
    }
  }

  return indices;
}
