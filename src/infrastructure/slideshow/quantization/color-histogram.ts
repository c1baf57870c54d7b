import type { PaletteColor } from '@domain/slideshow/index.js';

/** A distinct colour, packed as 0xRRGGBB, with its pixel count. */
export interface ColorEntry {
  readonly color: number;
  readonly count: number;
}

export const packRgb = (r: number, g: number, b: number): number => (r << 16) | (g << 8) | b;

export const unpackRgb = (color: number): PaletteColor => [(color >> 16) & 0xff, (color >> 8) & 0xff, color & 0xff];

/**
 * Composites RGBA onto opaque white and drops the alpha channel. Output is
 * three bytes per pixel.
 */
export function flattenOnWhite(rgba: Uint8ClampedArray | Uint8Array): Uint8Array {
  const pixelCount = Math.floor(rgba.length / 4);
  const rgb = new Uint8Array(pixelCount * 3);

  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const source = pixel * 4;
    const target = pixel * 3;
    const alpha = rgba[source + 3] ?? 255;

    if (alpha === 255) {
      rgb[target] = rgba[source] ?? 0;
      rgb[target + 1] = rgba[source + 1] ?? 0;
      rgb[target + 2] = rgba[source + 2] ?? 0;
      continue;
    }

    const background = 255 * (255 - alpha);
    rgb[target] = Math.round(((rgba[source] ?? 0) * alpha + background) / 255);
    rgb[target + 1] = Math.round(((rgba[source + 1] ?? 0) * alpha + background) / 255);
    rgb[target + 2] = Math.round(((rgba[source + 2] ?? 0) * alpha + background) / 255);
  }

  return rgb;
}

/**
 * Distinct colours in first-seen order, or null as soon as there are more
 * than `limit` of them.
 */
export function collectExactColors(rgb: Uint8Array, limit: number): ColorEntry[] | null {
  const counts = new Map<number, number>();

  for (let offset = 0; offset + 2 < rgb.length; offset += 3) {
    const key = packRgb(rgb[offset] ?? 0, rgb[offset + 1] ?? 0, rgb[offset + 2] ?? 0);
    const count = counts.get(key);
    if (count === undefined && counts.size === limit) {
      return null;
    }
    counts.set(key, (count ?? 0) + 1);
  }

  return Array.from(counts, ([color, count]) => ({ color, count }));
}

/** Bits kept per channel when colours are bucketed. */
export const HISTOGRAM_BUCKET_BITS = 5;

const BUCKET_SHIFT = 8 - HISTOGRAM_BUCKET_BITS;

/**
 * Histogram over 5-bit-per-channel buckets. Each entry is the mean colour of
 * the pixels in its bucket, in bucket order.
 */
export function buildBucketedHistogram(rgb: Uint8Array): ColorEntry[] {
  const bucketCount = 1 << (HISTOGRAM_BUCKET_BITS * 3);
  const counts = new Uint32Array(bucketCount);
  const sums = new Float64Array(bucketCount * 3);

  for (let offset = 0; offset + 2 < rgb.length; offset += 3) {
    const red = rgb[offset] ?? 0;
    const green = rgb[offset + 1] ?? 0;
    const blue = rgb[offset + 2] ?? 0;
    const bucket =
      ((red >> BUCKET_SHIFT) << (HISTOGRAM_BUCKET_BITS * 2)) |
      ((green >> BUCKET_SHIFT) << HISTOGRAM_BUCKET_BITS) |
      (blue >> BUCKET_SHIFT);

    counts[bucket] = (counts[bucket] ?? 0) + 1;
    sums[bucket * 3] = (sums[bucket * 3] ?? 0) + red;
    sums[bucket * 3 + 1] = (sums[bucket * 3 + 1] ?? 0) + green;
    sums[bucket * 3 + 2] = (sums[bucket * 3 + 2] ?? 0) + blue;
  }

  const entries: ColorEntry[] = [];
  counts.forEach((count, bucket) => {
    if (count === 0) {
      return;
    }
    entries.push({
      color: packRgb(
        Math.round((sums[bucket * 3] ?? 0) / count),
        Math.round((sums[bucket * 3 + 1] ?? 0) / count),
        Math.round((sums[bucket * 3 + 2] ?? 0) / count),
      ),
      count,
    });
  });

  return entries;
}

/** Count-weighted mean of the entries, rounded per channel. */
export function averageColor(entries: readonly ColorEntry[]): PaletteColor {
  let red = 0;
  let green = 0;
  let blue = 0;
  let total = 0;

  for (const { color, count } of entries) {
    red += ((color >> 16) & 0xff) * count;
    green += ((color >> 8) & 0xff) * count;
    blue += (color & 0xff) * count;
    total += count;
  }

  if (total === 0) {
    return [0, 0, 0];
  }

  return [Math.round(red / total), Math.round(green / total), Math.round(blue / total)];
}
