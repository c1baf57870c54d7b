import type { Palette } from '@domain/slideshow/index.js';

import { averageColor, type ColorEntry } from './color-histogram.js';

type Channel = 0 | 1 | 2;

interface ColorBox {
  readonly entries: readonly ColorEntry[];
  readonly min: readonly [number, number, number];
  readonly max: readonly [number, number, number];
  readonly population: number;
}

const SHIFTS: Readonly<Record<Channel, number>> = { 0: 16, 1: 8, 2: 0 };

const channelOf = (color: number, channel: Channel): number => (color >> SHIFTS[channel]) & 0xff;

function makeBox(entries: readonly ColorEntry[]): ColorBox {
  const min: [number, number, number] = [255, 255, 255];
  const max: [number, number, number] = [0, 0, 0];
  let population = 0;

  for (const { color, count } of entries) {
    for (const channel of [0, 1, 2] as const) {
      const value = channelOf(color, channel);
      min[channel] = Math.min(min[channel], value);
      max[channel] = Math.max(max[channel], value);
    }
    population += count;
  }

  return { entries, min, max, population };
}

function longestAxis(box: ColorBox): Channel {
  const red = box.max[0] - box.min[0];
  const green = box.max[1] - box.min[1];
  const blue = box.max[2] - box.min[2];

  if (red >= green && red >= blue) {
    return 0;
  }

  return green >= blue ? 1 : 2;
}

const volume = (box: ColorBox): number =>
  (box.max[0] - box.min[0] + 1) * (box.max[1] - box.min[1] + 1) * (box.max[2] - box.min[2] + 1);

function sortAlong(entries: readonly ColorEntry[], channel: Channel): ColorEntry[] {
  return [...entries].sort(
    (a, b) => channelOf(a.color, channel) - channelOf(b.color, channel) || a.color - b.color,
  );
}

/** Splits at the pixel-weighted median along the longest axis. */
function splitAtMedian(box: ColorBox): [ColorBox, ColorBox] {
  const sorted = sortAlong(box.entries, longestAxis(box));
  const half = box.population / 2;
  let cumulative = 0;
  let cut = 1;

  for (let index = 0; index < sorted.length - 1; index += 1) {
    cumulative += sorted[index]?.count ?? 0;
    cut = index + 1;
    if (cumulative >= half) {
      break;
    }
  }

  return [makeBox(sorted.slice(0, cut)), makeBox(sorted.slice(cut))];
}

/** Splits at the midpoint of the longest axis' value range. */
function splitAtMidpoint(box: ColorBox): [ColorBox, ColorBox] {
  const channel = longestAxis(box);
  const midpoint = Math.floor((box.min[channel] + box.max[channel]) / 2);
  const sorted = sortAlong(box.entries, channel);
  const lower = sorted.filter((entry) => channelOf(entry.color, channel) <= midpoint);
  const upper = sorted.filter((entry) => channelOf(entry.color, channel) > midpoint);

  return [makeBox(lower), makeBox(upper)];
}

type BoxSelector = (box: ColorBox) => number;

function cutBoxes(
  entries: readonly ColorEntry[],
  maxColors: number,
  score: BoxSelector,
  split: (box: ColorBox) => [ColorBox, ColorBox],
): Palette {
  if (entries.length === 0) {
    return [];
  }

  const boxes: ColorBox[] = [makeBox(entries)];

  while (boxes.length < maxColors) {
    let selected = -1;
    let best = -1;

    boxes.forEach((box, index) => {
      if (box.entries.length < 2) {
        return;
      }
      const value = score(box);
      if (value > best) {
        best = value;
        selected = index;
      }
    });

    const box = boxes[selected];
    if (!box) {
      break;
    }

    boxes.splice(selected, 1, ...split(box));
  }

  return boxes.map((box) => averageColor(box.entries));
}

/**
 * Repeatedly halves the most populated box at its weighted median, so
 * frequent colours get more palette entries.
 */
export function medianCutPalette(entries: readonly ColorEntry[], maxColors: number): Palette {
  return cutBoxes(entries, maxColors, (box) => box.population, splitAtMedian);
}

/**
 * Repeatedly halves the box spanning the largest colour volume at the middle
 * of its range, spreading entries across the whole gamut present.
 */
export function maximumCoveragePalette(entries: readonly ColorEntry[], maxColors: number): Palette {
  return cutBoxes(entries, maxColors, volume, splitAtMidpoint);
}
