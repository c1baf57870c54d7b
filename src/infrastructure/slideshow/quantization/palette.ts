import type { IndexedFrame, Palette, PaletteColor } from '@domain/slideshow/index.js';

export const MAX_PALETTE_SIZE = 256;

const MIN_COLOR_TABLE_SIZE = 2;

/**
 * Drops palette entries no pixel refers to and renumbers the indices.
 * Frames that use every entry come back unchanged.
 */
export function compactPalette(frame: IndexedFrame): IndexedFrame {
  const used = new Uint8Array(frame.palette.length);
  for (const index of frame.indices) {
    used[index] = 1;
  }

  if (used.every((flag) => flag === 1)) {
    return frame;
  }

  const remap = new Uint8Array(frame.palette.length);
  const palette: PaletteColor[] = [];

  frame.palette.forEach((color, index) => {
    if (used[index] === 1) {
      remap[index] = palette.length;
      palette.push(color);
    }
  });

  return {
    ...frame,
    palette,
    indices: frame.indices.map((index) => remap[index] ?? 0),
  };
}

/** GIF colour tables hold at least two entries; pads with black. */
export function padPalette(palette: Palette): Palette {
  if (palette.length >= MIN_COLOR_TABLE_SIZE) {
    return palette;
  }

  const padded: PaletteColor[] = [...palette];
  while (padded.length < MIN_COLOR_TABLE_SIZE) {
    padded.push([0, 0, 0]);
  }
  return padded;
}
