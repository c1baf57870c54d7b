export interface FrameSize {
  readonly width: number;
  readonly height: number;
}

export type FrameKind = 'hold' | 'fade';

/**
 * RGBA pixels, row-major, four bytes per pixel. Every frame of a run shares
 * the same dimensions.
 */
export interface Frame extends FrameSize {
  readonly data: Uint8ClampedArray;
  readonly durationMs: number;
  readonly kind: FrameKind;
}

export type PaletteColor = readonly [number, number, number];

export type Palette = readonly PaletteColor[];

export type PaletteScope = 'global' | 'local';

export interface IndexedFrame extends FrameSize {
  readonly indices: Uint8Array;
  readonly palette: Palette;
  readonly paletteScope: PaletteScope;
  readonly durationMs: number;
  readonly kind: FrameKind;
}

export function sameSize(a: FrameSize, b: FrameSize): boolean {
  return a.width === b.width && a.height === b.height;
}
