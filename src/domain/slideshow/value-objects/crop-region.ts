import type { FrameSize } from './frame.js';

export interface CropRegion {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export type AspectRatioPreset = '16:9' | '4:3' | '1:1' | '9:16' | '21:9';

export type CropSpec =
  | { readonly type: 'region'; readonly region: CropRegion }
  | { readonly type: 'aspect'; readonly ratio: AspectRatioPreset };

export const ASPECT_RATIO_PRESETS: Readonly<Record<AspectRatioPreset, readonly [number, number]>> = {
  '16:9': [16, 9],
  '4:3': [4, 3],
  '1:1': [1, 1],
  '9:16': [9, 16],
  '21:9': [21, 9],
};

export function isCropWithinBounds(region: CropRegion, bounds: FrameSize): boolean {
  const { left, top, right, bottom } = region;
  const integral = [left, top, right, bottom].every((value) => Number.isInteger(value));

  return (
    integral &&
    left >= 0 &&
    top >= 0 &&
    left < right &&
    top < bottom &&
    right <= bounds.width &&
    bottom <= bounds.height
  );
}

/**
 * Largest region of the preset's ratio that fits the image, centred.
 */
export function centeredAspectRegion(ratio: AspectRatioPreset, bounds: FrameSize): CropRegion {
  const [ratioWidth, ratioHeight] = ASPECT_RATIO_PRESETS[ratio];
  let width = bounds.width;
  let height = Math.round((width * ratioHeight) / ratioWidth);

  if (height > bounds.height) {
    height = bounds.height;
    width = Math.round((height * ratioWidth) / ratioHeight);
  }

  width = Math.max(1, Math.min(width, bounds.width));
  height = Math.max(1, Math.min(height, bounds.height));

  const left = Math.floor((bounds.width - width) / 2);
  const top = Math.floor((bounds.height - height) / 2);

  return { left, top, right: left + width, bottom: top + height };
}

export function resolveCropRegion(crop: CropSpec | undefined, bounds: FrameSize): CropRegion | null {
  if (!crop) {
    return null;
  }

  return crop.type === 'region' ? crop.region : centeredAspectRegion(crop.ratio, bounds);
}

export function cropSize(region: CropRegion): FrameSize {
  return { width: region.right - region.left, height: region.bottom - region.top };
}
