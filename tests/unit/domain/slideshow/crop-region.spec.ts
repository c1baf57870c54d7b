import {
  centeredAspectRegion,
  cropSize,
  isCropWithinBounds,
  resolveCropRegion,
} from '@domain/slideshow/index.js';
import { describe, expect, it } from 'vitest';

const bounds = { width: 1_920, height: 1_080 };

describe('isCropWithinBounds', () => {
  it('accepts a region touching the image edges', () => {
    expect(isCropWithinBounds({ left: 0, top: 0, right: 1_920, bottom: 1_080 }, bounds)).toBe(true);
  });

  it.each([
    ['left equal to right', { left: 100, top: 0, right: 100, bottom: 50 }],
    ['left past right', { left: 200, top: 0, right: 100, bottom: 50 }],
    ['top equal to bottom', { left: 0, top: 40, right: 100, bottom: 40 }],
    ['right beyond width', { left: 0, top: 0, right: 1_921, bottom: 50 }],
    ['bottom beyond height', { left: 0, top: 0, right: 50, bottom: 1_081 }],
    ['negative origin', { left: -1, top: 0, right: 50, bottom: 50 }],
    ['fractional edge', { left: 0.5, top: 0, right: 50, bottom: 50 }],
  ])('rejects %s', (_label, region) => {
    expect(isCropWithinBounds(region, bounds)).toBe(false);
  });
});

describe('centeredAspectRegion', () => {
  it('keeps the whole frame when the ratio already matches', () => {
    expect(centeredAspectRegion('16:9', bounds)).toEqual({ left: 0, top: 0, right: 1_920, bottom: 1_080 });
  });

  it('trims the sides for a narrower ratio', () => {
    expect(centeredAspectRegion('4:3', bounds)).toEqual({ left: 240, top: 0, right: 1_680, bottom: 1_080 });
  });

  it('trims top and bottom for a wider ratio', () => {
    expect(centeredAspectRegion('16:9', { width: 1_000, height: 1_000 })).toEqual({
      left: 0,
      top: 218,
      right: 1_000,
      bottom: 781,
    });
  });

  it('produces a square from a landscape image', () => {
    expect(centeredAspectRegion('1:1', bounds)).toEqual({ left: 420, top: 0, right: 1_500, bottom: 1_080 });
  });
});

describe('resolveCropRegion', () => {
  it('returns null without a crop', () => {
    expect(resolveCropRegion(undefined, bounds)).toBeNull();
  });

  it('passes explicit regions through untouched', () => {
    const region = { left: 5, top: 6, right: 2_000, bottom: 7 };
    expect(resolveCropRegion({ type: 'region', region }, bounds)).toBe(region);
  });

  it('resolves presets against the image size', () => {
    const region = resolveCropRegion({ type: 'aspect', ratio: '9:16' }, bounds);
    expect(region).toEqual({ left: 656, top: 0, right: 1_264, bottom: 1_080 });
    expect(region && cropSize(region)).toEqual({ width: 608, height: 1_080 });
  });
});
