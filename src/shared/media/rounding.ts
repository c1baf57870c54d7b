const DEFAULT_PRECISION = 2;

export function roundTo(value: number, precision = DEFAULT_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export const GIF_DELAY_UNIT_MS = 10;

/**
 * GIF stores delays in hundredths of a second; anything shorter than one
 * unit is raised to one unit.
 */
export function toGifDelayMs(durationMs: number): number {
  const units = Math.round(durationMs / GIF_DELAY_UNIT_MS);
  return Math.max(1, units) * GIF_DELAY_UNIT_MS;
}
