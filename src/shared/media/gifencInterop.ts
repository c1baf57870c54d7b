import * as gifenc from 'gifenc';

export type { GIFEncoderInstance, GIFEncoderOptions, WriteFrameOptions } from 'gifenc';

/**
 * gifenc's ESM build has named exports. Node's ESM loader reads the CommonJS
 * build instead, which only offers its functions on `default`.
 */
export const GIFEncoder: typeof gifenc.GIFEncoder =
  typeof gifenc.GIFEncoder === 'function' ? gifenc.GIFEncoder : gifenc.default.GIFEncoder;
