declare module 'gifenc' {
  export type GifencPalette = ReadonlyArray<ReadonlyArray<number>>;

  export interface WriteFrameOptions {
    palette?: GifencPalette;
    first?: boolean;
    transparent?: boolean;
    transparentIndex?: number;
    /** Milliseconds; stored rounded to hundredths of a second. */
    delay?: number;
    /** 0 loops forever, -1 plays once. */
    repeat?: number;
    dispose?: number;
    colorDepth?: number;
  }

  export interface GIFEncoderOptions {
    auto?: boolean;
    initialCapacity?: number;
  }

  export interface GIFEncoderInstance {
    writeHeader(): void;
    writeFrame(index: ArrayLike<number>, width: number, height: number, options?: WriteFrameOptions): void;
    finish(): void;
    bytes(): Uint8Array;
    bytesView(): Uint8Array;
    reset(): void;
  }

  export function GIFEncoder(options?: GIFEncoderOptions): GIFEncoderInstance;

  /** Node loading the CommonJS build sees `module.exports` here and no named exports. */
  const gifenc: {
    GIFEncoder: typeof GIFEncoder;
  };

  export default gifenc;
}
