/**
 * Value objects describing the images a run reads from disk.
 */
export type SourceImageFormat = 'png' | 'jpeg' | 'bmp' | 'gif' | 'tiff';

export const SUPPORTED_SOURCE_FORMATS: readonly SourceImageFormat[] = ['png', 'jpeg', 'bmp', 'gif', 'tiff'];

export interface SourceImageMetadata {
  /** Dimensions after EXIF orientation is applied. */
  readonly width: number;
  readonly height: number;
  readonly orientation: number;
  readonly hasIccProfile: boolean;
  readonly colorSpace: string;
}

export type SourcePixels =
  | { readonly kind: 'encoded'; readonly buffer: Buffer }
  | { readonly kind: 'raw'; readonly data: Uint8ClampedArray; readonly width: number; readonly height: number };

export interface SourceImageInfo {
  readonly path: string;
  readonly format: SourceImageFormat;
  readonly metadata: SourceImageMetadata;
}

export interface SourceImage extends SourceImageInfo {
  readonly pixels: SourcePixels;
}
