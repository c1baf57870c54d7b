import { FadeframeError, type FadeframeErrorOptions } from './base.error.js';

export type PipelineErrorCode =
  | 'INVALID_CROP'
  | 'UNSUPPORTED_FORMAT'
  | 'DIMENSION_MISMATCH'
  | 'EMPTY_INPUT'
  | 'ENCODING_FAILED'
  | 'CANCELLED'
  | 'UNEXPECTED_ERROR';

export interface ClassifiedPipelineError {
  readonly code: PipelineErrorCode;
  readonly message: string;
}

interface PipelineErrorOptions extends FadeframeErrorOptions {
  readonly code: PipelineErrorCode;
}

export abstract class PipelineError extends FadeframeError {
  public declare readonly code: PipelineErrorCode;

  protected constructor(options: PipelineErrorOptions) {
    super(options);
  }
}

export class InvalidCropError extends PipelineError {
  public constructor(
    region: { left: number; top: number; right: number; bottom: number },
    bounds: { width: number; height: number },
  ) {
    super({
      code: 'INVALID_CROP',
      message: `Crop region (${region.left}, ${region.top}, ${region.right}, ${region.bottom}) does not fit inside a ${bounds.width}x${bounds.height} image.`,
      metadata: { region, bounds },
      exposeMessage: true,
    });
    this.name = 'InvalidCropError';
  }
}

export class UnsupportedFormatError extends PipelineError {
  public constructor(path: string, reason: string, cause?: unknown) {
    super({
      code: 'UNSUPPORTED_FORMAT',
      message: `Cannot read image ${path}: ${reason}`,
      metadata: { path },
      cause,
      exposeMessage: true,
    });
    this.name = 'UnsupportedFormatError';
  }
}

export class DimensionMismatchError extends PipelineError {
  public constructor(
    first: { width: number; height: number },
    second: { width: number; height: number },
  ) {
    super({
      code: 'DIMENSION_MISMATCH',
      message: `Frames differ in size: ${first.width}x${first.height} vs ${second.width}x${second.height}.`,
      metadata: { first, second },
      exposeMessage: false,
    });
    this.name = 'DimensionMismatchError';
  }
}

export class EmptyInputError extends PipelineError {
  public constructor(message = 'At least one image is required to build a GIF.') {
    super({
      code: 'EMPTY_INPUT',
      message,
      exposeMessage: true,
    });
    this.name = 'EmptyInputError';
  }
}

export class EncodingError extends PipelineError {
  public constructor(outputPath: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : 'unknown write failure';
    super({
      code: 'ENCODING_FAILED',
      message: `Failed to write GIF to ${outputPath}: ${detail}`,
      metadata: { outputPath },
      cause,
      exposeMessage: true,
    });
    this.name = 'EncodingError';
  }
}

export class CancelledError extends PipelineError {
  public constructor() {
    super({
      code: 'CANCELLED',
      message: 'GIF generation was cancelled.',
      exposeMessage: true,
    });
    this.name = 'CancelledError';
  }
}

export const isPipelineError = (value: unknown): value is PipelineError => value instanceof PipelineError;

export function classifyPipelineError(error: unknown): ClassifiedPipelineError {
  if (isPipelineError(error)) {
    return { code: error.code, message: error.message };
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return { code: 'UNEXPECTED_ERROR', message };
}
