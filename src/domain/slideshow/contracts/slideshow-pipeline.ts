import type { PipelineErrorCode } from '@/shared/errors/pipeline.errors.js';

import type { SlideshowJob } from '../entities/slideshow-job.js';

export type PipelineState = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface PipelineMetrics {
  readonly buildTimeMs: number;
  readonly quantizeTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
  readonly outputSizeBytes: number;
  readonly averageFrameProcessingMs: number;
}

export type PipelineResult =
  | {
      readonly status: 'completed';
      readonly outputPath: string;
      readonly frameCount: number;
      readonly metrics: PipelineMetrics;
      readonly posterFrame?: Buffer;
    }
  | {
      readonly status: 'failed';
      readonly error: { readonly code: PipelineErrorCode; readonly message: string };
    }
  | { readonly status: 'cancelled' };

/**
 * Notifications for the front-end. Values passed here are never mutated
 * after delivery.
 */
export interface PipelineListener {
  onProgress?(processed: number, total: number): void;
  onComplete?(outputPath: string, frameCount: number): void;
  onError?(code: PipelineErrorCode, message: string): void;
  onCancelled?(): void;
}

export interface PipelineRunOptions {
  readonly listener?: PipelineListener;
  readonly signal?: AbortSignal;
}

export interface SlideshowPipeline {
  run(job: SlideshowJob, options?: PipelineRunOptions): Promise<PipelineResult>;
}
