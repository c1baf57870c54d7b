import {
  createPipelineConfig,
  SlideshowJob,
  type PipelineConfig,
  type PipelineResult,
  type PipelineRunOptions,
  type SlideshowPipeline,
} from '@domain/slideshow/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import type { CreateSlideshowCommand } from '../commands/create-slideshow.command.js';
import {
  createSlideshowCommandSchema,
  type CreateSlideshowInput,
  type CreateSlideshowPayload,
} from '../dto/create-slideshow.dto.js';

export class CreateSlideshowHandler {
  private readonly logger = createChildLogger({ module: 'CreateSlideshowHandler' });

  public constructor(private readonly pipeline: SlideshowPipeline) {}

  public async execute(command: CreateSlideshowCommand, options: PipelineRunOptions = {}): Promise<PipelineResult> {
    const payload = this.validate(command.payload);

    this.logger.info({ jobId: payload.id, images: payload.sources.length }, 'Starting slideshow GIF');

    try {
      const job = SlideshowJob.create({
        id: payload.id,
        sources: payload.sources,
        outputPath: payload.outputPath,
        config: this.toPipelineConfig(payload),
        createdAt: new Date(),
      });

      const result = await this.pipeline.run(job, options);

      switch (result.status) {
        case 'completed':
          this.logger.info(
            {
              jobId: payload.id,
              outputPath: result.outputPath,
              frameCount: result.frameCount,
              durationMs: result.metrics.totalTimeMs,
              outputSizeBytes: result.metrics.outputSizeBytes,
            },
            'Slideshow GIF completed',
          );
          break;
        case 'failed':
          this.logger.warn({ jobId: payload.id, error: result.error }, 'Slideshow GIF failed');
          break;
        case 'cancelled':
          this.logger.info({ jobId: payload.id }, 'Slideshow GIF cancelled');
          break;
      }

      return result;
    } catch (error) {
      this.logger.error({ jobId: payload.id, error }, 'Slideshow GIF crashed');
      throw AppError.fromUnknown(error, 'slideshow.failure');
    }
  }

  private validate(payload: CreateSlideshowInput): CreateSlideshowPayload {
    const parsed = createSlideshowCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('slideshow.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid slideshow payload received');
      throw error;
    }

    return parsed.data;
  }

  private toPipelineConfig({ options }: CreateSlideshowPayload): PipelineConfig {
    return createPipelineConfig({
      canvas: options.canvas,
      resampling: options.resampling,
      quantization: options.quantization,
      dithering: options.dithering,
      sharpenStrength: options.sharpenStrength,
      fadeSteps: options.fadeSteps,
      holdDurationMs: options.holdDurationMs,
      fadeDurationMs: options.fadeDurationMs,
      output: options.output,
      palette: options.palette,
      crop: options.crop,
    });
  }
}
