export * from '@domain/slideshow/index.js';

export * from '@/application/slideshow/index.js';
export * from '@/infrastructure/slideshow/index.js';
export * from '@/shared/errors/app-error.js';
export * from '@/shared/errors/base.error.js';
export * from '@/shared/errors/pipeline.errors.js';
export { analyzeGif, type GifAnalysis } from '@/shared/media/gifToolkit.js';
export { calculateFrameTimingStats, planSlideshowDelays, type FrameTimingStats } from '@/shared/media/frameTiming.js';
export { toGifDelayMs } from '@/shared/media/rounding.js';
