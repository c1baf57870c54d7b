export * from './contracts/slideshow-pipeline.js';
export * from './entities/slideshow-job.js';
export * from './value-objects/crop-region.js';
export * from './value-objects/frame.js';
export * from './value-objects/pipeline-config.js';
export * from './value-objects/source-image.js';
