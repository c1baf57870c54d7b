export * from './fade-interpolator.js';
export * from './frame-quantizer-pool.js';
export * from './gif-encoder.js';
export * from './image-frame-builder.js';
export * from './image-source-loader.js';
export * from './palette-sampler.js';
export * from './pipeline-worker.js';
export * from './poster-frame.js';
export * from './quantization/palette.js';
export * from './quantization/quantizer.js';
export * from './slideshow-pipeline.service.js';
