import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import { env } from '@/shared/config/env.js';

const channelSchema = z.number().int().min(0).max(255);

export const paletteSchema = z.array(z.tuple([channelSchema, channelSchema, channelSchema])).min(1).max(256);

// Ordering and bounds are checked by the frame builder, which raises InvalidCropError.
export const cropRegionSchema = z.object({
  left: z.number().int().min(0),
  top: z.number().int().min(0),
  right: z.number().int().min(0),
  bottom: z.number().int().min(0),
});

export const cropSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('region'), region: cropRegionSchema }),
  z.object({ type: z.literal('aspect'), ratio: z.enum(['16:9', '4:3', '1:1', '9:16', '21:9']) }),
]);

export const canvasSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('fixed'),
    width: z.number().int().positive().max(8192),
    height: z.number().int().positive().max(8192),
  }),
  z.object({ mode: z.literal('preserve') }),
]);

export const slideshowOptionsSchema = z.object({
  canvas: canvasSchema.default({
    mode: 'fixed',
    width: env.CANVAS_DEFAULT_WIDTH,
    height: env.CANVAS_DEFAULT_HEIGHT,
  }),
  resampling: z.enum(['lanczos', 'bicubic', 'bilinear', 'nearest']).default('lanczos'),
  quantization: z.enum(['median-cut', 'maximum-coverage', 'fast-octree']).default('median-cut'),
  dithering: z.enum(['floyd-steinberg', 'ordered', 'none']).default('floyd-steinberg'),
  sharpenStrength: z.number().min(0).max(2).default(0),
  fadeSteps: z.number().int().min(5).max(50).default(15),
  holdDurationMs: z.number().int().min(100).max(5_000).default(1_000),
  fadeDurationMs: z.number().int().min(10).max(500).default(50),
  output: z
    .object({
      quality: z.number().int().min(1).max(100).default(95),
      optimize: z.boolean().default(true),
      poster: z.object({ format: z.enum(['png', 'jpeg']).default('png') }).optional(),
    })
    .default({}),
  palette: z
    .discriminatedUnion('mode', [
      z.object({ mode: z.literal('per-frame') }),
      z.object({ mode: z.literal('global'), palette: paletteSchema.optional() }),
    ])
    .default({ mode: 'per-frame' }),
  crop: cropSchema.optional(),
});

export const createSlideshowCommandSchema = z.object({
  id: z.string().min(1).default(() => randomUUID()),
  sources: z.array(z.string().min(1)),
  outputPath: z.string().min(1),
  options: slideshowOptionsSchema.default({}),
});

export type CreateSlideshowInput = z.input<typeof createSlideshowCommandSchema>;

export type CreateSlideshowPayload = z.infer<typeof createSlideshowCommandSchema>;
