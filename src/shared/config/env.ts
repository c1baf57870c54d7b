import { z } from 'zod';

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value === 'string' && value.trim().length === 0) {
      return undefined;
    }

    return value;
  }, schema);

const positiveInt = (fallback: number) =>
  emptyToUndefined(z.coerce.number().int().positive().default(fallback));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CANVAS_DEFAULT_WIDTH: positiveInt(1920),
  CANVAS_DEFAULT_HEIGHT: positiveInt(1080),
  MAX_INPUT_PIXELS: positiveInt(268_402_689),
  PALETTE_SAMPLE_SIZE: emptyToUndefined(z.coerce.number().int().min(8).max(512).default(64)),
  QUANTIZER_THREADS: emptyToUndefined(z.coerce.number().int().min(0).max(16).default(2)),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
