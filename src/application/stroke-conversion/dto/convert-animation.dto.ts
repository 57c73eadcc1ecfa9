import { z } from 'zod';

import { DEFAULT_CONVERSION_PARAMETERS } from '@domain/stroke-conversion/index.js';

const rgbaBitmapSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  data: z.instanceof(Uint8ClampedArray),
});

export const animationSourceSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('gif'),
    path: z.string().min(1),
  }),
  z.object({
    type: z.literal('png'),
    path: z.string().min(1),
  }),
  z.object({
    type: z.literal('frameSequence'),
    frames: z.array(rgbaBitmapSchema).min(1),
    delayMs: z.number().positive().optional(),
  }),
]);

export const conversionParametersSchema = z.object({
  canvas: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ ...DEFAULT_CONVERSION_PARAMETERS.canvas }),
  brushThickness: z.number().int().positive().default(DEFAULT_CONVERSION_PARAMETERS.brushThickness),
  samplingStride: z.number().int().positive().default(DEFAULT_CONVERSION_PARAMETERS.samplingStride),
  transparencyThreshold: z
    .number()
    .int()
    .min(0)
    .max(255)
    .default(DEFAULT_CONVERSION_PARAMETERS.transparencyThreshold),
  maxFrames: z.number().int().positive().nullable().default(DEFAULT_CONVERSION_PARAMETERS.maxFrames),
  fitMode: z.enum(['shrink-only', 'contain']).default(DEFAULT_CONVERSION_PARAMETERS.fitMode),
});

export const convertAnimationCommandSchema = z.object({
  id: z.string().min(1),
  source: animationSourceSchema,
  parameters: conversionParametersSchema.default({}),
  outputPath: z.string().min(1).optional(),
});

export type ConvertAnimationPayload = z.input<typeof convertAnimationCommandSchema>;

export type ValidatedConvertAnimationPayload = z.output<typeof convertAnimationCommandSchema>;
