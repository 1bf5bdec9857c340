import { z } from 'zod';
import { createInvalidConfigError } from './error-handling';

const outlineSchema = z.object({
  color: z.string().min(1),
  widthPx: z.number().min(0),
});

export const fontRangeSchema = z
  .object({
    minPx: z.number().int().positive().default(10),
    maxPx: z.number().int().positive().default(50),
  })
  .refine((range) => range.minPx <= range.maxPx, {
    message: 'minPx must not exceed maxPx',
    path: ['minPx'],
  });

export const engineConfigSchema = z.object({
  fontRange: fontRangeSchema.default({}),
  innerPaddingPx: z.number().int().min(0).default(5),
  maskPaddingPx: z.number().int().min(0).default(10),
  dilationPx: z.number().int().min(0).max(64).default(3),
  defaultFontFamily: z.string().min(1).default('Wild Words'),
  defaultColor: z.string().min(1).default('#000000'),
  defaultOutline: outlineSchema.default({ color: '#ffffff', widthPx: 2 }),
  groupingGapPx: z.number().min(0).default(50),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type FontRange = EngineConfig['fontRange'];

export const resolveEngineConfig = (input: EngineConfigInput = {}): EngineConfig => {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw createInvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveEngineConfig();

export const bboxSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite().positive(),
  height: z.number().finite().positive(),
});
