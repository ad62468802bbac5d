import { z } from 'zod';

export const ApplyEffectBodySchema = z
  .object({
    // 초, -1 = 영구
    duration: z.number().finite().min(-1).optional(),
  })
  .default({});

export type ApplyEffectBody = z.infer<typeof ApplyEffectBodySchema>;

export const EffectIdParamSchema = z.string().min(1).max(64);
