import { z } from 'zod';

export const HatchBodySchema = z
  .object({
    count: z.number().int().min(1).optional().default(1),
  })
  .default({});

export type HatchBody = z.infer<typeof HatchBodySchema>;

export const EggIdParamSchema = z.string().min(1).max(64);
