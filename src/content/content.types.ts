// hatchery_v1 콘텐츠 스키마: JSON은 로드 시 zod로 검증

import { z } from 'zod';
import { STACKING_POLICY } from '../db/types/index.js';

const Id = z.string().min(1);

export const PetVariantSchema = z.object({
  displayName: z.string().min(1),
  power: z.number().int().nonnegative(),
  health: z.number().int().positive(),
  abilities: z.array(z.string().min(1)).default([]),
});

export const PetDefinitionSchema = z.object({
  petId: Id,
  name: z.string().min(1),
  category: z.string().min(1),
  // rarityId → 변종
  variants: z.record(PetVariantSchema),
});

export const RarityTierSchema = z.object({
  rarityId: Id,
  probability: z.number().min(0).max(1),
  rank: z.number().int(),
  luckStats: z.array(Id).min(1).optional(),
});

export const RarityTableSchema = z.object({
  tiers: z.array(RarityTierSchema),
  commonRarityId: Id.optional(),
  minCommonProbability: z.number().min(0).max(1).optional(),
  allowCommon: z.boolean().optional(),
  maxLuckMultiplier: z.number().positive().finite().optional(),
});

export const UNLOCK_REQUIREMENT_TYPE = ['pets_hatched'] as const;

export const UnlockRequirementSchema = z.object({
  type: z.enum(UNLOCK_REQUIREMENT_TYPE),
  amount: z.number().int().positive(),
});

export const EggDefinitionSchema = z.object({
  eggId: Id,
  name: z.string().min(1),
  petWeights: z.record(z.number().positive().finite()),
  rarity: RarityTableSchema,
  modifierCaps: z.record(z.number().positive().finite()).default({}),
  // 누적 부화 1마리당 luck 보너스
  luckPerPetHatched: z.number().nonnegative().finite().default(0),
  unlockRequirement: UnlockRequirementSchema.optional(),
});

export const EFFECT_SCOPE = ['player', 'global'] as const;
export type EffectScope = (typeof EFFECT_SCOPE)[number];

/** duration -1 = 영구 */
export const PERMANENT_DURATION = -1;

export const EffectDefinitionSchema = z.object({
  effectId: Id,
  displayName: z.string().min(1),
  description: z.string().default(''),
  duration: z.union([z.literal(PERMANENT_DURATION), z.number().nonnegative().finite()]),
  stacking: z.enum(STACKING_POLICY),
  statModifiers: z.record(z.number().finite()),
  scope: z.enum(EFFECT_SCOPE).default('player'),
});

export type PetVariant = z.infer<typeof PetVariantSchema>;
export type PetDefinition = z.infer<typeof PetDefinitionSchema>;
export type UnlockRequirement = z.infer<typeof UnlockRequirementSchema>;
export type EggDefinition = z.infer<typeof EggDefinitionSchema>;
export type EffectDefinition = z.infer<typeof EffectDefinitionSchema>;
