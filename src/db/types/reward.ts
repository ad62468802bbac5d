// 보상 판정 공용 타입 (알 / 펫 변종)

/** categoryId → 양수 가중치 */
export type RewardPool = Record<string, number>;

export interface RarityTier {
  rarityId: string;
  /** 기본 확률 (0~1) */
  probability: number;
  /** 클수록 희귀: 판정은 희귀 등급부터 */
  rank: number;
  /** 이 등급의 행운 보너스로 합산할 aggregate 스탯 (기본 luckBoost) */
  luckStats?: string[];
}

export interface RarityTable {
  tiers: RarityTier[];
  /** 명시 등급에 걸리지 않은 나머지 확률을 받는 기본 등급 (기본 basic) */
  commonRarityId?: string;
  minCommonProbability?: number;
  /** false = 프리미엄 풀: 기본 등급 없이 명시 등급만 */
  allowCommon?: boolean;
  /** 1 + 행운 보너스의 상한 */
  maxLuckMultiplier?: number;
}

/** rarityId → 보정 후 확률 상한 */
export type ModifierCaps = Record<string, number>;

export interface RarityRate {
  rarityId: string;
  probability: number;
  isCommon: boolean;
}

export interface ResolvedReward {
  readonly categoryId: string;
  readonly rarityId: string;
  /** 판정에 사용된 등급별 실효 확률 (희귀 등급 순, 마지막이 기본 등급) */
  readonly rarityRates: readonly RarityRate[];
}

export const DEFAULT_COMMON_RARITY_ID = 'basic';
export const DEFAULT_LUCK_STAT = 'luckBoost';
