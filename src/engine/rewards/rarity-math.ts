// 등급 확률 계산 + 확률 표시 포맷: RewardResolver / 미리보기 공용

import {
  DEFAULT_COMMON_RARITY_ID,
  DEFAULT_LUCK_STAT,
  type AggregateMap,
  type ModifierCaps,
  type RarityRate,
  type RarityTable,
  type RarityTier,
} from '../../db/types/index.js';

/** 순서와 무관한 합: 오름차순 정렬 후 합산 */
export function sumStable(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  let total = 0;
  for (const v of sorted) total += v;
  return total;
}

/** 코드 유닛 순 정렬 (locale 비의존) */
export function sortCategoryIds(ids: Iterable<string>): string[] {
  return [...ids].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/** 희귀 등급 먼저 (rank 내림차순, 같으면 id 순) */
export function sortTiersRarestFirst(tiers: readonly RarityTier[]): RarityTier[] {
  return [...tiers].sort((a, b) => {
    if (a.rank !== b.rank) return b.rank - a.rank;
    return a.rarityId < b.rarityId ? -1 : a.rarityId > b.rarityId ? 1 : 0;
  });
}

/** 1 + Σ stats + bonus, [0, maxLuckMultiplier] clamp */
export function luckFromStats(
  stats: readonly string[],
  aggregates: AggregateMap,
  maxLuckMultiplier?: number,
  bonus: number = 0,
): number {
  const statBonus = sumStable(stats.map((s) => aggregates[s] ?? 0));
  const multiplier = Math.max(0, 1 + statBonus + bonus);
  return maxLuckMultiplier === undefined
    ? multiplier
    : Math.min(multiplier, maxLuckMultiplier);
}

export function computeLuckMultiplier(
  tier: RarityTier,
  aggregates: AggregateMap,
  maxLuckMultiplier?: number,
  bonus: number = 0,
): number {
  return luckFromStats(
    tier.luckStats ?? [DEFAULT_LUCK_STAT],
    aggregates,
    maxLuckMultiplier,
    bonus,
  );
}

/**
 * 등급별 실효 확률 (입력은 검증된 테이블이어야 함).
 *
 * effective = min(base * luck, cap). luckBonus는 모든 등급의 luck에 더해진다.
 * 일반 테이블: 명시 등급 합이 1 - minCommon 을 넘으면 그 합에 맞춰 비례 축소하고
 * 기본 등급은 minCommon, 아니면 기본 등급이 나머지.
 * 프리미엄 테이블(allowCommon=false): 희귀 등급부터 실효 확률을 그대로 주고
 * (남은 몫까지만) 가장 흔한 명시 등급이 나머지 전부를 받는다.
 * 반환 순서: 희귀 등급 순, 마지막이 기본 등급.
 */
export function computeRarityRates(
  table: RarityTable,
  caps: ModifierCaps,
  aggregates: AggregateMap,
  luckBonus: number = 0,
): RarityRate[] {
  const commonId = table.commonRarityId ?? DEFAULT_COMMON_RARITY_ID;
  const allowCommon = table.allowCommon ?? true;

  const ordered = sortTiersRarestFirst(table.tiers);
  const effective = ordered.map((tier) => {
    const luck = computeLuckMultiplier(tier, aggregates, table.maxLuckMultiplier, luckBonus);
    const cap = caps[tier.rarityId] ?? 1;
    return Math.min(tier.probability * luck, cap);
  });

  if (!allowCommon) {
    const rates = premiumRates(ordered, effective);
    rates.push({ rarityId: commonId, probability: 0, isCommon: true });
    return rates;
  }

  const minCommon = table.minCommonProbability ?? 0;
  const explicitSum = sumStable(effective);
  const budget = 1 - minCommon;
  const scale = explicitSum > budget ? budget / explicitSum : 1;

  const rates: RarityRate[] = ordered.map((tier, i) => ({
    rarityId: tier.rarityId,
    probability: effective[i] * scale,
    isCommon: false,
  }));
  const commonProbability = Math.max(minCommon, 1 - sumStable(rates.map((r) => r.probability)));
  rates.push({ rarityId: commonId, probability: commonProbability, isCommon: true });
  return rates;
}

function premiumRates(ordered: RarityTier[], effective: number[]): RarityRate[] {
  const rates: RarityRate[] = [];
  const last = ordered.length - 1;
  for (let i = 0; i < ordered.length; i++) {
    const remaining = Math.max(0, 1 - sumStable(rates.map((r) => r.probability)));
    rates.push({
      rarityId: ordered[i].rarityId,
      probability: i === last ? remaining : Math.min(effective[i], remaining),
      isCommon: false,
    });
  }
  return rates;
}

export interface ChanceFormatOptions {
  /** 소수점 자리수 (퍼센트 기준) */
  precision: number;
  /** 이 확률 미만은 "??" */
  minChanceToShow: number;
}

/** 0.0525 → "5.25%", 임계값 미만 → "??" */
export function formatChance(probability: number, options: ChanceFormatOptions): string {
  if (probability < options.minChanceToShow) return '??';
  return `${(probability * 100).toFixed(options.precision)}%`;
}
