// 2단계 가중 추첨: (1) 카테고리(펫 종류) (2) 등급(변종)

import { Injectable } from '@nestjs/common';
import {
  EmptyPoolError,
  InvalidModifierError,
  InvalidRandomValueError,
  InvalidRarityTableError,
} from '../../common/errors/game-errors.js';
import {
  DEFAULT_COMMON_RARITY_ID,
  type AggregateMap,
  type ModifierCaps,
  type RarityRate,
  type RarityTable,
  type ResolvedReward,
  type RewardPool,
} from '../../db/types/index.js';
import type { RandomSource } from '../rng/rng.service.js';
import { computeRarityRates, sortCategoryIds, sumStable } from './rarity-math.js';

export interface ResolveInput {
  pool: RewardPool;
  rarityTable: RarityTable;
  modifierCaps: ModifierCaps;
  aggregates: AggregateMap;
  random: RandomSource;
  /** 모든 등급 luck에 더할 보너스 (예: 누적 부화 수) */
  luckBonus?: number;
}

/*
 * 순수 함수: 입력 + random 외 상태 없음.
 * 검증은 전부 추첨 전에 끝낸다 → 실패한 호출은 random을 한 번도 소비하지 않음.
 */
@Injectable()
export class RewardResolverService {
  resolve(input: ResolveInput): ResolvedReward {
    const categories = this.validatePool(input.pool);
    const rates = this.computeRates(
      input.rarityTable,
      input.modifierCaps,
      input.aggregates,
      input.luckBonus,
    );

    // Stage 1: 카테고리
    const r1 = this.draw(input.random) * categories.total;
    const categoryId = this.pickCategory(categories.ordered, input.pool, r1);

    // Stage 2: 등급 (희귀 등급부터 구간 배정)
    const r2 = this.draw(input.random);
    let cumulative = 0;
    let rarityId: string | undefined;
    for (const rate of rates) {
      if (rate.isCommon) break;
      cumulative += rate.probability;
      if (r2 < cumulative) {
        rarityId = rate.rarityId;
        break;
      }
    }
    if (rarityId === undefined) {
      rarityId = this.fallbackRarity(input.rarityTable, rates);
    }

    return Object.freeze({
      categoryId,
      rarityId,
      rarityRates: Object.freeze(rates.map((r) => Object.freeze({ ...r }))),
    });
  }

  /** 검증 + 등급별 실효 확률 (추첨 없음). 미리보기도 이 값을 쓴다 */
  computeRates(
    rarityTable: RarityTable,
    modifierCaps: ModifierCaps,
    aggregates: AggregateMap,
    luckBonus: number = 0,
  ): RarityRate[] {
    this.validateRarityTable(rarityTable, modifierCaps);
    for (const [statKey, value] of Object.entries(aggregates)) {
      if (!Number.isFinite(value)) {
        throw new InvalidModifierError(`Aggregate ${statKey} must be finite`, {
          statKey,
          value,
        });
      }
    }
    if (!Number.isFinite(luckBonus)) {
      throw new InvalidModifierError('Luck bonus must be finite', { luckBonus });
    }
    return computeRarityRates(rarityTable, modifierCaps, aggregates, luckBonus);
  }

  /** 누적 가중치가 r1에 도달한 첫 카테고리: 경계값은 아래 구간 소속 */
  private pickCategory(ordered: string[], pool: RewardPool, r1: number): string {
    let cumulative = 0;
    for (const id of ordered) {
      cumulative += pool[id];
      if (cumulative >= r1) return id;
    }
    // 부동소수 오차 대비
    return ordered[ordered.length - 1];
  }

  /** 명시 등급에 안 걸린 경우: 기본 등급, 프리미엄이면 확률이 남은 가장 흔한 명시 등급 */
  private fallbackRarity(
    table: RarityTable,
    rates: RarityRate[],
  ): string {
    if (table.allowCommon !== false) {
      return table.commonRarityId ?? DEFAULT_COMMON_RARITY_ID;
    }
    const explicit = rates.filter((r) => !r.isCommon && r.probability > 0);
    return explicit[explicit.length - 1].rarityId;
  }

  private draw(random: RandomSource): number {
    const value = random();
    if (!(value >= 0 && value < 1)) {
      throw new InvalidRandomValueError(value);
    }
    return value;
  }

  private validatePool(pool: RewardPool): { ordered: string[]; total: number } {
    const ordered = sortCategoryIds(Object.keys(pool));
    if (ordered.length === 0) {
      throw new EmptyPoolError('Reward pool has no categories');
    }
    for (const id of ordered) {
      const weight = pool[id];
      if (!Number.isFinite(weight) || weight <= 0) {
        throw new EmptyPoolError(`Weight for ${id} must be a positive number`, {
          categoryId: id,
          weight,
        });
      }
    }
    // pickCategory와 같은 순서로 합산: 마지막 누적값 == total
    let total = 0;
    for (const id of ordered) total += pool[id];
    if (!(total > 0) || !Number.isFinite(total)) {
      throw new EmptyPoolError('Reward pool total weight must be positive', { total });
    }
    return { ordered, total };
  }

  private validateRarityTable(table: RarityTable, caps: ModifierCaps): void {
    const commonId = table.commonRarityId ?? DEFAULT_COMMON_RARITY_ID;
    const seen = new Set<string>();
    for (const tier of table.tiers) {
      if (!tier.rarityId) {
        throw new InvalidRarityTableError('Rarity tier id is required');
      }
      if (seen.has(tier.rarityId)) {
        throw new InvalidRarityTableError(`Duplicate rarity tier: ${tier.rarityId}`);
      }
      seen.add(tier.rarityId);
      if (tier.rarityId === commonId) {
        throw new InvalidRarityTableError(
          `Tier ${tier.rarityId} collides with the common rarity`,
        );
      }
      if (
        !Number.isFinite(tier.probability) ||
        tier.probability < 0 ||
        tier.probability > 1
      ) {
        throw new InvalidRarityTableError(
          `Probability for ${tier.rarityId} must be within [0, 1]`,
          { rarityId: tier.rarityId, probability: tier.probability },
        );
      }
      if (!Number.isFinite(tier.rank)) {
        throw new InvalidRarityTableError(`Rank for ${tier.rarityId} must be finite`);
      }
    }

    const baseSum = sumStable(table.tiers.map((t) => t.probability));
    // 1e-9: 0.95 + 0.05 같은 설정값의 부동소수 오차 허용
    if (baseSum > 1 + 1e-9) {
      throw new InvalidRarityTableError('Base rarity probabilities exceed 1', {
        sum: baseSum,
      });
    }

    for (const [rarityId, cap] of Object.entries(caps)) {
      if (!Number.isFinite(cap) || cap <= 0) {
        throw new InvalidRarityTableError(`Cap for ${rarityId} must be > 0`, {
          rarityId,
          cap,
        });
      }
    }

    const minCommon = table.minCommonProbability ?? 0;
    if (!Number.isFinite(minCommon) || minCommon < 0 || minCommon > 1) {
      throw new InvalidRarityTableError('minCommonProbability must be within [0, 1]');
    }
    if (
      table.maxLuckMultiplier !== undefined &&
      !(Number.isFinite(table.maxLuckMultiplier) && table.maxLuckMultiplier > 0)
    ) {
      throw new InvalidRarityTableError('maxLuckMultiplier must be > 0');
    }
    if (table.allowCommon === false && table.tiers.length === 0) {
      throw new InvalidRarityTableError('Premium rarity table needs at least one tier');
    }
  }
}
