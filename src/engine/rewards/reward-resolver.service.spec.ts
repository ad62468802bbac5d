import { RewardResolverService, type ResolveInput } from './reward-resolver.service.js';
import { Rng } from '../rng/rng.service.js';
import {
  EmptyPoolError,
  InvalidModifierError,
  InvalidRandomValueError,
  InvalidRarityTableError,
} from '../../common/errors/game-errors.js';
import type { RarityTable, RewardPool } from '../../db/types/index.js';

const PETS: RewardPool = { bear: 25, bunny: 25, doggy: 25, kitty: 20, dragon: 5 };

const BASIC_TABLE: RarityTable = {
  tiers: [
    { rarityId: 'golden', probability: 0.05, rank: 1 },
    { rarityId: 'rainbow', probability: 0.005, rank: 2 },
  ],
};

/** 정해진 순서로 값을 돌려주고 호출 수를 센다 */
function sequence(...values: number[]): { random: () => number; calls: () => number } {
  let i = 0;
  return {
    random: () => {
      const value = values[i % values.length];
      i++;
      return value;
    },
    calls: () => i,
  };
}

function input(overrides: Partial<ResolveInput> = {}): ResolveInput {
  return {
    pool: PETS,
    rarityTable: BASIC_TABLE,
    modifierCaps: {},
    aggregates: {},
    random: () => 0.5,
    ...overrides,
  };
}

describe('RewardResolverService', () => {
  let resolver: RewardResolverService;

  beforeEach(() => {
    resolver = new RewardResolverService();
  });

  describe('기본 시나리오', () => {
    it('luck 0, random 0.5/0.5 → bunny / basic', () => {
      const rng = sequence(0.5, 0.5);
      const result = resolver.resolve(
        input({ aggregates: { luckBoost: 0 }, random: rng.random }),
      );
      expect(result.categoryId).toBe('bunny');
      expect(result.rarityId).toBe('basic');
      expect(rng.calls()).toBe(2);
    });

    it('luckBoost 10 + cap 1 → stage 2 random 0.3 이면 golden', () => {
      const rng = sequence(0.1, 0.3);
      const result = resolver.resolve(
        input({
          aggregates: { luckBoost: 10 },
          modifierCaps: { golden: 1, rainbow: 1 },
          random: rng.random,
        }),
      );
      expect(result.categoryId).toBe('bear');
      expect(result.rarityId).toBe('golden');
      const [rainbow, golden, basic] = result.rarityRates;
      expect(rainbow.rarityId).toBe('rainbow');
      expect(rainbow.probability).toBeCloseTo(0.055, 12);
      expect(golden.rarityId).toBe('golden');
      expect(golden.probability).toBeCloseTo(0.55, 12);
      expect(basic).toEqual({ rarityId: 'basic', probability: expect.closeTo(0.395, 12), isCommon: true });
    });

    it('결과 객체는 불변', () => {
      const result = resolver.resolve(input());
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.rarityRates)).toBe(true);
    });
  });

  describe('Stage 1: 카테고리', () => {
    // 코드 유닛 순: bear 25 | bunny 50 | doggy 75 | dragon 80 | kitty 100
    it.each([
      [0, 'bear'],
      [0.25, 'bear'],
      [0.2501, 'bunny'],
      [0.76, 'dragon'],
      [0.8, 'dragon'],
      [0.9999, 'kitty'],
    ])('random %p → %s', (r1, expected) => {
      const result = resolver.resolve(input({ random: sequence(r1, 0.5).random }));
      expect(result.categoryId).toBe(expected);
    });

    it('풀 객체의 키 순서와 무관', () => {
      const reversed: RewardPool = { kitty: 20, dragon: 5, doggy: 25, bunny: 25, bear: 25 };
      const a = resolver.resolve(input({ random: sequence(0.6, 0.5).random }));
      const b = resolver.resolve(input({ pool: reversed, random: sequence(0.6, 0.5).random }));
      expect(a.categoryId).toBe('doggy');
      expect(b.categoryId).toBe('doggy');
    });

    it('카테고리 하나면 항상 그것', () => {
      const result = resolver.resolve(
        input({ pool: { dragon: 0.001 }, random: sequence(0.999, 0.5).random }),
      );
      expect(result.categoryId).toBe('dragon');
    });
  });

  describe('Stage 2: 등급', () => {
    it('희귀 등급이 구간 앞쪽 (rainbow [0, 0.005), golden [0.005, 0.055))', () => {
      expect(resolver.resolve(input({ random: sequence(0.5, 0).random })).rarityId).toBe('rainbow');
      expect(resolver.resolve(input({ random: sequence(0.5, 0.004).random })).rarityId).toBe('rainbow');
      expect(resolver.resolve(input({ random: sequence(0.5, 0.005).random })).rarityId).toBe('golden');
      expect(resolver.resolve(input({ random: sequence(0.5, 0.05).random })).rarityId).toBe('golden');
      expect(resolver.resolve(input({ random: sequence(0.5, 0.06).random })).rarityId).toBe('basic');
    });

    it('등급 없는 테이블 → 항상 기본 등급', () => {
      const result = resolver.resolve(input({ rarityTable: { tiers: [] } }));
      expect(result.rarityId).toBe('basic');
      expect(result.rarityRates).toEqual([{ rarityId: 'basic', probability: 1, isCommon: true }]);
    });

    it('commonRarityId 지정', () => {
      const result = resolver.resolve(
        input({ rarityTable: { ...BASIC_TABLE, commonRarityId: 'normal' } }),
      );
      expect(result.rarityId).toBe('normal');
    });

    it('cap이 luck 배수를 제한', () => {
      const result = resolver.resolve(
        input({ aggregates: { luckBoost: 10 }, modifierCaps: { golden: 0.06 } }),
      );
      const golden = result.rarityRates.find((r) => r.rarityId === 'golden');
      expect(golden?.probability).toBe(0.06);
    });

    it('maxLuckMultiplier가 luck 배수를 제한', () => {
      const result = resolver.resolve(
        input({
          rarityTable: { ...BASIC_TABLE, maxLuckMultiplier: 2 },
          aggregates: { luckBoost: 10 },
        }),
      );
      const golden = result.rarityRates.find((r) => r.rarityId === 'golden');
      expect(golden?.probability).toBeCloseTo(0.1, 12);
    });

    it('음수 luck은 0 배수까지만: 희귀 등급 확률 0', () => {
      const result = resolver.resolve(
        input({ aggregates: { luckBoost: -5 }, random: sequence(0.5, 0).random }),
      );
      expect(result.rarityId).toBe('basic');
      expect(result.rarityRates.map((r) => r.probability)).toEqual([0, 0, 1]);
    });

    it('등급별 luckStats', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.05, rank: 1 },
          { rarityId: 'rainbow', probability: 0.005, rank: 2, luckStats: ['rareLuckBoost'] },
        ],
      };
      const result = resolver.resolve(
        input({ rarityTable: table, aggregates: { luckBoost: 1, rareLuckBoost: 3 } }),
      );
      const [rainbow, golden] = result.rarityRates;
      expect(rainbow.probability).toBeCloseTo(0.02, 12);
      expect(golden.probability).toBeCloseTo(0.1, 12);
    });

    it('합이 1을 넘으면 명시 등급을 비례 축소', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.5, rank: 1 },
          { rarityId: 'rainbow', probability: 0.3, rank: 2 },
        ],
      };
      const result = resolver.resolve(input({ rarityTable: table, aggregates: { luckBoost: 1 } }));
      const [rainbow, golden, basic] = result.rarityRates;
      expect(rainbow.probability).toBeCloseTo(0.375, 12);
      expect(golden.probability).toBeCloseTo(0.625, 12);
      expect(basic.probability).toBeCloseTo(0, 12);
    });

    it('minCommonProbability는 기본 등급 몫을 남긴다', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.5, rank: 1 },
          { rarityId: 'rainbow', probability: 0.3, rank: 2 },
        ],
        minCommonProbability: 0.2,
      };
      const result = resolver.resolve(input({ rarityTable: table, aggregates: { luckBoost: 1 } }));
      const [rainbow, golden, basic] = result.rarityRates;
      expect(rainbow.probability).toBeCloseTo(0.3, 12);
      expect(golden.probability).toBeCloseTo(0.5, 12);
      expect(basic.probability).toBeCloseTo(0.2, 12);
    });
  });

  describe('프리미엄 테이블 (allowCommon=false)', () => {
    const PREMIUM: RarityTable = {
      tiers: [
        { rarityId: 'golden', probability: 0.95, rank: 1 },
        { rarityId: 'rainbow', probability: 0.05, rank: 2 },
      ],
      allowCommon: false,
    };

    it('기본 등급은 나오지 않는다', () => {
      for (const r2 of [0, 0.04, 0.05, 0.5, 0.999999999]) {
        const result = resolver.resolve(
          input({ rarityTable: PREMIUM, random: sequence(0.5, r2).random }),
        );
        expect(result.rarityId).not.toBe('basic');
      }
    });

    it('희귀 등급은 실효 확률 그대로, 가장 흔한 등급이 나머지', () => {
      const result = resolver.resolve(
        input({ rarityTable: PREMIUM, aggregates: { luckBoost: 9 } }),
      );
      // rainbow min(0.05 * 10, 1) = 0.5, golden = 1 - 0.5
      const [rainbow, golden, basic] = result.rarityRates;
      expect(rainbow).toEqual({ rarityId: 'rainbow', probability: 0.5, isCommon: false });
      expect(golden).toEqual({ rarityId: 'golden', probability: 0.5, isCommon: false });
      expect(basic).toEqual({ rarityId: 'basic', probability: 0, isCommon: true });
    });

    it('luck으로 희귀 등급 cap까지 도달한다', () => {
      const rates = resolver.computeRates(
        { ...PREMIUM, maxLuckMultiplier: 5 },
        { rainbow: 0.25 },
        { luckBoost: 4 },
      );
      expect(rates.map((r) => r.rarityId)).toEqual(['rainbow', 'golden', 'basic']);
      expect(rates[0].probability).toBeCloseTo(0.25, 12);
      expect(rates[1].probability).toBeCloseTo(0.75, 12);
    });

    it('희귀 등급 합이 1에 닿으면 남은 등급은 0', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.5, rank: 1 },
          { rarityId: 'rainbow', probability: 0.3, rank: 2 },
          { rarityId: 'shadow', probability: 0.2, rank: 3 },
        ],
        allowCommon: false,
      };
      const rates = resolver.computeRates(table, {}, { luckBoost: 2 });
      // shadow 0.6, rainbow min(0.9, 0.4), golden 0
      expect(rates.map((r) => r.rarityId)).toEqual(['shadow', 'rainbow', 'golden', 'basic']);
      expect(rates[0].probability).toBeCloseTo(0.6, 12);
      expect(rates[1].probability).toBeCloseTo(0.4, 12);
      expect(rates[2].probability).toBeCloseTo(0, 12);
    });

    it('r2 구간: 희귀 등급 몫 미만이면 희귀, 아니면 가장 흔한 등급', () => {
      const aggregates = { luckBoost: 9 };
      const low = resolver.resolve(
        input({ rarityTable: PREMIUM, aggregates, random: sequence(0.5, 0.49).random }),
      );
      const high = resolver.resolve(
        input({ rarityTable: PREMIUM, aggregates, random: sequence(0.5, 0.5).random }),
      );
      expect(low.rarityId).toBe('rainbow');
      expect(high.rarityId).toBe('golden');
    });

    it('기본 확률 0인 단일 등급도 나머지 전부를 받는다', () => {
      const result = resolver.resolve(
        input({
          rarityTable: { tiers: [{ rarityId: 'golden', probability: 0, rank: 1 }], allowCommon: false },
          random: sequence(0.5, 0.99).random,
        }),
      );
      expect(result.rarityId).toBe('golden');
      expect(result.rarityRates[0]).toEqual({ rarityId: 'golden', probability: 1, isCommon: false });
    });
  });

  describe('luckBonus', () => {
    it('모든 등급 luck에 더해진다', () => {
      const rates = resolver.computeRates(BASIC_TABLE, {}, { luckBoost: 0.5 }, 0.5);
      expect(rates[0].probability).toBeCloseTo(0.01, 12);
      expect(rates[1].probability).toBeCloseTo(0.1, 12);
      expect(rates[2].probability).toBeCloseTo(0.89, 12);
    });

    it('유한하지 않으면 InvalidModifierError, random 호출 0회', () => {
      const rng = sequence(0.5);
      expect(() =>
        resolver.resolve(input({ luckBonus: Number.NaN, random: rng.random })),
      ).toThrow(InvalidModifierError);
      expect(rng.calls()).toBe(0);
    });
  });

  describe('검증', () => {
    it('빈 풀 → EmptyPoolError, random 호출 0회', () => {
      const rng = sequence(0.5);
      expect(() => resolver.resolve(input({ pool: {}, random: rng.random }))).toThrow(EmptyPoolError);
      expect(rng.calls()).toBe(0);
    });

    it.each([[0], [-1], [Number.NaN], [Number.POSITIVE_INFINITY]])(
      '가중치 %p → EmptyPoolError',
      (weight) => {
        expect(() => resolver.resolve(input({ pool: { bear: 10, bunny: weight } }))).toThrow(
          EmptyPoolError,
        );
      },
    );

    it('기본 확률 합 > 1 → InvalidRarityTableError', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.7, rank: 1 },
          { rarityId: 'rainbow', probability: 0.4, rank: 2 },
        ],
      };
      expect(() => resolver.resolve(input({ rarityTable: table }))).toThrow(InvalidRarityTableError);
    });

    it('0.95 + 0.05 는 오차 범위 안', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.95, rank: 1 },
          { rarityId: 'rainbow', probability: 0.05, rank: 2 },
        ],
      };
      expect(() => resolver.resolve(input({ rarityTable: table }))).not.toThrow();
    });

    it('중복 등급 id → InvalidRarityTableError', () => {
      const table: RarityTable = {
        tiers: [
          { rarityId: 'golden', probability: 0.01, rank: 1 },
          { rarityId: 'golden', probability: 0.02, rank: 2 },
        ],
      };
      expect(() => resolver.resolve(input({ rarityTable: table }))).toThrow(InvalidRarityTableError);
    });

    it('기본 등급 id와 같은 명시 등급 → InvalidRarityTableError', () => {
      const table: RarityTable = { tiers: [{ rarityId: 'basic', probability: 0.1, rank: 1 }] };
      expect(() => resolver.resolve(input({ rarityTable: table }))).toThrow(InvalidRarityTableError);
    });

    it('cap 0 → InvalidRarityTableError', () => {
      expect(() => resolver.resolve(input({ modifierCaps: { golden: 0 } }))).toThrow(
        InvalidRarityTableError,
      );
    });

    it('집계값 NaN → InvalidModifierError, random 소비 없음', () => {
      const rng = sequence(0.5);
      expect(() =>
        resolver.resolve(input({ aggregates: { luckBoost: Number.NaN }, random: rng.random })),
      ).toThrow(InvalidModifierError);
      expect(rng.calls()).toBe(0);
    });

    it.each([[1], [-0.1], [Number.NaN], [1.5]])('random %p → InvalidRandomValueError', (value) => {
      expect(() => resolver.resolve(input({ random: () => value }))).toThrow(
        InvalidRandomValueError,
      );
    });
  });

  describe('분포', () => {
    const N = 100_000;

    function frequencies(
      overrides: Partial<ResolveInput>,
      seed: string,
    ): { categories: Record<string, number>; rarities: Record<string, number> } {
      const rng = new Rng(seed);
      const categories: Record<string, number> = {};
      const rarities: Record<string, number> = {};
      for (let i = 0; i < N; i++) {
        const result = resolver.resolve(input({ ...overrides, random: rng.asSource() }));
        categories[result.categoryId] = (categories[result.categoryId] ?? 0) + 1;
        rarities[result.rarityId] = (rarities[result.rarityId] ?? 0) + 1;
      }
      return { categories, rarities };
    }

    it('카테고리/등급 빈도가 기대값 ±1% 이내', () => {
      const { categories, rarities } = frequencies({}, 'distribution-basic');
      const expectedCategories: Record<string, number> = {
        bear: 0.25,
        bunny: 0.25,
        doggy: 0.25,
        kitty: 0.2,
        dragon: 0.05,
      };
      for (const [id, p] of Object.entries(expectedCategories)) {
        expect(Math.abs((categories[id] ?? 0) / N - p)).toBeLessThanOrEqual(0.01);
      }
      const expectedRarities: Record<string, number> = { basic: 0.945, golden: 0.05, rainbow: 0.005 };
      for (const [id, p] of Object.entries(expectedRarities)) {
        expect(Math.abs((rarities[id] ?? 0) / N - p)).toBeLessThanOrEqual(0.01);
      }
    });

    it('luck 적용 시 등급 빈도가 실효 확률을 따른다', () => {
      const { rarities } = frequencies(
        { aggregates: { luckBoost: 10 }, modifierCaps: { golden: 1, rainbow: 1 } },
        'distribution-lucky',
      );
      const expected: Record<string, number> = { basic: 0.395, golden: 0.55, rainbow: 0.055 };
      for (const [id, p] of Object.entries(expected)) {
        expect(Math.abs((rarities[id] ?? 0) / N - p)).toBeLessThanOrEqual(0.01);
      }
    });
  });
});
