// 알 부화 + 확률 미리보기

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  EggLockedError,
  HatchCooldownError,
  InvalidInputError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { HatcheryConfigService } from '../config/hatchery-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type { EggDefinition, UnlockRequirement } from '../content/content.types.js';
import { DEFAULT_LUCK_STAT, type AggregateMap } from '../db/types/index.js';
import { GlobalEffectsService } from '../effects/global-effects.service.js';
import { PlayerEffectsService } from '../effects/player-effects.service.js';
import { ClockService } from '../engine/clock/clock.service.js';
import {
  PetCatalogService,
  type PetDescription,
} from '../engine/hatching/pet-catalog.service.js';
import {
  formatChance,
  luckFromStats,
  sortCategoryIds,
  sumStable,
} from '../engine/rewards/rarity-math.js';
import { RewardResolverService } from '../engine/rewards/reward-resolver.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import {
  HATCH_PROGRESS_STORE,
  type HatchProgressStore,
} from './store/hatch-progress-store.js';

export interface HatchResult {
  eggId: string;
  /** 알 i번째는 `${seed}:${i}` 로 시딩 */
  seed: string;
  results: PetDescription[];
  luckMultiplier: number;
  /** 이번 부화를 포함한 누적 부화 수 */
  petsHatched: number;
}

export interface PreviewEntry {
  petId: string;
  rarityId: string;
  displayName: string;
  chance: number;
  display: string;
}

export interface EggSummary {
  eggId: string;
  name: string;
  petIds: string[];
  rarityIds: string[];
  allowCommon: boolean;
  unlockRequirement: UnlockRequirement | null;
}

@Injectable()
export class HatchService {
  private readonly logger = new Logger(HatchService.name);
  private readonly lastHatchAt = new Map<string, number>();

  constructor(
    private readonly content: ContentLoaderService,
    private readonly catalog: PetCatalogService,
    private readonly resolver: RewardResolverService,
    private readonly rng: RngService,
    private readonly playerEffects: PlayerEffectsService,
    private readonly globalEffects: GlobalEffectsService,
    private readonly config: HatcheryConfigService,
    private readonly clock: ClockService,
    @Inject(HATCH_PROGRESS_STORE) private readonly progress: HatchProgressStore,
  ) {}

  listEggs(): EggSummary[] {
    return this.content.getAllEggs().map((egg) => ({
      eggId: egg.eggId,
      name: egg.name,
      petIds: sortCategoryIds(Object.keys(egg.petWeights)),
      rarityIds: egg.rarity.tiers.map((t) => t.rarityId),
      allowCommon: egg.rarity.allowCommon ?? true,
      unlockRequirement: egg.unlockRequirement ?? null,
    }));
  }

  async getPetsHatched(subjectId: string): Promise<number> {
    return this.progress.getPetsHatched(subjectId);
  }

  /** 쿨다운 중인 subject 수 */
  get cooldownCount(): number {
    return this.lastHatchAt.size;
  }

  async hatch(subjectId: string, eggId: string, count: number = 1): Promise<HatchResult> {
    const egg = this.requireEgg(eggId);
    const { hatchMaxBatch, hatchCooldownS } = this.config.get();
    if (!Number.isInteger(count) || count < 1 || count > hatchMaxBatch) {
      throw new InvalidInputError(`count must be between 1 and ${hatchMaxBatch}`, { count });
    }

    // 쿨다운 확인과 기록은 await 전에: 동시 요청 차단
    const now = this.clock.now();
    this.reserveCooldown(subjectId, now, hatchCooldownS);

    try {
      const petsHatched = await this.progress.getPetsHatched(subjectId);
      this.assertUnlocked(egg, petsHatched);
      await this.playerEffects.loadSubject(subjectId);
      const aggregates = this.globalEffects.combinedAggregates(subjectId, now);
      const luckBonus = petsHatched * egg.luckPerPetHatched;

      const seed = this.rng.randomSeed();
      const results: PetDescription[] = [];
      for (let i = 0; i < count; i++) {
        const rng = this.rng.create(`${seed}:${i}`);
        const reward = this.resolver.resolve({
          pool: egg.petWeights,
          rarityTable: egg.rarity,
          modifierCaps: egg.modifierCaps,
          aggregates,
          random: rng.asSource(),
          luckBonus,
        });
        results.push(this.catalog.describe(reward.categoryId, reward.rarityId));
      }

      const total = await this.progress.addPetsHatched(subjectId, count);
      const luckMultiplier = this.luckOf(egg, aggregates, luckBonus);
      this.logger.log(
        `Hatched ${eggId} x${count} for ${subjectId} (seed=${seed}, luck=${luckMultiplier}, total=${total}): ${results
          .map((r) => `${r.rarityId}/${r.petId}`)
          .join(', ')}`,
      );
      return { eggId, seed, results, luckMultiplier, petsHatched: total };
    } catch (err) {
      // 부화가 안 됐으면 쿨다운도 없던 일로
      if (this.lastHatchAt.get(subjectId) === now) {
        this.lastHatchAt.delete(subjectId);
      }
      throw err;
    }
  }

  /**
   * (펫, 등급)별 확률 = 카테고리 비중 × 등급 실효 확률.
   * 확률 내림차순, 같으면 펫 id 순, 희귀 등급 먼저.
   */
  async preview(subjectId: string, eggId: string): Promise<PreviewEntry[]> {
    const egg = this.requireEgg(eggId);
    const { previewMaxEntries, previewMinChance, previewPrecision } = this.config.get();
    await this.playerEffects.loadSubject(subjectId);
    const aggregates = this.globalEffects.combinedAggregates(subjectId);
    const petsHatched = await this.progress.getPetsHatched(subjectId);
    const rates = this.resolver.computeRates(
      egg.rarity,
      egg.modifierCaps,
      aggregates,
      petsHatched * egg.luckPerPetHatched,
    );

    const rankOf = new Map(egg.rarity.tiers.map((t) => [t.rarityId, t.rank]));
    const categories = sortCategoryIds(Object.keys(egg.petWeights));
    const total = sumStable(categories.map((id) => egg.petWeights[id]));

    const entries: (PreviewEntry & { rank: number })[] = [];
    for (const categoryId of categories) {
      const share = egg.petWeights[categoryId] / total;
      for (const rate of rates) {
        if (rate.probability <= 0) continue;
        const chance = share * rate.probability;
        const pet = this.catalog.describe(categoryId, rate.rarityId);
        entries.push({
          petId: categoryId,
          rarityId: rate.rarityId,
          displayName: pet.displayName,
          chance,
          display: formatChance(chance, {
            precision: previewPrecision,
            minChanceToShow: previewMinChance,
          }),
          rank: rankOf.get(rate.rarityId) ?? Number.NEGATIVE_INFINITY,
        });
      }
    }

    entries.sort((a, b) => {
      if (a.chance !== b.chance) return b.chance - a.chance;
      if (a.petId !== b.petId) return a.petId < b.petId ? -1 : 1;
      return b.rank - a.rank;
    });
    return entries
      .slice(0, previewMaxEntries)
      .map(({ rank: _rank, ...entry }) => entry);
  }

  private luckOf(egg: EggDefinition, aggregates: AggregateMap, luckBonus: number): number {
    return luckFromStats(
      [DEFAULT_LUCK_STAT],
      aggregates,
      egg.rarity.maxLuckMultiplier,
      luckBonus,
    );
  }

  /** 만료된 기록은 정리하고, 남아 있으면 거절 */
  private reserveCooldown(subjectId: string, now: number, cooldownS: number): void {
    for (const [id, at] of this.lastHatchAt) {
      if (now - at >= cooldownS) this.lastHatchAt.delete(id);
    }
    const last = this.lastHatchAt.get(subjectId);
    if (last !== undefined) {
      throw new HatchCooldownError(Math.ceil(cooldownS - (now - last)));
    }
    this.lastHatchAt.set(subjectId, now);
  }

  private assertUnlocked(egg: EggDefinition, petsHatched: number): void {
    const requirement = egg.unlockRequirement;
    if (requirement?.type === 'pets_hatched' && petsHatched < requirement.amount) {
      throw new EggLockedError(egg.eggId, requirement.amount, petsHatched);
    }
  }

  private requireEgg(eggId: string): EggDefinition {
    const egg = this.content.getEgg(eggId);
    if (!egg) {
      throw new NotFoundError(`Egg not found: ${eggId}`, { eggId });
    }
    return egg;
  }
}
