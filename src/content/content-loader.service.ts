// hatchery_v1 JSON 로드 + 교차 검증 + 메모리 캐시

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ContentValidationError } from '../common/errors/game-errors.js';
import { formatZodIssues } from '../common/pipes/zod-validation.pipe.js';
import { HatcheryConfigService } from '../config/hatchery-config.service.js';
import { DEFAULT_COMMON_RARITY_ID } from '../db/types/index.js';
import {
  EffectDefinitionSchema,
  EggDefinitionSchema,
  PetDefinitionSchema,
  type EffectDefinition,
  type EggDefinition,
  type PetDefinition,
} from './content.types.js';

interface ContentSet {
  pets: Map<string, PetDefinition>;
  eggs: Map<string, EggDefinition>;
  effects: Map<string, EffectDefinition>;
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private pets = new Map<string, PetDefinition>();
  private eggs = new Map<string, EggDefinition>();
  private effects = new Map<string, EffectDefinition>();

  constructor(private readonly config: HatcheryConfigService) {}

  async onModuleInit() {
    await this.loadFrom(this.config.get().contentDir);
  }

  /** 디렉터리 전체를 읽어 교체: 하나라도 실패하면 기존 캐시 유지 */
  async loadFrom(dir: string): Promise<void> {
    const [petsRaw, eggsRaw, effectsRaw] = await Promise.all([
      this.readJson(dir, 'pets.json'),
      this.readJson(dir, 'eggs.json'),
      this.readJson(dir, 'effects.json'),
    ]);
    const loaded = this.build(petsRaw, eggsRaw, effectsRaw);
    this.pets = loaded.pets;
    this.eggs = loaded.eggs;
    this.effects = loaded.effects;
    this.logger.log(
      `Content loaded from ${dir}: ${this.pets.size} pets, ${this.eggs.size} eggs, ${this.effects.size} effects`,
    );
  }

  /** 파싱된 JSON 값으로 직접 적재 (테스트/핫 리로드용) */
  loadRaw(raw: { pets: unknown; eggs: unknown; effects: unknown }): void {
    const loaded = this.build(raw.pets, raw.eggs, raw.effects);
    this.pets = loaded.pets;
    this.eggs = loaded.eggs;
    this.effects = loaded.effects;
  }

  getPet(petId: string): PetDefinition | undefined {
    return this.pets.get(petId);
  }

  getAllPets(): PetDefinition[] {
    return [...this.pets.values()];
  }

  getEgg(eggId: string): EggDefinition | undefined {
    return this.eggs.get(eggId);
  }

  getAllEggs(): EggDefinition[] {
    return [...this.eggs.values()];
  }

  getEffect(effectId: string): EffectDefinition | undefined {
    return this.effects.get(effectId);
  }

  getAllEffects(): EffectDefinition[] {
    return [...this.effects.values()];
  }

  private async readJson(dir: string, file: string): Promise<unknown> {
    const path = join(dir, file);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      throw new ContentValidationError(`Cannot read ${file}`, {
        path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ContentValidationError(`Malformed JSON in ${file}`, {
        path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private build(petsRaw: unknown, eggsRaw: unknown, effectsRaw: unknown): ContentSet {
    const pets = this.indexBy('pets.json', petsRaw, PetDefinitionSchema, (p) => p.petId);
    const eggs = this.indexBy('eggs.json', eggsRaw, EggDefinitionSchema, (e) => e.eggId);
    const effects = this.indexBy(
      'effects.json',
      effectsRaw,
      EffectDefinitionSchema,
      (e) => e.effectId,
    );

    const issues: string[] = [];
    for (const egg of eggs.values()) {
      issues.push(...this.checkEgg(egg, pets));
    }
    for (const effect of effects.values()) {
      if (Object.keys(effect.statModifiers).length === 0) {
        issues.push(`effect ${effect.effectId}: statModifiers is empty`);
      }
    }
    if (issues.length > 0) {
      throw new ContentValidationError('Content cross-check failed', { issues });
    }
    return { pets, eggs, effects };
  }

  /** 알 풀의 모든 카테고리에 등급별 변종이 있어야 한다 */
  private checkEgg(egg: EggDefinition, pets: Map<string, PetDefinition>): string[] {
    const issues: string[] = [];
    const categories = Object.keys(egg.petWeights);
    if (categories.length === 0) {
      issues.push(`egg ${egg.eggId}: petWeights is empty`);
    }

    const rarityIds = egg.rarity.tiers.map((t) => t.rarityId);
    if (egg.rarity.allowCommon !== false) {
      rarityIds.push(egg.rarity.commonRarityId ?? DEFAULT_COMMON_RARITY_ID);
    }
    for (const categoryId of categories) {
      const pet = pets.get(categoryId);
      if (!pet) {
        issues.push(`egg ${egg.eggId}: unknown pet ${categoryId}`);
        continue;
      }
      for (const rarityId of rarityIds) {
        if (!pet.variants[rarityId]) {
          issues.push(`egg ${egg.eggId}: pet ${categoryId} has no ${rarityId} variant`);
        }
      }
    }

    const seen = new Set<string>();
    let baseSum = 0;
    for (const tier of egg.rarity.tiers) {
      if (seen.has(tier.rarityId)) {
        issues.push(`egg ${egg.eggId}: duplicate rarity ${tier.rarityId}`);
      }
      seen.add(tier.rarityId);
      baseSum += tier.probability;
    }
    if (baseSum > 1 + 1e-9) {
      issues.push(`egg ${egg.eggId}: rarity probabilities sum to ${baseSum}`);
    }
    return issues;
  }

  private indexBy<T extends z.ZodTypeAny>(
    file: string,
    raw: unknown,
    schema: T,
    keyOf: (item: z.infer<T>) => string,
  ): Map<string, z.infer<T>> {
    const parsed = z.array(schema).safeParse(raw);
    if (!parsed.success) {
      throw new ContentValidationError(`Invalid ${file}`, {
        issues: formatZodIssues(parsed.error.issues),
      });
    }
    const map = new Map<string, z.infer<T>>();
    for (const item of parsed.data) {
      const key = keyOf(item);
      if (map.has(key)) {
        throw new ContentValidationError(`Duplicate id in ${file}: ${key}`);
      }
      map.set(key, item);
    }
    return map;
  }
}
