// 펫 카탈로그: (카테고리, 등급) → 지급할 펫 변종

import { Injectable } from '@nestjs/common';
import { InvalidInputError, NotFoundError } from '../../common/errors/game-errors.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';

export interface PetDescription {
  petId: string;
  rarityId: string;
  displayName: string;
  power: number;
  health: number;
  abilities: string[];
}

/** 레벨당 기본 파워 +10% */
const POWER_PER_LEVEL = 0.1;

@Injectable()
export class PetCatalogService {
  constructor(private readonly content: ContentLoaderService) {}

  describe(categoryId: string, rarityId: string): PetDescription {
    const pet = this.content.getPet(categoryId);
    const variant = pet?.variants[rarityId];
    if (!pet || !variant) {
      throw new NotFoundError(`Pet variant not found: ${categoryId}/${rarityId}`, {
        categoryId,
        rarityId,
      });
    }
    return {
      petId: pet.petId,
      rarityId,
      displayName: variant.displayName,
      power: variant.power,
      health: variant.health,
      abilities: [...variant.abilities],
    };
  }

  effectivePower(categoryId: string, rarityId: string, level: number): number {
    if (!Number.isInteger(level) || level < 1) {
      throw new InvalidInputError('Level must be an integer >= 1', { level });
    }
    const { power } = this.describe(categoryId, rarityId);
    return Math.floor(power * (1 + (level - 1) * POWER_PER_LEVEL));
  }
}
