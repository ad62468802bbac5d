// 서버 전체 이펙트: 예약 subject 하나에 모아 두고 플레이어 합계에 더한다

import { Injectable, type OnModuleInit } from '@nestjs/common';
import type { AggregateMap } from '../db/types/index.js';
import { sumStable } from '../engine/rewards/rarity-math.js';
import {
  PlayerEffectsService,
  type ActiveEffect,
  type ApplyEffectOptions,
} from './player-effects.service.js';

export const GLOBAL_SUBJECT_ID = '__global__';

@Injectable()
export class GlobalEffectsService implements OnModuleInit {
  constructor(private readonly effects: PlayerEffectsService) {}

  async onModuleInit() {
    await this.effects.loadSubject(GLOBAL_SUBJECT_ID);
  }

  async applyGlobalEffect(
    effectId: string,
    options: ApplyEffectOptions = {},
  ): Promise<ActiveEffect[]> {
    return this.effects.applyScoped(GLOBAL_SUBJECT_ID, effectId, 'global', options);
  }

  async removeGlobalEffect(effectId: string): Promise<boolean> {
    return this.effects.removeEffect(GLOBAL_SUBJECT_ID, effectId);
  }

  getGlobalEffects(now?: number): ActiveEffect[] {
    return this.effects.getActiveEffects(GLOBAL_SUBJECT_ID, now);
  }

  getGlobalAggregates(now?: number): AggregateMap {
    return this.effects.getAggregates(GLOBAL_SUBJECT_ID, now);
  }

  /** 플레이어 + 전역 합계 (키별 합) */
  combinedAggregates(subjectId: string, now?: number): AggregateMap {
    const player = this.effects.getAggregates(subjectId, now);
    const global = this.getGlobalAggregates(now);
    const combined: AggregateMap = {};
    for (const statKey of [...new Set([...Object.keys(player), ...Object.keys(global)])].sort()) {
      combined[statKey] = sumStable([player[statKey] ?? 0, global[statKey] ?? 0]);
    }
    return combined;
  }
}
