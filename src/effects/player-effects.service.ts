// 플레이어 이펙트 수명 관리: 적용 / 만료 sweep / 저장소 로드·저장

import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import {
  BadRequestError,
  InvalidInputError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { SubjectQueue } from '../common/subject-queue.js';
import { HatcheryConfigService } from '../config/hatchery-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import {
  PERMANENT_DURATION,
  type EffectDefinition,
  type EffectScope,
} from '../content/content.types.js';
import { PERMANENT, type AggregateMap, type ModifierDuration } from '../db/types/index.js';
import { ClockService } from '../engine/clock/clock.service.js';
import { EffectAggregationService } from '../engine/effects/effect-aggregation.service.js';
import { MODIFIER_STORE, type ModifierStore } from './store/modifier-store.js';

export interface ActiveEffect {
  effectId: string;
  displayName: string;
  /** null = 영구 */
  remainingSeconds: number | null;
  statModifiers: Record<string, number>;
}

export interface ApplyEffectOptions {
  /** 초. -1 = 영구, 생략 시 콘텐츠 기본값 */
  duration?: number;
}

function toModifierDuration(seconds: number): ModifierDuration {
  return seconds === PERMANENT_DURATION ? PERMANENT : seconds;
}

@Injectable()
export class PlayerEffectsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PlayerEffectsService.name);
  private readonly queue = new SubjectQueue();
  private readonly loaded = new Set<string>();
  private readonly dirty = new Set<string>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;
  private lastSaveAt: number;

  constructor(
    private readonly engine: EffectAggregationService,
    private readonly content: ContentLoaderService,
    private readonly config: HatcheryConfigService,
    private readonly clock: ClockService,
    @Inject(MODIFIER_STORE) private readonly store: ModifierStore,
  ) {
    this.lastSaveAt = clock.now();
    this.unsubscribe = engine.onChange((event) => {
      // 복원은 저장본과 같으므로 dirty 아님
      if (event.reason !== 'restored' && this.loaded.has(event.subjectId)) {
        this.dirty.add(event.subjectId);
      }
    });
  }

  onModuleInit(): void {
    const intervalMs = this.config.get().effectSweepIntervalMs;
    this.timer = setInterval(() => {
      this.tick().catch((err) => this.logger.error('Effect sweep error', err));
    }, intervalMs);
    this.logger.log(`Effect sweep started (every ${intervalMs}ms)`);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.saveDirty();
    this.logger.log('Effect sweep stopped');
  }

  async applyEffect(
    subjectId: string,
    effectId: string,
    options: ApplyEffectOptions = {},
  ): Promise<ActiveEffect[]> {
    return this.applyScoped(subjectId, effectId, 'player', options);
  }

  /** scope가 맞는 이펙트만 적용: 전역 이펙트는 GlobalEffectsService 경유 */
  async applyScoped(
    subjectId: string,
    effectId: string,
    scope: EffectScope,
    options: ApplyEffectOptions = {},
  ): Promise<ActiveEffect[]> {
    const effect = this.requireEffect(effectId);
    if (effect.scope !== scope) {
      throw new BadRequestError(`Effect ${effectId} is ${effect.scope}-scoped`, {
        effectId,
        scope: effect.scope,
      });
    }
    const duration = options.duration ?? effect.duration;
    if (
      duration !== PERMANENT_DURATION &&
      !(Number.isFinite(duration) && duration >= 0)
    ) {
      throw new InvalidInputError('duration must be >= 0 or -1 (permanent)', { duration });
    }

    return this.queue.run(subjectId, async () => {
      await this.ensureLoaded(subjectId);
      const now = this.clock.now();
      for (const [statKey, value] of Object.entries(effect.statModifiers)) {
        this.engine.applyModifier({
          subjectId,
          sourceId: effect.effectId,
          statKey,
          value,
          duration: toModifierDuration(duration),
          stacking: effect.stacking,
          now,
        });
      }
      this.logger.log(
        `Effect applied: ${subjectId} ${effectId} (${duration === PERMANENT_DURATION ? 'permanent' : `${duration}s`}, ${effect.stacking})`,
      );
      return this.getActiveEffects(subjectId, now);
    });
  }

  async removeEffect(subjectId: string, effectId: string): Promise<boolean> {
    return this.queue.run(subjectId, async () => {
      await this.ensureLoaded(subjectId);
      const removed = this.engine.removeSource(subjectId, effectId);
      if (removed > 0) {
        this.logger.log(`Effect removed: ${subjectId} ${effectId}`);
      }
      return removed > 0;
    });
  }

  async clearEffects(subjectId: string): Promise<number> {
    return this.queue.run(subjectId, async () => {
      await this.ensureLoaded(subjectId);
      const cleared = this.engine.clearSubject(subjectId);
      if (cleared > 0) {
        this.logger.log(`Effects cleared: ${subjectId} (${cleared} modifiers)`);
      }
      return cleared;
    });
  }

  /** source(이펙트)별로 묶은 활성 목록, effectId 순 */
  getActiveEffects(subjectId: string, now: number = this.clock.now()): ActiveEffect[] {
    const bySource = new Map<string, ActiveEffect>();
    for (const handle of this.engine.listModifiers(subjectId, now)) {
      const remaining = handle.expiresAt === null ? null : handle.expiresAt - now;
      const current = bySource.get(handle.sourceId);
      if (!current) {
        bySource.set(handle.sourceId, {
          effectId: handle.sourceId,
          displayName: this.content.getEffect(handle.sourceId)?.displayName ?? handle.sourceId,
          remainingSeconds: remaining,
          statModifiers: { [handle.statKey]: handle.value },
        });
        continue;
      }
      current.statModifiers[handle.statKey] =
        (current.statModifiers[handle.statKey] ?? 0) + handle.value;
      if (current.remainingSeconds !== null) {
        current.remainingSeconds =
          remaining === null ? null : Math.max(current.remainingSeconds, remaining);
      }
    }
    return [...bySource.values()].sort((a, b) =>
      a.effectId < b.effectId ? -1 : a.effectId > b.effectId ? 1 : 0,
    );
  }

  getAggregates(subjectId: string, now: number = this.clock.now()): AggregateMap {
    return this.engine.getAllAggregates(subjectId, now);
  }

  /** 저장소에서 subject 시딩: 이미 로드돼 있으면 0 */
  async loadSubject(subjectId: string): Promise<number> {
    return this.queue.run(subjectId, () => this.ensureLoaded(subjectId));
  }

  async saveSubject(subjectId: string): Promise<void> {
    return this.queue.run(subjectId, () => this.persist(subjectId));
  }

  /** 저장 후 메모리에서 제거 (접속 종료) */
  async unloadSubject(subjectId: string): Promise<void> {
    return this.queue.run(subjectId, async () => {
      if (!this.loaded.has(subjectId)) return;
      await this.persist(subjectId);
      this.loaded.delete(subjectId);
      this.dirty.delete(subjectId);
      this.engine.clearSubject(subjectId);
      this.logger.log(`Subject unloaded: ${subjectId}`);
    });
  }

  isLoaded(subjectId: string): boolean {
    return this.loaded.has(subjectId);
  }

  /** sweep 1회: 만료 정리, 저장 주기가 지났으면 변경된 subject 저장 */
  async tick(now: number = this.clock.now()): Promise<void> {
    for (const subjectId of this.engine.subjectIds()) {
      const expired = this.engine.purgeExpired(subjectId, now);
      if (expired > 0) {
        this.logger.log(`Expired ${expired} modifier(s) for ${subjectId}`);
      }
    }
    if (now - this.lastSaveAt >= this.config.get().effectSaveIntervalS) {
      this.lastSaveAt = now;
      await this.saveDirty();
    }
  }

  /** 변경된 subject 전부 저장: 실패한 subject는 다음 주기에 재시도 */
  async saveDirty(): Promise<void> {
    for (const subjectId of [...this.dirty]) {
      try {
        await this.saveSubject(subjectId);
      } catch (err) {
        this.logger.error(`Failed to save effects for ${subjectId}`, err);
      }
    }
  }

  private requireEffect(effectId: string): EffectDefinition {
    const effect = this.content.getEffect(effectId);
    if (!effect) {
      throw new NotFoundError(`Effect not found: ${effectId}`, { effectId });
    }
    return effect;
  }

  // queue 안에서만 호출
  private async ensureLoaded(subjectId: string): Promise<number> {
    if (this.loaded.has(subjectId)) return 0;
    const records = await this.store.load(subjectId);
    const restored = this.engine.restore(subjectId, records, this.clock.now());
    this.loaded.add(subjectId);
    if (restored > 0) {
      this.logger.log(`Subject loaded: ${subjectId} (${restored} modifiers)`);
    }
    return restored;
  }

  // queue 안에서만 호출
  private async persist(subjectId: string): Promise<void> {
    if (!this.loaded.has(subjectId)) return;
    const records = this.engine.snapshot(subjectId, this.clock.now());
    // await 중 sweep이 다시 dirty로 만들 수 있으므로 먼저 지운다
    this.dirty.delete(subjectId);
    try {
      await this.store.save(subjectId, records);
    } catch (err) {
      this.dirty.add(subjectId);
      throw err;
    }
    this.logger.log(`Subject saved: ${subjectId} (${records.length} modifiers)`);
  }
}
