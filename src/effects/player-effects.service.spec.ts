import { PlayerEffectsService } from './player-effects.service.js';
import { InMemoryModifierStore } from './store/in-memory-modifier-store.js';
import { EffectAggregationService } from '../engine/effects/effect-aggregation.service.js';
import { FixedClock } from '../engine/clock/testing/fixed-clock.js';
import { createTestConfig, createTestContent } from '../content/testing/content-fixtures.js';
import {
  BadRequestError,
  InvalidInputError,
  NotFoundError,
} from '../common/errors/game-errors.js';

describe('PlayerEffectsService', () => {
  let clock: FixedClock;
  let engine: EffectAggregationService;
  let store: InMemoryModifierStore;
  let effects: PlayerEffectsService;

  function createService(): PlayerEffectsService {
    const config = createTestConfig();
    return new PlayerEffectsService(engine, createTestContent(config), config, clock, store);
  }

  beforeEach(() => {
    clock = new FixedClock(1000);
    engine = new EffectAggregationService(clock);
    store = new InMemoryModifierStore();
    effects = createService();
  });

  describe('applyEffect', () => {
    it('콘텐츠 기본 지속시간으로 적용', async () => {
      const active = await effects.applyEffect('p1', 'luck_potion');
      expect(active).toEqual([
        {
          effectId: 'luck_potion',
          displayName: 'Luck Potion',
          remainingSeconds: 600,
          statModifiers: { luckBoost: 1 },
        },
      ]);
      expect(effects.getAggregates('p1')).toEqual({ luckBoost: 1 });
    });

    it('여러 스탯을 가진 이펙트', async () => {
      const [blessing] = await effects.applyEffect('p1', 'trader_blessing');
      expect(blessing.statModifiers).toEqual({ coinMultiplier: 0.25, luckBoost: 0.5 });
      expect(effects.getAggregates('p1')).toEqual({ coinMultiplier: 0.25, luckBoost: 0.5 });
    });

    it('duration 지정 / -1 = 영구', async () => {
      await effects.applyEffect('p1', 'luck_potion', { duration: 30 });
      const [active] = await effects.applyEffect('p1', 'vip_pass');
      expect(active.effectId).toBe('luck_potion');
      expect(active.remainingSeconds).toBe(30);
      expect(effects.getActiveEffects('p1')[1]).toMatchObject({
        effectId: 'vip_pass',
        remainingSeconds: null,
      });
    });

    it('extend_duration 재적용은 남은 시간을 줄이지 않는다', async () => {
      await effects.applyEffect('p1', 'luck_potion');
      clock.advance(100);
      await effects.applyEffect('p1', 'luck_potion', { duration: 60 });
      expect(effects.getActiveEffects('p1')[0].remainingSeconds).toBe(500);
      expect(effects.getAggregates('p1')).toEqual({ luckBoost: 1 });
    });

    it('stack 이펙트는 값이 누적', async () => {
      await effects.applyEffect('p1', 'rainbow_charm');
      clock.advance(10);
      const [charm] = await effects.applyEffect('p1', 'rainbow_charm');
      expect(charm.statModifiers).toEqual({ luckBoost: 0.5 });
      // 가장 늦게 끝나는 항목 기준
      expect(charm.remainingSeconds).toBe(120);
    });

    it('없는 이펙트 → NotFoundError', async () => {
      await expect(effects.applyEffect('p1', 'nope')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('전역 이펙트를 플레이어에 적용 → BadRequestError', async () => {
      await expect(effects.applyEffect('p1', 'global_luck_weekend')).rejects.toBeInstanceOf(
        BadRequestError,
      );
    });

    it('음수 duration → InvalidInputError', async () => {
      await expect(
        effects.applyEffect('p1', 'luck_potion', { duration: -5 }),
      ).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe('remove / clear', () => {
    it('removeEffect: true 후 false', async () => {
      await effects.applyEffect('p1', 'trader_blessing');
      await effects.applyEffect('p1', 'luck_potion');
      await expect(effects.removeEffect('p1', 'trader_blessing')).resolves.toBe(true);
      await expect(effects.removeEffect('p1', 'trader_blessing')).resolves.toBe(false);
      expect(effects.getAggregates('p1')).toEqual({ luckBoost: 1 });
    });

    it('clearEffects: 제거된 modifier 수', async () => {
      await effects.applyEffect('p1', 'trader_blessing');
      await effects.applyEffect('p1', 'luck_potion');
      await expect(effects.clearEffects('p1')).resolves.toBe(3);
      expect(effects.getActiveEffects('p1')).toEqual([]);
    });
  });

  describe('sweep', () => {
    it('만료된 이펙트 정리', async () => {
      await effects.applyEffect('p1', 'luck_potion', { duration: 10 });
      clock.advance(10);
      await effects.tick();
      expect(effects.getActiveEffects('p1')).toEqual([]);
      expect(engine.subjectIds()).toEqual([]);
    });

    it('저장 주기마다 변경된 subject만 저장', async () => {
      const save = jest.spyOn(store, 'save');
      await effects.applyEffect('p1', 'luck_potion');
      clock.set(1010);
      await effects.tick();
      expect(save).not.toHaveBeenCalled();
      clock.set(1030);
      await effects.tick();
      expect(save).toHaveBeenCalledTimes(1);
      expect(save).toHaveBeenCalledWith('p1', [
        {
          sourceId: 'luck_potion',
          statKey: 'luckBoost',
          value: 1,
          remainingSeconds: 570,
          stacking: 'extend_duration',
        },
      ]);
      clock.set(1061);
      await effects.tick();
      expect(save).toHaveBeenCalledTimes(1);
    });

    it('저장 실패는 기록만 하고 다음 주기에 재시도', async () => {
      const save = jest.spyOn(store, 'save').mockRejectedValue(new Error('db down'));
      await effects.applyEffect('p1', 'luck_potion');
      await effects.saveDirty();
      await effects.saveDirty();
      expect(save).toHaveBeenCalledTimes(2);
    });

    it('종료 시 변경분 flush', async () => {
      await effects.applyEffect('p1', 'vip_pass');
      await effects.onModuleDestroy();
      await expect(store.load('p1')).resolves.toEqual([
        {
          sourceId: 'vip_pass',
          statKey: 'luckBoost',
          value: 0.5,
          remainingSeconds: null,
          stacking: 'reset',
        },
      ]);
    });
  });

  describe('load / save / unload', () => {
    it('남은 시간 기준으로 저장하고 새 인스턴스에서 복원', async () => {
      await effects.applyEffect('p1', 'luck_potion');
      clock.advance(100);
      await effects.saveSubject('p1');

      // 재접속: 새 엔진 + 새 서비스, 오프라인 시간은 소모되지 않음
      engine = new EffectAggregationService(clock);
      const restarted = createService();
      clock.advance(1000);
      await expect(restarted.loadSubject('p1')).resolves.toBe(1);
      expect(restarted.getActiveEffects('p1')).toEqual([
        {
          effectId: 'luck_potion',
          displayName: 'Luck Potion',
          remainingSeconds: 500,
          statModifiers: { luckBoost: 1 },
        },
      ]);
      await expect(restarted.loadSubject('p1')).resolves.toBe(0);
    });

    it('동시 요청에도 저장소 로드는 한 번', async () => {
      const load = jest.spyOn(store, 'load');
      await Promise.all([
        effects.applyEffect('p1', 'luck_potion'),
        effects.applyEffect('p1', 'trader_blessing'),
      ]);
      expect(load).toHaveBeenCalledTimes(1);
      expect(effects.getAggregates('p1')).toEqual({ coinMultiplier: 0.25, luckBoost: 1.5 });
    });

    it('unloadSubject: 저장 후 메모리에서 제거', async () => {
      await effects.applyEffect('p1', 'luck_potion');
      await effects.unloadSubject('p1');
      expect(effects.isLoaded('p1')).toBe(false);
      expect(engine.subjectIds()).toEqual([]);
      await expect(store.load('p1')).resolves.toHaveLength(1);
    });

    it('모두 제거 후 저장하면 저장소도 비워진다', async () => {
      await effects.applyEffect('p1', 'luck_potion');
      await effects.saveSubject('p1');
      await effects.removeEffect('p1', 'luck_potion');
      await effects.saveSubject('p1');
      expect(store.subjectIds()).toEqual([]);
    });
  });
});
