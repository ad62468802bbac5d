// 이펙트 집계 엔진: subject별 modifier 집합 + 스탯별 가산 합계

import { Injectable } from '@nestjs/common';
import { InvalidModifierError } from '../../common/errors/game-errors.js';
import {
  PERMANENT,
  STACKING_POLICY,
  type AggregateMap,
  type ModifierChangeReason,
  type ModifierDuration,
  type PersistedModifier,
  type StackingPolicy,
} from '../../db/types/index.js';
import { ClockService } from '../clock/clock.service.js';
import { sumStable } from '../rewards/rarity-math.js';

export interface ApplyModifierInput {
  subjectId: string;
  sourceId: string;
  statKey: string;
  value: number;
  duration: ModifierDuration;
  stacking: StackingPolicy;
  /** 생략 시 ClockService.now() */
  now?: number;
}

export interface ModifierHandle {
  readonly id: string;
  readonly subjectId: string;
  readonly sourceId: string;
  readonly statKey: string;
  readonly value: number;
  /** null = 영구 */
  readonly expiresAt: number | null;
}

export interface ModifierChangeEvent {
  subjectId: string;
  statKeys: string[];
  reason: ModifierChangeReason;
}

export type ModifierChangeListener = (event: ModifierChangeEvent) => void;

interface ModifierEntry {
  id: string;
  sourceId: string;
  statKey: string;
  value: number;
  expiresAt: number | null;
  stacking: StackingPolicy;
}

const STACKING_SET: ReadonlySet<string> = new Set(STACKING_POLICY);

function isLive(entry: ModifierEntry, now: number): boolean {
  return entry.expiresAt === null || entry.expiresAt > now;
}

function slotKey(sourceId: string, statKey: string): string {
  return `${sourceId}\u0000${statKey}`;
}

/*
 * 규칙:
 * - (subjectId, sourceId, statKey) 슬롯당 항목 1개. stack 정책만 예외로 여러 개
 * - 합계는 매번 살아있는 항목에서 재계산 (캐시 없음, 읽기는 상태를 바꾸지 않음)
 * - 엔진은 곱하지 않는다. 최종 배수 = 1 + 합계 는 호출자 몫
 */
@Injectable()
export class EffectAggregationService {
  private readonly subjects = new Map<string, Map<string, ModifierEntry[]>>();
  private readonly listeners = new Set<ModifierChangeListener>();
  private seq = 0;

  constructor(private readonly clock: ClockService) {}

  applyModifier(input: ApplyModifierInput): ModifierHandle {
    this.validate(input);
    const now = input.now ?? this.clock.now();
    const expiresAt =
      input.duration === PERMANENT ? null : now + input.duration;

    const slots = this.slotsFor(input.subjectId, true);
    const key = slotKey(input.sourceId, input.statKey);
    const existing = (slots.get(key) ?? []).filter((e) => isLive(e, now));

    let target: ModifierEntry;
    if (existing.length === 0) {
      target = this.newEntry(input, expiresAt);
      slots.set(key, [target]);
    } else if (input.stacking === 'stack') {
      target = this.newEntry(input, expiresAt);
      slots.set(key, [...existing, target]);
    } else if (input.stacking === 'reset') {
      target = this.newEntry(input, expiresAt);
      slots.set(key, [target]);
    } else {
      // extend_duration: 살아 있는 항목 전부, 기존 값 유지, 만료는 절대 당겨지지 않음
      const extended = existing.map((entry) => ({
        ...entry,
        expiresAt:
          entry.expiresAt === null || expiresAt === null
            ? null
            : Math.max(entry.expiresAt, expiresAt),
        stacking: input.stacking,
      }));
      target = extended[0];
      slots.set(key, extended);
    }

    this.emit(input.subjectId, [input.statKey], 'applied');
    return this.toHandle(input.subjectId, target);
  }

  /** 슬롯의 모든 항목 제거 (stack 항목 포함). 없으면 false */
  removeModifier(subjectId: string, sourceId: string, statKey: string): boolean {
    const slots = this.slotsFor(subjectId, false);
    if (!slots) return false;
    const removed = slots.delete(slotKey(sourceId, statKey));
    if (!removed) return false;
    this.dropIfEmpty(subjectId, slots);
    this.emit(subjectId, [statKey], 'removed');
    return true;
  }

  /** source 하나가 건 모든 스탯 제거: 제거된 항목 수 */
  removeSource(subjectId: string, sourceId: string): number {
    const slots = this.slotsFor(subjectId, false);
    if (!slots) return 0;
    let count = 0;
    const statKeys = new Set<string>();
    for (const [key, entries] of slots) {
      if (entries[0]?.sourceId !== sourceId) continue;
      count += entries.length;
      statKeys.add(entries[0].statKey);
      slots.delete(key);
    }
    if (count === 0) return 0;
    this.dropIfEmpty(subjectId, slots);
    this.emit(subjectId, [...statKeys], 'removed');
    return count;
  }

  /** expiresAt <= now 항목 제거: 제거 수 */
  purgeExpired(subjectId: string, now: number = this.clock.now()): number {
    const slots = this.slotsFor(subjectId, false);
    if (!slots) return 0;
    let count = 0;
    const statKeys = new Set<string>();
    for (const [key, entries] of slots) {
      const live = entries.filter((e) => isLive(e, now));
      if (live.length === entries.length) continue;
      count += entries.length - live.length;
      statKeys.add(entries[0].statKey);
      if (live.length === 0) slots.delete(key);
      else slots.set(key, live);
    }
    if (count === 0) return 0;
    this.dropIfEmpty(subjectId, slots);
    this.emit(subjectId, [...statKeys], 'expired');
    return count;
  }

  getAggregate(subjectId: string, statKey: string, now: number = this.clock.now()): number {
    const values: number[] = [];
    for (const entry of this.liveEntries(subjectId, now)) {
      if (entry.statKey === statKey) values.push(entry.value);
    }
    return sumStable(values);
  }

  getAllAggregates(subjectId: string, now: number = this.clock.now()): AggregateMap {
    const byStat = new Map<string, number[]>();
    for (const entry of this.liveEntries(subjectId, now)) {
      const values = byStat.get(entry.statKey) ?? [];
      values.push(entry.value);
      byStat.set(entry.statKey, values);
    }
    const result: AggregateMap = {};
    for (const statKey of [...byStat.keys()].sort()) {
      result[statKey] = sumStable(byStat.get(statKey) ?? []);
    }
    return result;
  }

  listModifiers(subjectId: string, now: number = this.clock.now()): ModifierHandle[] {
    return this.liveEntries(subjectId, now).map((e) => this.toHandle(subjectId, e));
  }

  snapshot(subjectId: string, now: number = this.clock.now()): PersistedModifier[] {
    return this.liveEntries(subjectId, now).map((e) => ({
      sourceId: e.sourceId,
      statKey: e.statKey,
      value: e.value,
      remainingSeconds: e.expiresAt === null ? null : e.expiresAt - now,
      stacking: e.stacking,
    }));
  }

  /** 저장본으로 subject 시딩: 남은 시간이 0 이하인 기록은 건너뜀 */
  restore(
    subjectId: string,
    records: PersistedModifier[],
    now: number = this.clock.now(),
  ): number {
    const valid = records.filter(
      (r) => r.remainingSeconds === null || r.remainingSeconds > 0,
    );
    // 적용 전에 전부 검증: 중간 실패로 일부만 복원되지 않게
    for (const r of valid) {
      this.validate({
        subjectId,
        sourceId: r.sourceId,
        statKey: r.statKey,
        value: r.value,
        duration: r.remainingSeconds ?? PERMANENT,
        stacking: r.stacking,
      });
    }

    const slots = this.slotsFor(subjectId, true);
    const statKeys = new Set<string>();
    for (const r of valid) {
      const key = slotKey(r.sourceId, r.statKey);
      const entry: ModifierEntry = {
        id: this.nextId(subjectId, r.sourceId, r.statKey),
        sourceId: r.sourceId,
        statKey: r.statKey,
        value: r.value,
        expiresAt: r.remainingSeconds === null ? null : now + r.remainingSeconds,
        stacking: r.stacking,
      };
      const current = slots.get(key) ?? [];
      // stack 기록끼리만 누적, 그 외는 슬롯 하나를 덮어쓴다
      slots.set(key, r.stacking === 'stack' ? [...current, entry] : [entry]);
      statKeys.add(r.statKey);
    }
    this.dropIfEmpty(subjectId, slots);
    if (valid.length > 0) this.emit(subjectId, [...statKeys], 'restored');
    return valid.length;
  }

  clearSubject(subjectId: string): number {
    const slots = this.slotsFor(subjectId, false);
    if (!slots) return 0;
    let count = 0;
    const statKeys = new Set<string>();
    for (const entries of slots.values()) {
      count += entries.length;
      if (entries[0]) statKeys.add(entries[0].statKey);
    }
    this.subjects.delete(subjectId);
    if (count > 0) this.emit(subjectId, [...statKeys], 'cleared');
    return count;
  }

  subjectIds(): string[] {
    return [...this.subjects.keys()];
  }

  /** 변경 구독: 반환값으로 해제 */
  onChange(listener: ModifierChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private validate(input: Omit<ApplyModifierInput, 'now'>): void {
    const details = {
      subjectId: input.subjectId,
      sourceId: input.sourceId,
      statKey: input.statKey,
    };
    if (!input.subjectId || !input.sourceId || !input.statKey) {
      throw new InvalidModifierError('subjectId, sourceId and statKey are required', details);
    }
    if (!Number.isFinite(input.value)) {
      throw new InvalidModifierError('Modifier value must be finite', {
        ...details,
        value: input.value,
      });
    }
    if (
      input.duration !== PERMANENT &&
      !(Number.isFinite(input.duration) && input.duration >= 0)
    ) {
      throw new InvalidModifierError('Duration must be >= 0 or permanent', {
        ...details,
        duration: input.duration,
      });
    }
    if (!STACKING_SET.has(input.stacking)) {
      throw new InvalidModifierError(`Unknown stacking policy: ${String(input.stacking)}`, details);
    }
  }

  private slotsFor(subjectId: string, create: true): Map<string, ModifierEntry[]>;
  private slotsFor(subjectId: string, create: false): Map<string, ModifierEntry[]> | undefined;
  private slotsFor(subjectId: string, create: boolean): Map<string, ModifierEntry[]> | undefined {
    let slots = this.subjects.get(subjectId);
    if (!slots && create) {
      slots = new Map();
      this.subjects.set(subjectId, slots);
    }
    return slots;
  }

  private dropIfEmpty(subjectId: string, slots: Map<string, ModifierEntry[]>): void {
    if (slots.size === 0) this.subjects.delete(subjectId);
  }

  private liveEntries(subjectId: string, now: number): ModifierEntry[] {
    const slots = this.subjects.get(subjectId);
    if (!slots) return [];
    const result: ModifierEntry[] = [];
    for (const entries of slots.values()) {
      for (const entry of entries) {
        if (isLive(entry, now)) result.push(entry);
      }
    }
    return result;
  }

  private newEntry(input: ApplyModifierInput, expiresAt: number | null): ModifierEntry {
    return {
      id: this.nextId(input.subjectId, input.sourceId, input.statKey),
      sourceId: input.sourceId,
      statKey: input.statKey,
      value: input.value,
      expiresAt,
      stacking: input.stacking,
    };
  }

  private nextId(subjectId: string, sourceId: string, statKey: string): string {
    this.seq++;
    return `${subjectId}:${sourceId}:${statKey}#${this.seq}`;
  }

  private toHandle(subjectId: string, entry: ModifierEntry): ModifierHandle {
    return Object.freeze({
      id: entry.id,
      subjectId,
      sourceId: entry.sourceId,
      statKey: entry.statKey,
      value: entry.value,
      expiresAt: entry.expiresAt,
    });
  }

  private emit(subjectId: string, statKeys: string[], reason: ModifierChangeReason): void {
    const event: ModifierChangeEvent = { subjectId, statKeys: [...statKeys].sort(), reason };
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
