// 이펙트 modifier 공용 타입: 엔진 / 저장소 / 콘텐츠가 함께 사용

export const STACKING_POLICY = ['extend_duration', 'reset', 'stack'] as const;
export type StackingPolicy = (typeof STACKING_POLICY)[number];

/** duration 센티넬: 만료 없음 */
export const PERMANENT = 'permanent' as const;
export type ModifierDuration = number | typeof PERMANENT;

export const MODIFIER_CHANGE_REASON = [
  'applied',
  'removed',
  'expired',
  'restored',
  'cleared',
] as const;
export type ModifierChangeReason = (typeof MODIFIER_CHANGE_REASON)[number];

/**
 * 저장 형식: 절대 만료 시각이 아니라 남은 시간(초)을 저장한다.
 * remainingSeconds = null → 영구
 */
export interface PersistedModifier {
  sourceId: string;
  statKey: string;
  value: number;
  remainingSeconds: number | null;
  stacking: StackingPolicy;
}

/** statKey → 합산된 보너스 (0.5 = +50%) */
export type AggregateMap = Record<string, number>;
