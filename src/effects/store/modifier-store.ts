import type { PersistedModifier } from '../../db/types/index.js';

export const MODIFIER_STORE = Symbol('MODIFIER_STORE');

/** subject의 modifier 집합 저장소: 합계는 저장하지 않는다 */
export interface ModifierStore {
  load(subjectId: string): Promise<PersistedModifier[]>;
  /** subject의 기존 기록을 통째로 교체 */
  save(subjectId: string, records: PersistedModifier[]): Promise<void>;
}
