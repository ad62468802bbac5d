import { Injectable } from '@nestjs/common';
import type { PersistedModifier } from '../../db/types/index.js';
import type { ModifierStore } from './modifier-store.js';

/** DATABASE_URL 없는 로컬 실행 / 테스트용 */
@Injectable()
export class InMemoryModifierStore implements ModifierStore {
  private readonly rows = new Map<string, PersistedModifier[]>();

  async load(subjectId: string): Promise<PersistedModifier[]> {
    return (this.rows.get(subjectId) ?? []).map((r) => ({ ...r }));
  }

  async save(subjectId: string, records: PersistedModifier[]): Promise<void> {
    if (records.length === 0) {
      this.rows.delete(subjectId);
      return;
    }
    this.rows.set(
      subjectId,
      records.map((r) => ({ ...r })),
    );
  }

  subjectIds(): string[] {
    return [...this.rows.keys()];
  }
}
