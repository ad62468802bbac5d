import { Inject, Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../../db/drizzle.module.js';
import { subjectModifiers } from '../../db/schema/index.js';
import type { PersistedModifier } from '../../db/types/index.js';
import type { ModifierStore } from './modifier-store.js';

@Injectable()
export class DrizzleModifierStore implements ModifierStore {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async load(subjectId: string): Promise<PersistedModifier[]> {
    const rows = await this.db
      .select()
      .from(subjectModifiers)
      .where(eq(subjectModifiers.subjectId, subjectId));
    return rows.map((row) => ({
      sourceId: row.sourceId,
      statKey: row.statKey,
      value: row.value,
      remainingSeconds: row.remainingSeconds,
      stacking: row.stacking,
    }));
  }

  async save(subjectId: string, records: PersistedModifier[]): Promise<void> {
    const savedAt = new Date();
    await this.db.transaction(async (tx) => {
      await tx.delete(subjectModifiers).where(eq(subjectModifiers.subjectId, subjectId));
      if (records.length === 0) return;
      await tx.insert(subjectModifiers).values(
        records.map((r) => ({
          subjectId,
          sourceId: r.sourceId,
          statKey: r.statKey,
          value: r.value,
          remainingSeconds: r.remainingSeconds,
          stacking: r.stacking,
          savedAt,
        })),
      );
    });
  }
}
