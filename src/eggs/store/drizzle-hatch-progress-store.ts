import { Inject, Injectable } from '@nestjs/common';
import { eq, sql } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../../db/drizzle.module.js';
import { subjectHatchProgress } from '../../db/schema/index.js';
import type { HatchProgressStore } from './hatch-progress-store.js';

@Injectable()
export class DrizzleHatchProgressStore implements HatchProgressStore {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async getPetsHatched(subjectId: string): Promise<number> {
    const [row] = await this.db
      .select({ petsHatched: subjectHatchProgress.petsHatched })
      .from(subjectHatchProgress)
      .where(eq(subjectHatchProgress.subjectId, subjectId))
      .limit(1);
    return row?.petsHatched ?? 0;
  }

  async addPetsHatched(subjectId: string, count: number): Promise<number> {
    const updatedAt = new Date();
    // 동시 부화도 DB에서 원자적으로 누적
    const [row] = await this.db
      .insert(subjectHatchProgress)
      .values({ subjectId, petsHatched: count, updatedAt })
      .onConflictDoUpdate({
        target: subjectHatchProgress.subjectId,
        set: {
          petsHatched: sql`${subjectHatchProgress.petsHatched} + ${count}`,
          updatedAt,
        },
      })
      .returning({ petsHatched: subjectHatchProgress.petsHatched });
    return row?.petsHatched ?? count;
  }
}
