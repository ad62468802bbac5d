import { Injectable } from '@nestjs/common';
import type { HatchProgressStore } from './hatch-progress-store.js';

/** DATABASE_URL 없는 로컬 실행 / 테스트용 */
@Injectable()
export class InMemoryHatchProgressStore implements HatchProgressStore {
  private readonly counts = new Map<string, number>();

  async getPetsHatched(subjectId: string): Promise<number> {
    return this.counts.get(subjectId) ?? 0;
  }

  async addPetsHatched(subjectId: string, count: number): Promise<number> {
    const total = (this.counts.get(subjectId) ?? 0) + count;
    this.counts.set(subjectId, total);
    return total;
  }
}
