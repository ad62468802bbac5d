export const HATCH_PROGRESS_STORE = Symbol('HATCH_PROGRESS_STORE');

export interface HatchProgressStore {
  /** 기록이 없으면 0 */
  getPetsHatched(subjectId: string): Promise<number>;
  /** 누적 수에 더하고 더한 뒤의 값을 돌려준다 */
  addPetsHatched(subjectId: string, count: number): Promise<number>;
}
