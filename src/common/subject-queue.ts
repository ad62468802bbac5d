// subject별 직렬 실행 큐: 같은 subject의 비동기 작업은 도착 순서대로 하나씩

export class SubjectQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(subjectId: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(subjectId) ?? Promise.resolve();
    // tail은 reject되지 않음. 실패는 각 호출자에게만 전달
    const next = previous.then(() => task());
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(subjectId, tail);
    void tail.then(() => {
      if (this.tails.get(subjectId) === tail) this.tails.delete(subjectId);
    });
    return next;
  }

  /** 대기/실행 중인 작업이 있는 subject 수 */
  get size(): number {
    return this.tails.size;
  }
}
