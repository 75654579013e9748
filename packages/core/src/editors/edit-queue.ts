import path from 'path';

/**
 * Serializes edit transactions per file. Tasks for the same path run one after
 * another in submission order; tasks for different paths run concurrently.
 */
export class EditQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(filePath: string, task: () => Promise<T>): Promise<T> {
    const key = path.resolve(filePath);
    const previous = this.tails.get(key) ?? Promise.resolve();
    // a failed task must not block the next one
    const result = previous.then(task, task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /** Paths with queued or running work. */
  get pending(): number {
    return this.tails.size;
  }
}
