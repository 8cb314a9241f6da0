/**
 * Keyed serial queue: tasks sharing a key run one at a time in push order,
 * tasks with different keys run concurrently.
 *
 * Used to hand the dispatcher one update per chat at a time, whichever way
 * updates arrive.
 */

export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly onError: (err: unknown, key: string) => void) {}

  /**
   * Resolves once the task has run. A failing task is reported to onError and
   * does not block the tasks queued after it.
   */
  push(key: string, task: () => Promise<void>): Promise<void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(task)
      .catch((err: unknown) => this.onError(err, key))
      .then(() => {
        if (this.tails.get(key) === next) this.tails.delete(key);
      });
    this.tails.set(key, next);
    return next;
  }

  get pending(): number {
    return this.tails.size;
  }

  /**
   * Wait for everything queued so far, including tasks queued while waiting.
   */
  async drain(): Promise<void> {
    while (this.tails.size) {
      await Promise.all(this.tails.values());
    }
  }
}
