/**
 * Keyed Mutex
 *
 * One exclusive section per key (here: per store file path).
 * Same queue-of-thunks shape as a concurrency limiter fixed at 1, kept per key.
 */

type Task = () => void;

export class KeyedMutex {
  private queues: Map<string, Task[]> = new Map();

  /**
   * Run `fn` once every earlier task for `key` has settled
   */
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const task: Task = () => {
        Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => this.release(key));
      };

      const queue = this.queues.get(key);
      if (queue) {
        queue.push(task);
        return;
      }

      this.queues.set(key, []);
      task();
    });
  }

  /**
   * Whether a task currently holds `key`
   */
  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  private release(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (next) {
      next();
    } else {
      this.queues.delete(key);
    }
  }
}

export const storeMutex = new KeyedMutex();
