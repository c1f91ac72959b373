import {LockService} from '../pure/effects';

/**
 * Single-writer lock per key for one process. Work for a key runs only after
 * earlier work for that key has settled. Multi-key requests take their keys
 * in sorted order so two of them can never wait on each other.
 */
export class InProcessLockService implements LockService {
  private readonly tails = new Map<string, Promise<void>>();

  withLock<T>(keys: string[], work: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    return this.acquire(ordered, work);
  }

  get heldKeys(): string[] {
    return [...this.tails.keys()];
  }

  private acquire<T>(keys: string[], work: () => Promise<T>): Promise<T> {
    const [first, ...rest] = keys;
    if (first === undefined) return work();
    return this.withKey(first, () => this.acquire(rest, work));
  }

  private async withKey<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(() => undefined, () => undefined);
    this.tails.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
