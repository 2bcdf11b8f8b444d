import { AsyncLocalStorage } from "node:async_hooks";

interface Hold {
  active: boolean;
}

/**
 * Promise-chained mutex. A call made from inside a held section (same async
 * context, lock not yet released) runs immediately instead of deadlocking.
 */
export class ReentrantLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly context = new AsyncLocalStorage<Hold>();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  get heldByCaller(): boolean {
    return this.context.getStore()?.active === true;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.heldByCaller) return fn();

    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => gate);

    this.waiting++;
    await previous;
    this.waiting--;

    const hold: Hold = { active: true };
    try {
      return await this.context.run(hold, fn);
    } finally {
      hold.active = false;
      release();
    }
  }
}
