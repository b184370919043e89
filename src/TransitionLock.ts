export type ReleaseLock = () => void;

type Waiter = {
  grant: (release: ReleaseLock) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Mutual exclusion for one stack's transitions. Waiters are served strictly
 * in the order they called `acquire`.
 */
export class TransitionLock {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  public get isLocked(): boolean {
    return this.locked;
  }

  public get waitingCount(): number {
    return this.waiters.length;
  }

  public acquire(signal?: AbortSignal): Promise<ReleaseLock> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseLock>((grant, reject) => {
      const waiter: Waiter = { grant, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  private createRelease(): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOver();
    };
  }

  private handOver(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.locked = false;
      return;
    }
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort);
    }
    next.grant(this.createRelease());
  }
}
