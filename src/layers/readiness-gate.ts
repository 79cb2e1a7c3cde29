/**
 * One-shot readiness signal. The first open() or cancel() wins; later calls
 * are ignored.
 */

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: Error };

export class ReadinessGate<T> {
  private settled: Settled<T> | null = null;
  private waiters: Waiter<T>[] = [];

  get isOpen(): boolean {
    return this.settled?.ok === true;
  }

  open(value: T): boolean {
    if (this.settled) return false;
    this.settled = { ok: true, value };
    for (const waiter of this.drain()) waiter.resolve(value);
    return true;
  }

  /** Reject every current and future waiter; the gate never opens afterwards. */
  cancel(reason: string): boolean {
    if (this.settled) return false;
    const error = new Error(reason);
    this.settled = { ok: false, error };
    for (const waiter of this.drain()) waiter.reject(error);
    return true;
  }

  /** Resolve with the gate value; rejects after timeoutMs when given. */
  wait(timeoutMs?: number): Promise<T> {
    if (this.settled) {
      return this.settled.ok ? Promise.resolve(this.settled.value) : Promise.reject(this.settled.error);
    }

    return new Promise<T>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter: Waiter<T> = {
        resolve: (value) => {
          if (timer) clearTimeout(timer);
          resolve(value);
        },
        reject: (err) => {
          if (timer) clearTimeout(timer);
          reject(err);
        },
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new Error(`readiness gate not opened within ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  }

  private drain(): Waiter<T>[] {
    const waiters = this.waiters;
    this.waiters = [];
    return waiters;
  }
}
