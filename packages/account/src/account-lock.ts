/**
 * @tanglekit/account — Per-account mutex.
 *
 * Critical sections run one at a time in arrival order. A failing section
 * releases the lock and rejects only its own caller.
 */

export class AccountLock {
  private _tail: Promise<void> = Promise.resolve();
  private _waiting = 0;
  private _held = false;

  /** True while a critical section is running. */
  get isLocked(): boolean {
    return this._held;
  }

  /** Sections queued behind the current holder. */
  get waiting(): number {
    return this._waiting;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this._waiting++;
    const run = this._tail.then(async () => {
      this._waiting--;
      this._held = true;
      try {
        return await fn();
      } finally {
        this._held = false;
      }
    });
    this._tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
