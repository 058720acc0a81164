/**
 * Per-user exclusive sections. Callers queue behind whatever is already
 * running for the same user; different users never wait on each other.
 */
export class UserLocks {
  private readonly chains = new Map<string, Promise<void>>();

  async runExclusive<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(userId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = prev.then(() => next);
    this.chains.set(userId, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.chains.get(userId) === chain) {
        this.chains.delete(userId);
      }
    }
  }

  isLocked(userId: string): boolean {
    return this.chains.has(userId);
  }
}
