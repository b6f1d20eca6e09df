/**
 * Remembers event ids for `ttlMs`. A ttl of 0 disables the cache.
 */
export class DedupCache {
  private seen = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  /** Returns true if `id` was already recorded and has not expired; otherwise records it. */
  checkAndRecord(id: string): boolean {
    if (!this.enabled) return false;

    const now = this.now();
    this.prune(now);

    const expiresAt = this.seen.get(id);
    if (expiresAt !== undefined && expiresAt > now) return true;

    this.seen.set(id, now + this.ttlMs);
    return false;
  }

  forget(id: string): void {
    this.seen.delete(id);
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(now: number): void {
    for (const [id, expiresAt] of this.seen) {
      if (expiresAt <= now) this.seen.delete(id);
    }
  }
}
