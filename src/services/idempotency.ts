export class InMemoryIdempotencyGuard {
  private readonly seen = new Map<string, number>();

  constructor(private readonly ttlMs: number = 60 * 60 * 1000) {}

  tryMark(scope: string, id: string, nowTs: number): boolean {
    this.gc(nowTs);

    const key = `${scope}:${id}`;
    const expiresAt = this.seen.get(key);
    if (expiresAt !== undefined && expiresAt > nowTs) {
      return false;
    }

    this.seen.set(key, nowTs + this.ttlMs);
    return true;
  }

  purgeExpired(nowTs: number): number {
    let purged = 0;
    for (const [key, expiresAt] of this.seen.entries()) {
      if (expiresAt <= nowTs) {
        this.seen.delete(key);
        purged += 1;
      }
    }
    return purged;
  }

  private gc(nowTs: number): void {
    if (this.seen.size < 5_000) return;
    this.purgeExpired(nowTs);
  }
}
