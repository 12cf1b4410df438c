type ScoreBound = number | string;

/**
 * In-process stand-in for the node-redis v4 client, covering the commands the
 * gateway issues. Every method runs to completion before it yields, so each
 * call is atomic the same way a single Redis command is.
 */
export class InMemoryRedis {
  readonly strings = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();
  readonly sortedSets = new Map<string, Map<string, number>>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly expiry = new Map<string, number>();

  async ping(): Promise<string> {
    return 'PONG';
  }

  async flushAll(): Promise<string> {
    this.strings.clear();
    this.sets.clear();
    this.sortedSets.clear();
    this.hashes.clear();
    this.expiry.clear();
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    this.clearExpired();
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string, options?: { NX?: boolean }): Promise<string | null> {
    this.clearExpired();
    if (options?.NX && this.exists(key)) {
      return null;
    }
    this.strings.set(key, value);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    this.clearExpired();
    const existed = this.exists(key);
    this.strings.delete(key);
    this.sets.delete(key);
    this.sortedSets.delete(key);
    this.hashes.delete(key);
    this.expiry.delete(key);
    return existed ? 1 : 0;
  }

  async incr(key: string): Promise<number> {
    return this.incrBy(key, 1);
  }

  async decr(key: string): Promise<number> {
    return this.incrBy(key, -1);
  }

  async incrBy(key: string, increment: number): Promise<number> {
    this.clearExpired();
    const next = Number(this.strings.get(key) ?? '0') + increment;
    this.strings.set(key, String(next));
    return next;
  }

  async decrBy(key: string, decrement: number): Promise<number> {
    return this.incrBy(key, -decrement);
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.clearExpired();
    if (!this.exists(key)) {
      return false;
    }
    this.expiry.set(key, Date.now() + seconds * 1000);
    return true;
  }

  async sAdd(key: string, member: string): Promise<number> {
    this.clearExpired();
    const members = this.sets.get(key) ?? new Set<string>();
    const sizeBefore = members.size;
    members.add(member);
    this.sets.set(key, members);
    return members.size > sizeBefore ? 1 : 0;
  }

  async sMembers(key: string): Promise<string[]> {
    this.clearExpired();
    return [...(this.sets.get(key) ?? new Set<string>())];
  }

  async zAdd(
    key: string,
    entry: { score: number; value: string },
    options?: { GT?: true },
  ): Promise<number> {
    this.clearExpired();
    const members = this.sortedSets.get(key) ?? new Map<string, number>();
    const current = members.get(entry.value);
    const added = current === undefined ? 1 : 0;
    if (options?.GT && current !== undefined && entry.score <= current) {
      return 0;
    }
    members.set(entry.value, entry.score);
    this.sortedSets.set(key, members);
    return added;
  }

  async zIncrBy(key: string, increment: number, member: string): Promise<number> {
    this.clearExpired();
    const members = this.sortedSets.get(key) ?? new Map<string, number>();
    const next = (members.get(member) ?? 0) + increment;
    members.set(member, next);
    this.sortedSets.set(key, members);
    return next;
  }

  async zRem(key: string, member: string): Promise<number> {
    this.clearExpired();
    return this.sortedSets.get(key)?.delete(member) ? 1 : 0;
  }

  async zRemRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    this.clearExpired();
    const members = this.sortedSets.get(key);
    if (!members) {
      return 0;
    }
    let removed = 0;
    for (const [member, score] of [...members.entries()]) {
      if (this.inRange(score, min, max)) {
        members.delete(member);
        removed += 1;
      }
    }
    return removed;
  }

  async zScore(key: string, member: string): Promise<number | null> {
    this.clearExpired();
    return this.sortedSets.get(key)?.get(member) ?? null;
  }

  async zCard(key: string): Promise<number> {
    this.clearExpired();
    return this.sortedSets.get(key)?.size ?? 0;
  }

  async zCount(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    this.clearExpired();
    return this.ordered(key).filter((entry) => this.inRange(entry.score, min, max)).length;
  }

  async zRange(
    key: string,
    start: number,
    stop: number,
    options?: { REV?: true },
  ): Promise<string[]> {
    const entries = await this.zRangeWithScores(key, start, stop, options);
    return entries.map((entry) => entry.value);
  }

  async zRangeWithScores(
    key: string,
    start: number,
    stop: number,
    options?: { REV?: true },
  ): Promise<Array<{ value: string; score: number }>> {
    this.clearExpired();
    const ordered = this.ordered(key);
    if (options?.REV) {
      ordered.reverse();
    }
    const from = start < 0 ? Math.max(0, ordered.length + start) : start;
    const to = stop < 0 ? ordered.length + stop : stop;
    return ordered.slice(from, to + 1);
  }

  async hIncrBy(key: string, field: string, increment: number): Promise<number> {
    this.clearExpired();
    const fields = this.hashes.get(key) ?? new Map<string, string>();
    const next = Number(fields.get(field) ?? '0') + increment;
    fields.set(field, String(next));
    this.hashes.set(key, fields);
    return next;
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    this.clearExpired();
    return Object.fromEntries(this.hashes.get(key) ?? new Map<string, string>());
  }

  private ordered(key: string): Array<{ value: string; score: number }> {
    return [...(this.sortedSets.get(key) ?? new Map<string, number>()).entries()]
      .map(([value, score]) => ({ value, score }))
      .sort((a, b) => a.score - b.score || a.value.localeCompare(b.value));
  }

  private inRange(score: number, min: ScoreBound, max: ScoreBound): boolean {
    return score >= this.toBound(min) && score <= this.toBound(max);
  }

  private toBound(value: ScoreBound): number {
    if (value === '-inf') {
      return Number.NEGATIVE_INFINITY;
    }
    if (value === '+inf' || value === 'inf') {
      return Number.POSITIVE_INFINITY;
    }
    return Number(value);
  }

  private exists(key: string): boolean {
    return (
      this.strings.has(key) ||
      this.sets.has(key) ||
      this.sortedSets.has(key) ||
      this.hashes.has(key)
    );
  }

  private clearExpired(): void {
    const now = Date.now();
    for (const [key, expiresAt] of this.expiry.entries()) {
      if (now >= expiresAt) {
        this.strings.delete(key);
        this.sets.delete(key);
        this.sortedSets.delete(key);
        this.hashes.delete(key);
        this.expiry.delete(key);
      }
    }
  }
}
