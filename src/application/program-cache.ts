import type { CheckedExpression } from '../domain/expression/index.js';

/**
 * Bounded cache of checked expressions.
 *
 * Keyed by expression text plus the environment's variable signature,
 * so a document with a different key set or different kinds misses and
 * is checked again. Entries hold no function bindings: a hit is paired
 * with the current environment before it runs.
 *
 * Least-recently-used eviction via Map insertion order.
 */
export class ProgramCache {
  private readonly entries: Map<string, CheckedExpression> = new Map();
  private readonly maxEntries: number;
  private hitCount = 0;
  private missCount = 0;

  constructor(maxEntries: number = 1_000) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError('maxEntries must be a positive integer');
    }
    this.maxEntries = maxEntries;
  }

  static key(expression: string, signature: string): string {
    return `${expression}\u0000${signature}`;
  }

  get(expression: string, signature: string): CheckedExpression | undefined {
    const key = ProgramCache.key(expression, signature);
    const hit = this.entries.get(key);
    if (hit === undefined) {
      this.missCount++;
      return undefined;
    }
    // refresh recency
    this.entries.delete(key);
    this.entries.set(key, hit);
    this.hitCount++;
    return hit;
  }

  set(expression: string, signature: string, checked: CheckedExpression): void {
    const key = ProgramCache.key(expression, signature);
    this.entries.delete(key);
    this.entries.set(key, checked);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done === true) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }
}
