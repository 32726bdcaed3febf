/**
 * Evaluation cache: node outputs keyed by fingerprint, evicted
 * least-recently-used once the entry budget is exceeded.
 *
 * The cache is an optimization only; any entry may disappear at any time
 * and will be recomputed. Map insertion order doubles as recency order.
 */

import type { Fingerprint } from './fingerprint.js';
import type { NodeId, Outputs } from './types.js';

export interface CacheEntry {
  readonly nodeId: NodeId;
  readonly fingerprint: Fingerprint;
  readonly outputs: Outputs;
}

export interface EvaluationCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class EvaluationCache {
  private readonly entries = new Map<Fingerprint, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private capacity = 256) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`EvaluationCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Look up and mark as recently used. */
  get(fingerprint: Fingerprint): CacheEntry | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    this.hits++;
    return entry;
  }

  /** Presence check that does not touch recency or statistics. */
  has(fingerprint: Fingerprint): boolean {
    return this.entries.has(fingerprint);
  }

  set(entry: CacheEntry): void {
    this.entries.delete(entry.fingerprint);
    this.entries.set(entry.fingerprint, entry);
    this.trim();
  }

  delete(fingerprint: Fingerprint): boolean {
    return this.entries.delete(fingerprint);
  }

  /** Evict oldest entries until at most `max` remain (default: the capacity). */
  trim(max = this.capacity): number {
    let evicted = 0;
    for (const key of this.entries.keys()) {
      if (this.entries.size <= max) break;
      this.entries.delete(key);
      evicted++;
    }
    this.evictions += evicted;
    return evicted;
  }

  resize(capacity: number): void {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`EvaluationCache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.trim();
  }

  clear(): void {
    this.entries.clear();
  }

  /** Fingerprints from least to most recently used. */
  keys(): Fingerprint[] {
    return [...this.entries.keys()];
  }

  stats(): EvaluationCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
