import type { MemoryOperation } from "./CacheTypes";

export interface CacheStatisticsSnapshot {
  accesses: number;
  hits: number;
  misses: number;
  loads: number;
  stores: number;
  evictions: number;
  writeBacks: number;
  writeThroughs: number;
  hitRate: number;
  missRate: number;
}

export interface CacheLevelTiming {
  hitTime: number;
  missRate: number;
}

export class CacheStatistics {
  private accesses = 0;
  private hits = 0;
  private misses = 0;
  private loads = 0;
  private stores = 0;
  private evictions = 0;
  private writeBacks = 0;
  private writeThroughs = 0;

  recordAccess(kind: MemoryOperation, hit: boolean): void {
    this.accesses += 1;
    if (hit) {
      this.hits += 1;
    } else {
      this.misses += 1;
    }

    if (kind === "load") this.loads += 1;
    else this.stores += 1;
  }

  recordEviction(): void {
    this.evictions += 1;
  }

  recordWriteBack(): void {
    this.writeBacks += 1;
  }

  recordWriteThrough(): void {
    this.writeThroughs += 1;
  }

  reset(): void {
    this.accesses = 0;
    this.hits = 0;
    this.misses = 0;
    this.loads = 0;
    this.stores = 0;
    this.evictions = 0;
    this.writeBacks = 0;
    this.writeThroughs = 0;
  }

  getSnapshot(): CacheStatisticsSnapshot {
    const hitRate = this.accesses === 0 ? 0 : this.hits / this.accesses;
    const missRate = this.accesses === 0 ? 0 : this.misses / this.accesses;

    return {
      accesses: this.accesses,
      hits: this.hits,
      misses: this.misses,
      loads: this.loads,
      stores: this.stores,
      evictions: this.evictions,
      writeBacks: this.writeBacks,
      writeThroughs: this.writeThroughs,
      hitRate,
      missRate,
    };
  }
}

function assertLatency(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative finite number: ${value}`);
  }
}

function assertRate(value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`Miss rate must be between 0 and 1: ${value}`);
  }
}

/** AMAT = hitTime + missRate × missPenalty */
export function averageMemoryAccessTime(hitTime: number, missRate: number, missPenalty: number): number {
  assertLatency("Hit time", hitTime);
  assertRate(missRate);
  assertLatency("Miss penalty", missPenalty);
  return hitTime + missRate * missPenalty;
}

/**
 * AMAT of a cache hierarchy, innermost level first. Each level's miss penalty is the AMAT of the
 * level below it, ending at main memory.
 */
export function multiLevelAMAT(levels: readonly CacheLevelTiming[], memoryLatency: number): number {
  assertLatency("Memory latency", memoryLatency);

  let penalty = memoryLatency;
  for (let i = levels.length - 1; i >= 0; i--) {
    penalty = averageMemoryAccessTime(levels[i].hitTime, levels[i].missRate, penalty);
  }
  return penalty;
}
