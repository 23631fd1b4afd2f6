import { InvalidAddress, formatAddress } from "../exceptions/CacheExceptions";
import { MainMemory } from "../memory/MainMemory";
import { readLine, type BackingStore } from "../memory/BackingStore";
import { RandomStream, type RandomSource } from "../util/RandomStream";
import { decodeAddress, encodeAddress, type AddressFields } from "./AddressDecoder";
import { resolveCacheConfig, type CacheConfig, type CacheConfigInput } from "./CacheConfig";
import { CacheSet, type LineView } from "./CacheSet";
import { CacheStatistics, averageMemoryAccessTime, type CacheStatisticsSnapshot } from "./CacheStatistics";
import type { AccessResult, CacheAccessListener, EvictedLine, LoadResult } from "./CacheTypes";
import { createReplacementState } from "./ReplacementPolicy";
import { WritePolicyEngine, type StoreEffect } from "./WritePolicyEngine";

export interface CacheModelOptions {
  /** Defaults to an empty {@link MainMemory} sized to the address width. */
  backingStore?: BackingStore;
  /** Source for random replacement; defaults to a {@link RandomStream} seeded with `seed`. */
  random?: RandomSource;
  seed?: number;
}

interface LocatedAccess {
  fields: AddressFields;
  set: CacheSet;
  lineAddress: number;
}

interface FillPlan {
  way: number;
  data: Uint8Array;
  evictedLine?: EvictedLine;
  writeBackTriggered: boolean;
}

/**
 * Set-associative cache simulator. Every load and store runs to completion before returning:
 * decode, set lookup, and on a miss victim selection, optional write-back and fill.
 *
 * Errors thrown by the backing store reach the caller unchanged. All backing-store traffic for an
 * access happens before any line, replacement state or counter is updated, so a failed access leaves
 * the model as it found it.
 */
export class CacheModel {
  readonly config: CacheConfig;
  private readonly sets: CacheSet[];
  private readonly backingStore: BackingStore;
  private readonly writePolicy: WritePolicyEngine;
  private readonly statistics = new CacheStatistics();
  private readonly listeners = new Set<CacheAccessListener>();

  constructor(config: CacheConfigInput, options: CacheModelOptions = {}) {
    this.config = resolveCacheConfig(config);
    const { lineSizeBytes, numSets, associativity, replacementPolicy, addressWidth } = this.config;

    this.backingStore = options.backingStore ?? new MainMemory({ lineSizeBytes, addressWidth });
    const random = options.random ?? new RandomStream(options.seed);

    this.sets = Array.from(
      { length: numSets },
      (_, index) =>
        new CacheSet(index, lineSizeBytes, associativity, createReplacementState(replacementPolicy, associativity, random)),
    );
    this.writePolicy = new WritePolicyEngine(this.config, this.backingStore);
  }

  load(address: number, size = 1): LoadResult {
    const { fields, set, lineAddress } = this.locate(address, size);
    const resident = set.lookup(fields.tag);

    let way: number;
    let plan: FillPlan | undefined;
    if (resident === undefined) {
      plan = this.prepareFill(set, fields.tag, lineAddress);
      set.fill(fields.tag, plan.way, plan.data);
      way = plan.way;
    } else {
      set.touch(resident);
      way = resident;
    }

    const data = set.line(way).data.slice(fields.offset, fields.offset + size);
    const result = this.buildResult("load", address, fields, resident !== undefined, plan, {
      way,
      allocated: plan !== undefined,
      writeThroughTriggered: false,
    });
    this.complete(result);
    return { data, result };
  }

  readByte(address: number): number {
    return this.load(address, 1).data[0];
  }

  store(address: number, data: Uint8Array): AccessResult {
    const { fields, set, lineAddress } = this.locate(address, data.length);
    const resident = set.lookup(fields.tag);
    const request = { tag: fields.tag, lineAddress, offset: fields.offset, data };

    let plan: FillPlan | undefined;
    let effect: StoreEffect;
    if (resident !== undefined) {
      effect = this.writePolicy.handleStore(set, resident, true, request);
    } else if (!this.writePolicy.allocatesOnMiss) {
      effect = this.writePolicy.handleStore(set, undefined, false, request);
    } else {
      plan = this.prepareFill(set, fields.tag, lineAddress);
      effect = this.writePolicy.handleStore(set, plan.way, false, { ...request, fetched: plan.data });
    }

    const result = this.buildResult("store", address, fields, resident !== undefined, plan, effect);
    this.complete(result);
    return result;
  }

  writeByte(address: number, value: number): AccessResult {
    return this.store(address, Uint8Array.of(value & 0xff));
  }

  statisticsSnapshot(): CacheStatisticsSnapshot {
    return this.statistics.getSnapshot();
  }

  resetStatistics(): void {
    this.statistics.reset();
  }

  /** Returns `hitTime` unchanged until the first access. */
  computeAMAT(hitTime: number, missPenalty: number): number {
    return averageMemoryAccessTime(hitTime, this.statistics.getSnapshot().missRate, missPenalty);
  }

  /**
   * Writes every dirty line back and marks it clean. Lines stay resident. Returns the number of
   * lines written.
   */
  writeBackAll(): number {
    let written = 0;
    for (const set of this.sets) {
      for (const { line } of set.residentLines()) {
        if (!this.writePolicy.handleEviction(line).mustWriteBack) continue;

        this.backingStore.write(this.lineAddress(line.tag, set.index), line.data.slice());
        line.dirty = false;
        this.statistics.recordWriteBack();
        written += 1;
      }
    }
    return written;
  }

  /**
   * Writes dirty lines back, then invalidates every line. If a write-back throws, nothing is
   * invalidated and the lines not yet written stay dirty.
   */
  flush(): number {
    const written = this.writeBackAll();
    this.invalidateAll();
    return written;
  }

  /** Drops every line without writing dirty data back. */
  invalidateAll(): void {
    this.sets.forEach((set) => set.invalidateAll());
  }

  reset(): void {
    this.sets.forEach((set) => set.reset());
    this.statistics.reset();
  }

  inspectSet(index: number): LineView[] {
    return this.getSet(index).views();
  }

  lineAddress(tag: number, index: number): number {
    return encodeAddress({ tag, index, offset: 0 }, this.config);
  }

  onAccess(listener: CacheAccessListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private getSet(index: number): CacheSet {
    const set = this.sets[index];
    if (!Number.isInteger(index) || !set) {
      throw new RangeError(`Set index ${index} is outside 0..${this.sets.length - 1}`);
    }
    return set;
  }

  private locate(address: number, size: number): LocatedAccess {
    const fields = decodeAddress(address, this.config);
    const { lineSizeBytes, addressWidth } = this.config;

    if (!Number.isInteger(size) || size < 1 || size > lineSizeBytes) {
      throw new InvalidAddress(address, addressWidth, `Access size must be between 1 and ${lineSizeBytes} bytes: ${size}`);
    }
    if (fields.offset + size > lineSizeBytes) {
      throw new InvalidAddress(
        address,
        addressWidth,
        `A ${size}-byte access at ${formatAddress(address)} crosses a ${lineSizeBytes}-byte line boundary`,
      );
    }

    return { fields, set: this.sets[fields.index], lineAddress: address - fields.offset };
  }

  /** Performs the victim write-back and the line fetch for a miss, without touching the set. */
  private prepareFill(set: CacheSet, tag: number, lineAddress: number): FillPlan {
    const way = set.evictionCandidate();
    const victim = set.line(way);

    let evictedLine: EvictedLine | undefined;
    let writeBackTriggered = false;
    if (victim.valid) {
      evictedLine = { tag: victim.tag, address: this.lineAddress(victim.tag, set.index), wasDirty: victim.dirty };
      if (this.writePolicy.handleEviction(victim).mustWriteBack) {
        this.backingStore.write(evictedLine.address, victim.data.slice());
        writeBackTriggered = true;
      }
    }

    const data = readLine(this.backingStore, lineAddress, this.config.lineSizeBytes);
    return { way, data, evictedLine, writeBackTriggered };
  }

  private buildResult(
    kind: AccessResult["kind"],
    address: number,
    fields: AddressFields,
    hit: boolean,
    plan: FillPlan | undefined,
    effect: StoreEffect,
  ): AccessResult {
    const result: AccessResult = {
      kind,
      address,
      fields,
      hit,
      allocated: effect.allocated,
      writeBackTriggered: plan?.writeBackTriggered ?? false,
      writeThroughTriggered: effect.writeThroughTriggered,
    };
    if (effect.way !== undefined) {
      result.way = effect.way;
    }
    if (plan?.evictedLine) {
      result.evictedLine = plan.evictedLine;
    }
    return result;
  }

  private complete(result: AccessResult): void {
    this.statistics.recordAccess(result.kind, result.hit);
    if (result.evictedLine) this.statistics.recordEviction();
    if (result.writeBackTriggered) this.statistics.recordWriteBack();
    if (result.writeThroughTriggered) this.statistics.recordWriteThrough();

    if (this.listeners.size === 0) return;
    const event = { result, statistics: this.statistics.getSnapshot() };
    this.listeners.forEach((listener) => listener(event));
  }
}
