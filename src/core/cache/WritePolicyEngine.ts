import { readLine, type BackingStore } from "../memory/BackingStore";
import type { CacheConfig } from "./CacheConfig";
import type { CacheLine, CacheSet } from "./CacheSet";

export interface StoreRequest {
  tag: number;
  lineAddress: number;
  offset: number;
  data: Uint8Array;
  /** Line contents fetched for an allocating miss. */
  fetched?: Uint8Array;
}

export interface StoreEffect {
  way?: number;
  allocated: boolean;
  writeThroughTriggered: boolean;
}

/**
 * Applies the configured write and allocate policies to a store. Every external write happens before
 * the line is touched, so a store that throws leaves the set exactly as it was.
 */
export class WritePolicyEngine {
  constructor(
    private readonly config: Pick<CacheConfig, "lineSizeBytes" | "writePolicy" | "allocatePolicy">,
    private readonly backingStore: BackingStore,
  ) {}

  get allocatesOnMiss(): boolean {
    return this.config.allocatePolicy === "allocate";
  }

  /**
   * `way` is the resident way on a hit, the victim way being filled on an allocating miss, and
   * undefined when a no-allocate miss goes straight to backing storage.
   */
  handleStore(set: CacheSet, way: number | undefined, hit: boolean, request: StoreRequest): StoreEffect {
    if (way === undefined) {
      const current = readLine(this.backingStore, request.lineAddress, this.config.lineSizeBytes);
      this.backingStore.write(request.lineAddress, patch(current, request.offset, request.data));
      return { allocated: false, writeThroughTriggered: true };
    }

    let base: Uint8Array;
    if (hit) {
      base = set.line(way).data;
    } else if (request.fetched) {
      base = request.fetched;
    } else {
      throw new RangeError("An allocating store miss needs the fetched line contents");
    }
    const updated = patch(base, request.offset, request.data);

    const writeThrough = this.config.writePolicy === "write-through";
    if (writeThrough) {
      this.backingStore.write(request.lineAddress, updated);
    }

    if (hit) {
      set.line(way).data.set(updated);
      set.touch(way);
    } else {
      set.fill(request.tag, way, updated);
    }

    if (!writeThrough) {
      set.line(way).dirty = true;
    }

    return { way, allocated: !hit, writeThroughTriggered: writeThrough };
  }

  handleEviction(line: Pick<CacheLine, "valid" | "dirty">): { mustWriteBack: boolean } {
    return { mustWriteBack: this.config.writePolicy === "write-back" && line.valid && line.dirty };
  }
}

function patch(base: Uint8Array, offset: number, data: Uint8Array): Uint8Array {
  const updated = base.slice();
  updated.set(data, offset);
  return updated;
}
