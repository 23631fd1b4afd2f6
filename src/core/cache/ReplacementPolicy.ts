import type { RandomSource } from "../util/RandomStream";
import { log2, type ReplacementPolicyKind } from "./CacheConfig";

export type TouchKind = "hit" | "fill";

/** The part of a cache line replacement policies read and write. */
export interface ReplacementLine {
  readonly valid: boolean;
  stamp: number;
}

export type ReplacementState =
  | { kind: "lru"; clock: number }
  | { kind: "fifo"; clock: number }
  | { kind: "random"; random: RandomSource }
  | { kind: "plru"; levels: number; tree: Uint8Array };

export function createReplacementState(
  kind: ReplacementPolicyKind,
  associativity: number,
  random: RandomSource,
): ReplacementState {
  switch (kind) {
    case "lru":
      return { kind, clock: 0 };
    case "fifo":
      return { kind, clock: 0 };
    case "random":
      return { kind, random };
    case "plru":
      // Heap-ordered tree: node n has children 2n+1 and 2n+2, leaves are the ways.
      return { kind, levels: log2(associativity), tree: new Uint8Array(Math.max(associativity - 1, 0)) };
  }
}

/**
 * Records a hit or a fill of `way`. LRU stamps both; FIFO only stamps fills, so later hits leave the
 * insertion order alone; pseudo-LRU points every node on the path away from the way.
 */
export function onAccess(state: ReplacementState, lines: ReplacementLine[], way: number, touch: TouchKind): void {
  switch (state.kind) {
    case "lru":
      state.clock += 1;
      lines[way].stamp = state.clock;
      return;
    case "fifo":
      if (touch === "fill") {
        state.clock += 1;
        lines[way].stamp = state.clock;
      }
      return;
    case "random":
      return;
    case "plru": {
      let node = 0;
      for (let level = state.levels - 1; level >= 0; level--) {
        const right = Math.floor(way / 2 ** level) % 2;
        state.tree[node] = right === 1 ? 0 : 1;
        node = 2 * node + 1 + right;
      }
      return;
    }
  }
}

export function selectVictim(state: ReplacementState, lines: readonly ReplacementLine[]): number {
  if (lines.length === 0) {
    throw new RangeError("Cannot select a victim from an empty set");
  }

  switch (state.kind) {
    case "lru":
    case "fifo":
      return oldestWay(lines);
    case "random":
      return state.random.nextBelow(lines.length);
    case "plru": {
      // Only the tree bits are consulted, in log2(associativity) steps. A set that is not yet full
      // can therefore lose a valid line while another way is still invalid; from a reset tree the
      // fills still reach every way once before any repeats.
      let node = 0;
      for (let level = 0; level < state.levels; level++) {
        node = 2 * node + 1 + state.tree[node];
      }
      return node - (lines.length - 1);
    }
  }
}

export function resetReplacementState(state: ReplacementState): void {
  switch (state.kind) {
    case "lru":
    case "fifo":
      state.clock = 0;
      return;
    case "random":
      return;
    case "plru":
      state.tree.fill(0);
      return;
  }
}

function oldestWay(lines: readonly ReplacementLine[]): number {
  const invalid = lines.findIndex((line) => !line.valid);
  if (invalid !== -1) {
    return invalid;
  }

  let victim = 0;
  for (let way = 1; way < lines.length; way++) {
    if (lines[way].stamp < lines[victim].stamp) {
      victim = way;
    }
  }
  return victim;
}
