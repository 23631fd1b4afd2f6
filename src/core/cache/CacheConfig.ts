import { InvalidConfig } from "../exceptions/CacheExceptions";

export type WritePolicy = "write-through" | "write-back";
export type AllocatePolicy = "allocate" | "no-allocate";
export type ReplacementPolicyKind = "lru" | "fifo" | "random" | "plru";

export interface CacheConfig {
  readonly lineSizeBytes: number;
  readonly numSets: number;
  readonly associativity: number;
  readonly addressWidth: number;
  readonly writePolicy: WritePolicy;
  readonly allocatePolicy: AllocatePolicy;
  readonly replacementPolicy: ReplacementPolicyKind;
}

type GeometryField = "lineSizeBytes" | "numSets" | "associativity";

export type CacheConfigInput = Pick<CacheConfig, GeometryField> & Partial<Omit<CacheConfig, GeometryField>>;

export interface CacheGeometry {
  offsetBits: number;
  indexBits: number;
  tagBits: number;
  lineCount: number;
  capacityBytes: number;
}

export const DEFAULT_ADDRESS_WIDTH = 32;
export const MAX_ADDRESS_WIDTH = 53;

const WRITE_POLICIES: readonly WritePolicy[] = ["write-through", "write-back"];
const ALLOCATE_POLICIES: readonly AllocatePolicy[] = ["allocate", "no-allocate"];
const REPLACEMENT_POLICIES: readonly ReplacementPolicyKind[] = ["lru", "fifo", "random", "plru"];

export function isPowerOfTwo(value: number): boolean {
  if (!Number.isSafeInteger(value) || value <= 0) {
    return false;
  }

  let remaining = value;
  while (remaining % 2 === 0) {
    remaining /= 2;
  }
  return remaining === 1;
}

/** Exact base-2 logarithm of a power of two. */
export function log2(value: number): number {
  return Math.round(Math.log2(value));
}

function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return options.some((option) => option === value);
}

/**
 * Applies defaults to a partial configuration and rejects anything that cannot describe a cache.
 * The returned object is frozen; a cache never changes shape after construction.
 */
export function resolveCacheConfig(input: CacheConfigInput): CacheConfig {
  const config: CacheConfig = {
    lineSizeBytes: input.lineSizeBytes,
    numSets: input.numSets,
    associativity: input.associativity,
    addressWidth: input.addressWidth ?? DEFAULT_ADDRESS_WIDTH,
    writePolicy: input.writePolicy ?? "write-back",
    allocatePolicy: input.allocatePolicy ?? "allocate",
    replacementPolicy: input.replacementPolicy ?? "lru",
  };

  validateCacheConfig(config);
  return Object.freeze(config);
}

export function validateCacheConfig(config: CacheConfig): void {
  if (!isPowerOfTwo(config.lineSizeBytes)) {
    throw new InvalidConfig("lineSizeBytes", config.lineSizeBytes, "Cache line size must be a power of two");
  }

  if (!isPowerOfTwo(config.numSets)) {
    throw new InvalidConfig("numSets", config.numSets, "Cache set count must be a power of two");
  }

  if (!Number.isSafeInteger(config.associativity) || config.associativity < 1) {
    throw new InvalidConfig("associativity", config.associativity, "Cache associativity must be a positive integer");
  }

  if (
    !Number.isInteger(config.addressWidth) ||
    config.addressWidth < 1 ||
    config.addressWidth > MAX_ADDRESS_WIDTH
  ) {
    throw new InvalidConfig(
      "addressWidth",
      config.addressWidth,
      `Address width must be an integer between 1 and ${MAX_ADDRESS_WIDTH}`,
    );
  }

  if (!isOneOf(config.writePolicy, WRITE_POLICIES)) {
    throw new InvalidConfig("writePolicy", config.writePolicy);
  }

  if (!isOneOf(config.allocatePolicy, ALLOCATE_POLICIES)) {
    throw new InvalidConfig("allocatePolicy", config.allocatePolicy);
  }

  if (!isOneOf(config.replacementPolicy, REPLACEMENT_POLICIES)) {
    throw new InvalidConfig("replacementPolicy", config.replacementPolicy);
  }

  const offsetBits = log2(config.lineSizeBytes);
  const indexBits = log2(config.numSets);
  if (offsetBits + indexBits >= config.addressWidth) {
    throw new InvalidConfig(
      "addressWidth",
      config.addressWidth,
      `Offset (${offsetBits}) and index (${indexBits}) bits leave no tag bits in a ${config.addressWidth}-bit address`,
    );
  }

  // The pseudo-LRU tree needs one leaf per way.
  if (config.replacementPolicy === "plru" && !isPowerOfTwo(config.associativity)) {
    throw new InvalidConfig(
      "associativity",
      config.associativity,
      "Pseudo-LRU replacement requires a power-of-two associativity",
    );
  }
}

export function describeGeometry(config: CacheConfig): CacheGeometry {
  const offsetBits = log2(config.lineSizeBytes);
  const indexBits = log2(config.numSets);
  const lineCount = config.numSets * config.associativity;

  return {
    offsetBits,
    indexBits,
    tagBits: config.addressWidth - offsetBits - indexBits,
    lineCount,
    capacityBytes: lineCount * config.lineSizeBytes,
  };
}
