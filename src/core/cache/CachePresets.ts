import { resolveCacheConfig, type CacheConfig, type CacheConfigInput } from "./CacheConfig";

export const CACHE_PRESETS = {
  "direct-mapped-1k": { lineSizeBytes: 16, numSets: 64, associativity: 1 },
  "l1-data-32k": { lineSizeBytes: 64, numSets: 64, associativity: 8, replacementPolicy: "plru" },
  "l2-unified-256k": { lineSizeBytes: 64, numSets: 512, associativity: 8 },
} as const satisfies Record<string, CacheConfigInput>;

export type CachePresetName = keyof typeof CACHE_PRESETS;

export function presetConfig(name: CachePresetName, overrides: Partial<CacheConfig> = {}): CacheConfig {
  return resolveCacheConfig({ ...CACHE_PRESETS[name], ...overrides });
}
