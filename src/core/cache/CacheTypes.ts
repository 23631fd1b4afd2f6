import type { AddressFields } from "./AddressDecoder";
import type { CacheStatisticsSnapshot } from "./CacheStatistics";

export type MemoryOperation = "load" | "store";

export interface EvictedLine {
  tag: number;
  /** Base address of the evicted line. */
  address: number;
  wasDirty: boolean;
}

export interface AccessResult {
  kind: MemoryOperation;
  address: number;
  fields: AddressFields;
  hit: boolean;
  /** Way that holds the line afterwards; absent when a no-allocate store miss bypassed the cache. */
  way?: number;
  allocated: boolean;
  evictedLine?: EvictedLine;
  writeBackTriggered: boolean;
  writeThroughTriggered: boolean;
}

export interface LoadResult {
  data: Uint8Array;
  result: AccessResult;
}

export interface CacheAccessEvent {
  result: AccessResult;
  statistics: CacheStatisticsSnapshot;
}

export type CacheAccessListener = (event: CacheAccessEvent) => void;
