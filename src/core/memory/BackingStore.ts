import { BackingStoreFailure, formatAddress } from "../exceptions/CacheExceptions";

/**
 * Storage behind a cache. Caches only ever transfer whole, line-aligned lines through it.
 */
export interface BackingStore {
  read(address: number, size: number): Uint8Array;
  write(address: number, data: Uint8Array): void;
}

export function readLine(store: BackingStore, address: number, size: number): Uint8Array {
  const data = store.read(address, size);
  if (data.length !== size) {
    throw new BackingStoreFailure(
      address,
      "read",
      `Backing store returned ${data.length} bytes for the ${size}-byte line at ${formatAddress(address)}`,
    );
  }
  return data;
}
