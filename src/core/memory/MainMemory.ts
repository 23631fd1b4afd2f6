import { BackingStoreFailure, formatAddress, type BackingStoreOperation } from "../exceptions/CacheExceptions";
import type { BackingStore } from "./BackingStore";

const BLOCK_SIZE = 4096;

export interface MainMemoryOptions {
  /** When set, every line transfer must be exactly this long and aligned to it. */
  lineSizeBytes?: number;
  addressWidth?: number;
}

export interface MainMemoryCounters {
  lineReads: number;
  lineWrites: number;
}

/**
 * Sparse byte-addressable memory used as the default backing store. Storage is allocated in
 * 4 KiB blocks on first write; unwritten bytes read as zero.
 */
export class MainMemory implements BackingStore {
  private readonly blocks = new Map<number, Uint8Array>();
  private readonly writtenAddresses = new Set<number>();
  private readonly lineSize: number | null;
  private readonly limit: number;
  private counters: MainMemoryCounters = { lineReads: 0, lineWrites: 0 };

  constructor(options: MainMemoryOptions = {}) {
    this.lineSize = options.lineSizeBytes ?? null;
    this.limit = 2 ** (options.addressWidth ?? 32);
  }

  read(address: number, size: number): Uint8Array {
    this.validateTransfer(address, size, "read");
    this.counters.lineReads += 1;

    const data = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      data[i] = this.peekByte(address + i);
    }
    return data;
  }

  write(address: number, data: Uint8Array): void {
    this.validateTransfer(address, data.length, "write");
    this.counters.lineWrites += 1;

    for (let i = 0; i < data.length; i++) {
      this.pokeByte(address + i, data[i]);
    }
  }

  /** Reads a byte directly, bypassing any cache and the transfer counters. */
  peekByte(address: number): number {
    this.validateAddress(address, "read");
    const block = this.blocks.get(Math.floor(address / BLOCK_SIZE));
    if (!block) {
      return 0;
    }
    return block[address % BLOCK_SIZE] ?? 0;
  }

  pokeByte(address: number, value: number): void {
    this.validateAddress(address, "write");
    const block = this.getOrCreateBlock(Math.floor(address / BLOCK_SIZE));

    block[address % BLOCK_SIZE] = value & 0xff;
    this.writtenAddresses.add(address);
  }

  /**
   * Returns every written byte sorted by address.
   */
  entries(): Array<{ address: number; value: number }> {
    return [...this.writtenAddresses]
      .sort((a, b) => a - b)
      .map((address) => ({ address, value: this.peekByte(address) }));
  }

  getCounters(): MainMemoryCounters {
    return { ...this.counters };
  }

  reset(): void {
    this.blocks.clear();
    this.writtenAddresses.clear();
    this.counters = { lineReads: 0, lineWrites: 0 };
  }

  private getOrCreateBlock(index: number): Uint8Array {
    let block = this.blocks.get(index);
    if (!block) {
      block = new Uint8Array(BLOCK_SIZE);
      this.blocks.set(index, block);
    }
    return block;
  }

  private validateAddress(address: number, operation: BackingStoreOperation): void {
    if (!Number.isSafeInteger(address) || address < 0 || address >= this.limit) {
      throw new BackingStoreFailure(address, operation, `Memory address out of range: ${formatAddress(address)}`);
    }
  }

  private validateTransfer(address: number, size: number, operation: BackingStoreOperation): void {
    this.validateAddress(address, operation);
    if (this.lineSize === null) {
      return;
    }

    if (size !== this.lineSize || address % this.lineSize !== 0) {
      throw new BackingStoreFailure(
        address,
        operation,
        `Line ${operation} of ${size} bytes at ${formatAddress(address)} is not a whole ${this.lineSize}-byte line`,
      );
    }
  }
}
