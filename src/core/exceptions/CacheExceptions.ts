export type BackingStoreOperation = "read" | "write";

export function formatAddress(address: number): string {
  return Number.isInteger(address) && address >= 0 ? `0x${address.toString(16)}` : String(address);
}

export class CacheError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CacheError";
  }
}

/**
 * Raised while a cache is being constructed. Nothing is retried: the configuration has to change.
 */
export class InvalidConfig extends CacheError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, message?: string) {
    super(message ?? `Invalid cache configuration: ${field} = ${String(value)}`);
    this.field = field;
    this.value = value;
    this.name = "InvalidConfig";
  }
}

export class InvalidAddress extends CacheError {
  readonly address: number;
  readonly addressWidth: number;

  constructor(address: number, addressWidth: number, message?: string) {
    super(message ?? `Address ${formatAddress(address)} is outside the ${addressWidth}-bit address space`);
    this.address = address;
    this.addressWidth = addressWidth;
    this.name = "InvalidAddress";
  }
}

/**
 * Thrown by backing stores that cannot serve a line transfer. The cache passes these (and any other
 * error a store throws) through unchanged.
 */
export class BackingStoreFailure extends CacheError {
  readonly address: number;
  readonly operation: BackingStoreOperation;

  constructor(address: number, operation: BackingStoreOperation, message?: string, options?: ErrorOptions) {
    super(message ?? `Backing store ${operation} failed at ${formatAddress(address)}`, options);
    this.address = address;
    this.operation = operation;
    this.name = "BackingStoreFailure";
  }
}

export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError;
}
