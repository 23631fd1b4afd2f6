import { InvalidAddress } from "../exceptions/CacheExceptions";
import type { CacheConfig } from "./CacheConfig";

export interface AddressFields {
  tag: number;
  index: number;
  offset: number;
}

type DecoderConfig = Pick<CacheConfig, "lineSizeBytes" | "numSets" | "addressWidth">;

export function assertAddress(address: number, addressWidth: number): void {
  if (!Number.isSafeInteger(address) || address < 0 || address >= 2 ** addressWidth) {
    throw new InvalidAddress(address, addressWidth);
  }
}

/**
 * Splits an address into offset (lowest bits), set index, and tag (all remaining high bits).
 * Division keeps the arithmetic exact for address widths beyond the 32 bits that shifts cover.
 */
export function decodeAddress(address: number, config: DecoderConfig): AddressFields {
  assertAddress(address, config.addressWidth);

  const blockNumber = Math.floor(address / config.lineSizeBytes);
  return {
    tag: Math.floor(blockNumber / config.numSets),
    index: blockNumber % config.numSets,
    offset: address % config.lineSizeBytes,
  };
}

export function encodeAddress(fields: AddressFields, config: DecoderConfig): number {
  const address = (fields.tag * config.numSets + fields.index) * config.lineSizeBytes + fields.offset;
  assertAddress(address, config.addressWidth);
  return address;
}

export function lineBaseAddress(address: number, config: DecoderConfig): number {
  assertAddress(address, config.addressWidth);
  return address - (address % config.lineSizeBytes);
}
