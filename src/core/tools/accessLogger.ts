import type { CacheAccessEvent, CacheAccessListener } from "../cache/CacheTypes";

function toHex(value: number): string {
  return `0x${value.toString(16).padStart(8, "0")}`;
}

/** One-line trace of an access, e.g. `store 0x00401a3c set=8 way=1 miss evict=0x00000200 dirty write-back`. */
export function formatAccessEvent({ result }: CacheAccessEvent): string {
  const parts = [result.kind, toHex(result.address), `set=${result.fields.index}`];
  if (result.way !== undefined) {
    parts.push(`way=${result.way}`);
  }
  parts.push(result.hit ? "hit" : "miss");

  if (result.evictedLine) {
    parts.push(`evict=${toHex(result.evictedLine.address)}${result.evictedLine.wasDirty ? " dirty" : ""}`);
  }
  if (result.writeBackTriggered) parts.push("write-back");
  if (result.writeThroughTriggered) parts.push("write-through");

  return parts.join(" ");
}

export function createAccessLogger(sink: (message: string) => void = console.log): CacheAccessListener {
  return (event) => sink(formatAccessEvent(event));
}
