import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { CacheConfigInput } from "../../src/core/cache/CacheConfig";
import { CacheModel } from "../../src/core/cache/CacheModel";
import type { CacheAccessEvent } from "../../src/core/cache/CacheTypes";
import { InvalidAddress, InvalidConfig } from "../../src/core/exceptions/CacheExceptions";
import { MainMemory } from "../../src/core/memory/MainMemory";
import { RandomStream } from "../../src/core/util/RandomStream";
import { RecordingStore } from "../helpers/RecordingStore";

// 16-byte lines, 4 sets: addresses 0x000, 0x040 and 0x080 all land in set 0 with tags 0, 1 and 2.
const SMALL: CacheConfigInput = { lineSizeBytes: 16, numSets: 4, associativity: 2, addressWidth: 16 };
const A = 0x000;
const B = 0x040;
const C = 0x080;

function buildModel(overrides: Partial<CacheConfigInput> = {}) {
  const store = new RecordingStore(16, 16);
  const model = new CacheModel({ ...SMALL, ...overrides }, { backingStore: store });
  return { model, store };
}

function assertNoDuplicateTags(model: CacheModel): void {
  for (let index = 0; index < model.config.numSets; index++) {
    const tags = model
      .inspectSet(index)
      .filter((line) => line.valid)
      .map((line) => line.tag);
    assert.equal(new Set(tags).size, tags.length, `set ${index} holds a duplicate tag`);
  }
}

describe("CacheModel", () => {
  it("rejects malformed configurations at construction", () => {
    assert.throws(() => new CacheModel({ ...SMALL, numSets: 17 }), InvalidConfig);
  });

  it("loads through the cache and hits on the second access", () => {
    const memory = new MainMemory({ lineSizeBytes: 16, addressWidth: 16 });
    memory.pokeByte(0x105, 0x7f);
    const model = new CacheModel(SMALL, { backingStore: memory });

    const first = model.load(0x104, 4);
    assert.deepEqual([...first.data], [0, 0x7f, 0, 0]);
    assert.deepEqual(first.result, {
      kind: "load",
      address: 0x104,
      fields: { tag: 4, index: 0, offset: 4 },
      hit: false,
      way: 0,
      allocated: true,
      writeBackTriggered: false,
      writeThroughTriggered: false,
    });

    const second = model.load(0x105);
    assert.equal(second.result.hit, true);
    assert.deepEqual([...second.data], [0x7f]);
    assert.deepEqual(memory.getCounters(), { lineReads: 1, lineWrites: 0 });
  });

  it("evicts B for the sequence A, B, A, C under LRU", () => {
    const { model } = buildModel({ replacementPolicy: "lru" });
    [A, B, A].forEach((address) => model.load(address));

    assert.deepEqual(model.load(C).result.evictedLine, { tag: 1, address: B, wasDirty: false });
  });

  it("evicts A for the sequence A, B, A, C under FIFO", () => {
    const { model } = buildModel({ replacementPolicy: "fifo" });
    [A, B, A].forEach((address) => model.load(address));

    assert.deepEqual(model.load(C).result.evictedLine, { tag: 0, address: A, wasDirty: false });
  });

  it("tracks dirty lines under write-back and writes them back once on eviction", () => {
    const { model, store } = buildModel({ writePolicy: "write-back" });

    assert.equal(model.store(A, Uint8Array.of(0xaa)).hit, false);
    const hit = model.store(A + 1, Uint8Array.of(0xbb));

    assert.equal(hit.hit, true);
    assert.equal(hit.writeBackTriggered, false);
    assert.equal(model.inspectSet(0)[0].dirty, true);
    assert.deepEqual(store.writes, []);

    model.load(B);
    const eviction = model.load(C).result;

    assert.equal(eviction.writeBackTriggered, true);
    assert.deepEqual(eviction.evictedLine, { tag: 0, address: A, wasDirty: true });
    assert.deepEqual(store.writes, [{ address: A, data: [0xaa, 0xbb, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0] }]);
    assert.equal(model.statisticsSnapshot().writeBacks, 1);
  });

  it("never marks a line dirty under write-through", () => {
    const { model, store } = buildModel({ writePolicy: "write-through" });

    for (const address of [A, A + 1, B, C, A]) {
      model.store(address, Uint8Array.of(address & 0xff));
      assert.ok(
        model.inspectSet(0).every((line) => !line.dirty),
        `dirty line after storing to 0x${address.toString(16)}`,
      );
    }

    assert.equal(store.writes.length, 5);
    const stats = model.statisticsSnapshot();
    assert.equal(stats.writeThroughs, 5);
    assert.equal(stats.writeBacks, 0);
  });

  it("sends no-allocate store misses straight to memory", () => {
    const { model, store } = buildModel({ writePolicy: "write-through", allocatePolicy: "no-allocate" });

    const result = model.store(0x010, Uint8Array.of(0x5a));

    assert.equal(result.hit, false);
    assert.equal(result.allocated, false);
    assert.equal(result.way, undefined);
    assert.equal(result.writeThroughTriggered, true);
    assert.ok(model.inspectSet(1).every((line) => !line.valid));
    assert.equal(store.memory.peekByte(0x010), 0x5a);
  });

  it("allows write-back with no-allocate", () => {
    const { model, store } = buildModel({ writePolicy: "write-back", allocatePolicy: "no-allocate" });

    model.load(A);
    model.store(A, Uint8Array.of(1));
    model.store(B + 2, Uint8Array.of(2));

    assert.equal(model.inspectSet(0)[0].dirty, true);
    assert.equal(store.memory.peekByte(B + 2), 2);
    assert.equal(model.inspectSet(0)[1].valid, false);
  });

  it("keeps tags unique within every set", () => {
    const model = new CacheModel({ ...SMALL, replacementPolicy: "random" }, { seed: 3 });
    const addresses = new RandomStream(7);

    for (let i = 0; i < 500; i++) {
      const address = addresses.nextBelow(0x400);
      if (i % 3 === 0) {
        model.store(address, Uint8Array.of(i & 0xff));
      } else {
        model.load(address);
      }
    }

    assertNoDuplicateTags(model);
    assert.equal(model.statisticsSnapshot().accesses, 500);
  });

  it("computes AMAT from the observed miss rate", () => {
    const { model } = buildModel();
    assert.equal(model.computeAMAT(2, 200), 2);

    for (let i = 0; i < 20; i++) {
      model.load(A);
    }

    assert.equal(model.statisticsSnapshot().missRate, 0.05);
    assert.equal(model.computeAMAT(2, 200), 12);
  });

  it("returns equal snapshots until the next access", () => {
    const { model } = buildModel();
    model.load(A);
    model.load(A);

    const first = model.statisticsSnapshot();
    const second = model.statisticsSnapshot();

    assert.deepEqual(first, second);
    assert.notEqual(first, second);
    assert.deepEqual(first, {
      accesses: 2,
      hits: 1,
      misses: 1,
      loads: 2,
      stores: 0,
      evictions: 0,
      writeBacks: 0,
      writeThroughs: 0,
      hitRate: 0.5,
      missRate: 0.5,
    });
  });

  it("resets statistics without dropping lines", () => {
    const { model } = buildModel();
    model.load(A);

    model.resetStatistics();
    assert.equal(model.statisticsSnapshot().accesses, 0);
    assert.equal(model.load(A).result.hit, true);
  });

  it("rejects addresses outside the address space and accesses that span lines", () => {
    const { model } = buildModel();

    assert.throws(() => model.load(0x10000), InvalidAddress);
    assert.throws(() => model.load(0x00e, 4), /A 4-byte access at 0xe crosses a 16-byte line boundary/);
    assert.throws(() => model.store(A, new Uint8Array(0)), /Access size must be between 1 and 16 bytes: 0/);
    assert.equal(model.statisticsSnapshot().accesses, 0);
  });

  it("passes fill failures through and leaves the cache untouched", () => {
    const { model, store } = buildModel();
    const failure = new Error("bus error");
    store.failReadsWith = failure;

    assert.throws(
      () => model.load(A),
      (error: unknown) => error === failure,
    );
    assert.equal(model.statisticsSnapshot().accesses, 0);
    assert.ok(model.inspectSet(0).every((line) => !line.valid));

    store.failReadsWith = null;
    assert.equal(model.load(A).result.hit, false);
  });

  it("passes write-through failures on an allocating store miss through untouched", () => {
    const { model, store } = buildModel({ writePolicy: "write-through", allocatePolicy: "allocate" });
    const failure = new Error("write rejected");
    store.failWritesWith = failure;

    assert.throws(
      () => model.store(A, Uint8Array.of(0x5a)),
      (error: unknown) => error === failure,
    );
    assert.equal(model.statisticsSnapshot().accesses, 0);
    assert.ok(model.inspectSet(0).every((line) => !line.valid));
    assert.deepEqual(store.reads, [A]);
    assert.deepEqual(store.writes, []);

    store.failWritesWith = null;
    const retry = model.store(A, Uint8Array.of(0x5a));
    assert.equal(retry.hit, false);
    assert.equal(retry.allocated, true);
    assert.equal(store.memory.peekByte(A), 0x5a);
  });

  it("keeps a dirty victim when its write-back fails", () => {
    const { model, store } = buildModel({ writePolicy: "write-back" });
    model.store(A, Uint8Array.of(0x11));
    model.load(B);
    const failure = new Error("write rejected");
    store.failWritesWith = failure;

    assert.throws(
      () => model.load(C),
      (error: unknown) => error === failure,
    );

    const [victim] = model.inspectSet(0);
    assert.equal(victim.valid, true);
    assert.equal(victim.dirty, true);
    assert.equal(victim.tag, 0);
    assert.equal(model.statisticsSnapshot().accesses, 2);

    store.failWritesWith = null;
    assert.equal(model.load(C).result.writeBackTriggered, true);
  });

  it("writes dirty lines back and keeps them resident", () => {
    const { model, store } = buildModel({ writePolicy: "write-back" });
    model.store(A, Uint8Array.of(1));
    model.store(0x010, Uint8Array.of(2));
    model.load(0x020);

    assert.equal(model.writeBackAll(), 2);
    assert.deepEqual(
      store.writes.map((write) => write.address),
      [A, 0x010],
    );
    assert.equal(model.inspectSet(0)[0].valid, true);
    assert.equal(model.inspectSet(0)[0].dirty, false);
    assert.equal(model.statisticsSnapshot().writeBacks, 2);
    assert.equal(model.writeBackAll(), 0);
  });

  it("flushes by writing dirty lines back and invalidating every line", () => {
    const { model, store } = buildModel({ writePolicy: "write-back" });
    model.store(A, Uint8Array.of(1));
    model.store(0x010, Uint8Array.of(2));
    model.load(0x020);

    assert.equal(model.flush(), 2);
    assert.deepEqual(
      store.writes.map((write) => write.address),
      [A, 0x010],
    );
    for (const index of [0, 1, 2]) {
      assert.equal(model.inspectSet(index)[0].valid, false);
    }
    assert.equal(model.statisticsSnapshot().writeBacks, 2);
    assert.equal(model.flush(), 0);

    const reload = model.load(A);
    assert.equal(reload.result.hit, false);
    assert.deepEqual([...reload.data], [1]);
  });

  it("drops dirty data on invalidation", () => {
    const { model, store } = buildModel({ writePolicy: "write-back" });
    model.store(A, Uint8Array.of(0x11));

    model.invalidateAll();
    const reload = model.load(A);

    assert.equal(reload.result.hit, false);
    assert.deepEqual([...reload.data], [0]);
    assert.deepEqual(store.writes, []);
  });

  it("clears lines and statistics on reset", () => {
    const { model } = buildModel();
    model.load(A);

    model.reset();
    assert.equal(model.statisticsSnapshot().accesses, 0);
    assert.equal(model.load(A).result.hit, false);
  });

  it("reads and writes single bytes", () => {
    const { model } = buildModel();

    model.writeByte(0x20, 0x1ff);
    assert.equal(model.readByte(0x20), 0xff);
  });

  it("composes line addresses from tag and index", () => {
    const { model } = buildModel();

    assert.equal(model.lineAddress(2, 3), 0xb0);
    assert.throws(() => model.inspectSet(4), /Set index 4 is outside 0..3/);
  });

  it("replays random replacement from a seed", () => {
    const run = () => {
      const model = new CacheModel({ ...SMALL, replacementPolicy: "random" }, { seed: 11 });
      return [A, B, C, A, B, C, 0xc0, A].map((address) => model.load(address).result.evictedLine?.tag ?? null);
    };

    assert.deepEqual(run(), run());
  });

  it("notifies access listeners until they unsubscribe", () => {
    const { model } = buildModel();
    const events: CacheAccessEvent[] = [];
    const unsubscribe = model.onAccess((event) => events.push(event));

    model.load(A);
    model.store(A, Uint8Array.of(1));
    unsubscribe();
    model.load(B);

    assert.deepEqual(
      events.map(({ result }) => [result.kind, result.hit]),
      [
        ["load", false],
        ["store", true],
      ],
    );
    assert.equal(events[1].statistics.accesses, 2);
  });
});
