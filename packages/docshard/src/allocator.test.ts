import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ShardAllocator } from "./allocator.js";
import { DistributedFieldStore } from "./field-store.js";
import { ShardChain } from "./naming.js";
import { InMemoryDocumentStore } from "./storage/in-memory.js";

const createLogger = () => ({
  log: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

// {"padding":"xxx..."} serializes to exactly `sizeBytes` bytes.
const paddedDocument = (sizeBytes: number) => ({ padding: "x".repeat(sizeBytes - 14) });

const createAllocator = (store: InMemoryDocumentStore, logger = createLogger()) =>
  new ShardAllocator({
    store,
    collection: "attendance",
    maxCapacityBytes: 900_000,
    safetyMarginBytes: 4096,
    logger,
  });

const suffixedChain = (maxShards = 100) =>
  new ShardChain({ baseId: "ATTEND_CS101", naming: "suffixed", maxShards });

describe("ShardAllocator", () => {
  it("creates the first shard of an empty chain", async () => {
    const allocator = createAllocator(new InMemoryDocumentStore());

    expect(await allocator.findAvailableShard(suffixedChain(), 500)).toEqual({
      kind: "found",
      shard: { index: 1, id: "ATTEND_CS101" },
      existingSizeBytes: 0,
      createsShard: true,
    });
  });

  it("moves past a shard that is nearly full", async () => {
    const store = new InMemoryDocumentStore();
    store.seedDocument("attendance", "ATTEND_CS101", paddedDocument(898_000));
    const allocator = createAllocator(store);

    expect(await allocator.findAvailableShard(suffixedChain(), 500)).toEqual({
      kind: "found",
      shard: { index: 2, id: "ATTEND_CS101_2" },
      existingSizeBytes: 0,
      createsShard: true,
    });
  });

  it("reuses an existing shard with room", async () => {
    const store = new InMemoryDocumentStore();
    store.seedDocument("attendance", "ATTEND_CS101", paddedDocument(898_000));
    store.seedDocument("attendance", "ATTEND_CS101_2", paddedDocument(1_000));
    const allocator = createAllocator(store);

    expect(await allocator.findAvailableShard(suffixedChain(), 500)).toEqual({
      kind: "found",
      shard: { index: 2, id: "ATTEND_CS101_2" },
      existingSizeBytes: 1_000,
      createsShard: false,
    });
  });

  it("requires the projected size to stay strictly under the cap", async () => {
    const store = new InMemoryDocumentStore();
    store.seedDocument("attendance", "B", paddedDocument(900));
    const allocator = new ShardAllocator({
      store,
      collection: "attendance",
      maxCapacityBytes: 1_000,
      safetyMarginBytes: 0,
    });
    const chain = new ShardChain({ baseId: "B", naming: "suffixed", maxShards: 5 });

    const exact = await allocator.findAvailableShard(chain, 100);
    const under = await allocator.findAvailableShard(chain, 99);

    expect(exact.kind === "found" && exact.shard.id).toBe("B_2");
    expect(under.kind === "found" && under.shard.id).toBe("B");
  });

  it("reports the ceiling when every shard is full", async () => {
    const store = new InMemoryDocumentStore();
    store.seedDocument("attendance", "ATTEND_CS101", paddedDocument(898_000));
    store.seedDocument("attendance", "ATTEND_CS101_2", paddedDocument(898_000));
    const logger = createLogger();
    const allocator = createAllocator(store, logger);

    expect(await allocator.findAvailableShard(suffixedChain(2), 500)).toEqual({
      kind: "capacity-exceeded",
      checked: 2,
    });
    expect(logger.warn).toHaveBeenCalledWith({
      event: "allocate.ceiling-reached",
      collection: "attendance",
      baseId: "ATTEND_CS101",
      incomingEstimate: 500,
      maxShards: 2,
    });
  });

  it("falls back to the first shard when the size check fails", async () => {
    const store = new InMemoryDocumentStore();
    const failure = new Error("quota exceeded");
    vi.spyOn(store, "getDocumentSizeInfo").mockRejectedValue(failure);
    const logger = createLogger();
    const allocator = createAllocator(store, logger);

    expect(await allocator.findAvailableShard(suffixedChain(), 500)).toEqual({
      kind: "fallback",
      shard: { index: 1, id: "ATTEND_CS101" },
      error: failure,
    });
    expect(logger.error).toHaveBeenCalledWith({
      event: "allocate.size-check-failed",
      collection: "attendance",
      baseId: "ATTEND_CS101",
      fallbackShard: "ATTEND_CS101",
      error: "quota exceeded",
    });
  });

  it("never grows a shard past the cap across sequential adds", async () => {
    const store = new InMemoryDocumentStore();
    const fieldStore = new DistributedFieldStore({
      store,
      collection: "attendance",
      naming: "suffixed",
      schema: z.string(),
      maxCapacityBytes: 2_000,
      // covers the key and separator, which the payload estimate leaves out
      safetyMarginBytes: 64,
      logger: createLogger(),
    });

    for (let i = 0; i < 40; i += 1) {
      const key = `entry-${String(i).padStart(2, "0")}`;
      const result = await fieldStore.addEntry("ATTEND_CS101", key, "x".repeat(100));
      expect(result.kind).toBe("added");
    }

    const stats = await fieldStore.collectStats("ATTEND_CS101");
    expect(stats?.totalFields).toBe(40);
    expect(stats?.totalDocuments).toBeGreaterThan(1);
    for (const document of stats?.documents ?? []) {
      expect(document.estimatedSizeBytes).toBeLessThan(2_000);
    }
  });
});
