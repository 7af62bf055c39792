import type { z } from "zod";
import { ShardAllocator } from "./allocator.js";
import type { OfflineCacheBridge } from "./cache/bridge.js";
import { resolveDocshardConfig, type DocshardConfig, type ResolvedDocshardConfig } from "./config.js";
import { ShardLocator, type LocateResult } from "./locator.js";
import { describeError, logWithLogger } from "./logging.js";
import { ShardChain, type ShardHandle } from "./naming.js";
import { createSizeEstimator, type SizeEstimator } from "./size-estimator.js";
import type { DocumentFields, DocumentStore } from "./storage/types.js";

export type DistributedFieldStoreOptions<T> = DocshardConfig & {
  store: DocumentStore;
  collection: string;
  /* Decodes values read back from the store; use `z.unknown()` to skip validation */
  schema: z.ZodType<T>;
  /* Size profile used to estimate entries; payload length is used when absent */
  kind?: string;
  cache?: OfflineCacheBridge;
};

export type WriteFailureReason =
  | "capacity-exceeded"
  | "write-rejected"
  | "remote-error"
  | "unserializable";

export type AddEntryResult =
  | {
      kind: "added";
      key: string;
      shard: ShardHandle;
      estimatedSizeBytes: number;
      /* True when the capacity check failed and the entry went to shard 1 regardless */
      fallback: boolean;
    }
  | { kind: "failed"; reason: WriteFailureReason; error?: unknown };

export type UpdateEntryResult =
  | { kind: "updated"; shard: ShardHandle }
  | { kind: "not-found" }
  | { kind: "failed"; reason: WriteFailureReason; error?: unknown };

export type SetEntryResult = AddEntryResult | UpdateEntryResult;

export type RemoveEntryResult =
  | { kind: "removed"; shard: ShardHandle }
  | { kind: "not-found" }
  | { kind: "failed"; reason: WriteFailureReason; error?: unknown };

export type ReadEntryResult<T> =
  | { source: "remote"; value: T; shard: ShardHandle }
  | { source: "cache"; value: T; fetchedAt: string }
  | { source: "none" };

export type ReadEntryOptions = {
  /* Identity checked against the cache permission; no cache access without it */
  callerId?: string;
};

export type ShardEntry<T> = {
  key: string;
  value: T;
  shardId: string;
};

export type ReadEntriesResult<T> = {
  entries: ShardEntry<T>[];
  missingKeys: string[];
};

export type BatchUpdateResult = {
  attempted: number;
  updated: number;
  failedKeys: string[];
};

export type ShardDocumentStats = {
  id: string;
  index: number;
  fieldCount: number;
  estimatedSizeBytes: number;
  fillRatio: number;
};

export type CollectionStats = {
  baseId: string;
  totalDocuments: number;
  totalFields: number;
  estimatedTotalSizeBytes: number;
  documents: ShardDocumentStats[];
};

export type SearchValue = string | number | boolean | null;

type WalkedShard<R> = { shard: ShardHandle; data: R };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Key-value view over a chain of shard documents in one remote collection.
 *
 * Writes pick a shard through the allocator, point reads find it through the locator and fall
 * back to the offline cache, bulk reads walk the chain until the first missing shard. Remote
 * failures are logged and turned into typed results; nothing is retried.
 */
export class DistributedFieldStore<T> {
  readonly collection: string;
  readonly config: ResolvedDocshardConfig;
  readonly #store: DocumentStore;
  readonly #schema: z.ZodType<T>;
  readonly #kind: string | undefined;
  readonly #cache: OfflineCacheBridge | undefined;
  readonly #estimate: SizeEstimator;
  readonly #locator: ShardLocator;
  readonly #allocator: ShardAllocator;

  constructor(options: DistributedFieldStoreOptions<T>) {
    this.config = resolveDocshardConfig(options);
    this.collection = options.collection;
    this.#store = options.store;
    this.#schema = options.schema;
    this.#kind = options.kind;
    this.#cache = options.cache;
    this.#estimate = createSizeEstimator(this.config.sizeProfiles);
    this.#locator = new ShardLocator({
      store: options.store,
      collection: options.collection,
      logger: this.config.logger,
    });
    this.#allocator = new ShardAllocator({
      store: options.store,
      collection: options.collection,
      maxCapacityBytes: this.config.maxCapacityBytes,
      safetyMarginBytes: this.config.safetyMarginBytes,
      logger: this.config.logger,
    });
  }

  chain(baseId: string): ShardChain {
    return new ShardChain({
      baseId,
      naming: this.config.naming,
      maxShards: this.config.maxShards,
    });
  }

  /**
   * Finds the shard holding `key`. Unlike the entry operations this does not degrade: remote
   * errors reject.
   */
  locateEntry(baseId: string, key: string): Promise<LocateResult> {
    return this.#locator.findShardContainingKey(this.chain(baseId), key);
  }

  async addEntry(baseId: string, key: string, value: T): Promise<AddEntryResult> {
    const chain = this.chain(baseId);

    let serializedValue: string;
    try {
      serializedValue = this.#encode(value);
    } catch (error) {
      this.#logFailure("entry.add-failed", baseId, key, error);
      return { kind: "failed", reason: "unserializable", error };
    }

    const estimatedSizeBytes = this.#estimate(this.#kind, value);
    const allocation = await this.#allocator.findAvailableShard(chain, estimatedSizeBytes);
    if (allocation.kind === "capacity-exceeded") {
      return { kind: "failed", reason: "capacity-exceeded" };
    }

    let writtenKey: string | null;
    try {
      writtenKey = await this.#store.addToDistributedDocument(
        this.collection,
        allocation.shard.id,
        key,
        serializedValue,
      );
    } catch (error) {
      this.#logFailure("entry.add-failed", baseId, key, error);
      return { kind: "failed", reason: "remote-error", error };
    }

    if (writtenKey === null) {
      this.#logFailure("entry.add-rejected", baseId, key, undefined);
      return { kind: "failed", reason: "write-rejected" };
    }

    return {
      kind: "added",
      key: writtenKey,
      shard: allocation.shard,
      estimatedSizeBytes,
      fallback: allocation.kind === "fallback",
    };
  }

  async updateEntry(baseId: string, key: string, value: T): Promise<UpdateEntryResult> {
    const chain = this.chain(baseId);

    let serializedValue: string;
    try {
      serializedValue = this.#encode(value);
    } catch (error) {
      this.#logFailure("entry.update-failed", baseId, key, error);
      return { kind: "failed", reason: "unserializable", error };
    }

    let shard: ShardHandle;
    try {
      const located = await this.#locator.findShardContainingKey(chain, key);
      if (located.kind === "not-found") {
        return { kind: "not-found" };
      }
      if (located.kind === "capacity-exceeded") {
        return { kind: "failed", reason: "capacity-exceeded" };
      }
      shard = located.shard;
    } catch (error) {
      this.#logFailure("entry.update-failed", baseId, key, error);
      return { kind: "failed", reason: "remote-error", error };
    }

    let updated: boolean;
    try {
      updated = await this.#store.updateFieldInDistributedDocument(
        this.collection,
        shard.id,
        key,
        serializedValue,
      );
    } catch (error) {
      this.#logFailure("entry.update-failed", baseId, key, error);
      return { kind: "failed", reason: "remote-error", error };
    }

    if (!updated) {
      this.#logFailure("entry.update-rejected", baseId, key, undefined);
      return { kind: "failed", reason: "write-rejected" };
    }
    return { kind: "updated", shard };
  }

  /**
   * Updates the key in place when some shard already holds it, otherwise adds it. `addEntry`
   * alone does not check the chain, so this is the write that keeps keys unique.
   */
  async setEntry(baseId: string, key: string, value: T): Promise<SetEntryResult> {
    const updated = await this.updateEntry(baseId, key, value);
    if (updated.kind !== "not-found") {
      return updated;
    }
    return this.addEntry(baseId, key, value);
  }

  async removeEntry(baseId: string, key: string): Promise<RemoveEntryResult> {
    const chain = this.chain(baseId);

    let shard: ShardHandle;
    try {
      const located = await this.#locator.findShardContainingKey(chain, key);
      if (located.kind === "not-found") {
        return { kind: "not-found" };
      }
      if (located.kind === "capacity-exceeded") {
        return { kind: "failed", reason: "capacity-exceeded" };
      }
      shard = located.shard;
    } catch (error) {
      this.#logFailure("entry.remove-failed", baseId, key, error);
      return { kind: "failed", reason: "remote-error", error };
    }

    let removed: boolean;
    try {
      removed = await this.#store.removeKeyFromDistributedDocument(this.collection, shard.id, key);
    } catch (error) {
      this.#logFailure("entry.remove-failed", baseId, key, error);
      return { kind: "failed", reason: "remote-error", error };
    }

    if (!removed) {
      this.#logFailure("entry.remove-rejected", baseId, key, undefined);
      return { kind: "failed", reason: "write-rejected" };
    }
    return { kind: "removed", shard };
  }

  async readEntry(
    baseId: string,
    key: string,
    options: ReadEntryOptions = {},
  ): Promise<ReadEntryResult<T>> {
    const chain = this.chain(baseId);
    let reason: string;
    let failure: unknown = undefined;

    try {
      const located = await this.#locator.findShardContainingKey(chain, key);
      if (located.kind === "found") {
        const serializedValue = await this.#store.getField(this.collection, located.shard.id, key);
        if (serializedValue !== null) {
          const value = this.#decode(serializedValue);
          await this.#remember(options.callerId, key, serializedValue, this.config.clock.now());
          return { source: "remote", value, shard: located.shard };
        }
        reason = "field-missing";
      } else {
        reason = located.kind;
      }
    } catch (error) {
      reason = "remote-error";
      failure = error;
    }

    logWithLogger(this.config.logger, "warn", {
      event: "entry.read-failed",
      collection: this.collection,
      baseId,
      key,
      reason,
      ...(failure === undefined ? {} : { error: describeError(failure) }),
    });

    return this.#recall(options.callerId, key);
  }

  async readAllEntries(baseId: string): Promise<ShardEntry<T>[]> {
    const chain = this.chain(baseId);
    let shards: WalkedShard<DocumentFields>[];
    try {
      shards = await this.#walk(chain, (shard) =>
        this.#store.getDocument(this.collection, shard.id),
      );
    } catch (error) {
      this.#logFailure("collection.read-failed", baseId, undefined, error);
      return [];
    }

    const entries: ShardEntry<T>[] = [];
    for (const { shard, data } of shards) {
      for (const [key, serializedValue] of Object.entries(data)) {
        const entry = this.#decodeEntry(shard, key, serializedValue);
        if (entry) {
          entries.push(entry);
        }
      }
    }
    return entries;
  }

  /**
   * Reads several keys in one pass over the chain, one multi-field read per shard, stopping once
   * every key is found. Keys that are absent or fail to decode are listed in `missingKeys`.
   */
  async readEntries(baseId: string, keys: readonly string[]): Promise<ReadEntriesResult<T>> {
    const chain = this.chain(baseId);
    const pending = new Set(keys);
    const entries: ShardEntry<T>[] = [];

    try {
      let shard: ShardHandle | undefined = chain.first();
      while (shard && pending.size > 0) {
        const fields = await this.#store.getFields(this.collection, shard.id, [...pending]);
        if (fields === null) {
          break;
        }
        for (const [key, serializedValue] of Object.entries(fields)) {
          const entry = this.#decodeEntry(shard, key, serializedValue);
          if (entry) {
            entries.push(entry);
            pending.delete(key);
          }
        }
        shard = chain.next(shard);
      }
    } catch (error) {
      this.#logFailure("collection.read-failed", baseId, undefined, error);
      return { entries: [], missingKeys: Array.from(new Set(keys)) };
    }

    return { entries, missingKeys: Array.from(pending) };
  }

  /**
   * Applies updates one key at a time. Not atomic: a failure leaves earlier keys updated.
   */
  async batchUpdate(baseId: string, updates: ReadonlyMap<string, T>): Promise<BatchUpdateResult> {
    const failedKeys: string[] = [];
    let updated = 0;

    for (const [key, value] of updates) {
      const result = await this.updateEntry(baseId, key, value);
      if (result.kind === "updated") {
        updated += 1;
      } else {
        failedKeys.push(key);
      }
    }

    return { attempted: updates.size, updated, failedKeys };
  }

  async searchEntries(
    baseId: string,
    field: string,
    expected: SearchValue,
  ): Promise<ShardEntry<T>[]> {
    const entries = await this.readAllEntries(baseId);
    return entries.filter(
      ({ value }) => isRecord(value) && Object.hasOwn(value, field) && value[field] === expected,
    );
  }

  async collectStats(baseId: string): Promise<CollectionStats | null> {
    const chain = this.chain(baseId);
    let documents: ShardDocumentStats[];
    try {
      const shards = await this.#walk(chain, (shard) =>
        this.#store.getDocumentSizeInfo(this.collection, shard.id),
      );
      documents = shards.map(({ shard, data }) => ({
        id: shard.id,
        index: shard.index,
        fieldCount: data.fieldCount,
        estimatedSizeBytes: data.estimatedSizeBytes,
        fillRatio: data.estimatedSizeBytes / this.config.maxCapacityBytes,
      }));
    } catch (error) {
      this.#logFailure("collection.stats-failed", baseId, undefined, error);
      return null;
    }

    return {
      baseId,
      totalDocuments: documents.length,
      totalFields: documents.reduce((sum, doc) => sum + doc.fieldCount, 0),
      estimatedTotalSizeBytes: documents.reduce((sum, doc) => sum + doc.estimatedSizeBytes, 0),
      documents,
    };
  }

  // Existence checks only; the locator is not involved.
  async #walk<R>(
    chain: ShardChain,
    read: (shard: ShardHandle) => Promise<R | null>,
  ): Promise<WalkedShard<R>[]> {
    const shards: WalkedShard<R>[] = [];

    for (const shard of chain.handles()) {
      if (!(await this.#store.documentExists(this.collection, shard.id))) {
        return shards;
      }
      const data = await read(shard);
      if (data === null) {
        return shards;
      }
      shards.push({ shard, data });
    }

    logWithLogger(this.config.logger, "warn", {
      event: "collection.ceiling-reached",
      collection: this.collection,
      baseId: chain.baseId,
      maxShards: chain.maxShards,
    });
    return shards;
  }

  #encode(value: T): string {
    const serialized: string | undefined = JSON.stringify(value);
    if (serialized === undefined) {
      throw new TypeError("Value has no JSON representation");
    }
    return serialized;
  }

  #decode(serializedValue: string): T {
    return this.#schema.parse(JSON.parse(serializedValue));
  }

  // One malformed field does not hide the rest of the collection.
  #decodeEntry(shard: ShardHandle, key: string, serializedValue: string): ShardEntry<T> | null {
    try {
      return { key, value: this.#decode(serializedValue), shardId: shard.id };
    } catch (error) {
      logWithLogger(this.config.logger, "warn", {
        event: "entry.decode-failed",
        collection: this.collection,
        shard: shard.id,
        key,
        error: describeError(error),
      });
      return null;
    }
  }

  async #remember(
    callerId: string | undefined,
    key: string,
    serializedValue: string,
    fetchedAt: Date,
  ) {
    if (!this.#cache || callerId === undefined) {
      return;
    }

    try {
      await this.#cache.remember(callerId, key, serializedValue, fetchedAt);
    } catch (error) {
      logWithLogger(this.config.logger, "warn", {
        event: "cache.write-failed",
        collection: this.collection,
        slotName: this.#cache.slotName,
        key,
        error: describeError(error),
      });
    }
  }

  async #recall(callerId: string | undefined, key: string): Promise<ReadEntryResult<T>> {
    if (this.#cache && callerId !== undefined) {
      try {
        const snapshot = await this.#cache.recall(callerId, key);
        if (snapshot) {
          return {
            source: "cache",
            value: this.#decode(snapshot.value),
            fetchedAt: snapshot.fetchedAt,
          };
        }
      } catch (error) {
        logWithLogger(this.config.logger, "warn", {
          event: "cache.read-failed",
          collection: this.collection,
          slotName: this.#cache.slotName,
          key,
          error: describeError(error),
        });
      }
    }

    logWithLogger(this.config.logger, "error", {
      event: "entry.unavailable",
      collection: this.collection,
      key,
    });
    return { source: "none" };
  }

  #logFailure(event: string, baseId: string, key: string | undefined, error: unknown) {
    logWithLogger(this.config.logger, "error", {
      event,
      collection: this.collection,
      baseId,
      ...(key === undefined ? {} : { key }),
      ...(error === undefined ? {} : { error: describeError(error) }),
    });
  }
}
