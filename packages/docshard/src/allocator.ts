import { describeError, logWithLogger, type Logger } from "./logging.js";
import type { ShardChain, ShardHandle } from "./naming.js";
import type { DocumentStore } from "./storage/types.js";

export type AllocationResult =
  /* `createsShard` is true when the shard does not exist yet and the write will create it */
  | { kind: "found"; shard: ShardHandle; existingSizeBytes: number; createsShard: boolean }
  | { kind: "fallback"; shard: ShardHandle; error: unknown }
  | { kind: "capacity-exceeded"; checked: number };

export type ShardAllocatorOptions = {
  store: DocumentStore;
  collection: string;
  maxCapacityBytes: number;
  safetyMarginBytes: number;
  logger?: Logger;
};

/**
 * Picks the first shard in the chain with room for an incoming entry.
 *
 * Allocation is optimistic: the capacity check and the write that follows are separate round
 * trips with no compare-and-set between them. Concurrent adds against the same chain can all
 * pass the check for a shard with room for only one of them and overflow it together, or all
 * create the same next shard. Nothing here detects or repairs that.
 *
 * A failed capacity check does not fail the write: allocation falls back to shard 1.
 */
export class ShardAllocator {
  readonly #store: DocumentStore;
  readonly #collection: string;
  readonly #maxCapacityBytes: number;
  readonly #safetyMarginBytes: number;
  readonly #logger: Logger | undefined;

  constructor(options: ShardAllocatorOptions) {
    this.#store = options.store;
    this.#collection = options.collection;
    this.#maxCapacityBytes = options.maxCapacityBytes;
    this.#safetyMarginBytes = options.safetyMarginBytes;
    this.#logger = options.logger;
  }

  async findAvailableShard(chain: ShardChain, incomingEstimate: number): Promise<AllocationResult> {
    let shard: ShardHandle | undefined = chain.first();
    let checked = 0;

    try {
      while (shard) {
        checked += 1;

        const sizeInfo = await this.#store.getDocumentSizeInfo(this.#collection, shard.id);
        if (!sizeInfo) {
          return { kind: "found", shard, existingSizeBytes: 0, createsShard: true };
        }

        const projected = sizeInfo.estimatedSizeBytes + incomingEstimate + this.#safetyMarginBytes;
        if (projected < this.#maxCapacityBytes) {
          return {
            kind: "found",
            shard,
            existingSizeBytes: sizeInfo.estimatedSizeBytes,
            createsShard: false,
          };
        }

        shard = chain.next(shard);
      }
    } catch (error) {
      const fallback = chain.first();
      logWithLogger(this.#logger, "error", {
        event: "allocate.size-check-failed",
        collection: this.#collection,
        baseId: chain.baseId,
        fallbackShard: fallback.id,
        error: describeError(error),
      });
      return { kind: "fallback", shard: fallback, error };
    }

    logWithLogger(this.#logger, "warn", {
      event: "allocate.ceiling-reached",
      collection: this.#collection,
      baseId: chain.baseId,
      incomingEstimate,
      maxShards: chain.maxShards,
    });
    return { kind: "capacity-exceeded", checked };
  }
}
