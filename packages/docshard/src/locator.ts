import { logWithLogger, type Logger } from "./logging.js";
import type { ShardChain, ShardHandle } from "./naming.js";
import type { DocumentStore } from "./storage/types.js";

export type LocateResult =
  | { kind: "found"; shard: ShardHandle }
  | { kind: "not-found"; checked: number }
  | { kind: "capacity-exceeded"; checked: number };

export type ShardLocatorOptions = {
  store: DocumentStore;
  collection: string;
  logger?: Logger;
};

/**
 * Finds the shard holding a key by scanning the chain from shard 1: a containment check per
 * shard, then an existence check to detect the end of the chain. Nothing is cached between
 * calls. Remote errors propagate.
 */
export class ShardLocator {
  readonly #store: DocumentStore;
  readonly #collection: string;
  readonly #logger: Logger | undefined;

  constructor(options: ShardLocatorOptions) {
    this.#store = options.store;
    this.#collection = options.collection;
    this.#logger = options.logger;
  }

  async findShardContainingKey(chain: ShardChain, key: string): Promise<LocateResult> {
    let shard: ShardHandle | undefined = chain.first();
    let checked = 0;

    while (shard) {
      checked += 1;

      if (await this.#store.documentContainsKey(this.#collection, shard.id, key)) {
        return { kind: "found", shard };
      }

      if (!(await this.#store.documentExists(this.#collection, shard.id))) {
        return { kind: "not-found", checked };
      }

      shard = chain.next(shard);
    }

    logWithLogger(this.#logger, "warn", {
      event: "locate.ceiling-reached",
      collection: this.#collection,
      baseId: chain.baseId,
      key,
      maxShards: chain.maxShards,
    });
    return { kind: "capacity-exceeded", checked };
  }
}
