import { ShardChainError } from "./errors.js";

/**
 * How a shard index maps to a document id.
 *
 * - `suffixed`: shard 1 is the bare base id, shard n is `{base}_{n}` for n >= 2.
 * - `indexed`: shard n is `{base}{n}` for every n, so shard 1 is `{base}1`.
 *
 * Both layouts exist in stored data and they do not interoperate: a chain written under one
 * scheme is invisible under the other. Pick the scheme per collection, and use
 * `detectNamingScheme` against real data when unsure.
 */
export type ShardNamingScheme = "suffixed" | "indexed";

export const SHARD_NAMING_SCHEMES = ["suffixed", "indexed"] as const;

export type ShardHandle = {
  readonly index: number;
  readonly id: string;
};

export const isShardNamingScheme = (value: unknown): value is ShardNamingScheme =>
  value === "suffixed" || value === "indexed";

export const shardDocumentId = (
  naming: ShardNamingScheme,
  baseId: string,
  index: number,
): string => {
  if (!Number.isInteger(index) || index < 1) {
    throw new ShardChainError(`Shard index must be a positive integer, got ${index}`);
  }

  if (naming === "suffixed") {
    return index === 1 ? baseId : `${baseId}_${index}`;
  }

  // `indexed` ids are ambiguous across base ids ("A" shard 11 and "A1" shard 1 are both "A11").
  return `${baseId}${index}`;
};

export type ShardChainOptions = {
  baseId: string;
  naming: ShardNamingScheme;
  maxShards: number;
};

/**
 * Ordered, sparse view over the shard documents of one base id. Handles are only ever produced
 * here, so every component addresses shards through the same naming scheme.
 */
export class ShardChain {
  readonly baseId: string;
  readonly naming: ShardNamingScheme;
  readonly maxShards: number;

  constructor(options: ShardChainOptions) {
    if (options.baseId.length === 0) {
      throw new ShardChainError("Base id cannot be empty");
    }
    if (!Number.isInteger(options.maxShards) || options.maxShards < 1) {
      throw new ShardChainError(`maxShards must be a positive integer, got ${options.maxShards}`);
    }

    this.baseId = options.baseId;
    this.naming = options.naming;
    this.maxShards = options.maxShards;
  }

  first(): ShardHandle {
    return this.at(1);
  }

  at(index: number): ShardHandle {
    if (index > this.maxShards) {
      throw new ShardChainError(
        `Shard ${index} is past the ceiling of ${this.maxShards} for "${this.baseId}"`,
      );
    }
    return { index, id: shardDocumentId(this.naming, this.baseId, index) };
  }

  next(handle: ShardHandle): ShardHandle | undefined {
    if (handle.index >= this.maxShards) {
      return undefined;
    }
    return this.at(handle.index + 1);
  }

  *handles(): Generator<ShardHandle> {
    for (let index = 1; index <= this.maxShards; index += 1) {
      yield this.at(index);
    }
  }
}
