import { z } from "zod";
import { DocshardConfigError } from "./errors.js";
import type { Logger } from "./logging.js";
import { SHARD_NAMING_SCHEMES, type ShardNamingScheme } from "./naming.js";
import { DEFAULT_SIZE_PROFILES, type SizeProfiles } from "./size-estimator.js";

export const DEFAULT_MAX_CAPACITY_BYTES = 900_000;
export const DEFAULT_SAFETY_MARGIN_BYTES = 4096;
export const DEFAULT_MAX_SHARDS = 100;

export type Clock = { now: () => Date };

export interface DocshardConfig {
  naming: ShardNamingScheme;
  /**
   * Size a shard document must stay under. Defaults to 900,000 bytes, below the ~1MiB document
   * cap of hosted stores.
   */
  maxCapacityBytes?: number;
  /**
   * Headroom kept free in every shard on top of the incoming entry's estimate.
   */
  safetyMarginBytes?: number;
  /**
   * Ceiling on the number of shards checked by lookups, allocation and chain walks.
   */
  maxShards?: number;
  /* Merged over the default size profiles */
  sizeProfiles?: Record<string, number>;
  logger?: Logger;
  clock?: Clock;
}

export type ResolvedDocshardConfig = {
  naming: ShardNamingScheme;
  maxCapacityBytes: number;
  safetyMarginBytes: number;
  maxShards: number;
  sizeProfiles: SizeProfiles;
  logger: Logger;
  clock: Clock;
};

const docshardConfigSchema = z.object({
  naming: z.enum(SHARD_NAMING_SCHEMES),
  maxCapacityBytes: z.number().int().positive().default(DEFAULT_MAX_CAPACITY_BYTES),
  safetyMarginBytes: z.number().int().nonnegative().default(DEFAULT_SAFETY_MARGIN_BYTES),
  maxShards: z.number().int().positive().default(DEFAULT_MAX_SHARDS),
  sizeProfiles: z.record(z.string(), z.number().int().nonnegative()).default({}),
});

const defaultClock: Clock = {
  now: () => new Date(),
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.map((segment) => String(segment)).join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");

export const resolveDocshardConfig = (config: DocshardConfig): ResolvedDocshardConfig => {
  const result = docshardConfigSchema.safeParse({
    naming: config.naming,
    maxCapacityBytes: config.maxCapacityBytes,
    safetyMarginBytes: config.safetyMarginBytes,
    maxShards: config.maxShards,
    sizeProfiles: config.sizeProfiles,
  });

  if (!result.success) {
    throw new DocshardConfigError(`Invalid docshard config: ${formatIssues(result.error)}`);
  }

  const parsed = result.data;
  if (parsed.safetyMarginBytes >= parsed.maxCapacityBytes) {
    throw new DocshardConfigError(
      `Invalid docshard config: safetyMarginBytes (${parsed.safetyMarginBytes}) must be below maxCapacityBytes (${parsed.maxCapacityBytes})`,
    );
  }

  return {
    ...parsed,
    sizeProfiles: { ...DEFAULT_SIZE_PROFILES, ...parsed.sizeProfiles },
    logger: config.logger ?? console,
    clock: config.clock ?? defaultClock,
  };
};
