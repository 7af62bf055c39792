export {
  DistributedFieldStore,
  type AddEntryResult,
  type BatchUpdateResult,
  type CollectionStats,
  type DistributedFieldStoreOptions,
  type ReadEntriesResult,
  type ReadEntryOptions,
  type ReadEntryResult,
  type RemoveEntryResult,
  type SearchValue,
  type SetEntryResult,
  type ShardDocumentStats,
  type ShardEntry,
  type UpdateEntryResult,
  type WriteFailureReason,
} from "./field-store.js";
export { ShardAllocator, type AllocationResult, type ShardAllocatorOptions } from "./allocator.js";
export { ShardLocator, type LocateResult, type ShardLocatorOptions } from "./locator.js";
export {
  ShardChain,
  SHARD_NAMING_SCHEMES,
  isShardNamingScheme,
  shardDocumentId,
  type ShardChainOptions,
  type ShardHandle,
  type ShardNamingScheme,
} from "./naming.js";
export { detectNamingScheme, type NamingDetection } from "./detect.js";
export {
  DEFAULT_SIZE_PROFILES,
  createSizeEstimator,
  estimateEntrySize,
  serializedByteLength,
  type SizeEstimator,
  type SizeProfiles,
} from "./size-estimator.js";
export {
  DEFAULT_MAX_CAPACITY_BYTES,
  DEFAULT_MAX_SHARDS,
  DEFAULT_SAFETY_MARGIN_BYTES,
  resolveDocshardConfig,
  type Clock,
  type DocshardConfig,
  type ResolvedDocshardConfig,
} from "./config.js";
export { DocshardConfigError, ShardChainError } from "./errors.js";
export { logWithLogger, type LogPayload, type Logger, type LogLevel } from "./logging.js";

export type { DocumentFields, DocumentSizeInfo, DocumentStore } from "./storage/types.js";
export { InMemoryDocumentStore, type InMemoryDocumentStoreOptions } from "./storage/in-memory.js";
export { KyselyDocumentStore, type KyselyDocumentStoreOptions } from "./storage/kysely.js";
export {
  migrateDocshardTables,
  openSqliteDatabase,
  type DocshardDatabase,
} from "./storage/sqlite.js";

export { OfflineCacheBridge, type CacheSnapshot, type OfflineCacheBridgeOptions } from "./cache/bridge.js";
export {
  allowCachingFor,
  denyCaching,
  type CachePermission,
  type CacheStorage,
} from "./cache/types.js";
export { InMemoryCacheStorage } from "./cache/in-memory.js";
export { KyselyCacheStorage, type KyselyCacheStorageOptions } from "./cache/kysely.js";
