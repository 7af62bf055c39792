/**
 * Local persistent key-value storage for cache slots. Values are JSON text.
 */
export interface CacheStorage {
  getItem(slotName: string): Promise<string | null>;
  setItem(slotName: string, value: string): Promise<void>;
}

/**
 * Capability deciding whether a caller may read and write the full local cache. Passed to the
 * cache bridge explicitly rather than looked up from an ambient session.
 */
export interface CachePermission {
  canCacheAllEntries(callerId: string): Promise<boolean>;
}

export const allowCachingFor = (callerIds: Iterable<string>): CachePermission => {
  const allowed = new Set(callerIds);
  return {
    canCacheAllEntries: async (callerId) => allowed.has(callerId),
  };
};

export const denyCaching: CachePermission = {
  canCacheAllEntries: async () => false,
};
