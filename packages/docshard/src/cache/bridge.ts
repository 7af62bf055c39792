import { z } from "zod";
import type { Clock } from "../config.js";
import { describeError, logWithLogger, type Logger } from "../logging.js";
import type { CachePermission, CacheStorage } from "./types.js";

const cacheSnapshotSchema = z.object({
  value: z.string(),
  fetchedAt: z.string(),
});

const cacheSlotSchema = z.record(z.string(), cacheSnapshotSchema);

export type CacheSnapshot = z.infer<typeof cacheSnapshotSchema>;

export type OfflineCacheBridgeOptions = {
  storage: CacheStorage;
  permission: CachePermission;
  /* One slot per domain, e.g. "student-levels" */
  slotName: string;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Permission-gated mirror of remote reads in a single local cache slot.
 *
 * The slot holds every cached entry of the domain as one JSON map, so each write is a
 * read-modify-write of the whole map. Two writers racing on the same slot can drop each other's
 * entries.
 */
export class OfflineCacheBridge {
  readonly slotName: string;
  readonly #storage: CacheStorage;
  readonly #permission: CachePermission;
  readonly #clock: Clock;
  readonly #logger: Logger | undefined;

  constructor(options: OfflineCacheBridgeOptions) {
    this.slotName = options.slotName;
    this.#storage = options.storage;
    this.#permission = options.permission;
    this.#clock = options.clock ?? { now: () => new Date() };
    this.#logger = options.logger;
  }

  /**
   * Stores a value fetched from the remote store, stamped with `fetchedAt` (the bridge's clock
   * when omitted). Resolves to false when the caller is not allowed to cache.
   */
  async remember(
    callerId: string,
    key: string,
    serializedValue: string,
    fetchedAt: Date = this.#clock.now(),
  ): Promise<boolean> {
    if (!(await this.#permission.canCacheAllEntries(callerId))) {
      return false;
    }

    const slot = await this.#readSlot();
    slot.set(key, { value: serializedValue, fetchedAt: fetchedAt.toISOString() });
    await this.#storage.setItem(this.slotName, JSON.stringify(Object.fromEntries(slot)));
    return true;
  }

  async recall(callerId: string, key: string): Promise<CacheSnapshot | null> {
    if (!(await this.#permission.canCacheAllEntries(callerId))) {
      return null;
    }

    const slot = await this.#readSlot();
    return slot.get(key) ?? null;
  }

  async #readSlot(): Promise<Map<string, CacheSnapshot>> {
    const raw = await this.#storage.getItem(this.slotName);
    if (raw === null) {
      return new Map();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logWithLogger(this.#logger, "warn", {
        event: "cache.slot-unreadable",
        slotName: this.slotName,
        error: describeError(error),
      });
      return new Map();
    }

    const result = cacheSlotSchema.safeParse(parsed);
    if (!result.success) {
      logWithLogger(this.#logger, "warn", {
        event: "cache.slot-invalid",
        slotName: this.slotName,
        error: result.error.message,
      });
      return new Map();
    }

    return new Map(Object.entries(result.data));
  }
}
