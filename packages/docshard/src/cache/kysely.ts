import type { Kysely } from "kysely";
import type { Clock } from "../config.js";
import type { DocshardDatabase } from "../storage/sqlite.js";
import type { CacheStorage } from "./types.js";

export type KyselyCacheStorageOptions = {
  db: Kysely<DocshardDatabase>;
  clock?: Clock;
};

export class KyselyCacheStorage implements CacheStorage {
  readonly #db: Kysely<DocshardDatabase>;
  readonly #clock: Clock;

  constructor(options: KyselyCacheStorageOptions) {
    this.#db = options.db;
    this.#clock = options.clock ?? { now: () => new Date() };
  }

  async getItem(slotName: string): Promise<string | null> {
    const row = await this.#db
      .selectFrom("docshard_cache_slots")
      .where("slot_name", "=", slotName)
      .select("slot_value")
      .executeTakeFirst();
    return row?.slot_value ?? null;
  }

  async setItem(slotName: string, value: string): Promise<void> {
    const updatedAt = this.#clock.now().toISOString();
    await this.#db
      .insertInto("docshard_cache_slots")
      .values({ slot_name: slotName, slot_value: value, updated_at: updatedAt })
      .onConflict((oc) =>
        oc.column("slot_name").doUpdateSet({ slot_value: value, updated_at: updatedAt }),
      )
      .execute();
  }
}
