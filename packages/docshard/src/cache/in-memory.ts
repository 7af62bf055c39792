import type { CacheStorage } from "./types.js";

export class InMemoryCacheStorage implements CacheStorage {
  readonly #slots = new Map<string, string>();

  async getItem(slotName: string): Promise<string | null> {
    return this.#slots.get(slotName) ?? null;
  }

  async setItem(slotName: string, value: string): Promise<void> {
    this.#slots.set(slotName, value);
  }
}
