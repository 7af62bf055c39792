import { shardDocumentId, type ShardNamingScheme } from "./naming.js";
import type { DocumentStore } from "./storage/types.js";

export type NamingDetection =
  | { kind: "detected"; naming: ShardNamingScheme; firstShardId: string }
  /* Both first-shard ids exist, so the data alone cannot tell the schemes apart */
  | { kind: "ambiguous"; firstShardIds: [string, string] }
  | { kind: "empty" };

/**
 * Inspects stored data to tell which naming scheme a base id was written with, by probing the
 * first shard of each scheme.
 */
export const detectNamingScheme = async (
  store: DocumentStore,
  collection: string,
  baseId: string,
): Promise<NamingDetection> => {
  const suffixedId = shardDocumentId("suffixed", baseId, 1);
  const indexedId = shardDocumentId("indexed", baseId, 1);

  const [suffixedExists, indexedExists] = await Promise.all([
    store.documentExists(collection, suffixedId),
    store.documentExists(collection, indexedId),
  ]);

  if (suffixedExists && indexedExists) {
    return { kind: "ambiguous", firstShardIds: [suffixedId, indexedId] };
  }
  if (suffixedExists) {
    return { kind: "detected", naming: "suffixed", firstShardId: suffixedId };
  }
  if (indexedExists) {
    return { kind: "detected", naming: "indexed", firstShardId: indexedId };
  }
  return { kind: "empty" };
};
