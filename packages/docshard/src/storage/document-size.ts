import { serializedByteLength } from "../size-estimator.js";
import type { DocumentSizeInfo } from "./types.js";

/**
 * Size of a document as its JSON form, the way hosted stores are usually measured from a client.
 * This under-counts the store's own per-field overhead, which is what the allocator's safety
 * margin is for.
 */
export const measureDocument = (data: Readonly<Record<string, unknown>>): DocumentSizeInfo => ({
  estimatedSizeBytes: serializedByteLength(data),
  fieldCount: Object.keys(data).length,
});
