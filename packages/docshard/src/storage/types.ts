/**
 * `estimatedSizeBytes` is the largest size the document has been recorded at. Removing a field
 * lowers `fieldCount` but not the estimate.
 */
export type DocumentSizeInfo = {
  estimatedSizeBytes: number;
  fieldCount: number;
};

/**
 * Serialized (JSON) field values of one document, keyed by field name.
 */
export type DocumentFields = Record<string, string>;

/**
 * Remote document store holding shard documents. Every method may reject on transport or
 * backend failure; callers in this package decide how to degrade.
 *
 * Field values cross this boundary as JSON text. Adapters parse them on write so that a document
 * holds structured fields, and serialize them again on read.
 */
export interface DocumentStore {
  readonly name: string;

  documentExists(collection: string, documentId: string): Promise<boolean>;

  documentContainsKey(collection: string, documentId: string, key: string): Promise<boolean>;

  // null when the document does not exist
  getDocumentSizeInfo(collection: string, documentId: string): Promise<DocumentSizeInfo | null>;

  /**
   * Sets `key` on the document, creating the document when it does not exist yet.
   * Resolves to the written key, or null when the store refused the write.
   */
  addToDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<string | null>;

  /**
   * Overwrites `key` on an existing document. Resolves to false when the document is missing.
   */
  updateFieldInDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<boolean>;

  /**
   * Drops `key` from an existing document. A document left without fields still exists.
   * Resolves to false when the document is missing.
   */
  removeKeyFromDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
  ): Promise<boolean>;

  getField(collection: string, documentId: string, key: string): Promise<string | null>;

  // Only the requested keys the document holds; null when the document does not exist
  getFields(
    collection: string,
    documentId: string,
    keys: readonly string[],
  ): Promise<DocumentFields | null>;

  getDocument(collection: string, documentId: string): Promise<DocumentFields | null>;
}
