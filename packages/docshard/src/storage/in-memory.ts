import { measureDocument } from "./document-size.js";
import type { DocumentFields, DocumentSizeInfo, DocumentStore } from "./types.js";

type InMemoryDocument = {
  fields: Map<string, unknown>;
  recordedSizeBytes: number;
};

export type InMemoryDocumentStoreOptions = {
  name?: string;
};

const serializeFields = (entries: Iterable<[string, unknown]>): DocumentFields =>
  Object.fromEntries(
    Array.from(entries, ([key, value]): [string, string] => [key, JSON.stringify(value)]),
  );

export class InMemoryDocumentStore implements DocumentStore {
  readonly name: string;
  readonly #collections = new Map<string, Map<string, InMemoryDocument>>();

  constructor(options: InMemoryDocumentStoreOptions = {}) {
    this.name = options.name ?? "in-memory";
  }

  #getDocument(collection: string, documentId: string): InMemoryDocument | undefined {
    return this.#collections.get(collection)?.get(documentId);
  }

  #getOrCreateDocument(collection: string, documentId: string): InMemoryDocument {
    let documents = this.#collections.get(collection);
    if (!documents) {
      documents = new Map();
      this.#collections.set(collection, documents);
    }

    let document = documents.get(documentId);
    if (!document) {
      document = { fields: new Map(), recordedSizeBytes: 0 };
      documents.set(documentId, document);
    }
    return document;
  }

  #setField(document: InMemoryDocument, key: string, serializedValue: string) {
    const value: unknown = JSON.parse(serializedValue);
    document.fields.set(key, value);
    const { estimatedSizeBytes } = measureDocument(Object.fromEntries(document.fields));
    document.recordedSizeBytes = Math.max(document.recordedSizeBytes, estimatedSizeBytes);
  }

  async documentExists(collection: string, documentId: string): Promise<boolean> {
    return this.#getDocument(collection, documentId) !== undefined;
  }

  async documentContainsKey(collection: string, documentId: string, key: string): Promise<boolean> {
    return this.#getDocument(collection, documentId)?.fields.has(key) ?? false;
  }

  async getDocumentSizeInfo(
    collection: string,
    documentId: string,
  ): Promise<DocumentSizeInfo | null> {
    const document = this.#getDocument(collection, documentId);
    if (!document) {
      return null;
    }
    return { estimatedSizeBytes: document.recordedSizeBytes, fieldCount: document.fields.size };
  }

  async addToDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<string | null> {
    // A payload that does not parse must not create the document.
    JSON.parse(serializedValue);
    this.#setField(this.#getOrCreateDocument(collection, documentId), key, serializedValue);
    return key;
  }

  async updateFieldInDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<boolean> {
    const document = this.#getDocument(collection, documentId);
    if (!document) {
      return false;
    }
    this.#setField(document, key, serializedValue);
    return true;
  }

  async removeKeyFromDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
  ): Promise<boolean> {
    const document = this.#getDocument(collection, documentId);
    if (!document) {
      return false;
    }
    document.fields.delete(key);
    return true;
  }

  async getField(collection: string, documentId: string, key: string): Promise<string | null> {
    const document = this.#getDocument(collection, documentId);
    if (!document || !document.fields.has(key)) {
      return null;
    }
    return JSON.stringify(document.fields.get(key));
  }

  async getFields(
    collection: string,
    documentId: string,
    keys: readonly string[],
  ): Promise<DocumentFields | null> {
    const document = this.#getDocument(collection, documentId);
    if (!document) {
      return null;
    }
    const { fields } = document;
    return serializeFields(
      keys.filter((key) => fields.has(key)).map((key): [string, unknown] => [key, fields.get(key)]),
    );
  }

  async getDocument(collection: string, documentId: string): Promise<DocumentFields | null> {
    const document = this.#getDocument(collection, documentId);
    if (!document) {
      return null;
    }
    return serializeFields(document.fields);
  }

  /**
   * Writes a whole document, replacing any previous content and its recorded size. Meant for
   * seeding tests and local fixtures.
   */
  seedDocument(collection: string, documentId: string, fields: Record<string, unknown>): void {
    const document = this.#getOrCreateDocument(collection, documentId);
    document.fields = new Map(Object.entries(fields));
    document.recordedSizeBytes = measureDocument(fields).estimatedSizeBytes;
  }

  listDocumentIds(collection: string): string[] {
    return Array.from(this.#collections.get(collection)?.keys() ?? []);
  }
}
