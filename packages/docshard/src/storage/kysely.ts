import { sql, type Kysely } from "kysely";
import { measureDocument } from "./document-size.js";
import type { DocshardDatabase } from "./sqlite.js";
import type { DocumentFields, DocumentSizeInfo, DocumentStore } from "./types.js";

export type KyselyDocumentStoreOptions = {
  db: Kysely<DocshardDatabase>;
  name?: string;
};

const toFields = (rows: { field_key: string; field_value: string }[]): DocumentFields =>
  Object.fromEntries(rows.map((row): [string, string] => [row.field_key, row.field_value]));

/**
 * Document store over two tables: `docshard_documents` records each document and the largest
 * size it reached, `docshard_fields` holds one row per field. Run `migrateDocshardTables` before
 * use.
 */
export class KyselyDocumentStore implements DocumentStore {
  readonly name: string;
  readonly #db: Kysely<DocshardDatabase>;

  constructor(options: KyselyDocumentStoreOptions) {
    this.#db = options.db;
    this.name = options.name ?? "kysely";
  }

  #fields(collection: string, documentId: string, db: Kysely<DocshardDatabase> = this.#db) {
    return db
      .selectFrom("docshard_fields")
      .where("collection", "=", collection)
      .where("document_id", "=", documentId);
  }

  async #writeField(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<void> {
    // Round-trip through JSON.parse so invalid payloads are rejected like a remote store would.
    const fieldValue = JSON.stringify(JSON.parse(serializedValue));

    await this.#db.transaction().execute(async (trx) => {
      await trx
        .insertInto("docshard_documents")
        .values({ collection, document_id: documentId, recorded_size_bytes: 0 })
        .onConflict((oc) => oc.columns(["collection", "document_id"]).doNothing())
        .execute();

      await trx
        .insertInto("docshard_fields")
        .values({
          collection,
          document_id: documentId,
          field_key: key,
          field_value: fieldValue,
        })
        .onConflict((oc) =>
          oc.columns(["collection", "document_id", "field_key"]).doUpdateSet({
            field_value: fieldValue,
          }),
        )
        .execute();

      const rows = await this.#fields(collection, documentId, trx)
        .select(["field_key", "field_value"])
        .execute();
      const { estimatedSizeBytes } = measureDocument(
        Object.fromEntries(
          rows.map((row): [string, unknown] => [row.field_key, JSON.parse(row.field_value)]),
        ),
      );

      await trx
        .updateTable("docshard_documents")
        .set({
          recorded_size_bytes: sql<number>`max(recorded_size_bytes, ${estimatedSizeBytes})`,
        })
        .where("collection", "=", collection)
        .where("document_id", "=", documentId)
        .execute();
    });
  }

  async documentExists(collection: string, documentId: string): Promise<boolean> {
    const row = await this.#db
      .selectFrom("docshard_documents")
      .where("collection", "=", collection)
      .where("document_id", "=", documentId)
      .select("document_id")
      .executeTakeFirst();
    return row !== undefined;
  }

  async documentContainsKey(collection: string, documentId: string, key: string): Promise<boolean> {
    const row = await this.#fields(collection, documentId)
      .where("field_key", "=", key)
      .select("field_key")
      .executeTakeFirst();
    return row !== undefined;
  }

  async getDocumentSizeInfo(
    collection: string,
    documentId: string,
  ): Promise<DocumentSizeInfo | null> {
    const document = await this.#db
      .selectFrom("docshard_documents")
      .where("collection", "=", collection)
      .where("document_id", "=", documentId)
      .select("recorded_size_bytes")
      .executeTakeFirst();
    if (!document) {
      return null;
    }

    const { count } = await this.#fields(collection, documentId)
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .executeTakeFirstOrThrow();
    return { estimatedSizeBytes: document.recorded_size_bytes, fieldCount: Number(count) };
  }

  async addToDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<string | null> {
    await this.#writeField(collection, documentId, key, serializedValue);
    return key;
  }

  async updateFieldInDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
    serializedValue: string,
  ): Promise<boolean> {
    if (!(await this.documentExists(collection, documentId))) {
      return false;
    }
    await this.#writeField(collection, documentId, key, serializedValue);
    return true;
  }

  async removeKeyFromDistributedDocument(
    collection: string,
    documentId: string,
    key: string,
  ): Promise<boolean> {
    if (!(await this.documentExists(collection, documentId))) {
      return false;
    }
    await this.#db
      .deleteFrom("docshard_fields")
      .where("collection", "=", collection)
      .where("document_id", "=", documentId)
      .where("field_key", "=", key)
      .execute();
    return true;
  }

  async getField(collection: string, documentId: string, key: string): Promise<string | null> {
    const row = await this.#fields(collection, documentId)
      .where("field_key", "=", key)
      .select("field_value")
      .executeTakeFirst();
    return row?.field_value ?? null;
  }

  async getFields(
    collection: string,
    documentId: string,
    keys: readonly string[],
  ): Promise<DocumentFields | null> {
    if (!(await this.documentExists(collection, documentId))) {
      return null;
    }
    if (keys.length === 0) {
      return {};
    }

    const rows = await this.#fields(collection, documentId)
      .where("field_key", "in", [...keys])
      .select(["field_key", "field_value"])
      .orderBy("field_key")
      .execute();
    return toFields(rows);
  }

  async getDocument(collection: string, documentId: string): Promise<DocumentFields | null> {
    if (!(await this.documentExists(collection, documentId))) {
      return null;
    }

    const rows = await this.#fields(collection, documentId)
      .select(["field_key", "field_value"])
      .orderBy("field_key")
      .execute();
    return toFields(rows);
  }
}
