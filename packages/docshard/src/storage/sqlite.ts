import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

// A document exists while its row here does, with or without fields.
export interface DocshardDocumentsTable {
  collection: string;
  document_id: string;
  recorded_size_bytes: number;
}

export interface DocshardFieldsTable {
  collection: string;
  document_id: string;
  field_key: string;
  field_value: string;
}

export interface DocshardCacheSlotsTable {
  slot_name: string;
  slot_value: string;
  updated_at: string;
}

export interface DocshardDatabase {
  docshard_documents: DocshardDocumentsTable;
  docshard_fields: DocshardFieldsTable;
  docshard_cache_slots: DocshardCacheSlotsTable;
}

/**
 * Opens a SQLite database (a file path, or ":memory:") through better-sqlite3.
 */
export const openSqliteDatabase = (filename: string): Kysely<DocshardDatabase> => {
  const dialect = new SqliteDialect({
    database: new SQLite(filename),
  });
  return new Kysely<DocshardDatabase>({ dialect });
};

export const migrateDocshardTables = async (db: Kysely<DocshardDatabase>): Promise<void> => {
  await db.schema
    .createTable("docshard_documents")
    .ifNotExists()
    .addColumn("collection", "text", (col) => col.notNull())
    .addColumn("document_id", "text", (col) => col.notNull())
    .addColumn("recorded_size_bytes", "integer", (col) => col.notNull().defaultTo(0))
    .addPrimaryKeyConstraint("docshard_documents_pk", ["collection", "document_id"])
    .execute();

  await db.schema
    .createTable("docshard_fields")
    .ifNotExists()
    .addColumn("collection", "text", (col) => col.notNull())
    .addColumn("document_id", "text", (col) => col.notNull())
    .addColumn("field_key", "text", (col) => col.notNull())
    .addColumn("field_value", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("docshard_fields_pk", ["collection", "document_id", "field_key"])
    .execute();

  await db.schema
    .createTable("docshard_cache_slots")
    .ifNotExists()
    .addColumn("slot_name", "text", (col) => col.primaryKey())
    .addColumn("slot_value", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();
};
