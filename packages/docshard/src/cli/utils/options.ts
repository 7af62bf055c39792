import { z } from "zod";
import { DistributedFieldStore } from "../../field-store.js";
import type { Logger } from "../../logging.js";
import { isShardNamingScheme, type ShardNamingScheme } from "../../naming.js";
import { KyselyDocumentStore } from "../../storage/kysely.js";
import { migrateDocshardTables, openSqliteDatabase } from "../../storage/sqlite.js";

type CommandContext = { values: Record<string, unknown> };
type Env = Record<string, string | undefined>;

export const baseArgs = {
  db: {
    type: "string",
    short: "d",
    description: "SQLite database file holding the shard documents (env: DOCSHARD_DB)",
  },
  collection: {
    type: "string",
    short: "c",
    description: "Collection the shard documents live in (env: DOCSHARD_COLLECTION)",
  },
  base: {
    type: "string",
    short: "b",
    description: "Base id of the sharded record set",
  },
} as const;

export const chainArgs = {
  ...baseArgs,
  naming: {
    type: "string",
    short: "n",
    description: "Shard naming scheme: suffixed or indexed (env: DOCSHARD_NAMING)",
  },
  "max-shards": {
    type: "number",
    description: "Maximum number of shards to check (env: DOCSHARD_MAX_SHARDS, default: 100)",
  },
} as const;

// Diagnostics go to stderr so that stdout only carries the JSON result.
export const stderrLogger: Logger = {
  log: (...data) => console.error(...data),
  info: (...data) => console.error(...data),
  warn: (...data) => console.error(...data),
  error: (...data) => console.error(...data),
  debug: () => {},
};

const parseNumberEnv = (value: string | undefined) => {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    return undefined;
  }
  return parsed;
};

export const readString = (ctx: CommandContext, name: string): string | undefined => {
  const value = ctx.values[name];
  return typeof value === "string" && value.length > 0 ? value : undefined;
};

const readNumber = (ctx: CommandContext, name: string): number | undefined => {
  const value = ctx.values[name];
  return typeof value === "number" ? value : undefined;
};

export const requireString = (ctx: CommandContext, name: string): string => {
  const value = readString(ctx, name);
  if (!value) {
    throw new Error(`Missing --${name}.`);
  }
  return value;
};

export const resolveDatabasePath = (ctx: CommandContext, env: Env = process.env) => {
  const db = readString(ctx, "db") ?? env["DOCSHARD_DB"];
  if (!db) {
    throw new Error("Missing database. Provide --db or set DOCSHARD_DB.");
  }
  return db;
};

export const resolveCollection = (ctx: CommandContext, env: Env = process.env) => {
  const collection = readString(ctx, "collection") ?? env["DOCSHARD_COLLECTION"];
  if (!collection) {
    throw new Error("Missing collection. Provide --collection or set DOCSHARD_COLLECTION.");
  }
  return collection;
};

export const resolveNaming = (ctx: CommandContext, env: Env = process.env): ShardNamingScheme => {
  const naming = readString(ctx, "naming") ?? env["DOCSHARD_NAMING"];
  if (!naming) {
    throw new Error(
      "Missing naming scheme. Provide --naming or set DOCSHARD_NAMING (run 'docshard detect' to find it).",
    );
  }
  if (!isShardNamingScheme(naming)) {
    throw new Error(`Unknown naming scheme: ${naming}. Expected suffixed or indexed.`);
  }
  return naming;
};

export const resolveMaxShards = (ctx: CommandContext, env: Env = process.env) =>
  readNumber(ctx, "max-shards") ?? parseNumberEnv(env["DOCSHARD_MAX_SHARDS"]);

const searchValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Parses a CLI value as JSON when it is valid JSON, and keeps it as a plain string otherwise, so
 * `--value 3` matches the number 3 and `--value abc` the string "abc".
 */
export const parseSearchValue = (raw: string) => {
  try {
    const result = searchValueSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : raw;
  } catch {
    return raw;
  }
};

export const openDocumentStore = async (ctx: CommandContext) => {
  const db = openSqliteDatabase(resolveDatabasePath(ctx));
  await migrateDocshardTables(db);
  return { db, store: new KyselyDocumentStore({ db }) };
};

/**
 * Opens the database, runs `action` against a field store for the requested collection and
 * closes the database again.
 */
export const withFieldStore = async <R>(
  ctx: CommandContext,
  action: (fieldStore: DistributedFieldStore<unknown>) => Promise<R>,
): Promise<R> => {
  const collection = resolveCollection(ctx);
  const naming = resolveNaming(ctx);
  const maxShards = resolveMaxShards(ctx);
  const { db, store } = await openDocumentStore(ctx);

  try {
    const fieldStore = new DistributedFieldStore({
      store,
      collection,
      naming,
      maxShards,
      schema: z.unknown(),
      logger: stderrLogger,
    });
    return await action(fieldStore);
  } finally {
    await db.destroy();
  }
};

export const printJson = (value: unknown) => {
  console.log(JSON.stringify(value, null, 2));
};
