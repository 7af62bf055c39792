import { define } from "gunshi";
import { detectNamingScheme } from "../../detect.js";
import {
  baseArgs,
  openDocumentStore,
  printJson,
  requireString,
  resolveCollection,
} from "../utils/options.js";

export const detectCommand = define({
  name: "detect",
  description: "Detect which shard naming scheme a base id was written with",
  args: baseArgs,
  run: async (ctx) => {
    const collection = resolveCollection(ctx);
    const baseId = requireString(ctx, "base");
    const { db, store } = await openDocumentStore(ctx);

    try {
      printJson(await detectNamingScheme(store, collection, baseId));
    } finally {
      await db.destroy();
    }
  },
});
