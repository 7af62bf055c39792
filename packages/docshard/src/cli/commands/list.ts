import { define } from "gunshi";
import { chainArgs, printJson, requireString, withFieldStore } from "../utils/options.js";

export const listCommand = define({
  name: "list",
  description: "List every entry of a base id, shard by shard",
  args: chainArgs,
  run: async (ctx) => {
    const baseId = requireString(ctx, "base");

    const entries = await withFieldStore(ctx, (fieldStore) => fieldStore.readAllEntries(baseId));
    printJson(entries);
  },
});
