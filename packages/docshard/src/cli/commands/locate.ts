import { define } from "gunshi";
import { chainArgs, printJson, requireString, withFieldStore } from "../utils/options.js";

export const locateCommand = define({
  name: "locate",
  description: "Find the shard document holding a key",
  args: {
    ...chainArgs,
    key: {
      type: "string",
      short: "k",
      description: "Entry key",
    },
  },
  run: async (ctx) => {
    const baseId = requireString(ctx, "base");
    const key = requireString(ctx, "key");

    const result = await withFieldStore(ctx, (fieldStore) => fieldStore.locateEntry(baseId, key));
    printJson(result);
  },
});
