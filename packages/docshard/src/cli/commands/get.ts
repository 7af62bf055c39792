import { define } from "gunshi";
import { chainArgs, printJson, requireString, withFieldStore } from "../utils/options.js";

export const getCommand = define({
  name: "get",
  description: "Read one entry",
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

    const result = await withFieldStore(ctx, (fieldStore) => fieldStore.readEntry(baseId, key));
    if (result.source === "none") {
      process.exitCode = 1;
    }
    printJson(result);
  },
});
