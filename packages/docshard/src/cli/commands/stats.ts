import { define } from "gunshi";
import { chainArgs, printJson, requireString, withFieldStore } from "../utils/options.js";

export const statsCommand = define({
  name: "stats",
  description: "Report shard count, field count and estimated size of a base id",
  args: chainArgs,
  run: async (ctx) => {
    const baseId = requireString(ctx, "base");

    const stats = await withFieldStore(ctx, (fieldStore) => fieldStore.collectStats(baseId));
    if (!stats) {
      throw new Error(`Could not collect stats for ${baseId}`);
    }
    printJson(stats);
  },
});
