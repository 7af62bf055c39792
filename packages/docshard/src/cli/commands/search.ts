import { define } from "gunshi";
import {
  chainArgs,
  parseSearchValue,
  printJson,
  requireString,
  withFieldStore,
} from "../utils/options.js";

export const searchCommand = define({
  name: "search",
  description: "Find entries whose value has a field equal to a given value",
  args: {
    ...chainArgs,
    field: {
      type: "string",
      short: "f",
      description: "Field of the entry value to compare",
    },
    value: {
      type: "string",
      description: "Expected value, parsed as JSON when possible",
    },
  },
  run: async (ctx) => {
    const baseId = requireString(ctx, "base");
    const field = requireString(ctx, "field");
    const expected = parseSearchValue(requireString(ctx, "value"));

    const entries = await withFieldStore(ctx, (fieldStore) =>
      fieldStore.searchEntries(baseId, field, expected),
    );
    printJson(entries);
  },
});
