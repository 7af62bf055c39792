import { cli } from "gunshi";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { detectCommand } from "./commands/detect.js";
import { getCommand } from "./commands/get.js";
import { listCommand } from "./commands/list.js";
import { locateCommand } from "./commands/locate.js";
import { searchCommand } from "./commands/search.js";
import { statsCommand } from "./commands/stats.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonSchema = z.object({ version: z.string() });
const { version } = packageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, "../../package.json"), "utf-8")),
);

const printMainHelp = () => {
  console.log("Inspect sharded documents in a docshard SQLite database");
  console.log("");
  console.log("USAGE:");
  console.log("  docshard <COMMAND>");
  console.log("");
  console.log("COMMANDS:");
  console.log("  detect              Detect the naming scheme of a base id");
  console.log("  locate              Find the shard holding a key");
  console.log("  get                 Read one entry");
  console.log("  list                List every entry of a base id");
  console.log("  search              Find entries by field value");
  console.log("  stats               Report shard sizes and fill ratios");
  console.log("");
  console.log("GLOBAL OPTIONS:");
  console.log("  -d, --db             SQLite database file");
  console.log("  -c, --collection     Collection name");
  console.log("  -b, --base           Base id of the sharded record set");
  console.log("  -n, --naming         suffixed or indexed");
  console.log("  --max-shards         Maximum number of shards to check (default: 100)");
  console.log("");
  console.log("ENVIRONMENT:");
  console.log("  DOCSHARD_DB          Default database file");
  console.log("  DOCSHARD_COLLECTION  Default collection");
  console.log("  DOCSHARD_NAMING      Default naming scheme");
  console.log("  DOCSHARD_MAX_SHARDS  Default shard ceiling");
  console.log("");
  console.log("EXAMPLES:");
  console.log("  docshard detect -d ./school.db -c attendance -b ATTEND_CS101");
  console.log("  docshard locate -d ./school.db -c levels -b MAT/2020/001 -n indexed -k TERM_1");
  console.log(
    "  docshard search -d ./school.db -c attendance -b ATTEND_CS101 -n suffixed -f status --value absent",
  );
  console.log("  docshard stats -d ./school.db -c attendance -b ATTEND_CS101 -n suffixed");
};

const runCommand = async (name: string, args: string[]): Promise<boolean> => {
  const options = { name: `docshard ${name}`, version };

  switch (name) {
    case "detect":
      await cli(args, detectCommand, options);
      return true;
    case "locate":
      await cli(args, locateCommand, options);
      return true;
    case "get":
      await cli(args, getCommand, options);
      return true;
    case "list":
      await cli(args, listCommand, options);
      return true;
    case "search":
      await cli(args, searchCommand, options);
      return true;
    case "stats":
      await cli(args, statsCommand, options);
      return true;
    default:
      return false;
  }
};

export async function run(argv: string[] = process.argv.slice(2)) {
  try {
    const [commandName, ...rest] = argv;

    if (!commandName || commandName === "--help" || commandName === "-h") {
      printMainHelp();
      return;
    }

    if (commandName === "--version" || commandName === "-v") {
      console.log(version);
      return;
    }

    if (!(await runCommand(commandName, rest))) {
      console.error(`Unknown command: ${commandName}`);
      console.log("");
      console.log("Run 'docshard --help' for available commands.");
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

export { detectCommand, getCommand, listCommand, locateCommand, searchCommand, statsCommand };
