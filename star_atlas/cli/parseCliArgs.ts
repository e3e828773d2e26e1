export type CliArgs = {
  distance: string | null;
  unit: string;
  catalogFile: string | null;
  outputDir: string | null;
  help: boolean;
};

export const USAGE = [
  "Usage: tsx run-nearby-stars.ts [--distance <n>] [--unit <unit>] [--catalog-file <path>] [--out <dir>]",
  "",
  "  --distance      maximum distance; prompted for when omitted",
  "  --unit          length unit of --distance (default: ly)",
  "  --catalog-file  read rows from a local JSON file instead of the Gaia archive",
  "  --out           output directory for the chart (local sink only)",
].join("\n");

const VALUE_FLAGS = ["--distance", "--unit", "--catalog-file", "--out"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];
const VALUE_FLAG_SET: ReadonlySet<string> = new Set(VALUE_FLAGS);

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAG_SET.has(arg);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = {
    distance: null,
    unit: "ly",
    catalogFile: null,
    outputDir: null,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }
    if (!isValueFlag(arg)) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new Error(`${arg} requires a value`);
    }
    i++;

    switch (arg) {
      case "--distance":
        parsed.distance = value;
        break;
      case "--unit":
        parsed.unit = value;
        break;
      case "--catalog-file":
        parsed.catalogFile = value;
        break;
      case "--out":
        parsed.outputDir = value;
        break;
    }
  }

  return parsed;
}
