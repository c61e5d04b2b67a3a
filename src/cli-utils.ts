import { DEFAULT_DATA_DIR } from "./server/config.js";

export const INGEST_COMMAND = "conn-ledger-ingest";

export interface ParsedIngestArgs {
  showHelp: boolean;
  verbose: boolean;
  dataDir: string;
  /** Log file to read; undefined means stdin. */
  file?: string;
  error?: string;
}

const VALUE_FLAGS = ["--data-dir", "--file"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(value: string): value is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(value);
}

export function parseIngestArgs(
  args: string[],
  env: Record<string, string | undefined> = process.env,
): ParsedIngestArgs {
  let showHelp = false;
  let verbose = false;
  let dataDir = env.DATA_DIR?.trim() || DEFAULT_DATA_DIR;
  let file: string | undefined;

  const fail = (error: string): ParsedIngestArgs => ({
    showHelp,
    verbose,
    dataDir,
    file,
    error,
  });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      verbose = true;
      continue;
    }

    let flag: string = arg;
    let value: string | undefined;
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq !== -1) {
      flag = arg.slice(0, eq);
      value = arg.slice(eq + 1);
    }

    if (isValueFlag(flag)) {
      if (value === undefined) {
        if (i + 1 >= args.length) {
          return fail(`Error: Missing value for ${flag}`);
        }
        value = args[i + 1];
        i++;
      }
      if (!value) {
        return fail(`Error: Empty value for ${flag}`);
      }
      if (flag === "--data-dir") dataDir = value;
      else file = value;
      continue;
    }

    return fail(
      `Error: Unknown option '${arg}'. Run '${INGEST_COMMAND} --help' for usage.`,
    );
  }

  return { showHelp, verbose, dataDir, file };
}

export function formatIngestHelpText(): string {
  return [
    `${INGEST_COMMAND}: record connections from a tunnel daemon's log`,
    "",
    "Usage:",
    `  ${INGEST_COMMAND} [--data-dir <dir>] [--file <path>] [--verbose]`,
    `  <daemon> 2>&1 | ${INGEST_COMMAND}`,
    "",
    "Options:",
    `  --data-dir <dir>  Directory holding connections.db and connections.log (default: $DATA_DIR or ${DEFAULT_DATA_DIR})`,
    "  --file <path>     Read this log file instead of stdin",
    "  --verbose, -v     Print every skipped line and why",
    "  --help, -h        Show this help",
  ].join("\n");
}
