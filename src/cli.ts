/**
 * Command-line surface: argument parsing and the run itself.
 * Exit codes: 0 documents written, 1 fatal error, 2 bad arguments.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { loadConfig } from "./config.js";
import { createGrammarRegistry, getGrammarRegistry } from "./treesitter/language-map.js";
import { ParserRegistry } from "./treesitter/parser-registry.js";
import { readFullDocument } from "./facts/serializer.js";
import { DirectorySource } from "./sources/directory-source.js";
import { GitRevisionSource } from "./sources/git-source.js";
import { SnapshotCache } from "./persistence/snapshot-cache.js";
import { runFactDump, type BaselineInput } from "./pipeline.js";
import { createLogger } from "./logger.js";

export interface CLIOptions {
  outFull: string;
  outDelta: string;
  baseSha: string;
  root: string;
  baselineDir: string;
  baselineSnapshot: string;
  revision: string;
  workers: number | null;
  config: string;
  cache: string;
  tolerateErrors: boolean;
  jsonl: boolean;
  verbosity: number;
}

export type ParsedArgs =
  | { kind: "run"; options: CLIOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const USAGE = `
Usage: code-facts --out-full <path> --out-delta <path> [--base-sha <rev>] [options]

Writes a full snapshot of code facts for the current tree and a delta
against the baseline revision.

Options:
  --out-full <path>           Full-facts document to write (required)
  --out-delta <path>          Delta document to write (required)
  --base-sha <rev>            Baseline revision (default: HEAD~1)
  --root <dir>                Repository root (default: .)
  --baseline-dir <dir>        Read the baseline from a directory instead of git
  --baseline-snapshot <file>  Use a previously written full-facts document as baseline
  --revision <label>          Label for the current tree (default: HEAD)
  --workers <n>               Files processed concurrently (default: from config, 4)
  --config <path>             Config file (default: <root>/code-facts.config.json)
  --cache <db>                SQLite cache of baseline snapshots
  --tolerate-errors           Extract from files with syntax errors instead of failing them
  --jsonl                     Write JSON Lines: a header line, then one line per fact or change
  -v, --verbose               More output; repeat for debug output
  -h, --help                  Show this help message

Examples:
  code-facts --out-full code_facts_full.json --out-delta code_facts_delta.json --base-sha main
  code-facts --out-full full.json --out-delta delta.json --baseline-dir ../checkout-main -vv
`;

const VALUE_FLAGS = new Set([
  "--out-full",
  "--out-delta",
  "--base-sha",
  "--root",
  "--baseline-dir",
  "--baseline-snapshot",
  "--revision",
  "--workers",
  "--config",
  "--cache",
]);

export function parseArgs(args: string[]): ParsedArgs {
  const options: CLIOptions = {
    outFull: "",
    outDelta: "",
    baseSha: "HEAD~1",
    root: ".",
    baselineDir: "",
    baselineSnapshot: "",
    revision: "HEAD",
    workers: null,
    config: "",
    cache: "",
    tolerateErrors: false,
    jsonl: false,
    verbosity: 0,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbosity++;
    } else if (/^-v+$/.test(arg)) {
      options.verbosity += arg.length - 1;
    } else if (arg === "--tolerate-errors") {
      options.tolerateErrors = true;
    } else if (arg === "--jsonl") {
      options.jsonl = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[++i];
      if (value === undefined || value.startsWith("-")) {
        return { kind: "error", message: `${arg} requires a value` };
      }

      if (arg === "--out-full") {
        options.outFull = value;
      } else if (arg === "--out-delta") {
        options.outDelta = value;
      } else if (arg === "--base-sha") {
        options.baseSha = value;
      } else if (arg === "--root") {
        options.root = value;
      } else if (arg === "--baseline-dir") {
        options.baselineDir = value;
      } else if (arg === "--baseline-snapshot") {
        options.baselineSnapshot = value;
      } else if (arg === "--revision") {
        options.revision = value;
      } else if (arg === "--config") {
        options.config = value;
      } else if (arg === "--cache") {
        options.cache = value;
      } else if (arg === "--workers") {
        const workers = Number(value);
        if (!Number.isInteger(workers) || workers < 1) {
          return { kind: "error", message: `--workers expects a positive integer, got '${value}'` };
        }
        options.workers = workers;
      }
    } else {
      return { kind: "error", message: `Unknown argument: ${arg}` };
    }
  }

  if (!options.outFull || !options.outDelta) {
    return { kind: "error", message: "Missing required arguments: --out-full and --out-delta" };
  }
  if (options.baselineDir && options.baselineSnapshot) {
    return { kind: "error", message: "--baseline-dir and --baseline-snapshot are exclusive" };
  }

  return { kind: "run", options };
}

/**
 * Run the command and return the process exit code
 */
export async function runCli(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  if (parsed.kind === "help") {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}`);
    console.error("Use --help for more information.");
    return 2;
  }

  const { options } = parsed;
  const logger = createLogger(options.verbosity);
  let cache: SnapshotCache | null = null;

  try {
    const root = resolve(options.root);
    const config = await loadConfig(options.config || undefined, root);

    const registry =
      Object.keys(config.grammars).length > 0
        ? createGrammarRegistry(config.grammars)
        : getGrammarRegistry();
    const parsers = new ParserRegistry({
      tolerateErrors: options.tolerateErrors || config.parse.tolerateErrors,
    });
    const walk = { ignore: config.ignore };

    let baseline: BaselineInput;
    if (options.baselineSnapshot) {
      const path = resolve(options.baselineSnapshot);
      baseline = { kind: "snapshot", snapshot: readFullDocument(await readFile(path, "utf-8"), path) };
    } else if (options.baselineDir) {
      baseline = {
        kind: "source",
        source: new DirectorySource(resolve(options.baselineDir), options.baseSha, walk),
      };
    } else {
      baseline = { kind: "source", source: new GitRevisionSource(root, options.baseSha, walk) };
    }

    if (options.cache) {
      cache = new SnapshotCache(resolve(options.cache), registry.fingerprint());
    }

    logger.info(`[config] root=${root} baseline=${options.baseSha} workers=${options.workers ?? config.workers}`);

    await runFactDump({
      current: new DirectorySource(root, options.revision, walk),
      baseline,
      outFull: resolve(options.outFull),
      outDelta: resolve(options.outDelta),
      registry,
      parsers,
      workers: options.workers ?? config.workers,
      format: options.jsonl ? "jsonl" : "json",
      cache: cache ?? undefined,
      logger,
    });
    return 0;
  } catch (err) {
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  } finally {
    cache?.close();
  }
}
