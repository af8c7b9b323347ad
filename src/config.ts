import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { GrammarConfigSchema, type GrammarConfig } from "./config/grammar-config.js";
import { ConfigError } from "./errors.js";

export const CONFIG_FILE_NAME = "code-facts.config.json";

export interface ParseConfig {
  /** Accept trees that contain ERROR or MISSING nodes instead of failing the file */
  tolerateErrors: boolean;
}

export interface Config {
  /** Maximum files processed concurrently */
  workers: number;
  /** Directory names never walked */
  ignore: string[];
  parse: ParseConfig;
  /** Custom grammars, keyed by language name */
  grammars: Record<string, GrammarConfig>;
}

export const DEFAULT_CONFIG: Config = {
  workers: 4,
  ignore: ["node_modules"],
  parse: {
    tolerateErrors: false,
  },
  grammars: {},
};

const ConfigFileSchema = z
  .object({
    workers: z.number().int().positive().optional(),
    ignore: z.array(z.string()).optional(),
    parse: z.object({ tolerateErrors: z.boolean().optional() }).strict().optional(),
    grammars: z.record(GrammarConfigSchema).optional(),
  })
  .strict();

/**
 * Load a config file, by default code-facts.config.json in `root`.
 * A missing default file yields the defaults; anything unreadable or
 * invalid is a ConfigError.
 */
export async function loadConfig(configPath?: string, root: string = process.cwd()): Promise<Config> {
  const path = configPath || resolve(root, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT" && !configPath) {
      // Config file not found, use defaults
      return DEFAULT_CONFIG;
    }
    throw new ConfigError(path, [error instanceof Error ? error.message : String(error)]);
  }

  return parseConfig(content, path);
}

/**
 * Validate config file contents and merge them over the defaults
 */
export function parseConfig(content: string, path: string): Config {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(path, [error instanceof Error ? error.message : String(error)]);
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      path,
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }

  const user = result.data;
  return {
    workers: user.workers ?? DEFAULT_CONFIG.workers,
    ignore: user.ignore ?? DEFAULT_CONFIG.ignore,
    parse: {
      tolerateErrors: user.parse?.tolerateErrors ?? DEFAULT_CONFIG.parse.tolerateErrors,
    },
    grammars: { ...DEFAULT_CONFIG.grammars, ...user.grammars },
  };
}
