/**
 * Language mapping for Tree-sitter
 *
 * Resolves files to language profiles, combining:
 * 1. Built-in grammars shipped with code-facts
 * 2. Custom grammars from code-facts.config.json
 *
 * A registry is immutable once built. The default one (built-ins only)
 * is created on first use and shared by the whole process.
 */

import { createRequire } from "node:module";
import { posix } from "node:path";
import type { LanguageHandle, LanguageProfile, LanguageResolution } from "./types.js";
import { BUILTIN_GRAMMARS, type BuiltinGrammar } from "./builtin-grammars.js";
import { grammarToProfile, type GrammarConfig } from "../config/grammar-config.js";
import { shortHash } from "../utils/hash.js";

// Use createRequire for checking if packages are installed
const require = createRequire(import.meta.url);

/**
 * Convert a BuiltinGrammar to LanguageProfile
 */
function builtinToProfile(language: string, builtin: BuiltinGrammar): LanguageProfile {
  return {
    language,
    package: builtin.package,
    moduleExport: builtin.moduleExport,
    extensions: builtin.extensions,
    interpreters: builtin.interpreters,
    rules: builtin.rules,
    branches: builtin.branches,
  };
}

/**
 * Read the interpreter name out of a shebang line.
 * `#!/usr/bin/env -S python3 -u` -> "python3"
 */
export function shebangInterpreter(head: string): string | null {
  const firstLine = head.split("\n", 1)[0].trim();
  if (!firstLine.startsWith("#!")) return null;

  const tokens = firstLine.slice(2).trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;

  let program = posix.basename(tokens[0]);
  if (program === "env") {
    const next = tokens.slice(1).find((token) => !token.startsWith("-"));
    if (!next) return null;
    program = posix.basename(next);
  }
  return program;
}

/**
 * GrammarRegistry maps files to language profiles
 */
export class GrammarRegistry {
  private readonly profiles: ReadonlyMap<string, LanguageProfile>;
  private readonly extensions: ReadonlyMap<string, string>;
  private readonly interpreters: ReadonlyMap<string, string>;

  constructor(profiles: Iterable<LanguageProfile>) {
    const byLanguage = new Map<string, LanguageProfile>();
    const byExtension = new Map<string, string>();
    const byInterpreter = new Map<string, string>();

    for (const profile of profiles) {
      byLanguage.set(profile.language, profile);
      for (const ext of profile.extensions) {
        byExtension.set(ext.toLowerCase(), profile.language);
      }
      for (const interpreter of profile.interpreters ?? []) {
        byInterpreter.set(interpreter, profile.language);
      }
    }

    this.profiles = byLanguage;
    this.extensions = byExtension;
    this.interpreters = byInterpreter;
    Object.freeze(this);
  }

  /**
   * Select a language for a file by extension, or by shebang when the
   * file has no extension and its first line is supplied.
   */
  resolve(filePath: string, head?: string): LanguageResolution {
    const ext = posix.extname(filePath);
    let language: string | null;

    if (ext) {
      language = this.getLanguageForExtension(ext);
      if (!language) return { supported: false, reason: "unknown-extension" };
    } else {
      const interpreter = head === undefined ? null : shebangInterpreter(head);
      if (!interpreter) return { supported: false, reason: "unknown-extension" };
      language = this.getLanguageForInterpreter(interpreter);
      if (!language) return { supported: false, reason: "unknown-interpreter" };
    }

    return { supported: true, handle: this.handleFor(language) };
  }

  /**
   * Get the language for a file extension
   * @param ext File extension (including dot, e.g., ".ts")
   */
  getLanguageForExtension(ext: string): string | null {
    return this.extensions.get(ext.toLowerCase()) ?? null;
  }

  /**
   * Get the language for a shebang interpreter. Version suffixes are
   * ignored when the exact name is unknown ("python3.11" -> "python").
   */
  getLanguageForInterpreter(interpreter: string): string | null {
    return (
      this.interpreters.get(interpreter) ??
      this.interpreters.get(interpreter.replace(/[\d.]+$/, "")) ??
      null
    );
  }

  getProfile(language: string): LanguageProfile | null {
    return this.profiles.get(language) ?? null;
  }

  getSupportedLanguages(): string[] {
    return [...this.profiles.keys()];
  }

  getSupportedExtensions(): string[] {
    return [...this.extensions.keys()];
  }

  /**
   * Stable digest of every profile. Snapshots extracted under different
   * tables are not comparable.
   */
  fingerprint(): string {
    const ordered = [...this.profiles.values()].sort((a, b) =>
      a.language < b.language ? -1 : a.language > b.language ? 1 : 0
    );
    return shortHash(
      JSON.stringify(ordered, (_key, value: unknown) =>
        value instanceof RegExp ? value.toString() : value
      )
    );
  }

  private handleFor(language: string): LanguageHandle {
    const profile = this.profiles.get(language);
    if (!profile) {
      throw new Error(`Unknown language: ${language}`);
    }
    return { language, profile };
  }
}

/**
 * Build a registry from the built-ins plus custom grammars.
 * Custom configs override built-in ones with the same name.
 */
export function createGrammarRegistry(custom: Record<string, GrammarConfig> = {}): GrammarRegistry {
  const profiles = new Map<string, LanguageProfile>();

  for (const [lang, builtin] of Object.entries(BUILTIN_GRAMMARS)) {
    profiles.set(lang, builtinToProfile(lang, builtin));
  }
  for (const [lang, grammar] of Object.entries(custom)) {
    profiles.set(lang, grammarToProfile(lang, grammar));
  }

  return new GrammarRegistry(profiles.values());
}

let defaultRegistry: GrammarRegistry | null = null;

/**
 * The built-in registry, created once on first use
 */
export function getGrammarRegistry(): GrammarRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createGrammarRegistry();
  }
  return defaultRegistry;
}

/**
 * Get the language for a file extension in the built-in registry
 */
export function getLanguageForExtension(ext: string): string | null {
  return getGrammarRegistry().getLanguageForExtension(ext);
}

/**
 * Check if a grammar package can be loaded
 */
export function isPackageAvailable(packageName: string): boolean {
  try {
    require.resolve(packageName);
    return true;
  } catch {
    return false;
  }
}
