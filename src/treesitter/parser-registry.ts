/**
 * ParserRegistry - Manages Tree-sitter parsers
 *
 * Handles lazy-loading of language grammars and turns source bytes into
 * syntax trees. Uses native Node.js tree-sitter bindings. Parsing never
 * throws for bad input: every problem comes back as a failed ParseOutcome.
 */

import { createRequire } from "node:module";
import Parser from "tree-sitter";
import type { LanguageHandle, ParseOutcome, SyntaxNode } from "./types.js";
import { isPackageAvailable } from "./language-map.js";

const require = createRequire(import.meta.url);

type Grammar = NonNullable<Parameters<Parser["setLanguage"]>[0]>;

// Default tree-sitter input buffer; larger sources need an explicit size
const MIN_BUFFER_SIZE = 32 * 1024;

function isGrammar(value: unknown): value is Grammar {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

export interface ParserRegistryOptions {
  /** Accept trees containing ERROR or MISSING nodes instead of reporting a failure */
  tolerateErrors?: boolean;
}

/**
 * ParserRegistry manages Tree-sitter parsers
 */
export class ParserRegistry {
  private parser: Parser | null = null;
  private languages: Map<string, Grammar> = new Map();
  private readonly tolerateErrors: boolean;

  constructor(options: ParserRegistryOptions = {}) {
    this.tolerateErrors = options.tolerateErrors ?? false;
  }

  /**
   * Check if a language's grammar package is installed
   */
  isLanguageAvailable(handle: LanguageHandle): boolean {
    return isPackageAvailable(handle.profile.package);
  }

  /**
   * Load a language grammar (lazy-loaded on first use)
   */
  private loadLanguage(handle: LanguageHandle): Grammar {
    // Return cached language if available
    const cached = this.languages.get(handle.language);
    if (cached) return cached;

    const { profile } = handle;

    // Load the grammar module
    let grammarModule: unknown;
    try {
      grammarModule = require(profile.package);
    } catch {
      throw new Error(
        `Grammar package '${profile.package}' not installed. ` +
          `Run: npm install ${profile.package}`
      );
    }

    // Extract the grammar (some modules export multiple languages)
    let lang: unknown = grammarModule;
    if (profile.moduleExport) {
      lang =
        typeof grammarModule === "object" && grammarModule !== null
          ? Reflect.get(grammarModule, profile.moduleExport)
          : undefined;
      if (!lang) {
        throw new Error(`Module '${profile.package}' does not export '${profile.moduleExport}'`);
      }
    }

    if (!isGrammar(lang)) {
      throw new Error(`Module '${profile.package}' is not a tree-sitter grammar`);
    }

    // Cache the language
    this.languages.set(handle.language, lang);
    return lang;
  }

  /**
   * Parse source bytes into a syntax tree.
   *
   * Identical input always yields a structurally identical tree, so a
   * failure here is final for the run.
   */
  parse(handle: LanguageHandle, source: Uint8Array | string): ParseOutcome {
    let grammar: Grammar;
    try {
      grammar = this.loadLanguage(handle);
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    const text = typeof source === "string" ? source : Buffer.from(source).toString("utf8");

    let rootNode: SyntaxNode;
    try {
      const parser = this.getParser();
      parser.setLanguage(grammar);
      const tree = parser.parse(text, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, Buffer.byteLength(text, "utf8") + 1),
      });
      rootNode = tree.rootNode;
    } catch (error) {
      return {
        ok: false,
        reason: `Parser failed: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (!this.tolerateErrors) {
      const errorNode = findErrorNode(rootNode);
      if (errorNode) {
        return {
          ok: false,
          reason: "Syntax error",
          location: {
            line: errorNode.startPosition.row + 1,
            column: errorNode.startPosition.column,
          },
        };
      }
    }

    return { ok: true, tree: { rootNode } };
  }

  /**
   * Check if a language is loaded
   */
  isLanguageLoaded(language: string): boolean {
    return this.languages.has(language);
  }

  /**
   * Get list of currently loaded languages
   */
  getLoadedLanguages(): string[] {
    return [...this.languages.keys()];
  }

  /**
   * Dispose of all resources
   */
  dispose(): void {
    this.parser = null;
    this.languages.clear();
  }

  private getParser(): Parser {
    if (!this.parser) {
      this.parser = new Parser();
    }
    return this.parser;
  }
}

/**
 * First ERROR or MISSING node in pre-order, if any. Subtrees without
 * errors are not entered.
 */
export function findErrorNode(root: SyntaxNode): SyntaxNode | null {
  if (!root.hasError) return null;
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === "ERROR" || node.isMissing) return node;
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      if (children[i].hasError) stack.push(children[i]);
    }
  }
  return null;
}
