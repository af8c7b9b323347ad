/**
 * Tree-sitter integration for code-facts
 *
 * Language resolution, parsing and rule-driven fact extraction.
 * Supports built-in grammars and custom grammars via code-facts.config.json
 */

export * from "./types.js";
export {
  GrammarRegistry,
  createGrammarRegistry,
  getGrammarRegistry,
  getLanguageForExtension,
  isPackageAvailable,
  shebangInterpreter,
} from "./language-map.js";
export { BUILTIN_GRAMMARS, type BuiltinGrammar } from "./builtin-grammars.js";
export { ParserRegistry, findErrorNode, type ParserRegistryOptions } from "./parser-registry.js";
export { FactExtractor, cleanName, moduleName } from "./fact-extractor.js";
