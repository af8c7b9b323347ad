/**
 * Type definitions for Tree-sitter fact extraction
 */

/**
 * Kinds of facts that can be extracted from code.
 * The first five are common to every language; the rest are
 * extensions that individual language profiles opt into.
 */
export const FACT_KINDS = [
  "definition",
  "reference",
  "import",
  "export",
  "annotation",
  "decorator",
  "test_case",
  "docstring",
] as const;

export type FactKind = (typeof FACT_KINDS)[number];

export function isFactKind(value: string): value is FactKind {
  return FACT_KINDS.some((kind) => kind === value);
}

/**
 * Position in source text. Line is 1-indexed, column 0-indexed.
 */
export interface Span {
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

/**
 * A fact as produced by the extractor, before identity stamping
 */
export interface ExtractedFact {
  kind: FactKind;
  /** Enclosing scope names, outermost first, ending with the fact's own name */
  qualifiedName: readonly string[];
  filePath: string;
  language: string;
  span: Span;
  /** Normalized token stream the signature hash is computed over */
  canonicalText: string;
  /** Cyclomatic complexity, definitions only */
  complexity?: number;
}

/**
 * A fully resolved fact. Immutable once stamped.
 */
export interface Fact {
  readonly identity: string;
  readonly kind: FactKind;
  readonly qualifiedName: readonly string[];
  readonly filePath: string;
  readonly language: string;
  readonly span: Readonly<Span>;
  readonly signatureHash: string;
  readonly complexity?: number;
}

/**
 * Tree-sitter point
 */
export interface Point {
  row: number;
  column: number;
}

/**
 * The subset of a Tree-sitter node the extractor walks.
 * Native `Parser.SyntaxNode` values satisfy it structurally.
 */
export interface SyntaxNode {
  type: string;
  text: string;
  startIndex: number;
  startPosition: Point;
  endPosition: Point;
  parent: SyntaxNode | null;
  children: SyntaxNode[];
  namedChildren: SyntaxNode[];
  /** Inserted by error recovery; no source text */
  isMissing: boolean;
  /** True when this node or any descendant is an ERROR or MISSING node */
  hasError: boolean;
  childForFieldName(fieldName: string): SyntaxNode | null;
  childrenForFieldName(fieldName: string): SyntaxNode[];
}

export interface SyntaxTree {
  rootNode: SyntaxNode;
}

/**
 * How a fact's own name is read off its node
 */
export type NameRule =
  /** Text of a field child; `all` joins every child of the field, `find` searches it for a descendant type */
  | { from: "field"; field: string; all?: boolean; find?: readonly string[] }
  /** First string literal among a call's arguments */
  | { from: "argument"; field: string }
  /** First named child of one of the given types */
  | { from: "child"; types: readonly string[] }
  /** The node's own text, cut before `until` when given */
  | { from: "text"; until?: string }
  /** A fixed name */
  | { from: "literal"; value: string };

/**
 * One entry of a language's capability table
 */
export interface FactRule {
  kind: FactKind;
  /** Tried in order; the first that yields a name wins. No match synthesizes a name. */
  name: readonly NameRule[];
  /** Facts nested inside this node are qualified by its name */
  scope?: boolean;
  /** Only emit when the extracted name matches */
  match?: RegExp;
  /** Only emit when another name read off the node matches */
  when?: { name: NameRule; pattern: RegExp };
  /** Skip when the direct parent has one of these types */
  skipUnder?: readonly string[];
  /** Skip when any ancestor has one of these types */
  skipInside?: readonly string[];
  /** Extra segment between the enclosing scope and the name */
  qualifier?: NameRule;
  /** Qualify with the name of the definition this node precedes (decorators) */
  qualifyWithNext?: boolean;
  /** Like qualifyWithNext, but only emit when a definition follows (leading comments) */
  attachToNext?: boolean;
  /** Only emit for the first statement of the file or of the body of one of these node types */
  opens?: readonly string[];
  /** Only emit when the node's single named child has one of these types */
  wraps?: readonly string[];
}

/**
 * Capability table: syntax node type to the rules that apply to it
 */
export type FactRules = Record<string, readonly FactRule[]>;

/**
 * Language profile for parsing and extraction
 */
export interface LanguageProfile {
  /** Language identifier */
  language: string;
  /** npm package name */
  package: string;
  /** Optional: how to extract grammar from module */
  moduleExport?: string;
  /** File extensions for this language */
  extensions: readonly string[];
  /** Interpreter names recognized in a shebang line */
  interpreters?: readonly string[];
  /** AST node type to fact rule mapping */
  rules: FactRules;
  /** Node types that add a branch to cyclomatic complexity */
  branches: readonly string[];
}

/**
 * Result of resolving a file to a language
 */
export type LanguageResolution =
  | { supported: true; handle: LanguageHandle }
  | { supported: false; reason: "unknown-extension" | "unknown-interpreter" };

export interface LanguageHandle {
  language: string;
  profile: LanguageProfile;
}

/**
 * Result of parsing one file
 */
export type ParseOutcome =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; reason: string; location?: { line: number; column: number } };
