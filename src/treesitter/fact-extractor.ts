/**
 * FactExtractor - Extracts facts from a Tree-sitter syntax tree
 *
 * Walks the tree depth-first and consults the language's capability
 * table for every named node. The walker itself has no per-language
 * branches; everything language-specific lives in the rules.
 */

import { posix } from "node:path";
import type {
  ExtractedFact,
  FactKind,
  FactRule,
  LanguageHandle,
  LanguageProfile,
  NameRule,
  SyntaxNode,
  SyntaxTree,
} from "./types.js";

const STRING_TYPES = new Set([
  "string",
  "template_string",
  "interpreted_string_literal",
  "raw_string_literal",
]);

/**
 * Collapse whitespace and strip quoting, `@` and `:` decoration
 */
export function cleanName(raw: string): string | null {
  let name = raw.replace(/\s+/g, " ").trim();
  name = name.replace(/^[@:]+/, "").trim();
  const quoted = /^(['"`])(.*)\1$/s.exec(name);
  if (quoted) name = quoted[2];
  return name.length > 0 ? name : null;
}

/**
 * Module segment for a file: its path without extension, dotted.
 * A Python package's `__init__.py` names the package directory.
 */
export function moduleName(filePath: string, language: string): string {
  const normalized = filePath.split("\\").join("/");
  const ext = posix.extname(normalized);
  let base = ext ? normalized.slice(0, -ext.length) : normalized;
  if (language === "python" && posix.basename(base) === "__init__") {
    const dir = posix.dirname(base);
    if (dir !== ".") base = dir;
  }
  return base.split("/").filter(Boolean).join(".");
}

function isComment(type: string): boolean {
  return type === "comment" || type.endsWith("_comment");
}

function hasAncestor(node: SyntaxNode, types: readonly string[]): boolean {
  for (let current = node.parent; current; current = current.parent) {
    if (types.includes(current.type)) return true;
  }
  return false;
}

function findDescendant(node: SyntaxNode, types: readonly string[]): SyntaxNode | null {
  const stack: SyntaxNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (types.includes(current.type)) return current;
    const children = current.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return null;
}

// Kinds whose signature covers the node's content; the rest hash their name
const CONTENT_KINDS = new Set<FactKind>([
  "definition",
  "test_case",
  "docstring",
  "decorator",
  "import",
  "export",
]);

// Nested nodes carrying these kinds collapse to a placeholder in their parent's text
const COLLAPSED_KINDS = new Set<FactKind>(["definition", "test_case", "docstring"]);

const DEFINITION_KINDS = new Set<FactKind>(["definition"]);

interface WalkFrame {
  node: SyntaxNode;
  index: number;
  siblings: SyntaxNode[];
  scope: readonly string[];
}

/**
 * Whether a node is the first statement of the file, or of the body of
 * one of the given node types. Comments do not count as statements.
 */
function opensBody(node: SyntaxNode, owners: readonly string[]): boolean {
  const parent = node.parent;
  if (!parent) return false;
  const first = parent.namedChildren.find((child) => !isComment(child.type));
  if (first?.startIndex !== node.startIndex) return false;
  if (!parent.parent || owners.includes(parent.type)) return true;
  return owners.includes(parent.parent.type);
}

interface WalkContext {
  profile: LanguageProfile;
  filePath: string;
  branches: ReadonlySet<string>;
  facts: ExtractedFact[];
}

/**
 * FactExtractor turns one syntax tree into an ordered list of facts
 */
export class FactExtractor {
  /**
   * Extract facts in tree pre-order. Identity and signature hash are
   * left to the identity resolver.
   */
  extract(tree: SyntaxTree, filePath: string, handle: LanguageHandle): ExtractedFact[] {
    const ctx: WalkContext = {
      profile: handle.profile,
      filePath,
      branches: new Set(handle.profile.branches),
      facts: [],
    };

    const root = tree.rootNode;
    const scope = [moduleName(filePath, handle.language)];
    this.walk(root.namedChildren, scope, ctx);
    return ctx.facts;
  }

  /**
   * Pre-order walk with an explicit stack; trees can be far deeper than
   * the call stack allows
   */
  private walk(top: SyntaxNode[], scope: readonly string[], ctx: WalkContext): void {
    const stack: WalkFrame[] = [];
    const pushChildren = (siblings: SyntaxNode[], childScope: readonly string[]): void => {
      for (let i = siblings.length - 1; i >= 0; i--) {
        stack.push({ node: siblings[i], index: i, siblings, scope: childScope });
      }
    };

    pushChildren(top, scope);
    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const { node, index, siblings } = frame;
      let childScope = frame.scope;

      const rules = ctx.profile.rules[node.type];
      if (rules) {
        let scoped = false;
        for (const rule of rules) {
          const fact = this.applyRule(node, index, siblings, rule, frame.scope, ctx);
          if (!fact) continue;
          ctx.facts.push(fact);
          if (rule.scope && !scoped) {
            childScope = fact.qualifiedName;
            scoped = true;
          }
        }
      }

      pushChildren(node.namedChildren, childScope);
    }
  }

  private applyRule(
    node: SyntaxNode,
    index: number,
    siblings: SyntaxNode[],
    rule: FactRule,
    scope: readonly string[],
    ctx: WalkContext
  ): ExtractedFact | null {
    if (!this.isApplicable(node, rule)) return null;

    const name = this.resolveName(node, rule.name) ?? `<${node.type}@${index}>`;
    if (rule.match && !rule.match.test(name)) return null;

    const qualifiedName = [...scope];
    if (rule.qualifier) {
      const qualifier = this.readName(node, rule.qualifier);
      if (qualifier) qualifiedName.push(qualifier);
    }
    if (rule.qualifyWithNext || rule.attachToNext) {
      const target = this.nextDefinitionName(node, index, siblings, ctx);
      if (target) {
        qualifiedName.push(target);
      } else if (rule.attachToNext) {
        return null;
      }
    }
    qualifiedName.push(name);

    const fact: ExtractedFact = {
      kind: rule.kind,
      qualifiedName,
      filePath: ctx.filePath,
      language: ctx.profile.language,
      span: {
        startLine: node.startPosition.row + 1,
        startCol: node.startPosition.column,
        endLine: node.endPosition.row + 1,
        endCol: node.endPosition.column,
      },
      canonicalText: CONTENT_KINDS.has(rule.kind) ? this.canonicalText(node, ctx) : name,
    };
    if (rule.kind === "definition") {
      fact.complexity = this.complexity(node, ctx);
    }
    return fact;
  }

  private isApplicable(node: SyntaxNode, rule: FactRule): boolean {
    if (rule.skipUnder && node.parent && rule.skipUnder.includes(node.parent.type)) {
      return false;
    }
    if (rule.skipInside && hasAncestor(node, rule.skipInside)) {
      return false;
    }
    if (rule.when) {
      const value = this.readName(node, rule.when.name);
      if (value === null || !rule.when.pattern.test(value)) return false;
    }
    if (rule.wraps) {
      const inner = node.namedChildren;
      if (inner.length !== 1 || !rule.wraps.includes(inner[0].type)) return false;
    }
    if (rule.opens && !opensBody(node, rule.opens)) {
      return false;
    }
    return true;
  }

  private resolveName(node: SyntaxNode, rules: readonly NameRule[]): string | null {
    for (const rule of rules) {
      const name = this.readName(node, rule);
      if (name) return name;
    }
    return null;
  }

  private readName(node: SyntaxNode, rule: NameRule): string | null {
    switch (rule.from) {
      case "field": {
        const targets = rule.all
          ? node.childrenForFieldName(rule.field)
          : [node.childForFieldName(rule.field)];
        const names: string[] = [];
        for (const target of targets) {
          if (!target) continue;
          const named = rule.find ? findDescendant(target, rule.find) : target;
          const name = named ? cleanName(named.text) : null;
          if (name) names.push(name);
        }
        return names.length > 0 ? names.join(",") : null;
      }
      case "argument": {
        const args = node.childForFieldName(rule.field);
        const first = args?.namedChildren.find((child) => STRING_TYPES.has(child.type));
        return first ? cleanName(first.text) : null;
      }
      case "child": {
        const child = node.namedChildren.find((candidate) => rule.types.includes(candidate.type));
        return child ? cleanName(child.text) : null;
      }
      case "text": {
        let text = node.text;
        if (rule.until) {
          const cut = text.indexOf(rule.until);
          if (cut !== -1) text = text.slice(0, cut);
        }
        return cleanName(text);
      }
      case "literal":
        return rule.value;
    }
  }

  /**
   * The first rule of one of the given kinds that applies to a node, if any
   */
  private ruleOfKind(
    node: SyntaxNode,
    kinds: ReadonlySet<FactKind>,
    ctx: WalkContext
  ): FactRule | null {
    const rules = ctx.profile.rules[node.type];
    if (!rules) return null;
    for (const rule of rules) {
      if (!kinds.has(rule.kind) || !this.isApplicable(node, rule)) continue;
      if (rule.match) {
        const name = this.resolveName(node, rule.name);
        if (name === null || !rule.match.test(name)) continue;
      }
      return rule;
    }
    return null;
  }

  private definitionRule(node: SyntaxNode, ctx: WalkContext): FactRule | null {
    return this.ruleOfKind(node, DEFINITION_KINDS, ctx);
  }

  /**
   * Name of the definition a decorator or comment precedes. Other nodes of
   * the same type and comments in between are skipped; a wrapper such as
   * an export statement is looked through one level.
   */
  private nextDefinitionName(
    node: SyntaxNode,
    index: number,
    siblings: SyntaxNode[],
    ctx: WalkContext
  ): string | null {
    for (let i = index + 1; i < siblings.length; i++) {
      const sibling = siblings[i];
      if (sibling.type === node.type || isComment(sibling.type)) continue;
      const target = this.definitionRule(sibling, ctx)
        ? sibling
        : sibling.namedChildren.find((child) => this.definitionRule(child, ctx) !== null);
      if (!target) return null;
      const rule = this.definitionRule(target, ctx);
      return rule ? this.resolveName(target, rule.name) : null;
    }
    return null;
  }

  /**
   * Token stream of a node with comments dropped and nested definitions,
   * test cases and docstrings collapsed to a `{type}` placeholder.
   * Whitespace never reaches it. Editing a nested definition leaves its
   * parent unchanged.
   */
  private canonicalText(root: SyntaxNode, ctx: WalkContext): string {
    const parts: string[] = [];
    const stack: Array<SyntaxNode | ")"> = [root];

    while (stack.length > 0) {
      const item = stack.pop();
      if (item === undefined) break;
      if (item === ")") {
        parts.push(item);
        continue;
      }

      const isRoot = item === root;
      if (!isRoot && isComment(item.type)) continue;
      const children = item.children;
      if (children.length === 0) {
        parts.push(item.text);
        continue;
      }
      if (!isRoot && this.ruleOfKind(item, COLLAPSED_KINDS, ctx)) {
        parts.push(`{${item.type}}`);
        continue;
      }
      parts.push(`(${item.type}`);
      stack.push(")");
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    return parts.join(" ");
  }

  /**
   * 1 + branch nodes below a definition, not counting nested definitions
   */
  private complexity(root: SyntaxNode, ctx: WalkContext): number {
    let score = 1;
    const stack = [...root.namedChildren];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      if (this.definitionRule(node, ctx)) continue;
      if (ctx.branches.has(node.type)) score++;
      stack.push(...node.namedChildren);
    }
    return score;
  }
}
