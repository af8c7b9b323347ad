/**
 * Grammar configuration schema
 *
 * Custom grammars are declared in code-facts.config.json under `grammars`
 * and merged over the built-in table. Patterns are written as strings and
 * compiled here.
 */

import { z } from "zod";
import { FACT_KINDS, type LanguageProfile, type NameRule } from "../treesitter/types.js";

const NameRuleSchema: z.ZodType<NameRule> = z.discriminatedUnion("from", [
  z.object({
    from: z.literal("field"),
    field: z.string().min(1),
    all: z.boolean().optional(),
    find: z.array(z.string()).optional(),
  }),
  z.object({ from: z.literal("argument"), field: z.string().min(1) }),
  z.object({ from: z.literal("child"), types: z.array(z.string()).min(1) }),
  z.object({ from: z.literal("text"), until: z.string().optional() }),
  z.object({ from: z.literal("literal"), value: z.string().min(1) }),
]);

const PatternSchema = z.string().transform((source, ctx) => {
  try {
    return new RegExp(source);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid pattern: ${source}` });
    return z.NEVER;
  }
});

const FactRuleSchema = z.object({
  kind: z.enum(FACT_KINDS),
  name: z.array(NameRuleSchema).default([{ from: "field", field: "name" }]),
  scope: z.boolean().optional(),
  match: PatternSchema.optional(),
  when: z.object({ name: NameRuleSchema, pattern: PatternSchema }).optional(),
  skipUnder: z.array(z.string()).optional(),
  skipInside: z.array(z.string()).optional(),
  qualifier: NameRuleSchema.optional(),
  qualifyWithNext: z.boolean().optional(),
  attachToNext: z.boolean().optional(),
  opens: z.array(z.string()).optional(),
  wraps: z.array(z.string()).optional(),
});

/**
 * Grammar configuration for a language
 */
export const GrammarConfigSchema = z.object({
  /** npm package name (e.g., "tree-sitter-rust") */
  package: z.string().min(1),
  /** File extensions (e.g., [".rs"]) */
  extensions: z.array(z.string().startsWith(".")).min(1),
  interpreters: z.array(z.string()).optional(),
  /** Map of AST node types to fact rules */
  rules: z.record(z.array(FactRuleSchema)),
  branches: z.array(z.string()).default([]),
  /** Optional: how to extract the grammar from the module */
  moduleExport: z.string().optional(),
});

export type GrammarConfig = z.infer<typeof GrammarConfigSchema>;

/**
 * Convert a validated GrammarConfig to a LanguageProfile
 */
export function grammarToProfile(language: string, grammar: GrammarConfig): LanguageProfile {
  return {
    language,
    package: grammar.package,
    moduleExport: grammar.moduleExport,
    extensions: grammar.extensions,
    interpreters: grammar.interpreters,
    rules: grammar.rules,
    branches: grammar.branches,
  };
}

/**
 * Example config for reference
 */
export const EXAMPLE_GRAMMAR: Record<string, z.input<typeof GrammarConfigSchema>> = {
  rust: {
    package: "tree-sitter-rust",
    extensions: [".rs"],
    rules: {
      function_item: [{ kind: "definition", scope: true }],
      impl_item: [{ kind: "definition", name: [{ from: "field", field: "type" }], scope: true }],
      struct_item: [{ kind: "definition" }],
      trait_item: [{ kind: "definition", scope: true }],
      mod_item: [{ kind: "definition", scope: true }],
      use_declaration: [{ kind: "import", name: [{ from: "field", field: "argument" }] }],
      call_expression: [{ kind: "reference", name: [{ from: "field", field: "function" }] }],
    },
    branches: ["if_expression", "match_arm", "while_expression", "for_expression"],
  },
};
