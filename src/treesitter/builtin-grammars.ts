/**
 * Built-in grammar configurations
 *
 * These ship with code-facts and don't require user configuration.
 * Projects can override these or add new languages via code-facts.config.json
 */

import type { FactRule, FactRules, NameRule } from "./types.js";

/**
 * Built-in grammar configuration
 */
export interface BuiltinGrammar {
  /** npm package name */
  package: string;
  /** File extensions */
  extensions: string[];
  /** Shebang interpreters that select this grammar for extensionless files */
  interpreters?: string[];
  /** AST node type to fact rule mapping */
  rules: FactRules;
  /** Node types counted by cyclomatic complexity */
  branches: string[];
  /** How to extract grammar from module (for special cases like TypeScript) */
  moduleExport?: string;
}

const byName: NameRule = { from: "field", field: "name" };

const definition = (scope: boolean, ...name: NameRule[]): FactRule => ({
  kind: "definition",
  name: name.length > 0 ? name : [byName],
  scope,
});

// Callbacks passed as arguments or bound to a declarator are named by their parent
const ANONYMOUS_FN_PARENTS = [
  "variable_declarator",
  "public_field_definition",
  "field_definition",
  "arguments",
];

// A comment directly above a definition documents it
const leadingComment: FactRule = {
  kind: "docstring",
  name: [{ from: "literal", value: "__doc__" }],
  attachToNext: true,
};

const anonymousFunction: FactRule = {
  kind: "definition",
  name: [byName],
  scope: true,
  skipUnder: ANONYMOUS_FN_PARENTS,
};

const ECMASCRIPT_RULES: FactRules = {
  function_declaration: [definition(true)],
  generator_function_declaration: [definition(true)],
  class_declaration: [definition(true)],
  class: [definition(true)],
  method_definition: [definition(true)],
  field_definition: [definition(false, { from: "field", field: "property" })],
  variable_declarator: [
    { kind: "definition", name: [byName], scope: true, skipInside: ["statement_block"] },
  ],
  arrow_function: [anonymousFunction],
  function_expression: [anonymousFunction],
  function: [anonymousFunction],
  call_expression: [
    { kind: "reference", name: [{ from: "field", field: "function" }] },
    {
      kind: "test_case",
      name: [{ from: "argument", field: "arguments" }],
      when: { name: { from: "field", field: "function" }, pattern: /^(it|test)$/ },
    },
    {
      kind: "test_case",
      name: [{ from: "argument", field: "arguments" }],
      scope: true,
      when: { name: { from: "field", field: "function" }, pattern: /^(describe|suite)$/ },
    },
  ],
  new_expression: [{ kind: "reference", name: [{ from: "field", field: "constructor" }] }],
  import_statement: [{ kind: "import", name: [{ from: "field", field: "source" }] }],
  export_statement: [
    {
      kind: "export",
      name: [
        {
          from: "field",
          field: "declaration",
          find: ["identifier", "type_identifier", "property_identifier"],
        },
        { from: "child", types: ["export_clause"] },
        { from: "field", field: "value" },
        { from: "field", field: "source" },
      ],
    },
  ],
  decorator: [
    { kind: "decorator", name: [{ from: "text", until: "(" }], qualifyWithNext: true },
  ],
  comment: [leadingComment],
};

const TYPESCRIPT_RULES: FactRules = {
  ...ECMASCRIPT_RULES,
  abstract_class_declaration: [definition(true)],
  function_signature: [definition(false)],
  method_signature: [definition(false)],
  abstract_method_signature: [definition(false)],
  public_field_definition: [definition(false)],
  property_signature: [definition(false)],
  interface_declaration: [definition(true)],
  type_alias_declaration: [definition(false)],
  enum_declaration: [definition(false)],
  internal_module: [definition(true)],
  module: [definition(true)],
  type_annotation: [{ kind: "annotation", name: [{ from: "text" }] }],
};

const ECMASCRIPT_BRANCHES = [
  "if_statement",
  "for_statement",
  "for_in_statement",
  "while_statement",
  "do_statement",
  "switch_case",
  "catch_clause",
  "ternary_expression",
];

/**
 * All built-in grammar configurations
 */
export const BUILTIN_GRAMMARS: Record<string, BuiltinGrammar> = {
  python: {
    package: "tree-sitter-python",
    extensions: [".py", ".pyi"],
    interpreters: ["python", "python2", "python3"],
    rules: {
      function_definition: [
        definition(true),
        { kind: "test_case", name: [byName], match: /^test_/ },
      ],
      class_definition: [definition(true)],
      lambda: [definition(true)],
      call: [{ kind: "reference", name: [{ from: "field", field: "function" }] }],
      import_statement: [
        { kind: "import", name: [{ from: "field", field: "name", all: true, find: ["dotted_name"] }] },
      ],
      import_from_statement: [{ kind: "import", name: [{ from: "field", field: "module_name" }] }],
      decorator: [
        { kind: "decorator", name: [{ from: "text", until: "(" }], qualifyWithNext: true },
      ],
      type: [{ kind: "annotation", name: [{ from: "text" }] }],
      expression_statement: [
        {
          kind: "docstring",
          name: [{ from: "literal", value: "__doc__" }],
          opens: ["function_definition", "class_definition"],
          wraps: ["string", "concatenated_string"],
        },
      ],
    },
    branches: [
      "if_statement",
      "elif_clause",
      "for_statement",
      "while_statement",
      "try_statement",
      "with_statement",
      "match_statement",
      "conditional_expression",
    ],
  },

  javascript: {
    package: "tree-sitter-javascript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
    interpreters: ["node", "nodejs"],
    rules: ECMASCRIPT_RULES,
    branches: ECMASCRIPT_BRANCHES,
  },

  typescript: {
    package: "tree-sitter-typescript",
    extensions: [".ts", ".mts", ".cts"],
    interpreters: ["ts-node", "tsx", "deno"],
    moduleExport: "typescript",
    rules: TYPESCRIPT_RULES,
    branches: ECMASCRIPT_BRANCHES,
  },

  tsx: {
    package: "tree-sitter-typescript",
    extensions: [".tsx"],
    moduleExport: "tsx",
    rules: TYPESCRIPT_RULES,
    branches: ECMASCRIPT_BRANCHES,
  },

  go: {
    package: "tree-sitter-go",
    extensions: [".go"],
    rules: {
      function_declaration: [
        definition(true),
        { kind: "test_case", name: [byName], match: /^Test/ },
      ],
      method_declaration: [
        {
          kind: "definition",
          name: [byName],
          scope: true,
          qualifier: { from: "field", field: "receiver", find: ["type_identifier"] },
        },
      ],
      type_spec: [definition(false)],
      type_alias: [definition(false)],
      func_literal: [definition(true)],
      call_expression: [{ kind: "reference", name: [{ from: "field", field: "function" }] }],
      import_spec: [{ kind: "import", name: [{ from: "field", field: "path" }] }],
      comment: [leadingComment],
    },
    branches: [
      "if_statement",
      "for_statement",
      "expression_case",
      "type_case",
      "communication_case",
    ],
  },
};

