import { describe, it, expect } from "vitest";
import { FactExtractor, cleanName, moduleName } from "../../src/treesitter/fact-extractor.js";
import { ParserRegistry } from "../../src/treesitter/parser-registry.js";
import { getGrammarRegistry } from "../../src/treesitter/language-map.js";
import type { ExtractedFact } from "../../src/treesitter/types.js";

const parsers = new ParserRegistry();
const extractor = new FactExtractor();

function extract(filePath: string, source: string): ExtractedFact[] {
  const resolution = getGrammarRegistry().resolve(filePath);
  if (!resolution.supported) throw new Error(`unsupported: ${filePath}`);
  const outcome = parsers.parse(resolution.handle, source);
  if (!outcome.ok) throw new Error(`${filePath}: ${outcome.reason}`);
  return extractor.extract(outcome.tree, filePath, resolution.handle);
}

function summarize(facts: ExtractedFact[]): string[] {
  return facts.map((fact) => `${fact.kind} ${fact.qualifiedName.join(".")}`);
}

function find(facts: ExtractedFact[], kind: string, name: string): ExtractedFact {
  const fact = facts.find((f) => f.kind === kind && f.qualifiedName.join(".") === name);
  if (!fact) throw new Error(`no ${kind} ${name}`);
  return fact;
}

describe("cleanName", () => {
  it("should collapse whitespace and strip quotes", () => {
    expect(cleanName('  "node:fs" ')).toBe("node:fs");
    expect(cleanName("foo\n   .bar")).toBe("foo .bar");
  });

  it("should strip decorator and annotation prefixes", () => {
    expect(cleanName("@app.route")).toBe("app.route");
    expect(cleanName(": string")).toBe("string");
  });

  it("should return null for empty names", () => {
    expect(cleanName("   ")).toBeNull();
    expect(cleanName("''")).toBeNull();
  });
});

describe("moduleName", () => {
  it("should dot the path without its extension", () => {
    expect(moduleName("src/app/widget.py", "python")).toBe("src.app.widget");
    expect(moduleName("main.go", "go")).toBe("main");
  });

  it("should name a Python package after its directory", () => {
    expect(moduleName("pkg/sub/__init__.py", "python")).toBe("pkg.sub");
    expect(moduleName("__init__.py", "python")).toBe("__init__");
    expect(moduleName("lib/__init__.js", "javascript")).toBe("lib.__init__");
  });
});

describe("FactExtractor", () => {
  describe("Python", () => {
    const source = [
      "import os",
      "from pkg.util import helper",
      "",
      "class Widget:",
      "    def render(self):",
      "        return helper(os.sep)",
      "",
      "def test_widget():",
      "    assert Widget().render()",
      "",
    ].join("\n");

    it("should extract facts in tree order with qualified names", () => {
      expect(summarize(extract("app/widget.py", source))).toEqual([
        "import app.widget.os",
        "import app.widget.pkg.util",
        "definition app.widget.Widget",
        "definition app.widget.Widget.render",
        "reference app.widget.Widget.render.helper",
        "definition app.widget.test_widget",
        "test_case app.widget.test_widget",
        "reference app.widget.test_widget.Widget().render",
        "reference app.widget.test_widget.Widget",
      ]);
    });

    it("should record spans with 1-based lines and 0-based columns", () => {
      const render = find(extract("app/widget.py", source), "definition", "app.widget.Widget.render");
      expect(render.span).toEqual({ startLine: 5, startCol: 4, endLine: 6, endCol: 29 });
      expect(render.filePath).toBe("app/widget.py");
      expect(render.language).toBe("python");
    });

    it("should keep qualified name segments separate", () => {
      const render = find(extract("app/widget.py", source), "definition", "app.widget.Widget.render");
      expect(render.qualifiedName).toEqual(["app.widget", "Widget", "render"]);
    });

    it("should qualify decorators with the definition they decorate", () => {
      const facts = extract("routes.py", '@app.route("/x")\ndef handler():\n    pass\n');
      expect(summarize(facts)).toEqual([
        "decorator routes.handler.app.route",
        "reference routes.app.route",
        "definition routes.handler",
      ]);
    });

    it("should name anonymous functions by position", () => {
      const facts = extract("handlers.py", "handlers = [lambda: 1, lambda: 2]\n");
      expect(summarize(facts)).toEqual([
        "definition handlers.<lambda@0>",
        "definition handlers.<lambda@1>",
      ]);
    });

    it("should extract type annotations", () => {
      const facts = extract("typed.py", "def size(items: list) -> int:\n    return 0\n");
      expect(summarize(facts)).toEqual([
        "definition typed.size",
        "annotation typed.size.list",
        "annotation typed.size.int",
      ]);
    });

    it("should extract module, class and function docstrings", () => {
      const facts = extract(
        "m.py",
        [
          '"""Module doc."""',
          "",
          "class Box:",
          '    """A box."""',
          "",
          "    def size(self):",
          '        """Size."""',
          "        return 1",
          "",
        ].join("\n")
      );
      expect(summarize(facts)).toEqual([
        "docstring m.__doc__",
        "definition m.Box",
        "docstring m.Box.__doc__",
        "definition m.Box.size",
        "docstring m.Box.size.__doc__",
      ]);
    });

    it("should not treat later or nested string statements as docstrings", () => {
      const facts = extract("m.py", 'def f(x):\n    x = 1\n    "late"\n    if x:\n        "inner"\n');
      expect(summarize(facts)).toEqual(["definition m.f"]);
    });

    it("should compute cyclomatic complexity for definitions only", () => {
      const facts = extract(
        "calc.py",
        [
          "def grade(x):",
          "    if x > 90:",
          "        return 'a'",
          "    elif x > 80:",
          "        return 'b'",
          "    for _ in range(x):",
          "        pass",
          "    return 'c'",
          "",
        ].join("\n")
      );
      expect(find(facts, "definition", "calc.grade").complexity).toBe(4);
      expect(find(facts, "reference", "calc.grade.range").complexity).toBeUndefined();
    });

    it("should not count nested definitions toward complexity", () => {
      const facts = extract(
        "nest.py",
        "def outer():\n    def inner(flag):\n        if flag:\n            return 1\n    return inner\n"
      );
      expect(find(facts, "definition", "nest.outer").complexity).toBe(1);
      expect(find(facts, "definition", "nest.outer.inner").complexity).toBe(2);
    });
  });

  describe("canonical text", () => {
    it("should ignore formatting and comments", () => {
      const before = extract("f.py", "def add( x ,y ):\n    # sum\n    return x+y\n");
      const after = extract("f.py", "def add(x, y):\n\n    return x + y  # done\n");
      expect(find(after, "definition", "f.add").canonicalText).toBe(
        find(before, "definition", "f.add").canonicalText
      );
    });

    it("should change when the body changes", () => {
      const before = extract("f.py", "def add(x, y):\n    return x + y\n");
      const after = extract("f.py", "def add(x, y):\n    return x - y\n");
      expect(find(after, "definition", "f.add").canonicalText).not.toBe(
        find(before, "definition", "f.add").canonicalText
      );
    });

    it("should not change a function when its docstring is edited", () => {
      const before = extract("d.py", 'def f():\n    """One."""\n    return 1\n');
      const after = extract("d.py", 'def f():\n    """Two."""\n    return 1\n');
      expect(find(after, "definition", "d.f").canonicalText).toBe(find(before, "definition", "d.f").canonicalText);
      expect(find(after, "docstring", "d.f.__doc__").canonicalText).not.toBe(
        find(before, "docstring", "d.f.__doc__").canonicalText
      );
    });

    it("should reduce references and annotations to their name", () => {
      const facts = extract("r.py", "def f(n: int):\n    return helper(n, 2)\n");
      expect(find(facts, "reference", "r.f.helper").canonicalText).toBe("helper");
      expect(find(facts, "annotation", "r.f.int").canonicalText).toBe("int");
    });

    it("should not change a class when a method is edited or renamed", () => {
      const before = extract("w.py", "class Widget:\n    def render(self):\n        return 1\n");
      const edited = extract("w.py", "class Widget:\n    def render(self):\n        return 2\n");
      const renamed = extract("w.py", "class Widget:\n    def draw(self):\n        return 1\n");
      const widget = find(before, "definition", "w.Widget").canonicalText;
      expect(find(edited, "definition", "w.Widget").canonicalText).toBe(widget);
      expect(find(renamed, "definition", "w.Widget").canonicalText).toBe(widget);
    });
  });

  describe("TypeScript", () => {
    const source = [
      'import { readFile } from "node:fs";',
      "export class Store {",
      "  load(key: string): string {",
      "    return readFile(key);",
      "  }",
      "}",
      'describe("Store", () => {',
      '  it("loads", () => {});',
      "});",
      "",
    ].join("\n");

    it("should extract imports, exports, definitions and annotations", () => {
      expect(summarize(extract("src/store.ts", source))).toEqual([
        "import src.store.node:fs",
        "export src.store.Store",
        "definition src.store.Store",
        "definition src.store.Store.load",
        "annotation src.store.Store.load.string",
        "annotation src.store.Store.load.string",
        "reference src.store.Store.load.readFile",
        "reference src.store.describe",
        "test_case src.store.Store",
        "reference src.store.Store.it",
        "test_case src.store.Store.loads",
      ]);
    });

    it("should qualify class and method decorators with what they decorate", () => {
      const facts = extract("v.ts", "@sealed\nclass Vault {\n  @log\n  open() {}\n}\n");
      expect(summarize(facts).filter((line) => line.startsWith("decorator"))).toEqual([
        "decorator v.Vault.sealed",
        "decorator v.Vault.open.log",
      ]);
    });

    it("should name interfaces, type aliases and enums", () => {
      const facts = extract(
        "types.ts",
        "interface Shape { area(): number; }\ntype Id = string;\nenum Color { Red }\n"
      );
      expect(summarize(facts).filter((line) => line.startsWith("definition"))).toEqual([
        "definition types.Shape",
        "definition types.Shape.area",
        "definition types.Id",
        "definition types.Color",
      ]);
    });
  });

  describe("JavaScript", () => {
    it("should name arrow functions after their declarator", () => {
      const facts = extract("math.js", "const double = (n) => n * 2;\n");
      expect(summarize(facts)).toEqual(["definition math.double"]);
    });

    it("should skip locals declared inside function bodies", () => {
      const facts = extract("math.js", "function total(xs) {\n  const sum = 0;\n  return sum;\n}\n");
      expect(summarize(facts)).toEqual(["definition math.total"]);
    });

    it("should attach leading comments to the definition that follows", () => {
      const facts = extract(
        "m.js",
        "/** Adds. */\nexport function add(a, b) { return a + b; }\n// helper\nconst twice = (n) => n * 2;\n// stray\n"
      );
      expect(summarize(facts)).toEqual([
        "docstring m.add.__doc__",
        "export m.add",
        "definition m.add",
        "docstring m.twice.__doc__",
        "definition m.twice",
      ]);
      expect(find(facts, "docstring", "m.add.__doc__").canonicalText).toBe("/** Adds. */");
    });

    it("should extract constructor calls as references", () => {
      const facts = extract("app.js", "const app = new Server();\n");
      expect(summarize(facts)).toEqual(["definition app.app", "reference app.app.Server"]);
    });
  });

  describe("Go", () => {
    const source = [
      "package shapes",
      "",
      'import "fmt"',
      "",
      "type Circle struct{ r float64 }",
      "",
      "func (c *Circle) Area() float64 {",
      "\treturn 3 * c.r * c.r",
      "}",
      "",
      "func TestArea(t *testing.T) {",
      '\tfmt.Println("x")',
      "}",
      "",
    ].join("\n");

    it("should qualify methods with their receiver type", () => {
      expect(summarize(extract("shapes/circle.go", source))).toEqual([
        "import shapes.circle.fmt",
        "definition shapes.circle.Circle",
        "definition shapes.circle.Circle.Area",
        "definition shapes.circle.TestArea",
        "test_case shapes.circle.TestArea",
        "reference shapes.circle.TestArea.fmt.Println",
      ]);
    });

    it("should attach a comment to the type it documents", () => {
      const facts = extract("shapes/doc.go", "package shapes\n\n// Square has four sides.\ntype Square struct{}\n");
      expect(summarize(facts)).toEqual([
        "docstring shapes.doc.Square.__doc__",
        "definition shapes.doc.Square",
      ]);
    });
  });
});
