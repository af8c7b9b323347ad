import { describe, it, expect } from "vitest";
import {
  readFullDocument,
  renderDelta,
  renderFact,
  renderFull,
  serialize,
  toJson,
  toJsonLines,
} from "../../src/facts/serializer.js";
import { buildFactStore } from "../../src/facts/fact-store.js";
import { diff } from "../../src/facts/delta.js";
import { SnapshotFormatError } from "../../src/errors.js";
import { makeFact } from "./fixtures.js";

const GENERATED_AT = "2024-01-01T00:00:00.000Z";

describe("Serializer", () => {
  const foo = { ...makeFact("pkg/a.py", ["pkg.a", "foo"], "abcdefabcdefabcd"), complexity: 2 };
  const ref = makeFact("pkg/a.py", ["pkg.a", "foo", "print"], "1234123412341234", "reference");

  it("should render a fact with fixed key order", () => {
    expect(Object.keys(renderFact(foo))).toEqual([
      "identity",
      "kind",
      "qualified_name",
      "file_path",
      "language",
      "span",
      "signature_hash",
      "complexity",
    ]);
    expect(renderFact(ref)).toEqual({
      identity: ref.identity,
      kind: "reference",
      qualified_name: "pkg.a.foo.print",
      file_path: "pkg/a.py",
      language: "python",
      span: { start_line: 1, start_col: 0, end_line: 2, end_col: 8 },
      signature_hash: "1234123412341234",
    });
  });

  it("should render the full document", () => {
    const snapshot = buildFactStore("abc123", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [foo] }], ["pkg/b.py"]);
    const doc = renderFull(snapshot);
    expect(doc.revision).toBe("abc123");
    expect(doc.generated_at).toBe(GENERATED_AT);
    expect(doc.files_scanned).toEqual(["pkg/a.py", "pkg/b.py"]);
    expect(doc.files_failed).toEqual(["pkg/b.py"]);
    expect(doc.facts).toEqual([renderFact(foo)]);
  });

  it("should render the delta document", () => {
    const baseline = buildFactStore("base", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [foo] }]);
    const current = buildFactStore("head", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [ref] }], ["pkg/c.py"]);
    const doc = renderDelta(diff(baseline, current));
    expect(doc).toEqual({
      baseline_revision: "base",
      current_revision: "head",
      added: [renderFact(ref)],
      removed: [renderFact(foo)],
      modified: [],
      degraded_files: ["pkg/c.py"],
    });
  });

  it("should write two-space JSON with a trailing newline", () => {
    const snapshot = buildFactStore("r", GENERATED_AT, []);
    expect(toJson(renderFull(snapshot))).toBe(
      '{\n  "revision": "r",\n  "generated_at": "2024-01-01T00:00:00.000Z",\n' +
        '  "files_scanned": [],\n  "files_failed": [],\n  "facts": []\n}\n'
    );
  });

  describe("JSON Lines", () => {
    it("should write a header line and one line per fact", () => {
      const snapshot = buildFactStore("r", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [ref] }]);
      expect(toJsonLines(renderFull(snapshot))).toBe(
        '{"revision":"r","generated_at":"2024-01-01T00:00:00.000Z","files_scanned":["pkg/a.py"],"files_failed":[]}\n' +
          JSON.stringify(renderFact(ref)) +
          "\n"
      );
    });

    it("should tag delta lines with their change", () => {
      const edited = { ...foo, signatureHash: "0000000000000000" };
      const baseline = buildFactStore("base", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [foo] }]);
      const current = buildFactStore("head", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [edited, ref] }]);
      const lines = serialize(renderDelta(diff(baseline, current)), "jsonl").trimEnd().split("\n");

      expect(lines).toHaveLength(3);
      expect(JSON.parse(lines[0])).toEqual({ baseline_revision: "base", current_revision: "head", degraded_files: [] });
      expect(JSON.parse(lines[1])).toEqual({ change: "added", ...renderFact(ref) });
      expect(JSON.parse(lines[2])).toEqual({
        change: "modified",
        identity: foo.identity,
        before: renderFact(foo),
        after: renderFact(edited),
      });
    });

    it("should default to indented JSON", () => {
      const doc = renderFull(buildFactStore("r", GENERATED_AT, []));
      expect(serialize(doc)).toBe(toJson(doc));
    });
  });

  describe("readFullDocument", () => {
    it("should read a JSON Lines document back", () => {
      const snapshot = buildFactStore("abc123", GENERATED_AT, [{ filePath: "pkg/a.py", facts: [foo, ref] }]);
      const restored = readFullDocument(toJsonLines(renderFull(snapshot)), "full.jsonl");
      expect(toJson(renderFull(restored))).toBe(toJson(renderFull(snapshot)));
    });


    it("should read a rendered document back", () => {
      const snapshot = buildFactStore(
        "abc123",
        GENERATED_AT,
        [{ filePath: "pkg/a.py", facts: [foo, ref] }],
        ["pkg/b.py"]
      );
      const text = toJson(renderFull(snapshot));
      const restored = readFullDocument(text, "full.json");

      expect(restored.revision).toBe("abc123");
      expect(restored.filesFailed).toEqual(["pkg/b.py"]);
      expect(toJson(renderFull(restored))).toBe(text);
      expect(diff(snapshot, restored).modified).toEqual([]);
    });

    it("should reject invalid JSON", () => {
      expect(() => readFullDocument("{", "full.json")).toThrow(SnapshotFormatError);
    });

    it("should name the offending field", () => {
      const doc = JSON.stringify({
        revision: "r",
        generated_at: GENERATED_AT,
        files_scanned: [],
        files_failed: [],
        facts: [{ ...renderFact(foo), kind: "macro" }],
      });
      expect(() => readFullDocument(doc, "full.json")).toThrow(/^Invalid facts document full\.json: facts\.0\.kind: /);
    });
  });
});
