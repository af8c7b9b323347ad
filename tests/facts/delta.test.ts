import { describe, it, expect } from "vitest";
import { diff, compareFacts, qualifiedNameOf } from "../../src/facts/delta.js";
import { buildFactStore } from "../../src/facts/fact-store.js";
import type { Fact } from "../../src/treesitter/types.js";
import { makeFact } from "./fixtures.js";

const GENERATED_AT = "2024-01-01T00:00:00.000Z";

function snapshot(revision: string, facts: Fact[], failed: string[] = []) {
  const byFile = new Map<string, Fact[]>();
  for (const fact of facts) {
    byFile.set(fact.filePath, [...(byFile.get(fact.filePath) ?? []), fact]);
  }
  return buildFactStore(
    revision,
    GENERATED_AT,
    [...byFile].map(([filePath, list]) => ({ filePath, facts: list })),
    failed
  );
}

describe("Delta", () => {
  it("should report nothing for identical snapshots", () => {
    const facts = [makeFact("a.py", ["a", "foo"], "1111111111111111")];
    const changeset = diff(snapshot("base", facts), snapshot("head", facts));

    expect(changeset.baselineRevision).toBe("base");
    expect(changeset.currentRevision).toBe("head");
    expect(changeset.added).toEqual([]);
    expect(changeset.removed).toEqual([]);
    expect(changeset.modified).toEqual([]);
    expect(changeset.degradedFiles).toEqual([]);
  });

  it("should classify added, removed and modified facts", () => {
    const kept = makeFact("a.py", ["a", "keep"], "1111111111111111");
    const before = makeFact("a.py", ["a", "edit"], "2222222222222222");
    const after = makeFact("a.py", ["a", "edit"], "3333333333333333");
    const gone = makeFact("a.py", ["a", "gone"]);
    const fresh = makeFact("b.py", ["b", "fresh"]);

    const changeset = diff(snapshot("base", [kept, before, gone]), snapshot("head", [kept, after, fresh]));

    expect(changeset.added).toEqual([fresh]);
    expect(changeset.removed).toEqual([gone]);
    expect(changeset.modified).toEqual([{ identity: before.identity, before, after }]);
  });

  it("should ignore span changes", () => {
    const before = makeFact("a.py", ["a", "foo"], "1111111111111111");
    const after = { ...before, span: { startLine: 10, startCol: 4, endLine: 12, endCol: 0 } };
    const changeset = diff(snapshot("base", [before]), snapshot("head", [after]));
    expect(changeset.modified).toEqual([]);
  });

  it("should keep the three lists disjoint", () => {
    const base = [
      makeFact("a.py", ["a", "x"], "1111111111111111"),
      makeFact("a.py", ["a", "y"]),
      makeFact("b.py", ["b", "z"]),
    ];
    const head = [
      makeFact("a.py", ["a", "x"], "2222222222222222"),
      makeFact("b.py", ["b", "z"]),
      makeFact("c.py", ["c", "w"]),
    ];
    const changeset = diff(snapshot("base", base), snapshot("head", head));
    const ids = [
      ...changeset.added.map((f) => f.identity),
      ...changeset.removed.map((f) => f.identity),
      ...changeset.modified.map((m) => m.identity),
    ];
    expect(ids).toHaveLength(3);
    expect(new Set(ids).size).toBe(3);
  });

  it("should order by file path, then qualified name", () => {
    const facts = [
      makeFact("b.py", ["b", "alpha"]),
      makeFact("a.py", ["a", "zeta"]),
      makeFact("a.py", ["a", "beta"]),
    ];
    const changeset = diff(snapshot("base", []), snapshot("head", facts));
    expect(changeset.added.map(qualifiedNameOf)).toEqual(["a.beta", "a.zeta", "b.alpha"]);
  });

  it("should break ties on identity", () => {
    const left = makeFact("a.py", ["a", "foo"], "0000000000000000", "definition");
    const right = makeFact("a.py", ["a", "foo"], "0000000000000000", "reference");
    const expected = left.identity < right.identity ? -1 : 1;
    expect(compareFacts(left, right)).toBe(expected);
  });

  it("should list files that failed in either revision", () => {
    const foo = makeFact("a.py", ["a", "foo"]);
    const changeset = diff(snapshot("base", [foo], ["c.py"]), snapshot("head", [], ["a.py", "c.py"]));
    expect(changeset.removed).toEqual([foo]);
    expect(changeset.degradedFiles).toEqual(["a.py", "c.py"]);
  });
});
