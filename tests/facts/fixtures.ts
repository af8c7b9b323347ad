import type { Fact, FactKind } from "../../src/treesitter/types.js";
import { rawIdentity } from "../../src/facts/identity.js";

export function makeFact(
  filePath: string,
  name: string[],
  signatureHash = "0000000000000000",
  kind: FactKind = "definition"
): Fact {
  return {
    identity: rawIdentity(filePath, kind, name),
    kind,
    qualifiedName: name,
    filePath,
    language: "python",
    span: { startLine: 1, startCol: 0, endLine: 2, endCol: 8 },
    signatureHash,
  };
}
