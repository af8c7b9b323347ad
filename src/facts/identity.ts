/**
 * Identity resolution for extracted facts
 *
 * An identity is a pure function of (file path, kind, qualified name,
 * ordinal). Source positions never take part, so identities survive
 * reformatting, while a rename or a move to another file yields a new one.
 */

import type { ExtractedFact, Fact } from "../treesitter/types.js";
import { shortHash } from "../utils/hash.js";

const FIELD_SEPARATOR = "\u0000";
const SEGMENT_SEPARATOR = "\u0001";

/**
 * Identity before collision handling
 */
export function rawIdentity(filePath: string, kind: string, qualifiedName: readonly string[]): string {
  return shortHash([filePath, kind, qualifiedName.join(SEGMENT_SEPARATOR)].join(FIELD_SEPARATOR));
}

/**
 * Fingerprint of a fact's canonical text
 */
export function signatureHash(canonicalText: string): string {
  return shortHash(canonicalText);
}

/**
 * Stamp identities and signature hashes onto one file's facts.
 *
 * Facts sharing a raw identity (overloads, repeated calls) are numbered
 * in the order given, which is tree pre-order. Ordinal 0 keeps the bare
 * key; later ones get a `~n` suffix. Matching is therefore positional:
 * the n-th `foo` overload in one revision is compared with the n-th in
 * the other.
 */
export function stamp(facts: readonly ExtractedFact[]): Fact[] {
  const seen = new Map<string, number>();

  return facts.map((extracted) => {
    const raw = rawIdentity(extracted.filePath, extracted.kind, extracted.qualifiedName);
    const ordinal = seen.get(raw) ?? 0;
    seen.set(raw, ordinal + 1);

    const fact: Fact = {
      identity: ordinal === 0 ? raw : `${raw}~${ordinal}`,
      kind: extracted.kind,
      qualifiedName: [...extracted.qualifiedName],
      filePath: extracted.filePath,
      language: extracted.language,
      span: { ...extracted.span },
      signatureHash: signatureHash(extracted.canonicalText),
      ...(extracted.complexity === undefined ? {} : { complexity: extracted.complexity }),
    };
    return fact;
  });
}
