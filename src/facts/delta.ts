/**
 * Delta computation between two snapshots
 */

import type { Fact } from "../treesitter/types.js";
import { compareStrings, type Snapshot } from "./fact-store.js";

export interface ModifiedFact {
  readonly identity: string;
  readonly before: Fact;
  readonly after: Fact;
}

/**
 * Minimal changeset between a baseline and a current snapshot.
 * The three fact lists are pairwise disjoint by identity.
 */
export interface Changeset {
  readonly baselineRevision: string;
  readonly currentRevision: string;
  readonly added: readonly Fact[];
  readonly removed: readonly Fact[];
  readonly modified: readonly ModifiedFact[];
  /** Files that failed in either revision; their facts could not be compared */
  readonly degradedFiles: readonly string[];
}

export function qualifiedNameOf(fact: Fact): string {
  return fact.qualifiedName.join(".");
}

/**
 * Order by file path, then qualified name, then identity
 */
export function compareFacts(a: Fact, b: Fact): number {
  return (
    compareStrings(a.filePath, b.filePath) ||
    compareStrings(qualifiedNameOf(a), qualifiedNameOf(b)) ||
    compareStrings(a.identity, b.identity)
  );
}

/**
 * Reduce two snapshots to added / removed / modified facts.
 *
 * Hash lookups keep this linear apart from the final sorts. Facts with
 * equal identity and signature hash are dropped; span changes alone
 * never count as a modification.
 */
export function diff(baseline: Snapshot, current: Snapshot): Changeset {
  const added: Fact[] = [];
  const removed: Fact[] = [];
  const modified: ModifiedFact[] = [];

  for (const [identity, after] of current.facts) {
    const before = baseline.facts.get(identity);
    if (!before) {
      added.push(after);
    } else if (before.signatureHash !== after.signatureHash) {
      modified.push({ identity, before, after });
    }
  }

  for (const [identity, before] of baseline.facts) {
    if (!current.facts.has(identity)) {
      removed.push(before);
    }
  }

  added.sort(compareFacts);
  removed.sort(compareFacts);
  modified.sort((a, b) => compareFacts(a.after, b.after));

  const degraded = new Set([...baseline.filesFailed, ...current.filesFailed]);

  return Object.freeze({
    baselineRevision: baseline.revision,
    currentRevision: current.revision,
    added,
    removed,
    modified,
    degradedFiles: [...degraded].sort(compareStrings),
  });
}
