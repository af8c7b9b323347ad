/**
 * Fact Store - aggregates per-file facts into one snapshot of a revision
 */

import type { Fact } from "../treesitter/types.js";
import { FactCollisionError } from "../errors.js";

/**
 * All facts of one revision, indexed by identity. Read-only once built.
 */
export interface Snapshot {
  readonly revision: string;
  /** ISO-8601 */
  readonly generatedAt: string;
  /** Files a parse was attempted for, sorted */
  readonly filesScanned: readonly string[];
  /** Files that could not be read or parsed, sorted */
  readonly filesFailed: readonly string[];
  /** Files with no supported language, sorted */
  readonly filesSkipped: readonly string[];
  /** Iterates in identity order */
  readonly facts: ReadonlyMap<string, Fact>;
}

export interface FileFacts {
  filePath: string;
  facts: readonly Fact[];
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Collects file results in any order and aggregates them once.
 * Tasks running concurrently only ever append here.
 */
export class SnapshotBuilder {
  private readonly scanned = new Set<string>();
  private readonly failed = new Set<string>();
  private readonly skipped = new Set<string>();
  private readonly files: FileFacts[] = [];

  constructor(
    private readonly revision: string,
    private readonly generatedAt: string
  ) {}

  addFile(filePath: string, facts: readonly Fact[]): void {
    this.scanned.add(filePath);
    this.files.push({ filePath, facts });
  }

  addFailure(filePath: string): void {
    this.scanned.add(filePath);
    this.failed.add(filePath);
  }

  addSkipped(filePath: string): void {
    this.skipped.add(filePath);
  }

  /**
   * Build the snapshot. A duplicate identity means identity stamping is
   * broken and aborts with FactCollisionError.
   */
  build(): Snapshot {
    const byIdentity = new Map<string, Fact>();
    for (const file of this.files) {
      for (const fact of file.facts) {
        const existing = byIdentity.get(fact.identity);
        if (existing) {
          throw new FactCollisionError(fact.identity, existing.filePath, fact.filePath);
        }
        byIdentity.set(fact.identity, fact);
      }
    }

    const identities = [...byIdentity.keys()].sort(compareStrings);
    const facts = new Map<string, Fact>();
    for (const identity of identities) {
      const fact = byIdentity.get(identity);
      if (fact) facts.set(identity, fact);
    }

    return Object.freeze({
      revision: this.revision,
      generatedAt: this.generatedAt,
      filesScanned: [...this.scanned].sort(compareStrings),
      filesFailed: [...this.failed].sort(compareStrings),
      filesSkipped: [...this.skipped].sort(compareStrings),
      facts,
    });
  }
}

/**
 * Build a snapshot from already-extracted files
 */
export function buildFactStore(
  revision: string,
  generatedAt: string,
  files: Iterable<FileFacts>,
  failed: Iterable<string> = []
): Snapshot {
  const builder = new SnapshotBuilder(revision, generatedAt);
  for (const file of files) {
    builder.addFile(file.filePath, file.facts);
  }
  for (const filePath of failed) {
    builder.addFailure(filePath);
  }
  return builder.build();
}
