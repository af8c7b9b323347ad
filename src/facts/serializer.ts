/**
 * Snapshot Serializer
 *
 * Renders snapshots and changesets as the code_facts_full.json and
 * code_facts_delta.json documents. Key order is fixed by construction
 * and every list has a defined order, so unchanged input renders
 * byte-identical output.
 */

import { z } from "zod";
import { FACT_KINDS, type Fact } from "../treesitter/types.js";
import { SnapshotFormatError } from "../errors.js";
import { SnapshotBuilder, type Snapshot } from "./fact-store.js";
import { qualifiedNameOf, type Changeset } from "./delta.js";

export interface FactDocument {
  identity: string;
  kind: string;
  qualified_name: string;
  file_path: string;
  language: string;
  span: { start_line: number; start_col: number; end_line: number; end_col: number };
  signature_hash: string;
  complexity?: number;
}

export interface FullDocument {
  revision: string;
  generated_at: string;
  files_scanned: string[];
  files_failed: string[];
  facts: FactDocument[];
}

export interface DeltaDocument {
  baseline_revision: string;
  current_revision: string;
  added: FactDocument[];
  removed: FactDocument[];
  modified: Array<{ identity: string; before: FactDocument; after: FactDocument }>;
  degraded_files: string[];
}

export function renderFact(fact: Fact): FactDocument {
  const doc: FactDocument = {
    identity: fact.identity,
    kind: fact.kind,
    qualified_name: qualifiedNameOf(fact),
    file_path: fact.filePath,
    language: fact.language,
    span: {
      start_line: fact.span.startLine,
      start_col: fact.span.startCol,
      end_line: fact.span.endLine,
      end_col: fact.span.endCol,
    },
    signature_hash: fact.signatureHash,
  };
  if (fact.complexity !== undefined) {
    doc.complexity = fact.complexity;
  }
  return doc;
}

/**
 * Full-facts document; facts sorted by identity
 */
export function renderFull(snapshot: Snapshot): FullDocument {
  return {
    revision: snapshot.revision,
    generated_at: snapshot.generatedAt,
    files_scanned: [...snapshot.filesScanned],
    files_failed: [...snapshot.filesFailed],
    facts: [...snapshot.facts.values()].map(renderFact),
  };
}

/**
 * Delta document; lists keep the changeset's (file, name) order
 */
export function renderDelta(changeset: Changeset): DeltaDocument {
  return {
    baseline_revision: changeset.baselineRevision,
    current_revision: changeset.currentRevision,
    added: changeset.added.map(renderFact),
    removed: changeset.removed.map(renderFact),
    modified: changeset.modified.map((entry) => ({
      identity: entry.identity,
      before: renderFact(entry.before),
      after: renderFact(entry.after),
    })),
    degraded_files: [...changeset.degradedFiles],
  };
}

export type OutputFormat = "json" | "jsonl";

export function toJson(document: FullDocument | DeltaDocument): string {
  return JSON.stringify(document, null, 2) + "\n";
}

/**
 * JSON Lines: a header line with everything but the fact lists, then one
 * line per fact (full) or per change tagged with `change` (delta)
 */
export function toJsonLines(document: FullDocument | DeltaDocument): string {
  const lines: object[] = [];
  if ("facts" in document) {
    const { facts, ...header } = document;
    lines.push(header, ...facts);
  } else {
    const { added, removed, modified, ...header } = document;
    lines.push(
      header,
      ...added.map((fact) => ({ change: "added", ...fact })),
      ...removed.map((fact) => ({ change: "removed", ...fact })),
      ...modified.map((entry) => ({ change: "modified", ...entry }))
    );
  }
  return lines.map((line) => JSON.stringify(line) + "\n").join("");
}

export function serialize(document: FullDocument | DeltaDocument, format: OutputFormat = "json"): string {
  return format === "jsonl" ? toJsonLines(document) : toJson(document);
}

const FactDocumentSchema = z.object({
  identity: z.string().min(1),
  kind: z.enum(FACT_KINDS),
  qualified_name: z.string(),
  file_path: z.string().min(1),
  language: z.string(),
  span: z.object({
    start_line: z.number().int(),
    start_col: z.number().int(),
    end_line: z.number().int(),
    end_col: z.number().int(),
  }),
  signature_hash: z.string(),
  complexity: z.number().int().optional(),
});

const FullDocumentSchema = z.object({
  revision: z.string(),
  generated_at: z.string(),
  files_scanned: z.array(z.string()),
  files_failed: z.array(z.string()),
  facts: z.array(FactDocumentSchema),
});

/**
 * A JSON Lines full document starts with a one-line header object that
 * has no `facts`; anything else is read as a single JSON document
 */
function parseDocument(text: string): unknown {
  const lines = text.split("\n").filter((line) => line.trim().length > 0);
  const first = lines.length > 0 ? lines[0].trim() : "";
  if (!first.startsWith("{") || !first.endsWith("}")) {
    return JSON.parse(text);
  }
  const header: unknown = JSON.parse(first);
  if (typeof header !== "object" || header === null || "facts" in header) {
    return JSON.parse(text);
  }
  return { ...header, facts: lines.slice(1).map((line): unknown => JSON.parse(line)) };
}

/**
 * Read a previously written full-facts document, JSON or JSON Lines,
 * back into a snapshot
 */
export function readFullDocument(text: string, source = "<input>"): Snapshot {
  let raw: unknown;
  try {
    raw = parseDocument(text);
  } catch (error) {
    throw new SnapshotFormatError(source, [error instanceof Error ? error.message : String(error)]);
  }

  const parsed = FullDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotFormatError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }

  const doc = parsed.data;
  const failed = new Set(doc.files_failed);
  const scanned = new Set(doc.files_scanned);
  const byFile = new Map<string, Fact[]>();
  for (const entry of doc.facts) {
    const fact: Fact = {
      identity: entry.identity,
      kind: entry.kind,
      qualifiedName: entry.qualified_name.split("."),
      filePath: entry.file_path,
      language: entry.language,
      span: {
        startLine: entry.span.start_line,
        startCol: entry.span.start_col,
        endLine: entry.span.end_line,
        endCol: entry.span.end_col,
      },
      signatureHash: entry.signature_hash,
      ...(entry.complexity === undefined ? {} : { complexity: entry.complexity }),
    };
    const list = byFile.get(fact.filePath) ?? [];
    list.push(fact);
    byFile.set(fact.filePath, list);
  }

  const builder = new SnapshotBuilder(doc.revision, doc.generated_at);
  for (const filePath of scanned) {
    if (failed.has(filePath)) {
      builder.addFailure(filePath);
    } else {
      builder.addFile(filePath, byFile.get(filePath) ?? []);
    }
  }
  for (const [filePath, facts] of byFile) {
    if (!scanned.has(filePath)) {
      builder.addFile(filePath, facts);
    }
  }
  return builder.build();
}
