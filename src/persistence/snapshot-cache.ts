/**
 * SnapshotCache - SQLite store of previously built snapshots
 *
 * Lets a baseline revision be extracted once and diffed against many
 * later ones. Entries are keyed by something that names exactly their
 * content (a commit sha), never by a ref that can move, and are tagged
 * with the grammar registry fingerprint; an entry built under a
 * different table is treated as absent.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import { isFactKind, type Fact } from "../treesitter/types.js";
import { SnapshotBuilder, type Snapshot } from "../facts/fact-store.js";

interface SnapshotRow {
  revision: string;
  fingerprint: string;
  generated_at: string;
  files_scanned: string;
  files_failed: string;
  files_skipped: string;
}

interface FactRow {
  identity: string;
  kind: string;
  qualified_name: string;
  file_path: string;
  language: string;
  start_line: number;
  start_col: number;
  end_line: number;
  end_col: number;
  signature_hash: string;
  complexity: number | null;
}

const StringListSchema = z.array(z.string());

function parseList(json: string): string[] {
  return StringListSchema.parse(JSON.parse(json));
}

export class SnapshotCache {
  private db: Database.Database | null;

  /**
   * @param path database file, or ":memory:"
   * @param fingerprint grammar registry fingerprint the cached snapshots must match
   */
  constructor(
    path: string,
    private readonly fingerprint: string
  ) {
    this.db = new Database(path);
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
  }

  private initSchema(): void {
    this.getDb().exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        revision TEXT PRIMARY KEY,
        fingerprint TEXT NOT NULL,
        generated_at TEXT NOT NULL,
        files_scanned TEXT NOT NULL,
        files_failed TEXT NOT NULL,
        files_skipped TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS facts (
        revision TEXT NOT NULL,
        identity TEXT NOT NULL,
        kind TEXT NOT NULL,
        qualified_name TEXT NOT NULL,
        file_path TEXT NOT NULL,
        language TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        start_col INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        end_col INTEGER NOT NULL,
        signature_hash TEXT NOT NULL,
        complexity INTEGER,
        PRIMARY KEY (revision, identity),
        FOREIGN KEY (revision) REFERENCES snapshots(revision) ON DELETE CASCADE
      );
    `);
  }

  /**
   * Check if database is open
   */
  isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Store a snapshot under `key` (default: its revision), replacing any
   * earlier entry
   */
  save(snapshot: Snapshot, key: string = snapshot.revision): void {
    const db = this.getDb();

    const deleteSnapshot = db.prepare<[string]>("DELETE FROM snapshots WHERE revision = ?");
    const insertSnapshot = db.prepare<[string, string, string, string, string, string]>(`
      INSERT INTO snapshots (revision, fingerprint, generated_at, files_scanned, files_failed, files_skipped)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertFact = db.prepare<
      [string, string, string, string, string, string, number, number, number, number, string, number | null]
    >(`
      INSERT INTO facts (revision, identity, kind, qualified_name, file_path, language,
        start_line, start_col, end_line, end_col, signature_hash, complexity)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const saveAll = db.transaction((snap: Snapshot) => {
      deleteSnapshot.run(key);
      insertSnapshot.run(
        key,
        this.fingerprint,
        snap.generatedAt,
        JSON.stringify(snap.filesScanned),
        JSON.stringify(snap.filesFailed),
        JSON.stringify(snap.filesSkipped)
      );
      for (const fact of snap.facts.values()) {
        insertFact.run(
          key,
          fact.identity,
          fact.kind,
          JSON.stringify(fact.qualifiedName),
          fact.filePath,
          fact.language,
          fact.span.startLine,
          fact.span.startCol,
          fact.span.endLine,
          fact.span.endCol,
          fact.signatureHash,
          fact.complexity ?? null
        );
      }
    });

    saveAll(snapshot);
  }

  /**
   * Load a snapshot, or null when absent or built under another grammar
   * table. The snapshot is labelled `revision` (default: the key).
   */
  load(key: string, revision: string = key): Snapshot | null {
    const db = this.getDb();
    const row = db
      .prepare<[string], SnapshotRow>("SELECT * FROM snapshots WHERE revision = ?")
      .get(key);
    if (!row || row.fingerprint !== this.fingerprint) return null;

    const rows = db
      .prepare<[string], FactRow>(
        `SELECT identity, kind, qualified_name, file_path, language, start_line, start_col,
           end_line, end_col, signature_hash, complexity
         FROM facts WHERE revision = ? ORDER BY identity`
      )
      .all(key);

    const byFile = new Map<string, Fact[]>();
    for (const factRow of rows) {
      const fact = this.toFact(factRow);
      const list = byFile.get(fact.filePath) ?? [];
      list.push(fact);
      byFile.set(fact.filePath, list);
    }

    const failed = new Set(parseList(row.files_failed));
    const builder = new SnapshotBuilder(revision, row.generated_at);
    for (const filePath of parseList(row.files_scanned)) {
      if (failed.has(filePath)) {
        builder.addFailure(filePath);
      } else {
        builder.addFile(filePath, byFile.get(filePath) ?? []);
      }
    }
    for (const filePath of parseList(row.files_skipped)) {
      builder.addSkipped(filePath);
    }
    return builder.build();
  }

  /**
   * Check for a usable entry
   */
  has(key: string): boolean {
    const row = this.getDb()
      .prepare<[string], { fingerprint: string }>("SELECT fingerprint FROM snapshots WHERE revision = ?")
      .get(key);
    return row !== undefined && row.fingerprint === this.fingerprint;
  }

  /**
   * Delete a snapshot and its facts
   */
  delete(key: string): boolean {
    const result = this.getDb()
      .prepare<[string]>("DELETE FROM snapshots WHERE revision = ?")
      .run(key);
    return result.changes > 0;
  }

  /**
   * Cached keys, sorted
   */
  listRevisions(): string[] {
    return this.getDb()
      .prepare<[], { revision: string }>("SELECT revision FROM snapshots ORDER BY revision")
      .all()
      .map((r) => r.revision);
  }

  /**
   * Close the database
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private getDb(): Database.Database {
    if (!this.db) throw new Error("Database not open");
    return this.db;
  }

  private toFact(row: FactRow): Fact {
    if (!isFactKind(row.kind)) {
      throw new Error(`Unknown fact kind in cache: ${row.kind}`);
    }
    return {
      identity: row.identity,
      kind: row.kind,
      qualifiedName: parseList(row.qualified_name),
      filePath: row.file_path,
      language: row.language,
      span: {
        startLine: row.start_line,
        startCol: row.start_col,
        endLine: row.end_line,
        endCol: row.end_col,
      },
      signatureHash: row.signature_hash,
      ...(row.complexity === null ? {} : { complexity: row.complexity }),
    };
  }
}
