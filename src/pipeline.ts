/**
 * Snapshot pipeline
 *
 * file source -> grammar registry -> parser -> extractor -> identity
 * resolver -> fact store, per revision; then delta and serialization.
 */

import { posix } from "node:path";
import type { FileSource } from "./sources/types.js";
import { getGrammarRegistry, type GrammarRegistry } from "./treesitter/language-map.js";
import { ParserRegistry } from "./treesitter/parser-registry.js";
import { FactExtractor } from "./treesitter/fact-extractor.js";
import type { Fact, LanguageResolution } from "./treesitter/types.js";
import { stamp } from "./facts/identity.js";
import { SnapshotBuilder, type Snapshot } from "./facts/fact-store.js";
import { diff, type Changeset } from "./facts/delta.js";
import { renderDelta, renderFull, serialize, type OutputFormat } from "./facts/serializer.js";
import { writeArtifacts } from "./facts/writer.js";
import type { SnapshotCache } from "./persistence/snapshot-cache.js";
import { silentLogger, type Logger } from "./logger.js";

export interface BuildOptions {
  registry?: GrammarRegistry;
  parsers?: ParserRegistry;
  extractor?: FactExtractor;
  /** Maximum files in flight (default 4) */
  workers?: number;
  /** Source of generated_at */
  clock?: () => Date;
  logger?: Logger;
}

/**
 * generated_at for this run: SOURCE_DATE_EPOCH when set, else now
 */
export function defaultClock(): Date {
  const epoch = process.env.SOURCE_DATE_EPOCH;
  if (epoch && /^\d+$/.test(epoch)) {
    return new Date(Number(epoch) * 1000);
  }
  return new Date();
}

async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<void>
): Promise<void> {
  let nextIndex = 0;
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      await task(items[index], index);
    }
  });
  await Promise.all(workers);
}

function firstLine(content: Uint8Array): string {
  const head = Buffer.from(content.subarray(0, 256)).toString("utf8");
  return head.split("\n", 1)[0];
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extract every supported file of a revision into a snapshot.
 *
 * Files are independent; up to `workers` are read and processed at a
 * time. Unsupported files are skipped; a file that cannot be read,
 * parsed or extracted is recorded as failed. Neither stops the build.
 */
export async function buildSnapshot(source: FileSource, options: BuildOptions = {}): Promise<Snapshot> {
  const registry = options.registry ?? getGrammarRegistry();
  const parsers = options.parsers ?? new ParserRegistry();
  const extractor = options.extractor ?? new FactExtractor();
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? defaultClock;

  const files = await source.listFiles();
  const builder = new SnapshotBuilder(source.revision, clock().toISOString());
  logger.info(`[snapshot] ${source.revision}: ${files.length} files`);

  await runWithConcurrency(files, options.workers ?? 4, async (filePath) => {
    let resolution: LanguageResolution = registry.resolve(filePath);
    let content: Uint8Array | null = null;

    if (!resolution.supported && !posix.extname(filePath)) {
      try {
        content = await source.readFile(filePath);
        resolution = registry.resolve(filePath, firstLine(content));
      } catch (error) {
        logger.debug(`[snapshot] ${filePath}: unreadable, skipped (${describe(error)})`);
      }
    }

    if (!resolution.supported) {
      logger.debug(`[snapshot] ${filePath}: skipped (${resolution.reason})`);
      builder.addSkipped(filePath);
      return;
    }
    const { handle } = resolution;

    if (!content) {
      try {
        content = await source.readFile(filePath);
      } catch (error) {
        logger.warn(`[snapshot] ${source.revision}:${filePath}: cannot read (${describe(error)})`);
        builder.addFailure(filePath);
        return;
      }
    }

    let facts: Fact[];
    try {
      const outcome = parsers.parse(handle, content);
      if (!outcome.ok) {
        const where = outcome.location ? ` at ${outcome.location.line}:${outcome.location.column}` : "";
        logger.warn(`[snapshot] ${source.revision}:${filePath}: ${outcome.reason}${where}`);
        builder.addFailure(filePath);
        return;
      }
      facts = stamp(extractor.extract(outcome.tree, filePath, handle));
    } catch (error) {
      logger.warn(`[snapshot] ${source.revision}:${filePath}: extraction failed (${describe(error)})`);
      builder.addFailure(filePath);
      return;
    }

    logger.debug(`[snapshot] ${filePath}: ${facts.length} facts (${handle.language})`);
    builder.addFile(filePath, facts);
  });

  const snapshot = builder.build();
  logger.info(
    `[snapshot] ${snapshot.revision}: ${snapshot.facts.size} facts, ` +
      `${snapshot.filesFailed.length} failed, ${snapshot.filesSkipped.length} skipped`
  );
  return snapshot;
}

export type BaselineInput =
  | { kind: "source"; source: FileSource }
  | { kind: "snapshot"; snapshot: Snapshot };

export interface FactDumpOptions extends BuildOptions {
  current: FileSource;
  baseline: BaselineInput;
  outFull: string;
  outDelta: string;
  /** Document encoding (default: indented JSON) */
  format?: OutputFormat;
  /** Reuse and store baseline snapshots of sources that have a cache key */
  cache?: SnapshotCache;
}

export interface FactDumpResult {
  baseline: Snapshot;
  current: Snapshot;
  changeset: Changeset;
}

async function resolveBaseline(options: FactDumpOptions, shared: BuildOptions): Promise<Snapshot> {
  const { baseline, cache } = options;
  const logger = options.logger ?? silentLogger;
  if (baseline.kind === "snapshot") {
    return baseline.snapshot;
  }

  const { source } = baseline;
  const key = cache && source.cacheKey ? await source.cacheKey() : null;
  if (cache && !key) {
    logger.debug(`[snapshot] ${source.revision}: source has no content key, not cached`);
  }

  const cached = key ? cache?.load(key, source.revision) : null;
  if (cached) {
    logger.info(`[snapshot] ${source.revision}: loaded from cache (${key})`);
    return cached;
  }

  const snapshot = await buildSnapshot(source, shared);
  if (key) {
    cache?.save(snapshot, key);
  }
  return snapshot;
}

/**
 * Build both revisions, diff them and write both documents atomically
 */
export async function runFactDump(options: FactDumpOptions): Promise<FactDumpResult> {
  const logger = options.logger ?? silentLogger;
  const shared: BuildOptions = {
    registry: options.registry,
    parsers: options.parsers ?? new ParserRegistry(),
    extractor: options.extractor ?? new FactExtractor(),
    workers: options.workers,
    clock: options.clock,
    logger,
  };

  const [baseline, current] = await Promise.all([
    resolveBaseline(options, shared),
    buildSnapshot(options.current, shared),
  ]);

  const changeset = diff(baseline, current);
  logger.info(
    `[delta] ${changeset.added.length} added, ${changeset.removed.length} removed, ` +
      `${changeset.modified.length} modified, ${changeset.degradedFiles.length} degraded`
  );

  await writeArtifacts([
    { path: options.outFull, content: serialize(renderFull(current), options.format) },
    { path: options.outDelta, content: serialize(renderDelta(changeset), options.format) },
  ]);
  logger.info(`[write] ${current.facts.size} facts -> ${options.outFull}`);
  logger.info(`[write] delta -> ${options.outDelta}`);

  return { baseline, current, changeset };
}
