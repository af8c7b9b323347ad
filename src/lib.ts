/**
 * code-facts Library Entry Point
 *
 * This module exports the public API for programmatic use.
 */

// Pipeline
export {
  buildSnapshot,
  runFactDump,
  defaultClock,
  type BuildOptions,
  type BaselineInput,
  type FactDumpOptions,
  type FactDumpResult,
} from "./pipeline.js";

// Parsing and extraction
export * from "./treesitter/index.js";

// Facts
export { rawIdentity, signatureHash, stamp } from "./facts/identity.js";
export { SnapshotBuilder, buildFactStore, type Snapshot, type FileFacts } from "./facts/fact-store.js";
export { diff, compareFacts, qualifiedNameOf, type Changeset, type ModifiedFact } from "./facts/delta.js";
export {
  renderFact,
  renderFull,
  renderDelta,
  toJson,
  toJsonLines,
  serialize,
  readFullDocument,
  type OutputFormat,
  type FactDocument,
  type FullDocument,
  type DeltaDocument,
} from "./facts/serializer.js";
export { writeArtifacts, type Artifact } from "./facts/writer.js";

// File sources
export * from "./sources/index.js";

// Persistence
export { SnapshotCache } from "./persistence/snapshot-cache.js";

// Config
export { loadConfig, parseConfig, DEFAULT_CONFIG, CONFIG_FILE_NAME, type Config } from "./config.js";
export { GrammarConfigSchema, EXAMPLE_GRAMMAR, type GrammarConfig } from "./config/grammar-config.js";

// Errors and logging
export { FactCollisionError, OutputWriteError, ConfigError, SnapshotFormatError } from "./errors.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
