/**
 * File sources: where a revision's files come from
 */

/**
 * Lists and reads the files of one revision. Implementations must list
 * files as sorted, repository-relative posix paths.
 */
export interface FileSource {
  /** Label written into the documents (a commit sha, "HEAD", ...) */
  readonly revision: string;
  listFiles(): Promise<string[]>;
  readFile(filePath: string): Promise<Uint8Array>;
  /**
   * Key naming exactly this content, such as a resolved commit sha.
   * Sources without one are never cached.
   */
  cacheKey?(): Promise<string>;
}

export interface WalkOptions {
  /** Directory names never descended into */
  ignore?: readonly string[];
}

/**
 * Hidden paths (any dot-prefixed segment) and ignored directories are
 * never part of a revision
 */
export function isWalkable(relPath: string, ignore: readonly string[] = []): boolean {
  return relPath
    .split("/")
    .every((segment) => !segment.startsWith(".") && !ignore.includes(segment));
}
