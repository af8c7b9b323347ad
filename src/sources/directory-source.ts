import { readdir, readFile } from "node:fs/promises";
import { join, posix } from "node:path";
import { compareStrings } from "../facts/fact-store.js";
import { isWalkable, type FileSource, type WalkOptions } from "./types.js";

/**
 * A revision materialized as a directory on disk. Symlinks are not followed.
 */
export class DirectorySource implements FileSource {
  private readonly ignore: readonly string[];

  constructor(
    private readonly root: string,
    readonly revision: string,
    options: WalkOptions = {}
  ) {
    this.ignore = options.ignore ?? [];
  }

  async listFiles(): Promise<string[]> {
    const files: string[] = [];
    await this.walk("", files);
    return files.sort(compareStrings);
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    return readFile(join(this.root, ...filePath.split("/")));
  }

  private async walk(relDir: string, files: string[]): Promise<void> {
    const entries = await readdir(join(this.root, relDir), { withFileTypes: true });
    for (const entry of entries) {
      const relPath = relDir ? posix.join(relDir, entry.name) : entry.name;
      if (entry.isSymbolicLink() || !isWalkable(relPath, this.ignore)) continue;

      if (entry.isDirectory()) {
        await this.walk(relPath, files);
      } else if (entry.isFile()) {
        files.push(relPath);
      }
    }
  }
}
