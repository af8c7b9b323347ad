import { compareStrings } from "../facts/fact-store.js";
import type { FileSource } from "./types.js";

/**
 * A revision held in memory
 */
export class MemorySource implements FileSource {
  private readonly files: Map<string, Uint8Array>;
  readonly cacheKey?: () => Promise<string>;

  constructor(
    readonly revision: string,
    files: Record<string, string | Uint8Array>,
    options: { cacheKey?: string } = {}
  ) {
    this.files = new Map(
      Object.entries(files).map(([path, content]) => [
        path,
        typeof content === "string" ? Buffer.from(content, "utf8") : content,
      ])
    );
    const { cacheKey } = options;
    if (cacheKey) {
      this.cacheKey = async () => cacheKey;
    }
  }

  async listFiles(): Promise<string[]> {
    return [...this.files.keys()].sort(compareStrings);
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    const content = this.files.get(filePath);
    if (!content) {
      throw new Error(`No such file in ${this.revision}: ${filePath}`);
    }
    return content;
  }
}
