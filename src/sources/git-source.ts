import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { compareStrings } from "../facts/fact-store.js";
import { isWalkable, type FileSource, type WalkOptions } from "./types.js";

const execFileAsync = promisify(execFile);

/**
 * Runs git with the given arguments in `cwd` and resolves to stdout
 */
export type GitRunner = (args: string[], cwd: string) => Promise<Buffer>;

const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export const runGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync("git", args, {
    cwd,
    encoding: "buffer",
    maxBuffer: MAX_OUTPUT_BYTES,
  });
  return stdout;
};

// Regular and executable blobs; symlinks (120000) and submodules (160000) are skipped
const FILE_MODES = new Set(["100644", "100755"]);

/**
 * A revision read straight from the object database with `git ls-tree`
 * and `git show`, without touching the working tree. The revision is
 * resolved to a commit sha once; every read uses that sha, so a moving
 * ref such as HEAD~1 cannot change underneath a run.
 */
export class GitRevisionSource implements FileSource {
  private readonly ignore: readonly string[];
  private readonly git: GitRunner;
  private commit: Promise<string> | null = null;

  constructor(
    private readonly root: string,
    readonly revision: string,
    options: WalkOptions & { git?: GitRunner } = {}
  ) {
    this.ignore = options.ignore ?? [];
    this.git = options.git ?? runGit;
  }

  /**
   * Commit sha the revision names
   */
  resolveCommit(): Promise<string> {
    if (!this.commit) {
      this.commit = this.git(["rev-parse", "--verify", `${this.revision}^{commit}`], this.root).then(
        (output) => {
          const sha = output.toString("utf8").trim();
          if (!/^[0-9a-f]{40,64}$/.test(sha)) {
            throw new Error(`Cannot resolve revision '${this.revision}': unexpected output '${sha}'`);
          }
          return sha;
        }
      );
    }
    return this.commit;
  }

  cacheKey(): Promise<string> {
    return this.resolveCommit();
  }

  async listFiles(): Promise<string[]> {
    const commit = await this.resolveCommit();
    const output = await this.git(["ls-tree", "-r", "-z", commit], this.root);
    const files: string[] = [];
    for (const record of output.toString("utf8").split("\0")) {
      // <mode> SP <type> SP <object> TAB <path>
      const tab = record.indexOf("\t");
      if (tab === -1) continue;
      const [mode] = record.slice(0, tab).split(" ");
      const path = record.slice(tab + 1);
      if (FILE_MODES.has(mode) && isWalkable(path, this.ignore)) {
        files.push(path);
      }
    }
    return files.sort(compareStrings);
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    const commit = await this.resolveCommit();
    return this.git(["show", `${commit}:${filePath}`], this.root);
  }
}
