/**
 * All-or-nothing artifact writing
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";
import { OutputWriteError } from "../errors.js";

export interface Artifact {
  path: string;
  content: string;
}

function tempPathFor(path: string): string {
  return `${path}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
}

async function removeAll(paths: string[]): Promise<void> {
  // Cleanup on a path that is already failing; the original error is what gets reported
  await Promise.allSettled(paths.map((path) => rm(path, { force: true })));
}

/**
 * Write every artifact to a temporary sibling, then rename them all into
 * place. If anything fails, temporaries and already-renamed targets are
 * removed and OutputWriteError names the failing path.
 */
export async function writeArtifacts(artifacts: readonly Artifact[]): Promise<void> {
  const staged: Array<{ temp: string; path: string }> = [];

  for (const artifact of artifacts) {
    const temp = tempPathFor(artifact.path);
    try {
      await mkdir(dirname(artifact.path), { recursive: true });
      await writeFile(temp, artifact.content, "utf-8");
    } catch (error) {
      await removeAll([temp, ...staged.map((entry) => entry.temp)]);
      throw new OutputWriteError(artifact.path, error);
    }
    staged.push({ temp, path: artifact.path });
  }

  const committed: string[] = [];
  for (const [index, entry] of staged.entries()) {
    try {
      await rename(entry.temp, entry.path);
    } catch (error) {
      await removeAll([...staged.slice(index).map((rest) => rest.temp), ...committed]);
      throw new OutputWriteError(entry.path, error);
    }
    committed.push(entry.path);
  }
}
