import { createHash } from "node:crypto";

/**
 * Hex sha256 digest truncated to `length` characters
 */
export function shortHash(text: string, length = 16): string {
  return createHash("sha256").update(text, "utf8").digest("hex").slice(0, length);
}
