export * from "./types.js";
export { DirectorySource } from "./directory-source.js";
export { GitRevisionSource, runGit, type GitRunner } from "./git-source.js";
export { MemorySource } from "./memory-source.js";
