import { posix } from "node:path";
import type { ModulePathAdapter } from "./types.js";

/**
 * POSIX semantics regardless of platform, for hosts whose paths are not
 * backed by the real filesystem.
 */
export const createPosixPathAdapter = (): ModulePathAdapter => ({
  resolve: posix.resolve,
  join: posix.join,
});
