import path from "node:path";
import type { ModulePathAdapter } from "./types.js";

export const createNodePathAdapter = (): ModulePathAdapter => ({
  resolve: path.resolve,
  join: path.join,
});
