export * from "./diagnostics/index.js";
export { ImportCache } from "./modules/cache.js";
export {
  createBundledResourceLocator,
  resolveResourceRoot,
} from "./modules/bundled.js";
export {
  ImportError,
  formatErrorMessage,
  moduleDiagnosticToDiagnostic,
} from "./modules/diagnostics.js";
export { createFsImportHost } from "./modules/fs-host.js";
export {
  createImporter,
  doImport,
  type DoImportOptions,
  type Importer,
  type ImporterOptions,
} from "./modules/import.js";
export { createMemoryImportHost } from "./modules/memory-host.js";
export { createNodePathAdapter } from "./modules/node-path-adapter.js";
export {
  MODULE_FILE_EXTENSION,
  STDLIB_DIR,
  STDLIB_MODULE_NAMES,
  isStdlibReference,
  moduleCandidates,
  resolveModulePath,
  type ModuleCandidates,
} from "./modules/path.js";
export { createPosixPathAdapter } from "./modules/path-adapter.js";
export { ModuleReference } from "./modules/reference.js";
export type * from "./modules/types.js";
export {
  isImportPerfEnabled,
  isImportTraceEnabled,
  snapshotImportPerfCounters,
} from "./perf.js";
