import { AsyncLocalStorage } from "node:async_hooks";
import { DiagnosticError } from "../diagnostics/index.js";
import {
  diffImportPerfCounters,
  incrementImportPerfCounter,
  isImportPerfEnabled,
  logImportPerfSummary,
  snapshotImportPerfCounters,
  traceImport,
} from "../perf.js";
import { ImportCache } from "./cache.js";
import { formatErrorMessage, ImportError } from "./diagnostics.js";
import { resolveModulePath } from "./path.js";
import type { ModuleReference } from "./reference.js";
import type {
  BundledResourceLocator,
  ImportHost,
  ModuleDiagnostic,
  ModuleImporter,
  ModuleInfo,
  ModuleParser,
  TypecheckContext,
  TypecheckFn,
} from "./types.js";

export type DoImportOptions<TModule, TTypeInfo> = {
  typecheck: TypecheckFn<TModule, TTypeInfo>;
  reference: ModuleReference;
  searchPaths?: readonly string[];
  cache: ImportCache<TModule, TTypeInfo>;
  host: ImportHost;
  parser: ModuleParser<TModule>;
  locateBundled?: BundledResourceLocator;
  /** Set for imports requested while another module is being typechecked. */
  importer?: ModuleImporter;
};

type ActiveLoad = {
  cache: object;
  importer: ModuleImporter;
};

// The module whose typecheck is running, so imports reaching this cache
// through any entry point count as waits of that module.
const activeLoad = new AsyncLocalStorage<ActiveLoad>();

const enclosingImporter = (
  cache: object
): ModuleImporter | undefined => {
  const active = activeLoad.getStore();
  return active?.cache === cache ? active.importer : undefined;
};

type StepFailure = Extract<
  ModuleDiagnostic["kind"],
  "parse-error" | "typecheck-error"
>;

/**
 * Imports `reference`: returns the cached module when there is one,
 * otherwise resolves, reads, parses and typechecks it and caches the result.
 * Importers of a module that is still loading share that load. Failures are
 * thrown as {@link ImportError} and leave nothing in the cache.
 */
export const doImport = async <TModule, TTypeInfo>(
  options: DoImportOptions<TModule, TTypeInfo>
): Promise<ModuleInfo<TModule, TTypeInfo>> => {
  const { reference, cache } = options;
  if (cache.contains(reference)) {
    incrementImportPerfCounter("imports.cache.hit");
    return cache.get(reference);
  }

  const pending = cache.pending(reference);
  const importer = options.importer ?? enclosingImporter(cache);
  if (!importer) {
    return pending ? sharePending(pending) : startImport(options);
  }

  const cycle = cache.beginWait(importer.reference, reference);
  if (cycle) {
    throw new ImportError({
      kind: "import-cycle",
      requested: reference,
      cycle,
      importer,
    });
  }

  try {
    return await (pending
      ? sharePending(pending)
      : startImport({ ...options, importer }));
  } finally {
    cache.endWait(importer.reference, reference);
  }
};

const sharePending = <T>(pending: Promise<T>): Promise<T> => {
  incrementImportPerfCounter("imports.cache.shared");
  return pending;
};

const startImport = <TModule, TTypeInfo>(
  options: DoImportOptions<TModule, TTypeInfo>
): Promise<ModuleInfo<TModule, TTypeInfo>> => {
  const { reference, cache } = options;
  incrementImportPerfCounter("imports.cache.miss");
  const startedAt = performance.now();
  const before = snapshotImportPerfCounters();

  const summarize = (success: boolean) => {
    if (!isImportPerfEnabled()) return;
    logImportPerfSummary({
      reference: reference.key,
      success,
      elapsedMs: performance.now() - startedAt,
      counters: diffImportPerfCounters({
        before,
        after: snapshotImportPerfCounters(),
      }),
    });
  };

  const load = loadModule(options).then(
    (info) => {
      summarize(true);
      return cache.put(reference, info);
    },
    (error: unknown) => {
      cache.discardPending(reference);
      incrementImportPerfCounter("imports.failed");
      summarize(false);
      throw error;
    }
  );
  cache.markPending(reference, load);
  return load;
};

const loadModule = async <TModule, TTypeInfo>(
  options: DoImportOptions<TModule, TTypeInfo>
): Promise<ModuleInfo<TModule, TTypeInfo>> => {
  const { reference, host, parser, typecheck, importer } = options;
  traceImport("import (uncached)", { module: reference.key });

  const resolution = await resolveModulePath({
    reference,
    searchPaths: options.searchPaths,
    host,
    locateBundled: options.locateBundled,
  });
  if (!resolution.found) {
    throw new ImportError({
      kind: "missing-module",
      requested: reference,
      attempted: resolution.attempted,
      workingDirectory: resolution.workingDirectory,
      importer,
    });
  }

  const { filePath } = resolution;
  const source = await host.readFile(filePath).catch((error: unknown) => {
    throw new ImportError(
      {
        kind: "io-error",
        requested: reference,
        filePath,
        message: formatErrorMessage(error),
        importer,
      },
      { cause: error }
    );
  });

  const name = reference.key;
  traceImport("parsing and typechecking: start", { module: name, filePath });

  const stepFailure = (kind: StepFailure) => (error: unknown) =>
    new ImportError(
      {
        kind,
        requested: reference,
        filePath,
        message:
          error instanceof DiagnosticError
            ? error.diagnostic.message
            : formatErrorMessage(error),
        span:
          error instanceof DiagnosticError ? error.diagnostic.span : undefined,
        importer,
      },
      { cause: error }
    );

  const module = await runStep(
    () => parser.parse({ moduleName: name, filePath, source }),
    stepFailure("parse-error")
  );
  incrementImportPerfCounter("imports.parse");

  const context: TypecheckContext<TModule, TTypeInfo> = {
    reference,
    filePath,
    importModule: (dependency) =>
      doImport({
        ...options,
        reference: dependency,
        importer: { reference, filePath },
      }),
  };
  const typeInfo = await runStep(
    () =>
      activeLoad.run(
        { cache: options.cache, importer: { reference, filePath } },
        () => typecheck(module, context)
      ),
    stepFailure("typecheck-error")
  );
  incrementImportPerfCounter("imports.typecheck");
  traceImport("parsing and typechecking: done", { module: name });

  return { reference, name, filePath, module, typeInfo };
};

// Import failures from nested imports already name the module that failed.
const runStep = async <T>(
  step: () => T | Promise<T>,
  fail: (error: unknown) => ImportError
): Promise<T> => {
  try {
    return await step();
  } catch (error) {
    if (error instanceof ImportError) {
      throw error;
    }
    throw fail(error);
  }
};

export type ImporterOptions<TModule, TTypeInfo> = Omit<
  DoImportOptions<TModule, TTypeInfo>,
  "reference" | "importer" | "cache"
> & {
  cache?: ImportCache<TModule, TTypeInfo>;
};

export type Importer<TModule, TTypeInfo> = {
  cache: ImportCache<TModule, TTypeInfo>;
  importModule(
    reference: ModuleReference
  ): Promise<ModuleInfo<TModule, TTypeInfo>>;
};

/** Binds the capabilities of one compilation session to a fresh or given cache. */
export const createImporter = <TModule, TTypeInfo>(
  options: ImporterOptions<TModule, TTypeInfo>
): Importer<TModule, TTypeInfo> => {
  const cache = options.cache ?? new ImportCache<TModule, TTypeInfo>();
  return {
    cache,
    importModule: (reference) => doImport({ ...options, cache, reference }),
  };
};
