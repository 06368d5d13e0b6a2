import { incrementImportPerfCounter, traceImport } from "../perf.js";
import type { ModuleReference } from "./reference.js";
import type {
  BundledResourceLocator,
  ImportHost,
  ModuleResolution,
} from "./types.js";

export const MODULE_FILE_EXTENSION = ".x";
export const STDLIB_DIR = "stdlib";
export const STDLIB_MODULE_NAMES: ReadonlySet<string> = new Set([
  "std",
  "float32",
  "bfloat16",
]);

export type ModuleCandidates = {
  primary: string;
  /**
   * Every segment but the first. Build layouts that strip the leading
   * directory still find the module through it.
   */
  parentStripped?: string;
};

export const isStdlibReference = (reference: ModuleReference): boolean => {
  const [name] = reference.segments;
  return (
    reference.segments.length === 1 &&
    name !== undefined &&
    STDLIB_MODULE_NAMES.has(name)
  );
};

export const moduleCandidates = (
  reference: ModuleReference
): ModuleCandidates => {
  if (isStdlibReference(reference)) {
    return {
      primary: `${STDLIB_DIR}/${reference.key}${MODULE_FILE_EXTENSION}`,
    };
  }

  const { segments } = reference;
  return {
    primary: `${segments.join("/")}${MODULE_FILE_EXTENSION}`,
    parentStripped:
      segments.length > 1
        ? `${segments.slice(1).join("/")}${MODULE_FILE_EXTENSION}`
        : undefined,
  };
};

/**
 * Finds the source file for `reference`. Tries, stopping at the first file
 * that exists:
 *
 * 1. the primary candidate under the working directory, then through the
 *    bundled-resource lookup;
 * 2. the parent-stripped candidate the same two ways;
 * 3. each search path in order, primary before parent-stripped.
 *
 * Every path checked is listed in `attempted`, in the order it was tried.
 */
export const resolveModulePath = async ({
  reference,
  searchPaths = [],
  host,
  locateBundled,
}: {
  reference: ModuleReference;
  searchPaths?: readonly string[];
  host: ImportHost;
  locateBundled?: BundledResourceLocator;
}): Promise<ModuleResolution> => {
  const workingDirectory = host.cwd();
  const candidates = moduleCandidates(reference);
  const attempted: string[] = [];

  const tryPath = async (fullPath: string): Promise<string | undefined> => {
    traceImport("trying path", { path: fullPath });
    incrementImportPerfCounter("imports.resolve.attempts");
    attempted.push(fullPath);
    if (!(await host.fileExists(fullPath))) {
      return undefined;
    }
    traceImport("found existing file for import", {
      module: reference.key,
      path: fullPath,
    });
    return fullPath;
  };

  const tryUnder = (root: string, candidate: string) =>
    tryPath(host.path.resolve(workingDirectory, root, candidate));

  const tryBundled = async (candidate: string) => {
    const located = await locateBundled?.(candidate);
    return located === undefined
      ? undefined
      : tryPath(host.path.resolve(workingDirectory, located));
  };

  const tryLocal = async (candidate: string) =>
    (await tryUnder(workingDirectory, candidate)) ??
    (await tryBundled(candidate));

  const local =
    (await tryLocal(candidates.primary)) ??
    (candidates.parentStripped !== undefined
      ? await tryLocal(candidates.parentStripped)
      : undefined);
  if (local !== undefined) {
    return { found: true, filePath: local, attempted };
  }

  for (const searchPath of searchPaths) {
    traceImport("attempting search path root", { root: searchPath });
    const found =
      (await tryUnder(searchPath, candidates.primary)) ??
      (candidates.parentStripped !== undefined
        ? await tryUnder(searchPath, candidates.parentStripped)
        : undefined);
    if (found !== undefined) {
      return { found: true, filePath: found, attempted };
    }
  }

  return { found: false, attempted, workingDirectory };
};
