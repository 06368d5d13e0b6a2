import { createPosixPathAdapter } from "./path-adapter.js";
import type { ImportHost, ModulePathAdapter } from "./types.js";

export const createMemoryImportHost = ({
  files,
  cwd = "/",
  pathAdapter = createPosixPathAdapter(),
}: {
  files: Record<string, string>;
  cwd?: string;
  pathAdapter?: ModulePathAdapter;
}): ImportHost => {
  const workingDirectory = pathAdapter.resolve("/", cwd);
  const normalizePath = (path: string) =>
    pathAdapter.resolve(workingDirectory, path);

  const normalized = new Map<string, string>(
    Object.entries(files).map(([path, contents]) => [
      normalizePath(path),
      contents,
    ])
  );

  return {
    path: pathAdapter,
    readFile: async (path: string) => {
      const resolved = normalizePath(path);
      const file = normalized.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      return file;
    },
    fileExists: async (path: string) => normalized.has(normalizePath(path)),
    cwd: () => workingDirectory,
  };
};
