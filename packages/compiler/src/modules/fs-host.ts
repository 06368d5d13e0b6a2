import { readFile, stat } from "node:fs/promises";
import type { ImportHost } from "./types.js";
import { createNodePathAdapter } from "./node-path-adapter.js";

export const createFsImportHost = ({
  cwd,
}: {
  cwd?: string;
} = {}): ImportHost => {
  const knownFiles = new Set<string>();
  const pathAdapter = createNodePathAdapter();
  const workingDirectory = pathAdapter.resolve(cwd ?? process.cwd());

  // Only hits are remembered: a file created after a miss must be found on retry.
  const fileExists = async (path: string): Promise<boolean> => {
    if (knownFiles.has(path)) {
      return true;
    }
    const result = await stat(path).then((info) => info.isFile()).catch(() => false);
    if (result) {
      knownFiles.add(path);
    }
    return result;
  };

  return {
    path: pathAdapter,
    readFile: (path: string) => readFile(path, "utf8"),
    fileExists,
    cwd: () => workingDirectory,
  };
};
