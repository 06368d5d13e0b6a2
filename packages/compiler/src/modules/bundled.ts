import { createRequire } from "node:module";
import { dirname } from "node:path";
import type { BundledResourceLocator, ImportHost } from "./types.js";

const require = createRequire(import.meta.url);

const RESOURCE_ROOT_ENV = "IMPORTKIT_RESOURCE_ROOT";
const PACKAGE_MANIFEST = "@importkit/compiler/package.json";

/**
 * The directory packaged resources (the standard library among them) ship
 * in: `IMPORTKIT_RESOURCE_ROOT` when set, otherwise the installed
 * `@importkit/compiler` package.
 */
export const resolveResourceRoot = (): string | undefined => {
  const envRoot = process.env[RESOURCE_ROOT_ENV];
  if (envRoot) {
    return envRoot;
  }

  try {
    return dirname(require.resolve(PACKAGE_MANIFEST));
  } catch (error) {
    if (isModuleNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
};

export const createBundledResourceLocator = ({
  host,
  root = resolveResourceRoot(),
}: {
  host: ImportHost;
  root?: string;
}): BundledResourceLocator => {
  if (root === undefined) {
    return () => undefined;
  }
  const resourceRoot = host.path.resolve(host.cwd(), root);
  return (relativePath) => host.path.join(resourceRoot, relativePath);
};

const isModuleNotFoundError = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  error.code === "MODULE_NOT_FOUND";
