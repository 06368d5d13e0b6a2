import {
  DiagnosticError,
  ModuleReference,
  createBundledResourceLocator,
  createFsImportHost,
  moduleDiagnosticToDiagnostic,
  resolveModulePath,
  type Diagnostic,
  type ImportHost,
} from "@importkit/compiler";
import { getConfig } from "./config/index.js";
import type { ImportkitConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { stringifyOutput } from "./output.js";

export type CliIo = {
  log: (line: string) => void;
  error: (line: string) => void;
};

const consoleIo: CliIo = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  process.exitCode = await runResolve(config);
}

/** Resolves `config.module` and reports the result. Returns the exit code. */
export const runResolve = async (
  config: ImportkitConfig,
  {
    host = createFsImportHost({ cwd: config.cwd }),
    io = consoleIo,
  }: { host?: ImportHost; io?: CliIo } = {}
): Promise<number> => {
  const reference = ModuleReference.parse(config.module);
  const resolution = await resolveModulePath({
    reference,
    searchPaths: config.searchPaths,
    host,
    locateBundled: createBundledResourceLocator({
      host,
      root: config.resourceRoot,
    }),
  });

  if (config.json) {
    io.log(stringifyOutput({ module: reference.key, ...resolution }));
    return resolution.found ? 0 : 1;
  }

  if (resolution.found) {
    io.log(resolution.filePath);
    return 0;
  }

  const diagnostic = moduleDiagnosticToDiagnostic({
    kind: "missing-module",
    requested: reference,
    attempted: resolution.attempted,
    workingDirectory: resolution.workingDirectory,
  });
  io.error(formatCliDiagnostic(diagnostic, { color: config.color }));
  return 1;
};

function errorHandler(error: unknown) {
  const diagnostic = extractDiagnostic(error);
  console.error(diagnostic ? formatCliDiagnostic(diagnostic) : error);
  process.exit(1);
}

const extractDiagnostic = (error: unknown): Diagnostic | undefined =>
  error instanceof DiagnosticError ? error.diagnostic : undefined;
