import {
  DiagnosticError,
  diagnosticFromCode,
  normalizeSpan,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { ModuleDiagnostic } from "./types.js";

const fileSpan = (file: string): SourceSpan => ({ file, start: 0, end: 0 });

export const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const moduleDiagnosticToDiagnostic = (
  diagnostic: ModuleDiagnostic
): Diagnostic => {
  const requested = diagnostic.requested.key;
  const importer = diagnostic.importer?.reference.key;
  const importerSpan = diagnostic.importer
    ? fileSpan(diagnostic.importer.filePath)
    : undefined;

  switch (diagnostic.kind) {
    case "missing-module": {
      const related =
        importer && importerSpan
          ? [
              diagnosticFromCode({
                code: "MD0001",
                params: { kind: "referenced-from", importer },
                span: importerSpan,
                severity: "note",
              }),
            ]
          : undefined;

      return diagnosticFromCode({
        code: "MD0001",
        params: {
          kind: "missing",
          requested,
          attempted: diagnostic.attempted,
          workingDirectory: diagnostic.workingDirectory,
        },
        span: normalizeSpan(importerSpan),
        related,
      });
    }
    case "io-error": {
      const related =
        importer && importerSpan
          ? [
              diagnosticFromCode({
                code: "MD0002",
                params: { kind: "requested-from", importer },
                span: importerSpan,
                severity: "note",
              }),
            ]
          : undefined;

      return diagnosticFromCode({
        code: "MD0002",
        params: {
          kind: "read-failed",
          requested,
          errorMessage: diagnostic.message || undefined,
        },
        span: fileSpan(diagnostic.filePath),
        related,
      });
    }
    case "parse-error":
      return diagnosticFromCode({
        code: "MD0003",
        params: {
          kind: "parse-failed",
          requested,
          errorMessage: diagnostic.message || undefined,
        },
        span: normalizeSpan(diagnostic.span, fileSpan(diagnostic.filePath)),
      });
    case "typecheck-error":
      return diagnosticFromCode({
        code: "MD0004",
        params: {
          kind: "typecheck-failed",
          requested,
          errorMessage: diagnostic.message || undefined,
        },
        span: normalizeSpan(diagnostic.span, fileSpan(diagnostic.filePath)),
      });
    case "import-cycle":
      return diagnosticFromCode({
        code: "MD0005",
        params: {
          kind: "import-cycle",
          cycle: diagnostic.cycle.map((reference) => reference.key),
        },
        span: normalizeSpan(importerSpan),
      });
  }
};

/**
 * A failed import. `moduleDiagnostic` says which step failed; diagnostics
 * reported by the parser or typechecker follow the import's own diagnostic in
 * `diagnostics`, unchanged.
 */
export class ImportError extends DiagnosticError {
  readonly moduleDiagnostic: ModuleDiagnostic;

  constructor(
    moduleDiagnostic: ModuleDiagnostic,
    options: { cause?: unknown } = {}
  ) {
    const diagnostic = moduleDiagnosticToDiagnostic(moduleDiagnostic);
    const reported =
      options.cause instanceof DiagnosticError ? options.cause.diagnostics : [];
    super(diagnostic, [diagnostic, ...reported], options);
    this.name = "ImportError";
    this.moduleDiagnostic = moduleDiagnostic;
  }

  get kind(): ModuleDiagnostic["kind"] {
    return this.moduleDiagnostic.kind;
  }
}
