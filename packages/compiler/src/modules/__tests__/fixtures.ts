import { vi } from "vitest";
import { createDiagnostic, DiagnosticError } from "../../diagnostics/index.js";
import { ModuleReference } from "../reference.js";
import type {
  ModuleParser,
  ParseModuleInput,
  TypecheckContext,
} from "../types.js";

export type TestModule = {
  name: string;
  filePath: string;
  imports: string[];
  body: string[];
};

export type TestTypeInfo = {
  module: string;
  dependencies: string[];
};

/**
 * Line-based stand-in for a real parser: `import a.b` lines are imports, a
 * `!` anywhere is a syntax error.
 */
export const createTestParser = () => {
  const parse = vi.fn(
    ({ moduleName, filePath, source }: ParseModuleInput): TestModule => {
      const badToken = source.indexOf("!");
      if (badToken !== -1) {
        throw new DiagnosticError(
          createDiagnostic({
            code: "PS0001",
            message: "unexpected token '!'",
            span: { file: filePath, start: badToken, end: badToken + 1 },
          })
        );
      }

      const lines = source
        .split("\n")
        .map((line) => line.trim())
        .filter(Boolean);
      return {
        name: moduleName,
        filePath,
        imports: lines
          .filter((line) => line.startsWith("import "))
          .map((line) => line.slice("import ".length)),
        body: lines.filter((line) => !line.startsWith("import ")),
      };
    }
  );
  return { parse } satisfies ModuleParser<TestModule>;
};

/** Imports every dependency in order; a `type-error` line fails the check. */
export const createTestTypechecker = () =>
  vi.fn(
    async (
      module: TestModule,
      context: TypecheckContext<TestModule, TestTypeInfo>
    ): Promise<TestTypeInfo> => {
      const dependencies: string[] = [];
      for (const dependency of module.imports) {
        const info = await context.importModule(
          ModuleReference.parse(dependency)
        );
        dependencies.push(info.name);
      }

      if (module.body.includes("type-error")) {
        throw new DiagnosticError(
          createDiagnostic({
            code: "TY0001",
            message: "mismatched types",
            span: { file: module.filePath, start: 0, end: 10 },
          })
        );
      }

      return { module: module.name, dependencies };
    }
  );
