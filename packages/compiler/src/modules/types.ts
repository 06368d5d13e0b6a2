import type { SourceSpan } from "../diagnostics/index.js";
import type { ModuleReference } from "./reference.js";

export interface ModulePathAdapter {
  resolve(...parts: string[]): string;
  join(...parts: string[]): string;
}

/** Filesystem capability the importer reads through. */
export interface ImportHost {
  path: ModulePathAdapter;
  readFile(path: string): Promise<string>;
  fileExists(path: string): Promise<boolean>;
  cwd(): string;
}

/**
 * absolute location, or `undefined` when the program has no resource root.
 * The importer checks the returned location for existence itself.
 */
export type BundledResourceLocator = (
  relativePath: string,
) => string | undefined | Promise<string | undefined>;

export type ModuleResolution =
  | {
      found: true;
      filePath: string;
      attempted: readonly string[];
    }
  | {
      found: false;
      attempted: readonly string[];
      workingDirectory: string;
    };

/** The parsed and typechecked form of one module, shared by every importer. */
export interface ModuleInfo<TModule, TTypeInfo> {
  readonly reference: ModuleReference;
  /** Segments joined by `.`; the name the parser was given. */
  readonly name: string;
  readonly filePath: string;
  readonly module: TModule;
  readonly typeInfo: TTypeInfo;
}

export type ParseModuleInput = {
  moduleName: string;
  filePath: string;
  source: string;
};

export interface ModuleParser<TModule> {
  parse(input: ParseModuleInput): TModule | Promise<TModule>;
}

export type TypecheckContext<TModule, TTypeInfo> = {
  reference: ModuleReference;
  filePath: string;
  /** Imports a dependency of the module being checked through the same cache. */
  importModule(
    reference: ModuleReference
  ): Promise<ModuleInfo<TModule, TTypeInfo>>;
};

export type TypecheckFn<TModule, TTypeInfo> = (
  module: TModule,
  context: TypecheckContext<TModule, TTypeInfo>
) => TTypeInfo | Promise<TTypeInfo>;

/** The module whose typecheck requested an import. */
export type ModuleImporter = {
  reference: ModuleReference;
  filePath: string;
};

export type ModuleDiagnostic =
  | {
      kind: "missing-module";
      requested: ModuleReference;
      attempted: readonly string[];
      workingDirectory: string;
      importer?: ModuleImporter;
    }
  | {
      kind: "io-error" | "parse-error" | "typecheck-error";
      requested: ModuleReference;
      filePath: string;
      message: string;
      importer?: ModuleImporter;
      span?: SourceSpan;
    }
  | {
      kind: "import-cycle";
      requested: ModuleReference;
      cycle: readonly ModuleReference[];
      importer?: ModuleImporter;
    };
