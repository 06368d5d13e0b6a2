import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const searchPathHint: DiagnosticHint = {
  message:
    "Add the directory containing the module to the search path (--search-path or IMPORTKIT_PATH).",
};

type DiagnosticParamsMap = {
  MD0001:
    | {
        kind: "missing";
        requested: string;
        attempted: readonly string[];
        workingDirectory: string;
      }
    | { kind: "referenced-from"; importer: string };
  MD0002:
    | { kind: "read-failed"; requested: string; errorMessage?: string }
    | { kind: "requested-from"; importer: string };
  MD0003: { kind: "parse-failed"; requested: string; errorMessage?: string };
  MD0004: {
    kind: "typecheck-failed";
    requested: string;
    errorMessage?: string;
  };
  MD0005: { kind: "import-cycle"; cycle: readonly string[] };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const withReason = (base: string, errorMessage?: string): string =>
  errorMessage ? `${base}: ${errorMessage}` : base;

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  MD0001: {
    code: "MD0001",
    message: (params) =>
      params.kind === "missing"
        ? `Could not find source file for module ${params.requested}; attempted: [ ${params.attempted.join(" :: ")} ]; working directory: ${params.workingDirectory}`
        : `Referenced from ${params.importer}`,
    severity: "error",
    phase: "module-graph",
    hints: [searchPathHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0001"]>,
  MD0002: {
    code: "MD0002",
    message: (params) =>
      params.kind === "read-failed"
        ? withReason(`Unable to read module ${params.requested}`, params.errorMessage)
        : `Requested by ${params.importer}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0002"]>,
  MD0003: {
    code: "MD0003",
    message: (params) =>
      withReason(`Unable to parse module ${params.requested}`, params.errorMessage),
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0003"]>,
  MD0004: {
    code: "MD0004",
    message: (params) =>
      withReason(
        `Module ${params.requested} failed to typecheck`,
        params.errorMessage,
      ),
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0004"]>,
  MD0005: {
    code: "MD0005",
    message: (params) => `Import cycle detected: ${params.cycle.join(" -> ")}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0005"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  value in diagnosticsRegistry;
