import { describe, expect, it } from "vitest";
import {
  createDiagnostic,
  diagnosticCodes,
  DiagnosticError,
  diagnosticFromCode,
  formatDiagnostic,
  normalizeSpan,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with the registry phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "MD0005",
      params: { kind: "import-cycle", cycle: ["a", "b", "a"] },
      span: { file: "/work/b.x", start: 1, end: 3 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "/work/b.x:1-3 ERROR [module-graph] MD0005: Import cycle detected: a -> b -> a"
    );
  });

  it("infers a phase from the code prefix of collaborator diagnostics", () => {
    const diagnostic = createDiagnostic({
      code: "ps0002",
      message: "unterminated string",
      span: { file: "a.x", start: 0, end: 1 },
    });
    expect(diagnostic.phase).toBe("parsing");
    expect(diagnostic.severity).toBe("error");
    expect(
      createDiagnostic({
        code: "XX0001",
        message: "custom",
        span: { file: "a.x", start: 0, end: 0 },
      }).phase
    ).toBeUndefined();
  });

  it("normalizes to the first available span", () => {
    const fallback = { file: "fallback", start: 0, end: 0 };
    expect(normalizeSpan(undefined, fallback)).toBe(fallback);
    expect(normalizeSpan()).toEqual({ file: "<unknown>", start: 0, end: 0 });
  });

  it("carries registry hints onto missing-module diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "MD0001",
      params: {
        kind: "missing",
        requested: "a.b",
        attempted: ["/work/a/b.x", "/work/b.x"],
        workingDirectory: "/work",
      },
      span: normalizeSpan(),
    });

    expect(diagnostic.message).toBe(
      "Could not find source file for module a.b; attempted: [ /work/a/b.x :: /work/b.x ]; working directory: /work"
    );
    expect(diagnostic.hints?.[0]?.message).toContain("--search-path");
  });

  it("omits the reason when a step failed without a message", () => {
    const diagnostic = diagnosticFromCode({
      code: "MD0004",
      params: { kind: "typecheck-failed", requested: "a" },
      span: normalizeSpan(),
    });
    expect(diagnostic.message).toBe("Module a failed to typecheck");
  });

  it("keeps every diagnostic on a DiagnosticError", () => {
    const first = diagnosticFromCode({
      code: "MD0003",
      params: { kind: "parse-failed", requested: "a", errorMessage: "bad" },
      span: { file: "a.x", start: 2, end: 4 },
    });
    const note = createDiagnostic({
      code: "PS0001",
      message: "unexpected token",
      span: { file: "a.x", start: 2, end: 4 },
      severity: "note",
    });
    const cause = new Error("bad");

    const error = new DiagnosticError(first, [first, note], { cause });

    expect(error.message).toBe(
      "a.x:2-4 ERROR [module-graph] MD0003: Unable to parse module a: bad"
    );
    expect(error.diagnostics).toEqual([first, note]);
    expect(error.cause).toBe(cause);
    expect(new DiagnosticError(first).diagnostics).toEqual([first]);
  });

  it("lists every registered code", () => {
    expect(diagnosticCodes()).toEqual([
      "MD0001",
      "MD0002",
      "MD0003",
      "MD0004",
      "MD0005",
    ]);
  });
});
