import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  diagnosticCodes,
  diagnosticFromCode,
  emitDiagnostic,
  formatDiagnostic,
  normalizeSpan,
  reportDiagnostic,
} from "../index.js";

const span = { file: "M", start: 1, end: 3 };

describe("diagnostic utilities", () => {
  it("formats diagnostics with the inferred phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "CR0009",
      params: { kind: "undefined-identifier", name: "frob" },
      span,
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "M:1-3 ERROR [call-resolution] CR0009: undefined identifier frob",
    );
  });

  it("normalizes to the first available span", () => {
    const fallback = { file: "fallback", start: 0, end: 0 };
    expect(normalizeSpan(undefined, fallback)).toBe(fallback);
    expect(normalizeSpan().file).toBe("<unknown>");
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "CR0007",
      params: { kind: "recursive-return-inference", functionName: "fib" },
      span,
    });
    expect(diagnostic.hints?.[0]?.message).toBe(
      "Declare the return type explicitly.",
    );
  });

  it("renders ambiguous call candidates", () => {
    const diagnostic = diagnosticFromCode({
      code: "CR0002",
      params: { kind: "ambiguous-call", name: "f", candidates: ["f(int)", "f(real)"] },
      span,
    });
    expect(diagnostic.message).toBe(
      "ambiguous call to f; candidates: f(int), f(real)",
    );
  });

  it("mentions rejected candidates for unresolved calls", () => {
    const diagnostic = diagnosticFromCode({
      code: "CR0001",
      params: {
        kind: "no-matching-function",
        name: "g",
        actuals: ["int", "string"],
        rejected: 2,
      },
      span,
    });
    expect(diagnostic.message).toBe(
      "unable to resolve call to g(int, string) (2 candidate(s) rejected)",
    );
  });

  it("exposes every registered code", () => {
    expect(diagnosticCodes()).toContain("FD0001");
    expect(diagnosticCodes()).toContain("RS9999");
  });
});

describe("DiagnosticEmitter", () => {
  it("collects reported diagnostics", () => {
    const emitter = new DiagnosticEmitter();
    reportDiagnostic({
      ctx: emitter,
      code: "FD0001",
      params: { kind: "forwarding-cycle", typeName: "A" },
      span,
    });
    expect(emitter.diagnostics.map((d) => d.code)).toEqual(["FD0001"]);
    expect(emitter.diagnostics[0]?.phase).toBe("fields");
  });

  it("throws a DiagnosticError when emitting", () => {
    const emitter = new DiagnosticEmitter();
    let caught: unknown;
    try {
      emitDiagnostic({
        ctx: { diagnostics: emitter },
        code: "RS9999",
        params: { kind: "internal-error", message: "broken invariant" },
        span,
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DiagnosticError);
    if (caught instanceof DiagnosticError) {
      expect(caught.diagnostic.code).toBe("RS9999");
      expect(caught.diagnostic.phase).toBe("internal");
      expect(caught.diagnostics).toHaveLength(1);
    }
  });
});
