import { describe, it, expect } from "vitest";
import {
  annotatePlaceholders,
  findPlaceholders,
  maskNonCode,
  placeholderDiagnostics,
} from "../../src/oracle/placeholders.js";
import { compiled, diag } from "../helpers/fakes.js";

describe("maskNonCode", () => {
  it("blanks comments and strings without moving offsets", () => {
    const content = 'def s := "sorry" -- sorry\n/- admit /- nested -/ -/ x';
    const masked = maskNonCode(content);

    expect(masked).toHaveLength(content.length);
    expect(masked).toBe(`def s := ${" ".repeat(7)} ${" ".repeat(8)}\n${" ".repeat(24)} x`);
  });
});

describe("findPlaceholders", () => {
  it("finds sorry and admit tokens in code", () => {
    const content = "theorem a : True := sorry\ntheorem b : True := by\n  admit\n";

    expect(findPlaceholders(content)).toEqual([
      { token: "sorry", line: 1, column: 20 },
      { token: "admit", line: 3, column: 2 },
    ]);
  });

  it("ignores identifiers that merely contain the words", () => {
    expect(findPlaceholders("def sorry_count := 0\ntheorem admit' : True := trivial\n#check Foo.sorry\n")).toEqual([]);
  });

  it("ignores comments and strings", () => {
    expect(findPlaceholders('-- remove sorry later\n/- admit -/\ndef s := "sorry"\n')).toEqual([]);
  });
});

describe("annotatePlaceholders", () => {
  it("adds a lint diagnostic for an unreported placeholder", () => {
    const result = annotatePlaceholders(compiled([]), "theorem a : True := sorry\n");

    expect(result.success).toBe(true);
    expect(result.diagnostics).toEqual([
      { severity: "error", message: "proof uses 'sorry'", line: 1, column: 20, kind: "lint" },
    ]);
  });

  it("leaves results with a sorry warning or a failure alone", () => {
    const warned = compiled([diag(1, 8, "declaration uses 'sorry'", "warning")]);
    const failed = compiled([diag(1, 0, "type mismatch")]);

    expect(annotatePlaceholders(warned, "theorem a : True := sorry\n")).toBe(warned);
    expect(annotatePlaceholders(failed, "theorem a : True := sorry\n")).toBe(failed);
  });
});

describe("placeholderDiagnostics", () => {
  it("keeps only sorry warnings and lint diagnostics", () => {
    const sorry = diag(2, 8, "declaration uses 'sorry'", "warning");
    const result = compiled([diag(1, 4, "unused variable `h`", "warning"), sorry]);

    expect(placeholderDiagnostics(result)).toEqual([sorry]);
  });
});
