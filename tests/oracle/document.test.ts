import { describe, it, expect } from "vitest";
import { documentFile, type DocumentDeps } from "../../src/oracle/document.js";
import { GenerationError } from "../../src/oracle/errors.js";
import { BUDGET, FakeCollector, QueueGenerator, diag, filePatch } from "../helpers/fakes.js";

const SOURCE = "theorem a : 0 = 0 := rfl\n";
const DOCUMENTED = "-- Zero equals itself.\ntheorem a : 0 = 0 := rfl\n";

function documentDeps(generator: QueueGenerator, collector: FakeCollector): DocumentDeps {
  return { collector, generator, compileTimeoutMs: 1000, budget: BUDGET };
}

describe("documentFile", () => {
  it("keeps documentation that still compiles", async () => {
    const generator = new QueueGenerator([() => ({ ok: true, value: filePatch("gen-document-1", DOCUMENTED, SOURCE) })]);
    const collector = new FakeCollector(() => []);

    const result = await documentFile(SOURCE, documentDeps(generator, collector));

    expect(result.documented).toBe(true);
    expect(result.content).toBe(DOCUMENTED);
    expect(collector.compiled).toEqual([DOCUMENTED]);
    expect(generator.requests[0]?.mode).toBe("document");
  });

  it("returns the original when the documented file breaks", async () => {
    const broken = "/- unterminated\ntheorem a : 0 = 0 := rfl\n";
    const generator = new QueueGenerator([() => ({ ok: true, value: filePatch("gen-document-1", broken, SOURCE) })]);
    const collector = new FakeCollector((c) => (c.startsWith("/-") ? [diag(1, 0, "unterminated comment")] : []));

    const result = await documentFile(SOURCE, documentDeps(generator, collector));

    expect(result).toEqual({
      content: SOURCE,
      documented: false,
      reason: "documented file does not compile (1 diagnostics)",
    });
  });

  it("returns the original when generation fails", async () => {
    const generator = new QueueGenerator([
      () => ({ ok: false, error: new GenerationError("file exceeds the prompt budget for document mode", "budget") }),
    ]);
    const collector = new FakeCollector(() => []);

    const result = await documentFile(SOURCE, documentDeps(generator, collector));

    expect(result.content).toBe(SOURCE);
    expect(result.reason).toBe("file exceeds the prompt budget for document mode");
    expect(collector.calls).toBe(0);
  });
});
