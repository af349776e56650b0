/**
 * Repair Loop Tests
 */

import { describe, it, expect } from "vitest";
import { GenerationError, ParseError } from "../../src/oracle/errors.js";
import { createSessionLogger } from "../../src/oracle/logger.js";
import {
  driveSession,
  initialState,
  replayHistory,
  runRepairSession,
  transition,
  type RepairDeps,
} from "../../src/oracle/machine.js";
import { createDefaultEngine } from "../../src/oracle/rules/index.js";
import type { CompileResult, Diagnostic, Patch } from "../../src/output/types.js";
import type { DiagnosticsCollector } from "../../src/toolchain/collector.js";
import { BUDGET, FakeCollector, QueueGenerator, appendPatch, diag, filePatch } from "../helpers/fakes.js";

function deps(overrides: Partial<RepairDeps> & Pick<RepairDeps, "collector">): RepairDeps {
  return {
    rules: createDefaultEngine(),
    maxIterations: 20,
    compileTimeoutMs: 1000,
    budget: BUDGET,
    ...overrides,
  };
}

const ok = (patch: Patch) => () => ({ ok: true as const, value: patch });

// ============================================================================
// Scenarios
// ============================================================================

describe("runRepairSession", () => {
  it("fixes a suggested rename in one iteration", async () => {
    const content = "def goo := 1\n#eval foo + 1\n";
    const collector = new FakeCollector((c) =>
      c.includes("foo") ? [diag(2, 6, "unknown identifier `foo`, did you mean `goo`?")] : []
    );

    const report = await runRepairSession(content, deps({ collector }));

    expect(report.status).toBe("Fixed");
    expect(report.iterations).toBe(1);
    expect(report.finalContent).toBe("def goo := 1\n#eval goo + 1\n");
    expect(report.initialContent).toBe(content);
    expect(report.deterministicFixes).toBe(1);
    expect(report.generativeCalls).toBe(0);
    expect(report.history[0]?.decision).toBe("fixed");
    expect(report.history[0]?.patch?.ruleId).toBe("renameSuggestion");
    expect(collector.calls).toBe(2);
  });

  it("falls back to generation when no rule applies", async () => {
    const content = "theorem t : 1 + 1 = 2 := by\n  exact foo\n";
    const fixed = "theorem t : 1 + 1 = 2 := by\n  norm_num\n";
    const mismatch = diag(2, 2, "type mismatch");
    const collector = new FakeCollector((c) => (c.includes("exact foo") ? [mismatch] : []));
    const generator = new QueueGenerator([ok(filePatch("gen-repair-1", fixed, content))]);
    const logger = createSessionLogger();

    const report = await runRepairSession(content, deps({ collector, generator, logger }));
    const statuses = logger
      .getEvents()
      .filter((e) => e.type === "status_changed")
      .map((e) => e.status);

    expect(report.status).toBe("Fixed");
    expect(report.iterations).toBe(1);
    expect(report.finalContent).toBe(fixed);
    expect(report.generativeCalls).toBe(1);
    expect(statuses).toEqual(["Fixed"]);
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0]?.mode).toBe("repair");
    expect(generator.requests[0]?.diagnostics).toEqual([mismatch]);
  });

  it("stops as Cycled when diagnostics repeat, without compiling again", async () => {
    const content = "theorem t : False := trivial\n";
    const collector = new FakeCollector(() => [diag(1, 21, "type mismatch")]);
    const generator = new QueueGenerator([ok(filePatch("gen-repair-1", `${content}-- try\n`, content))]);

    const report = await runRepairSession(content, deps({ collector, generator }));

    expect(report.status).toBe("Cycled");
    expect(report.iterations).toBe(2);
    expect(report.history.map((r) => r.decision)).toEqual(["continue", "cycled"]);
    expect(report.history[1]?.patch).toBeNull();
    expect(report.finalContent).toBe(`${content}-- try\n`);
    expect(collector.calls).toBe(2);
    expect(generator.requests).toHaveLength(1);
  });

  it("ends Fixed without iterations when the file already compiles", async () => {
    const collector = new FakeCollector(() => [diag(1, 10, "unused variable `h`", "warning")]);

    const report = await runRepairSession("theorem t (h : 1 = 1) : True := trivial\n", deps({ collector }));

    expect(report.status).toBe("Fixed");
    expect(report.iterations).toBe(0);
    expect(report.history).toEqual([]);
    expect(collector.calls).toBe(1);
  });

  it("keeps repairing a file that compiles only through sorry", async () => {
    const content = "theorem t : True := sorry\n";
    const sorryWarning = diag(1, 8, "declaration uses 'sorry'", "warning");
    const collector = new FakeCollector((c) => (c.includes("sorry") ? [sorryWarning] : []));
    const generator = new QueueGenerator([ok(filePatch("gen-repair-1", "theorem t : True := trivial\n", content))]);

    const report = await runRepairSession(content, deps({ collector, generator }));

    expect(report.status).toBe("Fixed");
    expect(report.iterations).toBe(1);
    expect(report.finalContent).toBe("theorem t : True := trivial\n");
    expect(generator.requests[0]?.diagnostics).toEqual([sorryWarning]);
  });

  it("treats an unreported admit as unfinished", async () => {
    const collector = new FakeCollector(() => []);

    const report = await runRepairSession("theorem t : True := by\n  admit\n", deps({ collector }));

    expect(report.status).toBe("Failed");
    expect(report.history[0]?.before.diagnostics).toEqual([
      { severity: "error", message: "proof uses 'admit'", line: 2, column: 2, kind: "lint" },
    ]);
  });

  it("fixes deprecations once warnings are promoted to errors", async () => {
    const message = "`Nat.lt_pow_self` has been deprecated, use `Nat.lt_two_pow` instead";
    const content = "set_option warningAsError true\nexample := Nat.lt_pow_self\n";
    const asError = new FakeCollector((c) => (c.includes("lt_pow_self") ? [diag(2, 11, message)] : []));
    const asWarning = new FakeCollector((c) => (c.includes("lt_pow_self") ? [diag(2, 11, message, "warning")] : []));

    const promoted = await runRepairSession(content, deps({ collector: asError }));
    const plain = await runRepairSession(content, deps({ collector: asWarning }));

    expect(promoted.status).toBe("Fixed");
    expect(promoted.history[0]?.patch?.ruleId).toBe("deprecatedAlias");
    expect(promoted.finalContent).toBe("set_option warningAsError true\nexample := Nat.lt_two_pow\n");
    expect(plain.status).toBe("Fixed");
    expect(plain.iterations).toBe(0);
  });

  it("accepts sorry when placeholders are allowed", async () => {
    const collector = new FakeCollector(() => [diag(1, 8, "declaration uses 'sorry'", "warning")]);

    const report = await runRepairSession("theorem t : True := sorry\n", deps({ collector, rejectSorry: false }));

    expect(report.status).toBe("Fixed");
    expect(report.iterations).toBe(0);
  });

  it("stops at maxIterations while diagnostics keep changing", async () => {
    const collector = new FakeCollector((c) => [diag(1, 0, `failed at length ${c.length}`)]);
    const generator = new QueueGenerator([
      ok(appendPatch("gen-1", "x")),
      ok(appendPatch("gen-2", "x")),
      ok(appendPatch("gen-3", "x")),
    ]);

    const report = await runRepairSession("a", deps({ collector, generator, maxIterations: 3 }));

    expect(report.status).toBe("MaxIterationsExceeded");
    expect(report.iterations).toBe(3);
    expect(report.history).toHaveLength(3);
    expect(report.history[2]?.decision).toBe("max-iterations");
    expect(report.finalContent).toBe("a\nx\nx\nx\n");
    expect(collector.calls).toBe(4);
  });

  it("fails when neither rules nor generation produce a patch", async () => {
    const collector = new FakeCollector(() => [diag(1, 0, "type mismatch")]);

    const report = await runRepairSession("x\n", deps({ collector }));

    expect(report.status).toBe("Failed");
    expect(report.iterations).toBe(1);
    expect(report.history[0]?.failure?.kind).toBe("no-patch");
    expect(report.history[0]?.failure?.generation?.reason).toBe("unavailable");
    expect(report.generativeCalls).toBe(0);
  });

  it("fails when generation fails", async () => {
    const collector = new FakeCollector(() => [diag(1, 0, "type mismatch")]);
    const generator = new QueueGenerator([
      () => ({ ok: false, error: new GenerationError("generation service failed: overloaded", "service") }),
    ]);

    const report = await runRepairSession("x\n", deps({ collector, generator }));

    expect(report.status).toBe("Failed");
    expect(report.history[0]?.failure?.message).toBe("generation service failed: overloaded");
    expect(report.generativeCalls).toBe(1);
    expect(report.finalContent).toBe("x\n");
  });

  it("fails on a stale patch and keeps the buffer", async () => {
    const collector = new FakeCollector(() => [diag(1, 0, "type mismatch")]);
    const stale: Patch = {
      id: "gen-repair-1",
      origin: "generative",
      description: "Replace text at line 1",
      edit: { type: "span", start: 0, end: 3, expected: "abc", replacement: "def" },
      targets: [],
    };
    const generator = new QueueGenerator([ok(stale)]);

    const report = await runRepairSession("xyz\n", deps({ collector, generator }));

    expect(report.status).toBe("Failed");
    expect(report.finalContent).toBe("xyz\n");
    expect(report.history[0]?.patch).toBeNull();
    expect(report.history[0]?.after).toBeNull();
    expect(report.history[0]?.failure?.kind).toBe("apply");
    expect(report.history[0]?.failure?.apply?.reason).toBe("stale");
    expect(report.history[0]?.failure?.rejected).toBe(stale);
    expect(report.generativeCalls).toBe(1);
    expect(collector.calls).toBe(1);
  });

  it("lets ParseError escape", async () => {
    const collector: DiagnosticsCollector = {
      compile: async (): Promise<CompileResult> => {
        throw new ParseError("Unexpected checker output before the first diagnostic at line 1", 1, "PANIC");
      },
    };

    await expect(runRepairSession("x", deps({ collector }))).rejects.toBeInstanceOf(ParseError);
  });

  it("freezes recorded iterations", async () => {
    const collector = new FakeCollector(() => [diag(1, 0, "type mismatch")]);
    const report = await runRepairSession("x\n", deps({ collector }));

    expect(Object.isFrozen(report.history)).toBe(true);
    expect(Object.isFrozen(report.history[0])).toBe(true);
  });
});

// ============================================================================
// Transition
// ============================================================================

describe("transition", () => {
  it("keeps history length equal to the iteration count", async () => {
    const collector = new FakeCollector((c) => [diag(1, 0, `length ${c.length}`)]);
    const generator = new QueueGenerator([ok(appendPatch("g1", "x")), ok(appendPatch("g2", "x"))]);
    const d = deps({ collector, generator, maxIterations: 2 });

    let state = initialState("a");
    const seen: Array<[number, number, string]> = [];
    while (state.status === "Running") {
      state = await transition(state, d);
      seen.push([state.iteration, state.history.length, state.status]);
    }

    expect(seen).toEqual([
      [1, 1, "Running"],
      [2, 2, "MaxIterationsExceeded"],
    ]);
  });

  it("reuses the previous compile instead of compiling again", async () => {
    const collector = new FakeCollector((c) => [diag(1, 0, `length ${c.length}`)]);
    const generator = new QueueGenerator([ok(appendPatch("g1", "x")), ok(appendPatch("g2", "x"))]);
    const d = deps({ collector, generator });

    const first = await transition(initialState("a"), d);
    expect(collector.calls).toBe(2);
    expect(first.pending).toBe(first.history[0]?.after);

    await transition(first, d);
    expect(collector.calls).toBe(3);
  });

  it("leaves terminal states untouched", async () => {
    const collector = new FakeCollector(() => []);
    const fixed = { ...initialState("x"), status: "Fixed" as const };

    expect(await transition(fixed, deps({ collector }))).toBe(fixed);
    expect(collector.calls).toBe(0);
  });
});

// ============================================================================
// Replay
// ============================================================================

describe("replayHistory", () => {
  const check = (c: string): Diagnostic[] => [diag(1, 0, `length ${c.length}`)];

  it("rebuilds the state after any iteration and resumes from it", async () => {
    const collector = new FakeCollector(check);
    const generator = new QueueGenerator([
      ok(appendPatch("g1", "x")),
      ok(appendPatch("g2", "y")),
      ok(appendPatch("g3", "z")),
    ]);
    const report = await runRepairSession("a", deps({ collector, generator, maxIterations: 3 }));

    const state = replayHistory(report.initialContent, report.history, 2);
    expect(state.content).toBe("a\nx\ny\n");
    expect(state.iteration).toBe(2);
    expect(state.status).toBe("Running");
    expect(state.history).toHaveLength(2);
    expect(state.pending).toBe(report.history[1]?.after);

    const resumed = await driveSession(
      state,
      deps({
        collector: new FakeCollector(check),
        generator: new QueueGenerator([ok(appendPatch("g3", "z"))]),
        maxIterations: 3,
      })
    );
    expect(resumed.status).toBe("MaxIterationsExceeded");
    expect(resumed.content).toBe(report.finalContent);
  });

  it("returns the initial state for index 0", () => {
    expect(replayHistory("a", [], 0)).toEqual(initialState("a"));
  });

  it("rejects an index past the history", () => {
    expect(() => replayHistory("a", [], 1)).toThrow(RangeError);
  });
});
