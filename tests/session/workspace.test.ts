import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { runRepairSession } from "../../src/oracle/machine.js";
import { createDefaultEngine } from "../../src/oracle/rules/index.js";
import { RUNS_DIR, RunWorkspace, formatTimestamp } from "../../src/session/workspace.js";
import { BUDGET, FakeCollector, diag } from "../helpers/fakes.js";

const NOW = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));

describe("formatTimestamp", () => {
  it("formats UTC time with zero padding", () => {
    expect(formatTimestamp(NOW)).toBe("20260102-030405");
  });
});

describe("RunWorkspace", () => {
  let root: string;
  let target: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "proof-repair-workspace-"));
    target = path.join(root, "Main.lean");
    fs.writeFileSync(target, "def goo := 1\n#eval foo + 1\n");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("writes snapshots under a timestamped run directory", () => {
    const workspace = RunWorkspace.create(root, target, { now: NOW });

    const file = workspace.snapshot("iter000", "content");

    expect(workspace.runDir).toBe(path.join(root, RUNS_DIR, "20260102-030405"));
    expect(file).toBe(path.join(workspace.runDir, "snapshots", "Main.iter000.lean"));
    expect(fs.readFileSync(path.join(workspace.snapshotsDir, "Main.iter000.lean"), "utf-8")).toBe("content");
  });

  it("skips snapshots when disabled", () => {
    const workspace = RunWorkspace.create(root, target, { now: NOW, snapshots: false });

    expect(workspace.snapshot("iter000", "content")).toBeNull();
    expect(fs.existsSync(workspace.snapshotsDir)).toBe(false);
  });

  it("snapshots the buffer after each patched iteration", async () => {
    const workspace = RunWorkspace.create(root, target, { now: NOW });
    const report = await runRepairSession(workspace.readTarget(), {
      collector: new FakeCollector((c) =>
        c.includes("foo") ? [diag(2, 6, "unknown identifier `foo`, did you mean `goo`?")] : []
      ),
      rules: createDefaultEngine(),
      maxIterations: 5,
      compileTimeoutMs: 1000,
      budget: BUDGET,
    });

    const files = workspace.snapshotSession(report, "iter");

    expect(files).toEqual([path.join(workspace.snapshotsDir, "Main.iter001_det.lean")]);
    expect(fs.readFileSync(files[0] ?? "", "utf-8")).toBe("def goo := 1\n#eval goo + 1\n");
  });

  it("rewrites the target only when the content changed", () => {
    const workspace = RunWorkspace.create(root, target, { now: NOW, snapshots: false });

    expect(workspace.writeTarget("def goo := 1\n#eval foo + 1\n")).toBe(false);
    expect(workspace.writeTarget("def goo := 1\n")).toBe(true);
    expect(fs.readFileSync(target, "utf-8")).toBe("def goo := 1\n");
  });
});
