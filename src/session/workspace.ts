/**
 * Run workspace
 *
 * Each CLI run gets `<root>/.proof-repair/<timestamp>/snapshots`, holding a copy
 * of every accepted buffer as `<stem>.<tag><ext>`.
 */

import fs from "fs";
import path from "path";
import { replayHistory } from "../oracle/machine.js";
import type { SessionReport } from "../output/types.js";

export const RUNS_DIR = ".proof-repair";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `YYYYMMDD-HHMMSS` in UTC */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export class RunWorkspace {
  readonly runDir: string;
  readonly snapshotsDir: string;
  private readonly snapshotsEnabled: boolean;

  private constructor(
    readonly target: string,
    runDir: string,
    snapshots: boolean
  ) {
    this.runDir = runDir;
    this.snapshotsDir = path.join(runDir, "snapshots");
    this.snapshotsEnabled = snapshots;
  }

  static create(
    root: string,
    target: string,
    options: { now?: Date; snapshots?: boolean } = {}
  ): RunWorkspace {
    const runDir = path.join(root, RUNS_DIR, formatTimestamp(options.now ?? new Date()));
    const workspace = new RunWorkspace(path.resolve(target), runDir, options.snapshots ?? true);
    if (workspace.snapshotsEnabled) {
      fs.mkdirSync(workspace.snapshotsDir, { recursive: true });
    }
    return workspace;
  }

  readTarget(): string {
    return fs.readFileSync(this.target, "utf-8");
  }

  /**
   * Save a copy of `content`; returns the snapshot path, or null when disabled
   */
  snapshot(tag: string, content: string): string | null {
    if (!this.snapshotsEnabled) return null;
    const ext = path.extname(this.target);
    const stem = path.basename(this.target, ext);
    const file = path.join(this.snapshotsDir, `${stem}.${tag}${ext}`);
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  /**
   * Snapshot the buffer after every iteration that applied a patch
   */
  snapshotSession(report: SessionReport, prefix: string): string[] {
    const written: string[] = [];
    for (const entry of report.history) {
      if (!entry.patch) continue;
      const state = replayHistory(report.initialContent, report.history, entry.index);
      const origin = entry.patch.origin === "deterministic" ? "det" : "gen";
      const file = this.snapshot(`${prefix}${pad(entry.index, 3)}_${origin}`, state.content);
      if (file) written.push(file);
    }
    return written;
  }

  /**
   * Write the target file when its content changed
   */
  writeTarget(content: string): boolean {
    if (this.readTarget() === content) return false;
    fs.writeFileSync(this.target, content, "utf-8");
    return true;
  }
}
