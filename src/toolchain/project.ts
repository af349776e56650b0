/**
 * Checker project discovery
 *
 * Locates the Lake project that owns a file so the checker sees the same
 * dependencies a `lake build` would.
 */

import fs from "node:fs";
import path from "node:path";

const LAKEFILE_NAMES = ["lakefile.lean", "lakefile.toml"] as const;

export interface CheckerProject {
  /** Directory the checker runs in */
  root: string;
  /** Lakefile found walking up from the file, if any */
  lakefile: string | null;
}

export interface CheckerCommand {
  command: string;
  args: string[];
}

/**
 * Walk up from a file until a lakefile is found. Without one, the file's own
 * directory is the root.
 */
export function findProject(file: string): CheckerProject {
  const start = path.dirname(path.resolve(file));
  let dir = start;

  for (;;) {
    for (const name of LAKEFILE_NAMES) {
      const candidate = path.join(dir, name);
      if (fs.existsSync(candidate)) {
        return { root: dir, lakefile: candidate };
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { root: start, lakefile: null };
}

/**
 * Commands to check a single file, in the order they should be tried.
 * `lake env` is preferred; plain `lean` is the fallback when lake is missing.
 */
export function checkerCommands(project: CheckerProject, file: string): CheckerCommand[] {
  const direct: CheckerCommand = { command: "lean", args: [file] };
  if (project.lakefile === null) {
    return [direct];
  }
  return [{ command: "lake", args: ["env", "lean", file] }, direct];
}
