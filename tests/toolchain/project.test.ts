import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { checkerCommands, findProject } from "../../src/toolchain/project.js";

describe("findProject", () => {
  let root: string;

  beforeEach(() => {
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "proof-repair-project-")));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("finds a lakefile in an ancestor directory", () => {
    fs.writeFileSync(path.join(root, "lakefile.toml"), 'name = "demo"\n');
    fs.mkdirSync(path.join(root, "Demo", "Sub"), { recursive: true });

    const project = findProject(path.join(root, "Demo", "Sub", "File.lean"));

    expect(project).toEqual({ root, lakefile: path.join(root, "lakefile.toml") });
  });

  it("prefers lakefile.lean when both exist", () => {
    fs.writeFileSync(path.join(root, "lakefile.lean"), "");
    fs.writeFileSync(path.join(root, "lakefile.toml"), "");

    expect(findProject(path.join(root, "File.lean")).lakefile).toBe(path.join(root, "lakefile.lean"));
  });

  it("uses the file's directory without a lakefile", () => {
    const dir = path.join(root, "standalone");
    fs.mkdirSync(dir);

    const project = findProject(path.join(dir, "File.lean"));

    // An ancestor of the temp dir could hold a lakefile; only assert when none was found
    if (project.lakefile === null) {
      expect(project.root).toBe(dir);
    } else {
      expect(dir.startsWith(project.root)).toBe(true);
    }
  });
});

describe("checkerCommands", () => {
  it("runs lean directly outside a Lake project", () => {
    expect(checkerCommands({ root: "/p", lakefile: null }, "/tmp/A.lean")).toEqual([
      { command: "lean", args: ["/tmp/A.lean"] },
    ]);
  });

  it("prefers lake env and keeps lean as fallback", () => {
    expect(checkerCommands({ root: "/p", lakefile: "/p/lakefile.lean" }, "/tmp/A.lean")).toEqual([
      { command: "lake", args: ["env", "lean", "/tmp/A.lean"] },
      { command: "lean", args: ["/tmp/A.lean"] },
    ]);
  });
});
