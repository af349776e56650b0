import { describe, it, expect, beforeEach, vi } from "vitest";

const git = vi.hoisted(() => ({
  checkIsRepo: vi.fn(),
  checkoutLocalBranch: vi.fn(),
}));

vi.mock("simple-git", () => ({
  simpleGit: vi.fn(() => git),
}));

import { ensureScratchBranch, scratchBranchName } from "../../src/session/scratch-branch.js";

const NOW = new Date(Date.UTC(2026, 9, 19, 14, 30, 0));

describe("ensureScratchBranch", () => {
  beforeEach(() => {
    git.checkIsRepo.mockReset();
    git.checkoutLocalBranch.mockReset();
  });

  it("names branches after the run timestamp", () => {
    expect(scratchBranchName(NOW)).toBe("proof-repair/20261019-143000");
  });

  it("creates and checks out the branch inside a repository", async () => {
    git.checkIsRepo.mockResolvedValue(true);
    git.checkoutLocalBranch.mockResolvedValue(undefined);

    expect(await ensureScratchBranch("/work/project", NOW)).toBe("proof-repair/20261019-143000");
    expect(git.checkoutLocalBranch).toHaveBeenCalledWith("proof-repair/20261019-143000");
  });

  it("does nothing outside a repository", async () => {
    git.checkIsRepo.mockResolvedValue(false);

    expect(await ensureScratchBranch("/work/project", NOW)).toBeNull();
    expect(git.checkoutLocalBranch).not.toHaveBeenCalled();
  });
});
