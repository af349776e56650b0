/**
 * Scratch branch: run the session on a fresh git branch so every change the
 * loop writes can be discarded with a checkout.
 */

import { simpleGit } from "simple-git";
import { formatTimestamp } from "./workspace.js";

export const BRANCH_PREFIX = "proof-repair";

export function scratchBranchName(now: Date = new Date()): string {
  return `${BRANCH_PREFIX}/${formatTimestamp(now)}`;
}

/**
 * Create and check out a scratch branch in the repository containing `root`.
 * Returns the branch name, or null when `root` is not inside a repository.
 */
export async function ensureScratchBranch(root: string, now: Date = new Date()): Promise<string | null> {
  const git = simpleGit(root);
  if (!(await git.checkIsRepo())) {
    return null;
  }

  const name = scratchBranchName(now);
  await git.checkoutLocalBranch(name);
  return name;
}
