/**
 * Patch Applier
 *
 * Applies a patch to a buffer and returns the new buffer. The input string is
 * never modified; a failed apply leaves the caller with exactly what it had.
 */

import { createHash } from "node:crypto";
import type { Patch, PatchEdit, Result } from "../output/types.js";
import { ApplyError } from "./errors.js";

/**
 * SHA-256 of a buffer, used to detect patches computed against other content
 */
export function contentDigest(content: string): string {
  return createHash("sha256").update(content, "utf-8").digest("hex");
}

function applyEdit(content: string, edit: PatchEdit, patchId: string): Result<string, ApplyError> {
  switch (edit.type) {
    case "file":
      return { ok: true, value: edit.content };

    case "append": {
      const separator = content.length === 0 || content.endsWith("\n") ? "" : "\n";
      const tail = edit.content.endsWith("\n") ? edit.content : `${edit.content}\n`;
      return { ok: true, value: content + separator + tail };
    }

    case "span": {
      if (edit.start < 0 || edit.end < edit.start || edit.end > content.length) {
        return {
          ok: false,
          error: new ApplyError(
            `span [${edit.start}, ${edit.end}) is outside the buffer (length ${content.length})`,
            "out-of-range",
            patchId
          ),
        };
      }

      const current = content.slice(edit.start, edit.end);
      if (current !== edit.expected) {
        return {
          ok: false,
          error: new ApplyError(
            `anchor mismatch at [${edit.start}, ${edit.end}): expected ${JSON.stringify(edit.expected)}, found ${JSON.stringify(current)}`,
            "stale",
            patchId
          ),
        };
      }

      return {
        ok: true,
        value: content.slice(0, edit.start) + edit.replacement + content.slice(edit.end),
      };
    }
  }
}

/**
 * Apply a patch to a buffer
 */
export function applyPatch(content: string, patch: Patch): Result<string, ApplyError> {
  if (patch.baseDigest !== undefined && patch.baseDigest !== contentDigest(content)) {
    return {
      ok: false,
      error: new ApplyError("patch was computed against a different buffer", "stale", patch.id),
    };
  }

  return applyEdit(content, patch.edit, patch.id);
}
