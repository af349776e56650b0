/**
 * Error taxonomy
 *
 * Only ParseError is ever thrown past the repair loop. The other kinds are
 * converted into the next loop decision.
 */

export type RepairErrorKind = "toolchain" | "parse" | "generation" | "apply" | "config";

export abstract class RepairError extends Error {
  abstract readonly kind: RepairErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The checker could not be run to completion (launch failure, timeout, abort). */
export class ToolchainError extends RepairError {
  readonly kind = "toolchain" as const;

  constructor(
    message: string,
    readonly reason: "timeout" | "launch" | "aborted" | "no-output" | "output-overflow",
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Checker output did not follow the diagnostic grammar. */
export class ParseError extends RepairError {
  readonly kind = "parse" as const;

  constructor(
    message: string,
    /** 1-based line of the checker output that failed to parse */
    readonly outputLine: number,
    readonly text: string
  ) {
    super(message);
  }
}

export class GenerationError extends RepairError {
  readonly kind = "generation" as const;

  constructor(
    message: string,
    readonly reason: "service" | "timeout" | "budget" | "malformed" | "invalid" | "unavailable",
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A patch whose anchor no longer matches the buffer, or that is out of range. */
export class ApplyError extends RepairError {
  readonly kind = "apply" as const;

  constructor(
    message: string,
    readonly reason: "stale" | "out-of-range",
    readonly patchId: string
  ) {
    super(message);
  }
}

/** Invalid configuration file, environment value or flag. */
export class ConfigError extends RepairError {
  readonly kind = "config" as const;

  constructor(
    message: string,
    /** Where the bad value came from, e.g. a file path or variable name */
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
