/**
 * Session Logger
 *
 * Structured logging for session tracing and replay.
 * Captures compiles, rule matches, generation calls, applies and status changes.
 */

import type {
  SessionEvent,
  SessionLogSummary,
} from "../output/types.js";

// ============================================================================
// Session Logger Interface
// ============================================================================

export interface SessionLogger {
  /** Log a session event */
  log(event: Omit<SessionEvent, "timestamp">): void;

  /** Get all logged events */
  getEvents(): SessionEvent[];

  /** Get aggregated summary statistics */
  getSummary(): SessionLogSummary;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Create a session logger. `onEvent` sees every event as it is logged.
 */
export function createSessionLogger(onEvent?: (event: SessionEvent) => void): SessionLogger {
  const events: SessionEvent[] = [];

  return {
    log(event: Omit<SessionEvent, "timestamp">): void {
      const stamped = { ...event, timestamp: Date.now() };
      events.push(stamped);
      onEvent?.(stamped);
    },

    getEvents(): SessionEvent[] {
      return events;
    },

    getSummary(): SessionLogSummary {
      let compiles = 0;
      let rulesMatched = 0;
      let generationRequests = 0;
      let generationFailures = 0;
      let patchesApplied = 0;
      let applyFailures = 0;

      for (const event of events) {
        switch (event.type) {
          case "compile":
            compiles++;
            break;
          case "rule_matched":
            rulesMatched++;
            break;
          case "generation_requested":
            generationRequests++;
            break;
          case "generation_failed":
            generationFailures++;
            break;
          case "patch_applied":
            patchesApplied++;
            break;
          case "apply_failed":
            applyFailures++;
            break;
        }
      }

      return {
        totalEvents: events.length,
        compiles,
        rulesMatched,
        generationRequests,
        generationFailures,
        patchesApplied,
        applyFailures,
      };
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: SessionLogger = {
  log(): void {},
  getEvents: () => [],
  getSummary: () => ({
    totalEvents: 0,
    compiles: 0,
    rulesMatched: 0,
    generationRequests: 0,
    generationFailures: 0,
    patchesApplied: 0,
    applyFailures: 0,
  }),
};
