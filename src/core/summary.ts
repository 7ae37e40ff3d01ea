import type { Outcome } from "./coordinator.js";

export const SUCCESS_MESSAGE = "Success!";

export interface OutcomeCounts {
  total: number;
  succeeded: number;
  failed: number;
}

export function collectErrors(outcomes: readonly Outcome[]): string[] {
  const errors: string[] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) errors.push(outcome.error);
  }
  return errors;
}

/**
 * "Success!" when nothing failed, otherwise one error message per line.
 */
export function summarize(outcomes: readonly Outcome[]): string {
  const errors = collectErrors(outcomes);
  return errors.length === 0 ? SUCCESS_MESSAGE : errors.join("\n");
}

export function countOutcomes(outcomes: readonly Outcome[]): OutcomeCounts {
  const failed = collectErrors(outcomes).length;
  return { total: outcomes.length, succeeded: outcomes.length - failed, failed };
}
