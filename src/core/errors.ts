import type { LifecycleState } from "./coordinator.js";

/**
 * Thrown when a coordinator operation is called out of sequence,
 * e.g. start() before setItems(). A caller bug, not a per-item failure.
 */
export class CoordinatorStateError extends Error {
  constructor(
    public operation: string,
    public expected: readonly LifecycleState[],
    public actual: LifecycleState,
  ) {
    super(`Cannot ${operation}() while ${actual} (expected ${expected.join(" or ")}).`);
    this.name = "CoordinatorStateError";
  }
}

export class UnknownProcessorError extends Error {
  constructor(public processor: string) {
    super(`Unknown processor: ${processor}`);
    this.name = "UnknownProcessorError";
  }
}

/**
 * Message of anything thrown, for outcome lists and CLI output.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
