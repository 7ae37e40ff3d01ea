import { CompletionChannel } from "./channel.js";
import { CoordinatorStateError, describeError } from "./errors.js";
import { defaultConcurrency, poolMap } from "../utils/pool.js";

export type LifecycleState = "uninitialized" | "initialized" | "running" | "done";

export type Outcome = { ok: true } | { ok: false; error: string };

/**
 * Does the work for one item. Resolving is success; rejecting (or throwing)
 * is failure, with the error's message kept as the outcome.
 */
export type ItemProcessor<T> = (item: T, signal: AbortSignal) => Promise<void>;

/**
 * Handle to one background run. `finished` resolves once the outcome list
 * has been posted; it never rejects.
 */
export interface RunHandle {
  readonly id: number;
  readonly signal: AbortSignal;
  readonly finished: Promise<void>;
  cancel(reason?: string): void;
}

export interface CoordinatorOptions<T> {
  /** Worker pool size. Defaults to available hardware parallelism. */
  concurrency?: number;
  /** Label used in messages about an item. */
  describeItem?: (item: T) => string;
}

let nextRunId = 1;

/**
 * Runs one batch of items in the background and exposes the result
 * through polling. One instance serves one run; replace it afterwards.
 *
 * States only move forward: uninitialized → initialized → running → done.
 */
export class TaskCoordinator<T = string> {
  private lifecycle: LifecycleState = "uninitialized";
  private items: T[] = [];
  private results: Outcome[] = [];
  private readonly channel = new CompletionChannel<Outcome[]>();
  private run: RunHandle | null = null;
  private readonly concurrency: number;
  private readonly describeItem: (item: T) => string;

  constructor(
    private readonly processor: ItemProcessor<T>,
    options: CoordinatorOptions<T> = {},
  ) {
    const concurrency = options.concurrency ?? defaultConcurrency();
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.describeItem = options.describeItem ?? ((item) => String(item));
  }

  /**
   * Replace the staged items and move to `initialized`.
   */
  setItems(items: readonly T[]): void {
    const current = this.state();
    if (current === "running" || current === "done") {
      throw new CoordinatorStateError("setItems", ["uninitialized", "initialized"], current);
    }
    this.items = [...items];
    this.lifecycle = "initialized";
  }

  /**
   * Start processing the staged items in the background. Returns at once.
   */
  start(): RunHandle {
    const current = this.state();
    if (current !== "initialized") {
      throw new CoordinatorStateError("start", ["initialized"], current);
    }
    this.lifecycle = "running";

    const snapshot = [...this.items];
    const controller = new AbortController();
    const finished = this.execute(snapshot, controller.signal)
      .catch((err: unknown) => {
        const error = describeError(err);
        return snapshot.map((): Outcome => ({ ok: false, error }));
      })
      .then((outcomes) => {
        this.channel.post(outcomes);
      });

    const handle: RunHandle = {
      id: nextRunId++,
      signal: controller.signal,
      finished,
      cancel: (reason?: string) => {
        if (!controller.signal.aborted) controller.abort(reason ?? "cancelled");
      },
    };
    this.run = handle;
    return handle;
  }

  state(): LifecycleState {
    const outcomes = this.channel.tryReceive();
    if (outcomes) {
      // Results and the flag change together; nothing reads one without the other.
      this.results = outcomes;
      this.lifecycle = "done";
    }
    return this.lifecycle;
  }

  isInState(state: LifecycleState): boolean {
    return this.state() === state;
  }

  /**
   * Outcomes in item order. Empty until the run is done.
   */
  takeResults(): Outcome[] {
    if (this.state() !== "done") return [];
    return this.results.map((outcome) => ({ ...outcome }));
  }

  /**
   * Stop handing out items that have not started yet. In-flight items see
   * an aborted signal; the run still completes with one outcome per item.
   */
  cancel(reason?: string): void {
    if (this.state() !== "running" || !this.run) return;
    this.run.cancel(reason);
  }

  private async execute(items: T[], signal: AbortSignal): Promise<Outcome[]> {
    return poolMap(
      items,
      (item) => this.processItem(item, signal),
      this.concurrency,
      {
        signal,
        onSkip: (item) => this.cancelledOutcome(item),
      },
    );
  }

  private async processItem(item: T, signal: AbortSignal): Promise<Outcome> {
    try {
      await this.processor(item, signal);
      return { ok: true };
    } catch (err) {
      if (signal.aborted) return this.cancelledOutcome(item);
      return { ok: false, error: describeError(err) };
    }
  }

  private cancelledOutcome(item: T): Outcome {
    return { ok: false, error: `Cancelled: ${this.describeItem(item)}` };
  }
}
