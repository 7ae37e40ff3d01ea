import { summarize } from "./summary.js";
import type { LifecycleState, Outcome, TaskCoordinator } from "./coordinator.js";

export type StateListener = (state: LifecycleState, previous: LifecycleState) => void;

export interface GatheredRun<T> {
  items: T[];
  outcomes: Outcome[];
  summary: string;
}

/**
 * Headless model of the processing screen: the staged files, whether the
 * run action is available, and the text shown after a run.
 *
 * The session owns one coordinator at a time and swaps in a fresh one each
 * time it gathers results, so no coordinator ever serves two runs.
 */
export class ProcessingSession<T = string> {
  private staged = new Set<T>();
  private coordinator: TaskCoordinator<T>;
  private lastState: LifecycleState;
  private runItems: T[] = [];
  private enabled = true;
  private message = "";

  constructor(
    private readonly createCoordinator: () => TaskCoordinator<T>,
    private readonly onStateChange?: StateListener,
  ) {
    this.coordinator = createCoordinator();
    this.lastState = this.coordinator.state();
  }

  get files(): T[] {
    return [...this.staged];
  }

  get runEnabled(): boolean {
    return this.enabled;
  }

  /** A run is outstanding; the UI shows a spinner. */
  get busy(): boolean {
    return !this.enabled;
  }

  get resultMessage(): string {
    return this.message;
  }

  get state(): LifecycleState {
    return this.observe();
  }

  /**
   * Stage files. Already-staged files are ignored. Returns how many were new.
   */
  addFiles(files: Iterable<T>): number {
    let added = 0;
    for (const file of files) {
      if (this.staged.has(file)) continue;
      this.staged.add(file);
      added++;
    }
    return added;
  }

  removeFile(file: T): boolean {
    const removed = this.staged.delete(file);
    if (this.staged.size === 0) this.message = "";
    return removed;
  }

  clearFiles(): void {
    this.staged.clear();
    this.message = "";
  }

  /**
   * Hand the staged files to the coordinator and start it.
   * Returns false when a run is outstanding or nothing is staged.
   */
  startProcessing(): boolean {
    if (!this.enabled || this.staged.size === 0) return false;

    this.runItems = [...this.staged];
    this.coordinator.setItems(this.runItems);
    this.observe();
    this.coordinator.start();
    this.observe();

    this.enabled = false;
    this.message = "";
    return true;
  }

  /**
   * Poll once. On the tick that sees the run finished, gather its outcomes,
   * swap in a fresh coordinator and re-enable the run action.
   */
  tick(): GatheredRun<T> | null {
    if (this.observe() !== "done") return null;

    const outcomes = this.coordinator.takeResults();
    const summary = summarize(outcomes);
    const gathered: GatheredRun<T> = { items: this.runItems, outcomes, summary };

    this.message = summary;
    this.replaceCoordinator();
    this.enabled = true;
    return gathered;
  }

  /**
   * Cancel the outstanding run. Its outcomes are still gathered by tick().
   */
  cancel(reason?: string): boolean {
    if (this.observe() !== "running") return false;
    this.coordinator.cancel(reason);
    return true;
  }

  /**
   * Drop the current coordinator, cancelling any run it has outstanding.
   */
  reset(): void {
    this.coordinator.cancel("reset");
    this.replaceCoordinator();
    this.enabled = true;
    this.message = "";
  }

  private replaceCoordinator(): void {
    this.coordinator = this.createCoordinator();
    this.lastState = this.coordinator.state();
    this.runItems = [];
  }

  private observe(): LifecycleState {
    const state = this.coordinator.state();
    if (state !== this.lastState) {
      const previous = this.lastState;
      this.lastState = state;
      this.onStateChange?.(state, previous);
    }
    return state;
  }
}
