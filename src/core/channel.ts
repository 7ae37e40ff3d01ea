/**
 * Single-message mailbox between a background run and the poller.
 * The run posts exactly once; the poller drains without blocking.
 */
export class CompletionChannel<T> {
  private message: { value: T } | null = null;
  private posted = false;

  get pending(): boolean {
    return this.message !== null;
  }

  post(value: T): void {
    if (this.posted) {
      throw new Error("CompletionChannel: message already posted");
    }
    this.posted = true;
    this.message = { value };
  }

  tryReceive(): T | undefined {
    if (!this.message) return undefined;
    const { value } = this.message;
    this.message = null;
    return value;
  }
}
