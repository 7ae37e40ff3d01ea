import { setTimeout as delay } from "node:timers/promises";
import type { FileProcessor } from "./index.js";
import { DEFAULT_DELAY_MS } from "../core/schema.js";

/**
 * Placeholder strategy: waits, then reports the file as failed.
 * Useful for exercising the pool and the polling loop without touching disk.
 */
export class SleepProcessor implements FileProcessor {
  readonly name = "sleep" as const;
  private delayMs: number;

  constructor(delayMs = DEFAULT_DELAY_MS) {
    this.delayMs = delayMs;
  }

  async process(filePath: string, signal: AbortSignal): Promise<void> {
    try {
      await delay(this.delayMs, undefined, { signal });
    } catch (err) {
      if (signal.aborted) throw new Error(`Cancelled: ${filePath}`);
      throw err;
    }
    throw new Error(`Slept for ${this.delayMs}ms for file "${filePath}"`);
  }
}
