import type { ProcessorName } from "../core/schema.js";
import { UnknownProcessorError } from "../core/errors.js";

/**
 * Per-file processing strategy.
 * Resolving means the file was processed; rejecting carries the reason it wasn't.
 */
export interface FileProcessor {
  readonly name: ProcessorName;
  /** Process one file. Should stop early when the signal aborts, where it can. */
  process(filePath: string, signal: AbortSignal): Promise<void>;
  /** Extra per-file detail for reports, once the file has been processed */
  detail?(filePath: string): string | undefined;
}

export interface ProcessorOptions {
  delayMs?: number;
}

/**
 * Create a processor instance by name.
 */
export async function createProcessor(
  name: string,
  options: ProcessorOptions = {},
): Promise<FileProcessor> {
  switch (name) {
    case "sleep": {
      const { SleepProcessor } = await import("./sleep.js");
      return new SleepProcessor(options.delayMs);
    }
    case "stat": {
      const { StatProcessor } = await import("./stat.js");
      return new StatProcessor();
    }
    case "checksum": {
      const { ChecksumProcessor } = await import("./checksum.js");
      return new ChecksumProcessor();
    }
    default:
      throw new UnknownProcessorError(name);
  }
}
