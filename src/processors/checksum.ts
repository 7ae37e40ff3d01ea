import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { FileProcessor } from "./index.js";
import { describeError } from "../core/errors.js";

/**
 * Streams each file through SHA-256. The digest is kept for the report.
 */
export class ChecksumProcessor implements FileProcessor {
  readonly name = "checksum" as const;
  private digests = new Map<string, string>();

  async process(filePath: string, signal: AbortSignal): Promise<void> {
    const fileStat = await stat(filePath).catch((err: unknown) => {
      throw new Error(`Cannot read ${filePath}: ${describeError(err)}`);
    });
    if (!fileStat.isFile()) {
      throw new Error(`Not a file: ${filePath}`);
    }

    const hash = createHash("sha256");
    try {
      for await (const chunk of createReadStream(filePath, { signal })) {
        hash.update(chunk);
      }
    } catch (err) {
      if (signal.aborted) throw new Error(`Cancelled: ${filePath}`);
      throw new Error(`Cannot read ${filePath}: ${describeError(err)}`);
    }
    this.digests.set(filePath, hash.digest("hex"));
  }

  detail(filePath: string): string | undefined {
    return this.digests.get(filePath);
  }
}
