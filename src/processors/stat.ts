import { stat } from "node:fs/promises";
import type { FileProcessor } from "./index.js";
import { describeError } from "../core/errors.js";

export class StatProcessor implements FileProcessor {
  readonly name = "stat" as const;
  private sizes = new Map<string, number>();

  async process(filePath: string): Promise<void> {
    const fileStat = await stat(filePath).catch((err: unknown) => {
      throw new Error(`Cannot read ${filePath}: ${describeError(err)}`);
    });
    if (!fileStat.isFile()) {
      throw new Error(`Not a file: ${filePath}`);
    }
    this.sizes.set(filePath, fileStat.size);
  }

  detail(filePath: string): string | undefined {
    const size = this.sizes.get(filePath);
    return size === undefined ? undefined : `${size} bytes`;
  }
}
