import { resolve } from "node:path";
import { loadConfig, saveConfig } from "../utils/config.js";
import { heading, errorMsg, successMsg, dim } from "../utils/display.js";
import { processorNameSchema, PROCESSOR_NAMES, CONFIG_FILENAME, DEFAULT_PROCESSOR } from "../core/schema.js";
import type { ConfigFile } from "../core/schema.js";

export async function configCommand(
  options: {
    path?: string;
    processor?: string;
    concurrency?: string;
    delay?: string;
    tick?: string;
    failOnError?: boolean;
  },
): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const existing = await loadConfig(rootPath);

  // If no flags, show current config
  if (!options.processor && !options.concurrency && !options.delay && !options.tick && options.failOnError === undefined) {
    if (!existing) {
      console.log(errorMsg(`No ${CONFIG_FILENAME} found. Defaults are in use.`));
      return;
    }
    console.log(heading("\nCurrent configuration:\n"));
    console.log(`  processor: ${existing.processor ?? DEFAULT_PROCESSOR}`);
    console.log(`  concurrency: ${existing.concurrency ?? dim("(hardware parallelism)")}`);
    if (existing.delay_ms !== undefined) console.log(`  delay_ms: ${existing.delay_ms}`);
    if (existing.tick_ms !== undefined) console.log(`  tick_ms: ${existing.tick_ms}`);
    console.log(`  fail_on_error: ${existing.fail_on_error ?? true}`);
    console.log("");
    return;
  }

  // Update config
  const updated: ConfigFile = { ...(existing ?? {}) };

  if (options.processor) {
    const parsed = processorNameSchema.safeParse(options.processor);
    if (!parsed.success) {
      console.error(errorMsg(`Invalid processor: ${options.processor}. Must be one of: ${PROCESSOR_NAMES.join(", ")}`));
      process.exitCode = 1;
      return;
    }
    updated.processor = parsed.data;
  }

  if (options.concurrency) {
    const concurrency = parseInt(options.concurrency, 10);
    if (isNaN(concurrency) || concurrency < 1) {
      console.error(errorMsg("concurrency must be a positive integer"));
      process.exitCode = 1;
      return;
    }
    updated.concurrency = concurrency;
  }

  if (options.delay) {
    const delayMs = parseInt(options.delay, 10);
    if (isNaN(delayMs) || delayMs < 0) {
      console.error(errorMsg("delay must be a non-negative integer"));
      process.exitCode = 1;
      return;
    }
    updated.delay_ms = delayMs;
  }

  if (options.tick) {
    const tickMs = parseInt(options.tick, 10);
    if (isNaN(tickMs) || tickMs < 1) {
      console.error(errorMsg("tick must be a positive integer"));
      process.exitCode = 1;
      return;
    }
    updated.tick_ms = tickMs;
  }

  if (options.failOnError !== undefined) {
    updated.fail_on_error = options.failOnError;
  }

  await saveConfig(rootPath, updated);
  console.log(successMsg("Configuration updated."));
}
