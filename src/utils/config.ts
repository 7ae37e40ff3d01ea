import { readConfig, writeConfig } from "../core/writer.js";
import { DEFAULT_DELAY_MS, DEFAULT_PROCESSOR, DEFAULT_TICK_MS } from "../core/schema.js";
import type { ConfigFile, ProcessorName } from "../core/schema.js";
import { defaultConcurrency } from "./pool.js";

export interface Settings {
  processor: ProcessorName;
  concurrency: number;
  delayMs: number;
  tickMs: number;
  failOnError: boolean;
}

export interface SettingsOverrides {
  processor?: ProcessorName;
  concurrency?: number;
  delayMs?: number;
  tickMs?: number;
}

/**
 * Load project config, returning null if none exists.
 */
export async function loadConfig(rootPath: string): Promise<ConfigFile | null> {
  return readConfig(rootPath);
}

/**
 * Save project config.
 */
export async function saveConfig(rootPath: string, config: ConfigFile): Promise<void> {
  await writeConfig(rootPath, config);
}

/**
 * Merge CLI overrides over the config file over built-in defaults.
 */
export function resolveSettings(
  config: ConfigFile | null,
  overrides: SettingsOverrides = {},
): Settings {
  return {
    processor: overrides.processor ?? config?.processor ?? DEFAULT_PROCESSOR,
    concurrency: overrides.concurrency ?? config?.concurrency ?? defaultConcurrency(),
    delayMs: overrides.delayMs ?? config?.delay_ms ?? DEFAULT_DELAY_MS,
    tickMs: overrides.tickMs ?? config?.tick_ms ?? DEFAULT_TICK_MS,
    failOnError: config?.fail_on_error ?? true,
  };
}
