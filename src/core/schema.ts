import { z } from "zod";

// --- Processor names ---

export const PROCESSOR_NAMES = ["sleep", "stat", "checksum"] as const;

export const processorNameSchema = z.enum(PROCESSOR_NAMES).describe("Per-file processing strategy");

// --- Config file schema (.filebatch.config.yaml) ---

export const configSchema = z.object({
  processor: processorNameSchema.optional(),
  concurrency: z.number().int().positive().optional()
    .describe("Worker pool size (default: available hardware parallelism)"),
  delay_ms: z.number().int().nonnegative().optional()
    .describe("Delay used by the sleep processor (default: 1000)"),
  tick_ms: z.number().int().positive().optional()
    .describe("Poll interval of the processing loop (default: 100)"),
  fail_on_error: z.boolean().optional()
    .describe("Exit with code 1 when any file fails (default: true)"),
});

// --- Types ---

export type ConfigFile = z.infer<typeof configSchema>;
export type ProcessorName = z.infer<typeof processorNameSchema>;

// --- Constants ---

export const CONFIG_FILENAME = ".filebatch.config.yaml";
export const DEFAULT_PROCESSOR: ProcessorName = "stat";
export const DEFAULT_DELAY_MS = 1000;
export const DEFAULT_TICK_MS = 100;
