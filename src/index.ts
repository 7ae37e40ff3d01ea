#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Command } from "commander";
import { processCommand } from "./commands/process.js";
import { configCommand } from "./commands/config.js";
import { errorMsg } from "./utils/display.js";

export interface CommandHandlers {
  processCommand: typeof processCommand;
  configCommand: typeof configCommand;
}

const defaultHandlers: CommandHandlers = {
  processCommand,
  configCommand,
};

function isInvokedDirectly(argv1: string | undefined): boolean {
  if (typeof argv1 !== "string") return false;

  // npm often invokes package bins through symlinks in node_modules/.bin.
  // Compare real paths so symlinked execution still triggers the CLI entrypoint.
  try {
    const invokedPath = realpathSync(argv1);
    const thisModulePath = realpathSync(fileURLToPath(import.meta.url));
    if (invokedPath === thisModulePath) return true;
  } catch {
    // Fall through to URL equality check below.
  }

  try {
    return import.meta.url === pathToFileURL(argv1).href;
  } catch {
    return false;
  }
}

function isInteger(value: unknown, min: number): boolean {
  return typeof value === "number" && Number.isInteger(value) && value >= min;
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("filebatch")
    .description("Process batches of files in parallel through a polled background coordinator")
    .version("0.1.0");

  program
    .command("process <files...>")
    .description("Process files in the background and report each outcome")
    .option("--processor <name>", "Processing strategy (sleep, stat, checksum)")
    .option("--concurrency <n>", "Worker pool size", parseInt)
    .option("--delay <ms>", "Delay for the sleep processor", parseInt)
    .option("--tick <ms>", "Poll interval in milliseconds", parseInt)
    .option("--json", "Output machine-readable JSON")
    .option("-p, --path <path>", "Project root path")
    .action(async (files, opts) => {
      if (opts.concurrency !== undefined && !isInteger(opts.concurrency, 1)) {
        console.error(errorMsg("--concurrency must be a positive integer"));
        process.exitCode = 1;
        return;
      }
      if (opts.delay !== undefined && !isInteger(opts.delay, 0)) {
        console.error(errorMsg("--delay must be a non-negative integer"));
        process.exitCode = 1;
        return;
      }
      if (opts.tick !== undefined && !isInteger(opts.tick, 1)) {
        console.error(errorMsg("--tick must be a positive integer"));
        process.exitCode = 1;
        return;
      }
      await handlers.processCommand(files, {
        path: opts.path,
        processor: opts.processor,
        concurrency: opts.concurrency,
        delay: opts.delay,
        tick: opts.tick,
        json: opts.json,
      });
    });

  program
    .command("config")
    .description("View or edit processing settings")
    .option("--processor <name>", "Set default processor (sleep, stat, checksum)")
    .option("--concurrency <n>", "Set worker pool size")
    .option("--delay <ms>", "Set delay for the sleep processor")
    .option("--tick <ms>", "Set poll interval")
    .option("--fail-on-error", "Exit with code 1 when any file fails")
    .option("--no-fail-on-error", "Exit with code 0 even when files fail")
    .option("-p, --path <path>", "Project root path")
    .action(async (opts) => {
      await handlers.configCommand({
        path: opts.path,
        processor: opts.processor,
        concurrency: opts.concurrency,
        delay: opts.delay,
        tick: opts.tick,
        failOnError: opts.failOnError,
      });
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  handlers: CommandHandlers = defaultHandlers,
): Promise<void> {
  const program = createProgram(handlers);
  await program.parseAsync(argv);
}

const invokedDirectly = isInvokedDirectly(process.argv[1]);

if (invokedDirectly) {
  runCli().catch((err) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(errorMsg(msg));
    process.exit(1);
  });
}
