import { resolve, relative } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { TaskCoordinator } from "../core/coordinator.js";
import { ProcessingSession, type GatheredRun } from "../core/session.js";
import { countOutcomes } from "../core/summary.js";
import { processorNameSchema, PROCESSOR_NAMES, type ProcessorName } from "../core/schema.js";
import { createProcessor } from "../processors/index.js";
import { loadConfig, resolveSettings } from "../utils/config.js";
import { successMsg, errorMsg, warnMsg, heading, dim, stateBadge, timestamp } from "../utils/display.js";

export interface ProcessOptions {
  path?: string;
  processor?: string;
  concurrency?: number;
  delay?: number;
  tick?: number;
  json?: boolean;
}

interface FileReport {
  file: string;
  ok: boolean;
  error?: string;
  detail?: string;
}

/**
 * Tick until the session gathers a finished run.
 */
export async function pollUntilGathered<T>(
  session: ProcessingSession<T>,
  tickMs: number,
): Promise<GatheredRun<T>> {
  for (;;) {
    const gathered = session.tick();
    if (gathered) return gathered;
    await delay(tickMs);
  }
}

/**
 * Process the given files in the background and report per-file outcomes.
 */
export async function processCommand(files: string[], options: ProcessOptions): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const json = options.json === true;
  const log = (line: string) => {
    if (!json) console.log(line);
  };

  if (files.length === 0) {
    console.error(errorMsg("No files given."));
    process.exitCode = 1;
    return;
  }

  let processorName: ProcessorName | undefined;
  if (options.processor !== undefined) {
    const parsed = processorNameSchema.safeParse(options.processor);
    if (!parsed.success) {
      console.error(errorMsg(`Invalid processor: ${options.processor}. Must be one of: ${PROCESSOR_NAMES.join(", ")}`));
      process.exitCode = 1;
      return;
    }
    processorName = parsed.data;
  }

  const config = await loadConfig(rootPath);
  const settings = resolveSettings(config, {
    processor: processorName,
    concurrency: options.concurrency,
    delayMs: options.delay,
    tickMs: options.tick,
  });
  const processor = await createProcessor(settings.processor, { delayMs: settings.delayMs });

  const session = new ProcessingSession<string>(
    () => new TaskCoordinator<string>(
      (file, signal) => processor.process(file, signal),
      { concurrency: settings.concurrency, describeItem: (file) => labelFor(rootPath, file) },
    ),
    (state) => log(`  ${dim(timestamp())}  ${stateBadge(state)}`),
  );

  const added = session.addFiles(files.map((file) => resolve(rootPath, file)));
  log(heading(`\nfilebatch: ${added} file${added === 1 ? "" : "s"} with "${processor.name}" (concurrency ${settings.concurrency})\n`));
  if (added < files.length) {
    log(warnMsg(`${files.length - added} duplicate path(s) ignored`));
  }

  session.startProcessing();

  let interrupted = false;
  // First Ctrl+C cancels; the next one gets Node's default termination.
  const onInterrupt = () => {
    process.off("SIGINT", onInterrupt);
    interrupted = true;
    session.cancel("interrupted");
    log(warnMsg("Interrupted, skipping files that have not started..."));
  };
  process.on("SIGINT", onInterrupt);

  let gathered: GatheredRun<string>;
  try {
    gathered = await pollUntilGathered(session, settings.tickMs);
  } finally {
    process.off("SIGINT", onInterrupt);
  }

  const reports: FileReport[] = gathered.items.map((file, i) => {
    const outcome = gathered.outcomes[i];
    const detail = outcome.ok ? processor.detail?.(file) : undefined;
    return {
      file: labelFor(rootPath, file),
      ok: outcome.ok,
      ...(outcome.ok ? {} : { error: outcome.error }),
      ...(detail === undefined ? {} : { detail }),
    };
  });
  const counts = countOutcomes(gathered.outcomes);

  if (json) {
    console.log(JSON.stringify({
      processor: processor.name,
      concurrency: settings.concurrency,
      interrupted,
      ...counts,
      results: reports,
      summary: gathered.summary,
    }, null, 2));
  } else {
    console.log("");
    for (const report of reports) {
      if (report.ok) {
        console.log(successMsg(report.detail ? `${report.file}  ${dim(report.detail)}` : report.file));
      } else {
        console.log(errorMsg(report.file));
      }
    }
    console.log(heading("\nResult:\n"));
    for (const line of session.resultMessage.split("\n")) {
      console.log(`  ${line}`);
    }
    console.log(dim(`\n  ${counts.succeeded} succeeded, ${counts.failed} failed\n`));
  }

  if (counts.failed > 0 && settings.failOnError) {
    process.exitCode = 1;
  }
}

function labelFor(rootPath: string, file: string): string {
  const rel = relative(rootPath, file);
  return rel === "" || rel.startsWith("..") ? file : rel;
}
