import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { processCommand } from "../../src/commands/process.js";
import { writeConfig } from "../../src/core/writer.js";
import { createTmpDir, cleanupTmpDir, createFile } from "../helpers.js";

let tmpDir: string;
let logs: string[];
let errors: string[];

beforeEach(async () => {
  tmpDir = await createTmpDir();
  logs = [];
  errors = [];
  process.exitCode = 0;
  vi.spyOn(console, "log").mockImplementation((...args) => {
    logs.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args) => {
    errors.push(args.map(String).join(" "));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = 0;
  await cleanupTmpDir(tmpDir);
});

function parseJsonOutput(): {
  processor: string;
  concurrency: number;
  interrupted: boolean;
  total: number;
  succeeded: number;
  failed: number;
  results: Array<{ file: string; ok: boolean; error?: string; detail?: string }>;
  summary: string;
} {
  expect(logs).toHaveLength(1);
  return JSON.parse(logs[0]);
}

describe("processCommand", () => {
  it("reports per-file outcomes as JSON in the order given", async () => {
    await createFile(tmpDir, "a.txt", "hello");
    await createFile(tmpDir, "c.txt", "abc");

    await processCommand(["a.txt", "missing.txt", "c.txt"], {
      path: tmpDir,
      processor: "stat",
      concurrency: 2,
      tick: 1,
      json: true,
    });

    const output = parseJsonOutput();
    expect(output.processor).toBe("stat");
    expect(output.concurrency).toBe(2);
    expect(output.interrupted).toBe(false);
    expect(output.total).toBe(3);
    expect(output.succeeded).toBe(2);
    expect(output.failed).toBe(1);
    expect(output.results.map((r) => r.file)).toEqual(["a.txt", "missing.txt", "c.txt"]);
    expect(output.results[0]).toEqual({ file: "a.txt", ok: true, detail: "5 bytes" });
    expect(output.results[1].ok).toBe(false);
    expect(output.results[1].error?.startsWith(`Cannot read ${join(tmpDir, "missing.txt")}: `)).toBe(true);
    expect(output.results[2]).toEqual({ file: "c.txt", ok: true, detail: "3 bytes" });
    expect(output.summary).toBe(output.results[1].error);
    expect(process.exitCode).toBe(1);
  });

  it("prints Success! and leaves the exit code alone when everything succeeds", async () => {
    await createFile(tmpDir, "a.txt", "hello");

    await processCommand(["a.txt"], { path: tmpDir, processor: "stat", tick: 1 });

    expect(logs).toContain("  Success!");
    expect(logs.join("\n")).toContain("1 succeeded, 0 failed");
    expect(process.exitCode).toBe(0);
  });

  it("lists every error message under the result with the sleep processor", async () => {
    await processCommand(["a.txt", "b.txt"], { path: tmpDir, processor: "sleep", delay: 1, tick: 1 });

    expect(logs).toContain(`  Slept for 1ms for file "${join(tmpDir, "a.txt")}"`);
    expect(logs).toContain(`  Slept for 1ms for file "${join(tmpDir, "b.txt")}"`);
    expect(logs.join("\n")).toContain("0 succeeded, 2 failed");
    expect(process.exitCode).toBe(1);
  });

  it("logs the lifecycle transitions", async () => {
    await processCommand(["a.txt"], { path: tmpDir, processor: "sleep", delay: 1, tick: 1 });

    const output = logs.join("\n");
    expect(output).toContain("ready");
    expect(output).toContain("running");
    expect(output).toContain("done");
  });

  it("ignores duplicate paths", async () => {
    await createFile(tmpDir, "a.txt", "x");

    await processCommand(["a.txt", "./a.txt"], { path: tmpDir, processor: "stat", tick: 1 });

    expect(logs.join("\n")).toContain("1 duplicate path(s) ignored");
    expect(logs.join("\n")).toContain("1 succeeded, 0 failed");
  });

  it("uses the config file when no flags are given", async () => {
    await writeConfig(tmpDir, { processor: "stat", concurrency: 3, fail_on_error: false });

    await processCommand(["missing.txt"], { path: tmpDir, tick: 1, json: true });

    const output = parseJsonOutput();
    expect(output.processor).toBe("stat");
    expect(output.concurrency).toBe(3);
    expect(output.failed).toBe(1);
    expect(process.exitCode).toBe(0);
  });

  it("lets flags override the config file", async () => {
    await writeConfig(tmpDir, { processor: "sleep", concurrency: 3 });
    await createFile(tmpDir, "a.txt", "x");

    await processCommand(["a.txt"], { path: tmpDir, processor: "stat", concurrency: 1, tick: 1, json: true });

    const output = parseJsonOutput();
    expect(output.processor).toBe("stat");
    expect(output.concurrency).toBe(1);
  });

  it("rejects an empty file list", async () => {
    await processCommand([], { path: tmpDir });

    expect(errors.join("\n")).toContain("No files given.");
    expect(process.exitCode).toBe(1);
  });

  it("rejects an unknown processor", async () => {
    await processCommand(["a.txt"], { path: tmpDir, processor: "bogus" });

    expect(errors.join("\n")).toContain("Invalid processor: bogus. Must be one of: sleep, stat, checksum");
    expect(process.exitCode).toBe(1);
    expect(logs).toEqual([]);
  });

  it("removes its interrupt handler when the run ends", async () => {
    const before = process.listenerCount("SIGINT");
    await processCommand(["a.txt"], { path: tmpDir, processor: "sleep", delay: 1, tick: 1, json: true });
    expect(process.listenerCount("SIGINT")).toBe(before);
  });

  it("cancels on the first SIGINT and hands later ones back to Node", async () => {
    const runnerListeners = process.listeners("SIGINT");
    process.removeAllListeners("SIGINT");
    const run = processCommand(["a.txt", "b.txt", "c.txt"], {
      path: tmpDir,
      processor: "sleep",
      delay: 60_000,
      concurrency: 1,
      tick: 1,
      json: true,
    });

    try {
      while (process.listenerCount("SIGINT") === 0) {
        await new Promise((r) => setTimeout(r, 5));
      }
      expect(process.listenerCount("SIGINT")).toBe(1);
      process.emit("SIGINT");
      expect(process.listenerCount("SIGINT")).toBe(0);
      await run;
    } finally {
      for (const listener of runnerListeners) process.on("SIGINT", listener);
    }

    const output = parseJsonOutput();
    expect(output.interrupted).toBe(true);
    expect(output.results.map((r) => r.error)).toEqual([
      "Cancelled: a.txt",
      "Cancelled: b.txt",
      "Cancelled: c.txt",
    ]);
    expect(output.failed).toBe(3);
  });
});
