import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "filebatch-test-"));
}

export async function cleanupTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function createFile(dirPath: string, name: string, content = ""): Promise<string> {
  const filePath = join(dirPath, name);
  await writeFile(filePath, content);
  return filePath;
}

export async function createDir(dirPath: string, name: string): Promise<string> {
  const fullPath = join(dirPath, name);
  await mkdir(fullPath, { recursive: true });
  return fullPath;
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: Error) => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Let pending promise callbacks run.
 */
export async function flushMicrotasks(): Promise<void> {
  await new Promise<void>((r) => setImmediate(r));
}
