import { IoError, WriteFailureError } from "../errors.js";
import { readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

export const LOCK_FILE = ".lock";

/**
 * Run `fn` while holding `<root>/.lock`. The file is created exclusively, so a second
 * process mutating the same store fails fast instead of interleaving writes. A lock left
 * by a process that no longer exists is taken over.
 */
export async function withLock<T>(root: string, fn: () => Promise<T>): Promise<T> {
  const lockPath = join(root, LOCK_FILE);
  if (!(await tryAcquire(lockPath))) {
    if (!(await isStale(lockPath)) || !(await tryAcquire(lockPath, true))) {
      throw new WriteFailureError(lockPath, "store is locked by another process");
    }
  }

  try {
    return await fn();
  } finally {
    await rm(lockPath, { force: true });
  }
}

async function tryAcquire(lockPath: string, replaceStale = false): Promise<boolean> {
  if (replaceStale) await rm(lockPath, { force: true });
  try {
    await writeFile(lockPath, `${process.pid}\n`, { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return false;
    throw new IoError(lockPath, error);
  }
}

/** True when the lock names a pid that is no longer running. */
async function isStale(lockPath: string): Promise<boolean> {
  let raw: string;
  try {
    raw = await readFile(lockPath, "utf-8");
  } catch (error) {
    // Released between our attempt and this read.
    if (isErrnoException(error) && error.code === "ENOENT") return true;
    throw new IoError(lockPath, error);
  }

  const pid = Number.parseInt(raw.trim(), 10);
  if (!Number.isInteger(pid) || pid <= 0) return false;
  return !isPidAlive(pid);
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !(isErrnoException(error) && error.code === "ESRCH");
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
