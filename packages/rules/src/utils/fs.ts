import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { IoError } from "../errors.js";

export type DirEntry = {
  name: string;
  path: string;
  /** Symlinks report what they point at; a dangling link is neither. */
  isFile: boolean;
  isDirectory: boolean;
};

export async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new IoError(path, error);
  }
}

/**
 * Entries directly inside `dir`, sorted by name so output order is stable.
 */
export async function listDir(dir: string): Promise<DirEntry[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    throw new IoError(dir, error);
  }

  const entries: DirEntry[] = [];
  for (const name of names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))) {
    const path = join(dir, name);
    entries.push({ name, path, ...(await kindOf(path)) });
  }
  return entries;
}

async function kindOf(path: string): Promise<{ isFile: boolean; isDirectory: boolean }> {
  try {
    const stats = await stat(path);
    return { isFile: stats.isFile(), isDirectory: stats.isDirectory() };
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { isFile: false, isDirectory: false };
    }
    throw new IoError(path, error);
  }
}
