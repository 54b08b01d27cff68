import { IoError } from "../errors.js";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { v4 as uuidv4 } from "uuid";

/**
 * Write through a temp file in the same directory, then rename over the target.
 */
export async function writeAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.tmp-${uuidv4()}`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new IoError(filePath, error);
  }
}
