import type { CodecContext, GeneratedFile, Rule, WriteResult } from "../types/index.js";
import { IoError } from "../errors.js";
import { mkdir, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, resolve } from "node:path";

export function defaultContext(): CodecContext {
  return { homeDir: process.env.HOME || homedir(), env: { ...process.env } };
}

export abstract class BaseRuleAdapter {
  abstract readonly id: string;
  abstract readonly name: string;
  /** Human-readable summary of the on-disk layout. */
  abstract readonly layout: string;

  constructor(protected readonly context: CodecContext = defaultContext()) {}

  abstract parse(root: string): Promise<Rule[]>;

  /** Files a write of `rules` would produce, relative to `target`. Does not touch disk. */
  abstract generate(rules: Rule[], target: string): Promise<GeneratedFile[]>;

  /** Advisory warnings for `rules`. They never block a write. */
  check(_rules: Rule[]): string[] {
    return [];
  }

  /** The tool's user-level config directory, when it has one. */
  userRoot(): string | undefined {
    return undefined;
  }

  async write(rules: Rule[], target: string): Promise<WriteResult> {
    const files = await this.generate(rules, target);
    const warnings = this.check(rules);
    await this.install(files, target);
    return { files: files.map((f) => f.path), warnings };
  }

  async install(files: GeneratedFile[], target: string): Promise<void> {
    for (const file of files) {
      const fullPath = resolve(target, file.path);
      try {
        await mkdir(dirname(fullPath), { recursive: true });
        await writeFile(fullPath, file.content, "utf-8");
      } catch (error) {
        throw new IoError(fullPath, error);
      }
    }
  }
}
