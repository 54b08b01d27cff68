/**
 * Git plumbing for the store. Every command goes through execFile, so remote URLs and
 * commit messages are passed as plain arguments and never reach a shell.
 */

import { VersionControlError } from "../errors.js";
import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** What the store and the sync flows need from version control. */
export interface VersionControl {
  init(dir: string): Promise<void>;
  /** Clone `url` into `dest`; when `dest` is already a repository, point `origin` at `url`. */
  clone(url: string, dest: string): Promise<void>;
  /** Stage everything and commit. Resolves to false when there was nothing to commit. */
  commit(dir: string, message: string): Promise<boolean>;
  push(dir: string): Promise<void>;
  /** Resolves to false when the remote has no history for the current branch yet. */
  pull(dir: string): Promise<boolean>;
}

export class GitClient implements VersionControl {
  constructor(private readonly binary = "git") {}

  async init(dir: string): Promise<void> {
    await this.run(["init"], dir);
  }

  async clone(url: string, dest: string): Promise<void> {
    if (existsSync(join(dest, ".git"))) {
      if (await this.succeeds(["remote", "set-url", "origin", url], dest)) return;
      await this.run(["remote", "add", "origin", url], dest);
      return;
    }

    const parent = dirname(dest);
    await mkdir(parent, { recursive: true });
    await this.run(["clone", url, dest], parent);
  }

  async commit(dir: string, message: string): Promise<boolean> {
    await this.run(["add", "-A"], dir);
    const status = await this.run(["status", "--porcelain"], dir);
    if (status === "") return false;
    await this.run(["commit", "-m", message], dir);
    return true;
  }

  async push(dir: string): Promise<void> {
    await this.run(["push", "--set-upstream", "origin", "HEAD"], dir);
  }

  async pull(dir: string): Promise<boolean> {
    await this.run(["fetch", "origin"], dir);

    const branch = await this.run(["symbolic-ref", "--short", "HEAD"], dir);
    // An empty remote has no branch to merge yet.
    if (!(await this.succeeds(["rev-parse", "--verify", "--quiet", `origin/${branch}`], dir))) {
      return false;
    }

    await this.run(["pull", "origin", branch], dir);
    return true;
  }

  private async run(args: string[], cwd: string): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, args, { cwd, encoding: "utf-8" });
      return stdout.trim();
    } catch (error) {
      throw new VersionControlError(describeFailure(args, error), { cause: error });
    }
  }

  /** Exit status as a boolean, for commands whose failure only means "no". */
  private async succeeds(args: string[], cwd: string): Promise<boolean> {
    try {
      await execFileAsync(this.binary, args, { cwd, encoding: "utf-8" });
      return true;
    } catch (error) {
      if (hasExitCode(error)) return false;
      throw new VersionControlError(describeFailure(args, error), { cause: error });
    }
  }
}

function hasExitCode(error: unknown): boolean {
  return error instanceof Error && "code" in error && typeof error.code === "number";
}

function describeFailure(args: string[], error: unknown): string {
  const command = `git ${args[0] ?? ""}`.trim();
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    const stderr = error.stderr.trim();
    if (stderr !== "") return `${command} failed: ${stderr}`;
  }
  return `${command} failed: ${error instanceof Error ? error.message : String(error)}`;
}
