import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BaseRuleAdapter, defaultContext } from "./base.js";
import { IoError } from "../errors.js";
import { createRule, type GeneratedFile, type Rule } from "../types/index.js";

class NotesAdapter extends BaseRuleAdapter {
  readonly id = "notes";
  readonly name = "Notes";
  readonly layout = "notes/*.txt";

  async parse(): Promise<Rule[]> {
    return [];
  }

  async generate(rules: Rule[]): Promise<GeneratedFile[]> {
    return rules.map((rule): GeneratedFile => ({
      path: `notes/${rule.name ?? "rule"}.txt`,
      content: `${rule.content}\n`,
      format: "md",
    }));
  }

  override check(rules: Rule[]): string[] {
    return rules.length > 1 ? ["more than one note"] : [];
  }
}

describe("BaseRuleAdapter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ruleport-base-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes generated files and returns their paths with warnings", async () => {
    const adapter = new NotesAdapter({ homeDir: dir, env: {} });
    const result = await adapter.write(
      [createRule({ name: "a", content: "A." }), createRule({ name: "b", content: "B." })],
      dir,
    );

    expect(result).toEqual({ files: ["notes/a.txt", "notes/b.txt"], warnings: ["more than one note"] });
    expect(await readFile(join(dir, "notes", "b.txt"), "utf-8")).toBe("B.\n");
  });

  it("has no user root unless the format defines one", () => {
    expect(new NotesAdapter({ homeDir: dir, env: {} }).userRoot()).toBeUndefined();
  });

  it("wraps write failures in IoError", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "", "utf-8");
    const adapter = new NotesAdapter({ homeDir: dir, env: {} });

    await expect(adapter.write([createRule({ name: "a", content: "A." })], blocker)).rejects.toThrow(
      IoError,
    );
  });

  it("takes the home directory from HOME by default", () => {
    vi.stubEnv("HOME", "/home/tester");
    expect(defaultContext().homeDir).toBe("/home/tester");
  });
});
