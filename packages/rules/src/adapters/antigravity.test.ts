import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { createRule } from "../types/index.js";
import { AntigravityRuleAdapter } from "./antigravity.js";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content, "utf-8");
  }
}

describe("AntigravityRuleAdapter", () => {
  let adapter: AntigravityRuleAdapter;
  let root: string;

  beforeEach(async () => {
    adapter = new AntigravityRuleAdapter({ homeDir: "/home/test", env: {} });
    root = await mkdtemp(join(tmpdir(), "ruleport-antigravity-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves the user root", () => {
    expect(adapter.userRoot()).toBe("/home/test/.gemini/antigravity");
  });

  describe("parse", () => {
    it("prefers the current directory over the legacy one", async () => {
      await writeFiles(root, {
        ".agent/rules/current.md": "Current.",
        ".agents/rules/legacy.md": "Legacy.",
      });
      expect((await adapter.parse(root)).map((r) => r.name)).toEqual(["current"]);
    });

    it("falls back to the legacy directory", async () => {
      await writeFiles(root, { ".agents/rules/legacy.md": "Legacy." });
      expect(await adapter.parse(root)).toEqual([
        createRule({ scope: "project", activation: "always", name: "legacy", content: "Legacy." }),
      ]);
    });

    it("follows a symlinked rule file", async () => {
      await writeFiles(root, { "shared/style.md": "Use tabs." });
      await mkdir(join(root, ".agent/rules"), { recursive: true });
      await symlink(join(root, "shared/style.md"), join(root, ".agent/rules/style.md"));

      expect((await adapter.parse(root)).map((r) => r.name)).toEqual(["style"]);
    });

    it("reads rules/ as the user layout", async () => {
      await writeFiles(root, { "rules/mine.md": "Mine." });
      expect((await adapter.parse(root))[0]?.scope).toBe("user");
    });
  });

  describe("write", () => {
    it("round-trips the current layout", async () => {
      await writeFiles(root, { ".agent/rules/style.md": "Use tabs.\n" });
      const target = join(root, "out");

      const rules = await adapter.parse(root);
      const result = await adapter.write(rules, target);

      expect(result.files).toEqual([".agent/rules/style.md"]);
      expect(await adapter.parse(target)).toEqual(rules);
      expect(await readFile(join(target, ".agent/rules/style.md"), "utf-8")).toBe("Use tabs.\n");
    });

    it("moves legacy rules to the current path", async () => {
      await writeFiles(root, { ".agents/rules/legacy.md": "Legacy.\n" });
      const target = join(root, "out");

      const rules = await adapter.parse(root);
      const result = await adapter.write(rules, target);

      expect(result.files).toEqual([".agent/rules/legacy.md"]);
      expect(await adapter.parse(target)).toEqual(rules);
    });
  });

  describe("generate", () => {
    it("never writes the legacy path", async () => {
      const files = await adapter.generate([createRule({ name: "a", content: "A." })], root);
      expect(files).toEqual([{ path: ".agent/rules/a.md", content: "A.\n", format: "md" }]);
    });

    it("writes user rules into rules/", async () => {
      const files = await adapter.generate(
        [createRule({ scope: "user", name: "a", content: "A." })],
        root,
      );
      expect(files.map((f) => f.path)).toEqual(["rules/a.md"]);
    });
  });
});
