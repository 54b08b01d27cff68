import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { ParseError } from "../errors.js";
import { createRule } from "../types/index.js";
import { CursorRuleAdapter, normalizeGlobs } from "./cursor.js";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content, "utf-8");
  }
}

describe("CursorRuleAdapter", () => {
  let adapter: CursorRuleAdapter;
  let root: string;

  beforeEach(async () => {
    adapter = new CursorRuleAdapter({ homeDir: "/home/test", env: {} });
    root = await mkdtemp(join(tmpdir(), "ruleport-cursor-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("metadata", () => {
    it("has correct id", () => expect(adapter.id).toBe("cursor"));
    it("has correct name", () => expect(adapter.name).toBe("Cursor"));
    it("has correct configDir", () => expect(adapter.configDir).toBe(".cursor/rules"));
    it("has no user root", () => expect(adapter.userRoot()).toBeUndefined());
  });

  describe("parse", () => {
    it("reads a glob rule from frontmatter", async () => {
      await writeFiles(root, {
        ".cursor/rules/a.mdc": '---\ndescription: "a"\nglobs: "*.ts"\n---\nUse strict mode.\n',
      });

      const rules = await adapter.parse(root);
      expect(rules).toEqual([
        createRule({
          scope: "project",
          activation: "glob",
          globs: ["*.ts"],
          name: "a",
          description: "a",
          content: "Use strict mode.",
        }),
      ]);
    });

    it("infers activation from the frontmatter fields", async () => {
      await writeFiles(root, {
        ".cursor/rules/a-always.mdc": "---\nalwaysApply: true\nglobs: src/**\n---\nAlways",
        ".cursor/rules/b-glob.mdc": '---\nglobs: "*.ts, *.tsx"\n---\nGlob',
        ".cursor/rules/c-agent.mdc": "---\ndescription: When writing tests\n---\nTests",
        ".cursor/rules/d-manual.mdc": "No frontmatter at all",
        ".cursor/rules/notes.txt": "ignored",
      });

      const rules = await adapter.parse(root);
      expect(rules.map((r) => [r.name, r.activation])).toEqual([
        ["a-always", "always"],
        ["b-glob", "glob"],
        ["c-agent", "ai_decides"],
        ["d-manual", "on_demand"],
      ]);
      expect(rules[1]?.globs).toEqual(["*.ts", "*.tsx"]);
      expect(rules[3]?.content).toBe("No frontmatter at all");
    });

    it("follows symlinked rule files", async () => {
      await writeFiles(root, { "shared/a.mdc": "---\nalwaysApply: true\n---\nShared." });
      await mkdir(join(root, ".cursor/rules"), { recursive: true });
      await symlink(join(root, "shared/a.mdc"), join(root, ".cursor/rules/a.mdc"));

      const rules = await adapter.parse(root);
      expect(rules.map((r) => [r.name, r.activation, r.content])).toEqual([["a", "always", "Shared."]]);
    });

    it("skips a dangling symlink", async () => {
      await mkdir(join(root, ".cursor/rules"), { recursive: true });
      await symlink(join(root, "missing.mdc"), join(root, ".cursor/rules/gone.mdc"));
      expect(await adapter.parse(root)).toEqual([]);
    });

    it("returns an empty list when the directory is missing", async () => {
      expect(await adapter.parse(root)).toEqual([]);
    });

    it("throws ParseError for malformed frontmatter", async () => {
      await writeFiles(root, { ".cursor/rules/bad.mdc": "---\nalwaysApply: [\n---\nBody" });
      await expect(adapter.parse(root)).rejects.toThrow(ParseError);
    });
  });

  describe("generate", () => {
    it("writes one .mdc file per rule named by its stem", async () => {
      const files = await adapter.generate(
        [
          createRule({
            activation: "glob",
            globs: ["*.ts"],
            name: "TypeScript Standards",
            description: "TS style",
            content: "Always use strict TypeScript.",
          }),
        ],
        root,
      );

      expect(files).toHaveLength(1);
      expect(files[0]?.path).toBe(".cursor/rules/typescript-standards.mdc");
      expect(files[0]?.format).toBe("mdc");
      expect(files[0]?.content).toContain("description: TS style\n");
      expect(files[0]?.content).toContain('- "*.ts"');
      expect(files[0]?.content).not.toContain("alwaysApply");
      expect(files[0]?.content.endsWith("---\n\nAlways use strict TypeScript.\n")).toBe(true);
    });

    it("marks always rules with alwaysApply", async () => {
      const files = await adapter.generate([createRule({ name: "general", content: "Be concise." })], root);
      expect(files[0]?.content).toBe("---\nalwaysApply: true\n---\n\nBe concise.\n");
    });

    it("writes an empty block for a manual rule", async () => {
      const files = await adapter.generate(
        [createRule({ activation: "on_demand", content: "Be concise." })],
        root,
      );
      expect(files[0]?.path).toBe(".cursor/rules/rule_8560593a.mdc");
      expect(files[0]?.content).toBe("---\n---\n\nBe concise.\n");
    });
  });

  describe("write", () => {
    it("round-trips parsed rules", async () => {
      await writeFiles(root, {
        ".cursor/rules/a.mdc": '---\ndescription: "a"\nglobs: "*.ts"\n---\nUse strict mode.\n',
        ".cursor/rules/b.mdc": "---\nalwaysApply: true\n---\n\nBe concise.\n",
      });
      const target = join(root, "out");

      const rules = await adapter.parse(root);
      const result = await adapter.write(rules, target);

      expect(result.files).toEqual([".cursor/rules/a.mdc", ".cursor/rules/b.mdc"]);
      expect(result.warnings).toEqual([]);
      expect(await adapter.parse(target)).toEqual(rules);
      expect(await readFile(join(target, ".cursor/rules/b.mdc"), "utf-8")).toBe(
        "---\nalwaysApply: true\n---\n\nBe concise.\n",
      );
    });
  });
});

describe("normalizeGlobs", () => {
  it("splits comma-separated strings", () => {
    expect(normalizeGlobs("*.ts, *.tsx")).toEqual(["*.ts", "*.tsx"]);
  });

  it("drops empty entries", () => {
    expect(normalizeGlobs(["*.ts", ""])).toEqual(["*.ts"]);
  });

  it("treats empty input as absent", () => {
    expect(normalizeGlobs("")).toBeUndefined();
    expect(normalizeGlobs([])).toBeUndefined();
    expect(normalizeGlobs(null)).toBeUndefined();
  });
});
