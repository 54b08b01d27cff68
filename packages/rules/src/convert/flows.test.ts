import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { ParseError } from "../errors.js";
import { Store } from "../store/index.js";
import type { VersionControl } from "../sync/git.js";
import { createRule, type CodecContext } from "../types/index.js";
import {
  convert,
  convertViaStore,
  importFromStore,
  initStore,
  listProjects,
  pullFormat,
  pullStore,
  pushFormat,
  pushStore,
  removeProject,
  renameProject,
} from "./flows.js";

class FakeVcs implements VersionControl {
  calls: string[] = [];
  commits: Array<{ dir: string; message: string }> = [];
  remoteHasHistory = true;

  async init(dir: string): Promise<void> {
    this.calls.push(`init ${dir}`);
  }
  async clone(url: string, dest: string): Promise<void> {
    this.calls.push(`clone ${url} ${dest}`);
  }
  async commit(dir: string, message: string): Promise<boolean> {
    this.commits.push({ dir, message });
    return true;
  }
  async push(dir: string): Promise<void> {
    this.calls.push(`push ${dir}`);
  }
  async pull(dir: string): Promise<boolean> {
    this.calls.push(`pull ${dir}`);
    return this.remoteHasHistory;
  }
}

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content, "utf-8");
  }
}

const CURSOR_RULE = '---\ndescription: "a"\nglobs: "*.ts"\n---\nUse strict mode.\n';

describe("conversion flows", () => {
  let base: string;
  let src: string;
  let out: string;
  let context: CodecContext;
  let vcs: FakeVcs;
  const now = () => new Date("2026-01-01T12:00:00.000Z");

  beforeEach(async () => {
    base = await mkdtemp(join(tmpdir(), "ruleport-flows-"));
    src = join(base, "src");
    out = join(base, "out");
    context = { homeDir: join(base, "home"), env: {} };
    vcs = new FakeVcs();
    await writeFiles(src, { ".cursor/rules/a.mdc": CURSOR_RULE });
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  describe("convert", () => {
    it("converts a Cursor rule to GEMINI.md", async () => {
      const result = await convert({ from: "cursor", to: "gemini", input: src, output: out, context });

      expect(result.files).toEqual(["GEMINI.md"]);
      expect(result.warnings).toEqual([]);
      expect(result.rules[0]?.globs).toEqual(["*.ts"]);
      expect(await readFile(join(out, "GEMINI.md"), "utf-8")).toBe("Use strict mode.\n");
    });

    it("plans without writing on a dry run", async () => {
      const result = await convert({
        from: "cursor",
        to: "claude",
        input: src,
        output: out,
        dryRun: true,
        context,
      });

      expect(result.files).toEqual([".claude/rules/a.md"]);
      expect(result.warnings).toEqual([
        "rule 'a' is glob-scoped; Claude rules are always-on, globs dropped",
      ]);
      expect(existsSync(out)).toBe(false);
    });

    it("warns instead of failing when nothing matches the scope", async () => {
      const result = await convert({
        from: "cursor",
        to: "gemini",
        input: src,
        output: out,
        scope: "user",
        context,
      });

      expect(result).toEqual({
        rules: [],
        files: [],
        warnings: [`no rules found in cursor config at ${src}`],
      });
      expect(existsSync(out)).toBe(false);
    });

    it("reads from the user root for user scope without an input", async () => {
      await writeFiles(context.homeDir, {
        ".codeium/windsurf/memories/global_rules.md": "Answer briefly.\n",
      });

      const result = await convert({ from: "windsurf", to: "gemini", output: out, scope: "user", context });

      expect(result.rules.map((r) => r.name)).toEqual(["global-rules"]);
      expect(await readFile(join(out, "GEMINI.md"), "utf-8")).toBe("Answer briefly.\n");
    });
  });

  describe("store flows", () => {
    let store: Store;

    beforeEach(async () => {
      store = await Store.init(join(base, "store"), { now });
    });

    it("pushes a format into a project namespace and commits", async () => {
      const result = await pushFormat({ store, format: "cursor", input: src, project: "web", vcs, now });

      expect(result.rules).toHaveLength(1);
      expect(result.rules[0]?.project).toBe("web");
      expect(vcs.commits).toEqual([
        { dir: store.root, message: "push-format from cursor (2026-01-01)" },
      ]);
      expect((await store.loadRules("web"))[0]?.content).toBe("Use strict mode.");
    });

    it("stores nothing on a dry run", async () => {
      const result = await pushFormat({
        store,
        format: "cursor",
        input: src,
        project: "web",
        dryRun: true,
        vcs,
      });

      expect(result.rules).toHaveLength(1);
      expect(await store.listProjects()).toEqual([]);
      expect(vcs.commits).toEqual([]);
    });

    it("pushes user-scope rules into the user namespace", async () => {
      await writeFiles(src, { "global_rules.md": "Answer briefly." });
      await pushFormat({ store, format: "windsurf", input: src, project: "web", scope: "user", vcs });

      expect(await store.listProjects()).toEqual(["user"]);
    });

    it("pulls a namespace out as another format", async () => {
      await pushFormat({ store, format: "cursor", input: src, project: "web", vcs });

      const result = await pullFormat({ store, format: "copilot", output: out, project: "web" });

      expect(result.files).toEqual([".github/instructions/a.instructions.md"]);
      expect(await readFile(join(out, ".github/instructions/a.instructions.md"), "utf-8")).toContain(
        "Use strict mode.\n",
      );
    });

    it("warns when the namespace is empty", async () => {
      const result = await pullFormat({ store, format: "gemini", output: out, project: "nothing" });
      expect(result.warnings).toEqual(["no rules found in store namespace 'nothing'"]);
      expect(existsSync(out)).toBe(false);
    });

    it("converts through the store", async () => {
      const result = await convertViaStore({
        store,
        from: "cursor",
        to: "gemini",
        input: src,
        output: out,
        project: "web",
        vcs,
        now,
      });

      expect(result.files).toEqual(["GEMINI.md"]);
      expect(result.rules[0]?.id).not.toBe("");
      expect(vcs.commits.map((c) => c.message)).toEqual(["convert from cursor (2026-01-01)"]);
      expect(await store.loadRules("web")).toHaveLength(1);
    });

    it("keeps user-scope rules under the given project when converting through the store", async () => {
      await store.saveRules("user", [createRule({ name: "mine", content: "Mine." })], "cursor");
      await writeFiles(src, { "global_rules.md": "Answer briefly." });

      await convertViaStore({
        store,
        from: "windsurf",
        to: "gemini",
        input: src,
        output: out,
        project: "web",
        scope: "user",
        vcs,
      });

      expect((await store.loadRules("web")).map((r) => r.name)).toEqual(["global-rules"]);
      expect((await store.loadRules("user")).map((r) => r.name)).toEqual(["mine"]);
    });

    it("does not touch the store when converting through it on a dry run", async () => {
      const result = await convertViaStore({
        store,
        from: "cursor",
        to: "gemini",
        input: src,
        output: out,
        project: "web",
        dryRun: true,
        vcs,
      });

      expect(result.files).toEqual(["GEMINI.md"]);
      expect(await store.listProjects()).toEqual([]);
      expect(existsSync(out)).toBe(false);
    });
  });

  describe("sync flows", () => {
    let store: Store;

    beforeEach(async () => {
      store = await Store.init(join(base, "store"), { now });
    });

    it("pushes through the version control client", async () => {
      await pushStore(store, vcs);
      expect(vcs.calls).toEqual([`push ${store.root}`]);
    });

    it("reads every namespace back after a pull", async () => {
      await store.saveRules("web", [createRule({ name: "a", content: "A." })], "cursor");
      await store.saveRules("user", [createRule({ name: "b", content: "B." })], "cursor");

      expect(await pullStore(store, vcs)).toEqual({
        pulled: true,
        namespaces: [
          { namespace: "user", rules: 1 },
          { namespace: "web", rules: 1 },
        ],
      });
    });

    it("surfaces a corrupt pulled record", async () => {
      await writeFiles(store.root, { "rules/web/broken.yml": "scope: nowhere\n" });
      await expect(pullStore(store, vcs)).rejects.toThrow(ParseError);
    });

    it("imports a namespace from another store by merging", async () => {
      const [local] = await store.saveRules("web", [createRule({ name: "a", content: "x" })], "cursor");
      const source = await Store.init(join(base, "other"), {
        now: () => new Date("2026-06-01T00:00:00.000Z"),
      });
      await source.saveRules("web", [createRule({ id: local?.id ?? "", name: "a", content: "y" })], "cursor");

      const result = await importFromStore({ store, source, namespace: "web", vcs });

      expect(result.warnings).toEqual(["conflict on rule 'a': remote version is newer, keeping remote"]);
      expect((await store.loadRules("web"))[0]?.content).toBe("y");
      expect(vcs.commits).toEqual([{ dir: store.root, message: `import web from ${source.root}` }]);
    });

    it("initialises a store from a remote", async () => {
      const path = join(base, "cloned");
      const created = await initStore(path, { remoteUrl: "https://example.com/rules.git", vcs, now });

      expect(vcs.calls).toEqual([
        `clone https://example.com/rules.git ${path}`,
        `init ${path}`,
      ]);
      expect(created.manifest.remoteUrl).toBe("https://example.com/rules.git");
    });
  });

  describe("project flows", () => {
    let store: Store;

    beforeEach(async () => {
      store = await Store.init(join(base, "store"), { now });
      await store.saveRules(
        "web",
        [createRule({ name: "a", content: "A." }), createRule({ name: "b", content: "B." })],
        "cursor",
      );
    });

    it("lists projects with rule counts", async () => {
      expect(await listProjects(store)).toEqual([{ name: "web", rules: 2 }]);
    });

    it("commits a rename", async () => {
      await renameProject(store, "web", "site", vcs);
      expect(await store.listProjects()).toEqual(["site"]);
      expect(vcs.commits.map((c) => c.message)).toEqual(["rename project web -> site"]);
    });

    it("commits a removal", async () => {
      await removeProject(store, "web", vcs);
      expect(await store.listProjects()).toEqual([]);
      expect(vcs.commits.map((c) => c.message)).toEqual(["remove project web"]);
    });
  });
});
