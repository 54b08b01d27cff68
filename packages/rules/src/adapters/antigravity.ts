import { SimpleMarkdownRuleAdapter } from "./simple-adapter.js";
import type { GeneratedFile, Rule } from "../types/index.js";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";

const LEGACY_DIR = ".agents/rules";

/**
 * Reads `.agent/rules/` and falls back to the older `.agents/rules/`; always writes the
 * current path. The user layout (`~/.gemini/antigravity`) keeps rules in `rules/`.
 */
export class AntigravityRuleAdapter extends SimpleMarkdownRuleAdapter {
  readonly id = "antigravity";
  readonly name = "Google Antigravity";
  readonly layout = ".agent/rules/*.md (legacy .agents/rules/*.md is read too)";
  readonly configDir = ".agent/rules";

  override userRoot(): string {
    return join(this.context.homeDir, ".gemini", "antigravity");
  }

  override async parse(root: string): Promise<Rule[]> {
    const current = resolve(root, this.configDir);
    if (existsSync(current)) return this.parseDir(current, "project");

    const legacy = resolve(root, LEGACY_DIR);
    if (existsSync(legacy)) return this.parseDir(legacy, "project");

    return this.parseDir(resolve(root, "rules"), "user");
  }

  override async generate(rules: Rule[], _target: string): Promise<GeneratedFile[]> {
    const dir = rules.some((r) => r.scope === "user") ? "rules" : this.configDir;
    return this.markdownFiles(rules, dir);
  }
}
