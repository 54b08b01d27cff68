import { BaseRuleAdapter } from "./base.js";
import { joinRules } from "./simple-adapter.js";
import { createRule } from "../types/index.js";
import type { GeneratedFile, Rule } from "../types/index.js";
import { readText } from "../utils/fs.js";
import { existsSync } from "node:fs";
import { basename, join, resolve } from "node:path";

const MAIN_FILE = "GEMINI.md";

export class GeminiCliRuleAdapter extends BaseRuleAdapter {
  readonly id = "gemini";
  readonly name = "Gemini CLI";
  readonly layout = "GEMINI.md";

  override userRoot(): string {
    return join(this.context.homeDir, ".gemini");
  }

  async parse(root: string): Promise<Rule[]> {
    const file = resolve(root, MAIN_FILE);
    if (!existsSync(file)) return [];

    const content = await readText(file);
    if (content.trim() === "") return [];
    return [
      createRule({
        scope: basename(resolve(root)) === ".gemini" ? "user" : "project",
        activation: "always",
        name: "gemini",
        content: content.trimEnd(),
      }),
    ];
  }

  async generate(rules: Rule[], _target: string): Promise<GeneratedFile[]> {
    if (rules.length === 0) return [];
    return [{ path: MAIN_FILE, content: joinRules(rules), format: "md" }];
  }
}
