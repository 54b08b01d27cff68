import { SimpleMarkdownRuleAdapter, joinRules } from "./simple-adapter.js";
import { createRule } from "../types/index.js";
import type { GeneratedFile, Rule } from "../types/index.js";
import { filenameStem } from "../utils/filename.js";
import { readText } from "../utils/fs.js";
import { existsSync } from "node:fs";
import { join } from "node:path";

export const FILE_CHAR_LIMIT = 6_000;
export const TOTAL_CHAR_LIMIT = 12_000;
export const GLOBAL_RULES_FILE = "global_rules.md";

/**
 * Project rules live in `.windsurf/rules/`; user rules are one `global_rules.md` in the
 * Windsurf memories directory. Windsurf truncates oversized rules, so the limits only warn.
 */
export class WindsurfRuleAdapter extends SimpleMarkdownRuleAdapter {
  readonly id = "windsurf";
  readonly name = "Windsurf";
  readonly layout = ".windsurf/rules/*.md, or global_rules.md for user rules";
  readonly configDir = ".windsurf/rules";

  override userRoot(): string {
    return join(this.context.homeDir, ".codeium", "windsurf", "memories");
  }

  override async parse(root: string): Promise<Rule[]> {
    const globalRules = join(root, GLOBAL_RULES_FILE);
    if (existsSync(globalRules)) {
      const content = await readText(globalRules);
      if (content.trim() === "") return [];
      return [
        createRule({
          scope: "user",
          activation: "always",
          name: "global-rules",
          content: content.trimEnd(),
        }),
      ];
    }
    return super.parse(root);
  }

  override async generate(rules: Rule[], _target: string): Promise<GeneratedFile[]> {
    if (isUserLayout(rules)) {
      return [{ path: GLOBAL_RULES_FILE, content: joinRules(rules), format: "md" }];
    }
    return this.markdownFiles(rules, this.configDir);
  }

  override check(rules: Rule[]): string[] {
    const warnings: string[] = [];

    if (isUserLayout(rules)) {
      const chars = charCount(joinRules(rules));
      if (chars > FILE_CHAR_LIMIT) {
        warnings.push(
          `${GLOBAL_RULES_FILE} is ${chars} chars, exceeds Windsurf per-file limit of ${FILE_CHAR_LIMIT}`,
        );
      }
      return warnings;
    }

    let total = 0;
    for (const rule of rules) {
      const chars = charCount(`${rule.content.trimEnd()}\n`);
      if (chars > FILE_CHAR_LIMIT) {
        warnings.push(
          `rule '${rule.name ?? filenameStem(rule)}' is ${chars} chars, exceeds Windsurf per-file limit of ${FILE_CHAR_LIMIT}`,
        );
      }
      total += chars;
    }
    if (total > TOTAL_CHAR_LIMIT) {
      warnings.push(
        `total rules content is ${total} chars, exceeds Windsurf total limit of ${TOTAL_CHAR_LIMIT}`,
      );
    }
    return warnings;
  }
}

function isUserLayout(rules: Rule[]): boolean {
  return rules.some((r) => r.scope === "user");
}

function charCount(text: string): number {
  return [...text].length;
}
