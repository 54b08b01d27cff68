import { BaseRuleAdapter } from "./base.js";
import { createRule } from "../types/index.js";
import type { GeneratedFile, Rule, RuleScope } from "../types/index.js";
import { filenameStem } from "../utils/filename.js";
import { listDir, readText } from "../utils/fs.js";
import { existsSync } from "node:fs";
import { basename, join, resolve } from "node:path";

/**
 * One always-on rule per `*.md` file in a single directory, named after the file.
 */
export abstract class SimpleMarkdownRuleAdapter extends BaseRuleAdapter {
  abstract readonly configDir: string;

  async parse(root: string): Promise<Rule[]> {
    return this.parseDir(resolve(root, this.configDir), "project");
  }

  async generate(rules: Rule[], _target: string): Promise<GeneratedFile[]> {
    return this.markdownFiles(rules, this.configDir);
  }

  protected async parseDir(dir: string, scope: RuleScope): Promise<Rule[]> {
    if (!existsSync(dir)) return [];

    const rules: Rule[] = [];
    for (const entry of await listDir(dir)) {
      if (!entry.isFile || !entry.name.endsWith(".md")) continue;
      const content = await readText(join(dir, entry.name));
      rules.push(
        createRule({
          scope,
          activation: "always",
          name: basename(entry.name, ".md"),
          content: content.trimEnd(),
        }),
      );
    }
    return rules;
  }

  protected markdownFiles(rules: Rule[], dir: string): GeneratedFile[] {
    return rules.map((rule) => ({
      path: `${dir}/${filenameStem(rule)}.md`,
      content: `${rule.content.trimEnd()}\n`,
      format: "md" as const,
    }));
  }
}

/**
 * Rules concatenated into one markdown file. A single rule is written verbatim; several get
 * a `## <name>` header each.
 */
export function joinRules(rules: Rule[]): string {
  const [only] = rules;
  if (rules.length === 1 && only) return `${only.content.trimEnd()}\n`;
  return rules
    .map((rule) => `## ${rule.name ?? "Rule"}\n\n${rule.content.trimEnd()}\n`)
    .join("\n");
}
