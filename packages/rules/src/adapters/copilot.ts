import { BaseRuleAdapter } from "./base.js";
import { parseFrontmatter, serializeFrontmatter } from "./frontmatter.js";
import { joinRules } from "./simple-adapter.js";
import { createRule } from "../types/index.js";
import type { GeneratedFile, Rule } from "../types/index.js";
import { filenameStem } from "../utils/filename.js";
import { listDir, readText } from "../utils/fs.js";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";

const INSTRUCTIONS_FILE = ".github/copilot-instructions.md";
const INSTRUCTIONS_DIR = ".github/instructions";
const INSTRUCTIONS_SUFFIX = ".instructions.md";

const CopilotFrontmatter = z
  .object({
    name: z.string().nullish(),
    description: z.string().nullish(),
    applyTo: z.string().nullish(),
  })
  .passthrough();

export class CopilotRuleAdapter extends BaseRuleAdapter {
  readonly id = "copilot";
  readonly name = "GitHub Copilot";
  readonly layout = ".github/copilot-instructions.md + .github/instructions/*.instructions.md";

  async parse(root: string): Promise<Rule[]> {
    const rules: Rule[] = [];

    const mainFile = resolve(root, INSTRUCTIONS_FILE);
    if (existsSync(mainFile)) {
      const content = await readText(mainFile);
      if (content.trim() !== "") {
        rules.push(
          createRule({
            scope: "project",
            activation: "always",
            name: "copilot-instructions",
            content: content.trimEnd(),
          }),
        );
      }
    }

    const instructionsDir = resolve(root, INSTRUCTIONS_DIR);
    if (!existsSync(instructionsDir)) return rules;

    for (const entry of await listDir(instructionsDir)) {
      if (!entry.isFile || !entry.name.endsWith(INSTRUCTIONS_SUFFIX)) continue;
      const path = join(instructionsDir, entry.name);
      const raw = await readText(path);
      const { data, body } = parseFrontmatter(raw, CopilotFrontmatter, path);

      const applyTo = data.applyTo ?? undefined;
      rules.push(
        createRule({
          scope: "path",
          activation: applyTo !== undefined ? "glob" : "always",
          globs: applyTo !== undefined ? [applyTo] : undefined,
          name: data.name ?? entry.name.slice(0, -INSTRUCTIONS_SUFFIX.length),
          description: data.description ?? undefined,
          content: body,
        }),
      );
    }
    return rules;
  }

  async generate(rules: Rule[], _target: string): Promise<GeneratedFile[]> {
    const files: GeneratedFile[] = [];
    const { always, scoped } = partition(rules);

    if (always.length > 0) {
      files.push({ path: INSTRUCTIONS_FILE, content: joinRules(always), format: "md" });
    }

    for (const rule of scoped) {
      files.push({
        path: `${INSTRUCTIONS_DIR}/${filenameStem(rule)}${INSTRUCTIONS_SUFFIX}`,
        content: serializeFrontmatter(
          {
            name: rule.name,
            description: rule.description,
            applyTo: rule.globs?.[0],
          },
          rule.content,
        ),
        format: "md",
      });
    }
    return files;
  }

  override check(rules: Rule[]): string[] {
    return partition(rules)
      .scoped.filter((rule) => (rule.globs?.length ?? 0) > 1)
      .map(
        (rule) =>
          `rule '${rule.name ?? filenameStem(rule)}' has ${rule.globs?.length} globs; Copilot applyTo keeps only '${rule.globs?.[0]}'`,
      );
  }
}

function partition(rules: Rule[]): { always: Rule[]; scoped: Rule[] } {
  const always: Rule[] = [];
  const scoped: Rule[] = [];
  for (const rule of rules) {
    if (rule.activation === "glob" || rule.globs !== undefined) {
      scoped.push(rule);
    } else {
      always.push(rule);
    }
  }
  return { always, scoped };
}
