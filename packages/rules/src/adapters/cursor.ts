import { BaseRuleAdapter } from "./base.js";
import { parseFrontmatter, serializeFrontmatter } from "./frontmatter.js";
import { createRule } from "../types/index.js";
import type { Activation, GeneratedFile, Rule } from "../types/index.js";
import { filenameStem } from "../utils/filename.js";
import { listDir, readText } from "../utils/fs.js";
import { existsSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { z } from "zod";

const CursorFrontmatter = z
  .object({
    description: z.string().nullish(),
    globs: z.union([z.string(), z.array(z.string())]).nullish(),
    alwaysApply: z.boolean().nullish(),
  })
  .passthrough();

export class CursorRuleAdapter extends BaseRuleAdapter {
  readonly id = "cursor";
  readonly name = "Cursor";
  readonly layout = ".cursor/rules/*.mdc, YAML frontmatter";
  readonly configDir = ".cursor/rules";

  async parse(root: string): Promise<Rule[]> {
    const rulesDir = resolve(root, this.configDir);
    if (!existsSync(rulesDir)) return [];

    const rules: Rule[] = [];
    for (const entry of await listDir(rulesDir)) {
      if (!entry.isFile || !entry.name.endsWith(".mdc")) continue;
      const path = join(rulesDir, entry.name);
      const raw = await readText(path);
      const { data, body } = parseFrontmatter(raw, CursorFrontmatter, path);

      const globs = normalizeGlobs(data.globs);
      const description = data.description ?? undefined;

      let activation: Activation;
      if (data.alwaysApply === true) {
        activation = "always";
      } else if (globs) {
        activation = "glob";
      } else if (description !== undefined) {
        activation = "ai_decides";
      } else {
        activation = "on_demand";
      }

      rules.push(
        createRule({
          scope: "project",
          activation,
          globs,
          name: basename(entry.name, ".mdc"),
          description,
          content: body,
        }),
      );
    }
    return rules;
  }

  async generate(rules: Rule[], _target: string): Promise<GeneratedFile[]> {
    return rules.map((rule) => ({
      path: `${this.configDir}/${filenameStem(rule)}.mdc`,
      content: serializeFrontmatter(
        {
          description: rule.description,
          globs: rule.globs,
          alwaysApply: rule.activation === "always" ? true : undefined,
        },
        rule.content,
      ),
      format: "mdc" as const,
    }));
  }
}

/** `globs` may be one comma-separated string or a list. Empty means absent. */
export function normalizeGlobs(value: string | string[] | null | undefined): string[] | undefined {
  if (value === null || value === undefined) return undefined;
  const globs = (typeof value === "string" ? value.split(",").map((g) => g.trim()) : value).filter(
    (g) => g.length > 0,
  );
  return globs.length > 0 ? globs : undefined;
}
