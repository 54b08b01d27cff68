import { BaseRuleAdapter } from "./base.js";
import { createRule } from "../types/index.js";
import type { Activation, GeneratedFile, Rule, RuleScope } from "../types/index.js";
import { ParseError } from "../errors.js";
import { filenameStem } from "../utils/filename.js";
import { listDir, readText } from "../utils/fs.js";
import { existsSync } from "node:fs";
import { basename, join, resolve } from "node:path";

const MAIN_FILE = "CLAUDE.md";
const SETTINGS_FILE = "settings.json";
const SETTINGS_RULE = "settings";
const FENCED_JSON = /^```json\n([\s\S]*?)\n?```$/;

/**
 * Claude Code keeps project config in `CLAUDE.md` plus `.claude/`. The user config is the
 * `~/.claude` directory itself, so when the root is named `.claude` the same layout is read
 * without the prefix.
 *
 * | path                 | activation  |
 * |----------------------|-------------|
 * | `CLAUDE.md`          | always      |
 * | `rules/*.md`         | always      |
 * | `commands/*.md`      | on_demand   |
 * | `skills/<name>/SKILL.md` | ai_decides |
 * | `agents/*.md`        | ai_decides  |
 * | `settings.json`      | always, as a fenced json block |
 */
export class ClaudeCodeRuleAdapter extends BaseRuleAdapter {
  readonly id = "claude";
  readonly name = "Claude Code";
  readonly layout = "CLAUDE.md + .claude/{rules,commands,agents}/*.md, .claude/skills/*/SKILL.md";

  override userRoot(): string {
    return join(this.context.homeDir, ".claude");
  }

  async parse(root: string): Promise<Rule[]> {
    const user = isUserRoot(root);
    const scope: RuleScope = user ? "user" : "project";
    const base = user ? resolve(root) : resolve(root, ".claude");
    const rules: Rule[] = [];

    const mainFile = resolve(root, MAIN_FILE);
    if (existsSync(mainFile)) {
      const content = await readText(mainFile);
      if (content.trim() !== "") {
        rules.push(createRule({ scope, activation: "always", name: "claude", content: content.trimEnd() }));
      }
    }

    rules.push(...(await parseMarkdownDir(join(base, "rules"), scope, "always")));
    rules.push(...(await parseMarkdownDir(join(base, "commands"), scope, "on_demand")));
    rules.push(...(await parseSkillsDir(join(base, "skills"), scope)));
    rules.push(...(await parseMarkdownDir(join(base, "agents"), scope, "ai_decides")));

    const settings = join(base, SETTINGS_FILE);
    if (existsSync(settings)) {
      const raw = await readText(settings);
      if (raw.trim() !== "") {
        try {
          JSON.parse(raw);
        } catch (error) {
          throw new ParseError(settings, error);
        }
        rules.push(
          createRule({
            scope,
            activation: "always",
            name: SETTINGS_RULE,
            content: "```json\n" + raw.trimEnd() + "\n```",
          }),
        );
      }
    }

    return rules;
  }

  async generate(rules: Rule[], target: string): Promise<GeneratedFile[]> {
    const prefix = isUserRoot(target) ? "" : ".claude/";
    const alwaysCount = rules.filter((r) => r.activation === "always" && !isSettingsRule(r)).length;

    return rules.map((rule): GeneratedFile => {
      const settings = settingsJson(rule);
      if (settings !== undefined) {
        return { path: `${prefix}${SETTINGS_FILE}`, content: `${settings}\n`, format: "json" };
      }

      const content = `${rule.content.trimEnd()}\n`;
      const stem = filenameStem(rule);
      switch (rule.activation) {
        case "always":
          if (rule.name === "claude" || alwaysCount === 1) {
            return { path: MAIN_FILE, content, format: "md" };
          }
          return { path: `${prefix}rules/${stem}.md`, content, format: "md" };
        case "glob":
          return { path: `${prefix}rules/${stem}.md`, content, format: "md" };
        case "on_demand":
          return { path: `${prefix}commands/${stem}.md`, content, format: "md" };
        case "ai_decides":
          return { path: `${prefix}skills/${stem}/SKILL.md`, content, format: "md" };
      }
    });
  }

  override check(rules: Rule[]): string[] {
    return rules
      .filter((rule) => rule.activation === "glob")
      .map(
        (rule) =>
          `rule '${rule.name ?? filenameStem(rule)}' is glob-scoped; Claude rules are always-on, globs dropped`,
      );
  }
}

function isUserRoot(root: string): boolean {
  return basename(resolve(root)) === ".claude";
}

function isSettingsRule(rule: Rule): boolean {
  return settingsJson(rule) !== undefined;
}

/** Inner JSON of a `settings` rule, or undefined for any other rule. */
function settingsJson(rule: Rule): string | undefined {
  if (rule.name !== SETTINGS_RULE) return undefined;
  const match = FENCED_JSON.exec(rule.content.trim());
  return match?.[1];
}

async function parseMarkdownDir(dir: string, scope: RuleScope, activation: Activation): Promise<Rule[]> {
  if (!existsSync(dir)) return [];

  const rules: Rule[] = [];
  for (const entry of await listDir(dir)) {
    if (!entry.isFile || !entry.name.endsWith(".md")) continue;
    const content = await readText(join(dir, entry.name));
    if (content.trim() === "") continue;
    rules.push(
      createRule({ scope, activation, name: basename(entry.name, ".md"), content: content.trimEnd() }),
    );
  }
  return rules;
}

/** Each skill is a subdirectory holding `SKILL.md`; the directory name is the skill name. */
async function parseSkillsDir(dir: string, scope: RuleScope): Promise<Rule[]> {
  if (!existsSync(dir)) return [];

  const rules: Rule[] = [];
  for (const entry of await listDir(dir)) {
    if (!entry.isDirectory) continue;
    const skillFile = join(dir, entry.name, "SKILL.md");
    if (!existsSync(skillFile)) continue;
    const content = await readText(skillFile);
    if (content.trim() === "") continue;
    rules.push(createRule({ scope, activation: "ai_decides", name: entry.name, content: content.trimEnd() }));
  }
  return rules;
}
