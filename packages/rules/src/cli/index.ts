import * as p from "@clack/prompts";
import { resolve } from "node:path";
import { describeFormats, parseFormat, type Format } from "../adapters/registry.js";
import { findConfigFile, loadConfig, resolveContext, resolveStorePath } from "../config/index.js";
import {
  convert,
  convertViaStore,
  importFromStore,
  initStore,
  listProjects,
  parseScope,
  pullFormat,
  pullStore,
  pushFormat,
  pushStore,
  removeProject,
  renameProject,
  type FlowResult,
} from "../convert/index.js";
import { Store, USER_NAMESPACE } from "../store/index.js";
import { GitClient } from "../sync/git.js";
import type { CodecContext, Rule, RuleScope, RuleportConfig } from "../types/index.js";

const HELP = `
ruleport - Convert AI coding assistant rules between tools, and keep them in a git-backed store

USAGE:
  ruleport <command> [options]

COMMANDS:
  list-formats              List the supported formats and where they keep their rules
  convert                   Convert rules from one format to another
  init                      Create the store (clone it when --repo is given)
  push-format               Parse a format's rules into the store
  pull-format               Write rules from the store as a format
  push-store                Push the store to its git remote
  pull-store                Pull the store from its git remote
  import-store              Merge a namespace from another store checkout into this one
  project list              List store namespaces with their rule counts
  project rename <a> <b>    Rename a namespace
  project remove <name>     Delete a namespace
  help                      Show this help message

OPTIONS:
  --from, --to     Source and target format for convert (e.g., --from=cursor --to=claude)
  --format         Format for push-format / pull-format
  --input          Directory to read from (default: current directory)
  --output         Directory to write to (default: current directory)
  --scope          Only rules of this scope: user, project or path
  --project        Store namespace; routes convert through the store
  --store          Store directory (default: $RULEPORT_STORE, config, ~/.ruleport/store)
  --repo           Remote to clone on init
  --source         Other store checkout for import-store
  --dry-run        Show what would be written without writing anything

EXAMPLES:
  ruleport convert --from=cursor --to=claude                 # .cursor/rules -> CLAUDE.md
  ruleport convert --from=windsurf --to=gemini --scope=user  # global rules between tools
  ruleport push-format --format=cursor --project=web         # keep this repo's rules
  ruleport pull-format --format=copilot --project=web        # write them for Copilot
`;

const PREVIEW_CHARS = 300;

type Flags = {
  from?: string;
  to?: string;
  format?: string;
  input?: string;
  output?: string;
  scope?: string;
  project?: string;
  store?: string;
  repo?: string;
  source?: string;
  dryRun?: boolean;
  positionals: string[];
};

type Environment = {
  config: RuleportConfig;
  context: CodecContext;
  storePath: string;
};

export async function run(args: string[]): Promise<void> {
  const command = args[0];
  const flags = parseFlags(args.slice(1));

  try {
    switch (command) {
      case "list-formats":
        cmdListFormats();
        break;
      case "convert":
        await cmdConvert(flags);
        break;
      case "init":
        await cmdInit(flags);
        break;
      case "push-format":
        await cmdPushFormat(flags);
        break;
      case "pull-format":
        await cmdPullFormat(flags);
        break;
      case "push-store":
        await cmdPushStore(flags);
        break;
      case "pull-store":
        await cmdPullStore(flags);
        break;
      case "import-store":
        await cmdImportStore(flags);
        break;
      case "project":
        await cmdProject(flags);
        break;
      case "help":
      case "--help":
      case "-h":
      case undefined:
        console.log(HELP);
        break;
      default:
        p.log.error(`Unknown command: ${command}`);
        console.log(HELP);
        process.exitCode = 1;
    }
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

function cmdListFormats(): void {
  for (const { format, name, layout } of describeFormats()) {
    p.log.info(`${format.padEnd(12)} ${name.padEnd(16)} ${layout}`);
  }
}

async function cmdConvert(flags: Flags): Promise<void> {
  const from = requireFormat(flags.from, "--from");
  const to = requireFormat(flags.to, "--to");
  const scope = scopeOf(flags);
  const env = await resolveEnvironment(flags);

  if (flags.project !== undefined) {
    const store = await Store.open(env.storePath);
    const result = await convertViaStore({
      store,
      from,
      to,
      input: flags.input,
      output: flags.output,
      project: flags.project,
      scope,
      dryRun: flags.dryRun,
      context: env.context,
      vcs: new GitClient(),
    });
    report(result, `Converted ${from} -> store/${flags.project} -> ${to}`, flags.dryRun);
    return;
  }

  const result = await convert({
    from,
    to,
    input: flags.input,
    output: flags.output,
    scope,
    dryRun: flags.dryRun,
    context: env.context,
  });
  report(result, `Converted ${from} -> ${to}`, flags.dryRun);
}

async function cmdInit(flags: Flags): Promise<void> {
  const env = await resolveEnvironment(flags);
  const remoteUrl = flags.repo ?? env.config.store?.remote;

  if (remoteUrl !== undefined) {
    p.log.step(`Cloning ${remoteUrl} -> ${env.storePath}`);
  } else {
    p.log.step(`Initializing local store at ${env.storePath}`);
  }

  if (flags.dryRun) {
    p.log.info("[dry-run] Nothing written");
    return;
  }

  await initStore(env.storePath, { remoteUrl, vcs: new GitClient() });
  p.log.success(`Store ready at ${env.storePath}`);
}

async function cmdPushFormat(flags: Flags): Promise<void> {
  const format = requireFormat(flags.format, "--format");
  const env = await resolveEnvironment(flags);
  const store = await Store.open(env.storePath);

  const result = await pushFormat({
    store,
    format,
    input: flags.input,
    project: flags.project,
    scope: scopeOf(flags),
    dryRun: flags.dryRun,
    context: env.context,
    vcs: new GitClient(),
  });
  report(result, `Stored ${format} rules in ${store.root}`, flags.dryRun);
}

async function cmdPullFormat(flags: Flags): Promise<void> {
  const format = requireFormat(flags.format, "--format");
  const env = await resolveEnvironment(flags);
  const store = await Store.open(env.storePath);

  const result = await pullFormat({
    store,
    format,
    output: flags.output,
    project: flags.project,
    scope: scopeOf(flags),
    dryRun: flags.dryRun,
    context: env.context,
  });
  report(result, `Wrote store rules as ${format}`, flags.dryRun);
}

async function cmdPushStore(flags: Flags): Promise<void> {
  const env = await resolveEnvironment(flags);
  const store = await Store.open(env.storePath);

  p.log.step("Pushing store to remote...");
  await pushStore(store, new GitClient());
  p.log.success("Done.");
}

async function cmdPullStore(flags: Flags): Promise<void> {
  const env = await resolveEnvironment(flags);
  const store = await Store.open(env.storePath);

  p.log.step("Pulling from remote...");
  const { pulled, namespaces } = await pullStore(store, new GitClient());
  if (!pulled) {
    p.log.warn("Remote has no history yet; nothing pulled");
    return;
  }
  const total = namespaces.reduce((sum, entry) => sum + entry.rules, 0);
  p.log.success(`Pull complete: ${total} rule(s) in ${namespaces.length} namespace(s)`);
}

async function cmdImportStore(flags: Flags): Promise<void> {
  if (flags.source === undefined) {
    throw new Error("Specify the other store with --source (e.g., --source=../team-rules)");
  }
  const env = await resolveEnvironment(flags);
  const store = await Store.open(env.storePath);
  const source = await Store.open(resolve(flags.source));
  const namespace = flags.project ?? USER_NAMESPACE;

  const result = await importFromStore({ store, source, namespace, vcs: new GitClient() });
  report(result, `Merged ${source.root} into store/${namespace}`, false);
}

async function cmdProject(flags: Flags): Promise<void> {
  const [subcommand, ...rest] = flags.positionals;
  const env = await resolveEnvironment(flags);
  const store = await Store.open(env.storePath);

  switch (subcommand) {
    case "list":
    case undefined: {
      const projects = await listProjects(store);
      if (projects.length === 0) {
        p.log.info("No projects in store.");
        return;
      }
      const lines = projects.map((entry) => `  ${entry.name} (${entry.rules} rule(s))`);
      p.log.info(["Projects in store:", ...lines].join("\n"));
      return;
    }
    case "rename": {
      const [from, to] = rest;
      if (from === undefined || to === undefined) {
        throw new Error("Usage: ruleport project rename <old> <new>");
      }
      await renameProject(store, from, to, new GitClient());
      p.log.success(`Renamed '${from}' -> '${to}'`);
      return;
    }
    case "remove": {
      const [name] = rest;
      if (name === undefined) throw new Error("Usage: ruleport project remove <name>");
      await removeProject(store, name, new GitClient());
      p.log.success(`Removed '${name}'`);
      return;
    }
    default:
      throw new Error(`Unknown project command: ${subcommand}`);
  }
}

function report(result: FlowResult, summary: string, dryRun = false): void {
  for (const warning of result.warnings) {
    p.log.warn(warning);
  }
  if (result.rules.length === 0) return;

  if (dryRun) {
    p.log.info(`[dry-run] ${result.rules.length} rule(s)`);
    for (const file of result.files) {
      p.log.message(`[dry-run] Would write: ${file}`);
    }
    result.rules.forEach((rule, index) => p.log.message(preview(rule, index)));
    return;
  }

  for (const file of result.files) {
    p.log.message(`Wrote: ${file}`);
  }
  p.log.success(`${summary} (${result.rules.length} rule(s))`);
}

function preview(rule: Rule, index: number): string {
  const lines = [`--- Rule ${index + 1} (${rule.scope}/${rule.activation}) ---`];
  if (rule.name !== undefined) lines.push(`name: ${rule.name}`);
  if (rule.description !== undefined) lines.push(`description: ${rule.description}`);
  lines.push(rule.content.slice(0, PREVIEW_CHARS));
  if (rule.content.length > PREVIEW_CHARS) {
    lines.push(`... (${rule.content.length} chars total)`);
  }
  return lines.join("\n");
}

async function resolveEnvironment(flags: Flags): Promise<Environment> {
  const configPath = findConfigFile();
  const config = configPath ? await loadConfig(configPath) : {};
  const context = resolveContext(config);
  const storePath = flags.store ? resolve(flags.store) : resolveStorePath(config, context);
  return { config, context, storePath };
}

function requireFormat(value: string | undefined, flag: string): Format {
  if (value === undefined) {
    throw new Error(`Specify ${flag} (e.g., ${flag}=cursor). Run 'ruleport list-formats' for options`);
  }
  return parseFormat(value);
}

function scopeOf(flags: Flags): RuleScope | undefined {
  return flags.scope === undefined ? undefined : parseScope(flags.scope);
}

function parseFlags(args: string[]): Flags {
  const flags: Flags = { positionals: [] };
  for (const arg of args) {
    if (arg.startsWith("--from=")) {
      flags.from = arg.slice(7);
    } else if (arg.startsWith("--to=")) {
      flags.to = arg.slice(5);
    } else if (arg.startsWith("--format=")) {
      flags.format = arg.slice(9);
    } else if (arg.startsWith("--input=")) {
      flags.input = arg.slice(8);
    } else if (arg.startsWith("--output=")) {
      flags.output = arg.slice(9);
    } else if (arg.startsWith("--scope=")) {
      flags.scope = arg.slice(8);
    } else if (arg.startsWith("--project=")) {
      flags.project = arg.slice(10);
    } else if (arg.startsWith("--store=")) {
      flags.store = arg.slice(8);
    } else if (arg.startsWith("--repo=")) {
      flags.repo = arg.slice(7);
    } else if (arg.startsWith("--source=")) {
      flags.source = arg.slice(9);
    } else if (arg === "--dry-run") {
      flags.dryRun = true;
    } else if (!arg.startsWith("--")) {
      flags.positionals.push(arg);
    }
  }
  return flags;
}
