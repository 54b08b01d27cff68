import type { BaseRuleAdapter } from "../adapters/base.js";
import { getAdapter, type Format } from "../adapters/registry.js";
import { Store } from "../store/index.js";
import type { VersionControl } from "../sync/git.js";
import type { CodecContext, Rule, RuleScope } from "../types/index.js";
import { filterByScope, namespaceFor } from "./scope.js";

export type FlowResult = {
  rules: Rule[];
  /** Paths written, or on a dry run the paths a write would produce. */
  files: string[];
  warnings: string[];
};

type FlowOptions = {
  scope?: RuleScope;
  dryRun?: boolean;
  context?: CodecContext;
};

type StoreFlowOptions = FlowOptions & {
  store: Store;
  project?: string;
  vcs?: VersionControl;
  /** Clock for commit messages. */
  now?: () => Date;
};

export type ConvertOptions = FlowOptions & {
  from: Format;
  to: Format;
  input?: string;
  output?: string;
};

export type PushFormatOptions = StoreFlowOptions & {
  format: Format;
  input?: string;
};

export type PullFormatOptions = StoreFlowOptions & {
  format: Format;
  output?: string;
};

export type ConvertViaStoreOptions = StoreFlowOptions & {
  from: Format;
  to: Format;
  input?: string;
  output?: string;
};

export type ImportOptions = {
  store: Store;
  source: Store;
  namespace: string;
  vcs?: VersionControl;
};

export type PullStoreResult = {
  pulled: boolean;
  namespaces: Array<{ namespace: string; rules: number }>;
};

/** Format to format, without touching the store. */
export async function convert(options: ConvertOptions): Promise<FlowResult> {
  const source = getAdapter(options.from, options.context);
  const target = getAdapter(options.to, options.context);
  const input = rootFor(source, options.input, options.scope);

  const rules = filterByScope(await source.parse(input), options.scope);
  if (rules.length === 0) return empty(`no rules found in ${options.from} config at ${input}`);

  return emit(target, rules, rootFor(target, options.output, options.scope), options.dryRun);
}

/** Parse a format's config and replace the matching store namespace with it. */
export async function pushFormat(options: PushFormatOptions): Promise<FlowResult> {
  const adapter = getAdapter(options.format, options.context);
  const input = rootFor(adapter, options.input, options.scope);

  const rules = filterByScope(await adapter.parse(input), options.scope);
  if (rules.length === 0) return empty(`no rules found in ${options.format} config at ${input}`);
  if (options.dryRun) return { rules, files: [], warnings: [] };

  const namespace = namespaceFor(options.project, options.scope);
  const stored = await options.store.saveRules(namespace, rules, options.format);
  await commit(options, `push-format from ${options.format} (${today(options.now)})`);
  return { rules: stored, files: [], warnings: [] };
}

/** Write a store namespace out as a format's config. */
export async function pullFormat(options: PullFormatOptions): Promise<FlowResult> {
  const adapter = getAdapter(options.format, options.context);
  const namespace = namespaceFor(options.project, options.scope);

  const rules = filterByScope(await options.store.loadRules(namespace), options.scope);
  if (rules.length === 0) return empty(`no rules found in store namespace '${namespace}'`);

  return emit(adapter, rules, rootFor(adapter, options.output, options.scope), options.dryRun);
}

/** `convert` routed through the store, so the rules are kept under the project as well. */
export async function convertViaStore(options: ConvertViaStoreOptions): Promise<FlowResult> {
  const source = getAdapter(options.from, options.context);
  const target = getAdapter(options.to, options.context);
  const input = rootFor(source, options.input, options.scope);
  const output = rootFor(target, options.output, options.scope);

  const rules = filterByScope(await source.parse(input), options.scope);
  if (rules.length === 0) return empty(`no rules found in ${options.from} config at ${input}`);
  if (options.dryRun) return emit(target, rules, output, true);

  // An explicit project always wins here, even for user-scope rules.
  const namespace = options.project ?? namespaceFor(undefined, options.scope);
  const stored = await options.store.saveRules(namespace, rules, options.from);
  await commit(options, `convert from ${options.from} (${today(options.now)})`);

  return emit(target, filterByScope(stored, options.scope), output, false);
}

export async function pushStore(store: Store, vcs: VersionControl): Promise<void> {
  await vcs.push(store.root);
}

/**
 * Pull the remote into the store checkout. Git's merge is the reconciled state; every
 * namespace is read back once so a corrupt pulled record fails here, not on next use.
 */
export async function pullStore(store: Store, vcs: VersionControl): Promise<PullStoreResult> {
  const pulled = await vcs.pull(store.root);
  const namespaces: PullStoreResult["namespaces"] = [];
  for (const namespace of await store.listProjects()) {
    const rules = await store.loadRules(namespace);
    namespaces.push({ namespace, rules: rules.length });
  }
  return { pulled, namespaces };
}

/** Merge one namespace of another store checkout into this store by rule id. */
export async function importFromStore(options: ImportOptions): Promise<FlowResult> {
  const incoming = await options.source.loadRules(options.namespace);
  if (incoming.length === 0) {
    return empty(`no rules found in namespace '${options.namespace}' of ${options.source.root}`);
  }

  const { merged, warnings } = await options.store.mergeNamespace(options.namespace, incoming);
  if (options.vcs !== undefined) {
    await options.vcs.commit(
      options.store.root,
      `import ${options.namespace} from ${options.source.root}`,
    );
  }
  return { rules: merged, files: [], warnings };
}

/** Clone `remoteUrl` into `path` when given, then create the store there. */
export async function initStore(
  path: string,
  options: { remoteUrl?: string; vcs: VersionControl; now?: () => Date },
): Promise<Store> {
  if (options.remoteUrl !== undefined) await options.vcs.clone(options.remoteUrl, path);
  return Store.init(path, options);
}

export async function listProjects(store: Store): Promise<Array<{ name: string; rules: number }>> {
  const projects: Array<{ name: string; rules: number }> = [];
  for (const name of await store.listProjects()) {
    projects.push({ name, rules: (await store.loadRules(name)).length });
  }
  return projects;
}

export async function renameProject(
  store: Store,
  from: string,
  to: string,
  vcs?: VersionControl,
): Promise<void> {
  await store.renameProject(from, to);
  await vcs?.commit(store.root, `rename project ${from} -> ${to}`);
}

export async function removeProject(
  store: Store,
  name: string,
  vcs?: VersionControl,
): Promise<void> {
  await store.removeProject(name);
  await vcs?.commit(store.root, `remove project ${name}`);
}

function rootFor(adapter: BaseRuleAdapter, root: string | undefined, scope?: RuleScope): string {
  if (root !== undefined) return root;
  if (scope === "user") return adapter.userRoot() ?? ".";
  return ".";
}

async function emit(
  adapter: BaseRuleAdapter,
  rules: Rule[],
  root: string,
  dryRun = false,
): Promise<FlowResult> {
  if (dryRun) {
    const files = await adapter.generate(rules, root);
    return { rules, files: files.map((file) => file.path), warnings: adapter.check(rules) };
  }
  const { files, warnings } = await adapter.write(rules, root);
  return { rules, files, warnings };
}

async function commit(options: StoreFlowOptions, message: string): Promise<void> {
  await options.vcs?.commit(options.store.root, message);
}

function empty(reason: string): FlowResult {
  return { rules: [], files: [], warnings: [reason] };
}

function today(now: () => Date = () => new Date()): string {
  return now().toISOString().slice(0, 10);
}
