import { IoError, WriteFailureError } from "../errors.js";
import type { VersionControl } from "../sync/git.js";
import { STORE_VERSION, type Rule } from "../types/index.js";
import { filenameStem, sanitizeFilename } from "../utils/filename.js";
import { listDir, readText } from "../utils/fs.js";
import { writeAtomic } from "./atomic.js";
import { LOCK_FILE, withLock } from "./lock.js";
import {
  createManifest,
  loadManifest,
  manifestPath,
  saveManifest,
  type Manifest,
} from "./manifest.js";
import { mergeRules, type MergeResult } from "./merge.js";
import { decodeRecord, encodeRecord } from "./record.js";
import { existsSync } from "node:fs";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { v4 as uuidv4 } from "uuid";

export const USER_NAMESPACE = "user";
export const PROJECTS_NAMESPACE = "projects";
const LEGACY_USER_NAMESPACE = "_user";

const RULES_DIR = "rules";
const RECORD_EXT = ".yml";
const STAGING_PREFIX = ".staging-";
const TRASH_PREFIX = ".trash-";

const GITIGNORE = [
  LOCK_FILE,
  ".tmp-*",
  `${RULES_DIR}/${STAGING_PREFIX}*`,
  `${RULES_DIR}/${TRASH_PREFIX}*`,
  "",
].join("\n");

export type StoreOptions = {
  /** Clock for `createdAt`/`updatedAt`. */
  now?: () => Date;
};

export type InitOptions = StoreOptions & {
  remoteUrl?: string;
  /** Runs `init` on the root unless it is already a repository. */
  vcs?: VersionControl;
};

export type StoredRule = {
  namespace: string;
  rule: Rule;
};

type StoredRecord = {
  stem: string;
  rule: Rule;
};

/**
 * A directory of rule records grouped by namespace: `user` for user-scope rules, one
 * namespace per project key, and `projects` for named rules shared between projects.
 */
export class Store {
  private constructor(
    readonly root: string,
    private manifestData: Manifest,
    private readonly now: () => Date,
  ) {}

  get manifest(): Manifest {
    return this.manifestData;
  }

  static async init(root: string, options: InitOptions = {}): Promise<Store> {
    const absolute = resolve(root);
    const now = options.now ?? (() => new Date());
    try {
      await mkdir(absolute, { recursive: true });
    } catch (error) {
      throw new IoError(absolute, error);
    }

    if (existsSync(manifestPath(absolute))) {
      const existing = await loadManifest(absolute);
      if (options.remoteUrl !== undefined) {
        await saveManifest(absolute, { ...existing, remoteUrl: options.remoteUrl });
      }
    } else {
      await saveManifest(absolute, createManifest(now(), options.remoteUrl));
    }

    const gitignore = join(absolute, ".gitignore");
    if (!existsSync(gitignore)) await writeAtomic(gitignore, GITIGNORE);

    if (options.vcs !== undefined && !existsSync(join(absolute, ".git"))) {
      await options.vcs.init(absolute);
    }

    return Store.open(absolute, options);
  }

  /** Opens an existing store. Never creates one. */
  static async open(root: string, options: StoreOptions = {}): Promise<Store> {
    const absolute = resolve(root);
    const manifest = await loadManifest(absolute);
    const store = new Store(absolute, manifest, options.now ?? (() => new Date()));
    await store.migrateLegacyUserNamespace();
    return store;
  }

  async loadRules(namespace: string = USER_NAMESPACE): Promise<Rule[]> {
    const records = await this.readRecords(this.namespaceDir(namespace));
    return records.map((record) => record.rule);
  }

  /**
   * Replace the namespace's records with `rules`. Rules that match an existing record
   * (by name, or by content stem when unnamed) keep its id and creation time.
   */
  async saveRules(
    namespace: string,
    rules: readonly Rule[],
    sourceFormat: string,
  ): Promise<Rule[]> {
    const dir = this.namespaceDir(namespace);
    return withLock(this.root, async () => {
      const existing = await this.readRecords(dir);
      const claimed = new Set<StoredRecord>();
      const now = this.timestamp();

      const stored = rules.map((rule): Rule => {
        const predecessor = findPredecessor(existing, claimed, rule);
        if (predecessor !== undefined) claimed.add(predecessor);
        return {
          ...rule,
          id: predecessor?.rule.id ?? (rule.id !== "" ? rule.id : uuidv4()),
          createdAt: predecessor !== undefined ? (predecessor.rule.createdAt ?? now) : now,
          updatedAt: now,
          project: namespace,
          sourceFormat,
          storeVersion: STORE_VERSION,
        };
      });

      await this.replaceNamespace(dir, stored);
      return stored;
    });
  }

  async listProjects(): Promise<string[]> {
    const rulesDir = join(this.root, RULES_DIR);
    if (!existsSync(rulesDir)) return [];
    const entries = await listDir(rulesDir);
    return entries
      .filter((entry) => entry.isDirectory && !entry.name.startsWith("."))
      .map((entry) => entry.name);
  }

  async renameProject(from: string, to: string): Promise<void> {
    const source = this.namespaceDir(from);
    const target = this.namespaceDir(to);
    await withLock(this.root, async () => {
      if (!existsSync(source)) throw new WriteFailureError(source, `project '${from}' not found`);
      if (existsSync(target)) throw new WriteFailureError(target, `project '${to}' already exists`);
      try {
        await rename(source, target);
      } catch (error) {
        throw new IoError(target, error);
      }
    });
  }

  async removeProject(name: string): Promise<void> {
    const dir = this.namespaceDir(name);
    await withLock(this.root, async () => {
      if (!existsSync(dir)) throw new WriteFailureError(dir, `project '${name}' not found`);
      try {
        await rm(dir, { recursive: true });
      } catch (error) {
        throw new IoError(dir, error);
      }
    });
  }

  /** First record whose name or file stem equals `name`, searching `namespaces` in order. */
  async loadRuleByName(
    name: string,
    namespaces: readonly string[] = [PROJECTS_NAMESPACE, USER_NAMESPACE],
  ): Promise<StoredRule | undefined> {
    for (const namespace of namespaces) {
      const records = await this.readRecords(this.namespaceDir(namespace));
      const match = records.find((record) => record.stem === name || record.rule.name === name);
      if (match !== undefined) return { namespace, rule: match.rule };
    }
    return undefined;
  }

  /** Insert or update a single named record without touching the rest of the namespace. */
  async saveRuleToNamespace(namespace: string, name: string, rule: Rule): Promise<Rule> {
    const dir = this.namespaceDir(namespace);
    validateSegment(name, dir);
    return withLock(this.root, async () => {
      const existing = await this.readRecords(dir);
      const predecessor = existing.find((record) => record.rule.name === name);
      const now = this.timestamp();
      const stored: Rule = {
        ...rule,
        name: rule.name ?? name,
        id: predecessor?.rule.id ?? (rule.id !== "" ? rule.id : uuidv4()),
        createdAt: predecessor !== undefined ? (predecessor.rule.createdAt ?? now) : now,
        updatedAt: now,
        project: namespace,
        storeVersion: STORE_VERSION,
      };
      const stem =
        predecessor?.stem ??
        uniqueStem(sanitizeFilename(name), new Set(existing.map((record) => record.stem)));
      const fileName = `${stem}${RECORD_EXT}`;
      await writeAtomic(join(dir, fileName), encodeRecord(stored));
      return stored;
    });
  }

  /**
   * Merge `incoming` into the namespace by rule id and write the result back. Records keep
   * their metadata; only rules that were never persisted get an id and timestamps.
   */
  async mergeNamespace(namespace: string, incoming: readonly Rule[]): Promise<MergeResult> {
    const dir = this.namespaceDir(namespace);
    return withLock(this.root, async () => {
      const local = (await this.readRecords(dir)).map((record) => record.rule);
      const result = mergeRules(local, incoming);
      const now = this.timestamp();
      const merged = result.merged.map((rule): Rule => {
        if (rule.id !== "") return rule;
        return { ...rule, id: uuidv4(), createdAt: now, updatedAt: now, project: namespace };
      });
      await this.replaceNamespace(dir, merged);
      return { merged, warnings: result.warnings };
    });
  }

  async setRemote(url: string): Promise<void> {
    await withLock(this.root, async () => {
      const next = { ...this.manifestData, remoteUrl: url };
      await saveManifest(this.root, next);
      this.manifestData = next;
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private namespaceDir(namespace: string): string {
    const rulesDir = join(this.root, RULES_DIR);
    validateSegment(namespace, rulesDir);
    // Hidden entries under rules/ belong to in-flight writes.
    if (namespace.startsWith(".")) {
      throw new WriteFailureError(join(rulesDir, namespace), `invalid name '${namespace}'`);
    }
    return join(rulesDir, namespace);
  }

  private async readRecords(dir: string): Promise<StoredRecord[]> {
    if (!existsSync(dir)) return [];
    const records: StoredRecord[] = [];
    for (const entry of await listDir(dir)) {
      if (!entry.isFile || !entry.name.endsWith(RECORD_EXT)) continue;
      const path = join(dir, entry.name);
      records.push({
        stem: entry.name.slice(0, -RECORD_EXT.length),
        rule: decodeRecord(await readText(path), path),
      });
    }
    return records;
  }

  /** Write `rules` to a staging directory, then swap it in for `dir`. */
  private async replaceNamespace(dir: string, rules: readonly Rule[]): Promise<void> {
    const rulesDir = join(this.root, RULES_DIR);
    const staging = join(rulesDir, `${STAGING_PREFIX}${uuidv4()}`);

    try {
      await mkdir(staging, { recursive: true });
      for (const { fileName, rule } of assignFileNames(rules)) {
        await writeFile(join(staging, fileName), encodeRecord(rule), "utf-8");
      }
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw new IoError(staging, error);
    }

    if (!existsSync(dir)) {
      try {
        await rename(staging, dir);
      } catch (error) {
        await rm(staging, { recursive: true, force: true });
        throw new IoError(dir, error);
      }
      return;
    }

    const trash = join(rulesDir, `${TRASH_PREFIX}${uuidv4()}`);
    try {
      await rename(dir, trash);
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw new IoError(dir, error);
    }
    try {
      await rename(staging, dir);
    } catch (error) {
      await rename(trash, dir);
      await rm(staging, { recursive: true, force: true });
      throw new IoError(dir, error);
    }
    await rm(trash, { recursive: true, force: true });
  }

  private async migrateLegacyUserNamespace(): Promise<void> {
    const legacy = join(this.root, RULES_DIR, LEGACY_USER_NAMESPACE);
    const current = join(this.root, RULES_DIR, USER_NAMESPACE);
    if (!existsSync(legacy) || existsSync(current)) return;
    try {
      await rename(legacy, current);
    } catch (error) {
      throw new IoError(legacy, error);
    }
  }
}

function validateSegment(name: string, parent: string): void {
  if (name === "" || name === "." || name === ".." || /[/\\]/.test(name)) {
    throw new WriteFailureError(join(parent, name), `invalid name '${name}'`);
  }
}

function findPredecessor(
  existing: readonly StoredRecord[],
  claimed: ReadonlySet<StoredRecord>,
  rule: Rule,
): StoredRecord | undefined {
  return existing.find((record) => {
    if (claimed.has(record) || record.rule.id === "") return false;
    if (rule.name !== undefined) return record.rule.name === rule.name;
    return record.rule.name === undefined && filenameStem(record.rule) === filenameStem(rule);
  });
}

/** One file name per rule; repeated stems become `<stem>-2`, `<stem>-3`, ... */
function assignFileNames(rules: readonly Rule[]): Array<{ fileName: string; rule: Rule }> {
  const used = new Set<string>();
  return rules.map((rule) => {
    const stem = uniqueStem(filenameStem(rule), used);
    used.add(stem);
    return { fileName: `${stem}${RECORD_EXT}`, rule };
  });
}

function uniqueStem(stem: string, used: ReadonlySet<string>): string {
  let candidate = stem;
  for (let n = 2; used.has(candidate); n++) candidate = `${stem}-${n}`;
  return candidate;
}
