import type { CodecContext, RuleportConfig } from "../types/index.js";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";

const CONFIG_FILENAMES = [
  "ruleport.config.ts",
  "ruleport.config.js",
  "ruleport.config.mjs",
  "ruleport.config.mts",
];

export const STORE_ENV_VAR = "RULEPORT_STORE";

const ConfigSchema = z.object({
  store: z
    .object({
      path: z.string().optional(),
      remote: z.string().optional(),
    })
    .optional(),
  homeDir: z.string().optional(),
});

/**
 * Find the ruleport config file in the given directory.
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of CONFIG_FILENAMES) {
    const fullPath = resolve(cwd, name);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

/**
 * Load and validate a ruleport config from a file path.
 *
 * `.ts` and `.mts` files need a runtime that can import TypeScript (tsx, or a Node release
 * with type stripping).
 */
export async function loadConfig(configPath?: string, cwd?: string): Promise<RuleportConfig> {
  const resolvedPath = configPath ?? findConfigFile(cwd);

  if (!resolvedPath) {
    throw new ConfigNotFoundError(cwd ?? process.cwd());
  }

  if (!existsSync(resolvedPath)) {
    throw new ConfigNotFoundError(resolvedPath);
  }

  const fileUrl = pathToFileURL(resolve(resolvedPath)).href;
  const mod: unknown = await import(fileUrl);
  const exported = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;

  const result = ConfigSchema.safeParse(exported);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigValidationError(`Invalid config in ${resolvedPath}: ${issues}`);
  }
  return result.data;
}

export function resolveContext(
  config: RuleportConfig,
  env: Record<string, string | undefined> = process.env,
): CodecContext {
  return { homeDir: config.homeDir || env.HOME || homedir(), env };
}

/** `$RULEPORT_STORE`, then `store.path` from the config, then `~/.ruleport/store`. */
export function resolveStorePath(config: RuleportConfig, context: CodecContext): string {
  const fromEnv = context.env[STORE_ENV_VAR];
  if (fromEnv) return resolve(expandHome(fromEnv, context.homeDir));

  const fromConfig = config.store?.path;
  if (fromConfig) return resolve(expandHome(fromConfig, context.homeDir));

  return join(context.homeDir, ".ruleport", "store");
}

function expandHome(path: string, homeDir: string): string {
  if (path === "~") return homeDir;
  if (path.startsWith("~/")) return join(homeDir, path.slice(2));
  return path;
}

export class ConfigNotFoundError extends Error {
  constructor(searchPath: string) {
    super(
      `No ruleport config found. Searched in: ${searchPath}\n` +
        `Create a ruleport.config.ts file to set the store path or remote`,
    );
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}
