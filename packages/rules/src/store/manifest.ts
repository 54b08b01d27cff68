import { ParseError, StoreNotFoundError } from "../errors.js";
import { readText } from "../utils/fs.js";
import { writeAtomic } from "./atomic.js";
import { existsSync } from "node:fs";
import { join } from "node:path";
import YAML from "yaml";
import { z } from "zod";

export const MANIFEST_FILE = "manifest.yml";
export const MANIFEST_VERSION = "1";

const ManifestSchema = z.object({
  version: z.string(),
  created_at: z.string(),
  remote: z
    .object({
      url: z.string().optional(),
    })
    .optional(),
});

export type Manifest = {
  version: string;
  createdAt: string;
  remoteUrl?: string;
};

export function manifestPath(root: string): string {
  return join(root, MANIFEST_FILE);
}

export function createManifest(now: Date, remoteUrl?: string): Manifest {
  return { version: MANIFEST_VERSION, createdAt: now.toISOString(), remoteUrl };
}

export async function loadManifest(root: string): Promise<Manifest> {
  const path = manifestPath(root);
  if (!existsSync(path)) throw new StoreNotFoundError(root);

  const raw = await readText(path);
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ParseError(path, error);
  }

  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) throw new ParseError(path, result.error);
  return {
    version: result.data.version,
    createdAt: result.data.created_at,
    remoteUrl: result.data.remote?.url,
  };
}

export async function saveManifest(root: string, manifest: Manifest): Promise<void> {
  const doc = {
    version: manifest.version,
    created_at: manifest.createdAt,
    remote: manifest.remoteUrl !== undefined ? { url: manifest.remoteUrl } : undefined,
  };
  await writeAtomic(manifestPath(root), YAML.stringify(doc));
}
