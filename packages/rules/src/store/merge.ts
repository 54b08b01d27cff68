import type { Rule } from "../types/index.js";

export type MergeResult = {
  merged: Rule[];
  warnings: string[];
};

/**
 * Merge `incoming` into `local` by rule id. Local-only rules keep their position; unknown
 * incoming rules are appended; rules present on both sides resolve last-write-wins on
 * `updatedAt`, ties to local.
 */
export function mergeRules(local: readonly Rule[], incoming: readonly Rule[]): MergeResult {
  const merged = [...local];
  const warnings: string[] = [];

  for (const remote of incoming) {
    if (remote.id === "") {
      merged.push(remote);
      continue;
    }

    const index = merged.findIndex((rule) => rule.id === remote.id);
    const current = index === -1 ? undefined : merged[index];
    if (current === undefined) {
      merged.push(remote);
      continue;
    }

    if (
      current.content === remote.content &&
      current.scope === remote.scope &&
      current.activation === remote.activation
    ) {
      continue;
    }

    if (isNewer(remote.updatedAt, current.updatedAt)) {
      merged[index] = remote;
      warnings.push(`conflict on rule '${label(remote)}': remote version is newer, keeping remote`);
    } else {
      warnings.push(
        `conflict on rule '${label(current)}': local version is newer or equal, keeping local`,
      );
    }
  }

  return { merged, warnings };
}

function label(rule: Rule): string {
  return rule.name ?? rule.id;
}

function timestamp(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

function isNewer(candidate: string | undefined, baseline: string | undefined): boolean {
  const a = timestamp(candidate);
  const b = timestamp(baseline);
  if (a === undefined) return false;
  if (b === undefined) return true;
  return a > b;
}
