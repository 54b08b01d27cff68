import type { Rule } from "../types/index.js";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const KEEP = /^[\p{L}\p{N}_-]$/u;

/**
 * Stable file name (without extension) for a rule. Sanitised name when there is one,
 * otherwise a hash of the content.
 */
export function filenameStem(rule: Pick<Rule, "name" | "content">): string {
  if (rule.name !== undefined) return sanitizeFilename(rule.name);
  return `rule_${fnv1a(rule.content).toString(16).padStart(8, "0")}`;
}

export function sanitizeFilename(name: string): string {
  let out = "";
  for (const ch of name) {
    if (KEEP.test(ch)) {
      out += ch;
    } else if (ch === " ") {
      out += "-";
    } else {
      out += "_";
    }
  }
  return out.toLowerCase();
}

/** 32-bit FNV-1a over the UTF-8 bytes. Not for anything security related. */
export function fnv1a(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(text, "utf-8")) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}
