import type { BaseRuleAdapter } from "./base.js";
import { AntigravityRuleAdapter } from "./antigravity.js";
import { ClaudeCodeRuleAdapter } from "./claude-code.js";
import { CopilotRuleAdapter } from "./copilot.js";
import { CursorRuleAdapter } from "./cursor.js";
import { GeminiCliRuleAdapter } from "./gemini-cli.js";
import { WindsurfRuleAdapter } from "./windsurf.js";
import type { CodecContext } from "../types/index.js";
import { UnknownFormatError } from "../errors.js";

export const FORMATS = ["cursor", "windsurf", "copilot", "claude", "gemini", "antigravity"] as const;

export type Format = (typeof FORMATS)[number];

const ALIASES: Record<string, Format> = {
  "github-copilot": "copilot",
  ghcopilot: "copilot",
  "claude-code": "claude",
  "gemini-cli": "gemini",
  "google-antigravity": "antigravity",
};

export function isFormat(value: string): value is Format {
  return FORMATS.some((format) => format === value);
}

/** Case-insensitive; accepts the documented aliases. */
export function parseFormat(value: string): Format {
  const key = value.trim().toLowerCase();
  if (isFormat(key)) return key;
  const alias = ALIASES[key];
  if (alias) return alias;
  throw new UnknownFormatError(value, FORMATS);
}

export function getAdapter(format: Format, context?: CodecContext): BaseRuleAdapter {
  switch (format) {
    case "cursor":
      return new CursorRuleAdapter(context);
    case "windsurf":
      return new WindsurfRuleAdapter(context);
    case "copilot":
      return new CopilotRuleAdapter(context);
    case "claude":
      return new ClaudeCodeRuleAdapter(context);
    case "gemini":
      return new GeminiCliRuleAdapter(context);
    case "antigravity":
      return new AntigravityRuleAdapter(context);
    default: {
      const unreachable: never = format;
      throw new UnknownFormatError(String(unreachable), FORMATS);
    }
  }
}

export function describeFormats(): Array<{ format: Format; name: string; layout: string }> {
  return FORMATS.map((format) => {
    const adapter = getAdapter(format);
    return { format, name: adapter.name, layout: adapter.layout };
  });
}
