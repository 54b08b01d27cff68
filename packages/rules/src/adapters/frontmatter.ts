/**
 * YAML frontmatter handling shared by the Cursor and Copilot codecs.
 */
import YAML from "yaml";
import type { z } from "zod";
import { ParseError } from "../errors.js";

type SplitResult = {
  /** Raw YAML between the delimiters, or undefined when the file has no block. */
  frontmatter: string | undefined;
  body: string;
};

/**
 * A block is recognised only when the file starts with a `---` line. It ends at the next
 * `---` line, or at a `---` that closes the file.
 */
export function splitFrontmatter(raw: string): SplitResult {
  if (!raw.startsWith("---\n")) return { frontmatter: undefined, body: raw };

  const rest = raw.slice(4);
  if (rest.startsWith("---\n")) return { frontmatter: "", body: rest.slice(4) };
  if (rest === "---") return { frontmatter: "", body: "" };

  const end = rest.indexOf("\n---\n");
  if (end !== -1) {
    return { frontmatter: rest.slice(0, end), body: rest.slice(end + 5) };
  }
  if (rest.endsWith("\n---")) {
    return { frontmatter: rest.slice(0, -4), body: "" };
  }
  return { frontmatter: undefined, body: raw };
}

/**
 * Split and validate a frontmatter block. The body loses the blank separator lines after
 * the block and its trailing whitespace; nothing else about it changes.
 */
export function parseFrontmatter<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  path: string,
): { data: z.infer<S>; body: string } {
  const { frontmatter, body } = splitFrontmatter(raw);

  let parsed: unknown = {};
  if (frontmatter !== undefined) {
    try {
      parsed = YAML.parse(frontmatter) ?? {};
    } catch (error) {
      throw new ParseError(path, error);
    }
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ParseError(path, new Error(formatIssues(result.error)));
  }

  const cleaned = frontmatter === undefined ? body : body.replace(/^\n+/, "");
  return { data: result.data, body: cleaned.trimEnd() };
}

export function serializeFrontmatter(data: Record<string, unknown>, body: string): string {
  const defined = Object.fromEntries(Object.entries(data).filter(([, v]) => v !== undefined));
  const yaml = Object.keys(defined).length > 0 ? YAML.stringify(defined, { lineWidth: 0 }) : "";
  return `---\n${yaml}---\n\n${body.trimEnd()}\n`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "frontmatter"}: ${issue.message}`)
    .join("; ");
}
