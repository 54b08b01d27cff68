import { ParseError } from "../errors.js";
import { ACTIVATIONS, RULE_SCOPES, STORE_VERSION, type Rule } from "../types/index.js";
import YAML from "yaml";
import { z } from "zod";

const RecordSchema = z.object({
  id: z.string(),
  project: z.string().optional(),
  source_format: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  store_version: z.string().default(STORE_VERSION),
  scope: z.enum(RULE_SCOPES),
  activation: z.enum(ACTIVATIONS),
  globs: z.array(z.string()).optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  content: z.string(),
});

type RuleRecord = z.input<typeof RecordSchema>;

export function encodeRecord(rule: Rule): string {
  const record: RuleRecord = {
    id: rule.id,
    project: rule.project,
    source_format: rule.sourceFormat,
    created_at: rule.createdAt,
    updated_at: rule.updatedAt,
    store_version: rule.storeVersion,
    scope: rule.scope,
    activation: rule.activation,
    globs: rule.globs,
    name: rule.name,
    description: rule.description,
    content: rule.content,
  };
  return YAML.stringify(record, { lineWidth: 0 });
}

export function decodeRecord(raw: string, path: string): Rule {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ParseError(path, error);
  }

  const result = RecordSchema.safeParse(parsed);
  if (!result.success) throw new ParseError(path, result.error);

  const record = result.data;
  return {
    scope: record.scope,
    activation: record.activation,
    globs: record.globs,
    name: record.name,
    description: record.description,
    content: record.content,
    id: record.id,
    project: record.project,
    sourceFormat: record.source_format,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
    storeVersion: record.store_version,
  };
}
