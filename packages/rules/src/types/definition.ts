export const RULE_SCOPES = ["user", "project", "path"] as const;

export type RuleScope = (typeof RULE_SCOPES)[number];

export const ACTIVATIONS = ["always", "glob", "on_demand", "ai_decides"] as const;

/**
 * When a consuming tool injects a rule:
 * - `always`: on every request
 * - `glob`: when a file matching one of `globs` is in play
 * - `on_demand`: only when the user invokes it (slash command, @mention)
 * - `ai_decides`: the model picks it up from its `description`
 */
export type Activation = (typeof ACTIVATIONS)[number];

export const STORE_VERSION = "1";

export type Rule = {
  scope: RuleScope;
  activation: Activation;
  globs?: string[];
  name?: string;
  description?: string;
  /** Raw markdown. Never interpreted. */
  content: string;

  /** Empty until the rule is first persisted; never changes afterwards. */
  id: string;
  project?: string;
  sourceFormat?: string;
  createdAt?: string;
  updatedAt?: string;
  storeVersion: string;
};

export type RuleFields = Partial<Rule> & Pick<Rule, "content">;

export function createRule(fields: RuleFields): Rule {
  return {
    scope: "project",
    activation: "always",
    id: "",
    storeVersion: STORE_VERSION,
    ...fields,
  };
}
