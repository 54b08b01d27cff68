import { USER_NAMESPACE } from "../store/index.js";
import { RULE_SCOPES, type Rule, type RuleScope } from "../types/index.js";

export function parseScope(text: string): RuleScope {
  const value = text.trim().toLowerCase();
  const scope = RULE_SCOPES.find((candidate) => candidate === value);
  if (scope === undefined) {
    throw new Error(`Unknown scope '${text}': expected ${RULE_SCOPES.join(", ")}`);
  }
  return scope;
}

export function filterByScope(rules: readonly Rule[], scope?: RuleScope): Rule[] {
  if (scope === undefined) return [...rules];
  return rules.filter((rule) => rule.scope === scope);
}

/** User-scope rules always live in the `user` namespace; everything else under its project. */
export function namespaceFor(project?: string, scope?: RuleScope): string {
  if (scope === "user") return USER_NAMESPACE;
  return project ?? USER_NAMESPACE;
}
