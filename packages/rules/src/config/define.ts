import type { RuleportConfig } from "../types/index.js";

/**
 * Define a ruleport configuration.
 * Use this as the default export of your `ruleport.config.ts`.
 *
 * @example
 * ```ts
 * import { defineConfig } from "@ruleport/rules";
 *
 * export default defineConfig({
 *   store: {
 *     path: "~/dotfiles/ruleport",
 *     remote: "git@example.com:me/rules.git",
 *   },
 * });
 * ```
 */
export function defineConfig(config: RuleportConfig): RuleportConfig {
  return config;
}
