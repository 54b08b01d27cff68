export { ACTIVATIONS, RULE_SCOPES, STORE_VERSION, createRule } from "./definition.js";
export type { Activation, Rule, RuleFields, RuleScope } from "./definition.js";
export type { CodecContext, GeneratedFile, RuleportConfig, WriteResult } from "./config.js";
