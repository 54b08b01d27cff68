export { defineConfig } from "./config/index.js";
export {
  BaseRuleAdapter,
  FORMATS,
  describeFormats,
  getAdapter,
  parseFormat,
} from "./adapters/index.js";
export type { Format } from "./adapters/index.js";
export { Store, PROJECTS_NAMESPACE, USER_NAMESPACE, mergeRules } from "./store/index.js";
export type { Manifest, MergeResult, StoredRule } from "./store/index.js";
export {
  convert,
  convertViaStore,
  filterByScope,
  importFromStore,
  initStore,
  namespaceFor,
  parseScope,
  pullFormat,
  pullStore,
  pushFormat,
  pushStore,
} from "./convert/index.js";
export type { FlowResult } from "./convert/index.js";
export { GitClient } from "./sync/git.js";
export type { VersionControl } from "./sync/git.js";
export {
  IoError,
  ParseError,
  StoreNotFoundError,
  UnknownFormatError,
  VersionControlError,
  WriteFailureError,
} from "./errors.js";
export { createRule, ACTIVATIONS, RULE_SCOPES } from "./types/index.js";
export type {
  Activation,
  CodecContext,
  GeneratedFile,
  Rule,
  RuleScope,
  RuleportConfig,
  WriteResult,
} from "./types/index.js";
