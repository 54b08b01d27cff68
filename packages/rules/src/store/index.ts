export { PROJECTS_NAMESPACE, Store, USER_NAMESPACE } from "./store.js";
export type { InitOptions, StoreOptions, StoredRule } from "./store.js";
export { MANIFEST_FILE, loadManifest } from "./manifest.js";
export type { Manifest } from "./manifest.js";
export { mergeRules } from "./merge.js";
export type { MergeResult } from "./merge.js";
export { decodeRecord, encodeRecord } from "./record.js";
