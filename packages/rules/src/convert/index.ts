export {
  convert,
  convertViaStore,
  importFromStore,
  initStore,
  listProjects,
  pullFormat,
  pullStore,
  pushFormat,
  pushStore,
  removeProject,
  renameProject,
} from "./flows.js";
export type {
  ConvertOptions,
  ConvertViaStoreOptions,
  FlowResult,
  ImportOptions,
  PullFormatOptions,
  PullStoreResult,
  PushFormatOptions,
} from "./flows.js";
export { filterByScope, namespaceFor, parseScope } from "./scope.js";
