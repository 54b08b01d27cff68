export { defineConfig } from "./define.js";
export {
  loadConfig,
  findConfigFile,
  resolveContext,
  resolveStorePath,
  STORE_ENV_VAR,
  ConfigNotFoundError,
  ConfigValidationError,
} from "./loader.js";
