export { BaseRuleAdapter, defaultContext } from "./base.js";
export { SimpleMarkdownRuleAdapter, joinRules } from "./simple-adapter.js";
export { CursorRuleAdapter, normalizeGlobs } from "./cursor.js";
export { WindsurfRuleAdapter, FILE_CHAR_LIMIT, TOTAL_CHAR_LIMIT } from "./windsurf.js";
export { CopilotRuleAdapter } from "./copilot.js";
export { ClaudeCodeRuleAdapter } from "./claude-code.js";
export { GeminiCliRuleAdapter } from "./gemini-cli.js";
export { AntigravityRuleAdapter } from "./antigravity.js";
export { splitFrontmatter, parseFrontmatter, serializeFrontmatter } from "./frontmatter.js";
export { FORMATS, describeFormats, getAdapter, isFormat, parseFormat } from "./registry.js";
export type { Format } from "./registry.js";
