/**
 * 對外導出的 API
 */

export { ToolExecutor, isMutatingTool } from "./tools/executor.js";
export type {
  ApprovalHandler,
  McpToolClient,
  ParsedToolCall,
  ToolCallResult,
  ToolExecutorOptions,
} from "./tools/executor.js";
export { ToolRegistry, builtInSpec, builtInToolNames, formatCanonicalToolName } from "./tools/registry.js";
export type { ResolveResult } from "./tools/registry.js";
export { parseTool, extractPurpose, TOOL_USE_PURPOSE_FIELD } from "./tools/parser.js";
export type { ParseResult } from "./tools/parser.js";
export {
  ToolExecutionError,
  ToolParseError,
  UnimplementedToolError,
  describeParseErrorKind,
} from "./tools/errors.js";
export type { ToolExecutionErrorKind, ToolParseErrorKind } from "./tools/errors.js";
export * from "./tools/types.js";
export * from "./tools/schemas.js";
export {
  createLineTracker,
  diffLineStats,
  fsWriteState,
  linesByAgent,
  linesByUser,
  recordWrite,
} from "./tools/line-tracker.js";
export type { FileLineTracker } from "./tools/line-tracker.js";
export { ToolSessionStore, createSessionId } from "./tools/session.js";
export type { ToolSession, ToolSessionData } from "./tools/session.js";
export {
  executeCmdTool,
  fsReadTool,
  fsWriteTool,
  imageReadTool,
  lsTool,
} from "./tools/implementations/index.js";
export { mergeConfigs, loadDotEnv, getConfigDir } from "./config.js";
export type { AgentToolsConfig, ConfigEnvironment, PartialConfig } from "./config.js";
export { truncateSafe, truncateWithSuffix, readFileWithMaxLimit } from "./utils/text.js";
export { expandEnvVars } from "./utils/env.js";
export type { EnvLookup } from "./utils/env.js";
export { ProcessSystemProvider, StaticSystemProvider, providerFromEnvironment } from "./utils/provider.js";
export type { SystemProvider } from "./utils/provider.js";
export { currentPlatform, posixPlatform, windowsPlatform } from "./utils/platform.js";
export type { ListingEntry, Platform } from "./utils/platform.js";
export { AGENT_TOOLS_VERSION } from "./version.js";
