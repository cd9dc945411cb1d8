/**
 * 工具調用系統的核心類型定義
 */

import type {
  ExecuteCmd,
  FsRead,
  FsWrite,
  Grep,
  ImageRead,
  Introspect,
  Ls,
  Mkdir,
} from "./schemas.js";
import type { FileLineTracker } from "./line-tracker.js";
import type { SystemProvider } from "../utils/provider.js";
import type { Platform } from "../utils/platform.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * 內建工具名稱，同時也是發給模型的工具名（順序固定）
 */
export const BUILT_IN_TOOL_NAMES = ["fsRead", "fsWrite", "executeCmd", "imageRead", "ls"] as const;

export type BuiltInToolName = (typeof BUILT_IN_TOOL_NAMES)[number];

export function isBuiltInToolName(name: string): name is BuiltInToolName {
  return BUILT_IN_TOOL_NAMES.some((n) => n === name);
}

/**
 * 統一內建工具與外部註冊（MCP）工具的命名。
 * agent 類型已保留，目前解析時一律失敗。
 */
export type CanonicalToolName =
  | { kind: "builtIn"; name: BuiltInToolName }
  | { kind: "mcp"; serverName: string; toolName: string }
  | { kind: "agent"; agentName: string };

export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: JsonObject;
}

/**
 * 模型發出的原始工具調用
 */
export interface ToolCall {
  id: string;
  name: string;
  args: unknown;
}

export interface McpTool {
  serverName: string;
  toolName: string;
  params: JsonObject;
}

/**
 * 解析後的內建工具。grep、mkdir、introspect、spawnSubagent 已宣告但未接入分派。
 */
export type BuiltInTool =
  | { kind: "fileRead"; args: FsRead }
  | { kind: "fileWrite"; args: FsWrite }
  | { kind: "grep"; args: Grep }
  | { kind: "ls"; args: Ls }
  | { kind: "mkdir"; args: Mkdir }
  | { kind: "imageRead"; args: ImageRead }
  | { kind: "executeCmd"; args: ExecuteCmd }
  | { kind: "introspect"; args: Introspect }
  | { kind: "spawnSubagent" };

export type ToolKind = { type: "builtIn"; tool: BuiltInTool } | { type: "mcp"; tool: McpTool };

/**
 * 準備好執行的工具：只會被分派一次
 */
export interface Tool {
  toolUsePurpose?: string;
  kind: ToolKind;
}

export const IMAGE_FORMATS = ["png", "jpeg", "gif", "webp"] as const;

export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export interface ImageBlock {
  format: ImageFormat;
  source: { type: "bytes"; bytes: Buffer };
}

export type ToolExecutionOutputItem =
  | { type: "text"; text: string }
  | { type: "json"; value: JsonValue }
  | { type: "image"; image: ImageBlock };

/**
 * 工具輸出：至少包含一項，沒有具體輸出時是一個空文本
 */
export interface ToolExecutionOutput {
  items: ToolExecutionOutputItem[];
}

export function emptyOutput(): ToolExecutionOutput {
  return { items: [{ type: "text", text: "" }] };
}

export function textOutput(text: string): ToolExecutionOutput {
  return { items: [{ type: "text", text }] };
}

export interface FsWriteState {
  /** 以規範化後的絕對路徑為鍵 */
  lineTrackers: Map<string, FileLineTracker>;
}

/**
 * 會話持有的、工具執行時需要的可變狀態
 */
export interface ToolState {
  fileWrite?: FsWriteState;
}

/**
 * 工具調用上下文：包含執行時所需的所有信息
 */
export interface ToolExecutionContext {
  provider: SystemProvider;
  platform: Platform;
  state?: ToolState;
  /** 額外注入 executeCmd 的環境變量，值支持 ${env:NAME} 佔位符 */
  shellEnv?: Record<string, string>;
}

/**
 * 單個內建工具的實現：名稱、描述、schema 與校驗/執行邏輯
 */
export interface BuiltInToolHandler<TArgs> {
  name: BuiltInToolName;
  spec(): ToolSpec;
  validate(args: TArgs, ctx: ToolExecutionContext): Promise<string | null>;
  execute(args: TArgs, ctx: ToolExecutionContext): Promise<ToolExecutionOutput>;
}
