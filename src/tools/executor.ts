/**
 * 工具執行器：解析 → 校驗 → 執行 → 結果，一次處理一個工具調用
 */

import chalk from "chalk";
import { ToolExecutionError, ToolParseError, UnimplementedToolError } from "./errors.js";
import {
  executeCmdTool,
  fsReadTool,
  fsWriteTool,
  imageReadTool,
  lsTool,
} from "./implementations/index.js";
import { parseTool } from "./parser.js";
import { formatCanonicalToolName, ToolRegistry } from "./registry.js";
import { emptyOutput } from "./types.js";
import type {
  BuiltInTool,
  CanonicalToolName,
  JsonObject,
  Tool,
  ToolCall,
  ToolExecutionContext,
  ToolExecutionOutput,
} from "./types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("executor");

/**
 * 外部工具的傳輸層，由宿主提供
 */
export interface McpToolClient {
  callTool(serverName: string, toolName: string, params: JsonObject): Promise<ToolExecutionOutput>;
}

/**
 * 執行前的確認回調，返回 false 時不執行
 */
export type ApprovalHandler = (tool: Tool, name: CanonicalToolName) => Promise<boolean>;

export interface ToolExecutorOptions {
  mcpClient?: McpToolClient;
  approve?: ApprovalHandler;
}

export type ToolCallResult =
  | { status: "parseError"; toolCallId: string; error: ToolParseError }
  | { status: "validationError"; toolCallId: string; name: CanonicalToolName; message: string }
  | { status: "executionError"; toolCallId: string; name: CanonicalToolName; error: ToolExecutionError }
  | { status: "success"; toolCallId: string; name: CanonicalToolName; output: ToolExecutionOutput };

export type ParsedToolCall = { ok: true; name: CanonicalToolName; tool: Tool } | { ok: false; error: ToolParseError };

/** 會修改文件系統或運行任意命令的工具 */
export function isMutatingTool(tool: Tool): boolean {
  if (tool.kind.type !== "builtIn") return false;
  const kind = tool.kind.tool.kind;
  return kind === "fileWrite" || kind === "executeCmd";
}

export class ToolExecutor {
  constructor(
    private registry: ToolRegistry,
    private context: ToolExecutionContext,
    private options: ToolExecutorOptions = {}
  ) {}

  /**
   * 執行單個工具調用
   */
  async execute(toolCall: ToolCall): Promise<ToolCallResult> {
    const parsed = this.parse(toolCall);
    if (!parsed.ok) {
      logger.warn(parsed.error.message);
      return { status: "parseError", toolCallId: toolCall.id, error: parsed.error };
    }

    const { name, tool } = parsed;
    const displayName = formatCanonicalToolName(name);
    logger.debug(`parsed ${displayName}${tool.toolUsePurpose ? ` (${tool.toolUsePurpose})` : ""}`);

    const validationError = await this.validate(tool);
    if (validationError !== null) {
      logger.warn(`${displayName} failed validation: ${validationError}`);
      return { status: "validationError", toolCallId: toolCall.id, name, message: validationError };
    }
    logger.debug(`${displayName} passed validation`);

    if (this.options.approve && !(await this.options.approve(tool, name))) {
      return {
        status: "executionError",
        toolCallId: toolCall.id,
        name,
        error: ToolExecutionError.custom("The user rejected the tool use"),
      };
    }

    try {
      const output = await this.executeTool(tool);
      logger.debug(chalk.green(`✓ ${displayName}`));
      return { status: "success", toolCallId: toolCall.id, name, output };
    } catch (error) {
      if (error instanceof ToolExecutionError) {
        logger.warn(`${displayName} failed: ${error.message}`);
        return { status: "executionError", toolCallId: toolCall.id, name, error };
      }
      throw error;
    }
  }

  /**
   * 按順序執行多個工具調用，遇到第一個失敗即停止
   */
  async executeAll(toolCalls: ToolCall[]): Promise<ToolCallResult[]> {
    const results: ToolCallResult[] = [];

    for (const toolCall of toolCalls) {
      const result = await this.execute(toolCall);
      results.push(result);

      if (result.status !== "success") {
        logger.warn(`工具調用 "${toolCall.name}" 失敗，停止後續執行`);
        break;
      }
    }

    return results;
  }

  /**
   * 解析工具名和參數
   */
  parse(toolCall: ToolCall): ParsedToolCall {
    const resolved = this.registry.resolveToolName(toolCall.name);
    if (!resolved.ok) {
      return { ok: false, error: new ToolParseError(toolCall, resolved.error) };
    }

    const parsed = parseTool(resolved.name, toolCall.args);
    if (!parsed.ok) {
      return { ok: false, error: new ToolParseError(toolCall, parsed.error) };
    }
    return { ok: true, name: resolved.name, tool: parsed.tool };
  }

  /**
   * 執行前的語義校驗，不修改任何外部狀態
   */
  async validate(tool: Tool): Promise<string | null> {
    switch (tool.kind.type) {
      case "builtIn":
        return validateBuiltIn(tool.kind.tool, this.context);
      case "mcp":
        return null;
    }
  }

  /**
   * 直接執行已解析的工具；失敗時拋出 ToolExecutionError
   */
  async executeTool(tool: Tool): Promise<ToolExecutionOutput> {
    switch (tool.kind.type) {
      case "builtIn":
        return executeBuiltIn(tool.kind.tool, this.context);
      case "mcp": {
        const { serverName, toolName, params } = tool.kind.tool;
        const client = this.options.mcpClient;
        if (!client) {
          throw ToolExecutionError.custom(`No client is available for server '${serverName}'`);
        }

        let output: ToolExecutionOutput;
        try {
          output = await client.callTool(serverName, toolName, params);
        } catch (error) {
          if (error instanceof ToolExecutionError) throw error;
          const message = error instanceof Error ? error.message : String(error);
          throw ToolExecutionError.custom(`tool '${toolName}' on server '${serverName}' failed: ${message}`);
        }
        return output.items.length > 0 ? output : emptyOutput();
      }
    }
  }

  /**
   * 更新執行上下文
   */
  updateContext(updates: Partial<ToolExecutionContext>): void {
    Object.assign(this.context, updates);
  }
}

async function validateBuiltIn(tool: BuiltInTool, ctx: ToolExecutionContext): Promise<string | null> {
  switch (tool.kind) {
    case "fileRead":
      return fsReadTool.validate(tool.args, ctx);
    case "fileWrite":
      return fsWriteTool.validate(tool.args, ctx);
    case "ls":
      return lsTool.validate(tool.args, ctx);
    case "imageRead":
      return imageReadTool.validate(tool.args, ctx);
    case "executeCmd":
      return executeCmdTool.validate(tool.args, ctx);
    case "grep":
    case "mkdir":
    case "introspect":
    case "spawnSubagent":
      throw new UnimplementedToolError(tool.kind);
  }
}

async function executeBuiltIn(tool: BuiltInTool, ctx: ToolExecutionContext): Promise<ToolExecutionOutput> {
  switch (tool.kind) {
    case "fileRead":
      return fsReadTool.execute(tool.args, ctx);
    case "fileWrite":
      return fsWriteTool.execute(tool.args, ctx);
    case "ls":
      return lsTool.execute(tool.args, ctx);
    case "imageRead":
      return imageReadTool.execute(tool.args, ctx);
    case "executeCmd":
      return executeCmdTool.execute(tool.args, ctx);
    case "grep":
    case "mkdir":
    case "introspect":
    case "spawnSubagent":
      throw new UnimplementedToolError(tool.kind);
  }
}
