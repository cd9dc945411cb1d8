/**
 * 工具調用的錯誤分類
 *
 * - 解析錯誤（名稱不存在、參數不符合 schema）：ToolParseError
 * - 執行錯誤（IO 失敗或領域錯誤）：ToolExecutionError
 * - 宣告了但尚未接入的內建工具：UnimplementedToolError，直接拋出
 */

import type { ToolCall } from "./types.js";

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export type ToolExecutionErrorKind = "io" | "custom";

export class ToolExecutionError extends Error {
  readonly kind: ToolExecutionErrorKind;
  readonly context: string;

  private constructor(kind: ToolExecutionErrorKind, context: string, cause?: unknown) {
    super(cause === undefined ? context : `${context}: ${describeCause(cause)}`, { cause });
    this.name = "ToolExecutionError";
    this.kind = kind;
    this.context = context;
  }

  /**
   * 包裝文件系統或進程錯誤，context 描述嘗試的操作與涉及的路徑。
   */
  static io(context: string, cause?: unknown): ToolExecutionError {
    return new ToolExecutionError("io", context, cause);
  }

  static custom(message: string): ToolExecutionError {
    return new ToolExecutionError("custom", message);
  }

  /** 原始錯誤碼（如 ENOENT），僅 io 類型可能存在 */
  get code(): string | undefined {
    const cause = this.cause;
    if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
      return cause.code;
    }
    return undefined;
  }
}

export type ToolParseErrorKind =
  | { type: "nameDoesNotExist"; name: string }
  | { type: "schemaFailure"; message: string }
  | { type: "invalidArgs"; message: string }
  | { type: "other"; message: string };

export function describeParseErrorKind(kind: ToolParseErrorKind): string {
  switch (kind.type) {
    case "nameDoesNotExist":
      return `A tool with the name '${kind.name}' does not exist`;
    case "schemaFailure":
      return `The tool input does not match the tool schema: ${kind.message}`;
    case "invalidArgs":
      return `The tool arguments failed validation: ${kind.message}`;
    case "other":
      return `An unexpected error occurred parsing the tools: ${kind.message}`;
  }
}

export class ToolParseError extends Error {
  constructor(
    readonly toolCall: ToolCall,
    readonly kind: ToolParseErrorKind
  ) {
    super(`Failed to parse the tool use: ${describeParseErrorKind(kind)}`);
    this.name = "ToolParseError";
  }
}

/**
 * 宣告在內建工具集合中、但尚未接入分派流程的工具被執行時拋出。
 * 這是程式缺陷，不是可恢復的工具錯誤。
 */
export class UnimplementedToolError extends Error {
  constructor(readonly toolKind: string) {
    super(`Built-in tool '${toolKind}' is declared but not implemented`);
    this.name = "UnimplementedToolError";
  }
}
