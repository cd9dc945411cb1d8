/**
 * 將規範名稱與原始參數解析為帶類型的工具值（只檢查形狀，不做語義校驗）
 */

import type { z } from "zod";
import type { ToolParseErrorKind } from "./errors.js";
import {
  executeCmdSchema,
  formatSchemaIssues,
  fsReadSchema,
  fsWriteSchema,
  imageReadSchema,
  lsSchema,
} from "./schemas.js";
import type { BuiltInTool, BuiltInToolName, CanonicalToolName, Tool } from "./types.js";
import { describeJsonType, isJsonObject, isPlainObject } from "../utils/json.js";

/** 任何工具都接受、解析前會被移除的字段 */
export const TOOL_USE_PURPOSE_FIELD = "toolUsePurpose";

export type ParseResult = { ok: true; tool: Tool } | { ok: false; error: ToolParseErrorKind };

/**
 * 移除 toolUsePurpose 字段；只有字符串值會被保留下來
 */
export function extractPurpose(rawArgs: unknown): { purpose?: string; args: unknown } {
  if (!isPlainObject(rawArgs) || !(TOOL_USE_PURPOSE_FIELD in rawArgs)) {
    return { args: rawArgs };
  }
  const { [TOOL_USE_PURPOSE_FIELD]: purpose, ...rest } = rawArgs;
  return { purpose: typeof purpose === "string" ? purpose : undefined, args: rest };
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: unknown,
  build: (value: T) => BuiltInTool
): { ok: true; tool: BuiltInTool } | { ok: false; error: ToolParseErrorKind } {
  const result = schema.safeParse(args);
  if (!result.success) {
    return { ok: false, error: { type: "schemaFailure", message: formatSchemaIssues(result.error) } };
  }
  return { ok: true, tool: build(result.data) };
}

function parseBuiltIn(name: BuiltInToolName, args: unknown) {
  switch (name) {
    case "fsRead":
      return parseWith(fsReadSchema, args, (value) => ({ kind: "fileRead", args: value }));
    case "fsWrite":
      return parseWith(fsWriteSchema, args, (value) => ({ kind: "fileWrite", args: value }));
    case "executeCmd":
      return parseWith(executeCmdSchema, args, (value) => ({ kind: "executeCmd", args: value }));
    case "imageRead":
      return parseWith(imageReadSchema, args, (value) => ({ kind: "imageRead", args: value }));
    case "ls":
      return parseWith(lsSchema, args, (value) => ({ kind: "ls", args: value }));
  }
}

export function parseTool(name: CanonicalToolName, rawArgs: unknown): ParseResult {
  const { purpose, args } = extractPurpose(rawArgs);
  const withPurpose = purpose === undefined ? {} : { toolUsePurpose: purpose };

  switch (name.kind) {
    case "builtIn": {
      const parsed = parseBuiltIn(name.name, args);
      if (!parsed.ok) return parsed;
      return { ok: true, tool: { ...withPurpose, kind: { type: "builtIn", tool: parsed.tool } } };
    }
    case "mcp": {
      if (!isJsonObject(args)) {
        return {
          ok: false,
          error: {
            type: "invalidArgs",
            message: `Arguments must be an object, instead found ${describeJsonType(args)}`,
          },
        };
      }
      return {
        ok: true,
        tool: {
          ...withPurpose,
          kind: {
            type: "mcp",
            tool: { serverName: name.serverName, toolName: name.toolName, params: args },
          },
        },
      };
    }
    case "agent":
      return { ok: false, error: { type: "other", message: "Unimplemented" } };
  }
}
