/**
 * 讀取文本文件工具，可按行範圍讀取，輸出有字節上限
 */

import fs from "fs/promises";
import type { Stats } from "fs";
import { ToolExecutionError } from "../errors.js";
import type { FsRead } from "../schemas.js";
import { textOutput } from "../types.js";
import type { BuiltInToolHandler } from "../types.js";
import { canonicalizePath } from "../../utils/path.js";
import { linesWithEndings, readFileWithMaxLimit, truncateWithSuffix } from "../../utils/text.js";

/** 返回內容的最大字節數（包含截斷後綴） */
export const MAX_READ_BYTES = 250_000;

export const TRUNCATED_SUFFIX = "\n...truncated";

const FS_READ_TOOL_DESCRIPTION = `
A tool for reading text files.

WHEN TO USE THIS TOOL:
- Use when you need to see the contents of a file

HOW TO USE:
- Provide the path to the file you want to read
- Optionally provide \`offset\` (0-indexed line) and \`limit\` (number of lines) to read part of a file

LIMITATIONS:
- Content larger than 250000 bytes is truncated
`;

const FS_READ_SCHEMA = {
  type: "object",
  properties: {
    path: {
      type: "string",
      description: "Path to the file",
    },
    offset: {
      type: "integer",
      description: "0-indexed line to start reading from",
    },
    limit: {
      type: "integer",
      description: "Maximum number of lines to read",
    },
  },
  required: ["path"],
};

/**
 * 取出 [offset, offset + limit) 範圍的行，保留行尾
 */
export function selectLines(text: string, offset = 0, limit?: number): string {
  const lines = linesWithEndings(text);
  const end = limit === undefined ? lines.length : offset + limit;
  return lines.slice(offset, end).join("");
}

export const fsReadTool: BuiltInToolHandler<FsRead> = {
  name: "fsRead",

  spec() {
    return {
      name: "fsRead",
      description: FS_READ_TOOL_DESCRIPTION,
      inputSchema: FS_READ_SCHEMA,
    };
  },

  async validate(args, ctx) {
    if (args.path.length === 0) {
      return "Path must not be empty";
    }

    let resolved: string;
    try {
      resolved = canonicalizePath(args.path, ctx.provider);
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }

    let stats: Stats;
    try {
      stats = await fs.stat(resolved);
    } catch (error) {
      const code = error && typeof error === "object" && "code" in error ? error.code : undefined;
      if (code === "ENOENT") {
        return `File not found: ${resolved}`;
      }
      const message = error instanceof Error ? error.message : String(error);
      return `failed to check file metadata for path '${resolved}': ${message}`;
    }

    if (!stats.isFile()) {
      return `Path is not a file: ${resolved}`;
    }
    return null;
  },

  async execute(args, ctx) {
    let filePath: string;
    try {
      filePath = canonicalizePath(args.path, ctx.provider);
    } catch (error) {
      throw ToolExecutionError.custom(error instanceof Error ? error.message : String(error));
    }

    if (args.offset === undefined && args.limit === undefined) {
      const { content } = await readFileWithMaxLimit(filePath, MAX_READ_BYTES, TRUNCATED_SUFFIX);
      return textOutput(content);
    }

    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw ToolExecutionError.io(`failed to read ${filePath}`, error);
    }
    const selected = selectLines(text, args.offset, args.limit);
    return textOutput(truncateWithSuffix(selected, MAX_READ_BYTES, TRUNCATED_SUFFIX));
  },
};
