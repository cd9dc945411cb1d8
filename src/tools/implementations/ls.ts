/**
 * 列出目錄內容工具：廣度優先、按修改時間倒序、帶截斷統計
 */

import fs from "fs/promises";
import type { Dir, Stats } from "fs";
import path from "path";
import { ToolExecutionError } from "../errors.js";
import type { Ls } from "../schemas.js";
import { textOutput } from "../types.js";
import type { BuiltInToolHandler } from "../types.js";
import { canonicalizePath } from "../../utils/path.js";
import { matchesAnyPattern } from "../../utils/glob.js";
import type { ListingEntry } from "../../utils/platform.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("ls");

const LS_TOOL_DESCRIPTION = `
A tool for listing directory contents.

HOW TO USE:
- Provide the path to the directory you want to view
- Optionally provide a depth to recursively list directory contents
- Optionally provide a list of glob patterns to exclude files and directories from being searched

LIMITATIONS:
- Only 1000 entries will be returned
- Directories containing over 10000 entries will be truncated
`;

const LS_SCHEMA = {
  type: "object",
  properties: {
    path: {
      type: "string",
      description: "Path to the directory",
    },
    depth: {
      type: "integer",
      description: "Depth of a recursive directory listing",
      default: 0,
    },
    ignore: {
      type: "array",
      description: "List of glob patterns to ignore",
      items: {
        type: "string",
        description: "Glob pattern to ignore",
      },
    },
  },
  required: ["path"],
};

/**
 * 遞迴時不進入的目錄（仍然會作為條目列出），模型需要時可以直接列出它們
 */
export const IGNORED_DIRECTORIES = ["node_modules", "bin", "build", "dist", "out", ".cache", ".git"];

/** 返回給模型的最大條目數 */
export const MAX_LS_ENTRIES = 1000;

/** 單個目錄條目數的標記閾值 */
export const MAX_ENTRY_COUNT_PER_DIR = 10_000;

const DEFAULT_DEPTH = 0;

export interface DirectoryScan {
  /** 按修改時間從新到舊排列 */
  entries: ListingEntry[];
  /** 目錄條目超過 MAX_ENTRY_COUNT_PER_DIR（仍會讀完全部條目） */
  exceeded: boolean;
}

/**
 * 讀取單個目錄；匹配 ignore 的條目在取元數據之前就被跳過
 */
export async function scanDirectory(
  dirPath: string,
  ignore: readonly string[],
  maxEntries: number = MAX_ENTRY_COUNT_PER_DIR
): Promise<DirectoryScan> {
  let dir: Dir;
  try {
    dir = await fs.opendir(dirPath);
  } catch (error) {
    throw ToolExecutionError.io(`failed to read directory path '${dirPath}'`, error);
  }

  const entries: ListingEntry[] = [];
  let exceeded = false;

  try {
    for await (const dirent of dir) {
      const entryPath = path.join(dirPath, dirent.name);
      if (ignore.length > 0 && matchesAnyPattern(ignore, entryPath)) {
        logger.debug(`ignoring file: ${entryPath}`);
        continue;
      }

      let stats: Stats;
      try {
        stats = await fs.lstat(entryPath);
      } catch (error) {
        throw ToolExecutionError.io(`failed to get metadata for ${entryPath}`, error);
      }
      entries.push({
        path: entryPath,
        stats,
        lastModified: Math.floor(stats.mtimeMs / 1000),
      });
      if (entries.length > maxEntries) {
        exceeded = true;
      }
    }
  } catch (error) {
    if (error instanceof ToolExecutionError) throw error;
    throw ToolExecutionError.io(`failed to get next entry in '${dirPath}'`, error);
  }

  // 先按時間升序再整體反轉：最近修改的排在最前
  entries.sort((a, b) => a.lastModified - b.lastModified);
  entries.reverse();

  return { entries, exceeded };
}

export const lsTool: BuiltInToolHandler<Ls> = {
  name: "ls",

  spec() {
    return {
      name: "ls",
      description: LS_TOOL_DESCRIPTION,
      inputSchema: LS_SCHEMA,
    };
  },

  async validate(args, ctx) {
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
        return `Directory not found: ${resolved}`;
      }
      const message = error instanceof Error ? error.message : String(error);
      return `failed to check file metadata for path '${resolved}': ${message}`;
    }

    if (!stats.isDirectory()) {
      return `Path is not a directory: ${resolved}`;
    }
    return null;
  },

  async execute(args, ctx) {
    let root: string;
    try {
      root = canonicalizePath(args.path, ctx.provider);
    } catch (error) {
      throw ToolExecutionError.custom(error instanceof Error ? error.message : String(error));
    }
    const maxDepth = args.depth ?? DEFAULT_DEPTH;
    const ignore = args.ignore ?? [];
    logger.debug(`reading directory at ${root} with depth ${maxDepth}`);

    // 列表之前的說明行
    const prefix: string[] = [];
    const result: string[] = [];

    if (ctx.platform.name === "posix" && typeof process.geteuid === "function") {
      prefix.push(`User id: ${process.geteuid()}`);
    }

    const queue: Array<{ dirPath: string; depth: number }> = [{ dirPath: root, depth: 0 }];
    let truncated = false;

    while (queue.length > 0 && !truncated) {
      const next = queue.shift();
      if (!next || next.depth > maxDepth) {
        break;
      }

      const { entries, exceeded } = await scanDirectory(next.dirPath, ignore);

      for (const entry of entries) {
        if (result.length >= MAX_LS_ENTRIES) {
          prefix.push(
            `Directory at ${next.dirPath} was truncated (has total ${entries.length}${exceeded ? "+" : ""} entries)`
          );
          truncated = true;
          break;
        }

        result.push(ctx.platform.formatLongEntry(entry));

        if (entry.stats.isDirectory() && !matchesAnyPattern(IGNORED_DIRECTORIES, entry.path)) {
          queue.push({ dirPath: entry.path, depth: next.depth + 1 });
        }
      }
    }

    return textOutput(`${prefix.join("\n")}\n${result.join("\n")}`);
  },
};
