/**
 * 文件寫入工具：創建、精確字符串替換、按行插入
 */

import fs from "fs/promises";
import path from "path";
import { ToolExecutionError } from "../errors.js";
import { fsWriteState, recordWrite } from "../line-tracker.js";
import type { FsWrite, Insert, StrReplace } from "../schemas.js";
import { countLines, linesWithEndings } from "../../utils/text.js";
import { canonicalizePath } from "../../utils/path.js";
import { emptyOutput } from "../types.js";
import type { BuiltInToolHandler, ToolExecutionContext } from "../types.js";

const FS_WRITE_TOOL_DESCRIPTION = `
A tool for creating and editing text files.

WHEN TO USE THIS TOOL:
- Use when you need to create a new file, or modify an existing file
- Perfect for updating text-based file formats

HOW TO USE:
- Provide the path to the file you want to create or modify
- Specify the operation to perform: one of \`create\`, \`strReplace\`, or \`insert\`
- Use \`create\` to create a new file. Required parameter is \`content\`. Parent directories will be created if they are missing.
- Use \`strReplace\` to replace and update the content of an existing file.
- Use \`insert\` to insert content at a specific line, or append content to the end of a file.

TIPS:
- To append content to the end of a file, use \`insert\` with no \`insertLine\`
`;

const FS_WRITE_SCHEMA = {
  type: "object",
  properties: {
    command: {
      type: "string",
      enum: ["create", "strReplace", "insert"],
      description: "The commands to run. Allowed options are: `create`, `strReplace`, `insert`",
    },
    content: {
      type: "string",
      description: "Required parameter of `create` and `insert` commands.",
    },
    insertLine: {
      type: "integer",
      description:
        "Optional parameter of `insert` command. Line is 0-indexed. `content` will be inserted at the provided line. If not provided, content will be inserted at the end of the file on a new line, inserting a newline at the end of the file if it is missing.",
    },
    newStr: {
      type: "string",
      description: "Required parameter of `strReplace` command containing the new string.",
    },
    oldStr: {
      type: "string",
      description: "Required parameter of `strReplace` command containing the string in `path` to replace.",
    },
    replaceAll: {
      type: "boolean",
      description:
        "Optional parameter of `strReplace` command. Default is false. When true, all instances of `oldStr` will be replaced with `newStr`.",
    },
    path: {
      type: "string",
      description: "Path to the file",
    },
  },
  required: ["command", "path"],
};

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw ToolExecutionError.io(`failed to read ${filePath}`, error);
  }
}

async function writeText(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw ToolExecutionError.io(`failed to write to ${filePath}`, error);
  }
}

/**
 * 統計不重疊出現的次數
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  return haystack.split(needle).length - 1;
}

/**
 * 按精確出現次數替換：0 次報錯，1 次直接替換，多次時必須 replaceAll
 */
export function applyStrReplace(file: string, edit: Pick<StrReplace, "oldStr" | "newStr" | "replaceAll">): string {
  const occurrences = countOccurrences(file, edit.oldStr);

  if (occurrences === 0) {
    throw ToolExecutionError.custom(`no occurrences of "${edit.oldStr}" were found`);
  }

  if (occurrences === 1) {
    const index = file.indexOf(edit.oldStr);
    return file.slice(0, index) + edit.newStr + file.slice(index + edit.oldStr.length);
  }

  if (!edit.replaceAll) {
    throw ToolExecutionError.custom(
      `${occurrences} occurrences of oldStr were found when only 1 is expected`
    );
  }
  // split/join 不會解析 $& 之類的替換模式
  return file.split(edit.oldStr).join(edit.newStr);
}

/**
 * 在第 insertLine 行（0 起算）之前插入；超出範圍時夾到文件末尾。
 * 不指定行號時追加到末尾，必要時先補一個換行。
 */
export function applyInsert(
  file: string,
  edit: Pick<Insert, "content" | "insertLine">,
  newline: string
): string {
  if (edit.insertLine === undefined) {
    const base = file.length > 0 && !file.endsWith(newline) ? file + newline : file;
    return base + edit.content;
  }

  const lines = linesWithEndings(file);
  const target = Math.min(Math.max(edit.insertLine, 0), countLines(file));

  let offset = 0;
  for (const line of lines.slice(0, target)) {
    offset += line.length;
  }

  let content = edit.content;
  if (!content.endsWith(newline)) {
    content += newline;
  }

  let head = file.slice(0, offset);
  // 最後一行沒有換行符時，插入的內容另起一行
  if (head.length > 0 && !head.endsWith("\n")) {
    head += newline;
  }
  return head + content + file.slice(offset);
}

async function executeCreate(filePath: string, content: string): Promise<void> {
  const parent = path.dirname(filePath);
  if (!(await pathExists(parent))) {
    try {
      await fs.mkdir(parent, { recursive: true });
    } catch (error) {
      throw ToolExecutionError.io(`failed to create directory ${parent}`, error);
    }
  }
  await writeText(filePath, content);
}

function resolveWritePath(args: FsWrite, ctx: ToolExecutionContext): string {
  try {
    return canonicalizePath(args.path, ctx.provider);
  } catch (error) {
    throw ToolExecutionError.custom(error instanceof Error ? error.message : String(error));
  }
}

export const fsWriteTool: BuiltInToolHandler<FsWrite> = {
  name: "fsWrite",

  spec() {
    return {
      name: "fsWrite",
      description: FS_WRITE_TOOL_DESCRIPTION,
      inputSchema: FS_WRITE_SCHEMA,
    };
  },

  async validate(args, ctx) {
    const errors: string[] = [];

    if (args.path.length === 0) {
      errors.push("Path must not be empty");
    }

    switch (args.command) {
      case "create":
        break;
      case "strReplace": {
        if (args.oldStr.length === 0) {
          errors.push("oldStr must not be empty");
        }
        let resolved: string;
        try {
          resolved = canonicalizePath(args.path, ctx.provider);
        } catch (error) {
          return error instanceof Error ? error.message : String(error);
        }
        if (!(await pathExists(resolved))) {
          errors.push("The provided path must exist in order to replace or insert contents into it");
        }
        break;
      }
      case "insert":
        if (args.content.length === 0) {
          errors.push("Content to insert must not be empty");
        }
        break;
    }

    return errors.length > 0 ? errors.join("\n") : null;
  },

  async execute(args, ctx) {
    const filePath = resolveWritePath(args, ctx);
    const before = ctx.state && (await pathExists(filePath)) ? await readText(filePath) : "";
    let after: string;

    switch (args.command) {
      case "create":
        await executeCreate(filePath, args.content);
        after = args.content;
        break;
      case "strReplace": {
        const file = await readText(filePath);
        after = applyStrReplace(file, args);
        await writeText(filePath, after);
        break;
      }
      case "insert": {
        const file = await readText(filePath);
        after = applyInsert(file, args, ctx.platform.newline);
        await writeText(filePath, after);
        break;
      }
    }

    if (ctx.state) {
      const trackers = fsWriteState(ctx.state).lineTrackers;
      trackers.set(filePath, recordWrite(trackers.get(filePath), before, after));
    }

    return emptyOutput();
  },
};
