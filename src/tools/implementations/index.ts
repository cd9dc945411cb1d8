/**
 * 導出所有內建工具實現
 */

export { fsReadTool } from "./fs_read.js";
export { fsWriteTool } from "./fs_write.js";
export { executeCmdTool } from "./execute_cmd.js";
export { imageReadTool } from "./image_read.js";
export { lsTool } from "./ls.js";

import type { BuiltInToolName, ToolSpec } from "../types.js";
import { fsReadTool } from "./fs_read.js";
import { fsWriteTool } from "./fs_write.js";
import { executeCmdTool } from "./execute_cmd.js";
import { imageReadTool } from "./image_read.js";
import { lsTool } from "./ls.js";

/**
 * 每個內建工具名都必須有對應的 spec，缺少時無法通過類型檢查
 */
export const builtInSpecs: Record<BuiltInToolName, () => ToolSpec> = {
  fsRead: () => fsReadTool.spec(),
  fsWrite: () => fsWriteTool.spec(),
  executeCmd: () => executeCmdTool.spec(),
  imageRead: () => imageReadTool.spec(),
  ls: () => lsTool.spec(),
};
