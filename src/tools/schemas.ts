/**
 * 內建工具參數的結構定義（只做形狀/類型檢查，語義驗證見各工具的 validate）
 */

import { z } from "zod";

export const fsReadSchema = z.object({
  path: z.string(),
  offset: z.number().int().nonnegative().optional(),
  limit: z.number().int().positive().optional(),
});

const fileCreateSchema = z.object({
  command: z.literal("create"),
  path: z.string(),
  content: z.string(),
});

const strReplaceSchema = z.object({
  command: z.literal("strReplace"),
  path: z.string(),
  oldStr: z.string(),
  newStr: z.string(),
  replaceAll: z.boolean().default(false),
});

const insertSchema = z.object({
  command: z.literal("insert"),
  path: z.string(),
  content: z.string(),
  insertLine: z.number().int().nonnegative().optional(),
});

export const fsWriteSchema = z.discriminatedUnion("command", [
  fileCreateSchema,
  strReplaceSchema,
  insertSchema,
]);

export const lsSchema = z.object({
  path: z.string(),
  depth: z.number().int().nonnegative().optional(),
  ignore: z.array(z.string()).optional(),
});

export const imageReadSchema = z.object({
  paths: z.array(z.string()),
});

export const executeCmdSchema = z.object({
  command: z.string(),
});

export type FsRead = z.infer<typeof fsReadSchema>;
export type FsWrite = z.infer<typeof fsWriteSchema>;
export type FileCreate = z.infer<typeof fileCreateSchema>;
export type StrReplace = z.infer<typeof strReplaceSchema>;
export type Insert = z.infer<typeof insertSchema>;
export type Ls = z.infer<typeof lsSchema>;
export type ImageRead = z.infer<typeof imageReadSchema>;
export type ExecuteCmd = z.infer<typeof executeCmdSchema>;

// 以下工具只有類型宣告，尚未提供名稱與 schema
export interface Grep {
  pattern: string;
  path?: string;
}

export interface Mkdir {
  path: string;
}

export interface Introspect {
  query?: string;
}

/**
 * 將 zod 的錯誤整理成一行一條的可讀文本
 */
export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("\n");
}
