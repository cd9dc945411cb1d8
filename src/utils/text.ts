/**
 * UTF-8 安全的截斷與有上限的文件讀取
 *
 * 所有長度都以 UTF-8 字節計算（而不是 JS 字符串的 UTF-16 長度），
 * 截斷點永遠不會落在多字節字符的中間。
 */

import fs, { type FileHandle } from "fs/promises";
import { ToolExecutionError } from "../tools/errors.js";

function isContinuationByte(byte: number): boolean {
  return (byte & 0b1100_0000) === 0b1000_0000;
}

/**
 * 將字符串截斷到最多 `maxBytes` 個 UTF-8 字節。
 */
export function truncateSafe(s: string, maxBytes: number): string {
  const bytes = Buffer.from(s, "utf8");
  if (bytes.length <= maxBytes) {
    return s;
  }

  let end = Math.max(0, Math.floor(maxBytes));
  while (end > 0 && isContinuationByte(bytes[end])) {
    end--;
  }
  return bytes.subarray(0, end).toString("utf8");
}

/**
 * 截斷到 `maxBytes` 並在被截斷時附加 `suffix`，結果不會超過 `maxBytes`。
 *
 * If both `s` and `suffix` are larger than `maxBytes`, the result is the truncated suffix.
 */
export function truncateWithSuffix(s: string, maxBytes: number, suffix: string): string {
  if (Buffer.byteLength(s, "utf8") <= maxBytes) {
    return s;
  }

  const suffixBytes = Buffer.byteLength(suffix, "utf8");
  if (suffixBytes > maxBytes) {
    return truncateSafe(suffix, maxBytes);
  }

  return truncateSafe(s, maxBytes - suffixBytes) + suffix;
}

export interface BoundedFileContent {
  content: string;
  /** 相對於原文件被截掉（或被後綴覆蓋）的字節數，未截斷時為 0 */
  bytesTruncated: number;
}

/**
 * 讀取最多 `maxFileLength` 字節的文件內容，超出時以 `truncatedSuffix` 結尾。
 *
 * 無效的 UTF-8 序列會被替換而不是報錯。返回內容的字節長度保證不超過上限。
 */
export async function readFileWithMaxLimit(
  filePath: string,
  maxFileLength: number,
  truncatedSuffix: string
): Promise<BoundedFileContent> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch (error) {
    throw ToolExecutionError.io(`Failed to open file at '${filePath}'`, error);
  }

  try {
    let size: number;
    try {
      size = (await handle.stat()).size;
    } catch (error) {
      throw ToolExecutionError.io(`Failed to query file metadata at '${filePath}'`, error);
    }

    const toRead = Math.min(size, maxFileLength);
    const buffer = Buffer.alloc(toRead);
    let offset = 0;
    try {
      while (offset < toRead) {
        const { bytesRead } = await handle.read(buffer, offset, toRead - offset, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }
    } catch (error) {
      throw ToolExecutionError.io(`Failed to read from file at '${filePath}'`, error);
    }

    const content = buffer.subarray(0, offset).toString("utf8");
    if (size <= maxFileLength) {
      return { content, bytesTruncated: 0 };
    }

    const suffixBytes = Buffer.byteLength(truncatedSuffix, "utf8");
    if (suffixBytes > maxFileLength) {
      return { content: "", bytesTruncated: size };
    }

    return {
      content: truncateSafe(content, maxFileLength - suffixBytes) + truncatedSuffix,
      bytesTruncated: size - maxFileLength + suffixBytes,
    };
  } finally {
    await handle.close();
  }
}

/**
 * 按 `\n` 計算行數；末尾的換行符不產生額外的空行，`\r\n` 視為一個換行。
 */
export function countLines(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const newlines = text.split("\n").length - 1;
  return text.endsWith("\n") ? newlines : newlines + 1;
}

/**
 * 將文本拆成帶行尾的行，拼接結果與原文完全一致。
 */
export function linesWithEndings(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  while (start < text.length) {
    const idx = text.indexOf("\n", start);
    if (idx === -1) {
      lines.push(text.slice(start));
      break;
    }
    lines.push(text.slice(start, idx + 1));
    start = idx + 1;
  }
  return lines;
}
