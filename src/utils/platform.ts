/**
 * 與平台相關的行為：換行符、shell 調用方式、長格式目錄列表
 */

import path from "path";
import type { Stats } from "fs";

export interface ListingEntry {
  path: string;
  /** lstat 的結果，符號鏈接不會被跟隨 */
  stats: Stats;
  /** 最後修改時間（Unix 秒） */
  lastModified: number;
}

export interface Platform {
  name: "posix" | "windows";
  newline: string;
  defaultShell: string;
  /** macOS 截圖文件名中 AM/PM 前是窄不換行空格 */
  fixesScreenshotPaths: boolean;
  shellArgs(shell: string, command: string): string[];
  formatLongEntry(entry: ListingEntry): string;
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * 形如 `Mar 07 14:05`，按 UTC 輸出
 */
export function formatListingDate(unixSeconds: number): string {
  const d = new Date(unixSeconds * 1000);
  return `${MONTHS[d.getUTCMonth()]} ${pad2(d.getUTCDate())} ${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}`;
}

export function formatFileType(stats: Stats): string {
  if (stats.isSymbolicLink()) return "l";
  if (stats.isDirectory()) return "d";
  return "-";
}

/**
 * 將權限位格式化為 `ls` 的形式，如 0o644 -> `rw-r--r--`
 */
export function formatMode(mode: number): string {
  const symbols = ["r", "w", "x"];
  let result = "";
  for (let shift = 6; shift >= 0; shift -= 3) {
    const bits = (mode >> shift) & 0o7;
    for (let i = 0; i < 3; i++) {
      result += bits & (0o4 >> i) ? symbols[i] : "-";
    }
  }
  return result;
}

export const posixPlatform: Platform = {
  name: "posix",
  newline: "\n",
  defaultShell: "bash",
  fixesScreenshotPaths: process.platform === "darwin",

  shellArgs(shell, command) {
    const base = path.basename(shell);
    if (base === "bash") {
      return ["--noprofile", "--norc", "-c", command];
    }
    if (base === "zsh") {
      return ["--no-rcs", "-c", command];
    }
    return ["-c", command];
  },

  formatLongEntry({ path: entryPath, stats, lastModified }) {
    return [
      `${formatFileType(stats)}${formatMode(stats.mode)}`,
      stats.nlink,
      stats.uid,
      stats.gid,
      stats.size,
      formatListingDate(lastModified),
      entryPath,
    ].join(" ");
  },
};

export const windowsPlatform: Platform = {
  name: "windows",
  newline: "\r\n",
  defaultShell: "pwsh",
  fixesScreenshotPaths: false,

  shellArgs(_shell, command) {
    return ["-NoProfile", "-NonInteractive", "-Command", command];
  },

  formatLongEntry({ path: entryPath, stats, lastModified }) {
    return [formatFileType(stats), stats.size, formatListingDate(lastModified), entryPath].join(" ");
  },
};

export function currentPlatform(): Platform {
  return process.platform === "win32" ? windowsPlatform : posixPlatform;
}
