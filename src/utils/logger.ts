/**
 * 帶作用域的終端日誌。輸出到 stderr，避免與工具輸出混在一起。
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

let verboseEnabled = false;

/**
 * 開啟後 debug 級別的日誌也會輸出（AGENT_TOOLS_DEBUG 環境變量同樣生效）
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return verboseEnabled || Boolean(process.env.AGENT_TOOLS_DEBUG);
}

function write(level: LogLevel, scope: string, message: string): void {
  const tag = `[${scope}]`;
  switch (level) {
    case "debug":
      console.error(chalk.gray(`${tag} ${message}`));
      break;
    case "info":
      console.error(`${chalk.blue(tag)} ${message}`);
      break;
    case "warn":
      console.error(chalk.yellow(`${tag} ${message}`));
      break;
    case "error":
      console.error(chalk.red(`${tag} ${message}`));
      break;
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug(message) {
      if (isDebugEnabled()) write("debug", scope, message);
    },
    info(message) {
      write("info", scope, message);
    },
    warn(message) {
      write("warn", scope, message);
    },
    error(message, error) {
      write("error", scope, message);
      if (error instanceof Error && isDebugEnabled()) {
        console.error(chalk.gray(error.stack || error.message));
      }
    },
  };
}
