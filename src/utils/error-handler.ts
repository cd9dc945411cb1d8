/**
 * 友好的錯誤處理工具
 * 提供清晰的錯誤信息和解決建議
 */
import chalk from "chalk";

export interface ErrorSuggestion {
  message: string;
  suggestions: string[];
}

/**
 * 常見錯誤類型及其解決方案
 */
const ERROR_SOLUTIONS: Record<string, ErrorSuggestion> = {
  // 文件系統錯誤
  ENOENT: {
    message: "文件或目錄不存在",
    suggestions: ["檢查路徑是否正確", "相對路徑按當前工作目錄解析，必要時使用絕對路徑"],
  },
  EACCES: {
    message: "沒有權限訪問文件",
    suggestions: ["檢查文件權限", "確認文件未被其他程序佔用"],
  },
  EISDIR: {
    message: "期望文件，但給定的是目錄",
    suggestions: ["檢查路徑是否正確", "列出目錄請使用 ls 工具"],
  },
  ENOTDIR: {
    message: "期望目錄，但給定的是文件",
    suggestions: ["檢查路徑中的每一級是否都是目錄"],
  },
  EMFILE: {
    message: "打開的文件過多",
    suggestions: ["減小 ls 的 depth", "提高系統的文件描述符上限（ulimit -n）"],
  },

  // JSON 解析錯誤
  JSON: {
    message: "JSON 格式錯誤",
    suggestions: ["工具參數必須是一個 JSON 對象", "確認沒有多餘的逗號或引號"],
  },
};

/**
 * 創建帶建議的錯誤
 */
export class FriendlyError extends Error {
  suggestions: string[];

  constructor(message: string, suggestions: string[], options?: ErrorOptions) {
    super(message, options);
    this.name = "FriendlyError";
    this.suggestions = suggestions;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * 查找與錯誤匹配的建議：先看錯誤碼，再看錯誤信息
 */
export function findSuggestion(error: unknown): ErrorSuggestion | null {
  if (error instanceof FriendlyError) {
    return { message: error.message, suggestions: error.suggestions };
  }

  const code = errorCode(error);
  if (code && ERROR_SOLUTIONS[code]) {
    return ERROR_SOLUTIONS[code];
  }
  if (error instanceof SyntaxError && error.message.includes("JSON")) {
    return ERROR_SOLUTIONS.JSON;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  for (const [key, value] of Object.entries(ERROR_SOLUTIONS)) {
    if (errorMessage.includes(key)) {
      return value;
    }
  }
  return null;
}

export interface DisplayErrorOptions {
  context?: string;
  /** 顯示調用棧 */
  verbose?: boolean;
}

/**
 * 格式化並顯示友好的錯誤信息（輸出到 stderr）
 */
export function displayFriendlyError(error: unknown, options: DisplayErrorOptions = {}): void {
  const errorMessage = error instanceof Error ? error.message : String(error);

  console.error(chalk.red("\n❌ 錯誤發生"));

  if (options.context) {
    console.error(chalk.gray(`上下文: ${options.context}`));
  }

  const suggestion = findSuggestion(error);
  if (suggestion) {
    console.error(chalk.yellow(`\n💡 ${suggestion.message}`));
    if (suggestion.message !== errorMessage) {
      console.error(chalk.gray(errorMessage));
    }
    console.error(chalk.cyan("\n建議的解決方案:"));
    suggestion.suggestions.forEach((s, i) => {
      console.error(chalk.cyan(`  ${i + 1}. ${s}`));
    });
  } else {
    // 未知錯誤，顯示原始信息
    console.error(chalk.yellow(`\n詳細信息: ${errorMessage}`));
  }

  if (options.verbose && error instanceof Error) {
    console.error(chalk.gray("\n調試信息:"));
    console.error(chalk.gray(error.stack || error.message));
  }

  console.error();
}
