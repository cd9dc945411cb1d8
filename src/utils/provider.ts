/**
 * 系統訪問的抽象：工作目錄、家目錄與環境變量，方便測試時替換
 */

import os from "os";

export interface SystemProvider {
  cwd(): string;
  homeDir(): string | undefined;
  getEnv(name: string): string | undefined;
}

export class ProcessSystemProvider implements SystemProvider {
  cwd(): string {
    return process.cwd();
  }

  homeDir(): string | undefined {
    return os.homedir() || undefined;
  }

  getEnv(name: string): string | undefined {
    return process.env[name];
  }
}

/**
 * 固定工作目錄和環境變量的 provider
 */
export class StaticSystemProvider implements SystemProvider {
  constructor(
    private readonly workingDir: string,
    private readonly env: Record<string, string> = {},
    private readonly home?: string
  ) {}

  cwd(): string {
    return this.workingDir;
  }

  homeDir(): string | undefined {
    return this.home;
  }

  getEnv(name: string): string | undefined {
    return this.env[name];
  }
}

/**
 * 由 process.env 形式的環境構造 provider，值為 undefined 的變量會被丟棄
 */
export function providerFromEnvironment(
  workingDir: string,
  env: NodeJS.ProcessEnv,
  home?: string
): StaticSystemProvider {
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) vars[key] = value;
  }
  return new StaticSystemProvider(workingDir, vars, home);
}
