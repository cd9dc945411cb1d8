import fs from "fs";
import os from "os";
import path from "path";
import { config as loadEnvFile } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { FriendlyError } from "./utils/error-handler.js";

export interface AgentToolsConfig {
  verbose: boolean;
  /** 注入 executeCmd 的額外環境變量，值支持 ${env:NAME} */
  shellEnv: Record<string, string>;
  /** 會話寫入統計的保存目錄 */
  sessionsDir: string;
  /** 跳過 fsWrite/executeCmd 的確認 */
  autoApprove: boolean;
}

const configFileSchema = z.object({
  verbose: z.boolean().optional(),
  shellEnv: z.record(z.string()).optional(),
  sessionsDir: z.string().min(1).optional(),
  autoApprove: z.boolean().optional(),
});

export type PartialConfig = z.infer<typeof configFileSchema>;

export const PROJECT_CONFIG_FILENAMES = [".agent-tools.json", ".agent-tools.yml", ".agent-tools.yaml"];

export interface ConfigEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  platform: NodeJS.Platform;
}

function defaultEnvironment(): ConfigEnvironment {
  return { cwd: process.cwd(), env: process.env, homeDir: os.homedir(), platform: process.platform };
}

export function getConfigDir(environment: ConfigEnvironment = defaultEnvironment()): string {
  const { env, homeDir } = environment;
  const envDir = env.AGENT_TOOLS_CONFIG_DIR;
  if (envDir) return envDir;

  if (environment.platform === "win32") {
    const appData = env.APPDATA || path.join(homeDir, "AppData", "Roaming");
    return path.join(appData, "agent-tools");
  }

  const xdg = env.XDG_CONFIG_HOME || path.join(homeDir, ".config");
  return path.join(xdg, "agent-tools");
}

export function getConfigPath(environment: ConfigEnvironment = defaultEnvironment()): string {
  return path.join(getConfigDir(environment), "config.json");
}

/**
 * 從工作目錄向上查找項目級配置文件
 */
export function findProjectConfig(startDir: string): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    for (const filename of PROJECT_CONFIG_FILENAMES) {
      const configPath = path.join(currentDir, filename);
      if (fs.existsSync(configPath)) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // 已到根目錄
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * 讀取並校驗一個配置文件；sessionsDir 的相對路徑按配置文件所在目錄解析
 */
export function readConfigFile(configPath: string): PartialConfig {
  let parsed: unknown;
  try {
    const raw = fs.readFileSync(configPath, "utf8");
    parsed = configPath.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FriendlyError(
      `無法讀取配置文件 ${configPath}: ${message}`,
      ["檢查文件格式（JSON 或 YAML）是否正確", "確認文件可讀"],
      { cause: error }
    );
  }

  // 空的 YAML 文件解析為 null
  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FriendlyError(`配置文件 ${configPath} 無效: ${issues}`, [
      "verbose 與 autoApprove 必須是布爾值",
      "shellEnv 必須是字符串到字符串的映射",
    ]);
  }

  const config = result.data;
  if (config.sessionsDir) {
    config.sessionsDir = path.resolve(path.dirname(configPath), config.sessionsDir);
  }
  return config;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

/**
 * 讀取環境變量中的配置
 */
export function loadEnvConfig(environment: ConfigEnvironment = defaultEnvironment()): PartialConfig {
  const { env, cwd } = environment;
  const config: PartialConfig = {};

  const verbose = parseBooleanEnv(env.AGENT_TOOLS_VERBOSE);
  if (verbose !== undefined) config.verbose = verbose;

  const autoApprove = parseBooleanEnv(env.AGENT_TOOLS_AUTO_APPROVE);
  if (autoApprove !== undefined) config.autoApprove = autoApprove;

  if (env.AGENT_TOOLS_SESSIONS_DIR) {
    config.sessionsDir = path.resolve(cwd, env.AGENT_TOOLS_SESSIONS_DIR);
  }

  return config;
}

export function loadUserConfig(environment: ConfigEnvironment = defaultEnvironment()): PartialConfig {
  const p = getConfigPath(environment);
  if (!fs.existsSync(p)) return {};
  return readConfigFile(p);
}

export function loadProjectConfig(environment: ConfigEnvironment = defaultEnvironment()): PartialConfig {
  const configPath = findProjectConfig(environment.cwd);
  if (!configPath) return {};
  return readConfigFile(configPath);
}

/**
 * 將 .env 加載到 process.env，已存在的變量不會被覆蓋
 */
export function loadDotEnv(cwd: string = process.cwd()): void {
  loadEnvFile({ path: path.join(cwd, ".env") });
}

function mergeInto(target: AgentToolsConfig, source: PartialConfig): AgentToolsConfig {
  return {
    verbose: source.verbose ?? target.verbose,
    autoApprove: source.autoApprove ?? target.autoApprove,
    sessionsDir: source.sessionsDir ?? target.sessionsDir,
    // shellEnv 按鍵合併
    shellEnv: { ...target.shellEnv, ...source.shellEnv },
  };
}

/**
 * 合併所有配置源
 * 優先級：CLI 參數 > 項目配置 > 用戶配置 > 環境變量 > 默認值
 */
export function mergeConfigs(
  cliArgs: PartialConfig = {},
  environment: ConfigEnvironment = defaultEnvironment()
): AgentToolsConfig {
  const defaults: AgentToolsConfig = {
    verbose: false,
    shellEnv: {},
    sessionsDir: path.join(getConfigDir(environment), "sessions"),
    autoApprove: false,
  };

  const cli: PartialConfig = { ...cliArgs };
  if (cli.sessionsDir) {
    cli.sessionsDir = path.resolve(environment.cwd, cli.sessionsDir);
  }

  let config = defaults;
  for (const source of [loadEnvConfig(environment), loadUserConfig(environment), loadProjectConfig(environment), cli]) {
    config = mergeInto(config, source);
  }
  return config;
}
