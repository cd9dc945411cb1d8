#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import inquirer from "inquirer";
import os from "os";
import { loadDotEnv, mergeConfigs } from "./config.js";
import type { AgentToolsConfig, ConfigEnvironment } from "./config.js";
import { isMutatingTool, ToolExecutor } from "./tools/executor.js";
import type { ApprovalHandler, McpToolClient, ToolCallResult } from "./tools/executor.js";
import { linesByAgent, linesByUser } from "./tools/line-tracker.js";
import { formatCanonicalToolName, ToolRegistry } from "./tools/registry.js";
import { createSessionId, ToolSessionStore } from "./tools/session.js";
import type { ToolSession } from "./tools/session.js";
import type { CanonicalToolName, Tool, ToolExecutionContext, ToolExecutionOutputItem } from "./tools/types.js";
import { displayFriendlyError } from "./utils/error-handler.js";
import { setVerbose } from "./utils/logger.js";
import { currentPlatform } from "./utils/platform.js";
import { providerFromEnvironment } from "./utils/provider.js";
import { AGENT_TOOLS_VERSION } from "./version.js";

export interface CliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  registry?: ToolRegistry;
  mcpClient?: McpToolClient;
  /** 替換交互式確認（測試用） */
  confirm?: (message: string) => Promise<boolean>;
  /** 強制認為 stdin 是否為 TTY */
  interactive?: boolean;
}

interface RunFlags {
  session?: string | boolean;
  yes?: boolean;
  verbose?: boolean;
}

async function promptConfirm(message: string): Promise<boolean> {
  const { approved } = await inquirer.prompt<{ approved: boolean }>([
    { type: "confirm", name: "approved", message, default: false },
  ]);
  return approved;
}

/**
 * 將工具調用轉換為人類可讀的描述
 */
export function humanizeTool(tool: Tool, name: CanonicalToolName): string {
  if (tool.kind.type === "mcp") {
    return `🔨 調用外部工具: ${chalk.bold(formatCanonicalToolName(name))}`;
  }

  const builtIn = tool.kind.tool;
  switch (builtIn.kind) {
    case "fileRead":
      return `📖 讀取檔案: ${chalk.bold(builtIn.args.path)}`;
    case "fileWrite":
      return `✍️  寫入檔案 (${builtIn.args.command}): ${chalk.bold(builtIn.args.path)}`;
    case "ls":
      return `📂 列出目錄內容: ${chalk.bold(builtIn.args.path)}`;
    case "imageRead":
      return `🖼️  讀取圖片: ${chalk.bold(builtIn.args.paths.join(", "))}`;
    case "executeCmd":
      return `⚙️  執行命令: ${chalk.bold(builtIn.args.command)}`;
    default:
      return `🔨 執行工具: ${formatCanonicalToolName(name)}`;
  }
}

function formatOutputItem(item: ToolExecutionOutputItem): string {
  switch (item.type) {
    case "text":
      return item.text;
    case "json":
      return JSON.stringify(item.value, null, 2);
    case "image":
      return `[image/${item.image.format}, ${item.image.source.bytes.length} bytes]`;
  }
}

/**
 * 打印結果，返回是否成功
 */
export function printResult(result: ToolCallResult): boolean {
  switch (result.status) {
    case "success":
      for (const item of result.output.items) {
        console.log(formatOutputItem(item));
      }
      return true;
    case "parseError":
      console.error(chalk.red(result.error.message));
      return false;
    case "validationError":
      console.error(chalk.red(`校驗失敗 (${formatCanonicalToolName(result.name)}):`));
      console.error(result.message);
      return false;
    case "executionError":
      console.error(chalk.red(`執行失敗 (${formatCanonicalToolName(result.name)}):`));
      console.error(result.error.message);
      return false;
  }
}

export function createProgram(options: CliOptions = {}): Command {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const registry = options.registry ?? new ToolRegistry();
  const environment: ConfigEnvironment = { cwd, env, homeDir: os.homedir(), platform: process.platform };

  const loadConfig = (flags: RunFlags = {}): AgentToolsConfig => {
    const config = mergeConfigs({ verbose: flags.verbose, autoApprove: flags.yes }, environment);
    setVerbose(config.verbose);
    return config;
  };

  const program = new Command();
  program
    .name("agent-tools")
    .description("Parse, validate and execute coding-agent tool calls")
    .version(AGENT_TOOLS_VERSION);

  program
    .command("list")
    .description("列出所有可用工具")
    .action(() => {
      for (const name of registry.listTools()) {
        console.log(formatCanonicalToolName(name));
      }
    });

  program
    .command("spec")
    .description("以 JSON 輸出工具的名稱、描述與輸入 schema")
    .argument("[name]", "工具名稱，省略時輸出全部")
    .action((name: string | undefined) => {
      if (name === undefined) {
        console.log(JSON.stringify(registry.getAllSpecs(), null, 2));
        return;
      }
      const resolved = registry.resolveToolName(name);
      const spec = resolved.ok ? registry.getSpec(resolved.name) : undefined;
      if (!spec) {
        console.error(chalk.red(`工具 "${name}" 不存在`));
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(spec, null, 2));
    });

  program
    .command("run")
    .description("執行一次工具調用")
    .argument("<name>", "工具名稱，外部工具形如 @server/tool")
    .argument("[argsJson]", "JSON 格式的參數", "{}")
    .option("--session [id]", "累積寫入統計的會話 ID，省略 ID 時創建新會話")
    .option("-y, --yes", "跳過 fsWrite/executeCmd 的確認")
    .option("--verbose", "顯示調試日誌")
    .action(async (name: string, argsJson: string, flags: RunFlags) => {
      const config = loadConfig(flags);

      let args: unknown;
      try {
        args = JSON.parse(argsJson);
      } catch (error) {
        displayFriendlyError(error, { context: "解析工具參數", verbose: config.verbose });
        process.exitCode = 1;
        return;
      }

      const store = new ToolSessionStore(config.sessionsDir);
      let session: ToolSession | undefined;
      if (flags.session !== undefined) {
        const sessionId = typeof flags.session === "string" ? flags.session : createSessionId();
        session = await store.open(sessionId);
        console.error(chalk.gray(`會話: ${session.sessionId}`));
      }

      const context: ToolExecutionContext = {
        provider: providerFromEnvironment(cwd, env, os.homedir()),
        platform: currentPlatform(),
        state: session?.state,
        shellEnv: config.shellEnv,
      };

      const interactive = options.interactive ?? Boolean(process.stdin.isTTY);
      const confirm = options.confirm ?? promptConfirm;
      const approve: ApprovalHandler | undefined =
        config.autoApprove || !interactive
          ? undefined
          : async (tool, toolName) => {
              if (!isMutatingTool(tool)) return true;
              console.error(chalk.yellow("\n[需要確認]"));
              console.error(humanizeTool(tool, toolName));
              return confirm("是否執行此操作?");
            };

      const executor = new ToolExecutor(registry, context, { mcpClient: options.mcpClient, approve });
      const result = await executor.execute({ id: `cli_${Date.now()}`, name, args });

      if (session && result.status === "success") {
        await store.save(session);
      }

      if (!printResult(result)) {
        process.exitCode = 1;
      }
    });

  program
    .command("stats")
    .description("顯示會話中每個文件的寫入統計")
    .argument("<sessionId>", "會話 ID")
    .action(async (sessionId: string) => {
      const config = loadConfig();
      const session = await new ToolSessionStore(config.sessionsDir).load(sessionId);
      if (!session) {
        console.error(chalk.red(`會話 ${sessionId} 不存在`));
        process.exitCode = 1;
        return;
      }

      const trackers = session.state.fileWrite?.lineTrackers;
      if (!trackers || trackers.size === 0) {
        console.log(chalk.gray("沒有寫入記錄"));
        return;
      }
      for (const [filePath, tracker] of trackers) {
        console.log(chalk.bold(filePath));
        console.log(`  lines: ${tracker.afterFsWriteLines}`);
        console.log(`  agent: +${tracker.linesAddedByAgent} -${tracker.linesRemovedByAgent} (${linesByAgent(tracker)})`);
        console.log(`  user: ${linesByUser(tracker)}`);
      }
    });

  return program;
}

async function main() {
  // 加載 .env（優先級最低，不覆蓋已有變量）
  loadDotEnv();
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((err) => {
    displayFriendlyError(err, { context: "agent-tools", verbose: Boolean(process.env.AGENT_TOOLS_DEBUG) });
    process.exit(1);
  });
}
