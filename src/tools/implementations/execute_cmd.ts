/**
 * 執行 shell 命令工具：非交互、不加載 profile，完整收集輸出
 */

import { ToolExecutionError } from "../errors.js";
import type { ExecuteCmd } from "../schemas.js";
import { textOutput } from "../types.js";
import type { BuiltInToolHandler, ToolExecutionContext } from "../types.js";
import { runProcess } from "../../runtime/runner.js";
import type { CommandResult } from "../../runtime/runner.js";
import { expandEnvVars } from "../../utils/env.js";
import { createLogger } from "../../utils/logger.js";
import { AGENT_TOOLS_APP_NAME, AGENT_TOOLS_VERSION } from "../../version.js";

const logger = createLogger("executeCmd");

/** 覆蓋默認 shell 的環境變量 */
export const SHELL_ENV_VAR = "AGENT_TOOLS_SHELL";

export const USER_AGENT_ENV_VAR = "AGENT_TOOLS_EXECUTION_ENV";
export const USER_AGENT_VERSION_KEY = "AGENT_TOOLS_VERSION";

const EXECUTE_CMD_TOOL_DESCRIPTION = `
A tool for executing shell commands.

WHEN TO USE THIS TOOL:
- Use only as a last-resort when no other available tool can accomplish the task

HOW TO USE:
- Provide the command to execute

LIMITATIONS:
- Does not respect the user's shell profile
- Output is returned only after the command exits

TIPS:
- Use the fsRead and fsWrite tools for reading and modifying files
`;

const EXECUTE_CMD_SCHEMA = {
  type: "object",
  properties: {
    command: {
      type: "string",
      description: "Command to execute",
    },
  },
  required: ["command"],
};

/**
 * stdout 在前、stderr 在後，兩者之間恰好一個空行；都為空時報告退出碼
 */
export function formatCommandOutput(stdout: string, stderr: string, exitCode: number): string {
  if (stdout.length === 0 && stderr.length === 0) {
    return `Command exited with code ${exitCode}`;
  }
  if (stderr.length === 0) {
    return stdout;
  }
  if (stdout.length === 0) {
    return stderr;
  }
  const separator = stdout.endsWith("\n") ? "\n" : "\n\n";
  return stdout + separator + stderr;
}

/**
 * 注入到子進程的環境變量：固定的 user-agent 對加上配置中的 shellEnv，
 * 所有值都經過 `${env:NAME}` 展開
 */
export function commandEnv(ctx: ToolExecutionContext): Record<string, string> {
  return expandEnvVars(
    {
      [USER_AGENT_ENV_VAR]: AGENT_TOOLS_APP_NAME,
      [USER_AGENT_VERSION_KEY]: AGENT_TOOLS_VERSION,
      ...ctx.shellEnv,
    },
    (name) => ctx.provider.getEnv(name)
  );
}

export const executeCmdTool: BuiltInToolHandler<ExecuteCmd> = {
  name: "executeCmd",

  spec() {
    return {
      name: "executeCmd",
      description: EXECUTE_CMD_TOOL_DESCRIPTION,
      inputSchema: EXECUTE_CMD_SCHEMA,
    };
  },

  async validate(args) {
    return args.command.length === 0 ? "Command must not be empty" : null;
  },

  async execute(args, ctx) {
    const shell = ctx.provider.getEnv(SHELL_ENV_VAR) ?? ctx.platform.defaultShell;
    const shellArgs = ctx.platform.shellArgs(shell, args.command);
    logger.debug(`running with ${shell}: ${args.command}`);

    let result: CommandResult;
    try {
      result = await runProcess(shell, shellArgs, {
        cwd: ctx.provider.cwd(),
        env: { ...process.env, ...commandEnv(ctx) },
      });
    } catch (error) {
      throw ToolExecutionError.io(`failed to execute command with shell '${shell}'`, error);
    }

    // 被信號終止時沒有退出碼
    const exitCode = result.exitCode ?? -1;
    logger.debug(`command exited with code ${exitCode}`);
    return textOutput(formatCommandOutput(result.stdout, result.stderr, exitCode));
  },
};
