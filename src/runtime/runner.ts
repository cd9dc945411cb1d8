import { spawn } from "child_process";

export interface CommandResult {
  program: string;
  args: string[];
  /** 被信號終止時為 null */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * 運行子進程直到結束，完整收集 stdout/stderr。
 * 非零退出碼不是錯誤，只有進程無法啟動時才會 reject。
 */
export function runProcess(program: string, args: string[], options: RunOptions): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    let finished = false;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const child = spawn(program, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      if (finished) return;
      finished = true;
      reject(err);
    });

    child.on("close", (code) => {
      if (finished) return;
      finished = true;
      resolve({
        program,
        args,
        exitCode: code,
        // 無效的 UTF-8 會被替換成 U+FFFD
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });
  });
}
