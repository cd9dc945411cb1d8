/**
 * CLI 命令的單元測試（在進程內運行 commander 程序）
 */
import { describe, it, expect, beforeAll, beforeEach, afterEach, jest } from '@jest/globals';
import chalk from 'chalk';
import fs from 'fs/promises';
import path from 'path';
import { createProgram } from '../../src/cli.js';
import type { CliOptions } from '../../src/cli.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('agent-tools CLI', () => {
  let dir: string;
  let log: jest.SpiedFunction<typeof console.log>;
  let error: jest.SpiedFunction<typeof console.error>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    await removeTempDir(dir);
  });

  async function run(argv: string[], options: Partial<CliOptions> = {}): Promise<void> {
    const program = createProgram({
      cwd: dir,
      env: { AGENT_TOOLS_CONFIG_DIR: path.join(dir, 'cfg'), AGENT_TOOLS_SHELL: 'sh' },
      interactive: false,
      ...options,
    });
    await program.parseAsync(argv, { from: 'user' });
  }

  it('list 列出內建與外部工具', async () => {
    const registry = new ToolRegistry();
    registry.registerExternalTool('tracker', { name: 'search', description: 'Search', inputSchema: {} });
    await run(['list'], { registry });

    expect(log.mock.calls).toEqual([['fsRead'], ['fsWrite'], ['executeCmd'], ['imageRead'], ['ls'], ['@tracker/search']]);
  });

  it('spec 輸出單個工具的 JSON', async () => {
    await run(['spec', 'fsWrite']);

    expect(log).toHaveBeenCalledTimes(1);
    const printed = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed.name).toBe('fsWrite');
    expect(printed.inputSchema.required).toEqual(['command', 'path']);
  });

  it('spec 未知工具時以錯誤碼退出', async () => {
    await run(['spec', 'nope']);

    expect(error).toHaveBeenCalledWith('工具 "nope" 不存在');
    expect(process.exitCode).toBe(1);
  });

  it('run 寫入文件並累積會話統計', async () => {
    await run(['run', 'fsWrite', JSON.stringify({ command: 'create', path: 'a.txt', content: 'x\n' }), '--session', 'demo']);

    expect(process.exitCode).toBeUndefined();
    expect(await fs.readFile(path.join(dir, 'a.txt'), 'utf-8')).toBe('x\n');
    expect(error).toHaveBeenCalledWith('會話: demo');

    log.mockClear();
    await run(['stats', 'demo']);
    expect(log.mock.calls).toEqual([
      [path.join(dir, 'a.txt')],
      ['  lines: 1'],
      ['  agent: +1 -0 (1)'],
      ['  user: 0'],
    ]);
  });

  it('stats 找不到會話時以錯誤碼退出', async () => {
    await run(['stats', 'missing']);

    expect(error).toHaveBeenCalledWith('會話 missing 不存在');
    expect(process.exitCode).toBe(1);
  });

  it('參數不是合法 JSON 時以錯誤碼退出', async () => {
    await run(['run', 'ls', '{oops']);

    expect(error).toHaveBeenCalledWith('\n💡 JSON 格式錯誤');
    expect(process.exitCode).toBe(1);
  });

  it('交互模式下拒絕確認則不寫入', async () => {
    const confirm = jest.fn(async (_message: string) => false);
    await run(['run', 'fsWrite', JSON.stringify({ command: 'create', path: 'b.txt', content: 'b' })], {
      interactive: true,
      confirm,
    });

    expect(confirm).toHaveBeenCalledWith('是否執行此操作?');
    expect(error).toHaveBeenCalledWith('The user rejected the tool use');
    expect(process.exitCode).toBe(1);
    await expect(fs.access(path.join(dir, 'b.txt'))).rejects.toThrow();
  });

  it('-y 跳過確認並輸出命令結果', async () => {
    const confirm = jest.fn(async (_message: string) => false);
    await run(['run', 'executeCmd', JSON.stringify({ command: 'echo hi' }), '-y'], { interactive: true, confirm });

    expect(confirm).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('hi\n');
    expect(process.exitCode).toBeUndefined();
  });

  it('只讀工具不需要確認', async () => {
    await fs.writeFile(path.join(dir, 'c.txt'), 'hello');
    const confirm = jest.fn(async (_message: string) => false);
    await run(['run', 'fsRead', JSON.stringify({ path: 'c.txt' })], { interactive: true, confirm });

    expect(confirm).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('hello');
  });
});
