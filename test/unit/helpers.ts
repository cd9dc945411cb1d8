/**
 * 測試共用：臨時目錄與固定的執行上下文
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ToolExecutionContext, ToolState } from '../../src/tools/types.js';
import { posixPlatform } from '../../src/utils/platform.js';
import { StaticSystemProvider } from '../../src/utils/provider.js';

export const TEST_HOME = '/home/tester';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'agent-tools-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeContext(
  dir: string,
  env: Record<string, string> = {},
  state?: ToolState
): ToolExecutionContext {
  return {
    provider: new StaticSystemProvider(dir, env, TEST_HOME),
    platform: posixPlatform,
    state,
  };
}
