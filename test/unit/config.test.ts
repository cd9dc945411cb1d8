import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import path from 'path';
import {
  findProjectConfig,
  getConfigDir,
  loadDotEnv,
  loadEnvConfig,
  mergeConfigs,
  readConfigFile,
} from '../../src/config.js';
import type { ConfigEnvironment } from '../../src/config.js';
import { FriendlyError } from '../../src/utils/error-handler.js';
import { makeTempDir, removeTempDir, TEST_HOME } from './helpers.js';

function environment(cwd: string, env: NodeJS.ProcessEnv = {}, platform: NodeJS.Platform = 'linux'): ConfigEnvironment {
  return { cwd, env, homeDir: TEST_HOME, platform };
}

describe('getConfigDir', () => {
  it('環境變量優先', () => {
    expect(getConfigDir(environment('/work', { AGENT_TOOLS_CONFIG_DIR: '/custom' }))).toBe('/custom');
  });

  it('Windows 使用 APPDATA', () => {
    expect(getConfigDir(environment('/work', { APPDATA: '/appdata' }, 'win32'))).toBe('/appdata/agent-tools');
  });

  it('其他平台使用 XDG_CONFIG_HOME 或 ~/.config', () => {
    expect(getConfigDir(environment('/work', { XDG_CONFIG_HOME: '/xdg' }))).toBe('/xdg/agent-tools');
    expect(getConfigDir(environment('/work'))).toBe('/home/tester/.config/agent-tools');
  });
});

describe('配置文件', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('向上查找項目配置', async () => {
    const nested = path.join(dir, 'a', 'b');
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(dir, '.agent-tools.yml'), 'verbose: true\n');

    expect(findProjectConfig(nested)).toBe(path.join(dir, '.agent-tools.yml'));
  });

  it('sessionsDir 按配置文件所在目錄解析', async () => {
    const configPath = path.join(dir, '.agent-tools.yaml');
    await fs.writeFile(configPath, 'sessionsDir: ./state\nshellEnv:\n  TOKEN: test-secret\n');

    expect(readConfigFile(configPath)).toEqual({
      sessionsDir: path.join(dir, 'state'),
      shellEnv: { TOKEN: 'test-secret' },
    });
  });

  it('空的 YAML 文件視為空配置', async () => {
    const configPath = path.join(dir, '.agent-tools.yml');
    await fs.writeFile(configPath, '');
    expect(readConfigFile(configPath)).toEqual({});
  });

  it('無法解析時拋出 FriendlyError', async () => {
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, '{ not json');

    expect(() => readConfigFile(configPath)).toThrow(FriendlyError);
    expect(() => readConfigFile(configPath)).toThrow(`無法讀取配置文件 ${configPath}: `);
  });

  it('字段類型錯誤時列出問題', async () => {
    const configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ verbose: 'yes' }));

    expect(() => readConfigFile(configPath)).toThrow(
      `配置文件 ${configPath} 無效: verbose: Expected boolean, received string`
    );
  });

  it('讀取環境變量', () => {
    expect(
      loadEnvConfig(
        environment(dir, {
          AGENT_TOOLS_VERBOSE: 'TRUE',
          AGENT_TOOLS_AUTO_APPROVE: '0',
          AGENT_TOOLS_SESSIONS_DIR: 'sessions',
        })
      )
    ).toEqual({ verbose: true, autoApprove: false, sessionsDir: path.join(dir, 'sessions') });
  });

  it('沒有任何配置時使用默認值', () => {
    const configDir = path.join(dir, 'cfg');
    expect(mergeConfigs({}, environment(dir, { AGENT_TOOLS_CONFIG_DIR: configDir }))).toEqual({
      verbose: false,
      shellEnv: {},
      sessionsDir: path.join(configDir, 'sessions'),
      autoApprove: false,
    });
  });

  it('按優先級合併：CLI > 項目 > 用戶 > 環境變量', async () => {
    const configDir = path.join(dir, 'cfg');
    const project = path.join(dir, 'project');
    await fs.mkdir(configDir, { recursive: true });
    await fs.mkdir(project, { recursive: true });
    await fs.writeFile(
      path.join(configDir, 'config.json'),
      JSON.stringify({ autoApprove: true, verbose: true, shellEnv: { A: 'user', B: 'user' } })
    );
    await fs.writeFile(path.join(project, '.agent-tools.yml'), 'sessionsDir: ./state\nshellEnv:\n  B: project\n');

    const config = mergeConfigs(
      { verbose: false },
      environment(project, {
        AGENT_TOOLS_CONFIG_DIR: configDir,
        AGENT_TOOLS_AUTO_APPROVE: 'no',
        AGENT_TOOLS_SESSIONS_DIR: '/from-env',
      })
    );

    expect(config).toEqual({
      verbose: false,
      autoApprove: true,
      sessionsDir: path.join(project, 'state'),
      shellEnv: { A: 'user', B: 'project' },
    });
  });

  it('.env 不覆蓋已有的環境變量', async () => {
    await fs.writeFile(path.join(dir, '.env'), 'AGENT_TOOLS_DOTENV_NEW=from-file\nAGENT_TOOLS_DOTENV_SET=from-file\n');
    process.env.AGENT_TOOLS_DOTENV_SET = 'from-shell';

    try {
      loadDotEnv(dir);
      expect(process.env.AGENT_TOOLS_DOTENV_NEW).toBe('from-file');
      expect(process.env.AGENT_TOOLS_DOTENV_SET).toBe('from-shell');
    } finally {
      delete process.env.AGENT_TOOLS_DOTENV_NEW;
      delete process.env.AGENT_TOOLS_DOTENV_SET;
    }
  });
});
