/**
 * 工具目錄的單元測試
 */
import { describe, it, expect, beforeEach } from '@jest/globals';
import { builtInToolNames, formatCanonicalToolName, ToolRegistry } from '../../../src/tools/registry.js';
import type { ToolSpec } from '../../../src/tools/types.js';

const searchSpec: ToolSpec = {
  name: 'search',
  description: 'Search issues',
  inputSchema: { type: 'object', properties: { query: { type: 'string' } } },
};

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  it('內建工具按固定順序列出', () => {
    expect(builtInToolNames().map(formatCanonicalToolName)).toEqual(['fsRead', 'fsWrite', 'executeCmd', 'imageRead', 'ls']);
    expect(registry.listTools()).toEqual(builtInToolNames());
    expect(registry.size()).toBe(5);
  });

  it('外部工具排在內建工具之後', () => {
    registry.registerExternalTool('tracker', searchSpec);
    expect(registry.listTools().map(formatCanonicalToolName)).toEqual([
      'fsRead',
      'fsWrite',
      'executeCmd',
      'imageRead',
      'ls',
      '@tracker/search',
    ]);
  });

  it('同一 server 重複註冊會報錯，不同 server 可以同名', () => {
    registry.registerExternalTool('tracker', searchSpec);
    expect(() => registry.registerExternalTool('tracker', searchSpec)).toThrow(
      'Tool "search" is already registered for server "tracker"'
    );

    registry.registerExternalTool('wiki', searchSpec);
    expect(registry.hasExternalTool('wiki', 'search')).toBe(true);
    expect(registry.size()).toBe(7);
  });

  it('server 名不能為空或包含 /', () => {
    expect(() => registry.registerExternalTool('', searchSpec)).toThrow('Invalid server name ""');
    expect(() => registry.registerExternalTool('a/b', searchSpec)).toThrow('Invalid server name "a/b"');
  });

  it('解析線上工具名', () => {
    registry.registerExternalTool('tracker', searchSpec);

    expect(registry.resolveToolName('fsWrite')).toEqual({ ok: true, name: { kind: 'builtIn', name: 'fsWrite' } });
    expect(registry.resolveToolName('@tracker/search')).toEqual({
      ok: true,
      name: { kind: 'mcp', serverName: 'tracker', toolName: 'search' },
    });
    expect(registry.resolveToolName('@tracker/missing')).toEqual({
      ok: false,
      error: { type: 'nameDoesNotExist', name: '@tracker/missing' },
    });
    expect(registry.resolveToolName('fs_write')).toEqual({
      ok: false,
      error: { type: 'nameDoesNotExist', name: 'fs_write' },
    });
  });

  it('外部工具的 spec 使用規範名稱', () => {
    registry.registerExternalTool('tracker', searchSpec);
    expect(registry.getSpec({ kind: 'mcp', serverName: 'tracker', toolName: 'search' })).toEqual({
      ...searchSpec,
      name: '@tracker/search',
    });
    expect(registry.getSpec({ kind: 'agent', agentName: 'helper' })).toBeUndefined();
  });

  it('每個內建工具都有 spec', () => {
    const specs = registry.getAllSpecs();
    expect(specs.map((spec) => spec.name)).toEqual(['fsRead', 'fsWrite', 'executeCmd', 'imageRead', 'ls']);
    for (const spec of specs) {
      expect(spec.description.length).toBeGreaterThan(0);
      expect(spec.inputSchema.type).toBe('object');
    }
  });

  it('imageRead 的描述中填入支持的格式', () => {
    const spec = registry.getSpec({ kind: 'builtIn', name: 'imageRead' });
    expect(spec?.description).toContain('Able to read the following image formats: png, jpeg, gif, webp');
  });

  it('移除 server 的全部工具', () => {
    registry.registerExternalTool('tracker', searchSpec);
    expect(registry.removeServer('tracker')).toBe(true);
    expect(registry.hasExternalTool('tracker', 'search')).toBe(false);
  });
});
