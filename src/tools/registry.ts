/**
 * 工具目錄：內建工具與外部註冊（MCP）工具共用一套命名
 */

import type { ToolParseErrorKind } from "./errors.js";
import { builtInSpecs } from "./implementations/index.js";
import { BUILT_IN_TOOL_NAMES, isBuiltInToolName } from "./types.js";
import type { BuiltInToolName, CanonicalToolName, ToolSpec } from "./types.js";

/**
 * 外部工具在線上的名稱形如 `@server/tool`
 */
export function formatCanonicalToolName(name: CanonicalToolName): string {
  switch (name.kind) {
    case "builtIn":
      return name.name;
    case "mcp":
      return `@${name.serverName}/${name.toolName}`;
    case "agent":
      return `agent:${name.agentName}`;
  }
}

/**
 * 所有內建工具的規範名稱，順序固定
 */
export function builtInToolNames(): CanonicalToolName[] {
  return BUILT_IN_TOOL_NAMES.map((name) => ({ kind: "builtIn", name }));
}

export function builtInSpec(name: BuiltInToolName): ToolSpec {
  return builtInSpecs[name]();
}

function parseMcpName(wireName: string): { serverName: string; toolName: string } | undefined {
  if (!wireName.startsWith("@")) return undefined;
  const slash = wireName.indexOf("/");
  if (slash <= 1 || slash === wireName.length - 1) return undefined;
  return { serverName: wireName.slice(1, slash), toolName: wireName.slice(slash + 1) };
}

export type ResolveResult =
  | { ok: true; name: CanonicalToolName }
  | { ok: false; error: ToolParseErrorKind };

export class ToolRegistry {
  /** serverName -> toolName -> spec */
  private external: Map<string, Map<string, ToolSpec>> = new Map();

  /**
   * 註冊一個外部工具。同一 server 下重複的工具名會報錯，不同 server 可以同名。
   */
  registerExternalTool(serverName: string, spec: ToolSpec): void {
    if (serverName.length === 0 || serverName.includes("/")) {
      throw new Error(`Invalid server name "${serverName}"`);
    }
    let tools = this.external.get(serverName);
    if (!tools) {
      tools = new Map();
      this.external.set(serverName, tools);
    }
    if (tools.has(spec.name)) {
      throw new Error(`Tool "${spec.name}" is already registered for server "${serverName}"`);
    }
    tools.set(spec.name, spec);
  }

  /**
   * 註冊同一 server 的多個工具
   */
  registerExternalTools(serverName: string, specs: ToolSpec[]): void {
    for (const spec of specs) {
      this.registerExternalTool(serverName, spec);
    }
  }

  hasExternalTool(serverName: string, toolName: string): boolean {
    return this.external.get(serverName)?.has(toolName) ?? false;
  }

  /**
   * 內建工具在前，外部工具按註冊順序在後
   */
  listTools(): CanonicalToolName[] {
    const names = builtInToolNames();
    for (const [serverName, tools] of this.external) {
      for (const toolName of tools.keys()) {
        names.push({ kind: "mcp", serverName, toolName });
      }
    }
    return names;
  }

  /**
   * 將模型給出的工具名解析為規範名稱
   */
  resolveToolName(wireName: string): ResolveResult {
    if (isBuiltInToolName(wireName)) {
      return { ok: true, name: { kind: "builtIn", name: wireName } };
    }

    const mcp = parseMcpName(wireName);
    if (mcp && this.hasExternalTool(mcp.serverName, mcp.toolName)) {
      return { ok: true, name: { kind: "mcp", ...mcp } };
    }

    return { ok: false, error: { type: "nameDoesNotExist", name: wireName } };
  }

  /**
   * 獲取工具的 spec；外部工具的 spec 名稱使用 `@server/tool` 形式
   */
  getSpec(name: CanonicalToolName): ToolSpec | undefined {
    switch (name.kind) {
      case "builtIn":
        return builtInSpec(name.name);
      case "mcp": {
        const spec = this.external.get(name.serverName)?.get(name.toolName);
        return spec ? { ...spec, name: formatCanonicalToolName(name) } : undefined;
      }
      case "agent":
        return undefined;
    }
  }

  /**
   * 獲取所有工具的 spec（用於發送給模型）
   */
  getAllSpecs(): ToolSpec[] {
    const specs: ToolSpec[] = [];
    for (const name of this.listTools()) {
      const spec = this.getSpec(name);
      if (spec) specs.push(spec);
    }
    return specs;
  }

  /**
   * 移除一個 server 的全部工具
   */
  removeServer(serverName: string): boolean {
    return this.external.delete(serverName);
  }

  size(): number {
    let count = BUILT_IN_TOOL_NAMES.length;
    for (const tools of this.external.values()) {
      count += tools.size;
    }
    return count;
  }
}
