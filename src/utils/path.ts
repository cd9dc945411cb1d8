/**
 * 路徑規範化：展開 ~，相對路徑按 provider 的工作目錄解析
 */

import path from "path";
import type { SystemProvider } from "./provider.js";

export function canonicalizePath(input: string, provider: SystemProvider): string {
  let expanded = input;
  if (input === "~" || input.startsWith("~/") || input.startsWith("~\\")) {
    const home = provider.homeDir();
    if (!home) {
      throw new Error(`Unable to expand '~' in path '${input}': home directory is unknown`);
    }
    expanded = path.join(home, input.slice(1));
  }

  return path.resolve(provider.cwd(), expanded);
}
