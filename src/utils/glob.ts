/**
 * 簡單的 glob 匹配：`*` 不跨目錄，`**` 跨目錄，`?` 匹配單個字符
 */

function escapeRegex(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function globToRegExp(pattern: string): RegExp {
  let regex = "^";
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];
    if (char === "*") {
      if (pattern[i + 1] === "*") {
        // "**/" 也匹配零層目錄
        if (pattern[i + 2] === "/") {
          regex += "(?:.*/)?";
          i += 3;
        } else {
          regex += ".*";
          i += 2;
        }
      } else {
        regex += "[^/]*";
        i += 1;
      }
      continue;
    }
    if (char === "?") {
      regex += "[^/]";
      i += 1;
      continue;
    }
    regex += escapeRegex(char);
    i += 1;
  }

  regex += "$";
  return new RegExp(regex);
}

/**
 * 判斷路徑是否匹配任一模式。
 *
 * 不含 `/` 的模式只匹配最後一段（如 `*.log`、`node_modules`），
 * 含 `/` 的模式匹配整個路徑或其任意後綴。
 */
export function matchesAnyPattern(patterns: readonly string[], target: string): boolean {
  const normalized = target.replace(/\\/g, "/");
  const segments = normalized.split("/").filter(Boolean);

  return patterns.some((pattern) => {
    const normalizedPattern = pattern.replace(/\\/g, "/").replace(/\/+$/, "");
    if (!normalizedPattern) return false;
    const regex = globToRegExp(normalizedPattern);

    if (!normalizedPattern.includes("/")) {
      const basename = segments[segments.length - 1] ?? "";
      return regex.test(basename);
    }

    if (regex.test(normalized)) return true;
    for (let i = 1; i < segments.length; i++) {
      if (regex.test(segments.slice(i).join("/"))) return true;
    }
    return false;
  });
}
