/**
 * 環境變量佔位符展開
 */

export type EnvLookup = (name: string) => string | undefined;

const ENV_PLACEHOLDER = /\$\{env:([^}]+)\}/g;

/**
 * 將每個值中的 `${env:NAME}` 替換成 lookup 的結果。
 * 找不到的變量保留為 `${NAME}`。返回新的映射，不修改輸入。
 */
export function expandEnvVars(
  vars: Readonly<Record<string, string>>,
  lookup: EnvLookup = (name) => process.env[name]
): Record<string, string> {
  const expanded: Record<string, string> = {};
  for (const [key, value] of Object.entries(vars)) {
    expanded[key] = value.replace(ENV_PLACEHOLDER, (_match, name: string) => {
      let resolved: string | undefined;
      try {
        resolved = lookup(name);
      } catch {
        resolved = undefined;
      }
      return resolved ?? `\${${name}}`;
    });
  }
  return expanded;
}
