/** 與 package.json 的 version 保持一致 */
export const AGENT_TOOLS_VERSION = "0.3.0";

export const AGENT_TOOLS_APP_NAME = "agent-tools";
