/**
 * 會話持久化：只保存 fsWrite 的行數統計，供 `--session` 跨多次調用累積
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { FileLineTracker } from "./line-tracker.js";
import type { ToolState } from "./types.js";

const lineTrackerSchema = z.object({
  prevFsWriteLines: z.number().int(),
  beforeFsWriteLines: z.number().int(),
  afterFsWriteLines: z.number().int(),
  linesAddedByAgent: z.number().int(),
  linesRemovedByAgent: z.number().int(),
  isFirstWrite: z.boolean(),
});

const sessionFileSchema = z.object({
  sessionId: z.string(),
  createdAt: z.string(),
  lastUpdatedAt: z.string(),
  lineTrackers: z.record(lineTrackerSchema),
});

export type ToolSessionData = z.infer<typeof sessionFileSchema>;

export interface ToolSession {
  sessionId: string;
  createdAt: string;
  lastUpdatedAt: string;
  state: ToolState;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function createSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;
}

export function toSessionData(session: ToolSession): ToolSessionData {
  const trackers: Record<string, FileLineTracker> = {};
  for (const [filePath, tracker] of session.state.fileWrite?.lineTrackers ?? []) {
    trackers[filePath] = { ...tracker };
  }
  return {
    sessionId: session.sessionId,
    createdAt: session.createdAt,
    lastUpdatedAt: session.lastUpdatedAt,
    lineTrackers: trackers,
  };
}

export function fromSessionData(data: ToolSessionData): ToolSession {
  return {
    sessionId: data.sessionId,
    createdAt: data.createdAt,
    lastUpdatedAt: data.lastUpdatedAt,
    state: { fileWrite: { lineTrackers: new Map(Object.entries(data.lineTrackers)) } },
  };
}

export class ToolSessionStore {
  constructor(private readonly sessionsDir: string) {}

  /**
   * 初始化會話目錄
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.sessionsDir, { recursive: true });
  }

  private sessionPath(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new Error(`Invalid session id "${sessionId}"`);
    }
    return path.join(this.sessionsDir, `${sessionId}.json`);
  }

  /**
   * 載入會話，不存在時返回 null
   */
  async load(sessionId: string): Promise<ToolSession | null> {
    const filePath = this.sessionPath(sessionId);
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (error && typeof error === "object" && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    const result = sessionFileSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      throw new Error(`Session file ${filePath} is malformed: ${result.error.issues[0]?.message ?? "unknown"}`);
    }
    return fromSessionData(result.data);
  }

  /**
   * 載入會話，不存在時創建一個空會話（尚未寫盤）
   */
  async open(sessionId: string): Promise<ToolSession> {
    const existing = await this.load(sessionId);
    if (existing) return existing;

    const now = new Date().toISOString();
    return { sessionId, createdAt: now, lastUpdatedAt: now, state: {} };
  }

  /**
   * 保存會話
   */
  async save(session: ToolSession): Promise<void> {
    await this.initialize();
    session.lastUpdatedAt = new Date().toISOString();
    await fs.writeFile(this.sessionPath(session.sessionId), JSON.stringify(toSessionData(session), null, 2), "utf-8");
  }

  /**
   * 刪除會話
   */
  async delete(sessionId: string): Promise<boolean> {
    try {
      await fs.unlink(this.sessionPath(sessionId));
      return true;
    } catch (error) {
      if (error && typeof error === "object" && "code" in error && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }
  }
}
