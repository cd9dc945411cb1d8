/**
 * fsWrite 的行數統計：區分用戶與 agent 對同一文件的貢獻
 */

import { diffLines } from "diff";
import { countLines } from "../utils/text.js";
import type { FsWriteState, ToolState } from "./types.js";

export interface FileLineTracker {
  /** 上一次 fsWrite 結束時的行數 */
  prevFsWriteLines: number;
  /** 本次 fsWrite 執行前的行數 */
  beforeFsWriteLines: number;
  /** 本次 fsWrite 執行後的行數 */
  afterFsWriteLines: number;
  linesAddedByAgent: number;
  linesRemovedByAgent: number;
  isFirstWrite: boolean;
}

export function createLineTracker(): FileLineTracker {
  return {
    prevFsWriteLines: 0,
    beforeFsWriteLines: 0,
    afterFsWriteLines: 0,
    linesAddedByAgent: 0,
    linesRemovedByAgent: 0,
    isFirstWrite: true,
  };
}

/** 兩次 fsWrite 之間由用戶改動的行數（可能為負） */
export function linesByUser(tracker: FileLineTracker): number {
  return tracker.beforeFsWriteLines - tracker.prevFsWriteLines;
}

/** 本次 fsWrite 中 agent 增刪的行數 */
export function linesByAgent(tracker: FileLineTracker): number {
  return tracker.linesAddedByAgent + tracker.linesRemovedByAgent;
}

export interface LineDiffStats {
  added: number;
  removed: number;
}

export function diffLineStats(before: string, after: string): LineDiffStats {
  let added = 0;
  let removed = 0;
  for (const change of diffLines(before, after)) {
    const count = change.count ?? countLines(change.value);
    if (change.added) added += count;
    else if (change.removed) removed += count;
  }
  return { added, removed };
}

/**
 * 根據一次寫入前後的內容計算新的 tracker，不修改傳入的 tracker
 */
export function recordWrite(
  previous: FileLineTracker | undefined,
  before: string,
  after: string
): FileLineTracker {
  const tracker = previous ?? createLineTracker();
  const beforeLines = countLines(before);
  const { added, removed } = diffLineStats(before, after);

  return {
    prevFsWriteLines: tracker.isFirstWrite ? beforeLines : tracker.afterFsWriteLines,
    beforeFsWriteLines: beforeLines,
    afterFsWriteLines: countLines(after),
    linesAddedByAgent: added,
    linesRemovedByAgent: removed,
    isFirstWrite: false,
  };
}

export function fsWriteState(state: ToolState): FsWriteState {
  if (!state.fileWrite) {
    state.fileWrite = { lineTrackers: new Map() };
  }
  return state.fileWrite;
}
