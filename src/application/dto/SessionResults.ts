import type { CompletedSession, Session } from '../../domain/entities/Session.js';
import type { Snapshot } from '../../domain/entities/Snapshot.js';
import type { CollaboratorData } from '../../domain/ports/CollaboratorPort.js';

export interface StartSessionResult {
  session: Session;
  /** 上一次結束時留下的 snapshot；讀取失敗時為 undefined */
  lastSnapshot?: Snapshot;
  /** 開始時的 git / 測試 / issue 狀態 */
  collaborators: CollaboratorData;
}

export interface EndSessionResult {
  session: CompletedSession;
  snapshot?: Snapshot;
  /** snapshot 或 PROJECT.md 寫入失敗；session 仍然已完成 */
  snapshotError?: Error;
}

export interface SessionStatusReport {
  project: string;
  activeSession?: Session;
  /** 讀取失敗時為 undefined */
  lastSnapshot?: Snapshot;
  collaborators: CollaboratorData;
}

/** 已完成 session 的統計，單位皆為秒 */
export interface SessionStats {
  totalSessions: number;
  totalSeconds: number;
  averageSeconds: number;
  longestSeconds: number;
  shortestSeconds: number;
  /** 開始時間落在本地「今天」的 session 合計 */
  todaySeconds: number;
}
