export type SessionStatus = 'active' | 'completed';

export interface Session {
  id: string;
  projectName: string;
  startedAt: string;
  endedAt?: string;
  description?: string;
  summary?: string;
  nextAction?: string;
  /** 完成時寫入：floor((endedAt - startedAt) / 1000) */
  durationSeconds?: number;
  status: SessionStatus;
  /** start 時的 git 分支與最後一個 commit；非 git 目錄時沒有 */
  branch?: string;
  lastCommit?: string;
  /** end 時寫入的 snapshot 檔名 */
  snapshotFile?: string;
}

export type CompletedSession = Session & {
  status: 'completed';
  endedAt: string;
  durationSeconds: number;
};

export function isCompleted(session: Session): session is CompletedSession {
  return (
    session.status === 'completed' &&
    session.endedAt !== undefined &&
    session.durationSeconds !== undefined
  );
}
