/**
 * 某次 session 結束當下的 context 快照，寫入後不再變動。
 * PROJECT.md 永遠是最新一份 Snapshot 的 content 副本。
 */
export interface Snapshot {
  projectName: string;
  sessionId?: string;
  /** 與 session.endedAt 相同 */
  createdAt: string;
  /** snapshots/ 下的檔名，例如 20261018_093000.md */
  fileName: string;
  content: string;
}
