import type { Project } from '../entities/Project.js';
import type { Session } from '../entities/Session.js';
import type { Snapshot } from '../entities/Snapshot.js';

/**
 * 持久化邊界：registry、session 歷史、snapshot 與 PROJECT.md
 * 失敗一律拋出 StorageIOError
 */
export interface StoragePort {
  loadRegistry(): Project[];
  /** 原子寫入（暫存檔 + rename） */
  saveRegistry(projects: readonly Project[]): void;

  /** 依 startedAt 排序；專案尚無歷史時回傳空陣列 */
  loadHistory(projectName: string): Session[];
  appendSession(projectName: string, session: Session): void;
  /** 以 id 取代既有 session */
  updateSession(projectName: string, session: Session): void;

  /** 決定檔名（必要時加序號）並寫入 snapshot */
  writeSnapshot(projectName: string, snapshot: Omit<Snapshot, 'fileName'>): Snapshot;
  /** snapshot 檔名，依字典序（= 建立順序）排列 */
  listSnapshots(projectName: string): string[];
  loadLatestSnapshot(projectName: string): Snapshot | undefined;

  writeContextDocument(projectName: string, content: string): void;
  readContextDocument(projectName: string): string | undefined;
}
