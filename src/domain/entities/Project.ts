/** 已登錄的專案；name 與 alias 在 registry 中皆唯一 */
export interface Project {
  name: string;
  alias?: string;
  /** 絕對路徑（已解析 symlink） */
  path: string;
  createdAt: string;
  lastUsed: string;
}
