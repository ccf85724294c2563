import type { LogLevel } from '../shared/Logger.js';

/** 跨行程 lock 設定 */
export interface LockConfig {
  /** 超過此毫秒數的 lock 視為殘留並回收 */
  staleMs: number;
  maxRetries: number;
  baseDelayMs: number;
}

/** 單一外部協作者設定 */
export interface CollaboratorConfig {
  enabled: boolean;
  timeoutMs: number;
}

export interface TestRunnerConfig extends CollaboratorConfig {
  /** 以空白切分後執行，例如 "npm test" */
  command: string;
}

export interface IssueTrackerConfig extends CollaboratorConfig {
  /** 最多列出幾個 open issue */
  limit: number;
}

export interface IntegrationsConfig {
  vcs: CollaboratorConfig;
  tests: TestRunnerConfig;
  issues: IssueTrackerConfig;
}

export interface HistoryConfig {
  /** `history` 未指定 --limit 時的筆數 */
  defaultLimit: number;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface WorktrailConfig {
  version: number;
  lock: LockConfig;
  integrations: IntegrationsConfig;
  history: HistoryConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  version?: number;
  lock?: Partial<LockConfig>;
  integrations?: {
    vcs?: Partial<CollaboratorConfig>;
    tests?: Partial<TestRunnerConfig>;
    issues?: Partial<IssueTrackerConfig>;
  };
  history?: Partial<HistoryConfig>;
  log?: Partial<LogConfig>;
};
