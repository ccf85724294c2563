/**
 * 外部協作者的能力介面：每次查詢都回傳明確的 available / unavailable，
 * core 只依賴這些介面，不關心背後是 git、npm 還是 gh。
 */
export type Availability<T> =
  | { available: true; data: T }
  | { available: false; reason: string };

export interface CommitInfo {
  hash: string;
  message: string;
}

export interface VcsStatus {
  branch: string;
  /** 尚無任何 commit 的 repo 沒有此欄位 */
  lastCommit?: CommitInfo;
  dirty: boolean;
}

export type TestRunStatus = 'passed' | 'failed' | 'empty';

export interface TestResults {
  passed: number;
  failed: number;
  status: TestRunStatus;
}

export interface Issue {
  id: string;
  title: string;
  assignedToMe: boolean;
}

export interface VcsStatusPort {
  getStatus(directory: string): Promise<Availability<VcsStatus>>;
}

export interface TestRunnerPort {
  getResults(directory: string): Promise<Availability<TestResults>>;
}

export interface IssuePort {
  getOpenIssues(directory: string): Promise<Availability<Issue[]>>;
}

/** 可選的協作者組合；未提供者視同 unavailable */
export interface Collaborators {
  vcs?: VcsStatusPort;
  tests?: TestRunnerPort;
  issues?: IssuePort;
}

/** 一次 session 結束時收集到的協作者資料 */
export interface CollaboratorData {
  vcs: Availability<VcsStatus>;
  tests: Availability<TestResults>;
  issues: Availability<Issue[]>;
}

export function unavailable(reason: string): { available: false; reason: string } {
  return { available: false, reason };
}
