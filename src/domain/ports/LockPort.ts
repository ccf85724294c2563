export type LockScope = { kind: 'registry' } | { kind: 'project'; projectName: string };

/**
 * 跨行程的互斥 lock；僅 mutating 操作（start / end / register / remove）使用
 * fn 不論成功或失敗都會釋放 lock
 */
export interface LockPort {
  withLock<T>(scope: LockScope, fn: () => Promise<T>): Promise<T>;
}
