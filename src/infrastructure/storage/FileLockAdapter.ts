import { randomUUID } from 'node:crypto';
import fs, { type Stats } from 'node:fs';
import path from 'node:path';
import type { LockPort, LockScope } from '../../domain/ports/LockPort.js';
import type { LockConfig } from '../../config/types.js';
import { LockHeldError, StorageIOError, errnoOf } from '../../domain/errors/DomainErrors.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import type { Logger } from '../../shared/Logger.js';
import { STORAGE_LAYOUT } from './JsonFileStorageAdapter.js';

/** lock 檔內容，用於判斷持有者是否仍存活 */
interface LockOwner {
  pid: number;
  acquiredAt: string;
}

/** 行程是否仍存在（signal 0 只檢查權限與存在性） */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM：行程存在但屬於其他使用者
    return errnoOf(err) === 'EPERM';
  }
}

/** 檢查期間已被釋放時回傳 undefined */
function statIfExists(lockPath: string): Stats | undefined {
  try {
    return fs.statSync(lockPath);
  } catch (err) {
    if (errnoOf(err) === 'ENOENT') return undefined;
    throw new StorageIOError(`Failed to inspect lock ${lockPath}`, lockPath, { cause: err });
  }
}

function readOwner(lockPath: string): LockOwner | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(lockPath, 'utf-8');
  } catch (err) {
    if (errnoOf(err) === 'ENOENT') return undefined;
    throw new StorageIOError(`Failed to read lock ${lockPath}`, lockPath, { cause: err });
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === 'object' && parsed !== null &&
      'pid' in parsed && typeof parsed.pid === 'number' &&
      'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string'
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
    }
    return undefined;
  } catch {
    // 寫到一半的 lock 檔，交給 mtime 判斷是否過期
    return undefined;
  }
}

/**
 * 以 O_EXCL 建立 lock 檔的 advisory lock
 *
 * - registry：<root>/config.json.lock
 * - project：<root>/projects/<name>/.lock
 *
 * 持有者行程已不存在、或 lock 超過 staleMs，即視為殘留並回收（見 reclaim）。
 * 取得失敗時以指數退避重試，最後拋出 LockHeldError。
 */
export class FileLockAdapter implements LockPort {
  constructor(
    private readonly rootDir: string,
    private readonly config: LockConfig,
    private readonly logger?: Logger,
  ) {}

  lockPath(scope: LockScope): string {
    if (scope.kind === 'registry') {
      return path.join(this.rootDir, `${STORAGE_LAYOUT.registry}.lock`);
    }
    return path.join(this.rootDir, STORAGE_LAYOUT.projectsDir, scope.projectName, '.lock');
  }

  async withLock<T>(scope: LockScope, fn: () => Promise<T>): Promise<T> {
    const lockPath = this.lockPath(scope);

    await withRetry(() => this.tryAcquire(lockPath), {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.baseDelayMs,
      maxDelayMs: this.config.staleMs,
      onRetry: (attempt, err, delayMs) => {
        this.logger?.debug('Lock busy, retrying', {
          lockPath,
          attempt,
          delayMs: Math.round(delayMs),
          error: err instanceof Error ? err.message : String(err),
        });
      },
    });

    try {
      return await fn();
    } finally {
      this.release(lockPath);
    }
  }

  private tryAcquire(lockPath: string): void {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });

    // 第二次嘗試只發生在回收殘留 lock 之後
    for (let attempt = 0; attempt < 2; attempt++) {
      if (this.createLockFile(lockPath)) return;

      const observed = statIfExists(lockPath);
      if (!observed) continue;
      const current = readOwner(lockPath);
      if (!this.isStale(observed, current)) {
        throw new LockHeldError(lockPath, current?.pid);
      }
      this.logger?.warn('Reclaiming stale lock', { lockPath, ownerPid: current?.pid });
      this.reclaim(lockPath, observed);
    }
    throw new LockHeldError(lockPath);
  }

  /**
   * 先 rename 成唯一的暫存名稱再確認：只有搬走的正是判定為殘留的那個檔案才刪除。
   * 判定後 lock 已被換成新的（其他行程先回收並取得）時，放回原處並回報 busy。
   */
  private reclaim(lockPath: string, observed: Stats): void {
    const tombstone = `${lockPath}.${process.pid}.${randomUUID()}.stale`;
    try {
      fs.renameSync(lockPath, tombstone);
    } catch (err) {
      // 其他行程已先回收
      if (errnoOf(err) === 'ENOENT') return;
      throw new StorageIOError(`Failed to reclaim lock ${lockPath}`, lockPath, { cause: err });
    }

    const moved = fs.statSync(tombstone);
    if (moved.ino === observed.ino && moved.mtimeMs === observed.mtimeMs) {
      fs.rmSync(tombstone, { force: true });
      return;
    }

    try {
      fs.linkSync(tombstone, lockPath);
    } catch (err) {
      if (errnoOf(err) !== 'EEXIST') {
        throw new StorageIOError(`Failed to restore lock ${lockPath}`, lockPath, { cause: err });
      }
      this.logger?.warn('Lock changed hands while being reclaimed', { lockPath });
    } finally {
      fs.rmSync(tombstone, { force: true });
    }
    throw new LockHeldError(lockPath);
  }

  /** 以 O_EXCL 建立 lock 檔；已存在時回傳 false */
  private createLockFile(lockPath: string): boolean {
    const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
    let fd: number;
    try {
      fd = fs.openSync(lockPath, 'wx');
    } catch (err) {
      if (errnoOf(err) === 'EEXIST') return false;
      throw new StorageIOError(`Failed to create lock ${lockPath}`, lockPath, { cause: err });
    }
    try {
      fs.writeSync(fd, JSON.stringify(owner));
    } finally {
      fs.closeSync(fd);
    }
    return true;
  }

  private isStale(observed: Stats, owner: LockOwner | undefined): boolean {
    if (owner && owner.pid !== process.pid && !isProcessAlive(owner.pid)) {
      return true;
    }
    return Date.now() - observed.mtimeMs > this.config.staleMs;
  }

  private release(lockPath: string): void {
    const owner = readOwner(lockPath);
    if (owner && owner.pid !== process.pid) {
      this.logger?.warn('Lock was taken over by another process; leaving it in place', {
        lockPath,
        ownerPid: owner.pid,
      });
      return;
    }
    fs.rmSync(lockPath, { force: true });
  }
}
