import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileLockAdapter } from '../../src/infrastructure/storage/FileLockAdapter.js';
import { LockHeldError } from '../../src/domain/errors/DomainErrors.js';
import type { LockConfig } from '../../src/config/types.js';

const DEAD_PID = 99999999;

describe('FileLockAdapter', () => {
  let rootDir: string;
  const config: LockConfig = { staleMs: 60000, maxRetries: 2, baseDelayMs: 1 };

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'worktrail-lock-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  function plantLock(lockPath: string, pid: number): void {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, JSON.stringify({ pid, acquiredAt: '2026-10-18T09:00:00.000Z' }));
  }

  it('places registry and project locks in the storage root', () => {
    const lock = new FileLockAdapter(rootDir, config);
    expect(lock.lockPath({ kind: 'registry' })).toBe(path.join(rootDir, 'config.json.lock'));
    expect(lock.lockPath({ kind: 'project', projectName: 'api' }))
      .toBe(path.join(rootDir, 'projects', 'api', '.lock'));
  });

  it('holds the lock while fn runs and releases it afterwards', async () => {
    const lock = new FileLockAdapter(rootDir, config);
    const lockPath = lock.lockPath({ kind: 'project', projectName: 'api' });

    const result = await lock.withLock({ kind: 'project', projectName: 'api' }, async () => {
      const owner: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
      expect(owner).toMatchObject({ pid: process.pid });
      return 'done';
    });

    expect(result).toBe('done');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('releases the lock when fn throws', async () => {
    const lock = new FileLockAdapter(rootDir, config);
    const lockPath = lock.lockPath({ kind: 'registry' });

    await expect(lock.withLock({ kind: 'registry' }, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('gives up with LockHeldError while a live process holds the lock', async () => {
    const lock = new FileLockAdapter(rootDir, config);
    const lockPath = lock.lockPath({ kind: 'registry' });
    plantLock(lockPath, process.ppid);

    let ran = false;
    await expect(lock.withLock({ kind: 'registry' }, async () => {
      ran = true;
    })).rejects.toBeInstanceOf(LockHeldError);

    expect(ran).toBe(false);
    expect(fs.existsSync(lockPath)).toBe(true);
  });

  it('reclaims a lock whose owner is gone', async () => {
    const lock = new FileLockAdapter(rootDir, { ...config, maxRetries: 0 });
    const lockPath = lock.lockPath({ kind: 'project', projectName: 'api' });
    plantLock(lockPath, DEAD_PID);

    await expect(lock.withLock({ kind: 'project', projectName: 'api' }, async () => 'ok')).resolves.toBe('ok');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('leaves no reclaimed lock file behind', async () => {
    const lock = new FileLockAdapter(rootDir, { ...config, maxRetries: 0 });
    const lockPath = lock.lockPath({ kind: 'project', projectName: 'api' });
    plantLock(lockPath, DEAD_PID);

    await lock.withLock({ kind: 'project', projectName: 'api' }, async () => {
      expect(fs.readdirSync(path.dirname(lockPath))).toEqual(['.lock']);
    });
    expect(fs.readdirSync(path.dirname(lockPath))).toEqual([]);
  });

  it('puts back a lock that another process took after it was judged stale', async () => {
    const lock = new FileLockAdapter(rootDir, { ...config, maxRetries: 0 });
    const lockPath = lock.lockPath({ kind: 'registry' });
    plantLock(lockPath, DEAD_PID);
    const old = new Date(Date.now() - 10_000);
    fs.utimesSync(lockPath, old, old);
    const fresh = JSON.stringify({ pid: process.ppid, acquiredAt: '2026-10-18T09:00:01.000Z' });

    const realRename = fs.renameSync;
    vi.spyOn(fs, 'renameSync').mockImplementationOnce((from, to) => {
      // 另一個行程搶先回收並取得 lock
      fs.rmSync(lockPath);
      fs.writeFileSync(lockPath, fresh);
      realRename(from, to);
    });

    let ran = false;
    await expect(lock.withLock({ kind: 'registry' }, async () => {
      ran = true;
    })).rejects.toBeInstanceOf(LockHeldError);

    expect(ran).toBe(false);
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe(fresh);
    expect(fs.readdirSync(rootDir)).toEqual(['config.json.lock']);
  });

  it('reclaims a lock older than staleMs', async () => {
    const lock = new FileLockAdapter(rootDir, { ...config, maxRetries: 0, staleMs: 1000 });
    const lockPath = lock.lockPath({ kind: 'registry' });
    plantLock(lockPath, process.ppid);
    const old = new Date(Date.now() - 10_000);
    fs.utimesSync(lockPath, old, old);

    await expect(lock.withLock({ kind: 'registry' }, async () => 'ok')).resolves.toBe('ok');
  });

  it('reclaims an unreadable lock file once it is stale', async () => {
    const lock = new FileLockAdapter(rootDir, { ...config, maxRetries: 0, staleMs: 1000 });
    const lockPath = lock.lockPath({ kind: 'registry' });
    fs.writeFileSync(lockPath, '{"pid":');
    const old = new Date(Date.now() - 10_000);
    fs.utimesSync(lockPath, old, old);

    await expect(lock.withLock({ kind: 'registry' }, async () => 'ok')).resolves.toBe('ok');
  });

  it('serializes concurrent callers in the same process', async () => {
    const lock = new FileLockAdapter(rootDir, { ...config, maxRetries: 20, baseDelayMs: 1 });
    const order: string[] = [];

    const first = lock.withLock({ kind: 'registry' }, async () => {
      order.push('first:start');
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('first:end');
    });
    const second = lock.withLock({ kind: 'registry' }, async () => {
      order.push('second');
    });
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });
});
