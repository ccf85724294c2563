import os from 'node:os';
import path from 'node:path';
import type { WorktrailConfig } from './types.js';

/** 未指定 --root 與 WORKTRAIL_HOME 時的儲存根目錄 */
export const DEFAULT_ROOT_DIR = path.join(os.homedir(), '.worktrail');

export const DEFAULT_CONFIG: WorktrailConfig = {
  version: 1,
  lock: {
    staleMs: 60000, // 1 分鐘
    maxRetries: 5,
    baseDelayMs: 50,
  },
  integrations: {
    vcs: { enabled: true, timeoutMs: 5000 },
    tests: { enabled: true, timeoutMs: 120000, command: 'npm test' },
    issues: { enabled: true, timeoutMs: 5000, limit: 5 },
  },
  history: {
    defaultLimit: 10,
  },
  log: {
    level: 'warn',
  },
};
