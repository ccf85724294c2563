import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG, DEFAULT_ROOT_DIR } from './defaults.js';
import type { WorktrailConfig, PartialConfig } from './types.js';
import { StorageIOError } from '../domain/errors/DomainErrors.js';

export type { WorktrailConfig, PartialConfig } from './types.js';

export const SETTINGS_FILE = 'settings.json';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const CollaboratorSchema = z.object({
  enabled: z.boolean(),
  timeoutMs: z.number(),
}).partial();

/** settings.json 的結構；所有欄位皆可省略 */
const PartialConfigSchema = z.object({
  version: z.number(),
  lock: z.object({
    staleMs: z.number(),
    maxRetries: z.number(),
    baseDelayMs: z.number(),
  }).partial(),
  integrations: z.object({
    vcs: CollaboratorSchema,
    tests: CollaboratorSchema.extend({ command: z.string() }).partial(),
    issues: CollaboratorSchema.extend({ limit: z.number() }).partial(),
  }).partial(),
  history: z.object({ defaultLimit: z.number() }).partial(),
  log: z.object({ level: LogLevelSchema }).partial(),
}).partial();

/**
 * 決定儲存根目錄
 * 優先順序：CLI --root > WORKTRAIL_HOME > ~/.worktrail
 */
export function resolveRootDir(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  const chosen = explicit ?? env.WORKTRAIL_HOME;
  return chosen ? path.resolve(chosen) : DEFAULT_ROOT_DIR;
}

/** 逐區塊合併：partial 覆蓋 base */
function merge(base: WorktrailConfig, partial: PartialConfig): WorktrailConfig {
  return {
    version: partial.version ?? base.version,
    lock: { ...base.lock, ...partial.lock },
    integrations: {
      vcs: { ...base.integrations.vcs, ...partial.integrations?.vcs },
      tests: { ...base.integrations.tests, ...partial.integrations?.tests },
      issues: { ...base.integrations.issues, ...partial.integrations?.issues },
    },
    history: { ...base.history, ...partial.history },
    log: { ...base.log, ...partial.log },
  };
}

/** 環境變數覆蓋：WORKTRAIL_LOG_LEVEL → log.level */
function applyEnvOverrides(config: WorktrailConfig, env: NodeJS.ProcessEnv): WorktrailConfig {
  const level = LogLevelSchema.safeParse(env.WORKTRAIL_LOG_LEVEL);
  if (level.success) {
    return { ...config, log: { ...config.log, level: level.data } };
  }
  return config;
}

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${field} must be a positive integer`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: WorktrailConfig): void {
  assertPositiveInteger(config.lock.staleMs, 'lock.staleMs');
  assertPositiveInteger(config.lock.baseDelayMs, 'lock.baseDelayMs');
  if (!Number.isInteger(config.lock.maxRetries) || config.lock.maxRetries < 0) {
    throw new Error('lock.maxRetries must be a non-negative integer');
  }
  assertPositiveInteger(config.integrations.vcs.timeoutMs, 'integrations.vcs.timeoutMs');
  assertPositiveInteger(config.integrations.tests.timeoutMs, 'integrations.tests.timeoutMs');
  assertPositiveInteger(config.integrations.issues.timeoutMs, 'integrations.issues.timeoutMs');
  assertPositiveInteger(config.integrations.issues.limit, 'integrations.issues.limit');
  assertPositiveInteger(config.history.defaultLimit, 'history.defaultLimit');

  if (!config.integrations.tests.command.trim()) {
    throw new Error('integrations.tests.command must not be empty');
  }
}

/** 讀取 <rootDir>/settings.json；不存在時回傳空物件，毀損時拋出 StorageIOError */
function readSettingsFile(rootDir: string): PartialConfig {
  const settingsPath = path.join(rootDir, SETTINGS_FILE);
  if (!fs.existsSync(settingsPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
  } catch (err) {
    throw new StorageIOError(`Failed to read settings from ${settingsPath}`, settingsPath, { cause: err });
  }

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageIOError(
      `Invalid settings in ${settingsPath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      settingsPath,
    );
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 settings.json（若存在）並合併到預設值上
 * @param rootDir - worktrail 儲存根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  rootDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): WorktrailConfig {
  // 合併順序：defaults < file config < overrides < 環境變數
  let merged = merge(DEFAULT_CONFIG, readSettingsFile(rootDir));
  if (overrides) {
    merged = merge(merged, overrides);
  }
  merged = applyEnvOverrides(merged, env);

  validate(merged);
  return merged;
}
