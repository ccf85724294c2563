import { loadConfig, resolveRootDir } from '../config/ConfigLoader.js';
import type { WorktrailConfig } from '../config/types.js';
import type { Collaborators } from '../domain/ports/CollaboratorPort.js';
import { ContextSnapshotBuilder } from '../application/ContextSnapshotBuilder.js';
import { ProjectRegistryUseCase } from '../application/ProjectRegistryUseCase.js';
import { SessionUseCase } from '../application/SessionUseCase.js';
import { JsonFileStorageAdapter } from '../infrastructure/storage/JsonFileStorageAdapter.js';
import { FileLockAdapter } from '../infrastructure/storage/FileLockAdapter.js';
import { GitVcsAdapter } from '../infrastructure/integrations/GitVcsAdapter.js';
import { PackageTestRunnerAdapter } from '../infrastructure/integrations/PackageTestRunnerAdapter.js';
import { GhIssueAdapter } from '../infrastructure/integrations/GhIssueAdapter.js';
import { Logger, type LogSink } from '../shared/Logger.js';

export interface AppContext {
  rootDir: string;
  config: WorktrailConfig;
  logger: Logger;
  storage: JsonFileStorageAdapter;
  builder: ContextSnapshotBuilder;
  registry: ProjectRegistryUseCase;
  sessions: SessionUseCase;
}

export interface WiringOptions {
  root?: string;
  env: NodeJS.ProcessEnv;
  logSink?: LogSink;
  /** 未提供時依設定建立 git / test runner / gh adapter */
  collaborators?: Collaborators;
  now?: () => Date;
}

/** 依設定中啟用的項目建立協作者 adapter */
export function createCollaborators(config: WorktrailConfig): Collaborators {
  const { vcs, tests, issues } = config.integrations;
  return {
    vcs: vcs.enabled ? new GitVcsAdapter(vcs.timeoutMs) : undefined,
    tests: tests.enabled ? new PackageTestRunnerAdapter(tests.command, tests.timeoutMs) : undefined,
    issues: issues.enabled ? new GhIssueAdapter(issues.limit, issues.timeoutMs) : undefined,
  };
}

/** 組裝一次 CLI 呼叫所需的依賴 */
export function createAppContext(options: WiringOptions): AppContext {
  const rootDir = resolveRootDir(options.root, options.env);
  const config = loadConfig(rootDir, undefined, options.env);
  const logger = new Logger('worktrail', config.log.level, options.logSink);
  const now = options.now ?? (() => new Date());

  const storage = new JsonFileStorageAdapter(rootDir);
  const lock = new FileLockAdapter(rootDir, config.lock, logger.child('lock'));
  const builder = new ContextSnapshotBuilder();
  const registry = new ProjectRegistryUseCase(storage, lock, logger.child('registry'), now);
  const sessions = new SessionUseCase(
    storage,
    lock,
    registry,
    builder,
    options.collaborators ?? createCollaborators(config),
    logger.child('session'),
    now,
  );

  return { rootDir, config, logger, storage, builder, registry, sessions };
}
