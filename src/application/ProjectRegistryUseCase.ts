import fs from 'node:fs';
import path from 'node:path';
import type { Project } from '../domain/entities/Project.js';
import type { StoragePort } from '../domain/ports/StoragePort.js';
import type { LockPort } from '../domain/ports/LockPort.js';
import {
  AmbiguousProjectError,
  DuplicateAliasError,
  DuplicateNameError,
  InvalidPathError,
  ProjectNotFoundError,
} from '../domain/errors/DomainErrors.js';
import { assertValidProjectName } from '../domain/value-objects/ProjectName.js';
import { matchProjectByDirectory } from '../domain/value-objects/ProjectMatcher.js';
import type { Logger } from '../shared/Logger.js';
import type { ProjectInfo } from './dto/ProjectInfo.js';

const REGISTRY_SCOPE = { kind: 'registry' } as const;

/**
 * 專案 registry 用例
 *
 * - register / remove / touch：在 registry lock 內讀取、修改、原子寫回
 * - find / resolve / list / info：唯讀，不取 lock
 */
export class ProjectRegistryUseCase {
  constructor(
    private readonly storage: StoragePort,
    private readonly lock: LockPort,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async register(name: string, projectPath: string, alias?: string): Promise<Project> {
    assertValidProjectName(name, 'name');
    if (alias !== undefined) assertValidProjectName(alias, 'alias');

    return this.lock.withLock(REGISTRY_SCOPE, async () => {
      const projects = this.storage.loadRegistry();

      if (projects.some((p) => p.name === name || p.alias === name)) {
        throw new DuplicateNameError(name);
      }
      if (alias !== undefined) {
        const owner = projects.find((p) => p.alias === alias || p.name === alias);
        if (owner || alias === name) {
          throw new DuplicateAliasError(alias, owner?.name ?? name);
        }
      }

      const timestamp = this.now().toISOString();
      const project: Project = {
        name,
        alias,
        path: canonicalDirectory(projectPath),
        createdAt: timestamp,
        lastUsed: timestamp,
      };
      this.storage.saveRegistry([...projects, project]);
      this.logger.info('Project registered', { name, path: project.path });
      return project;
    });
  }

  /** 依名稱或別名查找 */
  find(identifier: string): Project {
    const projects = this.storage.loadRegistry();
    const project = projects.find((p) => p.name === identifier)
      ?? projects.find((p) => p.alias === identifier);
    if (!project) throw new ProjectNotFoundError(identifier);
    return project;
  }

  /**
   * 決定指令作用的專案
   * 有 identifier 時依名稱或別名；否則由 cwd 推導（巢狀專案取最深者）
   */
  resolve(identifier: string | undefined, cwd: string): Project {
    if (identifier !== undefined) return this.find(identifier);

    const directory = canonicalCwd(cwd);
    const match = matchProjectByDirectory(this.storage.loadRegistry(), directory);
    switch (match.kind) {
      case 'exact':
        return match.project;
      case 'ambiguous':
        throw new AmbiguousProjectError(directory, match.candidates.map((p) => p.name));
      case 'none':
        throw new AmbiguousProjectError(directory);
    }
  }

  /** 最近使用的在前；lastUsed 相同時依名稱 */
  list(): Project[] {
    return [...this.storage.loadRegistry()]
      .sort((a, b) => b.lastUsed.localeCompare(a.lastUsed) || a.name.localeCompare(b.name));
  }

  /** 自 registry 移除；session 歷史與 snapshot 保留在磁碟上 */
  async remove(identifier: string): Promise<Project> {
    return this.lock.withLock(REGISTRY_SCOPE, async () => {
      const projects = this.storage.loadRegistry();
      const target = projects.find((p) => p.name === identifier)
        ?? projects.find((p) => p.alias === identifier);
      if (!target) throw new ProjectNotFoundError(identifier);

      this.storage.saveRegistry(projects.filter((p) => p.name !== target.name));
      this.logger.info('Project removed', { name: target.name });
      return target;
    });
  }

  /** 更新 lastUsed；時間不會倒退 */
  async touch(name: string, at: string): Promise<Project> {
    return this.lock.withLock(REGISTRY_SCOPE, async () => {
      const projects = this.storage.loadRegistry();
      const target = projects.find((p) => p.name === name);
      if (!target) throw new ProjectNotFoundError(name);

      const updated: Project = { ...target, lastUsed: at > target.lastUsed ? at : target.lastUsed };
      this.storage.saveRegistry(projects.map((p) => (p.name === name ? updated : p)));
      return updated;
    });
  }

  info(identifier: string | undefined, cwd: string): ProjectInfo {
    const project = this.resolve(identifier, cwd);
    const history = this.storage.loadHistory(project.name);
    return {
      project,
      totalSessions: history.length,
      completedSessions: history.filter((s) => s.status === 'completed').length,
      hasActiveSession: history.some((s) => s.status === 'active'),
      snapshotCount: this.storage.listSnapshots(project.name).length,
      hasContextDocument: this.storage.readContextDocument(project.name) !== undefined,
    };
  }
}

/** 必須是既有目錄；回傳解析 symlink 後的絕對路徑 */
function canonicalDirectory(projectPath: string): string {
  const absolute = path.resolve(projectPath);
  try {
    if (!fs.statSync(absolute).isDirectory()) throw new InvalidPathError(projectPath);
    return fs.realpathSync(absolute);
  } catch (err) {
    if (err instanceof InvalidPathError) throw err;
    throw new InvalidPathError(projectPath, { cause: err });
  }
}

/** cwd 可能已被刪除，此時只做字面正規化 */
function canonicalCwd(cwd: string): string {
  const absolute = path.resolve(cwd);
  return fs.existsSync(absolute) ? fs.realpathSync(absolute) : absolute;
}
