import { randomUUID } from 'node:crypto';
import type { Project } from '../domain/entities/Project.js';
import type { CompletedSession, Session } from '../domain/entities/Session.js';
import { isCompleted } from '../domain/entities/Session.js';
import type { Snapshot } from '../domain/entities/Snapshot.js';
import type { StoragePort } from '../domain/ports/StoragePort.js';
import type { LockPort, LockScope } from '../domain/ports/LockPort.js';
import type { CollaboratorData, Collaborators } from '../domain/ports/CollaboratorPort.js';
import { NoActiveSessionError, SessionAlreadyActiveError } from '../domain/errors/DomainErrors.js';
import { durationSeconds } from '../domain/value-objects/Duration.js';
import type { Logger } from '../shared/Logger.js';
import type { ContextSnapshotBuilder } from './ContextSnapshotBuilder.js';
import type { ProjectRegistryUseCase } from './ProjectRegistryUseCase.js';
import { gatherCollaboratorData } from './CollaboratorGatherer.js';
import type {
  EndSessionResult,
  SessionStats,
  SessionStatusReport,
  StartSessionResult,
} from './dto/SessionResults.js';

/**
 * Session 用例：每個專案 NONE ⇄ ACTIVE 的狀態機
 *
 * 目前狀態一律由持久化的歷史推導，不保留行程內的「目前 session」。
 * - start：NONE → ACTIVE，記下當時的 git 分支與 commit
 * - end：ACTIVE → NONE，並產生 snapshot 與 PROJECT.md
 * - status / history / stats：唯讀
 */
export class SessionUseCase {
  constructor(
    private readonly storage: StoragePort,
    private readonly lock: LockPort,
    private readonly registry: ProjectRegistryUseCase,
    private readonly builder: ContextSnapshotBuilder,
    private readonly collaborators: Collaborators,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async start(project: Project, description?: string): Promise<StartSessionResult> {
    // 已有進行中的 session 就不必詢問協作者；lock 內會再確認一次
    const existing = this.activeSession(project);
    if (existing) throw new SessionAlreadyActiveError(project.name, existing.startedAt);

    const collaborators = await gatherCollaboratorData(this.collaborators, project.path, this.logger);
    const vcs = collaborators.vcs.available ? collaborators.vcs.data : undefined;

    const session = await this.lock.withLock(projectScope(project), async () => {
      const history = this.storage.loadHistory(project.name);
      const active = history.find((s) => s.status === 'active');
      if (active) throw new SessionAlreadyActiveError(project.name, active.startedAt);

      // 歷史依 startedAt 排序：時鐘倒退時沿用上一筆的時間
      const startedAt = laterOf(this.now().toISOString(), history.at(-1)?.startedAt);
      const created: Session = {
        id: randomUUID(),
        projectName: project.name,
        startedAt,
        description: description?.trim() || undefined,
        status: 'active',
        branch: vcs?.branch,
        lastCommit: vcs?.lastCommit?.hash,
      };

      await this.registry.touch(project.name, startedAt);
      this.storage.appendSession(project.name, created);
      this.logger.info('Session started', { project: project.name, sessionId: created.id });
      return created;
    });

    return { session, lastSnapshot: this.readLatestSnapshotQuietly(project.name), collaborators };
  }

  /**
   * 協作者（可能要跑整套測試）在取 lock 前查詢；
   * 完成 session、決定 snapshot 檔名與寫入 PROJECT.md 都在同一個 project lock 內。
   */
  async end(project: Project, summary?: string, nextAction?: string): Promise<EndSessionResult> {
    if (!this.activeSession(project)) throw new NoActiveSessionError(project.name);
    const data = await gatherCollaboratorData(this.collaborators, project.path, this.logger);

    return this.lock.withLock(projectScope(project), async () => {
      const active = this.storage.loadHistory(project.name).find((s) => s.status === 'active');
      if (!active) throw new NoActiveSessionError(project.name);

      const endedAt = laterOf(this.now().toISOString(), active.startedAt);
      const session: CompletedSession = {
        ...active,
        status: 'completed',
        endedAt,
        summary: summary?.trim() || undefined,
        nextAction: nextAction?.trim() || undefined,
        durationSeconds: durationSeconds(active.startedAt, endedAt),
      };
      this.storage.updateSession(project.name, session);
      this.logger.info('Session ended', {
        project: project.name,
        sessionId: session.id,
        durationSeconds: session.durationSeconds,
      });

      // session 已完成並寫入；以下失敗只回報，不回滾
      let snapshot: Snapshot;
      try {
        snapshot = this.writeSnapshot(project, session, data);
      } catch (err) {
        const snapshotError = err instanceof Error ? err : new Error(String(err));
        this.logger.warn('Failed to write context snapshot', {
          project: project.name,
          sessionId: session.id,
          error: snapshotError.message,
        });
        return { session, snapshotError };
      }
      return { session: this.linkSnapshot(project, session, snapshot), snapshot };
    });
  }

  /** 最後一份 snapshot 讀不到時照樣回報其餘狀態 */
  async status(project: Project): Promise<SessionStatusReport> {
    const activeSession = this.activeSession(project);
    const collaborators = await gatherCollaboratorData(this.collaborators, project.path, this.logger);
    return {
      project: project.name,
      activeSession,
      lastSnapshot: this.readLatestSnapshotQuietly(project.name),
      collaborators,
    };
  }

  /** 只讀 session 歷史，不碰 snapshot */
  activeSession(project: Project): Session | undefined {
    return this.storage.loadHistory(project.name).find((s) => s.status === 'active');
  }

  /** 新到舊；包含進行中的 session */
  history(project: Project, limit?: number): Session[] {
    const sessions = this.storage.loadHistory(project.name)
      .map((session, index) => ({ session, index }))
      .sort((a, b) => b.session.startedAt.localeCompare(a.session.startedAt) || b.index - a.index)
      .map(({ session }) => session);
    return limit === undefined ? sessions : sessions.slice(0, Math.max(0, limit));
  }

  stats(project: Project): SessionStats {
    const durations = this.storage.loadHistory(project.name)
      .filter(isCompleted)
      .map((s) => ({ startedAt: new Date(s.startedAt), seconds: s.durationSeconds }));

    if (durations.length === 0) {
      return {
        totalSessions: 0,
        totalSeconds: 0,
        averageSeconds: 0,
        longestSeconds: 0,
        shortestSeconds: 0,
        todaySeconds: 0,
      };
    }

    const seconds = durations.map((d) => d.seconds);
    const totalSeconds = seconds.reduce((sum, s) => sum + s, 0);
    const today = this.now().toDateString();
    return {
      totalSessions: durations.length,
      totalSeconds,
      averageSeconds: Math.floor(totalSeconds / durations.length),
      longestSeconds: Math.max(...seconds),
      shortestSeconds: Math.min(...seconds),
      todaySeconds: durations
        .filter((d) => d.startedAt.toDateString() === today)
        .reduce((sum, d) => sum + d.seconds, 0),
    };
  }

  private writeSnapshot(project: Project, session: CompletedSession, data: CollaboratorData): Snapshot {
    const snapshot = this.storage.writeSnapshot(project.name, this.builder.build(project.name, session, data));
    this.storage.writeContextDocument(project.name, snapshot.content);
    return snapshot;
  }

  /** 在歷史中記下 snapshot 檔名；失敗時 snapshot 仍在，只是沒有連結 */
  private linkSnapshot(project: Project, session: CompletedSession, snapshot: Snapshot): CompletedSession {
    const linked: CompletedSession = { ...session, snapshotFile: snapshot.fileName };
    try {
      this.storage.updateSession(project.name, linked);
      return linked;
    } catch (err) {
      this.logger.warn('Failed to record snapshot file on session', {
        project: project.name,
        sessionId: session.id,
        snapshotFile: snapshot.fileName,
        error: err instanceof Error ? err.message : String(err),
      });
      return session;
    }
  }

  /** 顯示用；讀不到不影響 start 與 status */
  private readLatestSnapshotQuietly(projectName: string): Snapshot | undefined {
    try {
      return this.storage.loadLatestSnapshot(projectName);
    } catch (err) {
      this.logger.warn('Could not read last snapshot', {
        project: projectName,
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }
}

function projectScope(project: Project): LockScope {
  return { kind: 'project', projectName: project.name };
}

/** ISO 時間字串可直接以字典序比較 */
function laterOf(candidate: string, floor: string | undefined): string {
  return floor !== undefined && floor > candidate ? floor : candidate;
}
