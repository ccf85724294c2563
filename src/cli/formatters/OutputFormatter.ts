import type { Project } from '../../domain/entities/Project.js';
import type { Session } from '../../domain/entities/Session.js';
import type { CollaboratorData } from '../../domain/ports/CollaboratorPort.js';
import { durationSeconds, formatDuration } from '../../domain/value-objects/Duration.js';
import type { SnapshotContext } from '../../application/ContextSnapshotBuilder.js';

export type OutputFormat = 'json' | 'text';

/**
 * CLI 輸出格式化器
 *
 * - json：原樣序列化，供腳本使用
 * - text：人類可讀；未提供專用版面的物件以縮排平展
 */
export class OutputFormatter {
  constructor(private readonly now: () => Date = () => new Date()) {}

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  projectLine(project: Project): string {
    const alias = project.alias ? ` (${project.alias})` : '';
    return `${project.name}${alias}  ${project.path}`;
  }

  projectList(projects: readonly Project[]): string {
    if (projects.length === 0) return 'No projects registered.';
    return projects.map((p) => this.projectLine(p)).join('\n');
  }

  /** 一行一個 session：開始時間、長度、說明 */
  sessionList(sessions: readonly Session[]): string {
    if (sessions.length === 0) return 'No sessions recorded.';
    return sessions
      .map((s) => {
        const length = s.status === 'active'
          ? `active ${formatDuration(durationSeconds(s.startedAt, this.now().toISOString()))}`
          : formatDuration(s.durationSeconds ?? 0);
        const note = s.summary ?? s.description;
        return note ? `${s.startedAt}  ${length}  ${note}` : `${s.startedAt}  ${length}`;
      })
      .join('\n');
  }

  activeSession(projectName: string, session: Session | undefined): string {
    if (!session) return `No active session for "${projectName}".`;
    const elapsed = formatDuration(durationSeconds(session.startedAt, this.now().toISOString()));
    const description = session.description ? `\n  ${session.description}` : '';
    return `Active session for "${projectName}" since ${session.startedAt} (${elapsed})${description}`;
  }

  lastContext(context: SnapshotContext): string {
    const lines = [`Last session context${context.createdAt ? ` (${context.createdAt})` : ''}:`];
    lines.push(`  Next action: ${context.nextAction ?? '-'}`);
    lines.push(`  Summary: ${context.summary ?? '-'}`);
    return lines.join('\n');
  }

  /** 可用的協作者各一行；unavailable 者省略 */
  collaboratorLines(data: CollaboratorData): string[] {
    const lines: string[] = [];
    if (data.vcs.available) {
      const { branch, lastCommit, dirty } = data.vcs.data;
      const commit = lastCommit ? ` @ ${lastCommit.hash} ${lastCommit.message}` : '';
      lines.push(`Git: ${branch}${commit} (${dirty ? 'uncommitted changes' : 'clean'})`);
    }
    if (data.tests.available) {
      const { status, passed, failed } = data.tests.data;
      lines.push(`Tests: ${status} (${passed} passed, ${failed} failed)`);
    }
    if (data.issues.available) {
      const issues = data.issues.data
        .map((i) => `#${i.id} ${i.title}${i.assignedToMe ? ' (assigned to me)' : ''}`);
      lines.push(`Open issues: ${issues.length > 0 ? issues.join(', ') : 'none'}`);
    }
    return lines;
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .filter(([, val]) => val !== undefined)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
