import type { CompletedSession } from '../domain/entities/Session.js';
import type { Snapshot } from '../domain/entities/Snapshot.js';
import type { CollaboratorData } from '../domain/ports/CollaboratorPort.js';
import { formatDuration } from '../domain/value-objects/Duration.js';
import {
  parseSnapshotMarkdown,
  stringifySnapshotMarkdown,
} from '../infrastructure/markdown/SnapshotMarkdown.js';

export const NO_NEXT_ACTION = '_No next action specified._';
export const NO_SUMMARY = '_No summary provided._';

/** build 產生的二級標題；使用者文字裡的其他 `## ` 行屬於內文 */
const SECTION_HEADINGS = ['Next Action', 'Summary', 'Git Status', 'Test Status', 'Open Issues'] as const;
type SectionHeading = (typeof SECTION_HEADINGS)[number];

/** 從 snapshot 讀回、供 `start` / `status` 顯示的重點 */
export interface SnapshotContext {
  sessionId?: string;
  createdAt?: string;
  summary?: string;
  nextAction?: string;
}

/**
 * 將結束的 session 與協作者資料組成 Markdown snapshot
 *
 * 純函式：不讀寫檔案，也不呼叫協作者。
 * 協作者 unavailable 時整個區塊省略；issue 清單為空時保留區塊並註明。
 */
export class ContextSnapshotBuilder {
  build(
    projectName: string,
    session: CompletedSession,
    data: CollaboratorData,
  ): Omit<Snapshot, 'fileName'> {
    const lines: string[] = [
      `# Session Context: ${projectName}`,
      '',
      `- **Started:** ${session.startedAt}`,
      `- **Ended:** ${session.endedAt}`,
      `- **Duration:** ${formatDuration(session.durationSeconds)}`,
    ];
    if (session.description) {
      lines.push(`- **Description:** ${session.description}`);
    }

    lines.push('', '## Next Action', '', session.nextAction || NO_NEXT_ACTION);
    lines.push('', '## Summary', '', session.summary || NO_SUMMARY);

    if (data.vcs.available) {
      const { branch, lastCommit, dirty } = data.vcs.data;
      lines.push(
        '',
        '## Git Status',
        '',
        `- **Branch:** \`${branch}\``,
        `- **Last Commit:** ${lastCommit ? `\`${lastCommit.hash}\` ${lastCommit.message}` : '_none_'}`,
        `- **Working Tree:** ${dirty ? 'uncommitted changes' : 'clean'}`,
      );
    }

    if (data.tests.available) {
      const { status, passed, failed } = data.tests.data;
      lines.push(
        '',
        '## Test Status',
        '',
        `- **Status:** ${status}`,
        `- **Passed:** ${passed}`,
        `- **Failed:** ${failed}`,
      );
    }

    if (data.issues.available) {
      lines.push('', '## Open Issues', '');
      if (data.issues.data.length === 0) {
        lines.push('_No open issues._');
      } else {
        for (const issue of data.issues.data) {
          lines.push(`- #${issue.id} ${issue.title}${issue.assignedToMe ? ' (assigned to me)' : ''}`);
        }
      }
    }

    const body = lines.join('\n') + '\n';
    return {
      projectName,
      sessionId: session.id,
      createdAt: session.endedAt,
      content: stringifySnapshotMarkdown(body, {
        project: projectName,
        sessionId: session.id,
        createdAt: session.endedAt,
      }),
    };
  }

  /** 讀回 snapshot 的 Summary 與 Next Action；佔位文字視為未填 */
  parse(content: string): SnapshotContext {
    const { frontmatter, body } = parseSnapshotMarkdown(content);
    return {
      sessionId: frontmatter.sessionId,
      createdAt: frontmatter.createdAt,
      summary: meaningful(section(body, 'Summary'), NO_SUMMARY),
      nextAction: meaningful(section(body, 'Next Action'), NO_NEXT_ACTION),
    };
  }
}

function isSectionHeading(line: string): boolean {
  return SECTION_HEADINGS.some((heading) => line.trim() === `## ${heading}`);
}

/** 取出 `## <heading>` 到下一個已知區塊標題之間的文字 */
function section(body: string, heading: SectionHeading): string | undefined {
  const lines = body.split('\n');
  const start = lines.findIndex((line) => line.trim() === `## ${heading}`);
  if (start === -1) return undefined;

  const rest = lines.slice(start + 1);
  const end = rest.findIndex(isSectionHeading);
  return (end === -1 ? rest : rest.slice(0, end)).join('\n').trim();
}

function meaningful(text: string | undefined, placeholder: string): string | undefined {
  return text && text !== placeholder ? text : undefined;
}
