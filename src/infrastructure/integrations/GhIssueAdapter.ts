import { z } from 'zod';
import type { Availability, Issue, IssuePort } from '../../domain/ports/CollaboratorPort.js';
import { unavailable } from '../../domain/ports/CollaboratorPort.js';
import { CollaboratorUnavailableError } from '../../domain/errors/DomainErrors.js';
import { execaCommandRunner, type CommandRunner } from './CommandRunner.js';

const GhIssueListSchema = z.array(z.object({
  number: z.number(),
  title: z.string(),
}));

/**
 * 以 GitHub CLI（gh）列出 open issues，並標記指派給自己的項目
 * 順序沿用 gh 的輸出（最近更新在前）
 */
export class GhIssueAdapter implements IssuePort {
  constructor(
    private readonly limit: number,
    private readonly timeoutMs: number,
    private readonly run: CommandRunner = execaCommandRunner,
  ) {}

  async getOpenIssues(directory: string): Promise<Availability<Issue[]>> {
    try {
      const open = await this.listIssues(directory, []);
      if (!open.available) return open;

      const mine = await this.listIssues(directory, ['--assignee', '@me']);
      const assigned = new Set(mine.available ? mine.data.map((i) => i.number) : []);

      return {
        available: true,
        data: open.data.map((i) => ({
          id: String(i.number),
          title: i.title,
          assignedToMe: assigned.has(i.number),
        })),
      };
    } catch (err) {
      if (err instanceof CollaboratorUnavailableError) return unavailable(err.message);
      throw err;
    }
  }

  private async listIssues(
    directory: string,
    extraArgs: string[],
  ): Promise<Availability<z.infer<typeof GhIssueListSchema>>> {
    const result = await this.run(
      'gh',
      ['issue', 'list', '--state', 'open', '--limit', String(this.limit), ...extraArgs, '--json', 'number,title'],
      { cwd: directory, timeoutMs: this.timeoutMs },
    );
    if (result.exitCode !== 0) {
      return unavailable(`gh issue list failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout || '[]');
    } catch {
      return unavailable('gh returned invalid JSON');
    }
    const parsed = GhIssueListSchema.safeParse(json);
    return parsed.success ? { available: true, data: parsed.data } : unavailable('unexpected gh output');
  }
}
