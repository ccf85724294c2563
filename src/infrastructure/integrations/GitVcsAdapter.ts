import type { Availability, VcsStatus, VcsStatusPort } from '../../domain/ports/CollaboratorPort.js';
import { unavailable } from '../../domain/ports/CollaboratorPort.js';
import { CollaboratorUnavailableError } from '../../domain/errors/DomainErrors.js';
import { execaCommandRunner, type CommandRunner } from './CommandRunner.js';

/** git log 輸出中 hash 與 subject 的分隔字元 */
const FIELD_SEPARATOR = '\t';

/**
 * 以 git CLI 讀取工作目錄狀態
 * 非 git 目錄、未安裝 git、逾時 → unavailable
 */
export class GitVcsAdapter implements VcsStatusPort {
  constructor(
    private readonly timeoutMs: number,
    private readonly run: CommandRunner = execaCommandRunner,
  ) {}

  async getStatus(directory: string): Promise<Availability<VcsStatus>> {
    try {
      const inside = await this.git(directory, ['rev-parse', '--is-inside-work-tree']);
      if (inside.exitCode !== 0 || inside.stdout.trim() !== 'true') {
        return unavailable('not a git repository');
      }

      const branch = await this.currentBranch(directory);

      // 空 repo 沒有 HEAD，git log 會失敗
      const log = await this.git(directory, ['log', '-1', `--format=%h${FIELD_SEPARATOR}%s`]);
      const lastCommit = log.exitCode === 0 && log.stdout.trim()
        ? parseCommitLine(log.stdout.trim())
        : undefined;

      const status = await this.git(directory, ['status', '--porcelain']);
      if (status.exitCode !== 0) {
        return unavailable(`git status failed: ${status.stderr.trim()}`);
      }

      return {
        available: true,
        data: { branch, lastCommit, dirty: status.stdout.trim().length > 0 },
      };
    } catch (err) {
      if (err instanceof CollaboratorUnavailableError) return unavailable(err.message);
      throw err;
    }
  }

  private async currentBranch(directory: string): Promise<string> {
    const branch = await this.git(directory, ['branch', '--show-current']);
    const name = branch.exitCode === 0 ? branch.stdout.trim() : '';
    if (name) return name;

    // detached HEAD
    const head = await this.git(directory, ['rev-parse', '--short', 'HEAD']);
    return head.exitCode === 0 && head.stdout.trim() ? `(detached at ${head.stdout.trim()})` : '(no branch)';
  }

  private git(directory: string, args: string[]) {
    return this.run('git', args, { cwd: directory, timeoutMs: this.timeoutMs });
  }
}

export function parseCommitLine(line: string): { hash: string; message: string } {
  const index = line.indexOf(FIELD_SEPARATOR);
  if (index === -1) return { hash: line, message: '' };
  return { hash: line.slice(0, index), message: line.slice(index + 1) };
}
