import { execa } from 'execa';
import { CollaboratorUnavailableError } from '../../domain/errors/DomainErrors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
}

/**
 * 執行外部指令；指令不存在、逾時或被中止時拋出 CollaboratorUnavailableError。
 * 非零 exit code 不算錯誤，交給呼叫端判斷（例如測試失敗）。
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

export const execaCommandRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, [...args], {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    reject: false,
    stdin: 'ignore',
    env: { GH_PROMPT_DISABLED: '1', GIT_TERMINAL_PROMPT: '0' },
  });

  if (result.timedOut) {
    throw new CollaboratorUnavailableError(`${file} timed out after ${options.timeoutMs}ms`);
  }
  if (result.exitCode === undefined) {
    // spawn 失敗（ENOENT 等）或被 signal 終止
    throw new CollaboratorUnavailableError(`${file} could not be run`);
  }

  return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
};
