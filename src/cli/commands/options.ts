import { InvalidArgumentError, Option, type Command } from 'commander';
import type { Collaborators } from '../../domain/ports/CollaboratorPort.js';
import type { OutputFormat } from '../formatters/OutputFormatter.js';

/** 每個指令共用的選項 */
export interface CommonOptions {
  root?: string;
  format: OutputFormat;
}

/** 指令執行環境；測試時可整組替換 */
export interface CliIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** 互動式輸入；非 TTY 時不提供 */
  prompt?: (question: string) => Promise<string>;
  collaborators?: Collaborators;
  now?: () => Date;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--root <dir>', 'Storage root directory (default: $WORKTRAIL_HOME or ~/.worktrail)')
    .addOption(
      new Option('--format <format>', 'Output format')
        .choices(['text', 'json'])
        .default('text'),
    );
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
