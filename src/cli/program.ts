import { Command, CommanderError } from 'commander';
import { WorktrailError } from '../domain/errors/DomainErrors.js';
import { registerProjectCommand } from './commands/project.js';
import { registerSessionCommands } from './commands/session.js';
import { registerContextCommand } from './commands/context.js';
import type { CliIO } from './commands/options.js';

export type { CliIO } from './commands/options.js';

export function createProgram(io: CliIO, version: string): Command {
  const program = new Command();

  // 須在建立子指令前設定，子指令才會繼承
  program
    .name('worktrail')
    .description('Track work sessions per project and resume from the last recorded context')
    .version(version)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  registerProjectCommand(program, io);
  registerSessionCommands(program, io);
  registerContextCommand(program, io);

  program
    .command('version')
    .description('Print the version')
    .action(() => {
      io.stdout(`${version}\n`);
    });

  return program;
}

/**
 * 執行 CLI 並回傳 exit code
 * 已知錯誤輸出 `Error [CODE]: message`；commander 自身的錯誤已由 commander 輸出
 */
export async function runCli(argv: readonly string[], io: CliIO, version: string): Promise<number> {
  const program = createProgram(io, version);
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof WorktrailError) {
      io.stderr(`Error [${err.code}]: ${err.message}\n`);
      return 1;
    }
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
