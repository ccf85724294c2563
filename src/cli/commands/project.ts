import type { Command } from 'commander';
import { createAppContext } from '../wiring.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, type CliIO, type CommonOptions } from './options.js';

/**
 * 註冊 project 指令群組
 *
 * 用法：
 *   worktrail project add <name> [path] [--alias <alias>]
 *   worktrail project list
 *   worktrail project info [project]
 *   worktrail project remove <project>
 */
export function registerProjectCommand(program: Command, io: CliIO): void {
  const projectCmd = program
    .command('project')
    .description('Manage registered projects');

  addCommonOptions(
    projectCmd
      .command('add <name> [path]')
      .description('Register a project directory (defaults to the current directory)')
      .option('--alias <alias>', 'Short alternative name'),
  ).action(async (name: string, projectPath: string | undefined, opts: CommonOptions & { alias?: string }) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const project = await app.registry.register(name, projectPath ?? io.cwd, opts.alias);

    io.stdout(
      (opts.format === 'json'
        ? formatter.formatObject(project, 'json')
        : `Registered ${formatter.projectLine(project)}`) + '\n',
    );
  });

  addCommonOptions(
    projectCmd
      .command('list')
      .description('List registered projects'),
  ).action((opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const projects = app.registry.list();

    io.stdout(
      (opts.format === 'json'
        ? formatter.formatObject({ projects, count: projects.length }, 'json')
        : formatter.projectList(projects)) + '\n',
    );
  });

  addCommonOptions(
    projectCmd
      .command('info [project]')
      .description('Show sessions and snapshots recorded for a project'),
  ).action((identifier: string | undefined, opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const info = app.registry.info(identifier, io.cwd);

    io.stdout(formatter.formatObject(info, opts.format) + '\n');
  });

  addCommonOptions(
    projectCmd
      .command('remove <project>')
      .description('Unregister a project (session history stays on disk)'),
  ).action(async (identifier: string, opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const removed = await app.registry.remove(identifier);

    io.stdout(
      (opts.format === 'json'
        ? formatter.formatObject({ removed: removed.name }, 'json')
        : `Removed project "${removed.name}"`) + '\n',
    );
  });
}
