import type { Command } from 'commander';
import { createAppContext } from '../wiring.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, type CliIO, type CommonOptions } from './options.js';

/** `worktrail context [project]`：輸出 PROJECT.md */
export function registerContextCommand(program: Command, io: CliIO): void {
  addCommonOptions(
    program
      .command('context [project]')
      .description('Print the latest context document (PROJECT.md)'),
  ).action((identifier: string | undefined, opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const project = app.registry.resolve(identifier, io.cwd);
    const content = app.storage.readContextDocument(project.name);

    if (opts.format === 'json') {
      io.stdout(new OutputFormatter(io.now).formatObject({ project: project.name, content: content ?? null }, 'json') + '\n');
      return;
    }
    io.stdout(content ?? `No context recorded for "${project.name}" yet.\n`);
  });
}
