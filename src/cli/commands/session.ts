import type { Command } from 'commander';
import { createAppContext } from '../wiring.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { formatDuration } from '../../domain/value-objects/Duration.js';
import { addCommonOptions, parsePositiveInt, type CliIO, type CommonOptions } from './options.js';

/**
 * 註冊 session 生命週期指令
 *
 * 用法：
 *   worktrail start [project] [description...]
 *   worktrail end [project] [-s <summary>] [-n <next action>]
 *   worktrail status [project]
 *   worktrail history [project] [--limit N]
 *   worktrail stats [project]
 */
export function registerSessionCommands(program: Command, io: CliIO): void {
  addCommonOptions(
    program
      .command('start [project] [description...]')
      .description('Start a work session and show where the last one left off'),
  ).action(async (identifier: string | undefined, words: string[] | undefined, opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, collaborators: io.collaborators, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const project = app.registry.resolve(identifier, io.cwd);
    const result = await app.sessions.start(project, (words ?? []).join(' '));

    if (opts.format === 'json') {
      io.stdout(formatter.formatObject(result, 'json') + '\n');
      return;
    }

    const lines = [`Started session for "${project.name}" at ${result.session.startedAt}`];
    if (result.lastSnapshot) {
      lines.push('', formatter.lastContext(app.builder.parse(result.lastSnapshot.content)));
    }
    const collaborators = formatter.collaboratorLines(result.collaborators);
    if (collaborators.length > 0) lines.push('', ...collaborators);
    io.stdout(lines.join('\n') + '\n');
  });

  addCommonOptions(
    program
      .command('end [project]')
      .description('End the active session and write a context snapshot')
      .option('-s, --summary <text>', 'What was accomplished')
      .option('-n, --next <text>', 'The next concrete action'),
  ).action(async (
    identifier: string | undefined,
    opts: CommonOptions & { summary?: string; next?: string },
  ) => {
    const app = createAppContext({ root: opts.root, env: io.env, collaborators: io.collaborators, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const project = app.registry.resolve(identifier, io.cwd);

    // 先確認有進行中的 session，避免白白詢問；只讀歷史，不讀 snapshot
    const activeSession = app.sessions.activeSession(project);
    const summary = opts.summary ?? (activeSession && io.prompt ? await io.prompt('Summary: ') : undefined);
    const next = opts.next ?? (activeSession && io.prompt ? await io.prompt('Next action: ') : undefined);

    const result = await app.sessions.end(project, summary, next);
    if (result.snapshotError) {
      io.stderr(`Warning: context snapshot was not written: ${result.snapshotError.message}\n`);
    }

    if (opts.format === 'json') {
      io.stdout(formatter.formatObject({
        session: result.session,
        snapshot: result.snapshot?.fileName,
        snapshotError: result.snapshotError?.message,
      }, 'json') + '\n');
      return;
    }

    const lines = [
      `Ended session for "${project.name}" (${formatDuration(result.session.durationSeconds)})`,
    ];
    if (result.snapshot) lines.push(`Snapshot: ${result.snapshot.fileName}`);
    io.stdout(lines.join('\n') + '\n');
  });

  addCommonOptions(
    program
      .command('status [project]')
      .description('Show the active session and the last recorded context'),
  ).action(async (identifier: string | undefined, opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, collaborators: io.collaborators, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const project = app.registry.resolve(identifier, io.cwd);
    const report = await app.sessions.status(project);

    if (opts.format === 'json') {
      io.stdout(formatter.formatObject({
        project: report.project,
        activeSession: report.activeSession,
        lastContext: report.lastSnapshot ? app.builder.parse(report.lastSnapshot.content) : undefined,
        collaborators: report.collaborators,
      }, 'json') + '\n');
      return;
    }

    const lines = [formatter.activeSession(project.name, report.activeSession)];
    if (report.lastSnapshot) {
      lines.push('', formatter.lastContext(app.builder.parse(report.lastSnapshot.content)));
    }
    const collaborators = formatter.collaboratorLines(report.collaborators);
    if (collaborators.length > 0) lines.push('', ...collaborators);
    io.stdout(lines.join('\n') + '\n');
  });

  addCommonOptions(
    program
      .command('history [project]')
      .description('List sessions, newest first')
      .option('--limit <n>', 'Maximum number of sessions', parsePositiveInt),
  ).action((identifier: string | undefined, opts: CommonOptions & { limit?: number }) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const project = app.registry.resolve(identifier, io.cwd);
    const sessions = app.sessions.history(project, opts.limit ?? app.config.history.defaultLimit);

    io.stdout(
      (opts.format === 'json'
        ? formatter.formatObject({ project: project.name, sessions }, 'json')
        : formatter.sessionList(sessions)) + '\n',
    );
  });

  addCommonOptions(
    program
      .command('stats [project]')
      .description('Summarize time spent in completed sessions'),
  ).action((identifier: string | undefined, opts: CommonOptions) => {
    const app = createAppContext({ root: opts.root, env: io.env, now: io.now });
    const formatter = new OutputFormatter(io.now);
    const project = app.registry.resolve(identifier, io.cwd);
    const stats = app.sessions.stats(project);

    if (opts.format === 'json') {
      io.stdout(formatter.formatObject({ project: project.name, ...stats }, 'json') + '\n');
      return;
    }

    io.stdout([
      `Sessions: ${stats.totalSessions}`,
      `Total: ${formatDuration(stats.totalSeconds)}`,
      `Average: ${formatDuration(stats.averageSeconds)}`,
      `Longest: ${formatDuration(stats.longestSeconds)}`,
      `Shortest: ${formatDuration(stats.shortestSeconds)}`,
      `Today: ${formatDuration(stats.todaySeconds)}`,
    ].join('\n') + '\n');
  });
}
