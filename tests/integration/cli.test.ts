import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCli, type CliIO } from '../../src/cli/program.js';
import type { Collaborators } from '../../src/domain/ports/CollaboratorPort.js';

const VERSION = '0.0.0-test';

describe('worktrail CLI', () => {
  let tmpDir: string;
  let rootDir: string;
  let projectDir: string;
  let current: Date;
  let out: string;
  let err: string;
  let prompt: CliIO['prompt'];
  let collaborators: Collaborators;

  beforeEach(() => {
    tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'worktrail-cli-')));
    rootDir = path.join(tmpDir, 'home');
    projectDir = path.join(tmpDir, 'api');
    fs.mkdirSync(path.join(projectDir, 'src'), { recursive: true });
    current = new Date('2026-10-18T09:00:00.000Z');
    prompt = undefined;
    collaborators = {};
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function cli(args: string[], cwd = projectDir): Promise<number> {
    out = '';
    err = '';
    const io: CliIO = {
      cwd,
      env: { WORKTRAIL_HOME: rootDir },
      stdout: (text) => { out += text; },
      stderr: (text) => { err += text; },
      prompt,
      collaborators,
      now: () => new Date(current.getTime()),
    };
    return runCli(['node', 'worktrail', ...args], io, VERSION);
  }

  function advance(seconds: number): void {
    current = new Date(current.getTime() + seconds * 1000);
  }

  it('registers and lists projects', async () => {
    expect(await cli(['project', 'add', 'api', projectDir, '--alias', 'a'])).toBe(0);
    expect(out).toBe(`Registered api (a)  ${projectDir}\n`);

    expect(await cli(['project', 'list'])).toBe(0);
    expect(out).toBe(`api (a)  ${projectDir}\n`);

    expect(await cli(['project', 'list', '--format', 'json'])).toBe(0);
    expect(JSON.parse(out)).toMatchObject({ count: 1, projects: [{ name: 'api', alias: 'a', path: projectDir }] });
  });

  it('registers the current directory by default', async () => {
    expect(await cli(['project', 'add', 'api'])).toBe(0);
    expect(out).toBe(`Registered api  ${projectDir}\n`);
  });

  it('reports typed errors with their code', async () => {
    await cli(['project', 'add', 'api', projectDir]);

    expect(await cli(['project', 'add', 'api', projectDir])).toBe(1);
    expect(err).toBe('Error [DUPLICATE_NAME]: Project "api" is already registered\n');
    expect(out).toBe('');
  });

  it('fails outside any registered project', async () => {
    await cli(['project', 'add', 'api', projectDir]);

    expect(await cli(['status'], tmpDir)).toBe(1);
    expect(err).toBe(`Error [AMBIGUOUS_PROJECT]: No registered project contains "${tmpDir}"; pass a project name\n`);
  });

  it('runs a full session from the project directory', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    const cwd = path.join(projectDir, 'src');

    expect(await cli(['start', 'api', 'Fix', 'login'], cwd)).toBe(0);
    expect(out).toBe('Started session for "api" at 2026-10-18T09:00:00.000Z\n');

    advance(300);
    expect(await cli(['status'], cwd)).toBe(0);
    expect(out).toBe('Active session for "api" since 2026-10-18T09:00:00.000Z (5m)\n  Fix login\n');

    advance(30);
    expect(await cli(['end', '-s', 'Added tests', '-n', 'Wire the retry'], cwd)).toBe(0);
    expect(out).toBe('Ended session for "api" (5m 30s)\nSnapshot: 20261018_090530.md\n');
    expect(err).toBe('');

    expect(await cli(['context'], cwd)).toBe(0);
    expect(out).toBe(fs.readFileSync(path.join(rootDir, 'projects', 'api', 'snapshots', '20261018_090530.md'), 'utf-8'));

    advance(60);
    expect(await cli(['start'], cwd)).toBe(0);
    expect(out).toBe([
      'Started session for "api" at 2026-10-18T09:06:30.000Z',
      '',
      'Last session context (2026-10-18T09:05:30.000Z):',
      '  Next action: Wire the retry',
      '  Summary: Added tests',
      '',
    ].join('\n'));
  });

  it('refuses a second start', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    await cli(['start']);

    expect(await cli(['start'])).toBe(1);
    expect(err).toBe(
      'Error [SESSION_ALREADY_ACTIVE]: A session for "api" is already active (started 2026-10-18T09:00:00.000Z). End it before starting a new one.\n',
    );
  });

  it('refuses to end without an active session', async () => {
    await cli(['project', 'add', 'api', projectDir]);

    expect(await cli(['end', '-s', 'x'])).toBe(1);
    expect(err).toBe('Error [NO_ACTIVE_SESSION]: No active session for "api"\n');
  });

  it('ends the session even when the last snapshot is corrupt', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    await cli(['start']);
    const snapshotsDir = path.join(rootDir, 'projects', 'api', 'snapshots');
    fs.mkdirSync(snapshotsDir, { recursive: true });
    fs.writeFileSync(path.join(snapshotsDir, '20261018_080000.md'), '---\nproject: [unclosed\n---\n# Context\n');

    expect(await cli(['status'])).toBe(0);
    expect(out).toBe('Active session for "api" since 2026-10-18T09:00:00.000Z (0s)\n');

    advance(90);
    expect(await cli(['end', '-s', 'done', '-n', 'next'])).toBe(0);
    expect(out).toBe('Ended session for "api" (1m 30s)\nSnapshot: 20261018_090130.md\n');

    expect(await cli(['status'])).toBe(0);
    expect(out).toBe([
      'No active session for "api".',
      '',
      'Last session context (2026-10-18T09:01:30.000Z):',
      '  Next action: next',
      '  Summary: done',
      '',
    ].join('\n'));
  });

  it('shows collaborator state on start and status', async () => {
    collaborators = {
      vcs: {
        getStatus: async () => ({
          available: true,
          data: { branch: 'main', lastCommit: { hash: 'abc1234', message: 'Add login form' }, dirty: true },
        }),
      },
      tests: { getResults: async () => ({ available: true, data: { passed: 5, failed: 1, status: 'failed' } }) },
      issues: { getOpenIssues: async () => ({ available: true, data: [{ id: '7', title: 'Login fails', assignedToMe: true }] }) },
    };
    await cli(['project', 'add', 'api', projectDir]);

    const collaboratorLines = [
      'Git: main @ abc1234 Add login form (uncommitted changes)',
      'Tests: failed (5 passed, 1 failed)',
      'Open issues: #7 Login fails (assigned to me)',
    ];
    expect(await cli(['start'])).toBe(0);
    expect(out).toBe(['Started session for "api" at 2026-10-18T09:00:00.000Z', '', ...collaboratorLines, ''].join('\n'));

    expect(await cli(['status'])).toBe(0);
    expect(out).toBe(['Active session for "api" since 2026-10-18T09:00:00.000Z (0s)', '', ...collaboratorLines, ''].join('\n'));

    expect(await cli(['status', '--format', 'json'])).toBe(0);
    expect(JSON.parse(out)).toMatchObject({
      activeSession: { branch: 'main', lastCommit: 'abc1234' },
      collaborators: { tests: { available: true, data: { passed: 5, failed: 1, status: 'failed' } } },
    });
  });

  it('prompts for summary and next action when they are omitted', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    await cli(['start']);
    const questions: string[] = [];
    const answers = ['Refactored parser', 'Add tests'];
    prompt = async (question) => {
      questions.push(question);
      return answers.shift() ?? '';
    };

    expect(await cli(['end', '--format', 'json'])).toBe(0);
    expect(questions).toEqual(['Summary: ', 'Next action: ']);
    expect(JSON.parse(out)).toMatchObject({
      session: { summary: 'Refactored parser', nextAction: 'Add tests', status: 'completed' },
      snapshot: '20261018_090000.md',
    });
  });

  it('shows history newest first and honours --limit', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    await cli(['start', 'api', 'one']);
    advance(45);
    await cli(['end', '-s', 'first done']);
    advance(15);
    await cli(['start', 'api', 'two']);

    expect(await cli(['history'])).toBe(0);
    expect(out).toBe([
      '2026-10-18T09:01:00.000Z  active 0s  two',
      '2026-10-18T09:00:00.000Z  45s  first done',
      '',
    ].join('\n'));

    expect(await cli(['history', '--limit', '1', '--format', 'json'])).toBe(0);
    const parsed: unknown = JSON.parse(out);
    expect(parsed).toMatchObject({ project: 'api', sessions: [{ description: 'two', status: 'active' }] });

    expect(await cli(['history', '--limit', '0'])).toBe(1);
    expect(err).toContain('Must be a positive integer.');
  });

  it('prints stats', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    await cli(['start']);
    advance(330);
    await cli(['end']);

    expect(await cli(['stats'])).toBe(0);
    expect(out).toBe([
      'Sessions: 1',
      'Total: 5m 30s',
      'Average: 5m 30s',
      'Longest: 5m 30s',
      'Shortest: 5m 30s',
      'Today: 5m 30s',
      '',
    ].join('\n'));
  });

  it('shows project info and removes projects by alias', async () => {
    await cli(['project', 'add', 'api', projectDir, '--alias', 'a']);
    await cli(['start']);

    expect(await cli(['project', 'info', 'a', '--format', 'json'])).toBe(0);
    expect(JSON.parse(out)).toMatchObject({
      project: { name: 'api' },
      totalSessions: 1,
      completedSessions: 0,
      hasActiveSession: true,
      snapshotCount: 0,
      hasContextDocument: false,
    });

    expect(await cli(['project', 'remove', 'a'])).toBe(0);
    expect(out).toBe('Removed project "api"\n');
    expect(fs.existsSync(path.join(rootDir, 'projects', 'api', 'sessions.json'))).toBe(true);
  });

  it('says so when no context has been recorded', async () => {
    await cli(['project', 'add', 'api', projectDir]);
    expect(await cli(['context'])).toBe(0);
    expect(out).toBe('No context recorded for "api" yet.\n');
  });

  it('accepts an explicit --root', async () => {
    const otherRoot = path.join(tmpDir, 'other-home');
    expect(await cli(['project', 'add', 'api', projectDir, '--root', otherRoot])).toBe(0);
    expect(fs.existsSync(path.join(otherRoot, 'config.json'))).toBe(true);
    expect(fs.existsSync(path.join(rootDir, 'config.json'))).toBe(false);
  });

  it('prints the version', async () => {
    expect(await cli(['version'])).toBe(0);
    expect(out).toBe(`${VERSION}\n`);
  });
});
