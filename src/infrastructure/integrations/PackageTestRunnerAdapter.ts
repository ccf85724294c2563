import fs from 'node:fs';
import path from 'node:path';
import type { Availability, TestResults, TestRunnerPort } from '../../domain/ports/CollaboratorPort.js';
import { unavailable } from '../../domain/ports/CollaboratorPort.js';
import { CollaboratorUnavailableError } from '../../domain/errors/DomainErrors.js';
import { execaCommandRunner, type CommandRunner } from './CommandRunner.js';
import { parseTestOutput } from './TestOutputParser.js';

/** 專案的 package.json 是否定義 test script */
export function hasTestScript(directory: string): boolean {
  const manifestPath = path.join(directory, 'package.json');
  if (!fs.existsSync(manifestPath)) return false;
  try {
    const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
    if (typeof manifest !== 'object' || manifest === null || !('scripts' in manifest)) return false;
    const { scripts } = manifest;
    return typeof scripts === 'object' && scripts !== null && 'test' in scripts && typeof scripts.test === 'string';
  } catch {
    // package.json 無法解析：沒有可執行的 test script
    return false;
  }
}

/**
 * 執行專案的測試指令（預設 `npm test`）並擷取通過 / 失敗數
 * 僅在專案有 package.json test script 時執行
 */
export class PackageTestRunnerAdapter implements TestRunnerPort {
  private readonly file: string;
  private readonly args: string[];

  constructor(
    command: string,
    private readonly timeoutMs: number,
    private readonly run: CommandRunner = execaCommandRunner,
    private readonly detect: (directory: string) => boolean = hasTestScript,
  ) {
    const [file, ...args] = command.trim().split(/\s+/);
    this.file = file;
    this.args = args;
  }

  async getResults(directory: string): Promise<Availability<TestResults>> {
    if (!this.detect(directory)) {
      return unavailable('no test script found');
    }

    try {
      const result = await this.run(this.file, this.args, { cwd: directory, timeoutMs: this.timeoutMs });
      return { available: true, data: parseTestOutput(`${result.stdout}\n${result.stderr}`, result.exitCode) };
    } catch (err) {
      if (err instanceof CollaboratorUnavailableError) return unavailable(err.message);
      throw err;
    }
  }
}
