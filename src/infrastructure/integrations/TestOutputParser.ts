import type { TestResults } from '../../domain/ports/CollaboratorPort.js';

/**
 * 從測試輸出擷取通過 / 失敗數
 * 支援 vitest（Tests  5 passed | 1 failed (6)）與 jest（Tests: 1 failed, 5 passed, 6 total）
 * 的摘要行；取最後一次出現的數字
 */
export function parseTestOutput(output: string, exitCode: number): TestResults {
  const passed = lastCount(output, /(\d+)\s+passed/g);
  const failed = lastCount(output, /(\d+)\s+failed/g);

  if (passed + failed === 0) {
    return { passed: 0, failed: 0, status: exitCode === 0 ? 'empty' : 'failed' };
  }
  return { passed, failed, status: failed > 0 || exitCode !== 0 ? 'failed' : 'passed' };
}

function lastCount(output: string, pattern: RegExp): number {
  let count = 0;
  for (const match of output.matchAll(pattern)) {
    count = Number(match[1]);
  }
  return count;
}
