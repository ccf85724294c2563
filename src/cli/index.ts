#!/usr/bin/env node

import { createRequire } from 'node:module';
import { createInterface } from 'node:readline/promises';
import { runCli, type CliIO } from './program.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const pkg: unknown = require('../../package.json');
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

/** 只有互動式終端機才詢問 summary / next action */
async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

const io: CliIO = {
  cwd: process.cwd(),
  env: process.env,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  prompt: process.stdin.isTTY ? ask : undefined,
};

process.exitCode = await runCli(process.argv, io, version);
