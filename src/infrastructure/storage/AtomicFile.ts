import fs from 'node:fs';
import path from 'node:path';
import { StorageIOError, errnoOf } from '../../domain/errors/DomainErrors.js';

/**
 * 原子寫入：先寫同目錄下的暫存檔，再 rename 取代目標
 * 行程在任何時點中斷，目標檔案只會是舊版或完整的新版
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, content, 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw new StorageIOError(`Failed to write ${filePath}: ${describe(err)}`, filePath, { cause: err });
  }
}

/** 一般寫入（snapshot 檔名唯一，不需要 rename） */
export function writeFilePlain(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    throw new StorageIOError(`Failed to write ${filePath}: ${describe(err)}`, filePath, { cause: err });
  }
}

/** 讀取文字檔；不存在時回傳 undefined */
export function readTextIfExists(filePath: string): string | undefined {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (errnoOf(err) === 'ENOENT') return undefined;
    throw new StorageIOError(`Failed to read ${filePath}: ${describe(err)}`, filePath, { cause: err });
  }
}

/** 列出目錄內容；目錄不存在時回傳空陣列 */
export function listDirectory(dirPath: string): string[] {
  try {
    return fs.readdirSync(dirPath);
  } catch (err) {
    if (errnoOf(err) === 'ENOENT') return [];
    throw new StorageIOError(`Failed to list ${dirPath}: ${describe(err)}`, dirPath, { cause: err });
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
