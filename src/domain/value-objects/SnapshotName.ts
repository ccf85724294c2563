/**
 * Snapshot 檔名：UTC 時間 YYYYMMDD_HHMMSS（秒級），同秒或時鐘倒退時加上 _001、_002… 序號。
 * 檔名字典序 = 建立順序；序號固定三位數，確保 `_010` 排在 `_009` 之後。
 * 序號用完（_999）時改用下一秒的檔名。
 */

const FILE_NAME_PATTERN = /^(\d{8}_\d{6})(?:_(\d{3}))?\.md$/;
const SEQ_WIDTH = 3;
const MAX_SEQ = 10 ** SEQ_WIDTH - 1;

export interface SnapshotFileName {
  stem: string;
  seq: number;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatSnapshotStem(date: Date): string {
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1, 2),
    pad(date.getUTCDate(), 2),
    '_',
    pad(date.getUTCHours(), 2),
    pad(date.getUTCMinutes(), 2),
    pad(date.getUTCSeconds(), 2),
  ].join('');
}

export function parseSnapshotFileName(fileName: string): SnapshotFileName | undefined {
  const match = FILE_NAME_PATTERN.exec(fileName);
  if (!match) return undefined;
  return { stem: match[1], seq: match[2] ? Number(match[2]) : 0 };
}

export function isSnapshotFileName(fileName: string): boolean {
  return FILE_NAME_PATTERN.test(fileName);
}

/**
 * 依既有檔名決定下一個 snapshot 檔名
 * 結果一定大於所有既有檔名（字典序）
 */
export function nextSnapshotFileName(existing: readonly string[], createdAt: Date): string {
  const stem = formatSnapshotStem(createdAt);
  const latest = existing
    .filter(isSnapshotFileName)
    .sort()
    .at(-1);

  const parsedLatest = latest ? parseSnapshotFileName(latest) : undefined;
  if (!parsedLatest || stem > parsedLatest.stem) {
    return `${stem}.md`;
  }

  if (parsedLatest.seq < MAX_SEQ) {
    return `${parsedLatest.stem}_${pad(parsedLatest.seq + 1, SEQ_WIDTH)}.md`;
  }
  const rolled = new Date(stemToDate(parsedLatest.stem).getTime() + 1000);
  return `${formatSnapshotStem(rolled)}.md`;
}

function stemToDate(s: string): Date {
  return new Date(`${s.slice(0, 4)}-${s.slice(4, 6)}-${s.slice(6, 8)}T${s.slice(9, 11)}:${s.slice(11, 13)}:${s.slice(13, 15)}.000Z`);
}

/** 由檔名還原建立時間（frontmatter 缺少 created_at 時使用） */
export function snapshotFileNameToDate(fileName: string): Date | undefined {
  const parsed = parseSnapshotFileName(fileName);
  if (!parsed) return undefined;
  const date = stemToDate(parsed.stem);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
