import path from 'node:path';
import type { Project } from '../entities/Project.js';

export type ProjectMatch =
  | { kind: 'none' }
  | { kind: 'exact'; project: Project }
  | { kind: 'ambiguous'; candidates: Project[] };

/** child 是否等於 parent 或位於其下（以路徑段比較，/a/foo 不包含 /a/foobar） */
export function isWithinDirectory(parent: string, child: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}

/**
 * 由工作目錄推導目前專案（純函式，不碰檔案系統）
 *
 * - 專案路徑等於 cwd 或為其祖先者皆為候選
 * - 巢狀專案：最長路徑前綴勝出
 * - 多個專案登錄在同一個最深路徑：ambiguous
 */
export function matchProjectByDirectory(projects: readonly Project[], cwd: string): ProjectMatch {
  const candidates = projects.filter((p) => isWithinDirectory(p.path, cwd));
  if (candidates.length === 0) return { kind: 'none' };

  const depth = (p: Project) => path.resolve(p.path).length;
  const deepest = Math.max(...candidates.map(depth));
  const winners = candidates.filter((p) => depth(p) === deepest);

  if (winners.length === 1) return { kind: 'exact', project: winners[0] };
  return { kind: 'ambiguous', candidates: winners };
}
