import { z } from 'zod';
import type { Project } from '../../domain/entities/Project.js';
import type { Session } from '../../domain/entities/Session.js';

export const STORAGE_FORMAT_VERSION = 1;

/** config.json 中單一專案的紀錄（以專案名稱為 key） */
const ProjectRecordSchema = z.object({
  path: z.string().min(1),
  alias: z.string().nullable().optional(),
  created_at: z.string(),
  last_used: z.string(),
});

export const RegistryFileSchema = z.object({
  version: z.number().int(),
  projects: z.record(ProjectRecordSchema),
});

const SessionRecordSchema = z.object({
  id: z.string().min(1),
  project_name: z.string(),
  started_at: z.string(),
  ended_at: z.string().nullable(),
  description: z.string().nullable(),
  summary: z.string().nullable(),
  next_action: z.string().nullable(),
  duration: z.number().int().nonnegative().nullable(),
  status: z.enum(['active', 'completed']),
  branch: z.string().nullable().optional(),
  last_commit: z.string().nullable().optional(),
  snapshot_file: z.string().nullable().optional(),
});

/**
 * sessions.json：append-only 的 session 歷史
 * active_session 是明確持久化的狀態，必須與 status 一致
 */
export const HistoryFileSchema = z.object({
  version: z.number().int(),
  active_session: z.string().nullable(),
  sessions: z.array(SessionRecordSchema),
}).superRefine((file, ctx) => {
  const active = file.sessions.filter((s) => s.status === 'active');
  if (active.length > 1) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${active.length} sessions are marked active` });
    return;
  }
  const expected = active[0]?.id ?? null;
  if (file.active_session !== expected) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['active_session'],
      message: `points to ${file.active_session ?? 'null'} but the active session is ${expected ?? 'none'}`,
    });
  }
  file.sessions.forEach((s, i) => {
    if (s.status === 'completed' && s.ended_at === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sessions', i, 'ended_at'], message: 'completed session has no ended_at' });
    }
  });
});

export type RegistryFile = z.infer<typeof RegistryFileSchema>;
export type HistoryFile = z.infer<typeof HistoryFileSchema>;
type ProjectRecord = z.infer<typeof ProjectRecordSchema>;
type SessionRecord = z.infer<typeof SessionRecordSchema>;

export function toProject(name: string, record: ProjectRecord): Project {
  return {
    name,
    alias: record.alias ?? undefined,
    path: record.path,
    createdAt: record.created_at,
    lastUsed: record.last_used,
  };
}

export function toRegistryFile(projects: readonly Project[]): RegistryFile {
  const records: Record<string, ProjectRecord> = {};
  for (const p of projects) {
    records[p.name] = {
      path: p.path,
      alias: p.alias ?? null,
      created_at: p.createdAt,
      last_used: p.lastUsed,
    };
  }
  return { version: STORAGE_FORMAT_VERSION, projects: records };
}

export function toSession(record: SessionRecord): Session {
  return {
    id: record.id,
    projectName: record.project_name,
    startedAt: record.started_at,
    endedAt: record.ended_at ?? undefined,
    description: record.description ?? undefined,
    summary: record.summary ?? undefined,
    nextAction: record.next_action ?? undefined,
    durationSeconds: record.duration ?? undefined,
    status: record.status,
    branch: record.branch ?? undefined,
    lastCommit: record.last_commit ?? undefined,
    snapshotFile: record.snapshot_file ?? undefined,
  };
}

export function toHistoryFile(sessions: readonly Session[]): HistoryFile {
  const active = sessions.find((s) => s.status === 'active');
  return {
    version: STORAGE_FORMAT_VERSION,
    active_session: active?.id ?? null,
    sessions: sessions.map((s) => ({
      id: s.id,
      project_name: s.projectName,
      started_at: s.startedAt,
      ended_at: s.endedAt ?? null,
      description: s.description ?? null,
      summary: s.summary ?? null,
      next_action: s.nextAction ?? null,
      duration: s.durationSeconds ?? null,
      status: s.status,
      branch: s.branch ?? null,
      last_commit: s.lastCommit ?? null,
      snapshot_file: s.snapshotFile ?? null,
    })),
  };
}

/** zod 錯誤轉為單行描述 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}
