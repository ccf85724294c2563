import path from 'node:path';
import type { Project } from '../../domain/entities/Project.js';
import type { Session } from '../../domain/entities/Session.js';
import type { Snapshot } from '../../domain/entities/Snapshot.js';
import type { StoragePort } from '../../domain/ports/StoragePort.js';
import { StorageIOError } from '../../domain/errors/DomainErrors.js';
import {
  isSnapshotFileName,
  nextSnapshotFileName,
  snapshotFileNameToDate,
} from '../../domain/value-objects/SnapshotName.js';
import { parseSnapshotMarkdown, type ParsedSnapshotMarkdown } from '../markdown/SnapshotMarkdown.js';
import { listDirectory, readTextIfExists, writeFileAtomic, writeFilePlain } from './AtomicFile.js';
import {
  HistoryFileSchema,
  RegistryFileSchema,
  describeIssues,
  toHistoryFile,
  toProject,
  toRegistryFile,
  toSession,
} from './schema.js';
import type { z } from 'zod';

/** 儲存根目錄下的檔案配置 */
export const STORAGE_LAYOUT = {
  registry: 'config.json',
  projectsDir: 'projects',
  history: 'sessions.json',
  contextDocument: 'PROJECT.md',
  snapshotsDir: 'snapshots',
} as const;

/**
 * StoragePort 的 JSON 檔案實作
 *
 * <root>/config.json                         專案 registry
 * <root>/projects/<name>/sessions.json       session 歷史
 * <root>/projects/<name>/PROJECT.md          最新 context
 * <root>/projects/<name>/snapshots/<ts>.md   snapshot
 *
 * JSON 一律整檔原子改寫；毀損檔案（含 snapshot frontmatter）直接拋出 StorageIOError，不會默默重置。
 */
export class JsonFileStorageAdapter implements StoragePort {
  constructor(private readonly rootDir: string) {}

  get registryPath(): string {
    return path.join(this.rootDir, STORAGE_LAYOUT.registry);
  }

  projectDir(projectName: string): string {
    return path.join(this.rootDir, STORAGE_LAYOUT.projectsDir, projectName);
  }

  private historyPath(projectName: string): string {
    return path.join(this.projectDir(projectName), STORAGE_LAYOUT.history);
  }

  private snapshotsDir(projectName: string): string {
    return path.join(this.projectDir(projectName), STORAGE_LAYOUT.snapshotsDir);
  }

  private contextDocumentPath(projectName: string): string {
    return path.join(this.projectDir(projectName), STORAGE_LAYOUT.contextDocument);
  }

  // --- Registry ---

  loadRegistry(): Project[] {
    const file = this.readJson(this.registryPath, RegistryFileSchema);
    if (!file) return [];
    return Object.entries(file.projects).map(([name, record]) => toProject(name, record));
  }

  saveRegistry(projects: readonly Project[]): void {
    this.writeJson(this.registryPath, toRegistryFile(projects));
  }

  // --- Session history ---

  loadHistory(projectName: string): Session[] {
    const file = this.readJson(this.historyPath(projectName), HistoryFileSchema);
    if (!file) return [];
    return file.sessions.map(toSession);
  }

  appendSession(projectName: string, session: Session): void {
    const sessions = this.loadHistory(projectName);
    if (sessions.some((s) => s.id === session.id)) {
      throw new StorageIOError(`Session ${session.id} already exists in history`, this.historyPath(projectName));
    }
    this.writeHistory(projectName, [...sessions, session]);
  }

  updateSession(projectName: string, session: Session): void {
    const sessions = this.loadHistory(projectName);
    const index = sessions.findIndex((s) => s.id === session.id);
    if (index === -1) {
      throw new StorageIOError(`Session ${session.id} not found in history`, this.historyPath(projectName));
    }
    const next = [...sessions];
    next[index] = session;
    this.writeHistory(projectName, next);
  }

  private writeHistory(projectName: string, sessions: readonly Session[]): void {
    const file = toHistoryFile(sessions);
    // 寫入前先驗證，避免把違反單一 active 的狀態寫上磁碟
    const checked = HistoryFileSchema.safeParse(file);
    if (!checked.success) {
      throw new StorageIOError(
        `Refusing to write invalid history for "${projectName}": ${describeIssues(checked.error)}`,
        this.historyPath(projectName),
      );
    }
    this.writeJson(this.historyPath(projectName), file);
  }

  // --- Snapshots & context document ---

  writeSnapshot(projectName: string, snapshot: Omit<Snapshot, 'fileName'>): Snapshot {
    const dir = this.snapshotsDir(projectName);
    const fileName = nextSnapshotFileName(listDirectory(dir), new Date(snapshot.createdAt));
    writeFilePlain(path.join(dir, fileName), snapshot.content);
    return { ...snapshot, fileName };
  }

  listSnapshots(projectName: string): string[] {
    return listDirectory(this.snapshotsDir(projectName)).filter(isSnapshotFileName).sort();
  }

  loadLatestSnapshot(projectName: string): Snapshot | undefined {
    const fileName = this.listSnapshots(projectName).at(-1);
    if (!fileName) return undefined;

    const filePath = path.join(this.snapshotsDir(projectName), fileName);
    const content = readTextIfExists(filePath);
    if (content === undefined) return undefined;

    let frontmatter: ParsedSnapshotMarkdown['frontmatter'];
    try {
      ({ frontmatter } = parseSnapshotMarkdown(content));
    } catch (err) {
      throw new StorageIOError(`Corrupt frontmatter in ${filePath}`, filePath, { cause: err });
    }
    return {
      projectName,
      sessionId: frontmatter.sessionId,
      createdAt: frontmatter.createdAt ?? snapshotFileNameToDate(fileName)?.toISOString() ?? '',
      fileName,
      content,
    };
  }

  writeContextDocument(projectName: string, content: string): void {
    writeFileAtomic(this.contextDocumentPath(projectName), content);
  }

  readContextDocument(projectName: string): string | undefined {
    return readTextIfExists(this.contextDocumentPath(projectName));
  }

  // --- JSON helpers ---

  private readJson<S extends z.ZodTypeAny>(filePath: string, schema: S): z.infer<S> | undefined {
    const raw = readTextIfExists(filePath);
    if (raw === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StorageIOError(`Corrupt JSON in ${filePath}`, filePath, { cause: err });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new StorageIOError(`Unexpected format in ${filePath}: ${describeIssues(parsed.error)}`, filePath);
    }
    return parsed.data;
  }

  private writeJson(filePath: string, data: unknown): void {
    writeFileAtomic(filePath, JSON.stringify(data, null, 2) + '\n');
  }
}
