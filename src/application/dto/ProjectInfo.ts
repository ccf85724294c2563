import type { Project } from '../../domain/entities/Project.js';

export interface ProjectInfo {
  project: Project;
  totalSessions: number;
  completedSessions: number;
  hasActiveSession: boolean;
  snapshotCount: number;
  hasContextDocument: boolean;
}
