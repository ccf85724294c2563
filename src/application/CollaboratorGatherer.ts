import type {
  Availability,
  CollaboratorData,
  Collaborators,
} from '../domain/ports/CollaboratorPort.js';
import { unavailable } from '../domain/ports/CollaboratorPort.js';
import type { Logger } from '../shared/Logger.js';

/**
 * 並行查詢所有協作者
 * adapter 未設定、回報 unavailable 或直接拋錯，都只會讓該區塊變成 unavailable
 */
export async function gatherCollaboratorData(
  collaborators: Collaborators,
  directory: string,
  logger: Logger,
): Promise<CollaboratorData> {
  const { vcs, tests, issues } = collaborators;
  const [vcsResult, testsResult, issuesResult] = await Promise.all([
    askCollaborator('vcs', vcs ? () => vcs.getStatus(directory) : undefined, logger),
    askCollaborator('tests', tests ? () => tests.getResults(directory) : undefined, logger),
    askCollaborator('issues', issues ? () => issues.getOpenIssues(directory) : undefined, logger),
  ]);
  return { vcs: vcsResult, tests: testsResult, issues: issuesResult };
}

async function askCollaborator<T>(
  name: string,
  query: (() => Promise<Availability<T>>) | undefined,
  logger: Logger,
): Promise<Availability<T>> {
  if (!query) return unavailable('disabled');
  try {
    const result = await query();
    if (!result.available) {
      logger.debug('Collaborator unavailable', { collaborator: name, reason: result.reason });
    }
    return result;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.debug('Collaborator failed', { collaborator: name, reason });
    return unavailable(reason);
  }
}
