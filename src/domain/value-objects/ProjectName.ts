import { InvalidProjectNameError } from '../errors/DomainErrors.js';

/** name 與 alias 會成為 projects/<name>/ 目錄名稱 */
export const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export function assertValidProjectName(value: string, field: 'name' | 'alias' = 'name'): void {
  if (!PROJECT_NAME_PATTERN.test(value)) {
    throw new InvalidProjectNameError(value, field);
  }
}
