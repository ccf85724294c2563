export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 worktrail domain 錯誤的基底類別 */
export abstract class WorktrailError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

/** 另一個 worktrail 行程持有同一個 lock */
export class LockHeldError extends WorktrailError {
  readonly classification = 'retryable' as const;
  readonly code = 'LOCK_HELD';

  constructor(
    public readonly lockPath: string,
    public readonly ownerPid?: number,
    options?: ErrorOptions,
  ) {
    super(
      ownerPid !== undefined
        ? `Lock "${lockPath}" is held by process ${ownerPid}`
        : `Lock "${lockPath}" is held by another process`,
      options,
    );
  }
}

// --- Degradable ---

/** 外部協作者（git / test runner / issue tracker）無法使用，只降級對應區塊 */
export class CollaboratorUnavailableError extends WorktrailError {
  readonly classification = 'degradable' as const;
  readonly code = 'COLLABORATOR_UNAVAILABLE';
}

// --- Manual ---

export class DuplicateNameError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'DUPLICATE_NAME';

  constructor(public readonly projectName: string, options?: ErrorOptions) {
    super(`Project "${projectName}" is already registered`, options);
  }
}

export class DuplicateAliasError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'DUPLICATE_ALIAS';

  constructor(
    public readonly alias: string,
    public readonly ownerName: string,
    options?: ErrorOptions,
  ) {
    super(`Alias "${alias}" is already used by project "${ownerName}"`, options);
  }
}

export class InvalidPathError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_PATH';

  constructor(public readonly projectPath: string, options?: ErrorOptions) {
    super(`Invalid project path: ${projectPath} (must be an existing directory)`, options);
  }
}

export class InvalidProjectNameError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_NAME';

  constructor(
    public readonly value: string,
    public readonly field: 'name' | 'alias' = 'name',
    options?: ErrorOptions,
  ) {
    super(
      `Project ${field} "${value}" may only contain letters, digits, hyphens and underscores`,
      options,
    );
  }
}

export class ProjectNotFoundError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'PROJECT_NOT_FOUND';

  constructor(public readonly identifier: string, options?: ErrorOptions) {
    super(`Project "${identifier}" not found`, options);
  }
}

export class AmbiguousProjectError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'AMBIGUOUS_PROJECT';

  constructor(
    public readonly cwd: string,
    public readonly candidates: string[] = [],
    options?: ErrorOptions,
  ) {
    super(
      candidates.length > 0
        ? `Directory "${cwd}" matches several projects (${candidates.join(', ')}); pass a project name`
        : `No registered project contains "${cwd}"; pass a project name`,
      options,
    );
  }
}

export class SessionAlreadyActiveError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'SESSION_ALREADY_ACTIVE';

  constructor(
    public readonly projectName: string,
    public readonly startedAt: string,
    options?: ErrorOptions,
  ) {
    super(
      `A session for "${projectName}" is already active (started ${startedAt}). End it before starting a new one.`,
      options,
    );
  }
}

export class NoActiveSessionError extends WorktrailError {
  readonly classification = 'manual' as const;
  readonly code = 'NO_ACTIVE_SESSION';

  constructor(public readonly projectName: string, options?: ErrorOptions) {
    super(`No active session for "${projectName}"`, options);
  }
}

/** errno 中屬於暫時性、重試即可恢復的錯誤碼 */
const TRANSIENT_ERRNO = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'EINTR']);

/**
 * 儲存層 I/O 失敗（含 JSON 毀損）
 * classification 依底層 errno 決定：暫時性錯誤為 retryable，其餘為 manual
 */
export class StorageIOError extends WorktrailError {
  readonly classification: ErrorClassification;
  readonly code = 'STORAGE_IO';

  constructor(
    message: string,
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    const errno = errnoOf(options?.cause);
    this.classification = errno !== undefined && TRANSIENT_ERRNO.has(errno) ? 'retryable' : 'manual';
  }

  get retryable(): boolean {
    return this.classification === 'retryable';
  }
}

/** 取出 Node 系統錯誤的 errno code */
export function errnoOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
