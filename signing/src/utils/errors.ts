export type SigningErrorKind =
  | 'validation'
  | 'permission'
  | 'not_found'
  | 'conflict'
  | 'storage'
  | 'integrity'
  | 'persistence';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class SigningError extends Error {
  constructor(
    message: string,
    public readonly kind: SigningErrorKind,
    public readonly retryable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SigningError';
  }
}

export class ValidationError extends SigningError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message, 'validation');
    this.name = 'ValidationError';
  }
}

export class PermissionError extends SigningError {
  constructor(message: string) {
    super(message, 'permission');
    this.name = 'PermissionError';
  }
}

export class NotFoundError extends SigningError {
  constructor(entity: string, id?: string) {
    super(id ? `${entity} ${id} not found` : `${entity} not found`, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends SigningError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'conflict', false, context);
    this.name = 'ConflictError';
  }
}

/** Raised for any write against a completed, expired or cancelled document. */
export class DocumentClosedError extends ConflictError {
  constructor(documentId: string, status: string) {
    super(`Document ${documentId} is ${status} and no longer accepts changes`, { documentId, status });
    this.name = 'DocumentClosedError';
  }
}

export class StorageError extends SigningError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    kind: 'storage' | 'integrity' = 'storage'
  ) {
    super(message, kind, kind === 'storage', context);
    this.name = 'StorageError';
  }
}

/** Tamper or corruption. Never retried. */
export class IntegrityError extends StorageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, 'integrity');
    this.name = 'IntegrityError';
  }
}

export class PersistenceError extends SigningError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'persistence', true, context);
    this.name = 'PersistenceError';
  }
}

interface PgDriverError {
  code?: string;
  constraint?: string;
  message?: string;
}

function asDriverError(error: unknown): PgDriverError | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const constraint = 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined;
  const message = error instanceof Error ? error.message : undefined;
  return { code, constraint, message };
}

export function isUniqueViolation(error: unknown): boolean {
  return asDriverError(error)?.code === '23505';
}

/**
 * Maps a database driver failure onto the error taxonomy. Errors that already
 * belong to the taxonomy pass through unchanged.
 */
export function classifyPersistenceError(error: unknown, operation: string): SigningError {
  if (error instanceof SigningError) {
    return error;
  }

  const driverError = asDriverError(error);
  if (driverError?.code === '23505') {
    return new ConflictError(`${operation} violates a uniqueness rule`, {
      constraint: driverError.constraint ?? 'unknown',
    });
  }

  if (driverError?.code === '23503') {
    return new ConflictError(`${operation} references a row that does not exist`, {
      constraint: driverError.constraint ?? 'unknown',
    });
  }

  return new PersistenceError(`${operation} failed`, {
    code: driverError?.code ?? 'unknown',
    cause: driverError?.message ?? String(error),
  });
}
