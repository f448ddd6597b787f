import type { EntityName } from './types.js';

export type ProgressionErrorCode = 'CONSTRAINT_VIOLATION' | 'NOT_FOUND';

export class ProgressionError extends Error {
  constructor(
    public readonly code: ProgressionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProgressionError';
  }
}

/** A check or uniqueness rule of the ledger would be broken by the write. */
export class ConstraintViolationError extends ProgressionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONSTRAINT_VIOLATION', message, options);
    this.name = 'ConstraintViolationError';
  }
}

export class NotFoundError extends ProgressionError {
  constructor(
    public readonly entity: EntityName | undefined,
    public readonly id: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(
      'NOT_FOUND',
      entity && id ? `${entity} ${id} does not exist` : 'Referenced record does not exist',
      options,
    );
    this.name = 'NotFoundError';
  }
}

// ─── SQLite error translation ───

function sqliteCode(err: unknown): string | undefined {
  let current: unknown = err;
  // drizzle may wrap the driver error, so follow the cause chain
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string' && current.code.startsWith('SQLITE_')) {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Maps a SQLite constraint failure onto the ledger's error taxonomy.
 * Anything that is not a constraint failure is returned untouched.
 */
export function translateStoreError(err: unknown): unknown {
  if (err instanceof ProgressionError) return err;
  const code = sqliteCode(err);
  switch (code) {
    case 'SQLITE_CONSTRAINT_CHECK':
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return new ConstraintViolationError(err instanceof Error ? err.message : String(err), { cause: err });
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return new NotFoundError(undefined, undefined, { cause: err });
    default:
      return err;
  }
}
