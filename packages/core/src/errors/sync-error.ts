/**
 * Error types for catalog synchronization
 *
 * Per-item errors end up in the run report; fatal ones abort the run.
 */

export type ErrorCode =
  | 'DUPLICATE_KEY'
  | 'DUPLICATE_CHILD'
  | 'REMOTE_ERROR'
  | 'STALE_MAPPING'
  | 'UNKNOWN_TYPE'
  | 'PARENT_NOT_FOUND'
  | 'INVALID_RECORD'
  | 'MAPPING_FILE_INVALID'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface SyncErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SyncError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SyncErrorDetails) {
    super(details.message);
    this.name = 'SyncError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /** Whether the whole run has to stop */
  get fatal(): boolean {
    return this.code === 'DUPLICATE_KEY' || this.code === 'MAPPING_FILE_INVALID';
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/** One natural key that occurs more than once, with every carrier */
export interface DuplicateKeyCollision {
  key: string;
  identifiers: string[];
}

export class DuplicateKeyError extends SyncError {
  readonly side: 'source' | 'catalog';
  readonly collisions: DuplicateKeyCollision[];

  constructor(side: 'source' | 'catalog', collisions: DuplicateKeyCollision[]) {
    const listed = collisions
      .map((c) => `'${c.key}' (${c.identifiers.join(', ')})`)
      .join('; ');
    super({
      code: 'DUPLICATE_KEY',
      message: `Duplicate natural keys in ${side === 'source' ? 'source records' : 'catalog assets'}: ${listed}`,
      suggestion:
        side === 'source'
          ? 'Fix the duplicates in the source system; no changes were applied.'
          : 'Merge or remove the duplicate catalog assets by hand; no changes were applied.',
      context: { side, collisions },
    });
    this.name = 'DuplicateKeyError';
    this.side = side;
    this.collisions = collisions;
  }
}

export class RemoteError extends SyncError {
  /** HTTP status, when the failure came with one */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: Error; context?: Record<string, unknown> } = {}) {
    super({
      code: 'REMOTE_ERROR',
      message,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'RemoteError';
    this.status = options.status;
  }
}

export class StaleMappingError extends SyncError {
  constructor(key: string, uuid: string) {
    super({
      code: 'STALE_MAPPING',
      message: `Mapping entry for '${key}' points to missing asset ${uuid}`,
      context: { key, uuid },
    });
    this.name = 'StaleMappingError';
  }
}

export class UnknownTypeError extends SyncError {
  constructor(type: string, knownTypes: readonly string[]) {
    super({
      code: 'UNKNOWN_TYPE',
      message: `Unknown type '${type}'`,
      suggestion: `Map the type to one of: ${knownTypes.join(', ')}`,
      context: { type },
    });
    this.name = 'UnknownTypeError';
  }
}

/**
 * Helper to wrap unknown errors as SyncError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = 'UNKNOWN'): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new SyncError({
    code: defaultCode,
    message,
    cause,
  });
}
