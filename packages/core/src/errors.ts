import type { DatabaseKind } from './types';

export class DbAtlasError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends DbAtlasError {}

export class ConnectionError extends DbAtlasError {
  constructor(
    readonly dialect: DatabaseKind,
    cause: unknown,
  ) {
    super(`Could not connect to ${dialect}: ${describeCause(cause)}`, { cause });
  }
}

/** A single catalog capability failed (permissions, transport, bad SQL). */
export class QueryFailure extends DbAtlasError {
  constructor(
    readonly objectKind: string,
    readonly dialect: DatabaseKind,
    cause: unknown,
  ) {
    super(`Failed to list ${objectKind} on ${dialect}: ${describeCause(cause)}`, { cause });
  }
}

export class ModelIntegrityError extends DbAtlasError {
  constructor(
    readonly objectKind: string,
    readonly objectName: string,
    detail: string,
  ) {
    super(`Invalid ${objectKind} ${objectName}: ${detail}`);
  }
}

export class FilterConflictError extends DbAtlasError {
  constructor(readonly schemas: string[]) {
    super(`Schemas both included and excluded: ${schemas.join(', ')}`);
  }
}

export class ExtractionError extends DbAtlasError {}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
