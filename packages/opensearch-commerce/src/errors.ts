import {
  DOCUMENT_NOT_FOUND_ERROR,
  INDEX_NOT_FOUND_ERROR,
  RESOURCE_EXISTS_ERROR,
  VERSION_CONFLICT_ERROR,
} from './constants';

export class OpenSearchError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }

  override toString(): string {
    if (this.cause instanceof Error) {
      return `${this.message} (Original: ${this.cause.message})`;
    }
    return this.message;
  }
}

export class ConnectionError extends OpenSearchError {
  constructor(message: string, cause?: unknown) {
    super(`Connection error: ${message}`, cause);
  }
}

export class TimeoutError extends OpenSearchError {
  constructor(message: string, cause?: unknown, timeoutMs?: number) {
    const detail = timeoutMs ? `Operation timeout after ${timeoutMs}ms: ${message}` : message;
    super(`Timeout error: ${detail}`, cause);
  }
}

export class AuthenticationError extends OpenSearchError {
  constructor(message: string, cause?: unknown) {
    super(`Authentication error: ${message}`, cause);
  }
}

export class IndexNotFoundError extends OpenSearchError {
  constructor(readonly indexName: string, cause?: unknown) {
    super(`Index '${indexName}' not found`, cause);
  }
}

export class DocumentNotFoundError extends OpenSearchError {
  constructor(readonly indexName: string, readonly documentId: string, cause?: unknown) {
    super(`Document '${documentId}' not found in index '${indexName}'`, cause);
  }
}

export class BulkOperationError extends OpenSearchError {
  readonly errors: unknown[];

  constructor(message: string, errors: unknown[] = [], cause?: unknown) {
    const detail = errors.length ? `Bulk operation failed with ${errors.length} errors: ${message}` : message;
    super(`Bulk operation error: ${detail}`, cause);
    this.errors = errors;
  }
}

export class SearchQueryError extends OpenSearchError {
  constructor(message: string, readonly query?: Record<string, unknown>, cause?: unknown) {
    super(`Search query error: ${message}`, cause);
  }
}

export class MappingError extends OpenSearchError {
  constructor(message: string, readonly field?: string, cause?: unknown) {
    const detail = field ? `Mapping error for field '${field}': ${message}` : message;
    super(`Mapping error: ${detail}`, cause);
  }
}

export class VersionConflictError extends OpenSearchError {
  constructor(readonly indexName: string, readonly documentId: string, cause?: unknown) {
    super(`Version conflict for document '${documentId}' in index '${indexName}'`, cause);
  }
}

export class ResourceExistsError extends OpenSearchError {
  constructor(readonly resourceType: string, readonly resourceName: string, cause?: unknown) {
    super(`${resourceType} '${resourceName}' already exists`, cause);
  }
}

export class ConfigurationError extends OpenSearchError {
  constructor(message: string, cause?: unknown) {
    super(`Configuration error: ${message}`, cause);
  }
}

export class ValidationError extends OpenSearchError {
  constructor(message: string) {
    super(`Validation error: ${message}`);
  }
}

/** Where a failure happened, used to fill the index/document fields of the wrapped error. */
export type ErrorTarget = {
  index?: string;
  id?: string;
};

function readProp(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null) {
    return Reflect.get(value, key);
  }
  return undefined;
}

export function getStatusCode(error: unknown): number | undefined {
  const status = readProp(error, 'statusCode') ?? readProp(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

/** The cluster's error type (e.g. `index_not_found_exception`) when the response carries one. */
export function getErrorType(error: unknown): string | undefined {
  const body = readProp(readProp(error, 'meta'), 'body') ?? readProp(error, 'body');
  const type = readProp(readProp(body, 'error'), 'type');
  return typeof type === 'string' ? type : undefined;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Converts any failure raised while talking to the cluster into the matching
 * `OpenSearchError` subclass.
 */
export function wrapOpenSearchError(error: unknown, context?: string, target: ErrorTarget = {}): OpenSearchError {
  if (error instanceof OpenSearchError) return error;

  const status = getStatusCode(error);
  const type = getErrorType(error) ?? '';
  const name = error instanceof Error ? error.name : '';
  const text = `${type} ${describeError(error)}`.toLowerCase();
  const message = context ? `${context}: ${describeError(error)}` : describeError(error);
  const index = target.index ?? 'unknown';
  const id = target.id ?? 'unknown';

  if (status === 401 || status === 403) return new AuthenticationError(message, error);
  if (type === INDEX_NOT_FOUND_ERROR || text.includes('index_not_found')) return new IndexNotFoundError(index, error);
  if (type === VERSION_CONFLICT_ERROR || status === 409 || text.includes('version_conflict')) {
    return new VersionConflictError(index, id, error);
  }
  if (type === DOCUMENT_NOT_FOUND_ERROR || status === 404 || text.includes('document_missing') || text.includes('not_found')) {
    return new DocumentNotFoundError(index, id, error);
  }
  if (text.includes('authentication') || text.includes('unauthorized')) return new AuthenticationError(message, error);
  if (name === 'TimeoutError' || text.includes('timeout')) return new TimeoutError(message, error);
  if (name === 'ConnectionError' || name === 'NoLivingConnectionsError' || text.includes('connection')) {
    return new ConnectionError(message, error);
  }
  if (type === RESOURCE_EXISTS_ERROR || text.includes('resource_already_exists')) {
    return new ResourceExistsError('Resource', target.index ?? message, error);
  }
  if (text.includes('bulk')) return new BulkOperationError(message, [], error);
  if (text.includes('mapping')) return new MappingError(message, undefined, error);
  if (text.includes('query') || text.includes('search') || text.includes('parsing_exception')) {
    return new SearchQueryError(message, undefined, error);
  }
  return new OpenSearchError(message, error);
}
