import { createHash } from 'node:crypto';
import { DEFAULT_BULK_SIZE } from './constants';
import { ValidationError } from './errors';
import type { JsonObject, SearchHit } from './types/Search';

const INDEX_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;
const MAX_INDEX_NAME_BYTES = 255;

export function validateIndexName(name: string): void {
  if (!name) {
    throw new ValidationError('Index name cannot be empty');
  }
  if (name === '.' || name === '..') {
    throw new ValidationError(`Index name '${name}' is reserved`);
  }
  if (Buffer.byteLength(name, 'utf8') > MAX_INDEX_NAME_BYTES) {
    throw new ValidationError(`Index name '${name}' exceeds ${MAX_INDEX_NAME_BYTES} bytes`);
  }
  if (!INDEX_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid index name '${name}'. Must start with lowercase letter or number, and contain only lowercase letters, numbers, dots, hyphens, and underscores.`,
    );
  }
}

export function sanitizeIndexName(name: string): string {
  let sanitized = name.toLowerCase().replace(/[^a-z0-9_-]/g, '_');
  if (!/^[a-z0-9]/.test(sanitized)) {
    sanitized = `idx_${sanitized}`;
  }
  while (Buffer.byteLength(sanitized, 'utf8') > MAX_INDEX_NAME_BYTES) {
    sanitized = sanitized.slice(0, -1);
  }
  return sanitized;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortKeys(v)]),
    );
  }
  return value;
}

/** Deterministic id: the same content always maps to the same document. */
export function generateDocumentId(data: JsonObject): string {
  return createHash('sha256').update(JSON.stringify(sortKeys(data))).digest('hex').slice(0, 32);
}

function normalizeValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return Number(value);
  if (Array.isArray(value)) return value.filter(item => item !== null && item !== undefined).map(normalizeValue);
  if (typeof value === 'object' && value !== null) return normalizeDocument(Object.fromEntries(Object.entries(value)));
  return value;
}

/** Drops empty values and converts dates and bigints into JSON friendly values. */
export function normalizeDocument(document: JsonObject): JsonObject {
  const normalized: JsonObject = {};
  for (const [key, value] of Object.entries(document)) {
    if (value === null || value === undefined) continue;
    normalized[key] = normalizeValue(value);
  }
  return normalized;
}

export function chunk<T>(items: readonly T[], size: number = DEFAULT_BULK_SIZE): T[][] {
  if (size <= 0) {
    throw new ValidationError('Chunk size must be positive');
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function buildAliasName(indexName: string, suffix?: string): string {
  return suffix ? `${indexName}_${suffix}` : indexName;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function extractHits(response: unknown): SearchHit[] {
  const hits = isObject(response) && isObject(response.hits) ? response.hits.hits : undefined;
  if (!Array.isArray(hits)) return [];

  return hits.filter(isObject).map(hit => {
    const source = isObject(hit._source) ? hit._source : {};
    const doc: SearchHit = {
      ...source,
      _id: String(hit._id ?? ''),
      _index: String(hit._index ?? ''),
      _score: typeof hit._score === 'number' ? hit._score : null,
    };
    if (isObject(hit.highlight)) {
      const highlight: Record<string, string[]> = {};
      for (const [field, fragments] of Object.entries(hit.highlight)) {
        if (Array.isArray(fragments)) highlight[field] = fragments.map(String);
      }
      doc.highlight = highlight;
    }
    return doc;
  });
}

export function extractTotal(response: unknown): number {
  const total = isObject(response) && isObject(response.hits) ? response.hits.total : undefined;
  if (typeof total === 'number') return total;
  if (isObject(total) && typeof total.value === 'number') return total.value;
  return 0;
}

export function calculateBackoffDelay(attempt: number, baseDelayMs = 1000, maxDelayMs = 30_000): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

export function buildScrollQuery(query: JsonObject, size = 100): JsonObject {
  return { query, size, sort: ['_doc'] };
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(sizeBytes: number): string {
  let size = sizeBytes;
  for (const unit of BYTE_UNITS) {
    if (size < 1024) return `${size.toFixed(2)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(2)} PB`;
}

export function parseTimestamp(value: string): Date | undefined {
  const parsed = /^\d+$/.test(value) ? new Date(Number(value)) : new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
