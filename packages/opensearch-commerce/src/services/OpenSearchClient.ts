import { z } from 'zod';
import type { OpenSearchConfig } from '../config';
import { DEFAULT_SEARCH_SIZE, MAX_PAGE_SIZE, MAX_RESULT_WINDOW, MAX_SUGGESTIONS } from '../constants';
import { describeError, wrapOpenSearchError, type ErrorTarget } from '../errors';
import type {
  BulkOperationResult,
  ClusterHealth,
  IndexMappings,
  IndexSettings,
  IndexStatsSummary,
  JsonObject,
  QueryClause,
  SearchHit,
  SearchQuery,
  SearchResult,
  ShardInfo,
  SortSpec,
} from '../types/Search';
import { toSearchBody } from '../types/Search';
import { buildScrollQuery, extractHits, extractTotal, formatBytes, normalizeDocument } from '../utils';
import { BulkProcessor, type BulkProcessorOptions } from './BulkProcessor';
import { InMemoryCacheService, type CacheService } from './CacheService';
import { CircuitBreaker, ErrorHandler } from './ErrorHandler';
import { IndexManager } from './IndexManager';
import { consoleLogger, type Logger } from './Logger';
import { Observability, type OperationType } from './Observability';
import { PerformanceMonitor } from './PerformanceMonitor';
import { QueryBuilder, type FilterValue, type ProductSort } from './QueryBuilder';
import { OpenSearchTransport, type Transport, type TransportRequest } from './Transport';

export type SearchOptions = {
  size?: number;
  from?: number;
  sort?: SortSpec[];
  aggs?: JsonObject;
  highlight?: JsonObject;
  source?: boolean | string[];
};

export type ProductSearchOptions = {
  text?: string;
  filters?: Record<string, FilterValue | FilterValue[]>;
  category?: string;
  priceRange?: [number, number];
  brand?: string | string[];
  attributes?: Record<string, FilterValue>;
  inStock?: boolean;
  sortBy?: ProductSort;
  page?: number;
  perPage?: number;
  index?: string;
};

export type GeoSearchOptions = {
  field?: string;
  lat: number;
  lon: number;
  distance?: string;
  query?: QueryClause;
  size?: number;
};

export type ScrollOptions = {
  scroll?: string;
  size?: number;
};

export type WriteOptions = {
  refresh?: boolean;
};

export type ClientServices = {
  transport?: Transport;
  logger?: Logger;
  observability?: Observability;
  monitor?: PerformanceMonitor;
  cache?: CacheService;
  bulk?: Omit<BulkProcessorOptions, 'logger'>;
};

type OperationContext = {
  name: string;
  type: OperationType;
  index: string;
  context: string;
  id?: string;
  /** documents written by a successful call */
  documents?: (result: unknown) => number;
  retry?: boolean;
};

const getResponseSchema = z.object({
  found: z.boolean(),
  _id: z.string(),
  _index: z.string(),
  _version: z.number().optional(),
  _source: z.record(z.unknown()).optional(),
});

const clusterHealthSchema = z
  .object({
    cluster_name: z.string().optional(),
    status: z.string(),
    number_of_nodes: z.number().optional(),
    number_of_data_nodes: z.number().optional(),
    active_shards: z.number().optional(),
    unassigned_shards: z.number().optional(),
  })
  .passthrough();

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberAt(value: unknown, ...path: string[]): number {
  let current = value;
  for (const key of path) {
    current = isObject(current) ? current[key] : undefined;
  }
  return typeof current === 'number' ? current : 0;
}

function noShardFailures(body: unknown): boolean {
  return isObject(body) && isObject(body._shards) && numberAt(body._shards, 'failed') === 0;
}

function shardInfo(value: unknown): ShardInfo | undefined {
  if (!isObject(value)) return undefined;
  return {
    total: numberAt(value, 'total'),
    successful: numberAt(value, 'successful'),
    skipped: numberAt(value, 'skipped'),
    failed: numberAt(value, 'failed'),
  };
}

export function toSearchResult(body: unknown): SearchResult {
  const result: SearchResult = {
    hits: extractHits(body),
    total: extractTotal(body),
    tookMs: numberAt(body, 'took'),
  };
  if (isObject(body)) {
    if (isObject(body.aggregations)) result.aggregations = body.aggregations;
    if (typeof body._scroll_id === 'string') result.scrollId = body._scroll_id;
    const shards = shardInfo(body._shards);
    if (shards) result.shards = shards;
  }
  return result;
}

function suggestionTexts(body: unknown, name: string): string[] {
  const groups = isObject(body) && isObject(body.suggest) ? body.suggest[name] : undefined;
  if (!Array.isArray(groups)) return [];

  const texts: string[] = [];
  for (const group of groups) {
    const options = isObject(group) ? group.options : undefined;
    if (!Array.isArray(options)) continue;
    for (const option of options) {
      if (isObject(option) && typeof option.text === 'string') texts.push(option.text);
    }
  }
  return texts;
}

function refreshParam(options: WriteOptions): TransportRequest['querystring'] {
  return options.refresh ? { refresh: true } : undefined;
}

/**
 * Async client for catalog search and indexing. Every call goes through the
 * optional circuit breaker and the retry policy, is timed into the
 * performance monitor and Prometheus registry, and fails with an
 * `OpenSearchError` subclass.
 */
export class OpenSearchCommerceClient {
  readonly indices: IndexManager;
  readonly bulkProcessor: BulkProcessor;
  readonly monitor: PerformanceMonitor;
  readonly observability: Observability;

  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly breaker?: CircuitBreaker;
  private readonly cache?: CacheService;
  private readonly ownsCache: boolean;

  constructor(readonly config: OpenSearchConfig, services: ClientServices = {}) {
    this.transport = services.transport ?? new OpenSearchTransport(config);
    this.logger = services.logger ?? consoleLogger;
    this.observability = services.observability ?? new Observability();
    this.monitor = services.monitor ?? new PerformanceMonitor();
    this.breaker = config.circuitBreaker ? new CircuitBreaker(config.circuitBreaker) : undefined;

    if (services.cache) {
      this.cache = services.cache;
      this.ownsCache = false;
    } else if (config.cache.enabled) {
      this.cache = new InMemoryCacheService({ defaultTtlSeconds: config.cache.ttlSeconds });
      this.ownsCache = true;
    } else {
      this.ownsCache = false;
    }

    const guarded: Transport = {
      request: request => this.guard(`${request.method} ${request.path}`, () => this.transport.request(request)),
      close: () => this.transport.close(),
    };
    // the bulk processor retries batches itself, so it only goes through the breaker
    const breakerOnly: Transport = {
      request: request => this.breakerCall(() => this.transport.request(request)),
      close: () => this.transport.close(),
    };

    this.indices = new IndexManager(guarded, this.logger, index => this.indexName(index));
    this.bulkProcessor = new BulkProcessor(breakerOnly, { ...services.bulk, logger: this.logger });

    this.logger.info(`OpenSearch client initialized for hosts: ${config.hosts.join(', ')}`);
    if (config.aws) {
      this.logger.info(`AWS region: ${config.aws.region}, service: ${config.aws.service}`);
    }
  }

  /** Applies the configured index prefix once. */
  indexName(index: string): string {
    const prefix = this.config.indexPrefix;
    if (!prefix || index.startsWith(`${prefix}-`)) return index;
    return `${prefix}-${index}`;
  }

  // search

  async search(index: string, query: QueryClause, options: SearchOptions = {}): Promise<SearchResult> {
    const name = this.indexName(index);
    const size = Math.min(options.size ?? DEFAULT_SEARCH_SIZE, MAX_RESULT_WINDOW);
    const search: SearchQuery = {
      query,
      from: options.from,
      sort: options.sort,
      aggs: options.aggs,
      highlight: options.highlight,
      source: options.source,
    };
    const body = { ...toSearchBody(search), size };

    return this.run({ name: 'search', type: 'search', index: name, context: `Search failed for index ${name}` }, async () => {
      const response = await this.transport.request({ method: 'POST', path: `/${encodeURIComponent(name)}/_search`, body });
      return toSearchResult(response.body);
    });
  }

  async getDocument(index: string, id: string, options: { source?: boolean | string[] } = {}): Promise<JsonObject | undefined> {
    const name = this.indexName(index);
    const source = options.source;
    return this.run(
      { name: 'get', type: 'search', index: name, id, context: `Get document failed for ${id} in index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'GET',
          path: `/${encodeURIComponent(name)}/_doc/${encodeURIComponent(id)}`,
          querystring: source === undefined ? undefined : { _source: Array.isArray(source) ? source.join(',') : source },
          ignore: [404],
        });
        if (response.statusCode === 404) return undefined;

        const parsed = getResponseSchema.safeParse(response.body);
        if (!parsed.success || !parsed.data.found) return undefined;
        return { ...parsed.data._source, _id: parsed.data._id, _index: parsed.data._index, _version: parsed.data._version };
      },
    );
  }

  async exists(index: string, id: string): Promise<boolean> {
    const name = this.indexName(index);
    return this.run(
      { name: 'exists', type: 'search', index: name, id, context: `Exists check failed for ${id} in index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'HEAD',
          path: `/${encodeURIComponent(name)}/_doc/${encodeURIComponent(id)}`,
          ignore: [404],
        });
        return response.statusCode >= 200 && response.statusCode < 300;
      },
    );
  }

  // documents

  async indexDocument(index: string, document: JsonObject, options: WriteOptions & { id?: string } = {}): Promise<string> {
    const name = this.indexName(index);
    const id = options.id;
    return this.run(
      { name: 'index', type: 'index', index: name, id, context: `Index document failed for index ${name}`, documents: () => 1 },
      async () => {
        const response = await this.transport.request({
          method: id ? 'PUT' : 'POST',
          path: id ? `/${encodeURIComponent(name)}/_doc/${encodeURIComponent(id)}` : `/${encodeURIComponent(name)}/_doc`,
          body: normalizeDocument(document),
          querystring: refreshParam(options),
        });
        const body = response.body;
        return isObject(body) && typeof body._id === 'string' ? body._id : id ?? '';
      },
    );
  }

  async updateDocument(index: string, id: string, updates: JsonObject, options: WriteOptions = {}): Promise<boolean> {
    const name = this.indexName(index);
    return this.run(
      { name: 'update', type: 'update', index: name, id, context: `Update document failed for ${id} in index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'POST',
          path: `/${encodeURIComponent(name)}/_update/${encodeURIComponent(id)}`,
          body: { doc: normalizeDocument(updates) },
          querystring: refreshParam(options),
        });
        const result = isObject(response.body) ? response.body.result : undefined;
        return result === 'updated' || result === 'noop';
      },
    );
  }

  async deleteDocument(index: string, id: string, options: WriteOptions = {}): Promise<boolean> {
    const name = this.indexName(index);
    return this.run(
      { name: 'delete', type: 'delete', index: name, id, context: `Delete document failed for ${id} in index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'DELETE',
          path: `/${encodeURIComponent(name)}/_doc/${encodeURIComponent(id)}`,
          querystring: refreshParam(options),
          ignore: [404],
        });
        if (response.statusCode === 404) return false;
        return isObject(response.body) && response.body.result === 'deleted';
      },
    );
  }

  // bulk

  async bulkIndex(index: string, documents: JsonObject[], options: WriteOptions & { idField?: string } = {}): Promise<BulkOperationResult> {
    const name = this.indexName(index);
    return this.runBulk(name, options, () => this.bulkProcessor.processBulkIndex(name, documents, options.idField));
  }

  async bulkUpdate(index: string, updates: JsonObject[], options: WriteOptions & { idField?: string } = {}): Promise<BulkOperationResult> {
    const name = this.indexName(index);
    return this.runBulk(name, options, () => this.bulkProcessor.processBulkUpdate(name, updates, options.idField));
  }

  async bulkDelete(index: string, ids: string[], options: WriteOptions = {}): Promise<BulkOperationResult> {
    const name = this.indexName(index);
    return this.runBulk(name, options, () => this.bulkProcessor.processBulkDelete(name, ids));
  }

  // catalog search

  async productSearch(options: ProductSearchOptions = {}): Promise<SearchResult> {
    const index = options.index ?? 'products';
    const perPage = Math.min(Math.max(Math.trunc(options.perPage ?? 20), 1), MAX_PAGE_SIZE);
    const page = Math.max(Math.trunc(options.page ?? 1), 1);

    const cacheKey = this.cache ? InMemoryCacheService.createSearchKey('product_search', index, { ...options, page, perPage }) : undefined;
    if (this.cache && cacheKey) {
      const cached = this.cache.get<SearchResult>(cacheKey);
      if (cached) return cached;
    }

    const query = QueryBuilder.buildProductSearchQuery({
      text: options.text,
      filters: options.filters,
      category: options.category,
      priceRange: options.priceRange,
      brand: options.brand,
      attributes: options.attributes,
      inStock: options.inStock,
    });
    const result = await this.search(index, query, {
      size: perPage,
      from: (page - 1) * perPage,
      sort: QueryBuilder.getSortOption(options.sortBy ?? 'relevance'),
      aggs: QueryBuilder.buildProductFacets(),
      source: true,
    });

    if (this.cache && cacheKey) this.cache.set(cacheKey, result);
    return result;
  }

  async fuzzySearch(
    index: string,
    field: string,
    value: string,
    options: { fuzziness?: string | number; size?: number } = {},
  ): Promise<SearchResult> {
    return this.search(index, QueryBuilder.buildFuzzyQuery(field, value, options.fuzziness), { size: options.size });
  }

  async geoSearch(index: string, options: GeoSearchOptions): Promise<SearchResult> {
    const field = options.field ?? 'location';
    const query: QueryClause = {
      bool: {
        must: [options.query ?? { match_all: {} }],
        filter: [QueryBuilder.buildGeoDistanceQuery(field, options.lat, options.lon, options.distance)],
      },
    };
    return this.search(index, query, {
      size: options.size,
      sort: [QueryBuilder.buildGeoDistanceSort(field, options.lat, options.lon)],
    });
  }

  async autocomplete(index: string, field: string, prefix: string, size = 5): Promise<string[]> {
    const name = this.indexName(index);
    const limit = Math.min(Math.max(size, 1), MAX_SUGGESTIONS);

    const cacheKey = this.cache ? InMemoryCacheService.createSearchKey('autocomplete', name, { field, prefix, limit }) : undefined;
    if (this.cache && cacheKey) {
      const cached = this.cache.get<string[]>(cacheKey);
      if (cached) return cached;
    }

    const suggestions = await this.run(
      { name: 'autocomplete', type: 'search', index: name, context: `Autocomplete failed for field ${field} in index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'POST',
          path: `/${encodeURIComponent(name)}/_search`,
          body: QueryBuilder.buildAutocompleteQuery(field, prefix, limit),
        });
        return suggestionTexts(response.body, 'autocomplete').slice(0, limit);
      },
    );

    if (this.cache && cacheKey) this.cache.set(cacheKey, suggestions);
    return suggestions;
  }

  async moreLikeThis(index: string, id: string, fields: string[], maxResults = 10): Promise<SearchHit[]> {
    const name = this.indexName(index);
    const query = QueryBuilder.buildMoreLikeThisQuery({ fields, likeDocs: [{ _index: name, _id: id }] });
    const result = await this.search(name, query, { size: maxResults });
    return result.hits;
  }

  /**
   * Pages through every hit of `query`, one page per iteration. The scroll
   * context is cleared when iteration ends, early exits included.
   */
  async *scroll(index: string, query: QueryClause, options: ScrollOptions = {}): AsyncGenerator<SearchHit[]> {
    const name = this.indexName(index);
    const keepAlive = options.scroll ?? '2m';

    let page = await this.run(
      { name: 'scroll', type: 'search', index: name, context: `Scroll failed for index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'POST',
          path: `/${encodeURIComponent(name)}/_search`,
          body: buildScrollQuery(query, options.size ?? 100),
          querystring: { scroll: keepAlive },
        });
        return toSearchResult(response.body);
      },
    );
    let scrollId = page.scrollId;

    try {
      while (page.hits.length) {
        yield page.hits;
        if (!scrollId) break;

        const currentId = scrollId;
        page = await this.run(
          { name: 'scroll', type: 'search', index: name, context: `Scroll failed for index ${name}` },
          async () => {
            const response = await this.transport.request({
              method: 'POST',
              path: '/_search/scroll',
              body: { scroll: keepAlive, scroll_id: currentId },
            });
            return toSearchResult(response.body);
          },
        );
        scrollId = page.scrollId ?? scrollId;
      }
    } finally {
      if (scrollId) await this.clearScroll(scrollId);
    }
  }

  async scrollSearch(index: string, query: QueryClause, options: ScrollOptions = {}): Promise<SearchHit[]> {
    const hits: SearchHit[] = [];
    for await (const page of this.scroll(index, query, options)) {
      hits.push(...page);
    }
    return hits;
  }

  async aggregate(index: string, aggregations: JsonObject, query?: QueryClause): Promise<JsonObject> {
    const name = this.indexName(index);
    return this.run(
      { name: 'aggregate', type: 'search', index: name, context: `Aggregation failed for index ${name}` },
      async () => {
        const response = await this.transport.request({
          method: 'POST',
          path: `/${encodeURIComponent(name)}/_search`,
          body: QueryBuilder.buildAggregationQuery(aggregations, query),
        });
        const body = response.body;
        return isObject(body) && isObject(body.aggregations) ? body.aggregations : {};
      },
    );
  }

  // index administration

  async createIndex(
    index: string,
    options: { mappings?: IndexMappings; settings?: IndexSettings; aliases?: Record<string, JsonObject> } = {},
  ): Promise<boolean> {
    const name = this.indexName(index);
    // the index manager retries on its own
    return this.run(
      { name: 'create_index', type: 'admin', index: name, context: `Create index failed for ${name}`, retry: false },
      () => this.indices.createIndexWithSettings(name, options),
    );
  }

  async deleteIndex(index: string): Promise<boolean> {
    const name = this.indexName(index);
    return this.run({ name: 'delete_index', type: 'admin', index: name, context: `Delete index failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'DELETE', path: `/${encodeURIComponent(name)}`, ignore: [404] });
      // already gone
      if (response.statusCode === 404) return true;
      return isObject(response.body) && response.body.acknowledged === true;
    });
  }

  async indexExists(index: string): Promise<boolean> {
    const name = this.indexName(index);
    return this.run({ name: 'index_exists', type: 'admin', index: name, context: `Index exists check failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'HEAD', path: `/${encodeURIComponent(name)}`, ignore: [404] });
      return response.statusCode >= 200 && response.statusCode < 300;
    });
  }

  async getIndexSettings(index: string): Promise<JsonObject> {
    const name = this.indexName(index);
    return this.run({ name: 'get_settings', type: 'admin', index: name, context: `Get settings failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'GET', path: `/${encodeURIComponent(name)}/_settings` });
      const entry = isObject(response.body) ? response.body[name] : undefined;
      return isObject(entry) && isObject(entry.settings) ? entry.settings : {};
    });
  }

  async updateIndexSettings(index: string, settings: JsonObject): Promise<boolean> {
    const name = this.indexName(index);
    return this.run({ name: 'update_settings', type: 'admin', index: name, context: `Update settings failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'PUT', path: `/${encodeURIComponent(name)}/_settings`, body: settings });
      return isObject(response.body) && response.body.acknowledged === true;
    });
  }

  async refreshIndex(index: string): Promise<boolean> {
    const name = this.indexName(index);
    return this.run({ name: 'refresh', type: 'admin', index: name, context: `Refresh index failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'POST', path: `/${encodeURIComponent(name)}/_refresh` });
      return noShardFailures(response.body);
    });
  }

  async flushIndex(index: string): Promise<boolean> {
    const name = this.indexName(index);
    return this.run({ name: 'flush', type: 'admin', index: name, context: `Flush index failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'POST', path: `/${encodeURIComponent(name)}/_flush` });
      return noShardFailures(response.body);
    });
  }

  async getIndexStats(index: string): Promise<IndexStatsSummary> {
    const name = this.indexName(index);
    return this.run({ name: 'index_stats', type: 'admin', index: name, context: `Get stats failed for ${name}` }, async () => {
      const response = await this.transport.request({ method: 'GET', path: `/${encodeURIComponent(name)}/_stats` });
      const body = response.body;
      const indices = isObject(body) ? body.indices : undefined;
      const entry = isObject(indices) ? indices[name] : undefined;
      const total = isObject(entry) ? entry.total : undefined;
      const storeSizeBytes = numberAt(total, 'store', 'size_in_bytes');
      return {
        name,
        docsCount: numberAt(total, 'docs', 'count'),
        docsDeleted: numberAt(total, 'docs', 'deleted'),
        storeSizeBytes,
        storeSize: formatBytes(storeSizeBytes),
        searchTotal: numberAt(total, 'search', 'query_total'),
        searchTimeMs: numberAt(total, 'search', 'query_time_in_millis'),
        indexingTotal: numberAt(total, 'indexing', 'index_total'),
        indexingTimeMs: numberAt(total, 'indexing', 'index_time_in_millis'),
        refreshTotal: numberAt(total, 'refresh', 'total'),
        segmentsCount: numberAt(total, 'segments', 'count'),
      };
    });
  }

  async clusterHealth(): Promise<ClusterHealth> {
    const health = await this.run(
      { name: 'cluster_health', type: 'admin', index: '_cluster', context: 'Cluster health check failed' },
      async () => {
        const response = await this.transport.request({ method: 'GET', path: '/_cluster/health' });
        const parsed = clusterHealthSchema.safeParse(response.body);
        if (!parsed.success) {
          throw new Error(`Unexpected cluster health response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
        }
        return parsed.data;
      },
    );
    this.monitor.recordClusterHealth(health);
    return health;
  }

  /** True when the cluster answers; failures are logged, not thrown. */
  async ping(): Promise<boolean> {
    try {
      const response = await this.transport.request({ method: 'HEAD', path: '/' });
      return response.statusCode >= 200 && response.statusCode < 300;
    } catch (error) {
      this.logger.warn(`Ping failed: ${describeError(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.ownsCache && this.cache instanceof InMemoryCacheService) this.cache.close();
    await this.transport.close();
    this.logger.info('OpenSearch client closed');
  }

  // plumbing

  private async run<T>(operation: OperationContext, fn: () => Promise<T>): Promise<T> {
    const target: ErrorTarget = { index: operation.index, id: operation.id };
    return this.observability.trace(operation.name, operation.index, async () => {
      const started = Date.now();
      try {
        const result = operation.retry === false ? await this.breakerCall(fn) : await this.guard(operation.name, fn);
        this.record(operation, Date.now() - started, true, operation.documents?.(result) ?? 0);
        return result;
      } catch (error) {
        this.record(operation, Date.now() - started, false, 0);
        this.observability.recordError(operation.name, error);
        throw wrapOpenSearchError(error, operation.context, target);
      }
    });
  }

  private async runBulk(index: string, options: WriteOptions, fn: () => Promise<BulkOperationResult>): Promise<BulkOperationResult> {
    const result = await this.observability.trace('bulk', index, async span => {
      const started = Date.now();
      try {
        const outcome = await fn();
        span.setAttributes({ 'opensearch.bulk.successful': outcome.successful, 'opensearch.bulk.failed': outcome.failed });
        this.observability.recordBulk({ index, successful: outcome.successful, failed: outcome.failed });
        this.record({ name: 'bulk', type: 'bulk', index, context: '' }, Date.now() - started, !outcome.hasErrors, outcome.successful);
        return outcome;
      } catch (error) {
        this.record({ name: 'bulk', type: 'bulk', index, context: '' }, Date.now() - started, false, 0);
        this.observability.recordError('bulk', error);
        throw wrapOpenSearchError(error, `Bulk operation failed for index ${index}`, { index });
      }
    });

    // the documents are already written; a failed refresh only delays their visibility
    if (options.refresh && result.successful > 0) {
      try {
        await this.refreshIndex(index);
      } catch (error) {
        this.logger.warn(`Failed to refresh index ${index} after bulk: ${describeError(error)}`);
      }
    }
    return result;
  }

  private record(operation: OperationContext, durationMs: number, success: boolean, documents: number): void {
    this.monitor.recordOperation(operation.index, operation.type, durationMs, success, documents);
    this.observability.recordOperation({
      operation: operation.name,
      type: operation.type,
      index: operation.index,
      durationMs,
      success,
    });
  }

  private guard<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return ErrorHandler.withRetry(
      () => this.breakerCall(fn),
      {
        retries: this.config.maxRetries,
        minTimeout: this.config.retryBackoffMs,
        maxTimeout: this.config.retryBackoffMs * 8,
        isRetryable: ErrorHandler.createRetryPredicate(this.config.retryOnTimeout),
        logger: this.logger,
      },
      name,
    );
  }

  private breakerCall<T>(fn: () => Promise<T>): Promise<T> {
    return this.breaker ? this.breaker.execute(fn) : fn();
  }

  private async clearScroll(scrollId: string): Promise<void> {
    try {
      await this.transport.request({ method: 'DELETE', path: '/_search/scroll', body: { scroll_id: [scrollId] } });
    } catch (error) {
      this.logger.warn(`Failed to clear scroll context: ${describeError(error)}`);
    }
  }
}
