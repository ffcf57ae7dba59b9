import { DEFAULT_PAGE_SIZE, INDEX_REFRESH_INTERVAL, MAX_RESULT_WINDOW, DEFAULT_REPLICAS, DEFAULT_SHARDS } from '../constants';

export type JsonObject = Record<string, unknown>;

/** A query DSL clause, e.g. `{ term: { brand: 'acme' } }`. */
export type QueryClause = Record<string, unknown>;

export type SortOrder = 'asc' | 'desc';

export type SortOption = {
  field: string;
  order?: SortOrder;
  /** `_last`, `_first` or a substitute value */
  missing?: string;
};

export type SortSpec = string | SortOption | Record<string, unknown>;

function isSortOption(item: SortSpec): item is SortOption {
  return typeof item === 'object' && typeof item.field === 'string' && Object.keys(item).every(k => ['field', 'order', 'missing'].includes(k));
}

export function formatSort(spec: SortSpec[]): Array<string | Record<string, unknown>> {
  return spec.map(item => {
    if (typeof item === 'string') return item;
    if (isSortOption(item)) {
      const options: Record<string, unknown> = { order: item.order ?? 'asc' };
      if (item.missing) options.missing = item.missing;
      return { [item.field]: options };
    }
    return item;
  });
}

export type FacetConfig = {
  field: string;
  name?: string;
  size?: number;
  minDocCount?: number;
  order?: Record<string, SortOrder> | Array<Record<string, SortOrder>>;
};

export function facetToAggregation(facet: FacetConfig): Record<string, unknown> {
  const terms: Record<string, unknown> = {
    field: facet.field,
    size: facet.size ?? 10,
    min_doc_count: facet.minDocCount ?? 1,
  };
  if (facet.order) terms.order = facet.order;
  return { [facet.name ?? `${facet.field}_terms`]: { terms } };
}

export type SearchQuery = {
  query: QueryClause;
  size?: number;
  from?: number;
  sort?: SortSpec[];
  aggs?: Record<string, unknown>;
  highlight?: Record<string, unknown>;
  source?: boolean | string[];
  scriptFields?: Record<string, unknown>;
  trackScores?: boolean;
  explain?: boolean;
  version?: boolean;
};

export function toSearchBody(search: SearchQuery): JsonObject {
  const body: JsonObject = { query: search.query };
  const size = search.size ?? DEFAULT_PAGE_SIZE;
  if (size !== DEFAULT_PAGE_SIZE) body.size = size;
  if (search.from && search.from > 0) body.from = search.from;
  if (search.sort?.length) body.sort = formatSort(search.sort);
  if (search.aggs) body.aggs = search.aggs;
  if (search.highlight) body.highlight = search.highlight;
  if (search.source !== undefined) body._source = search.source;
  if (search.scriptFields) body.script_fields = search.scriptFields;
  if (search.trackScores) body.track_scores = true;
  if (search.explain) body.explain = true;
  if (search.version) body.version = true;
  return body;
}

export type IndexSettings = {
  numberOfShards?: number;
  numberOfReplicas?: number;
  refreshInterval?: string;
  maxResultWindow?: number;
  analysis?: Record<string, unknown>;
};

export function indexSettingsToBody(settings: IndexSettings = {}): JsonObject {
  const index: JsonObject = {
    number_of_shards: settings.numberOfShards ?? DEFAULT_SHARDS,
    number_of_replicas: settings.numberOfReplicas ?? DEFAULT_REPLICAS,
    refresh_interval: settings.refreshInterval ?? INDEX_REFRESH_INTERVAL,
    max_result_window: settings.maxResultWindow ?? MAX_RESULT_WINDOW,
  };
  if (settings.analysis) index.analysis = settings.analysis;
  return { index };
}

export type IndexMappings = {
  properties: Record<string, unknown>;
  dynamic?: 'strict' | 'true' | 'false';
  dateDetection?: boolean;
  numericDetection?: boolean;
};

export function indexMappingsToBody(mappings: IndexMappings): JsonObject {
  return {
    dynamic: mappings.dynamic ?? 'strict',
    date_detection: mappings.dateDetection ?? true,
    numeric_detection: mappings.numericDetection ?? false,
    properties: mappings.properties,
  };
}

export type BulkItemError = {
  /** position of the document in the input list */
  position?: number;
  action?: string;
  id?: string;
  status?: number;
  type?: string;
  reason?: string;
  batchError?: string;
};

export type BulkOperationResult = {
  total: number;
  successful: number;
  failed: number;
  errors: BulkItemError[];
  tookMs: number;
  hasErrors: boolean;
};

export function emptyBulkResult(total = 0): BulkOperationResult {
  return { total, successful: 0, failed: 0, errors: [], tookMs: 0, hasErrors: false };
}

export type SearchHit<T extends JsonObject = JsonObject> = T & {
  _id: string;
  _index: string;
  _score: number | null;
  highlight?: Record<string, string[]>;
};

export type SearchResult<T extends JsonObject = JsonObject> = {
  hits: Array<SearchHit<T>>;
  total: number;
  tookMs: number;
  aggregations?: Record<string, unknown>;
  scrollId?: string;
  shards?: ShardInfo;
};

export type ShardInfo = {
  total?: number;
  successful?: number;
  skipped?: number;
  failed?: number;
};

export function hasHits(result: SearchResult<JsonObject>): boolean {
  return result.hits.length > 0;
}

export function pageCount(result: Pick<SearchResult<JsonObject>, 'total'>, perPage: number = DEFAULT_PAGE_SIZE): number {
  return result.total > 0 ? Math.ceil(result.total / perPage) : 1;
}

export type ClusterHealth = {
  cluster_name?: string;
  status: string;
  number_of_nodes?: number;
  number_of_data_nodes?: number;
  active_shards?: number;
  unassigned_shards?: number;
  [key: string]: unknown;
};

export type IndexStatsSummary = {
  name: string;
  docsCount: number;
  docsDeleted: number;
  storeSizeBytes: number;
  storeSize: string;
  searchTotal: number;
  searchTimeMs: number;
  indexingTotal: number;
  indexingTimeMs: number;
  refreshTotal: number;
  segmentsCount: number;
};
