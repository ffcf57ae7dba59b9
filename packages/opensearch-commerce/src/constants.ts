// Connection
export const DEFAULT_TIMEOUT_MS = 30_000;
export const MAX_RETRIES = 3;
export const RETRY_ON_TIMEOUT = true;
export const CONNECTION_POOL_SIZE = 10;
export const DEFAULT_RETRY_BACKOFF_MS = 1000;

// Search
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_SEARCH_SIZE = 10;
export const MAX_RESULT_WINDOW = 10_000;

// Bulk
export const DEFAULT_BULK_SIZE = 1000;
export const MAX_BULK_SIZE = 5000;
export const BULK_RETRY_ATTEMPTS = 3;
export const BULK_RETRY_DELAY_MS = 1000;

// Index
export const DEFAULT_SHARDS = 1;
export const DEFAULT_REPLICAS = 1;
export const INDEX_REFRESH_INTERVAL = '1s';

// Query
export const DEFAULT_FUZZINESS = 'AUTO';
export const DEFAULT_MIN_SHOULD_MATCH = '75%';
export const MAX_SUGGESTIONS = 10;

// Monitoring
export const STATS_RETENTION_HOURS = 24;
export const SLOW_QUERY_THRESHOLD_MS = 1000;
export const MAX_TIMING_SAMPLES = 1000;
export const MAX_CLUSTER_HISTORY = 100;

// AWS
export const AWS_SERVICE_NAME = 'es';
export const AWS_SERVICE_NAME_AOSS = 'aoss';
export const DEFAULT_AWS_REGION = 'us-east-1';

// Error types reported by the cluster
export const INDEX_NOT_FOUND_ERROR = 'index_not_found_exception';
export const DOCUMENT_NOT_FOUND_ERROR = 'document_missing_exception';
export const VERSION_CONFLICT_ERROR = 'version_conflict_engine_exception';
export const RESOURCE_EXISTS_ERROR = 'resource_already_exists_exception';
