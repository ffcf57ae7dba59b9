export * from './constants';
export * from './errors';
export * from './config';
export * from './utils';
export * from './types/Search';
export * from './types/Catalog';
export * from './services/Logger';
export * from './services/ErrorHandler';
export * from './services/CacheService';
export * from './services/Transport';
export * from './services/QueryBuilder';
export * from './services/BulkProcessor';
export * from './services/IndexManager';
export * from './services/PerformanceMonitor';
export * from './services/Observability';
export * from './services/OpenSearchClient';
export * from './indexers/ProductIndexer';
export * from './ingestion/ProductIngestion';
export { createRouter, type RouterServices } from './router';
export * from './clientFactory';
