import type { Router } from 'express';
import { getOpenSearchConfig, type OpenSearchConfigInput } from './config';
import { ProductIndexer } from './indexers/ProductIndexer';
import { ProductIngestion } from './ingestion/ProductIngestion';
import { createRouter } from './router';
import type { BulkProcessorOptions } from './services/BulkProcessor';
import type { CacheService } from './services/CacheService';
import { consoleLogger, type Logger } from './services/Logger';
import { Observability } from './services/Observability';
import { OpenSearchCommerceClient } from './services/OpenSearchClient';
import type { Transport } from './services/Transport';
import type { ProductSource } from './types/Catalog';

export type CreateClientOptions = Partial<OpenSearchConfigInput> & {
  transport?: Transport;
  logger?: Logger;
  cacheService?: CacheService;
  bulk?: Omit<BulkProcessorOptions, 'logger'>;
  /** also export Node.js process metrics on the registry */
  collectDefaultMetrics?: boolean;
};

/**
 * Builds a client from explicit settings when `hosts` is given, otherwise
 * from the environment.
 */
export function createOpenSearchClient(options: CreateClientOptions = {}): OpenSearchCommerceClient {
  const { transport, logger = consoleLogger, cacheService, bulk, collectDefaultMetrics, ...overrides } = options;
  const config = getOpenSearchConfig(overrides, logger);
  return new OpenSearchCommerceClient(config, {
    transport,
    logger,
    cache: cacheService,
    bulk,
    observability: new Observability({ collectDefaultMetrics }),
  });
}

export type ServiceDeps = {
  productSource?: ProductSource;
  productIndex?: string;
  pageSize?: number;
};

export type CommerceServices = {
  client: OpenSearchCommerceClient;
  ingestion?: ProductIngestion;
  router: Router;
};

/** Client, optional product ingestion and the HTTP router over them. */
export function createCommerceServices(options: CreateClientOptions = {}, deps: ServiceDeps = {}): CommerceServices {
  const client = createOpenSearchClient(options);
  const logger = options.logger ?? consoleLogger;

  let ingestion: ProductIngestion | undefined;
  if (deps.productSource) {
    const indexer = new ProductIndexer(client, deps.productIndex);
    ingestion = new ProductIngestion(deps.productSource, indexer, deps.pageSize, logger);
  }

  return { client, ingestion, router: createRouter({ client, ingestion, logger }) };
}
