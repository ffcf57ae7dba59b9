import type { Request, Response } from 'express';
import express, { Router } from 'express';
import { z } from 'zod';
import { OpenSearchError, ValidationError, describeError } from './errors';
import type { ProductIngestion } from './ingestion/ProductIngestion';
import type { OpenSearchCommerceClient } from './services/OpenSearchClient';
import { consoleLogger, type Logger } from './services/Logger';

export type RouterServices = {
  client: OpenSearchCommerceClient;
  ingestion?: ProductIngestion;
  logger?: Logger;
};

const filterValue = z.union([z.string(), z.number(), z.boolean()]);

const productSearchSchema = z.object({
  text: z.string().optional(),
  filters: z.record(z.union([filterValue, z.array(filterValue)])).optional(),
  category: z.string().optional(),
  priceRange: z.tuple([z.number(), z.number()]).optional(),
  brand: z.union([z.string(), z.array(z.string())]).optional(),
  attributes: z.record(filterValue).optional(),
  inStock: z.boolean().optional(),
  sortBy: z.enum(['relevance', 'price_asc', 'price_desc', 'newest', 'popular', 'rating']).optional(),
  page: z.number().int().optional(),
  perPage: z.number().int().optional(),
  index: z.string().optional(),
});

const autocompleteSchema = z.object({
  index: z.string().default('products'),
  field: z.string().default('name'),
  prefix: z.string().min(1),
  size: z.coerce.number().int().positive().optional(),
});

const bulkSchema = z.object({
  documents: z.array(z.record(z.unknown())),
  idField: z.string().optional(),
  refresh: z.boolean().optional(),
});

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: 'Invalid request',
    message: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
  });
}

export function createRouter(services: RouterServices) {
  const router = Router();
  const { client } = services;
  const logger = services.logger ?? consoleLogger;

  router.use(express.json({ limit: '10mb' }));

  // client calls record their own errors; only failures outside them are counted here
  const fail = (res: Response, operation: string, error: unknown) => {
    if (!(error instanceof OpenSearchError)) client.observability.recordError(operation, error);
    if (error instanceof ValidationError) {
      res.status(400).json({ error: `${operation} failed`, message: error.message });
    } else if (error instanceof OpenSearchError) {
      res.status(502).json({ error: `${operation} failed`, message: error.message });
    } else {
      logger.error(`${operation} failed: ${describeError(error)}`);
      res.status(500).json({ error: `${operation} failed`, message: describeError(error) });
    }
  };

  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const health = await client.clusterHealth();
      res.json({ status: health.status === 'red' ? 'degraded' : 'ok', cluster: health });
    } catch (e) {
      fail(res, 'Health check', e);
    }
  });

  // Prometheus metrics endpoint
  router.get('/metrics', async (_req: Request, res: Response) => {
    try {
      const body = await client.observability.getMetrics();
      res.setHeader('Content-Type', client.observability.metricsContentType());
      res.send(body);
    } catch (e) {
      fail(res, 'Metrics', e);
    }
  });

  router.get('/stats', (_req: Request, res: Response) => {
    res.json({ summary: client.monitor.getPerformanceSummary(), slowQueries: client.monitor.getSlowQueries() });
  });

  router.post('/search/products', async (req: Request, res: Response) => {
    const parsed = productSearchSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      const result = await client.productSearch(parsed.data);
      res.json(result);
    } catch (e) {
      fail(res, 'Product search', e);
    }
  });

  router.get('/autocomplete', async (req: Request, res: Response) => {
    const parsed = autocompleteSchema.safeParse(req.query);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    const { index, field, prefix, size } = parsed.data;
    try {
      const suggestions = await client.autocomplete(index, field, prefix, size);
      res.json({ suggestions });
    } catch (e) {
      fail(res, 'Autocomplete', e);
    }
  });

  router.post('/indices/:index/bulk', async (req: Request, res: Response) => {
    const parsed = bulkSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      const result = await client.bulkIndex(req.params.index, parsed.data.documents, {
        idField: parsed.data.idField,
        refresh: parsed.data.refresh,
      });
      res.status(result.hasErrors ? 207 : 200).json(result);
    } catch (e) {
      fail(res, 'Bulk indexing', e);
    }
  });

  router.post('/admin/reindex/products', async (_req: Request, res: Response) => {
    const ingestion = services.ingestion;
    if (!ingestion) {
      res.status(400).json({ error: 'Product ingestion not configured' });
      return;
    }
    try {
      const result = await ingestion.runOnce();
      res.json({ ok: true, ...result });
    } catch (e) {
      fail(res, 'Product reindex', e);
    }
  });

  return router;
}
