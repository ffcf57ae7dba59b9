import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type OperationType = 'search' | 'index' | 'update' | 'delete' | 'bulk' | 'admin';

export type OperationRecord = {
  operation: string;
  type: OperationType;
  index: string;
  durationMs: number;
  success: boolean;
};

export class Observability {
  private readonly registry: Registry;
  private readonly tracer = trace.getTracer('opensearch-commerce');

  private readonly latency: Histogram<'operation' | 'index'>;
  private readonly operations: Counter<'operation' | 'outcome'>;
  private readonly errors: Counter<'operation' | 'error'>;
  private readonly indexed: Counter<'index'>;
  private readonly bulkFailures: Counter<'index'>;

  constructor(opts?: { registry?: Registry; collectDefaultMetrics?: boolean }) {
    this.registry = opts?.registry ?? new Registry();
    if (opts?.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }

    const buckets = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000];
    this.latency = new Histogram({
      name: 'opensearch_commerce_operation_latency_ms',
      help: 'Latency per cluster operation in milliseconds',
      labelNames: ['operation', 'index'] as const,
      buckets,
      registers: [this.registry],
    });
    this.operations = new Counter({
      name: 'opensearch_commerce_operations_total',
      help: 'Cluster operations by outcome',
      labelNames: ['operation', 'outcome'] as const,
      registers: [this.registry],
    });
    this.errors = new Counter({
      name: 'opensearch_commerce_errors_total',
      help: 'Errors by operation and error class',
      labelNames: ['operation', 'error'] as const,
      registers: [this.registry],
    });
    this.indexed = new Counter({
      name: 'opensearch_commerce_indexed_documents_total',
      help: 'Documents accepted by bulk requests, by index',
      labelNames: ['index'] as const,
      registers: [this.registry],
    });
    this.bulkFailures = new Counter({
      name: 'opensearch_commerce_bulk_item_failures_total',
      help: 'Bulk items rejected by the cluster, by index',
      labelNames: ['index'] as const,
      registers: [this.registry],
    });
  }

  /** Runs `fn` inside a span named after the operation. */
  async trace<T>(operation: string, index: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return this.tracer.startActiveSpan(`opensearch.${operation}`, async span => {
      span.setAttributes({ 'db.system': 'opensearch', 'db.operation': operation, 'opensearch.index': index });
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.recordException(error instanceof Error ? error : String(error));
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw error;
      } finally {
        span.end();
      }
    });
  }

  recordOperation(record: OperationRecord): void {
    this.latency.labels(record.operation, record.index).observe(record.durationMs);
    this.operations.labels(record.operation, record.success ? 'success' : 'failure').inc();
  }

  recordError(operation: string, error: unknown): void {
    const errorClass = error instanceof Error ? error.name : 'Unknown';
    this.errors.labels(operation, errorClass).inc();
  }

  recordBulk(event: { index: string; successful: number; failed: number }): void {
    if (event.successful > 0) this.indexed.labels(event.index).inc(event.successful);
    if (event.failed > 0) this.bulkFailures.labels(event.index).inc(event.failed);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  metricsContentType(): string {
    return this.registry.contentType;
  }
}
