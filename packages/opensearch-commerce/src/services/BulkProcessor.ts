import { BULK_RETRY_ATTEMPTS, BULK_RETRY_DELAY_MS, DEFAULT_BULK_SIZE, MAX_BULK_SIZE } from '../constants';
import { BulkOperationError, ValidationError, describeError } from '../errors';
import type { BulkItemError, BulkOperationResult, JsonObject } from '../types/Search';
import { emptyBulkResult } from '../types/Search';
import { chunk, normalizeDocument, sleep } from '../utils';
import { consoleLogger, type Logger } from './Logger';
import type { Transport } from './Transport';

export type BulkAction = 'index' | 'update' | 'delete';

type PendingAction = {
  /** position of the document in the caller's input */
  position: number;
  action: BulkAction;
  id?: string;
  lines: JsonObject[];
};

type AttemptOutcome = {
  succeeded: number;
  tookMs: number;
  failed: Array<{ action: PendingAction; error: BulkItemError }>;
};

export type BulkProcessorOptions = {
  batchSize?: number;
  /** attempts per batch, the first one included */
  maxRetries?: number;
  retryDelayMs?: number;
  refreshAfterBatch?: boolean;
  logger?: Logger;
};

export type BulkProcessorStats = {
  totalBatches: number;
  totalDocuments: number;
  successfulBatches: number;
  failedBatches: number;
  totalRetries: number;
  totalErrors: number;
};

const RETRYABLE_ITEM_ERRORS = [
  'version_conflict',
  'document_missing',
  'cluster_block',
  'circuit_breaking',
  'es_rejected_execution',
  'timeout',
  'connection',
];

function emptyStats(): BulkProcessorStats {
  return { totalBatches: 0, totalDocuments: 0, successfulBatches: 0, failedBatches: 0, totalRetries: 0, totalErrors: 0 };
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRetryableItem(error: BulkItemError): boolean {
  if (error.status === 429 || error.status === 503) return true;
  const text = `${error.type ?? ''} ${error.reason ?? ''}`.toLowerCase();
  return RETRYABLE_ITEM_ERRORS.some(fragment => text.includes(fragment));
}

function documentId(value: unknown): string | undefined {
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Sends documents to `_bulk` in fixed-size batches, one batch at a time.
 * Failed items are read back by position and, when the failure is
 * transient, only those actions are resent.
 */
export class BulkProcessor {
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly refreshAfterBatch: boolean;
  private readonly logger: Logger;
  private stats = emptyStats();

  constructor(private readonly transport: Transport, options: BulkProcessorOptions = {}) {
    this.batchSize = Math.min(Math.max(Math.trunc(options.batchSize ?? DEFAULT_BULK_SIZE), 1), MAX_BULK_SIZE);
    this.maxRetries = Math.max(1, options.maxRetries ?? BULK_RETRY_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? BULK_RETRY_DELAY_MS;
    this.refreshAfterBatch = options.refreshAfterBatch ?? false;
    this.logger = options.logger ?? consoleLogger;
  }

  async processBulkIndex(index: string, documents: JsonObject[], idField?: string): Promise<BulkOperationResult> {
    const actions = documents.map((document, position): PendingAction => {
      const { _id: ownId, ...rest } = document;
      const id = idField && idField in document ? documentId(document[idField]) : documentId(ownId);
      const header: JsonObject = { _index: index };
      if (id !== undefined) header._id = id;
      return { position, action: 'index', id, lines: [{ index: header }, normalizeDocument(rest)] };
    });
    return this.process(index, actions);
  }

  async processBulkUpdate(index: string, updates: JsonObject[], idField = '_id'): Promise<BulkOperationResult> {
    const actions = updates.map((update, position): PendingAction => {
      const id = documentId(update[idField]);
      if (id === undefined) {
        throw new ValidationError(`Document missing ${idField} field`);
      }
      const doc: JsonObject = {};
      for (const [key, value] of Object.entries(update)) {
        if (key !== idField) doc[key] = value;
      }
      return { position, action: 'update', id, lines: [{ update: { _index: index, _id: id } }, { doc: normalizeDocument(doc) }] };
    });
    return this.process(index, actions);
  }

  async processBulkDelete(index: string, ids: string[]): Promise<BulkOperationResult> {
    const actions = ids.map(
      (id, position): PendingAction => ({ position, action: 'delete', id, lines: [{ delete: { _index: index, _id: id } }] }),
    );
    return this.process(index, actions);
  }

  getStats(): BulkProcessorStats & { batchSize: number; maxRetries: number } {
    return { ...this.stats, batchSize: this.batchSize, maxRetries: this.maxRetries };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private async process(index: string, actions: PendingAction[]): Promise<BulkOperationResult> {
    const result = emptyBulkResult(actions.length);
    if (!actions.length) return result;

    this.stats.totalDocuments += actions.length;
    const batches = chunk(actions, this.batchSize);
    this.logger.info(`Processing ${batches.length} batches of up to ${this.batchSize} actions for ${index}`);

    for (const [i, batch] of batches.entries()) {
      this.stats.totalBatches += 1;
      this.logger.debug(`Processing batch ${i + 1}/${batches.length} for index ${index}`);

      const batchResult = await this.processBatchWithRetry(batch);
      result.successful += batchResult.successful;
      result.failed += batchResult.failed;
      result.errors.push(...batchResult.errors);
      result.tookMs += batchResult.tookMs;

      if (batchResult.hasErrors) {
        this.stats.failedBatches += 1;
        this.stats.totalErrors += batchResult.failed;
      } else {
        this.stats.successfulBatches += 1;
        if (this.refreshAfterBatch) await this.refresh(index);
      }
    }

    result.hasErrors = result.failed > 0;
    this.logger.info(
      `Bulk processing completed: ${result.successful} successful, ${result.failed} failed, took ${result.tookMs}ms`,
    );
    return result;
  }

  private async processBatchWithRetry(batch: PendingAction[]): Promise<BulkOperationResult> {
    const result = emptyBulkResult(batch.length);
    let pending = batch;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const lastAttempt = attempt === this.maxRetries - 1;
      if (attempt > 0) this.stats.totalRetries += 1;

      let outcome: AttemptOutcome;
      try {
        outcome = await this.send(pending);
      } catch (error) {
        this.logger.error(`Batch processing failed on attempt ${attempt + 1}: ${describeError(error)}`);
        if (lastAttempt) {
          result.failed = pending.length;
          result.errors = pending.map(action => ({
            position: action.position,
            action: action.action,
            id: action.id,
            batchError: describeError(error),
          }));
          break;
        }
        await sleep(this.retryDelayMs * 2 ** attempt);
        continue;
      }

      result.successful += outcome.succeeded;
      result.tookMs += outcome.tookMs;

      if (!outcome.failed.length) break;

      this.logger.warn(`Batch completed with ${outcome.failed.length} errors (attempt ${attempt + 1}/${this.maxRetries})`);
      if (!lastAttempt && outcome.failed.some(({ error }) => isRetryableItem(error))) {
        pending = outcome.failed.map(({ action }) => action);
        await sleep(this.retryDelayMs * 2 ** attempt);
        continue;
      }

      result.failed = outcome.failed.length;
      result.errors = outcome.failed.map(({ error }) => error);
      break;
    }

    result.hasErrors = result.failed > 0;
    return result;
  }

  private async send(actions: PendingAction[]): Promise<AttemptOutcome> {
    const response = await this.transport.request({
      method: 'POST',
      path: '/_bulk',
      bulkBody: actions.flatMap(action => action.lines),
    });

    const body = response.body;
    const items = isObject(body) ? body.items : undefined;
    if (!isObject(body) || !Array.isArray(items) || items.length !== actions.length) {
      throw new BulkOperationError('Malformed bulk response');
    }

    const outcome: AttemptOutcome = { succeeded: 0, tookMs: typeof body.took === 'number' ? body.took : 0, failed: [] };
    items.forEach((item: unknown, i) => {
      const action = actions[i];
      const entry = isObject(item) ? item[action.action] : undefined;
      const status = isObject(entry) && typeof entry.status === 'number' ? entry.status : undefined;
      const error = isObject(entry) ? entry.error : undefined;

      if (error === undefined && status !== undefined && status < 300) {
        outcome.succeeded += 1;
        return;
      }
      outcome.failed.push({
        action,
        error: {
          position: action.position,
          action: action.action,
          id: action.id,
          status,
          type: isObject(error) && typeof error.type === 'string' ? error.type : undefined,
          reason: isObject(error) && typeof error.reason === 'string' ? error.reason : typeof error === 'string' ? error : undefined,
        },
      });
    });
    return outcome;
  }

  private async refresh(index: string): Promise<void> {
    try {
      await this.transport.request({ method: 'POST', path: `/${encodeURIComponent(index)}/_refresh` });
    } catch (error) {
      this.logger.warn(`Failed to refresh index ${index}: ${describeError(error)}`);
    }
  }
}
