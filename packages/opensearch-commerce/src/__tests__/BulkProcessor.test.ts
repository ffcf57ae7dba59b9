import { BulkProcessor } from '../services/BulkProcessor';
import { silentLogger } from '../services/Logger';
import { FakeTransport } from './helpers/FakeTransport';

function ok(action: string, count: number, took = 1) {
  return { took, errors: false, items: Array.from({ length: count }, () => ({ [action]: { status: 201 } })) };
}

describe('BulkProcessor', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
  });

  const processor = (options: ConstructorParameters<typeof BulkProcessor>[1] = {}) =>
    new BulkProcessor(transport, { retryDelayMs: 0, logger: silentLogger, ...options });

  describe('processBulkIndex', () => {
    it('should send documents in batches of batchSize', async () => {
      transport.reply(ok('index', 2, 4)).reply(ok('index', 1, 3));

      const result = await processor({ batchSize: 2 }).processBulkIndex('products', [
        { _id: 'a', name: 'Desk' },
        { _id: 'b', name: 'Lamp' },
        { _id: 'c', name: 'Chair' },
      ]);

      expect(result).toEqual({ total: 3, successful: 3, failed: 0, errors: [], tookMs: 7, hasErrors: false });
      expect(transport.requests).toHaveLength(2);
      expect(transport.requests[0].path).toBe('/_bulk');
      expect(transport.requests[1].bulkBody).toEqual([{ index: { _index: 'products', _id: 'c' } }, { name: 'Chair' }]);
    });

    it('should take the id from idField and keep the field in the source', async () => {
      transport.reply(ok('index', 1));

      await processor().processBulkIndex('products', [{ sku: 'SKU-1', name: 'Desk', color: null }], 'sku');

      expect(transport.requests[0].bulkBody).toEqual([
        { index: { _index: 'products', _id: 'SKU-1' } },
        { sku: 'SKU-1', name: 'Desk' },
      ]);
    });

    it('should leave the id to the cluster when the document has none', async () => {
      transport.reply(ok('index', 1));

      await processor().processBulkIndex('products', [{ name: 'Desk' }]);

      expect(transport.requests[0].bulkBody).toEqual([{ index: { _index: 'products' } }, { name: 'Desk' }]);
    });

    it('should return an empty result without a request for no documents', async () => {
      const result = await processor().processBulkIndex('products', []);

      expect(result).toEqual({ total: 0, successful: 0, failed: 0, errors: [], tookMs: 0, hasErrors: false });
      expect(transport.requests).toHaveLength(0);
    });

    it('should resend only the items that failed with a transient error', async () => {
      transport
        .reply({
          took: 2,
          errors: true,
          items: [
            { index: { status: 201 } },
            { index: { status: 429, error: { type: 'es_rejected_execution_exception', reason: 'queue is full' } } },
          ],
        })
        .reply(ok('index', 1, 1));

      const bulk = processor();
      const result = await bulk.processBulkIndex('products', [
        { _id: 'a', name: 'Desk' },
        { _id: 'b', name: 'Lamp' },
      ]);

      expect(result).toEqual({ total: 2, successful: 2, failed: 0, errors: [], tookMs: 3, hasErrors: false });
      expect(transport.requests[1].bulkBody).toEqual([{ index: { _index: 'products', _id: 'b' } }, { name: 'Lamp' }]);
      expect(bulk.getStats().totalRetries).toBe(1);
    });

    it('should report permanent item failures by input position', async () => {
      transport.reply({
        took: 1,
        errors: true,
        items: [
          { index: { status: 201 } },
          { index: { status: 400, error: { type: 'mapper_parsing_exception', reason: 'failed to parse field [price]' } } },
        ],
      });

      const bulk = processor();
      const result = await bulk.processBulkIndex('products', [
        { _id: 'a', price: 10 },
        { _id: 'b', price: 'cheap' },
      ]);

      expect(result.successful).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.hasErrors).toBe(true);
      expect(result.errors).toEqual([
        {
          position: 1,
          action: 'index',
          id: 'b',
          status: 400,
          type: 'mapper_parsing_exception',
          reason: 'failed to parse field [price]',
        },
      ]);
      expect(transport.requests).toHaveLength(1);
      expect(bulk.getStats()).toEqual({
        totalBatches: 1,
        totalDocuments: 2,
        successfulBatches: 0,
        failedBatches: 1,
        totalRetries: 0,
        totalErrors: 1,
        batchSize: 1000,
        maxRetries: 3,
      });
    });

    it('should mark every action as failed when the batch request keeps failing', async () => {
      transport.fail(new Error('socket hang up')).fail(new Error('socket hang up'));

      const result = await processor({ maxRetries: 2 }).processBulkIndex('products', [{ _id: 'a' }, { _id: 'b' }]);

      expect(result.failed).toBe(2);
      expect(result.errors).toEqual([
        { position: 0, action: 'index', id: 'a', batchError: 'socket hang up' },
        { position: 1, action: 'index', id: 'b', batchError: 'socket hang up' },
      ]);
      expect(transport.requests).toHaveLength(2);
    });

    it('should treat a response whose items do not match the request as a failed batch', async () => {
      transport.reply({ took: 1, items: [] });

      const result = await processor({ maxRetries: 1 }).processBulkIndex('products', [{ _id: 'a' }]);

      expect(result.errors).toEqual([
        { position: 0, action: 'index', id: 'a', batchError: 'Bulk operation error: Malformed bulk response' },
      ]);
    });

    it('should refresh the index after a successful batch when enabled', async () => {
      transport.reply(ok('index', 1)).reply({ _shards: { total: 2, successful: 2, failed: 0 } });

      await processor({ refreshAfterBatch: true }).processBulkIndex('products', [{ _id: 'a' }]);

      expect(transport.requests.map(request => `${request.method} ${request.path}`)).toEqual([
        'POST /_bulk',
        'POST /products/_refresh',
      ]);
    });

    it('should not fail the batch when the refresh fails', async () => {
      transport.reply(ok('index', 1)).fail(new Error('refresh rejected'));

      const result = await processor({ refreshAfterBatch: true }).processBulkIndex('products', [{ _id: 'a' }]);

      expect(result.successful).toBe(1);
      expect(result.hasErrors).toBe(false);
    });
  });

  describe('processBulkUpdate', () => {
    it('should send partial documents keyed by id', async () => {
      transport.reply(ok('update', 1));

      await processor().processBulkUpdate('products', [{ _id: 'a', price: 12.5 }]);

      expect(transport.requests[0].bulkBody).toEqual([
        { update: { _index: 'products', _id: 'a' } },
        { doc: { price: 12.5 } },
      ]);
    });

    it('should reject updates without an id before sending anything', async () => {
      await expect(processor().processBulkUpdate('products', [{ sku: 'a' }, { price: 3 }], 'sku')).rejects.toThrow(
        'Validation error: Document missing sku field',
      );
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('processBulkDelete', () => {
    it('should send one delete line per id', async () => {
      transport.reply({ took: 1, items: [{ delete: { status: 200 } }, { delete: { status: 404, result: 'not_found' } }] });

      const result = await processor().processBulkDelete('products', ['a', 'b']);

      expect(transport.requests[0].bulkBody).toEqual([
        { delete: { _index: 'products', _id: 'a' } },
        { delete: { _index: 'products', _id: 'b' } },
      ]);
      expect(result.successful).toBe(1);
      expect(result.errors).toEqual([{ position: 1, action: 'delete', id: 'b', status: 404 }]);
    });
  });

  it('should keep the batch size within 1 and the bulk limit', () => {
    expect(processor({ batchSize: 0 }).getStats().batchSize).toBe(1);
    expect(processor({ batchSize: 20_000 }).getStats().batchSize).toBe(5000);
    expect(processor().getStats().batchSize).toBe(1000);
  });

  it('should reset its statistics', async () => {
    transport.reply(ok('index', 1));
    const bulk = processor();
    await bulk.processBulkIndex('products', [{ _id: 'a' }]);

    bulk.resetStats();

    expect(bulk.getStats().totalDocuments).toBe(0);
  });
});
