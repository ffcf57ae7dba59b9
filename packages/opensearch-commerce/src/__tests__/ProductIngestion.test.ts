import { PRODUCT_INDEX_MAPPINGS, ProductIndexer, toProductDocument } from '../indexers/ProductIndexer';
import { ProductIngestion } from '../ingestion/ProductIngestion';
import { silentLogger } from '../services/Logger';
import type { Product, ProductSource } from '../types/Catalog';
import { FakeTransport, responseError, testClient } from './helpers/FakeTransport';

const desk: Product = {
  sku: 'DESK-1',
  name: 'Oak desk',
  category: 'Furniture',
  brand: 'Acme',
  price: 249,
  stock: 4,
  averageRating: 4.5,
  viewCount: 120,
  createdAt: new Date(Date.UTC(2024, 0, 15)),
};
const lamp: Product = { sku: 'LAMP-1', name: 'Desk lamp', price: 39, stock: 0 };
const chair: Product = { sku: 'CHAIR-1', name: 'Office chair', price: 129, stock: 12 };

function bulkReply(statuses: number[]) {
  return {
    took: 1,
    items: statuses.map(status =>
      status < 300 ? { index: { status } } : { index: { status, error: { type: 'mapper_parsing_exception', reason: 'bad' } } },
    ),
  };
}

describe('toProductDocument', () => {
  it('should map catalog fields to index fields', () => {
    expect(toProductDocument(desk)).toEqual({
      _id: 'DESK-1',
      sku: 'DESK-1',
      name: 'Oak desk',
      category: 'Furniture',
      brand: 'Acme',
      price: 249,
      stock: 4,
      average_rating: 4.5,
      view_count: 120,
      created_at: new Date(Date.UTC(2024, 0, 15)),
    });
  });
});

describe('ProductIndexer', () => {
  it('should create the products index with the catalog mappings', async () => {
    const transport = new FakeTransport().reply({ acknowledged: true });
    const indexer = new ProductIndexer(testClient(transport));

    expect(await indexer.ensureIndex()).toBe(true);
    expect(transport.requests[0].path).toBe('/products');
    expect(transport.requests[0].body?.mappings).toEqual({
      dynamic: 'strict',
      date_detection: true,
      numeric_detection: false,
      properties: PRODUCT_INDEX_MAPPINGS.properties,
    });
  });

  it('should bulk index products keyed by sku', async () => {
    const transport = new FakeTransport().reply(bulkReply([201]));
    const indexer = new ProductIndexer(testClient(transport), 'catalog');

    const result = await indexer.index([desk]);

    expect(result).toEqual({ indexed: 1, failed: 0 });
    expect(transport.requests[0].bulkBody).toEqual([
      { index: { _index: 'catalog', _id: 'DESK-1' } },
      {
        sku: 'DESK-1',
        name: 'Oak desk',
        category: 'Furniture',
        brand: 'Acme',
        price: 249,
        stock: 4,
        average_rating: 4.5,
        view_count: 120,
        created_at: '2024-01-15T00:00:00.000Z',
      },
    ]);
  });
});

describe('ProductIngestion', () => {
  it('should follow the cursor until the last page', async () => {
    const transport = new FakeTransport()
      .reply({ acknowledged: true })
      .reply(bulkReply([201, 201]))
      .reply(bulkReply([400]));
    const fetchProducts = jest
      .fn<ReturnType<ProductSource['fetchProducts']>, Parameters<ProductSource['fetchProducts']>>()
      .mockResolvedValueOnce({ items: [desk, lamp], nextPageCursor: 'cursor-2' })
      .mockResolvedValueOnce({ items: [chair], nextPageCursor: null });
    const ingestion = new ProductIngestion({ fetchProducts }, new ProductIndexer(testClient(transport)), 2, silentLogger);

    const result = await ingestion.runOnce();

    expect(result).toEqual({ pages: 2, items: 2, failed: 1 });
    expect(fetchProducts).toHaveBeenNthCalledWith(1, { after: null, limit: 2 });
    expect(fetchProducts).toHaveBeenNthCalledWith(2, { after: 'cursor-2', limit: 2 });
    expect(transport.requests.map(request => `${request.method} ${request.path}`)).toEqual([
      'PUT /products',
      'POST /_bulk',
      'POST /_bulk',
    ]);
  });

  it('should carry on when the products index already exists', async () => {
    const transport = new FakeTransport()
      .fail(responseError(400, 'resource_already_exists_exception', 'index [products/abc] already exists'))
      .reply(bulkReply([201]));
    const source: ProductSource = { fetchProducts: async () => ({ items: [lamp] }) };
    const ingestion = new ProductIngestion(source, new ProductIndexer(testClient(transport)), 100, silentLogger);

    expect(await ingestion.runOnce()).toEqual({ pages: 1, items: 1, failed: 0 });
  });

  it('should skip indexing for empty pages', async () => {
    const transport = new FakeTransport().reply({ acknowledged: true });
    const source: ProductSource = { fetchProducts: async () => ({ items: [] }) };
    const ingestion = new ProductIngestion(source, new ProductIndexer(testClient(transport)), 100, silentLogger);

    expect(await ingestion.runOnce()).toEqual({ pages: 1, items: 0, failed: 0 });
    expect(transport.requests.map(request => request.path)).toEqual(['/products']);
  });

  it('should propagate source failures', async () => {
    const source: ProductSource = {
      fetchProducts: async () => {
        throw new Error('feed offline');
      },
    };
    const transport = new FakeTransport().reply({ acknowledged: true });
    const ingestion = new ProductIngestion(source, new ProductIndexer(testClient(transport)), 100, silentLogger);

    await expect(ingestion.runOnce()).rejects.toThrow('feed offline');
  });
});
