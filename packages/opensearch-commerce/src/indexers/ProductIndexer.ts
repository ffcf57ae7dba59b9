import type { JsonObject, IndexMappings } from '../types/Search';
import type { Product } from '../types/Catalog';
import type { OpenSearchCommerceClient } from '../services/OpenSearchClient';

const keywordSubfield = { keyword: { type: 'keyword', ignore_above: 256 } };

/** Mappings for the fields `QueryBuilder` searches, filters, sorts and suggests on. */
export const PRODUCT_INDEX_MAPPINGS: IndexMappings = {
  properties: {
    sku: { type: 'keyword' },
    name: { type: 'text', fields: { ...keywordSubfield, suggest: { type: 'completion' } } },
    description: { type: 'text' },
    category: { type: 'text', fields: keywordSubfield },
    brand: { type: 'text', fields: keywordSubfield },
    price: { type: 'double' },
    stock: { type: 'integer' },
    tags: { type: 'text', fields: keywordSubfield },
    attributes: {
      type: 'nested',
      properties: {
        name: { type: 'text', fields: keywordSubfield },
        value: { type: 'text', fields: keywordSubfield },
      },
    },
    average_rating: { type: 'float' },
    view_count: { type: 'integer' },
    location: { type: 'geo_point' },
    created_at: { type: 'date' },
  },
};

export function toProductDocument(product: Product): JsonObject {
  return {
    _id: product.sku || undefined,
    sku: product.sku,
    name: product.name,
    description: product.description,
    category: product.category,
    brand: product.brand,
    price: product.price,
    stock: product.stock,
    tags: product.tags,
    attributes: product.attributes,
    average_rating: product.averageRating,
    view_count: product.viewCount,
    location: product.location,
    created_at: product.createdAt,
  };
}

export class ProductIndexer {
  constructor(private readonly client: OpenSearchCommerceClient, readonly indexName = 'products') {}

  async ensureIndex(): Promise<boolean> {
    return this.client.createIndex(this.indexName, { mappings: PRODUCT_INDEX_MAPPINGS });
  }

  async index(products: Product[]): Promise<{ indexed: number; failed: number }> {
    const result = await this.client.bulkIndex(this.indexName, products.map(toProductDocument));
    return { indexed: result.successful, failed: result.failed };
  }
}
