import { InMemoryCacheService } from '../services/CacheService';
import type { SearchResult } from '../types/Search';

const lampResult: SearchResult = {
  hits: [{ _id: 'sku-1', _index: 'products', _score: 2.1, name: 'Desk lamp' }],
  total: 1,
  tookMs: 4,
};

describe('InMemoryCacheService', () => {
  let cache: InMemoryCacheService;

  beforeEach(() => {
    cache = new InMemoryCacheService({ defaultTtlSeconds: 1 });
  });

  afterEach(() => {
    cache.close();
  });

  describe('entries', () => {
    it('should hand back a cached search result', () => {
      cache.set('product_search:lamp', lampResult);

      expect(cache.get<SearchResult>('product_search:lamp')).toEqual(lampResult);
      expect(cache.get('product_search:sofa')).toBeUndefined();
    });

    it('should return the stored object itself rather than a copy', () => {
      const suggestions = ['lamp', 'lampshade'];
      cache.set('autocomplete:la', suggestions);

      expect(cache.get('autocomplete:la')).toBe(suggestions);
    });

    it('should remove single entries and flush everything', () => {
      cache.set('autocomplete:la', ['lamp']);
      cache.set('autocomplete:so', ['sofa']);

      expect(cache.del('autocomplete:la')).toBe(1);
      expect(cache.get('autocomplete:la')).toBeUndefined();

      cache.clear();
      expect(cache.get('autocomplete:so')).toBeUndefined();
      expect(cache.getStats().keys).toBe(0);
    });
  });

  describe('expiry', () => {
    it('should drop an entry once its own TTL has passed', async () => {
      cache.set('autocomplete:la', ['lamp'], 0.1);
      expect(cache.get('autocomplete:la')).toEqual(['lamp']);

      await new Promise(resolve => setTimeout(resolve, 150));
      expect(cache.get('autocomplete:la')).toBeUndefined();
    });

    it('should keep an entry within the default TTL', async () => {
      cache.set('product_search:lamp', lampResult);

      await new Promise(resolve => setTimeout(resolve, 300));
      expect(cache.get('product_search:lamp')).toBe(lampResult);
    });
  });

  it('should count hits, misses and keys', () => {
    cache.set('product_search:lamp', lampResult);
    cache.get('product_search:lamp');
    cache.get('product_search:lamp');
    cache.get('product_search:sofa');

    expect(cache.getStats()).toEqual({ keys: 1, hits: 2, misses: 1 });
  });

  describe('createSearchKey', () => {
    it('should ignore property order in the params', () => {
      const key1 = InMemoryCacheService.createSearchKey('product_search', 'products', { text: 'lamp', page: 1 });
      const key2 = InMemoryCacheService.createSearchKey('product_search', 'products', { page: 1, text: 'lamp' });

      expect(key1).toBe(key2);
    });

    it('should encode namespace, index and params', () => {
      const key = InMemoryCacheService.createSearchKey('autocomplete', 'products', { prefix: 'la', limit: 5 });

      expect(key).toBe(`autocomplete:products:${Buffer.from('{"limit":5,"prefix":"la"}').toString('base64')}`);
    });

    it('should drop undefined values', () => {
      const key1 = InMemoryCacheService.createSearchKey('product_search', 'products', { text: 'lamp', category: undefined });
      const key2 = InMemoryCacheService.createSearchKey('product_search', 'products', { text: 'lamp' });
      const key3 = InMemoryCacheService.createSearchKey('product_search', 'products', { text: 'desk' });

      expect(key1).toBe(key2);
      expect(key1).not.toBe(key3);
    });
  });
});
