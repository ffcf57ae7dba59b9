import {
  emptyBulkResult,
  facetToAggregation,
  formatSort,
  hasHits,
  indexMappingsToBody,
  indexSettingsToBody,
  pageCount,
  toSearchBody,
} from '../types/Search';

describe('search types', () => {
  describe('formatSort', () => {
    it('should expand sort options and pass other forms through', () => {
      expect(
        formatSort([
          '_score',
          { field: 'price', order: 'desc', missing: '_last' },
          { field: 'name' },
          { _geo_distance: { location: { lat: 1, lon: 2 } } },
        ]),
      ).toEqual([
        '_score',
        { price: { order: 'desc', missing: '_last' } },
        { name: { order: 'asc' } },
        { _geo_distance: { location: { lat: 1, lon: 2 } } },
      ]);
    });
  });

  describe('facetToAggregation', () => {
    it('should build a terms aggregation named after the field', () => {
      expect(facetToAggregation({ field: 'brand.keyword' })).toEqual({
        'brand.keyword_terms': { terms: { field: 'brand.keyword', size: 10, min_doc_count: 1 } },
      });
      expect(facetToAggregation({ field: 'color', name: 'colors', size: 5, order: { _key: 'asc' } })).toEqual({
        colors: { terms: { field: 'color', size: 5, min_doc_count: 1, order: { _key: 'asc' } } },
      });
    });
  });

  describe('toSearchBody', () => {
    it('should leave out defaults', () => {
      expect(toSearchBody({ query: { match_all: {} }, size: 20, from: 0 })).toEqual({ query: { match_all: {} } });
    });

    it('should map every option to its request field', () => {
      expect(
        toSearchBody({
          query: { match_all: {} },
          size: 5,
          from: 10,
          sort: [{ field: 'price' }],
          aggs: { brands: {} },
          highlight: { fields: { name: {} } },
          source: ['name'],
          scriptFields: { discounted: {} },
          trackScores: true,
          explain: true,
          version: true,
        }),
      ).toEqual({
        query: { match_all: {} },
        size: 5,
        from: 10,
        sort: [{ price: { order: 'asc' } }],
        aggs: { brands: {} },
        highlight: { fields: { name: {} } },
        _source: ['name'],
        script_fields: { discounted: {} },
        track_scores: true,
        explain: true,
        version: true,
      });
    });
  });

  describe('index bodies', () => {
    it('should fill default settings', () => {
      expect(indexSettingsToBody({ numberOfReplicas: 0, analysis: { analyzer: {} } })).toEqual({
        index: {
          number_of_shards: 1,
          number_of_replicas: 0,
          refresh_interval: '1s',
          max_result_window: 10_000,
          analysis: { analyzer: {} },
        },
      });
    });

    it('should default mappings to strict', () => {
      expect(indexMappingsToBody({ properties: {}, dynamic: 'false' })).toEqual({
        dynamic: 'false',
        date_detection: true,
        numeric_detection: false,
        properties: {},
      });
    });
  });

  describe('results', () => {
    it('should start bulk results empty', () => {
      expect(emptyBulkResult(4)).toEqual({ total: 4, successful: 0, failed: 0, errors: [], tookMs: 0, hasErrors: false });
    });

    it('should report hits and page counts', () => {
      expect(hasHits({ hits: [], total: 0, tookMs: 1 })).toBe(false);
      expect(pageCount({ total: 0 })).toBe(1);
      expect(pageCount({ total: 41 })).toBe(3);
      expect(pageCount({ total: 41 }, 10)).toBe(5);
    });
  });
});
