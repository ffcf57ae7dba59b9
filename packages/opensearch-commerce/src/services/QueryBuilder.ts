import { DEFAULT_FUZZINESS, DEFAULT_MIN_SHOULD_MATCH } from '../constants';
import { SearchQueryError } from '../errors';
import type { JsonObject, QueryClause, SortOption } from '../types/Search';

export type FilterValue = string | number | boolean;

export type ProductQueryOptions = {
  text?: string;
  filters?: Record<string, FilterValue | FilterValue[]>;
  category?: string;
  priceRange?: [number, number];
  brand?: string | string[];
  attributes?: Record<string, FilterValue>;
  inStock?: boolean;
};

export type FilterOperator =
  | 'eq'
  | 'ne'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'in'
  | 'range'
  | 'exists'
  | 'missing'
  | 'prefix'
  | 'wildcard'
  | 'regexp';

export type ProductSort = 'relevance' | 'price_asc' | 'price_desc' | 'newest' | 'popular' | 'rating';

export type MoreLikeThisOptions = {
  fields: string[];
  likeTexts?: string[];
  likeDocs?: Array<{ _index?: string; _id: string }>;
  minTermFreq?: number;
  maxQueryTerms?: number;
  minDocFreq?: number;
};

const PRODUCT_SEARCH_FIELDS = ['name^3', 'description^2', 'category^1.5', 'brand^1.2', 'tags^1', 'sku'];

const SORT_OPTIONS: Record<ProductSort, SortOption[]> = {
  relevance: [],
  price_asc: [{ field: 'price', order: 'asc' }],
  price_desc: [{ field: 'price', order: 'desc' }],
  newest: [{ field: 'created_at', order: 'desc' }],
  popular: [{ field: 'view_count', order: 'desc' }],
  rating: [{ field: 'average_rating', order: 'desc' }],
};

function isProductSort(value: string): value is ProductSort {
  return Object.prototype.hasOwnProperty.call(SORT_OPTIONS, value);
}

function assertCoordinates(lat: number, lon: number): void {
  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new SearchQueryError(`Latitude must be between -90 and 90, got ${lat}`);
  }
  if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
    throw new SearchQueryError(`Longitude must be between -180 and 180, got ${lon}`);
  }
}

/**
 * Builders for the query DSL used by the catalog: product search with
 * filters, facets, suggestions, range/geo clauses and aggregations.
 */
export class QueryBuilder {
  static buildProductSearchQuery(options: ProductQueryOptions = {}): QueryClause {
    const must: QueryClause[] = [];
    const filter: QueryClause[] = [];

    if (options.text) {
      must.push({
        multi_match: {
          query: options.text,
          fields: PRODUCT_SEARCH_FIELDS,
          fuzziness: DEFAULT_FUZZINESS,
          minimum_should_match: DEFAULT_MIN_SHOULD_MATCH,
          type: 'best_fields',
        },
      });
    }

    if (options.category) {
      filter.push({ term: { 'category.keyword': options.category } });
    }

    if (options.priceRange) {
      const [min, max] = options.priceRange;
      filter.push({ range: { price: { gte: min, lte: max } } });
    }

    if (options.brand) {
      filter.push(
        Array.isArray(options.brand)
          ? { terms: { 'brand.keyword': options.brand } }
          : { term: { 'brand.keyword': options.brand } },
      );
    }

    if (options.inStock ?? true) {
      filter.push({ range: { stock: { gt: 0 } } });
    }

    for (const [field, value] of Object.entries(options.filters ?? {})) {
      filter.push(Array.isArray(value) ? { terms: { [`${field}.keyword`]: value } } : { term: { [`${field}.keyword`]: value } });
    }

    for (const [name, value] of Object.entries(options.attributes ?? {})) {
      filter.push({
        nested: {
          path: 'attributes',
          query: {
            bool: {
              must: [{ term: { 'attributes.name.keyword': name } }, { term: { 'attributes.value.keyword': value } }],
            },
          },
        },
      });
    }

    if (!must.length && !filter.length) return { match_all: {} };

    const bool: JsonObject = {};
    if (must.length) bool.must = must;
    if (filter.length) bool.filter = filter;
    return { bool };
  }

  static buildProductFacets(): JsonObject {
    return {
      categories: { terms: { field: 'category.keyword', size: 10, order: { _count: 'desc' } } },
      brands: { terms: { field: 'brand.keyword', size: 10, order: { _count: 'desc' } } },
      price_ranges: {
        range: {
          field: 'price',
          ranges: [
            { key: 'Under 1000', to: 1000 },
            { key: '1000 - 5000', from: 1000, to: 5000 },
            { key: '5000 - 10000', from: 5000, to: 10000 },
            { key: '10000 - 20000', from: 10000, to: 20000 },
            { key: 'Above 20000', from: 20000 },
          ],
        },
      },
      ratings: {
        histogram: { field: 'average_rating', interval: 1, extended_bounds: { min: 0, max: 5 } },
      },
    };
  }

  static buildAutocompleteQuery(field: string, prefix: string, size = 5): JsonObject {
    return {
      suggest: {
        autocomplete: {
          prefix,
          completion: {
            field: `${field}.suggest`,
            size,
            skip_duplicates: true,
            fuzzy: { fuzziness: 1, min_length: 3, prefix_length: 1 },
          },
        },
      },
      _source: false,
    };
  }

  static buildFilterQuery(field: string, operator: FilterOperator, value?: unknown): QueryClause {
    switch (operator) {
      case 'eq':
        return { term: { [field]: value } };
      case 'ne':
        return { bool: { must_not: [{ term: { [field]: value } }] } };
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte':
        return { range: { [field]: { [operator]: value } } };
      case 'in':
        return { terms: { [field]: Array.isArray(value) ? value : [value] } };
      case 'range':
        if (!Array.isArray(value) || value.length !== 2) {
          throw new SearchQueryError('Range operator requires a [min, max] pair');
        }
        return { range: { [field]: { gte: value[0], lte: value[1] } } };
      case 'exists':
        return { exists: { field } };
      case 'missing':
        return { bool: { must_not: [{ exists: { field } }] } };
      case 'prefix':
      case 'wildcard':
      case 'regexp':
        return { [operator]: { [field]: value } };
      default:
        throw new SearchQueryError(`Invalid operator: ${String(operator)}`);
    }
  }

  static buildFuzzyQuery(field: string, value: string, fuzziness: string | number = DEFAULT_FUZZINESS): QueryClause {
    return { fuzzy: { [field]: { value, fuzziness } } };
  }

  static buildDateRangeQuery(field: string, start?: Date, end?: Date, timeZone = 'UTC'): QueryClause {
    const range: JsonObject = { time_zone: timeZone };
    if (start) range.gte = start.toISOString();
    if (end) range.lte = end.toISOString();
    return { range: { [field]: range } };
  }

  static buildRecentDocumentsQuery(field = 'created_at', days = 30, now: Date = new Date()): QueryClause {
    const cutoff = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
    return { range: { [field]: { gte: cutoff.toISOString(), time_zone: 'UTC' } } };
  }

  static buildGeoDistanceQuery(field: string, lat: number, lon: number, distance = '10km'): QueryClause {
    assertCoordinates(lat, lon);
    return { geo_distance: { distance, [field]: { lat, lon } } };
  }

  static buildGeoDistanceSort(field: string, lat: number, lon: number, unit = 'km'): JsonObject {
    assertCoordinates(lat, lon);
    return { _geo_distance: { [field]: { lat, lon }, order: 'asc', unit } };
  }

  static buildAggregationQuery(aggregations: JsonObject, query?: QueryClause): JsonObject {
    const body: JsonObject = { aggs: aggregations, size: 0 };
    if (query) body.query = query;
    return body;
  }

  static buildScoringQuery(baseQuery: QueryClause, functions: JsonObject[]): QueryClause {
    return {
      function_score: {
        query: baseQuery,
        functions,
        score_mode: 'multiply',
        boost_mode: 'multiply',
      },
    };
  }

  static buildMoreLikeThisQuery(options: MoreLikeThisOptions): QueryClause {
    const like: Array<string | { _index?: string; _id: string }> = [...(options.likeTexts ?? []), ...(options.likeDocs ?? [])];
    const mlt: JsonObject = {
      fields: options.fields,
      min_term_freq: options.minTermFreq ?? 1,
      max_query_terms: options.maxQueryTerms ?? 12,
      min_doc_freq: options.minDocFreq ?? 1,
      min_word_length: 3,
    };
    if (like.length) mlt.like = like;
    return { more_like_this: mlt };
  }

  static getSortOption(sortBy: string): SortOption[] {
    return isProductSort(sortBy) ? SORT_OPTIONS[sortBy] : [];
  }
}
