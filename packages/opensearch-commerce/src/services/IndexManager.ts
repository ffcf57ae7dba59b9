import { RESOURCE_EXISTS_ERROR } from '../constants';
import { ResourceExistsError, describeError, getErrorType, wrapOpenSearchError } from '../errors';
import type { IndexMappings, IndexSettings, JsonObject, QueryClause } from '../types/Search';
import { indexMappingsToBody, indexSettingsToBody } from '../types/Search';
import { validateIndexName } from '../utils';
import { consoleLogger, type Logger } from './Logger';
import type { Transport, TransportRequest } from './Transport';

export type CreateIndexOptions = {
  mappings?: IndexMappings;
  settings?: IndexSettings;
  aliases?: Record<string, JsonObject>;
};

export type IndexTemplateOptions = {
  patterns: string[];
  settings?: IndexSettings;
  mappings?: IndexMappings;
  priority?: number;
  meta?: JsonObject;
};

export type ReindexOptions = {
  query?: QueryClause;
  batchSize?: number;
  waitForCompletion?: boolean;
};

export type ReindexResult = {
  total: number;
  created: number;
  updated: number;
  failures: unknown[];
  /** present when the reindex runs as a background task */
  task?: string;
};

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(body: JsonObject, key: string): number {
  const value = body[key];
  return typeof value === 'number' ? value : 0;
}

function acknowledged(body: unknown): boolean {
  return isObject(body) && body.acknowledged === true;
}

function noShardFailures(body: unknown): boolean {
  const shards = isObject(body) ? body._shards : undefined;
  return isObject(shards) && numberField(shards, 'failed') === 0;
}

function indexPath(index: string, suffix = ''): string {
  return `/${encodeURIComponent(index)}${suffix}`;
}

/** UTC `YYYY.MM.DD`. */
export function timeSeriesSuffix(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${date.getUTCFullYear()}.${month}.${day}`;
}

/**
 * Index lifecycle helpers: creation with defaults, time series indices,
 * aliases, templates, reindexing and force merges.
 *
 * Every index and alias name passes through `resolveName` first; the client
 * hands in its prefixing so these calls address the same indices it does.
 */
export class IndexManager {
  constructor(
    private readonly transport: Transport,
    private readonly logger: Logger = consoleLogger,
    private readonly resolveName: (name: string) => string = name => name,
  ) {}

  async createIndexWithSettings(name: string, options: CreateIndexOptions = {}): Promise<boolean> {
    const index = this.resolveName(name);
    validateIndexName(index);

    const body: JsonObject = { settings: indexSettingsToBody(options.settings) };
    if (options.mappings) body.mappings = indexMappingsToBody(options.mappings);
    if (options.aliases) {
      const aliases: JsonObject = {};
      for (const [alias, definition] of Object.entries(options.aliases)) {
        aliases[this.resolveName(alias)] = definition;
      }
      body.aliases = aliases;
    }

    try {
      const response = await this.transport.request({ method: 'PUT', path: indexPath(index), body });
      const ok = acknowledged(response.body);
      if (ok) {
        this.logger.info(`Index '${index}' created successfully`);
      } else {
        this.logger.warn(`Index '${index}' creation not acknowledged`);
      }
      return ok;
    } catch (error) {
      if (
        error instanceof ResourceExistsError ||
        getErrorType(error) === RESOURCE_EXISTS_ERROR ||
        describeError(error).includes('resource_already_exists')
      ) {
        this.logger.warn(`Index '${index}' already exists`);
        return true;
      }
      throw wrapOpenSearchError(error, `Failed to create index '${index}'`, { index });
    }
  }

  async createTimeSeriesIndex(
    prefix: string,
    options: { mappings?: IndexMappings; settings?: IndexSettings; now?: Date } = {},
  ): Promise<string> {
    const index = this.resolveName(`${prefix}-${timeSeriesSuffix(options.now ?? new Date())}`);
    const alias = this.resolveName(prefix);
    const created = await this.createIndexWithSettings(index, { mappings: options.mappings, settings: options.settings });
    if (!created) return '';

    await this.createAlias(alias, index);
    this.logger.info(`Time-series index '${index}' created with alias '${alias}'`);
    return index;
  }

  async createAlias(aliasName: string, indexName: string, options: { filter?: QueryClause; routing?: string } = {}): Promise<boolean> {
    const alias = this.resolveName(aliasName);
    const index = this.resolveName(indexName);
    const add: JsonObject = { index, alias };
    if (options.filter) add.filter = options.filter;
    if (options.routing) add.routing = options.routing;
    return this.updateAliases([{ add }], `Failed to create alias '${alias}' for index '${index}'`, index);
  }

  async removeAlias(aliasName: string, indexName: string): Promise<boolean> {
    const alias = this.resolveName(aliasName);
    const index = this.resolveName(indexName);
    return this.updateAliases([{ remove: { index, alias } }], `Failed to remove alias '${alias}' from index '${index}'`, index);
  }

  /** Moves `alias` from one index to another in a single request. */
  async swapAlias(aliasName: string, from: string, to: string): Promise<boolean> {
    const alias = this.resolveName(aliasName);
    const fromIndex = this.resolveName(from);
    const toIndex = this.resolveName(to);
    return this.updateAliases(
      [{ remove: { index: fromIndex, alias } }, { add: { index: toIndex, alias } }],
      `Failed to move alias '${alias}' from '${fromIndex}' to '${toIndex}'`,
      toIndex,
    );
  }

  async getIndexAliases(name: string): Promise<string[]> {
    const index = this.resolveName(name);
    const body = await this.call({ method: 'GET', path: indexPath(index, '/_alias') }, `Failed to get aliases for index '${index}'`, index);
    if (!isObject(body)) return [];

    const aliases: string[] = [];
    for (const entry of Object.values(body)) {
      if (isObject(entry) && isObject(entry.aliases)) {
        aliases.push(...Object.keys(entry.aliases));
      }
    }
    return aliases;
  }

  async putIndexTemplate(name: string, options: IndexTemplateOptions): Promise<boolean> {
    const template: JsonObject = { settings: indexSettingsToBody(options.settings) };
    if (options.mappings) template.mappings = indexMappingsToBody(options.mappings);

    const body: JsonObject = {
      index_patterns: options.patterns.map(pattern => this.resolveName(pattern)),
      template,
      priority: options.priority ?? 100,
    };
    if (options.meta) body._meta = options.meta;

    const response = await this.call(
      { method: 'PUT', path: `/_index_template/${encodeURIComponent(name)}`, body },
      `Failed to put index template '${name}'`,
    );
    return acknowledged(response);
  }

  async reindex(sourceName: string, destName: string, options: ReindexOptions = {}): Promise<ReindexResult> {
    const source = this.resolveName(sourceName);
    const dest = this.resolveName(destName);
    const sourceBody: JsonObject = { index: source, size: options.batchSize ?? 1000 };
    if (options.query) sourceBody.query = options.query;

    const body = await this.call(
      {
        method: 'POST',
        path: '/_reindex',
        body: { source: sourceBody, dest: { index: dest } },
        querystring: { wait_for_completion: options.waitForCompletion ?? true },
      },
      `Reindex failed from '${source}' to '${dest}'`,
      source,
    );

    const response: JsonObject = isObject(body) ? body : {};
    const result: ReindexResult = {
      total: numberField(response, 'total'),
      created: numberField(response, 'created'),
      updated: numberField(response, 'updated'),
      failures: Array.isArray(response.failures) ? response.failures : [],
    };
    if (typeof response.task === 'string') result.task = response.task;

    this.logger.info(
      `Reindex from '${source}' to '${dest}' completed: ${result.total} total, ${result.created} created, ${result.updated} updated`,
    );
    return result;
  }

  async optimizeIndex(
    name: string,
    options: { maxNumSegments?: number; onlyExpungeDeletes?: boolean; flush?: boolean } = {},
  ): Promise<boolean> {
    const index = this.resolveName(name);
    const onlyExpungeDeletes = options.onlyExpungeDeletes ?? false;
    const body = await this.call(
      {
        method: 'POST',
        path: indexPath(index, '/_forcemerge'),
        querystring: {
          // the cluster rejects max_num_segments together with only_expunge_deletes
          max_num_segments: onlyExpungeDeletes ? undefined : options.maxNumSegments ?? 1,
          only_expunge_deletes: onlyExpungeDeletes,
          flush: options.flush ?? true,
        },
      },
      `Failed to optimize index '${index}'`,
      index,
    );
    const ok = noShardFailures(body);
    if (ok) this.logger.info(`Index '${index}' optimized`);
    return ok;
  }

  private async updateAliases(actions: JsonObject[], context: string, index: string): Promise<boolean> {
    const body = await this.call({ method: 'POST', path: '/_aliases', body: { actions } }, context, index);
    return acknowledged(body);
  }

  private async call(request: TransportRequest, context: string, index?: string): Promise<unknown> {
    try {
      const response = await this.transport.request(request);
      return response.body;
    } catch (error) {
      this.logger.error(`${context}: ${describeError(error)}`);
      throw wrapOpenSearchError(error, context, { index });
    }
  }
}
