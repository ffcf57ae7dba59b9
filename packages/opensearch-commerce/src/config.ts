import dotenv from 'dotenv';
import { z } from 'zod';
import {
  AWS_SERVICE_NAME,
  AWS_SERVICE_NAME_AOSS,
  CONNECTION_POOL_SIZE,
  DEFAULT_AWS_REGION,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_TIMEOUT_MS,
  MAX_RETRIES,
  RETRY_ON_TIMEOUT,
} from './constants';
import { ConfigurationError } from './errors';
import { consoleLogger, type Logger } from './services/Logger';

const awsSchema = z.object({
  region: z.string().min(1).optional(),
  service: z.enum([AWS_SERVICE_NAME, AWS_SERVICE_NAME_AOSS]).optional(),
  accessKeyId: z.string().min(1).optional(),
  secretAccessKey: z.string().min(1).optional(),
  sessionToken: z.string().min(1).optional(),
});

export const configSchema = z.object({
  hosts: z.array(z.string().min(1)).min(1, 'At least one host is required'),
  auth: z.object({ username: z.string().min(1), password: z.string().min(1) }).optional(),
  useSsl: z.boolean().default(true),
  verifyCerts: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().min(0).default(MAX_RETRIES),
  retryOnTimeout: z.boolean().default(RETRY_ON_TIMEOUT),
  retryBackoffMs: z.number().int().positive().default(DEFAULT_RETRY_BACKOFF_MS),
  connectionPoolSize: z.number().int().positive().default(CONNECTION_POOL_SIZE),
  aws: awsSchema.optional(),
  sniffOnStart: z.boolean().default(false),
  sniffOnConnectionFault: z.boolean().default(false),
  sniffIntervalMs: z.number().int().positive().optional(),
  headers: z.record(z.string()).default({}),
  indexPrefix: z.string().optional(),
  cache: z
    .object({
      enabled: z.boolean().default(false),
      ttlSeconds: z.number().positive().default(60),
    })
    .default({}),
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      resetTimeoutMs: z.number().int().positive().default(30_000),
    })
    .optional(),
});

export type OpenSearchConfigInput = z.input<typeof configSchema>;

export type AwsConfig = {
  region: string;
  service: typeof AWS_SERVICE_NAME | typeof AWS_SERVICE_NAME_AOSS;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
};

export type OpenSearchConfig = Omit<z.output<typeof configSchema>, 'aws'> & { aws?: AwsConfig };

export function normalizeHost(host: string, useSsl = true): string {
  const trimmed = host.trim();
  const withScheme = /^https?:\/\//.test(trimmed) ? trimmed : `${useSsl ? 'https' : 'http'}://${trimmed}`;
  return withScheme.replace(/\/+$/, '');
}

/** `search-shop.eu-west-1.es.amazonaws.com` → `eu-west-1`. */
export function extractAwsRegion(host: string): string {
  const hostname = host.replace(/^https?:\/\//, '').split(/[/:]/)[0];
  const match = /\.([a-z]{2}(?:-[a-z]+)+-\d)\.(?:es|aoss)\.amazonaws\.com$/.exec(hostname);
  return match ? match[1] : DEFAULT_AWS_REGION;
}

export function resolveConfig(input: OpenSearchConfigInput, logger: Logger = consoleLogger): OpenSearchConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(detail, parsed.error);
  }

  const { aws, ...rest } = parsed.data;
  const hosts = rest.hosts.map(host => normalizeHost(host, rest.useSsl));
  const onAws = hosts.some(host => host.includes('.amazonaws.com'));

  let region = aws?.region;
  if (!region && onAws) {
    region = extractAwsRegion(hosts[0]);
    logger.info(`Auto-detected AWS region: ${region}`);
  }

  const config: OpenSearchConfig = { ...rest, hosts };
  if (region) {
    config.aws = {
      ...aws,
      region,
      service: aws?.service ?? (hosts.some(host => host.includes('aoss.')) ? AWS_SERVICE_NAME_AOSS : AWS_SERVICE_NAME),
    };
  }
  return config;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true';
}

function integer(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

const HEADER_PREFIX = 'OPENSEARCH_HEADER_';

/** `OPENSEARCH_HEADER_X_TENANT_ID=acme` → `{ 'X-Tenant-Id': 'acme' }` */
export function parseHeaders(env: NodeJS.ProcessEnv): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(HEADER_PREFIX) || value === undefined) continue;
    const name = key
      .slice(HEADER_PREFIX.length)
      .split('_')
      .filter(Boolean)
      .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
      .join('-');
    if (name) headers[name] = value;
  }
  return headers;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env, logger: Logger = consoleLogger): OpenSearchConfig {
  let hosts: string[];
  if (env.OPENSEARCH_HOSTS) {
    hosts = env.OPENSEARCH_HOSTS.split(',')
      .map(host => host.trim())
      .filter(Boolean);
  } else if (env.AWS_OPENSEARCH_ENDPOINT) {
    hosts = [env.AWS_OPENSEARCH_ENDPOINT];
  } else {
    hosts = ['localhost:9200'];
    logger.warn('No OpenSearch hosts configured, using localhost:9200');
  }

  const timeoutSeconds = integer('OPENSEARCH_TIMEOUT', env.OPENSEARCH_TIMEOUT);
  const hasAwsSettings = Boolean(env.AWS_REGION || env.AWS_ACCESS_KEY_ID);

  return resolveConfig(
    {
      hosts,
      auth:
        env.OPENSEARCH_USERNAME && env.OPENSEARCH_PASSWORD
          ? { username: env.OPENSEARCH_USERNAME, password: env.OPENSEARCH_PASSWORD }
          : undefined,
      useSsl: flag(env.OPENSEARCH_USE_SSL, true),
      verifyCerts: flag(env.OPENSEARCH_VERIFY_CERTS, true),
      retryOnTimeout: flag(env.OPENSEARCH_RETRY_ON_TIMEOUT, RETRY_ON_TIMEOUT),
      timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : undefined,
      maxRetries: integer('OPENSEARCH_MAX_RETRIES', env.OPENSEARCH_MAX_RETRIES),
      indexPrefix: env.OPENSEARCH_INDEX_PREFIX || undefined,
      aws: hasAwsSettings
        ? {
            region: env.AWS_REGION || undefined,
            accessKeyId: env.AWS_ACCESS_KEY_ID || undefined,
            secretAccessKey: env.AWS_SECRET_ACCESS_KEY || undefined,
            sessionToken: env.AWS_SESSION_TOKEN || undefined,
          }
        : undefined,
      headers: parseHeaders(env),
    },
    logger,
  );
}

/**
 * Configuration from explicit parameters when hosts are given, otherwise from
 * the environment (a local `.env` file is loaded first).
 */
export function getOpenSearchConfig(overrides: Partial<OpenSearchConfigInput> = {}, logger: Logger = consoleLogger): OpenSearchConfig {
  if (overrides.hosts && overrides.hosts.length > 0) {
    return resolveConfig({ ...overrides, hosts: overrides.hosts }, logger);
  }
  dotenv.config();
  return loadConfigFromEnv(process.env, logger);
}
