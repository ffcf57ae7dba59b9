import {
  extractAwsRegion,
  getOpenSearchConfig,
  loadConfigFromEnv,
  normalizeHost,
  parseHeaders,
  resolveConfig,
} from '../config';
import { ConfigurationError } from '../errors';
import { silentLogger } from '../services/Logger';

describe('config', () => {
  describe('normalizeHost', () => {
    it('should add a scheme matching the SSL setting', () => {
      expect(normalizeHost('localhost:9200')).toBe('https://localhost:9200');
      expect(normalizeHost('localhost:9200', false)).toBe('http://localhost:9200');
    });

    it('should keep an explicit scheme and drop trailing slashes', () => {
      expect(normalizeHost(' http://node-1:9200/ ')).toBe('http://node-1:9200');
    });
  });

  describe('extractAwsRegion', () => {
    it('should read the region from managed domain endpoints', () => {
      expect(extractAwsRegion('https://search-shop-abc123.eu-west-1.es.amazonaws.com')).toBe('eu-west-1');
      expect(extractAwsRegion('abc123.us-west-2.aoss.amazonaws.com:443')).toBe('us-west-2');
    });

    it('should fall back to the default region', () => {
      expect(extractAwsRegion('https://search.example.com')).toBe('us-east-1');
    });
  });

  describe('resolveConfig', () => {
    it('should apply defaults', () => {
      const config = resolveConfig({ hosts: ['localhost:9200'] }, silentLogger);

      expect(config).toEqual({
        hosts: ['https://localhost:9200'],
        useSsl: true,
        verifyCerts: true,
        timeoutMs: 30_000,
        maxRetries: 3,
        retryOnTimeout: true,
        retryBackoffMs: 1000,
        connectionPoolSize: 10,
        sniffOnStart: false,
        sniffOnConnectionFault: false,
        headers: {},
        cache: { enabled: false, ttlSeconds: 60 },
      });
    });

    it('should detect the AWS region and service from the endpoint', () => {
      const managed = resolveConfig({ hosts: ['search-shop.eu-central-1.es.amazonaws.com'] }, silentLogger);
      const serverless = resolveConfig({ hosts: ['https://abc123.us-west-2.aoss.amazonaws.com'] }, silentLogger);

      expect(managed.aws).toEqual({ region: 'eu-central-1', service: 'es' });
      expect(serverless.aws).toEqual({ region: 'us-west-2', service: 'aoss' });
    });

    it('should keep an explicit region and credentials', () => {
      const config = resolveConfig(
        {
          hosts: ['search-shop.eu-central-1.es.amazonaws.com'],
          aws: { region: 'eu-north-1', accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
        },
        silentLogger,
      );

      expect(config.aws).toEqual({ region: 'eu-north-1', service: 'es', accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
    });

    it('should not configure AWS for self-managed clusters', () => {
      expect(resolveConfig({ hosts: ['localhost:9200'] }, silentLogger).aws).toBeUndefined();
    });

    it('should reject invalid settings', () => {
      expect(() => resolveConfig({ hosts: [] }, silentLogger)).toThrow(ConfigurationError);
      expect(() => resolveConfig({ hosts: [] }, silentLogger)).toThrow('Configuration error: hosts: At least one host is required');
      expect(() => resolveConfig({ hosts: ['localhost'], maxRetries: -1 }, silentLogger)).toThrow(/maxRetries/);
    });
  });

  describe('parseHeaders', () => {
    it('should turn prefixed variables into header names', () => {
      expect(parseHeaders({ OPENSEARCH_HEADER_X_TENANT_ID: 'acme', OPENSEARCH_HOSTS: 'localhost' })).toEqual({
        'X-Tenant-Id': 'acme',
      });
    });
  });

  describe('loadConfigFromEnv', () => {
    it('should read connection settings from the environment', () => {
      const config = loadConfigFromEnv(
        {
          OPENSEARCH_HOSTS: 'node-1:9200, node-2:9200',
          OPENSEARCH_USERNAME: 'admin',
          OPENSEARCH_PASSWORD: 'test-secret',
          OPENSEARCH_USE_SSL: 'false',
          OPENSEARCH_TIMEOUT: '5',
          OPENSEARCH_MAX_RETRIES: '1',
          OPENSEARCH_RETRY_ON_TIMEOUT: 'false',
          OPENSEARCH_INDEX_PREFIX: 'shop',
          OPENSEARCH_HEADER_X_TENANT_ID: 'acme',
        },
        silentLogger,
      );

      expect(config).toMatchObject({
        hosts: ['http://node-1:9200', 'http://node-2:9200'],
        auth: { username: 'admin', password: 'test-secret' },
        useSsl: false,
        timeoutMs: 5000,
        maxRetries: 1,
        retryOnTimeout: false,
        indexPrefix: 'shop',
        headers: { 'X-Tenant-Id': 'acme' },
      });
      expect(config.aws).toBeUndefined();
    });

    it('should use the AWS endpoint and credentials when no hosts are set', () => {
      const config = loadConfigFromEnv(
        {
          AWS_OPENSEARCH_ENDPOINT: 'https://search-shop.eu-central-1.es.amazonaws.com',
          AWS_ACCESS_KEY_ID: 'test-key',
          AWS_SECRET_ACCESS_KEY: 'test-secret',
        },
        silentLogger,
      );

      expect(config.hosts).toEqual(['https://search-shop.eu-central-1.es.amazonaws.com']);
      expect(config.aws).toEqual({
        region: 'eu-central-1',
        service: 'es',
        accessKeyId: 'test-key',
        secretAccessKey: 'test-secret',
      });
    });

    it('should default to a local node and warn', () => {
      const warn = jest.fn();
      const config = loadConfigFromEnv({}, { ...silentLogger, warn });

      expect(config.hosts).toEqual(['https://localhost:9200']);
      expect(warn).toHaveBeenCalledWith('No OpenSearch hosts configured, using localhost:9200');
    });

    it('should reject non-numeric numbers', () => {
      expect(() => loadConfigFromEnv({ OPENSEARCH_TIMEOUT: 'soon' }, silentLogger)).toThrow(
        "Configuration error: OPENSEARCH_TIMEOUT must be an integer, got 'soon'",
      );
    });
  });

  describe('getOpenSearchConfig', () => {
    it('should prefer explicit hosts over the environment', () => {
      const config = getOpenSearchConfig({ hosts: ['search.internal:9200'], useSsl: false, indexPrefix: 'test' }, silentLogger);

      expect(config.hosts).toEqual(['http://search.internal:9200']);
      expect(config.indexPrefix).toBe('test');
    });
  });
});
