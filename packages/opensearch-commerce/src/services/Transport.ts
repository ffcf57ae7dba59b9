import { Client, type ClientOptions } from '@opensearch-project/opensearch';
import { AwsSigv4Signer } from '@opensearch-project/opensearch/aws';
import { defaultProvider } from '@aws-sdk/credential-provider-node';
import type { AwsConfig, OpenSearchConfig } from '../config';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD';

export type TransportRequest = {
  method: HttpMethod;
  path: string;
  body?: Record<string, unknown>;
  /** NDJSON lines for `_bulk` */
  bulkBody?: Array<Record<string, unknown>>;
  querystring?: Record<string, string | number | boolean | undefined>;
  /** status codes returned as responses instead of thrown */
  ignore?: number[];
};

export type TransportResponse = {
  statusCode: number;
  body: unknown;
};

/** The seam between the client and the wire. Tests swap in an in-memory fake. */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

function credentialsProvider(aws: AwsConfig) {
  const { accessKeyId, secretAccessKey, sessionToken } = aws;
  if (accessKeyId && secretAccessKey) {
    return () => Promise.resolve({ accessKeyId, secretAccessKey, sessionToken });
  }
  const chain = defaultProvider();
  return () => chain();
}

export function buildClientOptions(config: OpenSearchConfig): ClientOptions {
  const options: ClientOptions = {
    nodes: config.hosts,
    requestTimeout: config.timeoutMs,
    // retries are handled by ErrorHandler.withRetry so the backoff and the timeout rule apply
    maxRetries: 0,
    sniffOnStart: config.sniffOnStart,
    sniffOnConnectionFault: config.sniffOnConnectionFault,
    sniffInterval: config.sniffIntervalMs ?? false,
    headers: config.headers,
    agent: { keepAlive: true, maxSockets: config.connectionPoolSize },
  };

  if (!config.verifyCerts) {
    options.ssl = { rejectUnauthorized: false };
  }

  if (config.aws) {
    return {
      ...options,
      ...AwsSigv4Signer({
        region: config.aws.region,
        service: config.aws.service,
        getCredentials: credentialsProvider(config.aws),
      }),
    };
  }

  if (config.auth) {
    options.auth = { username: config.auth.username, password: config.auth.password };
  }
  return options;
}

function toQuerystring(query: TransportRequest['querystring']): Record<string, string | number | boolean> | undefined {
  if (!query) return undefined;
  const defined: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) defined[key] = value;
  }
  return defined;
}

export class OpenSearchTransport implements Transport {
  private readonly client: Client;

  constructor(config: OpenSearchConfig, client?: Client) {
    this.client = client ?? new Client(buildClientOptions(config));
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.client.transport.request(
      {
        method: request.method,
        path: request.path,
        body: request.body,
        bulkBody: request.bulkBody,
        querystring: toQuerystring(request.querystring),
      },
      request.ignore ? { ignore: request.ignore } : undefined,
    );
    return { statusCode: response.statusCode ?? 0, body: response.body };
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
