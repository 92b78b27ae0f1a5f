import type { z } from 'zod';
import {
  buildUrl,
  defaultTransport,
  type HttpTransport,
  type Logger,
  type MetricsSink,
  type QueryParams,
} from '@libs/http-client-core';
import {
  OratsError,
  OratsNetworkError,
  OratsRequestError,
  OratsResponseParseError,
  errorForStatus,
} from './errors';
import { envelopeOf } from './responses';
import { DEMO_TOKEN, resolveTokenWithSource, type TokenSource } from './token';

export const DEFAULT_BASE_URL = 'https://api.orats.io/datav2';
export const BASE_URL_ENV_VAR = 'ORATS_BASE_URL';

export interface OratsClientConfig {
  /** Falls back to `ORATS_API_TOKEN`, then to the demo token. */
  token?: string;
  baseUrl?: string;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
  /** Environment consulted for the token; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

type HttpMethod = 'GET' | 'POST';

/**
 * Low-level transport for the ORATS Data API.
 *
 * Attaches the token, maps non-success statuses onto the `Orats*Error`
 * hierarchy and validates the `{ data: [...] }` envelope against a record
 * schema. Endpoints decide the resource path; this class never rewrites it.
 * Nothing is retried or cached.
 */
export class OratsClient {
  readonly baseUrl: string;
  readonly token: string;
  readonly tokenSource: TokenSource;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly transport: HttpTransport;

  constructor(config: OratsClientConfig = {}) {
    const resolved = resolveTokenWithSource(config.token, config.env ?? process.env);
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.token = resolved.token;
    this.tokenSource = resolved.source;
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.transport = config.transport ?? defaultTransport;

    if (resolved.source === 'default') {
      this.logger?.warn?.(
        `[OratsClient] No API token configured; using the "${DEMO_TOKEN}" token, which only covers sample symbols`,
      );
    }
  }

  get<S extends z.ZodTypeAny>(
    resource: string,
    params: QueryParams | undefined,
    schema: S,
  ): Promise<readonly z.output<S>[]> {
    return this.request('GET', resource, params, undefined, schema);
  }

  post<S extends z.ZodTypeAny>(
    resource: string,
    body: unknown,
    schema: S,
    params?: QueryParams,
  ): Promise<readonly z.output<S>[]> {
    return this.request('POST', resource, params, body, schema);
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    resource: string,
    params: QueryParams | undefined,
    body: unknown,
    schema: S,
  ): Promise<readonly z.output<S>[]> {
    const url = buildUrl(this.baseUrl, resource, { ...params, token: this.token });
    const init: RequestInit = {
      method,
      headers: {
        Accept: 'application/json',
        ...(body === undefined ? undefined : { 'Content-Type': 'application/json' }),
      },
      body: body === undefined ? null : JSON.stringify(body),
    };

    this.logger?.debug?.(`[OratsClient] ${method} ${resource}`);
    const start = Date.now();

    let response: Response;
    try {
      response = await this.transport(url, init);
    } catch (error) {
      const failure = new OratsNetworkError(
        `ORATS request to ${resource} failed: ${error instanceof Error ? error.message : 'network error'}`,
      );
      await this.fail(method, resource, start, failure, failure.status);
      throw failure;
    }

    if (!response.ok) {
      const bodyText = await safeReadBody(response);
      const failure = errorForStatus(
        response.status,
        `ORATS request to ${resource} failed with status ${response.status}`,
        bodyText,
        parseRetryAfter(response),
      );
      await this.fail(method, resource, start, failure, failure.status);
      throw failure;
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const failure = new OratsNetworkError(
        `ORATS response from ${resource} could not be read: ${error instanceof Error ? error.message : 'network error'}`,
        response.status,
      );
      await this.fail(method, resource, start, failure, failure.status);
      throw failure;
    }

    let records: readonly z.output<S>[];
    try {
      records = parseRecords(text, response.status, resource, schema);
    } catch (error) {
      if (error instanceof OratsError) {
        await this.fail(method, resource, start, error, response.status);
      }
      throw error;
    }

    await this.metrics?.recordRequest?.({
      client: 'orats',
      operation: resource,
      method,
      durationMs: Date.now() - start,
      status: response.status,
    });
    return records;
  }

  private async fail(
    method: HttpMethod,
    resource: string,
    start: number,
    error: OratsError,
    status: number,
  ): Promise<void> {
    this.logger?.warn?.(`[OratsClient] ${method} ${resource} failed`, {
      name: error.name,
      status,
    });
    await this.metrics?.recordRequest?.({
      client: 'orats',
      operation: resource,
      method,
      durationMs: Date.now() - start,
      status,
    });
  }
}

function parseRecords<S extends z.ZodTypeAny>(
  text: string,
  status: number,
  resource: string,
  schema: S,
): readonly z.output<S>[] {
  if (!text.trim()) {
    throw new OratsResponseParseError(`ORATS response for ${resource} was empty`, resource);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new OratsResponseParseError(
      `ORATS response for ${resource} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      resource,
    );
  }

  const parsed = envelopeOf(schema).safeParse(payload);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new OratsResponseParseError(
      `ORATS response for ${resource} has an unexpected shape${where}: ${issue?.message ?? 'invalid payload'}`,
      resource,
      parsed.error.issues,
    );
  }

  const upstreamMessage = parsed.data.error ?? parsed.data.message;
  if (upstreamMessage) {
    throw new OratsRequestError(`ORATS rejected the request to ${resource}: ${upstreamMessage}`, status, text);
  }

  const records: z.output<S>[] = parsed.data.data ?? [];
  for (const record of records) {
    Object.freeze(record);
  }
  return Object.freeze(records);
}

function parseRetryAfter(res: Response): number | undefined {
  const header = res.headers.get('retry-after');
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : 0;
  }

  return undefined;
}

async function safeReadBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`;
  }
}

export function createOratsClientFromEnv(overrides: OratsClientConfig = {}): OratsClient {
  const env = overrides.env ?? process.env;
  return new OratsClient({
    ...overrides,
    env,
    baseUrl: overrides.baseUrl ?? env[BASE_URL_ENV_VAR] ?? DEFAULT_BASE_URL,
  });
}
