import { describe, expect, it, vi } from 'vitest';
import type { HttpTransport } from '@libs/http-client-core';
import {
  OratsAuthenticationError,
  OratsNetworkError,
  OratsNotFoundError,
  OratsPermissionError,
  OratsRateLimitError,
  OratsRequestError,
  OratsResponseParseError,
} from '../errors';
import { OratsClient, createOratsClientFromEnv, type OratsClientConfig } from '../oratsClient';
import { tickerSchema } from '../responses';

const IBM = { ticker: 'IBM', min: '2007-01-03', max: '2022-07-05' };

const jsonResponse = (data: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(data), { status: 200, ...init });

function clientWith(transport: HttpTransport, overrides: OratsClientConfig = {}) {
  return new OratsClient({
    token: 'test-token',
    baseUrl: 'https://api.test/datav2',
    transport,
    env: {},
    ...overrides,
  });
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the request to fail');
}

describe('OratsClient requests', () => {
  it('sends the token and sorted params on a GET', async () => {
    const transport = vi.fn<HttpTransport>(async () => jsonResponse({ data: [IBM] }));
    const client = clientWith(transport);

    const records = await client.get('tickers', { ticker: 'IBM' }, tickerSchema);

    expect(records).toEqual([IBM]);
    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(transport).toHaveBeenCalledTimes(1);
    const [url, init] = transport.mock.calls[0] ?? [];
    expect(url).toBe('https://api.test/datav2/tickers?ticker=IBM&token=test-token');
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeNull();
  });

  it('sends a JSON body on a POST', async () => {
    const transport = vi.fn<HttpTransport>(async () => jsonResponse({ data: [] }));
    const client = clientWith(transport);

    await client.post('strikes/options', [{ ticker: 'IBM', expirDate: '2022-09-16', strike: 125 }], tickerSchema);

    const [url, init] = transport.mock.calls[0] ?? [];
    expect(url).toBe('https://api.test/datav2/strikes/options?token=test-token');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('[{"ticker":"IBM","expirDate":"2022-09-16","strike":125}]');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
  });

  it('treats a missing data array as no records', async () => {
    const client = clientWith(async () => jsonResponse({}));

    await expect(client.get('tickers', undefined, tickerSchema)).resolves.toEqual([]);
  });
});

describe('OratsClient errors', () => {
  it('maps 401 to an authentication error', async () => {
    const client = clientWith(async () => new Response('invalid token', { status: 401 }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsAuthenticationError);
    expect(error).toMatchObject({ status: 401, responseBody: 'invalid token' });
  });

  it('maps 403 to a permission error', async () => {
    const client = clientWith(async () => new Response('Forbidden', { status: 403 }));

    const error = await rejectionOf(client.get('cores', { ticker: 'IBM' }, tickerSchema));

    expect(error).toBeInstanceOf(OratsPermissionError);
    expect(error).toMatchObject({
      status: 403,
      responseBody: 'Forbidden',
      message: 'ORATS request to cores failed with status 403',
    });
  });

  it('reads Retry-After on 429', async () => {
    const client = clientWith(
      async () => new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } }),
    );

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsRateLimitError);
    expect(error).toMatchObject({ status: 429, retryAfterMs: 2000 });
  });

  it('maps 5xx to a network error', async () => {
    const client = clientWith(async () => new Response('bad gateway', { status: 502 }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsNetworkError);
    expect(error).toMatchObject({ status: 502 });
  });

  it('wraps transport failures', async () => {
    const client = clientWith(async () => {
      throw new Error('socket hang up');
    });

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsNetworkError);
    expect(error).toMatchObject({ status: 0, message: 'ORATS request to tickers failed: socket hang up' });
  });

  it('wraps a body that fails mid-read', async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error('connection reset'));
      },
    });
    const client = clientWith(async () => new Response(body, { status: 200 }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsNetworkError);
    expect(error).toMatchObject({
      status: 200,
      message: 'ORATS response from tickers could not be read: connection reset',
    });
  });

  it('keeps other statuses as plain request errors', async () => {
    const client = clientWith(async () => new Response('bad request', { status: 400 }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsRequestError);
    expect(error).not.toBeInstanceOf(OratsNetworkError);
    expect(error).toMatchObject({ status: 400 });
  });

  it('surfaces an upstream message in a 200 envelope', async () => {
    const client = clientWith(async () => jsonResponse({ message: 'Invalid ticker' }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsRequestError);
    expect(error).toMatchObject({ status: 200, message: 'ORATS rejected the request to tickers: Invalid ticker' });
  });

  it('rejects bodies that are not JSON', async () => {
    const client = clientWith(async () => new Response('<html>', { status: 200 }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsResponseParseError);
    expect(error).toMatchObject({ resource: 'tickers' });
    expect(error instanceof Error && error.message.startsWith('ORATS response for tickers is not valid JSON')).toBe(
      true,
    );
  });

  it('rejects empty bodies', async () => {
    const client = clientWith(async () => new Response('', { status: 200 }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsResponseParseError);
    expect(error).toMatchObject({ message: 'ORATS response for tickers was empty' });
  });

  it('rejects records of the wrong shape', async () => {
    const client = clientWith(async () => jsonResponse({ data: [{ ...IBM, min: '01/03/2007' }] }));

    const error = await rejectionOf(client.get('tickers', undefined, tickerSchema));

    expect(error).toBeInstanceOf(OratsResponseParseError);
    expect(error).toMatchObject({
      message: 'ORATS response for tickers has an unexpected shape at data.0.min: expected a YYYY-MM-DD date',
    });
  });
});

describe('OratsClient logging and metrics', () => {
  it('warns when falling back to the demo token', () => {
    const warn = vi.fn();

    const client = new OratsClient({ transport: async () => jsonResponse({ data: [] }), env: {}, logger: { warn } });

    expect(client.token).toBe('demo');
    expect(client.tokenSource).toBe('default');
    expect(warn).toHaveBeenCalledWith(
      '[OratsClient] No API token configured; using the "demo" token, which only covers sample symbols',
    );
  });

  it('logs requests and failures', async () => {
    const debug = vi.fn();
    const warn = vi.fn();
    const client = clientWith(async () => new Response('not found', { status: 404 }), { logger: { debug, warn } });

    await expect(client.get('tickers', undefined, tickerSchema)).rejects.toBeInstanceOf(OratsNotFoundError);

    expect(debug).toHaveBeenCalledWith('[OratsClient] GET tickers');
    expect(warn).toHaveBeenCalledWith('[OratsClient] GET tickers failed', { name: 'OratsNotFoundError', status: 404 });
  });

  it('logs and records responses that fail to parse', async () => {
    const warn = vi.fn();
    const recordRequest = vi.fn();
    const client = clientWith(async () => new Response('<html>', { status: 200 }), {
      logger: { warn },
      metrics: { recordRequest },
    });

    await expect(client.get('tickers', undefined, tickerSchema)).rejects.toBeInstanceOf(OratsResponseParseError);

    expect(warn).toHaveBeenCalledWith('[OratsClient] GET tickers failed', {
      name: 'OratsResponseParseError',
      status: 200,
    });
    expect(recordRequest).toHaveBeenCalledWith(expect.objectContaining({ operation: 'tickers', status: 200 }));
  });

  it('records one metric per request', async () => {
    const recordRequest = vi.fn();
    const client = clientWith(async () => jsonResponse({ data: [IBM] }), { metrics: { recordRequest } });

    await client.get('tickers', undefined, tickerSchema);

    expect(recordRequest).toHaveBeenCalledTimes(1);
    expect(recordRequest).toHaveBeenCalledWith({
      client: 'orats',
      operation: 'tickers',
      method: 'GET',
      durationMs: expect.any(Number),
      status: 200,
    });
  });
});

describe('createOratsClientFromEnv', () => {
  it('reads the token and base URL from the environment', () => {
    const client = createOratsClientFromEnv({
      env: { ORATS_API_TOKEN: 'env-token', ORATS_BASE_URL: 'https://env.test/datav2' },
    });

    expect(client.token).toBe('env-token');
    expect(client.tokenSource).toBe('environment');
    expect(client.baseUrl).toBe('https://env.test/datav2');
  });

  it('lets overrides win', () => {
    const client = createOratsClientFromEnv({
      token: 'test-token',
      baseUrl: 'https://override.test',
      env: { ORATS_API_TOKEN: 'env-token', ORATS_BASE_URL: 'https://env.test/datav2' },
    });

    expect(client.token).toBe('test-token');
    expect(client.baseUrl).toBe('https://override.test');
  });

  it('defaults to the public base URL', () => {
    expect(createOratsClientFromEnv({ env: {} }).baseUrl).toBe('https://api.orats.io/datav2');
  });
});
