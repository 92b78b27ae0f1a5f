import { vi } from 'vitest';
import type { z } from 'zod';
import type { HttpTransport } from '@libs/http-client-core';
import { DataApi } from '../dataApi';
import { strikeSchema, type Strike } from '../responses';

/** A parsed record of `schema` with every field zeroed except `values`. */
export function recordOf<S extends z.AnyZodObject>(schema: S, values: Record<string, unknown>): z.output<S> {
  const zeroed: Record<string, unknown> = {};
  for (const key of Object.keys(schema.shape)) {
    zeroed[key] = 0;
  }
  return schema.parse({ ...zeroed, ...values });
}

export function strikeOf(values: Record<string, unknown>): Strike {
  return recordOf(strikeSchema, {
    ticker: 'IBM',
    tradeDate: '2022-07-05',
    expirDate: '2022-07-15',
    updatedAt: '2022-07-05T20:00:00Z',
    ...values,
  });
}

export function envelope(data: readonly unknown[]): Response {
  return new Response(JSON.stringify({ data }), { status: 200 });
}

/** A DataApi whose transport answers every call through `respond`. */
export function apiWith(respond: (url: URL, init: RequestInit) => Response | Promise<Response>) {
  const transport = vi.fn<HttpTransport>(async (url, init) => respond(new URL(url), init));
  const api = new DataApi({ token: 'test-token', baseUrl: 'https://api.test/datav2', transport, env: {} });
  return { api, transport };
}
