import { z } from 'zod';
import type { HttpTransport, Logger } from '@libs/http-client-core';
import { HISTORICAL_PREFIX } from '../endpoints';
import { today } from '../requests';
import {
  coreSchema,
  dailyPriceSchema,
  dividendHistorySchema,
  earningsHistorySchema,
  historicalVolatilitySchema,
  ivRankSchema,
  moneyForecastSchema,
  moneyImpliedSchema,
  stockSplitHistorySchema,
  strikeSchema,
  summarySchema,
  tickerSchema,
} from '../responses';

/**
 * Offline stand-in for the Data API. Every resource answers with records of
 * its real response shape, filled from a seeded generator, so the same
 * request always produces the same payload.
 */

const RESOURCE_SCHEMAS: Readonly<Record<string, z.AnyZodObject>> = {
  tickers: tickerSchema,
  strikes: strikeSchema,
  'strikes/options': strikeSchema,
  'monies/implied': moneyImpliedSchema,
  'monies/forecast': moneyForecastSchema,
  summaries: summarySchema,
  cores: coreSchema,
  dailies: dailyPriceSchema,
  hvs: historicalVolatilitySchema,
  divs: dividendHistorySchema,
  earnings: earningsHistorySchema,
  splits: stockSplitHistorySchema,
  ivrank: ivRankSchema,
};

export const SANDBOX_UNIVERSE: readonly string[] = ['AAPL', 'IBM', 'MSFT', 'SPY', 'TSLA'];

export interface SandboxOptions {
  /** Same seed, same payloads. Defaults to 1. */
  seed?: number;
  /** Records generated per ticker for list resources. Defaults to 3. */
  count?: number;
  /** Tickers served when a request names none. */
  universe?: readonly string[];
  /** Trade date used when a request carries none; defaults to today. */
  asOf?: string;
  logger?: Logger;
}

/** One option contract asked for by `strikes/options`. */
interface ContractQuery {
  ticker: string;
  expirDate?: string;
  strike?: number;
  tradeDate?: string;
}

interface RecordContext {
  ticker: string;
  index: number;
  tradeDate: string;
  expirDate?: string;
  strike?: number;
}

// Linear congruential generator; the sandbox needs repeatability, not quality.
function seededRandom(seed: number): () => number {
  let value = Math.abs(Math.trunc(seed)) % 233280;
  return () => {
    value = (value * 9301 + 49297) % 233280;
    return value / 233280;
  };
}

function hash(text: string): number {
  let h = 2166136261;
  for (let i = 0; i < text.length; i++) {
    h = Math.imul(h ^ text.charCodeAt(i), 16777619) >>> 0;
  }
  return h;
}

function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

function toUsDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-');
  return `${month}/${day}/${year}`;
}

function fieldKind(field: z.ZodTypeAny): string {
  if (field.description) {
    return field.description;
  }
  if (field instanceof z.ZodOptional || field instanceof z.ZodNullable) {
    return fieldKind(field.unwrap());
  }
  if (field instanceof z.ZodNumber) {
    return 'number';
  }
  if (field instanceof z.ZodBoolean) {
    return 'boolean';
  }
  return 'string';
}

function fakeRecord(schema: z.AnyZodObject, context: RecordContext, seed: number): Record<string, unknown> {
  const random = seededRandom(seed + hash(`${context.ticker}:${context.tradeDate}:${context.index}`));
  const record: Record<string, unknown> = {};

  for (const [name, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const kind = fieldKind(field);
    const pastDate = addDays(context.tradeDate, -Math.floor(random() * 3650));
    switch (kind) {
      case 'number':
        record[name] = Math.round(random() * 1_000_000) / 10_000;
        break;
      case 'boolean':
        record[name] = random() < 0.5;
        break;
      case 'date':
        record[name] = pastDate;
        break;
      case 'us-date':
        record[name] = toUsDate(pastDate);
        break;
      case 'timestamp':
        record[name] = `${context.tradeDate}T20:00:00Z`;
        break;
      default:
        record[name] = 'sandbox';
    }
  }

  record.ticker = context.ticker;
  if ('tradeDate' in record) {
    record.tradeDate = context.tradeDate;
  }
  if ('max' in record) {
    record.max = context.tradeDate;
  }
  if (context.expirDate !== undefined && 'expirDate' in record) {
    record.expirDate = context.expirDate;
  }
  if (context.strike !== undefined && 'strike' in record) {
    record.strike = context.strike;
  }
  const expirDate = record.expirDate;
  if (typeof expirDate === 'string' && 'dte' in record) {
    record.dte = Math.round((Date.parse(expirDate) - Date.parse(context.tradeDate)) / 86_400_000);
  }
  return record;
}

function splitResource(pathname: string): { resource: string; historical: boolean } | undefined {
  const segments = pathname.split('/').filter(Boolean);
  for (const length of [2, 1]) {
    const resource = segments.slice(-length).join('/');
    if (segments.length >= length && resource in RESOURCE_SCHEMAS) {
      return { resource, historical: segments[segments.length - length - 1] === HISTORICAL_PREFIX };
    }
  }
  return undefined;
}

const contractBody = z.array(
  z.object({
    ticker: z.string(),
    expirDate: z.string().optional(),
    strike: z.number().optional(),
    tradeDate: z.string().optional(),
  }),
);

function jsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * An {@link HttpTransport} that answers every Data API resource, live or
 * `hist/`, without leaving the process.
 *
 * ```typescript
 * const api = new DataApi({ transport: createSandboxTransport({ seed: 7 }) });
 * ```
 */
export function createSandboxTransport(options: SandboxOptions = {}): HttpTransport {
  const seed = options.seed ?? 1;
  const count = options.count ?? 3;
  const universe = options.universe ?? SANDBOX_UNIVERSE;
  const asOf = options.asOf ?? today();

  return async (url, init) => {
    const { pathname, searchParams } = new URL(url);
    const target = splitResource(pathname);
    if (!target) {
      return jsonResponse(404, { message: `Unknown resource ${pathname}` });
    }
    if (!searchParams.get('token')) {
      return jsonResponse(401, { message: 'A token is required' });
    }

    const schema = RESOURCE_SCHEMAS[target.resource];
    if (!schema) {
      return jsonResponse(404, { message: `Unknown resource ${pathname}` });
    }

    const tradeDate = searchParams.get('tradeDate') ?? undefined;
    const tickers = searchParams.get('ticker')?.split(',') ?? [...universe];
    const data: Record<string, unknown>[] = [];

    if (target.resource === 'strikes/options') {
      const contracts: ContractQuery[] =
        init.method === 'POST' && typeof init.body === 'string'
          ? contractBody.parse(JSON.parse(init.body))
          : [
              {
                ticker: searchParams.get('ticker') ?? universe[0] ?? 'SPY',
                expirDate: searchParams.get('expirDate') ?? undefined,
                strike: Number(searchParams.get('strike') ?? 100),
                tradeDate,
              },
            ];
      contracts.forEach((contract, index) => {
        data.push(fakeRecord(schema, { ...contract, index, tradeDate: contract.tradeDate ?? asOf }, seed));
      });
    } else {
      const byExpiration = 'expirDate' in schema.shape;
      // Chains and surfaces span expirations; historical series span trade dates.
      const rows = byExpiration || (target.historical && tradeDate === undefined) ? count : 1;
      for (const ticker of tickers) {
        for (let index = 0; index < rows; index++) {
          const context: RecordContext = { ticker, index, tradeDate: tradeDate ?? asOf };
          if ('strike' in schema.shape) {
            context.expirDate = addDays(context.tradeDate, 7 * (1 + (index % 3)));
            context.strike = 100 + 5 * Math.floor(index / 3);
          } else if (byExpiration) {
            context.expirDate = addDays(context.tradeDate, 30 * (index + 1));
          } else if (rows > 1) {
            context.tradeDate = addDays(asOf, index - (rows - 1));
          }
          data.push(fakeRecord(schema, context, seed));
        }
      }
    }

    options.logger?.debug?.(`[Sandbox] ${init.method ?? 'GET'} ${pathname}`, { records: data.length });
    return jsonResponse(200, { data });
  };
}
