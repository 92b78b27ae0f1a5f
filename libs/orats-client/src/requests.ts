import { z } from 'zod';
import type { QueryParams } from '@libs/http-client-core';
import { OratsValidationError } from './errors';

// ============================================================================
// Field schemas
// ============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatLocalDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Today's date in the host time zone, as `YYYY-MM-DD`. */
export function today(): string {
  return formatLocalDate(new Date());
}

/** `YYYY-MM-DD` when `value` names a real calendar day, otherwise undefined. */
export function normalizeDate(value: string | Date): string | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatLocalDate(value);
  }
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return undefined;
  }
  return `${y}-${m}-${d}`;
}

const calendarDate = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const normalized = normalizeDate(value);
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a valid YYYY-MM-DD date' });
    return z.NEVER;
  }
  return normalized;
});

// ISO strings compare chronologically.
const tradeDate = calendarDate.refine((value) => value <= today(), {
  message: 'must not be in the future',
});

const ticker = z.string().trim().min(1, 'ticker must not be empty').toUpperCase();

const tickers = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')))
  .pipe(z.array(ticker).min(1, 'at least one ticker is required'));

export interface Bounds {
  min?: number;
  max?: number;
}

/** Parses `"30,45"`, `"30,"`, `",45"` or `"30"`; blank sides stay open. */
export function parseBounds(value: string): Bounds {
  const [lower = '', upper = ''] = value.split(',');
  const side = (raw: string) => (raw.trim() === '' ? undefined : Number(raw));
  return { min: side(lower), max: side(upper) };
}

/** Formats a range filter as the API's comma-separated pair. */
export function formatBounds(bounds: Bounds): string {
  return `${bounds.min ?? ''},${bounds.max ?? ''}`;
}

function boundsOf(value: z.ZodNumber) {
  return z
    .union([
      z.string().transform(parseBounds),
      z.object({ min: z.number().optional(), max: z.number().optional() }).strict(),
    ])
    .pipe(
      z
        .object({ min: value.optional(), max: value.optional() })
        .refine((b) => b.min !== undefined || b.max !== undefined, 'at least one bound is required')
        .refine((b) => b.min === undefined || b.max === undefined || b.min <= b.max, {
          message: 'min must not exceed max',
          path: ['min'],
        }),
    );
}

const daysToExpirationRange = boundsOf(z.number().int().nonnegative());
const deltaRange = boundsOf(z.number().min(0).max(1));

// ============================================================================
// Request schemas
// ============================================================================

const singleTickerRequest = z.object({ ticker }).strict();

const multipleTickersRequest = z
  .object({
    tickers,
    tradeDate: tradeDate.optional(),
  })
  .strict();

const tickersOrTradeDateRequest = z
  .object({
    tickers: tickers.optional(),
    tradeDate: tradeDate.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.tickers === undefined && value.tradeDate === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'one of tickers or tradeDate is required',
        path: ['tradeDate'],
      });
    }
  });

const requestSchemas = {
  tickers: z.object({ ticker: ticker.optional() }).strict(),
  strikes: multipleTickersRequest.extend({
    expirationRange: daysToExpirationRange.optional(),
    deltaRange: deltaRange.optional(),
  }),
  strikesByOptions: z
    .object({
      ticker,
      expirationDate: calendarDate,
      strike: z.number().finite().positive(),
      tradeDate: tradeDate.optional(),
    })
    .strict(),
  monies: multipleTickersRequest,
  summaries: tickersOrTradeDateRequest,
  coreData: tickersOrTradeDateRequest,
  dailyPrice: tickersOrTradeDateRequest,
  historicalVolatility: tickersOrTradeDateRequest,
  ivRank: tickersOrTradeDateRequest,
  dividendHistory: singleTickerRequest,
  earningsHistory: singleTickerRequest,
  stockSplitHistory: singleTickerRequest,
} satisfies Record<string, z.ZodTypeAny>;

type RequestSchemas = typeof requestSchemas;

export type RequestKind = keyof RequestSchemas;
export type RequestInput<K extends RequestKind> = z.input<RequestSchemas[K]>;
export type DataApiRequest<K extends RequestKind = RequestKind> = Readonly<
  z.output<RequestSchemas[K]> & { kind: K }
>;

export type TickersRequest = DataApiRequest<'tickers'>;
export type StrikesRequest = DataApiRequest<'strikes'>;
export type StrikesByOptionsRequest = DataApiRequest<'strikesByOptions'>;
export type MoniesRequest = DataApiRequest<'monies'>;
export type SummariesRequest = DataApiRequest<'summaries'>;
export type CoreDataRequest = DataApiRequest<'coreData'>;
export type DailyPriceRequest = DataApiRequest<'dailyPrice'>;
export type HistoricalVolatilityRequest = DataApiRequest<'historicalVolatility'>;
export type IvRankRequest = DataApiRequest<'ivRank'>;
export type DividendHistoryRequest = DataApiRequest<'dividendHistory'>;
export type EarningsHistoryRequest = DataApiRequest<'earningsHistory'>;
export type StockSplitHistoryRequest = DataApiRequest<'stockSplitHistory'>;

// ============================================================================
// Wire names
// ============================================================================

type RequestField = 'ticker' | 'tickers' | 'tradeDate' | 'expirationRange' | 'deltaRange' | 'expirationDate' | 'strike';

const WIRE_NAMES: Record<RequestField, string> = {
  ticker: 'ticker',
  tickers: 'ticker',
  tradeDate: 'tradeDate',
  expirationRange: 'dte',
  deltaRange: 'delta',
  expirationDate: 'expirDate',
  strike: 'strike',
};

const REQUEST_FIELDS: Record<RequestKind, readonly RequestField[]> = {
  tickers: ['ticker'],
  strikes: ['tickers', 'tradeDate', 'expirationRange', 'deltaRange'],
  strikesByOptions: ['ticker', 'expirationDate', 'strike', 'tradeDate'],
  monies: ['tickers', 'tradeDate'],
  summaries: ['tickers', 'tradeDate'],
  coreData: ['tickers', 'tradeDate'],
  dailyPrice: ['tickers', 'tradeDate'],
  historicalVolatility: ['tickers', 'tradeDate'],
  ivRank: ['tickers', 'tradeDate'],
  dividendHistory: ['ticker'],
  earningsHistory: ['ticker'],
  stockSplitHistory: ['ticker'],
};

function isRequestField(key: string): key is RequestField {
  return key in WIRE_NAMES;
}

function isBounds(value: unknown): value is Bounds {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Construction
// ============================================================================

function fieldOf(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return issue.keys[0] ?? '';
  }
  return issue.path.map(String).join('.');
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, kind: RequestKind): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue ? fieldOf(issue) : '';
    const reason = issue?.message ?? 'invalid request';
    throw new OratsValidationError(
      `Invalid ${kind} request: ${field ? `${field} ` : ''}${reason}`,
      field,
      result.error.issues,
    );
  }
  return result.data;
}

function freezeDeep<T extends object>(request: T): Readonly<T> {
  const values: unknown[] = Object.values(request);
  for (const value of values) {
    if (typeof value === 'object' && value !== null) {
      Object.freeze(value);
    }
  }
  return Object.freeze(request);
}

/**
 * Validates `input` against the request definition for `kind` and returns a
 * frozen request. Throws {@link OratsValidationError} naming the first bad field.
 */
export function createRequest<K extends RequestKind>(kind: K, input: RequestInput<K>): DataApiRequest<K> {
  const fields = validate(requestSchemas[kind], input, kind);
  return freezeDeep({ ...fields, kind });
}

export const createTickersRequest = (input: RequestInput<'tickers'> = {}) => createRequest('tickers', input);
export const createStrikesRequest = (input: RequestInput<'strikes'>) => createRequest('strikes', input);
export const createStrikesByOptionsRequest = (input: RequestInput<'strikesByOptions'>) =>
  createRequest('strikesByOptions', input);
export const createMoniesRequest = (input: RequestInput<'monies'>) => createRequest('monies', input);
export const createSummariesRequest = (input: RequestInput<'summaries'>) => createRequest('summaries', input);
export const createCoreDataRequest = (input: RequestInput<'coreData'>) => createRequest('coreData', input);
export const createDailyPriceRequest = (input: RequestInput<'dailyPrice'>) => createRequest('dailyPrice', input);
export const createHistoricalVolatilityRequest = (input: RequestInput<'historicalVolatility'>) =>
  createRequest('historicalVolatility', input);
export const createIvRankRequest = (input: RequestInput<'ivRank'>) => createRequest('ivRank', input);
export const createDividendHistoryRequest = (input: RequestInput<'dividendHistory'>) =>
  createRequest('dividendHistory', input);
export const createEarningsHistoryRequest = (input: RequestInput<'earningsHistory'>) =>
  createRequest('earningsHistory', input);
export const createStockSplitHistoryRequest = (input: RequestInput<'stockSplitHistory'>) =>
  createRequest('stockSplitHistory', input);

// ============================================================================
// Serialization
// ============================================================================

export function isHistoricalRequest(request: DataApiRequest): boolean {
  return 'tradeDate' in request && request.tradeDate !== undefined;
}

/** Wire-named query parameters for `request`; the token is not included. */
export function toQueryParams(request: DataApiRequest): QueryParams {
  const query: QueryParams = {};
  const fields: Readonly<Record<string, unknown>> = request;
  for (const [key, value] of Object.entries(fields)) {
    if (!isRequestField(key) || value === undefined) {
      continue;
    }
    const wireName = WIRE_NAMES[key];
    if (Array.isArray(value)) {
      query[wireName] = value.join(',');
    } else if (isBounds(value)) {
      query[wireName] = formatBounds(value);
    } else if (typeof value === 'string' || typeof value === 'number') {
      query[wireName] = value;
    }
  }
  return query;
}

/** JSON body entry for the batched POST form of strikes-by-options. */
export function toRequestBody(request: StrikesByOptionsRequest): Record<string, string | number> {
  return {
    ticker: request.ticker,
    expirDate: request.expirationDate,
    strike: request.strike,
    ...(request.tradeDate ? { tradeDate: request.tradeDate } : undefined),
  };
}

/**
 * Rebuilds a request of `kind` from wire-named query parameters, validating
 * it exactly like {@link createRequest}. Unknown wire names are rejected.
 */
export function fromQueryParams<K extends RequestKind>(
  kind: K,
  query: URLSearchParams | Record<string, string | undefined>,
): DataApiRequest<K> {
  const entries = query instanceof URLSearchParams ? [...query.entries()] : Object.entries(query);
  const fields = REQUEST_FIELDS[kind];
  const input: Record<string, unknown> = {};

  for (const [wireName, raw] of entries) {
    if (raw === undefined || wireName === 'token') {
      continue;
    }
    const field = fields.find((candidate) => WIRE_NAMES[candidate] === wireName);
    if (!field) {
      throw new OratsValidationError(`Invalid ${kind} request: ${wireName} is not a known parameter`, wireName);
    }
    input[field] = field === 'strike' ? Number(raw) : raw;
  }

  const parsed = validate(requestSchemas[kind], input, kind);
  return freezeDeep({ ...parsed, kind });
}
