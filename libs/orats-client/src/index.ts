/**
 * @libs/orats-client
 *
 * ORATS Data API Client Library
 *
 * Three layers over the same HTTP client:
 * - **API constructs**: one validated request, endpoint and response schema
 *   per Data API resource, collected on {@link DataApi}
 * - **Industry constructs**: options chains, volatility surfaces and the
 *   history of an underlying asset
 * - **Application constructs**: universes of assets and the
 *   {@link OratsApplication} entry point
 *
 * A request carrying a `tradeDate` is served from the historical (`hist/`)
 * form of its resource; there are no separate historical endpoints.
 *
 * ## Usage
 *
 * ```typescript
 * import { DataApi, createCoreDataRequest } from '@libs/orats-client';
 *
 * const api = new DataApi({ token: process.env.ORATS_API_TOKEN });
 *
 * // Live core data
 * const [core] = await api.coreData.fetch(createCoreDataRequest({ tickers: 'IBM' }));
 *
 * // The same resource on a past date (hits hist/cores)
 * const past = await api.coreData.fetch(
 *   createCoreDataRequest({ tickers: ['IBM', 'AAPL'], tradeDate: '2022-07-05' }),
 * );
 * ```
 *
 * ## Environment Variables
 *
 * Optional:
 * - `ORATS_API_TOKEN` - API token (default: the restricted `demo` token)
 * - `ORATS_BASE_URL` - Base URL (default: https://api.orats.io/datav2)
 */

// ============================================================================
// Client and Factory
// ============================================================================

export {
  OratsClient,
  createOratsClientFromEnv,
  DEFAULT_BASE_URL,
  BASE_URL_ENV_VAR,
} from './oratsClient';
export type { OratsClientConfig } from './oratsClient';
export { resolveToken, resolveTokenWithSource, TOKEN_ENV_VAR, DEMO_TOKEN } from './token';
export type { ResolvedToken, TokenSource } from './token';

// ============================================================================
// API Constructs
// ============================================================================

export { DataApi } from './dataApi';
export { DataApiEndpoint, StrikesByOptionsEndpoint, HISTORICAL_PREFIX } from './endpoints';
export type { EndpointDefinition } from './endpoints';

export {
  createRequest,
  createTickersRequest,
  createStrikesRequest,
  createStrikesByOptionsRequest,
  createMoniesRequest,
  createSummariesRequest,
  createCoreDataRequest,
  createDailyPriceRequest,
  createHistoricalVolatilityRequest,
  createIvRankRequest,
  createDividendHistoryRequest,
  createEarningsHistoryRequest,
  createStockSplitHistoryRequest,
  fromQueryParams,
  toQueryParams,
  toRequestBody,
  isHistoricalRequest,
  parseBounds,
  formatBounds,
  normalizeDate,
} from './requests';
export type {
  Bounds,
  RequestKind,
  RequestInput,
  DataApiRequest,
  TickersRequest,
  StrikesRequest,
  StrikesByOptionsRequest,
  MoniesRequest,
  SummariesRequest,
  CoreDataRequest,
  DailyPriceRequest,
  HistoricalVolatilityRequest,
  IvRankRequest,
  DividendHistoryRequest,
  EarningsHistoryRequest,
  StockSplitHistoryRequest,
} from './requests';

export {
  tickerSchema,
  strikeSchema,
  moneyImpliedSchema,
  moneyForecastSchema,
  summarySchema,
  coreSchema,
  dailyPriceSchema,
  historicalVolatilitySchema,
  dividendHistorySchema,
  earningsHistorySchema,
  stockSplitHistorySchema,
  ivRankSchema,
  NULL_DATE,
} from './responses';
export type {
  Ticker,
  Strike,
  MoneyImplied,
  MoneyForecast,
  Money,
  Summary,
  Core,
  DailyPrice,
  HistoricalVolatility,
  DividendHistory,
  EarningsHistory,
  StockSplitHistory,
  IvRank,
  DataApiRecord,
} from './responses';

// ============================================================================
// Industry Constructs
// ============================================================================

export { bounds, groupByTicker } from './industry/common';
export type { DataRange } from './industry/common';
export {
  OptionsChain,
  VolatilitySurface,
  callFromStrike,
  putFromStrike,
  chains,
  volatilitySurfaces,
} from './industry/options';
export type {
  Quote,
  Greeks,
  Option,
  OptionType,
  CallOption,
  PutOption,
  ChainsOptions,
  VolatilitySurfacesOptions,
} from './industry/options';
export { Asset, VolatilityHistory, PriceHistory, VOLATILITY_PERIODS } from './industry/assets';

// ============================================================================
// Application Constructs
// ============================================================================

export { Universe } from './application/universe';
export { OratsApplication } from './application/oratsApplication';

// ============================================================================
// Sandbox
// ============================================================================

export { createSandboxTransport, SANDBOX_UNIVERSE } from './sandbox/fakeData';
export type { SandboxOptions } from './sandbox/fakeData';

// ============================================================================
// Error Exports
// ============================================================================

export {
  OratsError,
  OratsValidationError,
  OratsRequestError,
  OratsAuthenticationError,
  OratsPermissionError,
  OratsNotFoundError,
  OratsRateLimitError,
  OratsNetworkError,
  OratsResponseParseError,
} from './errors';
