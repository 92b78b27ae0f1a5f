import { DataApiEndpoint, StrikesByOptionsEndpoint } from './endpoints';
import { OratsClient, type OratsClientConfig } from './oratsClient';
import type {
  CoreDataRequest,
  DailyPriceRequest,
  DividendHistoryRequest,
  EarningsHistoryRequest,
  HistoricalVolatilityRequest,
  IvRankRequest,
  MoniesRequest,
  StockSplitHistoryRequest,
  StrikesRequest,
  SummariesRequest,
  TickersRequest,
} from './requests';
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
} from './responses';

/**
 * Direct translation of the Data API: one endpoint per resource, each
 * built once and reused for every call.
 *
 * ```typescript
 * const api = new DataApi();
 * const [ibm] = await api.tickers.fetch(createTickersRequest({ ticker: 'IBM' }));
 * const history = await api.strikes.fetch(
 *   createStrikesRequest({ tickers: ['IBM'], tradeDate: '2022-07-05' }),
 * );
 * ```
 */
export class DataApi {
  readonly client: OratsClient;

  readonly tickers: DataApiEndpoint<TickersRequest, typeof tickerSchema>;
  readonly strikes: DataApiEndpoint<StrikesRequest, typeof strikeSchema>;
  readonly strikesByOptions: StrikesByOptionsEndpoint;
  readonly moniesImplied: DataApiEndpoint<MoniesRequest, typeof moneyImpliedSchema>;
  readonly moniesForecast: DataApiEndpoint<MoniesRequest, typeof moneyForecastSchema>;
  readonly summaries: DataApiEndpoint<SummariesRequest, typeof summarySchema>;
  readonly coreData: DataApiEndpoint<CoreDataRequest, typeof coreSchema>;
  readonly dailyPrice: DataApiEndpoint<DailyPriceRequest, typeof dailyPriceSchema>;
  readonly historicalVolatility: DataApiEndpoint<HistoricalVolatilityRequest, typeof historicalVolatilitySchema>;
  readonly dividendHistory: DataApiEndpoint<DividendHistoryRequest, typeof dividendHistorySchema>;
  readonly earningsHistory: DataApiEndpoint<EarningsHistoryRequest, typeof earningsHistorySchema>;
  readonly stockSplitHistory: DataApiEndpoint<StockSplitHistoryRequest, typeof stockSplitHistorySchema>;
  readonly ivRank: DataApiEndpoint<IvRankRequest, typeof ivRankSchema>;

  constructor(clientOrConfig: OratsClient | OratsClientConfig = {}) {
    const client = clientOrConfig instanceof OratsClient ? clientOrConfig : new OratsClient(clientOrConfig);
    this.client = client;

    this.tickers = new DataApiEndpoint(client, { kind: 'tickers', resource: 'tickers', schema: tickerSchema });
    this.strikes = new DataApiEndpoint(client, { kind: 'strikes', resource: 'strikes', schema: strikeSchema });
    this.strikesByOptions = new StrikesByOptionsEndpoint(client);
    this.moniesImplied = new DataApiEndpoint(client, {
      kind: 'monies',
      resource: 'monies/implied',
      schema: moneyImpliedSchema,
    });
    this.moniesForecast = new DataApiEndpoint(client, {
      kind: 'monies',
      resource: 'monies/forecast',
      schema: moneyForecastSchema,
    });
    this.summaries = new DataApiEndpoint(client, { kind: 'summaries', resource: 'summaries', schema: summarySchema });
    this.coreData = new DataApiEndpoint(client, { kind: 'coreData', resource: 'cores', schema: coreSchema });
    this.dailyPrice = new DataApiEndpoint(client, {
      kind: 'dailyPrice',
      resource: 'dailies',
      schema: dailyPriceSchema,
      historicalOnly: true,
    });
    this.historicalVolatility = new DataApiEndpoint(client, {
      kind: 'historicalVolatility',
      resource: 'hvs',
      schema: historicalVolatilitySchema,
      historicalOnly: true,
    });
    this.dividendHistory = new DataApiEndpoint(client, {
      kind: 'dividendHistory',
      resource: 'divs',
      schema: dividendHistorySchema,
      historicalOnly: true,
    });
    this.earningsHistory = new DataApiEndpoint(client, {
      kind: 'earningsHistory',
      resource: 'earnings',
      schema: earningsHistorySchema,
      historicalOnly: true,
    });
    this.stockSplitHistory = new DataApiEndpoint(client, {
      kind: 'stockSplitHistory',
      resource: 'splits',
      schema: stockSplitHistorySchema,
      historicalOnly: true,
    });
    this.ivRank = new DataApiEndpoint(client, { kind: 'ivRank', resource: 'ivrank', schema: ivRankSchema });
  }
}
