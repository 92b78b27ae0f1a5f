import type { DataApi } from '../dataApi';
import { OratsNotFoundError, OratsValidationError } from '../errors';
import {
  createDailyPriceRequest,
  createHistoricalVolatilityRequest,
  createTickersRequest,
} from '../requests';
import type { DailyPrice, HistoricalVolatility } from '../responses';
import { numericField, singleTicker, type DataRange } from './common';

/** Look-back windows, in trading days, that historical volatility is quoted for. */
export const VOLATILITY_PERIODS: readonly number[] = [5, 10, 20, 30, 60, 90, 100, 120, 252, 500, 1000];

function latest<T extends { tradeDate: string }>(records: readonly T[]): T | undefined {
  return records.reduce<T | undefined>(
    (best, record) => (best === undefined || record.tradeDate > best.tradeDate ? record : best),
    undefined,
  );
}

/**
 * Historical volatility of one ticker on one trade date, keyed by look-back
 * period in days.
 */
export class VolatilityHistory {
  readonly ticker: string;
  readonly tradeDate: string;

  constructor(readonly record: HistoricalVolatility) {
    this.ticker = record.ticker;
    this.tradeDate = record.tradeDate;
  }

  /**
   * Volatility from intraday prices. Excluding earnings days is the default;
   * the one-day value only exists when they are included.
   */
  intraday(excludeEarnings = true): ReadonlyMap<number, number> {
    const values = new Map<number, number>();
    if (!excludeEarnings) {
      values.set(1, this.record.orHv1d);
    }
    const prefix = excludeEarnings ? 'orHvXern' : 'orHv';
    for (const period of VOLATILITY_PERIODS) {
      values.set(period, numericField(this.record, `${prefix}${period}d`));
    }
    return values;
  }

  closeToClose(excludeEarnings = false): ReadonlyMap<number, number> {
    const prefix = excludeEarnings ? 'clsHvXern' : 'clsHv';
    return new Map(
      VOLATILITY_PERIODS.map((period): [number, number] => [
        period,
        numericField(this.record, `${prefix}${period}d`),
      ]),
    );
  }

  /** Most recent record for `ticker`, or the record of `tradeDate` when given. */
  static async fetch(api: DataApi, ticker: string, tradeDate?: string | Date): Promise<VolatilityHistory> {
    const request = createHistoricalVolatilityRequest({ tickers: ticker, tradeDate });
    const records = await api.historicalVolatility.fetch(request);
    const record = latest(records.filter((candidate) => candidate.ticker === request.tickers?.[0]));
    if (!record) {
      throw new OratsNotFoundError(`No historical volatility for ${ticker}`);
    }
    return new VolatilityHistory(record);
  }
}

/** Daily prices of one ticker in trade-date order. */
export class PriceHistory {
  readonly ticker: string;
  readonly prices: readonly DailyPrice[];

  constructor(prices: readonly DailyPrice[]) {
    this.ticker = singleTicker(prices, 'PriceHistory');
    this.prices = Object.freeze([...prices].sort((a, b) => a.tradeDate.localeCompare(b.tradeDate)));
  }

  range(): DataRange {
    const first = this.prices[0];
    const last = this.prices[this.prices.length - 1];
    return { min: first?.tradeDate ?? '', max: last?.tradeDate ?? '' };
  }

  /** Split-adjusted closes by trade date, optionally limited to `[from, to]`. */
  closes(from?: string, to?: string): ReadonlyMap<string, number> {
    const closes = new Map<string, number>();
    for (const price of this.prices) {
      if ((from === undefined || price.tradeDate >= from) && (to === undefined || price.tradeDate <= to)) {
        closes.set(price.tradeDate, price.clsPx);
      }
    }
    return closes;
  }

  static async fetch(api: DataApi, ticker: string): Promise<PriceHistory> {
    const records = await api.dailyPrice.fetch(createDailyPriceRequest({ tickers: ticker }));
    if (records.length === 0) {
      throw new OratsNotFoundError(`No daily prices for ${ticker}`);
    }
    return new PriceHistory(records);
  }
}

/**
 * An underlying asset. The ticker lookup behind {@link historicalDataRange}
 * is made once per instance; a failed lookup is not remembered.
 */
export class Asset {
  readonly ticker: string;
  private dataRange?: Promise<DataRange>;

  constructor(
    private readonly api: DataApi,
    ticker: string,
  ) {
    const normalized = ticker.trim().toUpperCase();
    if (!normalized) {
      throw new OratsValidationError('ticker must not be empty', 'ticker');
    }
    this.ticker = normalized;
  }

  async historicalDataRange(): Promise<DataRange> {
    const pending = this.dataRange ?? this.lookupDataRange();
    this.dataRange = pending;
    try {
      return await pending;
    } catch (error) {
      // A newer lookup may already have replaced the failed one.
      if (this.dataRange === pending) {
        this.dataRange = undefined;
      }
      throw error;
    }
  }

  volatilityHistory(tradeDate?: string | Date): Promise<VolatilityHistory> {
    return VolatilityHistory.fetch(this.api, this.ticker, tradeDate);
  }

  priceHistory(): Promise<PriceHistory> {
    return PriceHistory.fetch(this.api, this.ticker);
  }

  private async lookupDataRange(): Promise<DataRange> {
    const records = await this.api.tickers.fetch(createTickersRequest({ ticker: this.ticker }));
    const record = records.find((candidate) => candidate.ticker === this.ticker);
    if (!record) {
      throw new OratsNotFoundError(`ORATS has no data for ${this.ticker}`);
    }
    return { min: record.min, max: record.max };
  }
}
