import type { DataApi } from '../dataApi';
import { OratsValidationError } from '../errors';
import { createMoniesRequest, createStrikesRequest } from '../requests';
import type { Money, Strike } from '../responses';
import { bounds, groupByTicker, numericField, singleTicker } from './common';

export interface Quote {
  readonly price: number;
  readonly size: number;
  readonly iv?: number;
}

export interface Greeks {
  readonly delta: number;
  readonly gamma: number;
  readonly theta: number;
  readonly vega: number;
  readonly rho: number;
  readonly phi: number;
}

export type OptionType = 'call' | 'put';

export interface Option {
  readonly type: OptionType;
  readonly ticker: string;
  readonly expiration: string;
  readonly strike: number;
  /** Theoretical value. */
  readonly price: number;
  readonly spot: number;
  readonly volume: number;
  readonly openInterest: number;
  /** Smoothed implied volatility of the strike. */
  readonly iv: number;
  readonly greeks: Greeks;
  readonly bid: Quote;
  readonly offer: Quote;
}

export interface CallOption extends Option {
  readonly type: 'call';
}

export interface PutOption extends Option {
  readonly type: 'put';
}

function greeksOf(strike: Strike, delta: number): Greeks {
  return {
    delta,
    gamma: strike.gamma,
    theta: strike.theta,
    vega: strike.vega,
    rho: strike.rho,
    phi: strike.phi,
  };
}

export function callFromStrike(strike: Strike): CallOption {
  const call: CallOption = {
    type: 'call',
    ticker: strike.ticker,
    expiration: strike.expirDate,
    strike: strike.strike,
    price: strike.callValue,
    spot: strike.spotPrice,
    volume: strike.callVolume,
    openInterest: strike.callOpenInterest,
    iv: strike.smvVol,
    greeks: greeksOf(strike, strike.delta),
    bid: { price: strike.callBidPrice, size: strike.callBidSize, iv: strike.callBidIv },
    offer: { price: strike.callAskPrice, size: strike.callAskSize, iv: strike.callAskIv },
  };
  return Object.freeze(call);
}

/** Strike rows carry call greeks; the put shares all of them except delta, which is shifted by one. */
export function putFromStrike(strike: Strike): PutOption {
  const put: PutOption = {
    type: 'put',
    ticker: strike.ticker,
    expiration: strike.expirDate,
    strike: strike.strike,
    price: strike.putValue,
    spot: strike.spotPrice,
    volume: strike.putVolume,
    openInterest: strike.putOpenInterest,
    iv: strike.smvVol,
    greeks: greeksOf(strike, strike.delta - 1),
    bid: { price: strike.putBidPrice, size: strike.putBidSize, iv: strike.putBidIv },
    offer: { price: strike.putAskPrice, size: strike.putAskSize, iv: strike.putAskIv },
  };
  return Object.freeze(put);
}

function byExpiration<T>(entries: Map<string, T>): Map<string, T> {
  return new Map([...entries].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Calls and puts of one ticker, grouped by expiration. Expirations are in
 * date order and contracts within an expiration in strike order.
 *
 * Iterating yields `[expiration, calls, puts]`.
 */
export class OptionsChain implements Iterable<[string, readonly CallOption[], readonly PutOption[]]> {
  readonly ticker: string;
  private readonly callsByExpiration: ReadonlyMap<string, readonly CallOption[]>;
  private readonly putsByExpiration: ReadonlyMap<string, readonly PutOption[]>;

  constructor(readonly strikes: readonly Strike[]) {
    this.ticker = singleTicker(strikes, 'OptionsChain');

    const calls = new Map<string, CallOption[]>();
    const puts = new Map<string, PutOption[]>();
    const ordered = [...strikes].sort((a, b) => a.strike - b.strike);
    for (const strike of ordered) {
      const expiration = strike.expirDate;
      calls.set(expiration, [...(calls.get(expiration) ?? []), callFromStrike(strike)]);
      puts.set(expiration, [...(puts.get(expiration) ?? []), putFromStrike(strike)]);
    }
    this.callsByExpiration = byExpiration(calls);
    this.putsByExpiration = byExpiration(puts);
  }

  expirations(): string[] {
    return [...this.callsByExpiration.keys()];
  }

  calls(): ReadonlyMap<string, readonly CallOption[]> {
    return this.callsByExpiration;
  }

  puts(): ReadonlyMap<string, readonly PutOption[]> {
    return this.putsByExpiration;
  }

  *[Symbol.iterator](): Iterator<[string, readonly CallOption[], readonly PutOption[]]> {
    for (const [expiration, calls] of this.callsByExpiration) {
      yield [expiration, calls, this.putsByExpiration.get(expiration) ?? []];
    }
  }
}

// Monies rows carry vol100 (deep call wing) down to vol0 in steps of five delta.
function deltaColumn(delta: number): string {
  const level = Math.round(delta * 100);
  const onGrid = Number.isFinite(delta) && Math.abs(level - delta * 100) < 1e-9 && level % 5 === 0;
  if (!onGrid || level < 0 || level > 100) {
    throw new OratsValidationError(`delta must be a multiple of 0.05 between 0 and 1, got ${delta}`, 'delta');
  }
  return `vol${level}`;
}

/**
 * Implied (or forecast) volatility of one ticker across expirations and
 * deltas, as returned by the monies resources.
 */
export class VolatilitySurface {
  readonly ticker: string;
  private readonly rows: ReadonlyMap<string, Money>;

  constructor(readonly monies: readonly Money[]) {
    this.ticker = singleTicker(monies, 'VolatilitySurface');
    this.rows = byExpiration(new Map(monies.map((money): [string, Money] => [money.expirDate, money])));
  }

  expirations(): string[] {
    return [...this.rows.keys()];
  }

  atExpiration(expiration: string): Money | undefined {
    return this.rows.get(expiration);
  }

  /** Volatility at `delta` for every expiration, in expiration order. */
  byDelta(delta: number): ReadonlyMap<string, number> {
    const column = deltaColumn(delta);
    return new Map(
      [...this.rows].map(([expiration, money]): [string, number] => [expiration, numericField(money, column)]),
    );
  }
}

export interface ChainsOptions {
  tickers: string | string[];
  tradeDate?: string | Date;
  minDelta?: number;
  maxDelta?: number;
  minDaysToExpiration?: number;
  maxDaysToExpiration?: number;
}

/** One options chain per ticker, fetched with a single strikes call. */
export async function chains(api: DataApi, options: ChainsOptions): Promise<OptionsChain[]> {
  const request = createStrikesRequest({
    tickers: options.tickers,
    tradeDate: options.tradeDate,
    expirationRange: bounds(options.minDaysToExpiration, options.maxDaysToExpiration),
    deltaRange: bounds(options.minDelta, options.maxDelta),
  });
  const strikes = await api.strikes.fetch(request);
  return [...groupByTicker(strikes).values()].map((group) => new OptionsChain(group));
}

export interface VolatilitySurfacesOptions {
  tickers: string | string[];
  tradeDate?: string | Date;
  /** Use the forecast monies instead of the implied ones. */
  forecast?: boolean;
}

export async function volatilitySurfaces(
  api: DataApi,
  options: VolatilitySurfacesOptions,
): Promise<VolatilitySurface[]> {
  const request = createMoniesRequest({ tickers: options.tickers, tradeDate: options.tradeDate });
  const monies: readonly Money[] = options.forecast
    ? await api.moniesForecast.fetch(request)
    : await api.moniesImplied.fetch(request);
  return [...groupByTicker(monies).values()].map((group) => new VolatilitySurface(group));
}
