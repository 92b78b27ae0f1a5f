import { describe, expect, it } from 'vitest';
import { OratsNotFoundError, OratsValidationError } from '../errors';
import { Asset, PriceHistory, VOLATILITY_PERIODS, VolatilityHistory } from '../industry/assets';
import { bounds, groupByTicker } from '../industry/common';
import {
  OptionsChain,
  VolatilitySurface,
  callFromStrike,
  chains,
  putFromStrike,
  volatilitySurfaces,
} from '../industry/options';
import {
  dailyPriceSchema,
  historicalVolatilitySchema,
  moneyImpliedSchema,
  type HistoricalVolatility,
} from '../responses';
import { apiWith, envelope, recordOf, strikeOf } from './fixtures';

function moneyOf(ticker: string, expirDate: string, values: Record<string, unknown> = {}) {
  return recordOf(moneyImpliedSchema, {
    ticker,
    tradeDate: '2022-07-05',
    expirDate,
    updatedAt: '2022-07-05T20:00:00Z',
    ...values,
  });
}

function volatilityOf(tradeDate: string): HistoricalVolatility {
  const values: Record<string, unknown> = { ticker: 'IBM', tradeDate, orHv1d: 0.5 };
  for (const period of VOLATILITY_PERIODS) {
    values[`orHv${period}d`] = period / 1000;
    values[`orHvXern${period}d`] = period / 2000;
    values[`clsHv${period}d`] = period / 100;
    values[`clsHvXern${period}d`] = period / 200;
  }
  return recordOf(historicalVolatilitySchema, values);
}

function priceOf(tradeDate: string, clsPx: number) {
  return recordOf(dailyPriceSchema, { ticker: 'IBM', tradeDate, clsPx, updatedAt: `${tradeDate}T20:00:00Z` });
}

describe('common helpers', () => {
  it('formats bounds and drops fully open ones', () => {
    expect(bounds(30, 45)).toBe('30,45');
    expect(bounds(undefined, 45)).toBe(',45');
    expect(bounds(0.25)).toBe('0.25,');
    expect(bounds()).toBeUndefined();
  });

  it('groups records by ticker in first-seen order', () => {
    const groups = groupByTicker([
      { ticker: 'SPY', n: 1 },
      { ticker: 'IBM', n: 2 },
      { ticker: 'SPY', n: 3 },
    ]);

    expect([...groups.keys()]).toEqual(['SPY', 'IBM']);
    expect(groups.get('SPY')?.map((record) => record.n)).toEqual([1, 3]);
  });
});

describe('options', () => {
  const strike = strikeOf({
    strike: 125,
    spotPrice: 140.5,
    smvVol: 0.28,
    delta: 0.75,
    gamma: 0.02,
    callValue: 16.1,
    putValue: 0.6,
    callBidPrice: 15.9,
    callAskPrice: 16.3,
    callBidSize: 10,
    callAskSize: 12,
    putBidPrice: 0.55,
    putAskPrice: 0.65,
    putBidSize: 40,
    putAskSize: 35,
    callVolume: 120,
    putVolume: 80,
    callOpenInterest: 1500,
    putOpenInterest: 900,
  });

  it('builds a call from a strike row', () => {
    const call = callFromStrike(strike);

    expect(call).toMatchObject({
      type: 'call',
      ticker: 'IBM',
      expiration: '2022-07-15',
      strike: 125,
      price: 16.1,
      spot: 140.5,
      volume: 120,
      openInterest: 1500,
      iv: 0.28,
      bid: { price: 15.9, size: 10 },
      offer: { price: 16.3, size: 12 },
    });
    expect(call.greeks.delta).toBe(0.75);
    expect(Object.isFrozen(call)).toBe(true);
  });

  it('shifts the delta of the put by one', () => {
    const put = putFromStrike(strike);

    expect(put).toMatchObject({ type: 'put', price: 0.6, volume: 80, openInterest: 900 });
    expect(put.greeks.delta).toBe(-0.25);
    expect(put.greeks.gamma).toBe(0.02);
    expect(put.bid).toEqual({ price: 0.55, size: 40, iv: 0 });
  });

  it('groups a chain by expiration and strike', () => {
    const chain = new OptionsChain([
      strikeOf({ expirDate: '2022-08-19', strike: 130 }),
      strikeOf({ expirDate: '2022-07-15', strike: 125 }),
      strikeOf({ expirDate: '2022-08-19', strike: 120 }),
    ]);

    expect(chain.ticker).toBe('IBM');
    expect(chain.expirations()).toEqual(['2022-07-15', '2022-08-19']);
    expect(chain.calls().get('2022-08-19')?.map((call) => call.strike)).toEqual([120, 130]);
    expect(chain.puts().get('2022-07-15')?.map((put) => put.type)).toEqual(['put']);

    const rows = [...chain].map(([expiration, calls, puts]) => [expiration, calls.length, puts.length]);
    expect(rows).toEqual([
      ['2022-07-15', 1, 1],
      ['2022-08-19', 2, 2],
    ]);
  });

  it('refuses a chain that mixes tickers', () => {
    expect(() => new OptionsChain([strikeOf({}), strikeOf({ ticker: 'AAPL' })])).toThrow(OratsValidationError);
    expect(() => new OptionsChain([])).toThrow('OptionsChain needs at least one record');
  });

  it('reads a volatility surface by delta', () => {
    const surface = new VolatilitySurface([
      moneyOf('SPY', '2022-09-16', { vol25: 0.3, vol50: 0.24 }),
      moneyOf('SPY', '2022-08-19', { vol25: 0.25, vol50: 0.21 }),
    ]);

    expect(surface.expirations()).toEqual(['2022-08-19', '2022-09-16']);
    expect([...surface.byDelta(0.25)]).toEqual([
      ['2022-08-19', 0.25],
      ['2022-09-16', 0.3],
    ]);
    expect(surface.byDelta(0.5).get('2022-09-16')).toBe(0.24);
    expect(surface.atExpiration('2022-09-16')?.vol25).toBe(0.3);
    expect(surface.atExpiration('2022-10-21')).toBeUndefined();
  });

  it('only reads deltas on the five-delta grid', () => {
    const surface = new VolatilitySurface([moneyOf('SPY', '2022-09-16')]);

    expect(() => surface.byDelta(0.33)).toThrow('delta must be a multiple of 0.05 between 0 and 1, got 0.33');
    expect(() => surface.byDelta(1.05)).toThrow(OratsValidationError);
  });

  it('fetches one chain per ticker', async () => {
    const { api, transport } = apiWith(() =>
      envelope([strikeOf({ ticker: 'IBM' }), strikeOf({ ticker: 'AAPL' }), strikeOf({ ticker: 'IBM', strike: 5 })]),
    );

    const result = await chains(api, { tickers: ['IBM', 'AAPL'], minDaysToExpiration: 30, maxDaysToExpiration: 45 });

    expect(result.map((chain) => [chain.ticker, chain.strikes.length])).toEqual([
      ['IBM', 2],
      ['AAPL', 1],
    ]);
    const [url = ''] = transport.mock.calls[0] ?? [];
    const params = new URL(url).searchParams;
    expect(params.get('ticker')).toBe('IBM,AAPL');
    expect(params.get('dte')).toBe('30,45');
    expect(params.has('delta')).toBe(false);
  });

  it('fetches forecast surfaces when asked', async () => {
    const { api, transport } = apiWith(() => envelope([moneyOf('SPY', '2022-09-16')]));

    const result = await volatilitySurfaces(api, { tickers: 'SPY', forecast: true });

    expect(result.map((surface) => surface.ticker)).toEqual(['SPY']);
    const [url = ''] = transport.mock.calls[0] ?? [];
    expect(new URL(url).pathname).toBe('/datav2/monies/forecast');
  });
});

describe('VolatilityHistory', () => {
  const history = new VolatilityHistory(volatilityOf('2022-07-05'));

  it('excludes earnings from intraday volatility by default', () => {
    const intraday = history.intraday();

    expect([...intraday.keys()]).toEqual([...VOLATILITY_PERIODS]);
    expect(intraday.get(20)).toBe(0.01);
  });

  it('adds the one-day value when earnings are included', () => {
    const intraday = history.intraday(false);

    expect(intraday.size).toBe(VOLATILITY_PERIODS.length + 1);
    expect(intraday.get(1)).toBe(0.5);
    expect(intraday.get(20)).toBe(0.02);
  });

  it('includes earnings in close-to-close volatility by default', () => {
    expect(history.closeToClose().get(252)).toBe(2.52);
    expect(history.closeToClose(true).get(252)).toBe(1.26);
  });

  it('fetches the most recent record', async () => {
    const { api, transport } = apiWith(() =>
      envelope([volatilityOf('2022-07-01'), volatilityOf('2022-07-05'), volatilityOf('2022-06-30')]),
    );

    const latest = await VolatilityHistory.fetch(api, 'ibm');

    expect(latest.tradeDate).toBe('2022-07-05');
    const [url = ''] = transport.mock.calls[0] ?? [];
    expect(new URL(url).pathname).toBe('/datav2/hist/hvs');
  });

  it('fails when the ticker has no history', async () => {
    const { api } = apiWith(() => envelope([]));

    await expect(VolatilityHistory.fetch(api, 'IBM')).rejects.toBeInstanceOf(OratsNotFoundError);
  });
});

describe('PriceHistory', () => {
  const history = new PriceHistory([
    priceOf('2022-07-05', 141.2),
    priceOf('2022-07-01', 140.5),
    priceOf('2022-07-06', 139.9),
  ]);

  it('orders prices by trade date', () => {
    expect(history.range()).toEqual({ min: '2022-07-01', max: '2022-07-06' });
    expect([...history.closes()]).toEqual([
      ['2022-07-01', 140.5],
      ['2022-07-05', 141.2],
      ['2022-07-06', 139.9],
    ]);
  });

  it('limits closes to a date window', () => {
    expect([...history.closes('2022-07-02', '2022-07-05')]).toEqual([['2022-07-05', 141.2]]);
  });
});

describe('Asset', () => {
  const ibm = { ticker: 'IBM', min: '2007-01-03', max: '2022-07-05' };

  it('looks up the data range once', async () => {
    const { api, transport } = apiWith(() => envelope([ibm]));
    const asset = new Asset(api, ' ibm ');

    await expect(asset.historicalDataRange()).resolves.toEqual({ min: '2007-01-03', max: '2022-07-05' });
    await asset.historicalDataRange();

    expect(asset.ticker).toBe('IBM');
    expect(transport).toHaveBeenCalledTimes(1);
    const [url = ''] = transport.mock.calls[0] ?? [];
    expect(new URL(url).searchParams.get('ticker')).toBe('IBM');
  });

  it('retries a lookup that failed', async () => {
    let calls = 0;
    const { api, transport } = apiWith(() => {
      calls += 1;
      return calls === 1 ? new Response('unavailable', { status: 503 }) : envelope([ibm]);
    });
    const asset = new Asset(api, 'IBM');

    await expect(asset.historicalDataRange()).rejects.toMatchObject({ status: 503 });
    await expect(asset.historicalDataRange()).resolves.toEqual({ min: '2007-01-03', max: '2022-07-05' });
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('keeps a fresh lookup started after concurrent waiters fail', async () => {
    let calls = 0;
    const { api, transport } = apiWith(() => {
      calls += 1;
      return calls === 1 ? new Response('unavailable', { status: 503 }) : envelope([ibm]);
    });
    const asset = new Asset(api, 'IBM');

    const first = asset.historicalDataRange();
    const second = asset.historicalDataRange();
    const retried = first.catch(() => asset.historicalDataRange());

    await expect(second).rejects.toMatchObject({ status: 503 });
    await expect(retried).resolves.toEqual({ min: '2007-01-03', max: '2022-07-05' });
    await asset.historicalDataRange();
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('reports tickers ORATS does not cover', async () => {
    const { api } = apiWith(() => envelope([]));

    await expect(new Asset(api, 'ZZZZ').historicalDataRange()).rejects.toThrow('ORATS has no data for ZZZZ');
  });

  it('rejects a blank ticker', () => {
    const { api } = apiWith(() => envelope([]));

    expect(() => new Asset(api, ' ')).toThrow(OratsValidationError);
  });
});
