import type { DataApi } from '../dataApi';
import { Asset } from '../industry/assets';
import type { DataRange } from '../industry/common';

/** A set of underlying assets, one per ticker. */
export class Universe implements Iterable<Asset> {
  private readonly assets: ReadonlyMap<string, Asset>;

  constructor(assets: Iterable<Asset>) {
    const byTicker = new Map<string, Asset>();
    for (const asset of assets) {
      if (!byTicker.has(asset.ticker)) {
        byTicker.set(asset.ticker, asset);
      }
    }
    this.assets = byTicker;
  }

  static of(api: DataApi, tickers: Iterable<string>): Universe {
    return new Universe([...tickers].map((ticker) => new Asset(api, ticker)));
  }

  get size(): number {
    return this.assets.size;
  }

  tickers(): string[] {
    return [...this.assets.keys()];
  }

  get(ticker: string): Asset | undefined {
    return this.assets.get(ticker.trim().toUpperCase());
  }

  [Symbol.iterator](): Iterator<Asset> {
    return this.assets.values();
  }

  /** Data range of every asset, looked up concurrently. */
  async dataRanges(): Promise<ReadonlyMap<string, DataRange>> {
    const entries = await Promise.all(
      [...this.assets.values()].map(async (asset): Promise<[string, DataRange]> => [
        asset.ticker,
        await asset.historicalDataRange(),
      ]),
    );
    return new Map(entries);
  }

  /** Dates every asset has data for, or null when the ranges do not overlap. */
  async commonDataRange(): Promise<DataRange | null> {
    const ranges = [...(await this.dataRanges()).values()];
    const [first, ...rest] = ranges;
    if (!first) {
      return null;
    }
    const common = rest.reduce(
      (acc, range) => ({
        min: range.min > acc.min ? range.min : acc.min,
        max: range.max < acc.max ? range.max : acc.max,
      }),
      first,
    );
    return common.min <= common.max ? common : null;
  }
}
