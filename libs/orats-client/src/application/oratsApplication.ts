import { DataApi } from '../dataApi';
import { Asset, VolatilityHistory } from '../industry/assets';
import {
  chains,
  volatilitySurfaces,
  type ChainsOptions,
  type OptionsChain,
  type VolatilitySurface,
  type VolatilitySurfacesOptions,
} from '../industry/options';
import { createOratsClientFromEnv, type OratsClient, type OratsClientConfig } from '../oratsClient';
import { Universe } from './universe';

/**
 * Entry point for application code. Owns one {@link DataApi} and hands out
 * assets that share it, so each ticker's data range is looked up once.
 *
 * ```typescript
 * const app = OratsApplication.fromEnv();
 * const [ibm] = await app.chains({ tickers: 'IBM', minDaysToExpiration: 30, maxDaysToExpiration: 45 });
 * for (const [expiration, calls, puts] of ibm) {
 *   // ...
 * }
 * ```
 */
export class OratsApplication {
  readonly api: DataApi;
  private readonly assets = new Map<string, Asset>();

  constructor(clientOrConfig: OratsClient | OratsClientConfig | DataApi = {}) {
    this.api = clientOrConfig instanceof DataApi ? clientOrConfig : new DataApi(clientOrConfig);
  }

  /** Reads `ORATS_API_TOKEN` and `ORATS_BASE_URL`; `overrides` win. */
  static fromEnv(overrides: OratsClientConfig = {}): OratsApplication {
    return new OratsApplication(createOratsClientFromEnv(overrides));
  }

  asset(ticker: string): Asset {
    const asset = new Asset(this.api, ticker);
    const known = this.assets.get(asset.ticker);
    if (known) {
      return known;
    }
    this.assets.set(asset.ticker, asset);
    return asset;
  }

  universe(tickers: Iterable<string>): Universe {
    return new Universe([...tickers].map((ticker) => this.asset(ticker)));
  }

  chains(options: ChainsOptions): Promise<OptionsChain[]> {
    return chains(this.api, options);
  }

  volatilitySurfaces(options: VolatilitySurfacesOptions): Promise<VolatilitySurface[]> {
    return volatilitySurfaces(this.api, options);
  }

  volatilityHistory(ticker: string, tradeDate?: string | Date): Promise<VolatilityHistory> {
    return this.asset(ticker).volatilityHistory(tradeDate);
  }
}
