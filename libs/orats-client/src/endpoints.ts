import type { z } from 'zod';
import { OratsValidationError } from './errors';
import type { OratsClient } from './oratsClient';
import {
  isHistoricalRequest,
  toQueryParams,
  toRequestBody,
  type DataApiRequest,
  type RequestKind,
  type StrikesByOptionsRequest,
} from './requests';
import { strikeSchema, type Strike } from './responses';

export const HISTORICAL_PREFIX = 'hist';

export interface EndpointDefinition<Req extends DataApiRequest, S extends z.ZodTypeAny> {
  /** Request variant this endpoint accepts. */
  kind: Req['kind'];
  /** Live resource path, e.g. `strikes`; the historical form is derived from it. */
  resource: string;
  schema: S;
  /** The resource has no live form, so `hist/` is always used. */
  historicalOnly?: boolean;
}

/**
 * Binds one request variant to one resource and one response schema.
 *
 * A request carrying a `tradeDate` is sent to `hist/<resource>` instead of
 * `<resource>`; live and historical data share this single endpoint.
 */
export class DataApiEndpoint<Req extends DataApiRequest, S extends z.ZodTypeAny> {
  readonly kind: Req['kind'];
  readonly resource: string;
  readonly schema: S;
  readonly historicalOnly: boolean;

  constructor(
    protected readonly client: OratsClient,
    definition: EndpointDefinition<Req, S>,
  ) {
    this.kind = definition.kind;
    this.resource = definition.resource;
    this.schema = definition.schema;
    this.historicalOnly = definition.historicalOnly ?? false;
  }

  /** Resource path for `request`, after historical redirection. */
  path(request?: Req): string {
    const historical = this.historicalOnly || (request !== undefined && isHistoricalRequest(request));
    return historical ? `${HISTORICAL_PREFIX}/${this.resource}` : this.resource;
  }

  async fetch(request: Req): Promise<readonly z.output<S>[]> {
    this.assertKind(request);
    return this.client.get(this.path(request), toQueryParams(request), this.schema);
  }

  protected assertKind(request: { readonly kind: RequestKind }): void {
    if (request.kind !== this.kind) {
      throw new OratsValidationError(
        `The ${this.resource} endpoint takes a ${this.kind} request, got ${request.kind}`,
        'kind',
      );
    }
  }
}

/**
 * Strikes for exact (ticker, expiration, strike) triples. One request is a
 * GET; several are sent together as a single POST with a JSON array body.
 */
export class StrikesByOptionsEndpoint extends DataApiEndpoint<StrikesByOptionsRequest, typeof strikeSchema> {
  constructor(client: OratsClient) {
    super(client, { kind: 'strikesByOptions', resource: 'strikes/options', schema: strikeSchema });
  }

  async fetch(...requests: StrikesByOptionsRequest[]): Promise<readonly Strike[]> {
    const [first, ...rest] = requests;
    if (!first) {
      throw new OratsValidationError('At least one strikesByOptions request is required', '');
    }
    if (rest.length === 0) {
      return super.fetch(first);
    }

    requests.forEach((request) => this.assertKind(request));
    const historical = isHistoricalRequest(first);
    if (rest.some((request) => isHistoricalRequest(request) !== historical)) {
      throw new OratsValidationError(
        'Batched strikesByOptions requests must either all carry a tradeDate or none',
        'tradeDate',
      );
    }

    return this.client.post(this.path(first), requests.map(toRequestBody), this.schema);
  }
}
