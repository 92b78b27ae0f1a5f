import { OratsResponseParseError, OratsValidationError } from '../errors';
import { formatBounds } from '../requests';
import type { DataApiRecord } from '../responses';

/**
 * Range filter as the API's comma-separated pair, e.g. `bounds(30, 45)` is
 * `"30,45"` and `bounds(undefined, 45)` is `",45"`. Undefined when both sides
 * are open, so the filter can be left off the request.
 */
export function bounds(min?: number, max?: number): string | undefined {
  if (min === undefined && max === undefined) {
    return undefined;
  }
  return formatBounds({ min, max });
}

/** Groups records by ticker, keeping the order tickers first appear in. */
export function groupByTicker<T extends DataApiRecord>(records: Iterable<T>): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const group = groups.get(record.ticker);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.ticker, [record]);
    }
  }
  return groups;
}

/** First and last trade date with data, inclusive. */
export interface DataRange {
  readonly min: string;
  readonly max: string;
}

/** Reads a numeric column whose name is computed, e.g. `orHv20d` or `vol25`. */
export function numericField(record: Readonly<Record<string, unknown>>, column: string): number {
  const value = record[column];
  if (typeof value !== 'number') {
    throw new OratsResponseParseError(`Record has no numeric ${column} column`, column);
  }
  return value;
}

/** Records of a single ticker; mixing tickers or passing none is a caller error. */
export function singleTicker(records: readonly DataApiRecord[], construct: string): string {
  const [first] = records;
  if (!first) {
    throw new OratsValidationError(`${construct} needs at least one record`, 'ticker');
  }
  const other = records.find((record) => record.ticker !== first.ticker);
  if (other) {
    throw new OratsValidationError(
      `${construct} takes records of one ticker, got ${first.ticker} and ${other.ticker}`,
      'ticker',
    );
  }
  return first.ticker;
}
