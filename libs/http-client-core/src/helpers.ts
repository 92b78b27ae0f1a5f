import type { HttpTransport, QueryParams } from './types';

export const defaultTransport: HttpTransport = (url, init) => fetch(url, init);

/**
 * Joins `path` onto `baseUrl` (keeping any path prefix of the base) and
 * appends the defined query params in key order.
 */
export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`);
  if (params) {
    const entries = Object.entries(params).filter(([, value]) => value !== undefined);
    entries.sort(([a], [b]) => a.localeCompare(b));
    for (const [key, value] of entries) {
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}
