export const TOKEN_ENV_VAR = 'ORATS_API_TOKEN';

/** The public token ORATS hands out for trying the API; it only sees a few symbols. */
export const DEMO_TOKEN = 'demo';

export type TokenSource = 'explicit' | 'environment' | 'default';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

export function resolveTokenWithSource(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedToken {
  if (present(explicit)) {
    return { token: explicit.trim(), source: 'explicit' };
  }
  const fromEnv = env[TOKEN_ENV_VAR];
  if (present(fromEnv)) {
    return { token: fromEnv.trim(), source: 'environment' };
  }
  return { token: DEMO_TOKEN, source: 'default' };
}

/**
 * Explicit value, then `ORATS_API_TOKEN`, then the demo token. Blank strings
 * count as missing.
 */
export function resolveToken(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolveTokenWithSource(explicit, env).token;
}
