import { describe, expect, it } from 'vitest';
import { DEMO_TOKEN, resolveToken, resolveTokenWithSource } from '../token';

describe('resolveToken', () => {
  it('prefers an explicit token', () => {
    expect(resolveTokenWithSource('test-token', { ORATS_API_TOKEN: 'env-token' })).toEqual({
      token: 'test-token',
      source: 'explicit',
    });
  });

  it('falls back to ORATS_API_TOKEN', () => {
    expect(resolveTokenWithSource(undefined, { ORATS_API_TOKEN: ' env-token ' })).toEqual({
      token: 'env-token',
      source: 'environment',
    });
  });

  it('treats blank values as missing', () => {
    expect(resolveTokenWithSource('  ', { ORATS_API_TOKEN: '' })).toEqual({
      token: DEMO_TOKEN,
      source: 'default',
    });
  });

  it('uses the demo token when nothing is configured', () => {
    expect(resolveToken(undefined, {})).toBe('demo');
  });
});
