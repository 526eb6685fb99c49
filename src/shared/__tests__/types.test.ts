import { describe, it, expect } from 'vitest';
import { formatQuotaKey, isQuotaKey } from '../types.js';

describe('quota keys', () => {
  it('joins provider and quota with a slash', () => {
    expect(formatQuotaKey('synthetic', 'subscription')).toBe('synthetic/subscription');
  });

  it('accepts provider/quota strings', () => {
    expect(isQuotaKey('synthetic/subscription')).toBe(true);
    expect(isQuotaKey('acme/tokens/daily')).toBe(true);
  });

  it('rejects strings without both parts', () => {
    expect(isQuotaKey('subscription')).toBe(false);
    expect(isQuotaKey('/subscription')).toBe(false);
    expect(isQuotaKey('synthetic/')).toBe(false);
    expect(isQuotaKey('')).toBe(false);
  });
});
