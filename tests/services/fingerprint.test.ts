import { describe, it, expect } from 'vitest';
import { enhancementKey, normalizeQuery, requestFingerprint, searchKey } from '@/services/fingerprint';

describe('normalizeQuery', () => {
  it('trims, lower-cases and collapses whitespace', () => {
    expect(normalizeQuery('  Latest   AI\tDevelopments \n')).toBe('latest ai developments');
  });
});

describe('requestFingerprint', () => {
  const base = { query: 'Latest AI developments', maxResults: 8, includeSources: true };

  it('is a hex sha-256 digest', () => {
    expect(requestFingerprint(base)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores case and spacing of the query', () => {
    expect(requestFingerprint({ ...base, query: '  latest  ai DEVELOPMENTS' })).toBe(requestFingerprint(base));
  });

  it('changes with the result limit and the sources flag', () => {
    const fp = requestFingerprint(base);
    expect(requestFingerprint({ ...base, maxResults: 5 })).not.toBe(fp);
    expect(requestFingerprint({ ...base, includeSources: false })).not.toBe(fp);
  });
});

describe('stage keys', () => {
  it('normalizes the query and separates limits', () => {
    expect(searchKey('Rust  Async', 8)).toBe(searchKey('rust async', 8));
    expect(searchKey('rust async', 8)).not.toBe(searchKey('rust async', 5));
    expect(enhancementKey('Rust Async')).toBe(enhancementKey('rust async'));
  });
});
