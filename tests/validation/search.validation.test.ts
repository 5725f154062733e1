import { describe, it, expect } from 'vitest';
import { parseSearchRequest, validateSearchRequest } from '@/validation/search.validation';
import { ValidationError } from '@/core/errors';

describe('validateSearchRequest', () => {
  it('trims the query and applies defaults', () => {
    expect(validateSearchRequest({ query: '  solar power  ' })).toEqual({
      success: true,
      data: { query: 'solar power', maxResults: 8, includeSources: true },
    });
  });

  it('accepts string forms of the numeric and boolean fields', () => {
    expect(validateSearchRequest({ query: 'q', max_results: '5', include_sources: 'false' })).toEqual({
      success: true,
      data: { query: 'q', maxResults: 5, includeSources: false },
    });
  });

  it('rejects a missing or blank query', () => {
    expect(validateSearchRequest({})).toEqual({
      success: false,
      error: [{ path: 'query', message: 'Query is required' }],
    });
    expect(validateSearchRequest({ query: '   ' })).toEqual({
      success: false,
      error: [{ path: 'query', message: 'Query cannot be empty' }],
    });
    expect(validateSearchRequest(undefined)).toMatchObject({ success: false });
  });

  it('rejects an overlong query', () => {
    expect(validateSearchRequest({ query: 'x'.repeat(501) })).toEqual({
      success: false,
      error: [{ path: 'query', message: 'Query must be at most 500 characters' }],
    });
    expect(validateSearchRequest({ query: 'x'.repeat(500) }).success).toBe(true);
  });

  it('bounds max_results to 1..20', () => {
    expect(validateSearchRequest({ query: 'q', max_results: 0 })).toEqual({
      success: false,
      error: [{ path: 'max_results', message: 'max_results must be at least 1' }],
    });
    expect(validateSearchRequest({ query: 'q', max_results: 21 })).toEqual({
      success: false,
      error: [{ path: 'max_results', message: 'max_results must be at most 20' }],
    });
    expect(validateSearchRequest({ query: 'q', max_results: 2.5 })).toEqual({
      success: false,
      error: [{ path: 'max_results', message: 'max_results must be an integer' }],
    });
  });
});

describe('parseSearchRequest', () => {
  it('throws a ValidationError carrying the issues', () => {
    let caught: unknown;
    try {
      parseSearchRequest({ query: '' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'query: Query cannot be empty',
      issues: [{ path: 'query', message: 'Query cannot be empty' }],
    });
  });
});
