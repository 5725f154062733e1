import { describe, it, expect } from 'vitest';
import {
  DependencyFailureError,
  DependencyUnavailableError,
  httpStatusFor,
  NoUsableSourcesError,
  PipelineTimeoutError,
  ValidationError,
} from '@/core/errors';
import { createErrorResponse, errorToResponse } from '@/utils/errorResponse';

describe('httpStatusFor', () => {
  it('maps each pipeline error onto a status', () => {
    expect(httpStatusFor(new ValidationError('bad'))).toBe(400);
    expect(httpStatusFor(new NoUsableSourcesError('fetch', 'all 5 fetches failed'))).toBe(502);
    expect(httpStatusFor(new PipelineTimeoutError(30_000))).toBe(504);
    expect(httpStatusFor(new DependencyUnavailableError('brave', 'circuit_open'))).toBe(503);
    expect(httpStatusFor(new DependencyFailureError('brave', 'timeout', 'slow'))).toBe(502);
    expect(httpStatusFor(new Error('bug'))).toBe(500);
  });

  it('names errors after their class', () => {
    expect(new PipelineTimeoutError(50).name).toBe('PipelineTimeoutError');
    expect(new DependencyUnavailableError('serpapi', 'budget_denied', 'daily budget reached').message).toBe(
      'serpapi unavailable (budget_denied): daily budget reached',
    );
  });
});

describe('errorToResponse', () => {
  it('echoes pipeline errors with their code', () => {
    expect(errorToResponse(new NoUsableSourcesError('search', 'providers returned no hits'))).toEqual({
      status: 502,
      body: {
        success: false,
        message: 'no usable sources after search: providers returned no hits',
        code: 'no_usable_sources',
      },
    });
  });

  it('includes validation issues', () => {
    const err = new ValidationError('query: Query is required', [{ path: 'query', message: 'Query is required' }]);
    expect(errorToResponse(err).body.errors).toEqual([{ path: 'query', message: 'Query is required' }]);
  });

  it('hides the message of unexpected errors', () => {
    expect(errorToResponse(new Error('secret stack detail'))).toEqual({
      status: 500,
      body: { success: false, message: 'Internal Server Error', code: 'internal_error' },
    });
  });
});

describe('createErrorResponse', () => {
  it('omits empty issue lists and codes', () => {
    expect(createErrorResponse('Not found', [])).toEqual({ success: false, message: 'Not found' });
  });
});
