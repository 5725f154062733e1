import { describe, it, expect } from 'vitest';
import { safeParseJson } from '@/utils/safeParseJson';

describe('safeParseJson', () => {
  it('parses a plain object', () => {
    expect(safeParseJson('{"answer": "yes"}', 'test')).toEqual({ answer: 'yes' });
  });

  it('strips markdown fences', () => {
    expect(safeParseJson('```json\n{"a": 1}\n```', 'test')).toEqual({ a: 1 });
  });

  it('finds an object embedded in prose', () => {
    expect(safeParseJson('Here you go: {"a": 1} hope it helps', 'test')).toEqual({ a: 1 });
  });

  it('accepts single-quoted keys and strings', () => {
    expect(safeParseJson("{'a': 'b'}", 'test')).toEqual({ a: 'b' });
  });

  it('returns an empty object for arrays and garbage', () => {
    expect(safeParseJson('[1, 2]', 'test')).toEqual({});
    expect(safeParseJson('not json at all', 'test')).toEqual({});
  });
});
