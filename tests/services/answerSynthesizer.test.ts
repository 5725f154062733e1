import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import {
  buildPrompt,
  cleanAnswer,
  heuristicConfidence,
  OpenAISynthesizer,
  resolveSourcesUsed,
  type CompletionFn,
} from '@/services/answerSynthesizer';
import { DependencyFailureError } from '@/core/errors';
import type { FetchedSource } from '@/types/core';
import { signal } from '../helpers/http';

function source(url: string, extractedText = 'x'): FetchedSource {
  return { url, title: 'Alpha', extractedText, fetchStatus: 'ok' };
}

const SOURCES = [source('https://a.example/1'), source('https://b.example/2')];

function synthesizerWith(complete: CompletionFn, costPer1kTokens = 0.002): OpenAISynthesizer {
  return new OpenAISynthesizer({ model: 'gpt-4o-mini', maxTokens: 500, temperature: 0.3, costPer1kTokens, complete });
}

function replying(content: string, totalTokens = 1000): CompletionFn {
  return async () => ({ content, totalTokens });
}

describe('buildPrompt', () => {
  it('numbers sources and clips long excerpts', () => {
    const prompt = buildPrompt('solar power', [source('https://a.example/1', 'a'.repeat(900))]);
    expect(prompt).toContain('USER QUERY: solar power');
    expect(prompt).toContain('Source 1:\nTitle: Alpha\nURL: https://a.example/1');
    expect(prompt).toContain(`${'a'.repeat(800)}...`);
    expect(prompt).not.toContain('a'.repeat(801));
  });

  it('offers at most five sources', () => {
    const many = Array.from({ length: 7 }, (_, i) => source(`https://a.example/${i}`));
    const prompt = buildPrompt('q', many);
    expect(prompt).toContain('Source 5:');
    expect(prompt).not.toContain('Source 6:');
  });
});

describe('cleanAnswer', () => {
  it('strips answer prefixes', () => {
    expect(cleanAnswer('  Answer: Solar power works.  ')).toBe('Solar power works.');
  });

  it('caps the answer length', () => {
    const answer = cleanAnswer('w'.repeat(2500));
    expect(answer).toBe(`${'w'.repeat(2000)}...`);
  });
});

describe('heuristicConfidence', () => {
  it('starts from the base score without sources', () => {
    expect(heuristicConfidence('short answer', [])).toBe(0.5);
  });

  it('credits source quality and host diversity', () => {
    expect(heuristicConfidence('short answer', [SOURCES[0]])).toBeCloseTo(0.65);
    expect(heuristicConfidence('short answer', SOURCES)).toBeCloseTo(0.75);
  });

  it('penalizes answers that read like a refusal', () => {
    expect(heuristicConfidence('The data is unable to settle this', SOURCES)).toBeCloseTo(0.55);
  });
});

describe('resolveSourcesUsed', () => {
  it('maps source numbers and URLs back in source order', () => {
    expect(resolveSourcesUsed([2, 'https://a.example/1'], SOURCES)).toEqual(['https://a.example/1', 'https://b.example/2']);
    expect(resolveSourcesUsed(['2'], SOURCES)).toEqual(['https://b.example/2']);
  });

  it('falls back to every offered source when nothing resolves', () => {
    expect(resolveSourcesUsed([9, 'https://elsewhere.example'], SOURCES)).toEqual(['https://a.example/1', 'https://b.example/2']);
    expect(resolveSourcesUsed(undefined, SOURCES)).toEqual(['https://a.example/1', 'https://b.example/2']);
  });
});

describe('OpenAISynthesizer', () => {
  it('parses the model reply and blends its confidence with the heuristic', async () => {
    const complete = vi.fn(
      replying('{"answer": "Answer: Solar power works.", "confidence": 0.9, "sources_used": [2]}'),
    );
    const result = await synthesizerWith(complete).synthesize('solar power', SOURCES, signal());

    expect(result.answerText).toBe('Solar power works.');
    expect(result.sourcesUsed).toEqual(['https://b.example/2']);
    expect(result.confidence).toBeCloseTo(0.825, 3);
    expect(result.cost).toBeCloseTo(0.002);
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-4o-mini', maxTokens: 500, temperature: 0.3 }),
      expect.any(AbortSignal),
    );
  });

  it('reads a fenced JSON reply and keeps the heuristic confidence', async () => {
    const result = await synthesizerWith(replying('```json\n{"answer": "Fenced answer here."}\n```')).synthesize(
      'q',
      SOURCES,
      signal(),
    );
    expect(result.answerText).toBe('Fenced answer here.');
    expect(result.confidence).toBeCloseTo(0.75);
    expect(result.sourcesUsed).toEqual(['https://a.example/1', 'https://b.example/2']);
  });

  it('uses plain prose as the answer', async () => {
    const result = await synthesizerWith(replying('Plain prose answer.')).synthesize('q', SOURCES, signal());
    expect(result.answerText).toBe('Plain prose answer.');
  });

  it('fails on an empty answer', async () => {
    await expect(synthesizerWith(replying('{"answer": ""}')).synthesize('q', SOURCES, signal())).rejects.toBeInstanceOf(
      DependencyFailureError,
    );
  });

  it('leaves the cost unset without a token price', async () => {
    const synthesizer = synthesizerWith(replying('{"answer": "Fine."}'), 0);
    const result = await synthesizer.synthesize('q', SOURCES, signal());
    expect(result.cost).toBeUndefined();
    expect(synthesizer.estimateCost('q', SOURCES)).toBe(0);
  });

  it('estimates a positive cost with a token price', () => {
    expect(synthesizerWith(replying('')).estimateCost('q', SOURCES)).toBeGreaterThan(0.001);
  });

  it('maps a rate-limited model onto model_unavailable', async () => {
    const complete: CompletionFn = async () => {
      throw new OpenAI.RateLimitError(429, { message: 'slow down' }, 'slow down', {});
    };
    await expect(synthesizerWith(complete).synthesize('q', SOURCES, signal())).rejects.toMatchObject({
      dependency: 'synthesizer',
      kind: 'model_unavailable',
    });
  });

  it('maps a connection timeout onto timeout', async () => {
    const complete: CompletionFn = async () => {
      throw new OpenAI.APIConnectionTimeoutError();
    };
    await expect(synthesizerWith(complete).synthesize('q', SOURCES, signal())).rejects.toMatchObject({ kind: 'timeout' });
  });

  it('maps anything else onto a generic failure', async () => {
    const complete: CompletionFn = async () => {
      throw new Error('socket hang up');
    };
    await expect(synthesizerWith(complete).synthesize('q', SOURCES, signal())).rejects.toMatchObject({ kind: 'error' });
  });
});
