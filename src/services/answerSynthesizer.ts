// LLM answer over fetched excerpts (OpenAI chat completions)
import OpenAI from 'openai';
import { z } from 'zod';
import type { FetchedSource, SynthesisResult } from '@/types/core';
import type { AnswerSynthesizer } from '@/types/collaborators';
import { DependencyFailureError, errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';
import { safeParseJson } from '@/utils/safeParseJson';

export const MAX_PROMPT_SOURCES = 5;
export const MAX_CHARS_PER_SOURCE = 800;
const MAX_ANSWER_CHARS = 2000;

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionResult {
  content: string;
  totalTokens: number;
}

/** Narrow seam over the chat API so tests can stand in for the model. */
export type CompletionFn = (request: CompletionRequest, signal: AbortSignal) => Promise<CompletionResult>;

export function openAICompletion(client: OpenAI): CompletionFn {
  return async (request, signal) => {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        response_format: { type: 'json_object' },
      },
      { signal },
    );
    return {
      content: response.choices[0]?.message?.content ?? '',
      totalTokens: response.usage?.total_tokens ?? 0,
    };
  };
}

const SYSTEM_PROMPT = `You answer questions using only the web search results provided.
Synthesize across sources, stay factual, and say what is missing when the results do not fully answer the question.
Aim for 2-4 short paragraphs in clear language.
Reply with a JSON object: {"answer": string, "confidence": number between 0 and 1, "sources_used": array of the source numbers you relied on}.`;

const modelReplySchema = z.object({
  answer: z.string().optional(),
  confidence: z.coerce.number().min(0).max(1).optional().catch(undefined),
  sources_used: z.array(z.union([z.number(), z.string()])).optional().catch(undefined),
});

const ANSWER_PREFIXES = ['RESPONSE:', 'Answer:', 'Based on the search results:', 'According to the provided information:'];
const GENERIC_INDICATORS = ['error', 'unable to', 'cannot provide', 'insufficient information'];
const NAVIGATION_WORDS = ['home', 'about', 'contact', 'menu', 'navigation'];

export function buildPrompt(query: string, sources: readonly FetchedSource[]): string {
  const sections = sources.slice(0, MAX_PROMPT_SOURCES).map((s, i) => {
    const excerpt =
      s.extractedText.length > MAX_CHARS_PER_SOURCE
        ? `${s.extractedText.slice(0, MAX_CHARS_PER_SOURCE)}...`
        : s.extractedText;
    return `Source ${i + 1}:\nTitle: ${s.title}\nURL: ${s.url}\nContent: ${excerpt}`;
  });
  return `USER QUERY: ${query}\n\nSEARCH RESULTS:\n${sections.join('\n---\n')}`;
}

export function cleanAnswer(raw: string): string {
  let answer = raw.trim();
  for (const prefix of ANSWER_PREFIXES) {
    if (answer.startsWith(prefix)) answer = answer.slice(prefix.length).trim();
  }
  return answer.length > MAX_ANSWER_CHARS ? `${answer.slice(0, MAX_ANSWER_CHARS)}...` : answer;
}

/** Heuristic quality of one extracted source in [0,1]. */
export function sourceQuality(source: FetchedSource): number {
  const text = source.extractedText;
  const lower = text.toLowerCase();
  const words = text.split(/\s+/).filter(Boolean).length;
  let score = 0.5;
  if (words > 100) score += 0.2;
  else if (words > 50) score += 0.1;
  if (source.title && lower.includes(source.title.toLowerCase())) score += 0.1;
  if (text.includes('.') && text.length > 200) score += 0.1;
  if (NAVIGATION_WORDS.filter((w) => lower.includes(w)).length > 3) score -= 0.2;
  return clamp01(score);
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

/**
 * Answer-side confidence: source quality, answer length and domain diversity,
 * penalized for generic or error-like answers.
 */
export function heuristicConfidence(answer: string, sources: readonly FetchedSource[]): number {
  let score = 0.5;
  if (sources.length > 0) {
    const avgQuality = sources.reduce((sum, s) => sum + sourceQuality(s), 0) / sources.length;
    score += avgQuality * 0.3;
  }
  const words = answer.split(/\s+/).filter(Boolean).length;
  if (words >= 50 && words <= 300) score += 0.2;
  else if (words > 20) score += 0.1;

  const hosts = new Set(sources.map((s) => hostOf(s.url)).filter((h): h is string => h !== null));
  if (hosts.size > 1) score += 0.1;

  const lower = answer.toLowerCase();
  if (GENERIC_INDICATORS.some((g) => lower.includes(g))) score -= 0.2;
  return clamp01(score);
}

function clamp01(n: number): number {
  return Math.min(Math.max(n, 0), 1);
}

/** Maps the model's source references (1-based numbers or URLs) back onto URLs, in source order. */
export function resolveSourcesUsed(
  refs: ReadonlyArray<number | string> | undefined,
  sources: readonly FetchedSource[],
): string[] {
  const offered = sources.map((s) => s.url);
  if (!refs || refs.length === 0) return offered;
  const picked = new Set<string>();
  for (const ref of refs) {
    const n = typeof ref === 'number' ? ref : Number(ref);
    if (Number.isInteger(n) && n >= 1 && n <= offered.length) picked.add(offered[n - 1]);
    else if (typeof ref === 'string' && offered.includes(ref)) picked.add(ref);
  }
  const used = offered.filter((url) => picked.has(url));
  return used.length > 0 ? used : offered;
}

export interface OpenAISynthesizerOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  /** USD per 1k tokens; 0 leaves synthesis unmetered. */
  costPer1kTokens: number;
  complete: CompletionFn;
}

export class OpenAISynthesizer implements AnswerSynthesizer {
  readonly name = 'synthesizer';

  constructor(private readonly options: OpenAISynthesizerOptions) {}

  estimateCost(query: string, sources: readonly FetchedSource[]): number {
    if (this.options.costPer1kTokens <= 0) return 0;
    // ~4 characters per token
    const promptTokens = (SYSTEM_PROMPT.length + buildPrompt(query, sources).length) / 4;
    return ((promptTokens + this.options.maxTokens) / 1000) * this.options.costPer1kTokens;
  }

  async synthesize(query: string, sources: readonly FetchedSource[], signal: AbortSignal): Promise<SynthesisResult> {
    const offered = sources.slice(0, MAX_PROMPT_SOURCES);
    let completion: CompletionResult;
    try {
      completion = await this.options.complete(
        {
          model: this.options.model,
          system: SYSTEM_PROMPT,
          user: buildPrompt(query, offered),
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
        },
        signal,
      );
    } catch (err) {
      throw toSynthesisError(this.name, err);
    }

    const reply = modelReplySchema.safeParse(safeParseJson(completion.content, 'synthesizer'));
    const parsed: z.infer<typeof modelReplySchema> = reply.success ? reply.data : {};
    const raw = parsed.answer ?? (completion.content.trim().startsWith('{') ? '' : completion.content);
    const answerText = cleanAnswer(raw);
    if (!answerText) {
      throw new DependencyFailureError(this.name, 'error', 'model returned an empty answer');
    }

    const heuristic = heuristicConfidence(answerText, offered);
    const confidence =
      parsed.confidence === undefined ? heuristic : Math.round(((heuristic + parsed.confidence) / 2) * 1000) / 1000;
    const cost = (completion.totalTokens / 1000) * this.options.costPer1kTokens;

    logger.debug('synthesizer:answer', { chars: answerText.length, tokens: completion.totalTokens, confidence });
    return {
      answerText,
      confidence: clamp01(confidence),
      sourcesUsed: resolveSourcesUsed(parsed.sources_used, offered),
      cost: cost > 0 ? cost : undefined,
    };
  }
}

function toSynthesisError(dependency: string, err: unknown): DependencyFailureError {
  if (err instanceof DependencyFailureError) return err;
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new DependencyFailureError(dependency, 'timeout', err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIError && (err.status === 404 || err.status === 429 || err.status === 503)) {
    return new DependencyFailureError(dependency, 'model_unavailable', err.message, { cause: err });
  }
  return new DependencyFailureError(dependency, 'error', errorMessage(err), { cause: err });
}
