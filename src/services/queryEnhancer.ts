// Rule-based query expansion (no network, no cost)
import { z } from 'zod';
import rawKeywords from '@/data/enhancer-keywords.json';
import type { QueryEnhancer } from '@/types/collaborators';

const keywordsSchema = z.object({
  domains: z.array(z.object({ name: z.string(), suffix: z.string(), keywords: z.array(z.string()) })),
  temporalWords: z.array(z.string()),
  trendKeywords: z.array(z.string()),
  specificTerms: z.array(z.string()).min(1),
});

export type EnhancerKeywords = z.infer<typeof keywordsSchema>;

export const DEFAULT_KEYWORDS: EnhancerKeywords = keywordsSchema.parse(rawKeywords);

export const MAX_ENHANCED_QUERIES = 5;

export class HeuristicQueryEnhancer implements QueryEnhancer {
  readonly name = 'query_enhancer';

  constructor(private readonly keywords: EnhancerKeywords = DEFAULT_KEYWORDS) {}

  async enhance(query: string, signal: AbortSignal): Promise<string[]> {
    signal.throwIfAborted();
    const q = query.trim();
    if (!q) return [];

    const candidates = [
      q,
      ...this.semanticExpansion(q),
      ...this.domainVariant(q),
      ...this.temporalVariant(q),
    ];
    return dedupe(candidates).slice(0, MAX_ENHANCED_QUERIES);
  }

  /** Question forms for statements, plus a broader form of multi-word queries. At most two. */
  semanticExpansion(query: string): string[] {
    const out: string[] = [];
    if (!query.endsWith('?')) {
      out.push(`what is ${query}`, `how to ${query}`, `${query} explained`);
    }
    const words = query.split(/\s+/);
    if (words.length > 1) {
      out.push(words.length > 2 ? words.slice(0, -1).join(' ') : words[0]);
      out.push(`${query} ${this.keywords.specificTerms[0]}`);
    }
    return out.slice(0, 2);
  }

  domainVariant(query: string): string[] {
    const lower = query.toLowerCase();
    const domain = this.keywords.domains.find((d) => d.keywords.some((k) => lower.includes(k)));
    return domain ? [`${query} ${domain.suffix}`] : [];
  }

  temporalVariant(query: string): string[] {
    const lower = query.toLowerCase();
    const hasTemporal =
      /\b(19|20)\d{2}\b/.test(lower) || this.keywords.temporalWords.some((w) => containsWord(lower, w));
    if (hasTemporal) return [];
    return this.keywords.trendKeywords.some((k) => lower.includes(k)) ? [`latest ${query}`] : [];
  }
}

function containsWord(text: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`).test(text);
}

/** Order-preserving, case-insensitive. */
function dedupe(queries: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const q of queries) {
    const key = q.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(q);
  }
  return out;
}
