// Provider-independent relevance heuristic

/**
 * Base 0.5; whole query in title +0.3, in snippet +0.2; +0.2 scaled by the
 * share of query terms found anywhere; position bonus when the provider reports one.
 * Clamped to [0,1].
 */
export function relevanceScore(query: string, title: string, snippet: string, position?: number): number {
  const q = query.toLowerCase().trim();
  const t = title.toLowerCase();
  const s = snippet.toLowerCase();
  let score = 0.5;

  if (q && t.includes(q)) score += 0.3;
  if (q && s.includes(q)) score += 0.2;

  const terms = q.split(/\s+/).filter(Boolean);
  if (terms.length > 0) {
    const haystack = `${t} ${s}`;
    const matching = terms.filter((term) => haystack.includes(term)).length;
    score += (matching / terms.length) * 0.2;
  }

  if (position !== undefined) {
    if (position <= 3) score += 0.1;
    else if (position <= 5) score += 0.05;
  }

  return Math.min(Math.max(score, 0), 1);
}
