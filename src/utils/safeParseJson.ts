/**
 * Lenient JSON object parse for model output: strips markdown fences, falls back
 * to the outermost {...} block, then to single-quote normalization.
 */
import { z } from 'zod';
import { logger } from '@/services/logger';

const objectSchema = z.record(z.unknown());

export function safeParseJson(raw: string, context: string): Record<string, unknown> {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }

  const candidates = [txt];
  const open = txt.indexOf('{');
  const close = txt.lastIndexOf('}');
  if (open > 0 && close > open) candidates.push(txt.slice(open, close + 1));
  candidates.push(txt.replace(/'/g, '"'));

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed) return parsed;
  }

  logger.warn('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  return {};
}

function tryParse(txt: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(txt);
  } catch {
    return null;
  }
  if (Array.isArray(value)) return null;
  const result = objectSchema.safeParse(value);
  return result.success ? result.data : null;
}
