// URL → cleaned main text (ZenRows proxy or direct GET)
import axios, { type AxiosInstance } from 'axios';
import { Readability } from '@mozilla/readability';
import { parseHTML } from 'linkedom';
import TurndownService from 'turndown';
import type { FetchedSource } from '@/types/core';
import type { ContentFetcher } from '@/types/collaborators';
import { DependencyFailureError, errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';
import { toDependencyError } from '@/utils/httpErrors';

const ZENROWS_URL = 'https://api.zenrows.com/v1/';
const USER_AGENT = 'Mozilla/5.0 (compatible; answer-pipeline/1.0; +https://example.invalid/bot)';
const MAX_HTML_BYTES = 5 * 1024 * 1024;

const BOILERPLATE_PATTERNS = [
  /cookie\s+policy.*?(?=\.|$)/gi,
  /privacy\s+policy.*?(?=\.|$)/gi,
  /terms\s+of\s+service.*?(?=\.|$)/gi,
  /subscribe\s+to.*?(?=\.|$)/gi,
  /follow\s+us.*?(?=\.|$)/gi,
  /share\s+this.*?(?=\.|$)/gi,
];

const MAIN_CONTENT_SELECTORS = [
  'main',
  'article',
  '[role="main"]',
  '.content',
  '#content',
  '.post-content',
  '.entry-content',
  '.article-content',
];

const turndown = new TurndownService({ headingStyle: 'atx', codeBlockStyle: 'fenced' });

export interface ExtractedContent {
  title: string;
  text: string;
  truncated: boolean;
}

/** Markdown from Turndown reduced to plain prose: images gone, links kept as their text. */
function markdownToText(markdown: string): string {
  return markdown
    .replace(/!\[[^\]]*\]\([^)]*\)/g, '')
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/^#{1,6}\s+/gm, '');
}

const ELLIPSIS = '...';

export function cleanText(raw: string, maxLength: number): { text: string; truncated: boolean } {
  let text = raw.replace(/\s+/g, ' ');
  for (const pattern of BOILERPLATE_PATTERNS) text = text.replace(pattern, '');
  text = text.replace(/\s+/g, ' ').trim();
  if (text.length > maxLength) {
    // the ellipsis counts toward the limit
    let cut = text.slice(0, Math.max(0, maxLength - ELLIPSIS.length));
    if (/[\uD800-\uDBFF]$/.test(cut)) cut = cut.slice(0, -1);
    return { text: `${cut.trimEnd()}${ELLIPSIS}`, truncated: true };
  }
  return { text, truncated: false };
}

function fallbackText(html: string): string {
  const { document } = parseHTML(html);
  document.querySelectorAll('script, style, noscript, nav, header, footer, aside').forEach((el) => el.remove());
  for (const selector of MAIN_CONTENT_SELECTORS) {
    const el = document.querySelector(selector);
    const text = el?.textContent?.trim();
    if (text) return text;
  }
  return document.body?.textContent ?? '';
}

/** Readability first; a plain DOM text walk when it finds no article. */
export function extractMainText(html: string, maxLength: number): ExtractedContent {
  let title = '';
  let body = '';
  try {
    const { document } = parseHTML(html);
    title = document.title ?? '';
    const article = new Readability(document).parse();
    if (article?.content) {
      title = article.title || title;
      body = markdownToText(turndown.turndown(article.content));
    }
  } catch (err) {
    logger.debug('fetch:readability_failed', { error: errorMessage(err) });
  }
  if (!body.trim()) body = fallbackText(html);

  const { text, truncated } = cleanText(body, maxLength);
  return { title: title.trim(), text, truncated };
}

export interface WebContentFetcherOptions {
  maxContentLength: number;
  zenrowsApiKey?: string;
  /** USD per request through the proxy; direct fetches are free. */
  costPerRequest?: number;
  http?: AxiosInstance;
}

export class WebContentFetcher implements ContentFetcher {
  readonly name = 'content_fetcher';
  readonly costPerRequest: number;
  private readonly http: AxiosInstance;

  constructor(private readonly options: WebContentFetcherOptions) {
    this.costPerRequest = options.zenrowsApiKey ? (options.costPerRequest ?? 0.01) : 0;
    this.http = options.http ?? axios.create({ maxContentLength: MAX_HTML_BYTES });
  }

  async fetch(url: string, signal: AbortSignal, title = ''): Promise<FetchedSource> {
    const html = await this.download(url, signal);
    const extracted = extractMainText(html, this.options.maxContentLength);
    if (!extracted.text) {
      throw new DependencyFailureError(this.name, 'error', `no extractable content at ${url}`);
    }
    return {
      url,
      title: title || extracted.title || url,
      extractedText: extracted.text,
      fetchStatus: extracted.truncated ? 'truncated' : 'ok',
    };
  }

  private async download(url: string, signal: AbortSignal): Promise<string> {
    const apiKey = this.options.zenrowsApiKey;
    if (apiKey) {
      try {
        return await this.get(ZENROWS_URL, signal, {
          url,
          apikey: apiKey,
          js_render: 'true',
          premium_proxy: 'true',
          proxy_country: 'US',
          wait: '2',
        });
      } catch (err) {
        if (signal.aborted) throw err;
        logger.warn('fetch:proxy_failed', { url, error: errorMessage(err) });
      }
    }
    return this.get(url, signal);
  }

  private async get(target: string, signal: AbortSignal, params?: Record<string, string>): Promise<string> {
    try {
      const res = await this.http.get<string>(target, {
        params,
        signal,
        responseType: 'text',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
      });
      const contentType = String(res.headers['content-type'] ?? 'text/html');
      if (!/html|xml|text\/plain/i.test(contentType)) {
        throw new DependencyFailureError(this.name, 'error', `unsupported content type ${contentType}`);
      }
      return typeof res.data === 'string' ? res.data : String(res.data);
    } catch (err) {
      throw toDependencyError(this.name, err);
    }
  }
}
