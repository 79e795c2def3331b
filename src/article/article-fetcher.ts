/**
 * Article reader.
 *
 * Fetches a page and extracts its main text for summarization. Failures are
 * returned as error results; nothing here throws.
 */

import { parse, TextNode } from 'node-html-parser';
import type { Node } from 'node-html-parser';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../utils/guards.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_CHARS = 8000;
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/** Page chrome removed before extraction */
const STRIPPED_ELEMENTS = 'script, style, nav, header, footer, aside';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type ArticleError =
  | { code: 'HTTP_ERROR'; message: string; status: number; retryable: boolean }
  | { code: 'TIMEOUT'; message: string; retryable: true }
  | { code: 'NETWORK_ERROR'; message: string; retryable: true }
  | { code: 'NO_CONTENT'; message: string; retryable: false };

export type ArticleResult = { ok: true; url: string; text: string } | { ok: false; error: ArticleError };

export interface ArticleReader {
  read(url: string): Promise<ArticleResult>;
}

export interface ArticleFetcherConfig {
  timeoutMs?: number | undefined;
  maxChars?: number | undefined;
  userAgent?: string | undefined;
  /** Injected for tests */
  fetch?: typeof globalThis.fetch | undefined;
}

// ═══════════════════════════════════════════════════════════════
// EXTRACTION
// ═══════════════════════════════════════════════════════════════

function collectText(node: Node, out: string[]): void {
  if (node instanceof TextNode) {
    const text = node.text.trim();
    if (text) out.push(text);
    return;
  }
  for (const child of node.childNodes) {
    collectText(child, out);
  }
}

/**
 * Main text of an HTML document: the first `article`, else `main`, else
 * `body`, one trimmed text run per line. Null when none of those exist.
 */
export function extractArticleText(html: string, maxChars = DEFAULT_MAX_CHARS): string | null {
  const root = parse(html);

  for (const element of root.querySelectorAll(STRIPPED_ELEMENTS)) {
    element.remove();
  }

  const container =
    root.querySelector('article') ?? root.querySelector('main') ?? root.querySelector('body');
  if (!container) return null;

  const parts: string[] = [];
  collectText(container, parts);
  const text = parts.join('\n');

  return text.length > maxChars ? text.slice(0, maxChars) + '...' : text;
}

// ═══════════════════════════════════════════════════════════════
// FETCHER
// ═══════════════════════════════════════════════════════════════

export class ArticleFetcher implements ArticleReader {
  private readonly timeoutMs: number;
  private readonly maxChars: number;
  private readonly userAgent: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly logger: Logger;

  constructor(config: ArticleFetcherConfig, logger: Logger) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxChars = config.maxChars ?? DEFAULT_MAX_CHARS;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchFn = config.fetch ?? globalThis.fetch;
    this.logger = logger.child({ component: 'article-fetcher' });
  }

  async read(url: string): Promise<ArticleResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    let html: string;
    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: { 'User-Agent': this.userAgent },
      });

      if (response.status !== 200) {
        this.logger.warn({ url, status: response.status }, 'Article fetch returned non-200');
        return {
          ok: false,
          error: {
            code: 'HTTP_ERROR',
            message: `Article fetch returned status ${String(response.status)}`,
            status: response.status,
            retryable: response.status >= 500,
          },
        };
      }

      html = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        this.logger.warn({ url, timeoutMs: this.timeoutMs }, 'Article fetch timed out');
        return {
          ok: false,
          error: {
            code: 'TIMEOUT',
            message: `Article fetch timed out after ${String(this.timeoutMs)}ms`,
            retryable: true,
          },
        };
      }

      const message = errorMessage(error);
      this.logger.warn({ url, error: message }, 'Article fetch failed');
      return {
        ok: false,
        error: { code: 'NETWORK_ERROR', message: `Article fetch failed: ${message}`, retryable: true },
      };
    } finally {
      clearTimeout(timeoutId);
    }

    const text = extractArticleText(html, this.maxChars);
    if (!text) {
      return {
        ok: false,
        error: { code: 'NO_CONTENT', message: 'No readable content found', retryable: false },
      };
    }

    this.logger.debug({ url, length: text.length }, 'Article extracted');
    return { ok: true, url, text };
  }
}
