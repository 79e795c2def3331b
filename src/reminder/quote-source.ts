/**
 * Quote sources for the daily countdown.
 *
 * - seeded: a pure function of the calendar day
 * - generated: asks the model, falls back to the static list on any failure
 */

import type { DateTime } from 'luxon';
import type { LLMProvider } from '../llm/provider.js';
import { textOf } from '../llm/provider.js';
import type { Logger } from '../types/logger.js';
import { buildQuotePrompt } from '../conversation/prompts.js';
import { errorMessage } from '../utils/guards.js';
import { dayOrdinal } from './deadlines.js';

export interface QuoteSource {
  quoteFor(day: DateTime): Promise<string>;
}

/**
 * mulberry32 PRNG. The sequence depends only on the seed.
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(items: readonly T[], random: () => number): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Same quote all day; the day → quote mapping depends only on the day ordinal.
 */
export class SeededQuoteSource implements QuoteSource {
  constructor(private readonly quotes: readonly string[]) {
    if (quotes.length === 0) throw new Error('SeededQuoteSource needs at least one quote');
  }

  quoteFor(day: DateTime): Promise<string> {
    return Promise.resolve(pick(this.quotes, mulberry32(dayOrdinal(day))));
  }
}

export interface GeneratedQuoteSourceOptions {
  llm: LLMProvider | null;
  topics: readonly string[];
  fallbackQuotes: readonly string[];
  maxTokens: number;
  logger: Logger;
  /** Injected for tests */
  random?: (() => number) | undefined;
}

/**
 * Model-written quote on a random topic.
 */
export class GeneratedQuoteSource implements QuoteSource {
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: GeneratedQuoteSourceOptions) {
    if (options.fallbackQuotes.length === 0) {
      throw new Error('GeneratedQuoteSource needs at least one fallback quote');
    }
    this.random = options.random ?? Math.random;
    this.logger = options.logger.child({ component: 'quote-source' });
  }

  async quoteFor(day: DateTime): Promise<string> {
    const { llm, topics, fallbackQuotes, maxTokens } = this.options;
    if (!llm) {
      return pick(fallbackQuotes, this.random);
    }

    const topic = pick(topics, this.random);
    const dayLabel = day.setLocale('en-US').toFormat('cccc, LLLL dd');

    try {
      const response = await llm.complete({
        messages: [{ role: 'user', content: buildQuotePrompt(dayLabel, topic) }],
        maxTokens,
      });
      const quote = textOf(response.content).trim();
      if (quote) {
        this.logger.debug({ topic }, 'Quote generated');
        return quote;
      }
      this.logger.warn({ topic }, 'Model returned an empty quote, using fallback');
    } catch (error) {
      this.logger.warn({ topic, error: errorMessage(error) }, 'Quote generation failed, using fallback');
    }
    return pick(fallbackQuotes, this.random);
  }
}
