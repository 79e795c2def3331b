import type { DateTime } from 'luxon';
import type { DeadlineConfig } from '../config/config-schema.js';
import { describeDeadline } from './deadlines.js';
import type { QuoteSource } from './quote-source.js';

/**
 * Builds the daily countdown message:
 *
 * ```
 * {signature}
 *
 * {deadline line}...
 *
 * {quote}
 * ```
 */
export class ReminderComposer {
  constructor(
    private readonly deadlines: readonly DeadlineConfig[],
    private readonly signature: string,
    private readonly quotes: QuoteSource
  ) {}

  async computeMessage(today: DateTime): Promise<string> {
    const lines = this.deadlines.map((deadline) => describeDeadline(deadline, today));
    const quote = await this.quotes.quoteFor(today);
    return [`${this.signature}\n`, ...lines, `\n${quote}`].join('\n');
  }
}
