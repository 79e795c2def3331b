/**
 * Reminder ledgers answer "was today's countdown already sent?".
 *
 * HistoryScanLedger reads the channel itself, so nothing is stored locally.
 * FileReminderLedger keeps the last send date in a small state file.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { ChatChannel } from '../channels/channel.js';
import { ChannelError } from '../channels/channel.js';
import type { Logger } from '../types/logger.js';
import { errorMessage, isRecord } from '../utils/guards.js';

export interface ReminderLedger {
  readonly kind: string;
  /** Whether a countdown was sent on `day`'s calendar date in the scheduling zone */
  wasSentOn(day: DateTime): Promise<boolean>;
  /** Note a completed send */
  recordSent(at: DateTime): Promise<void>;
}

function localDate(at: DateTime, timezone: string): string {
  const date = at.setZone(timezone).toISODate();
  if (date === null) {
    throw new Error(`Cannot place ${at.toString()} in zone ${timezone}`);
  }
  return date;
}

export interface HistoryScanLedgerOptions {
  resolveChannel: () => Promise<ChatChannel | null>;
  botUserId: () => string | null;
  signature: string;
  timezone: string;
  scanLimit: number;
  logger: Logger;
}

/**
 * Scans recent channel history for a bot-authored message from the same day
 * that contains the signature.
 */
export class HistoryScanLedger implements ReminderLedger {
  readonly kind = 'history';
  private readonly logger: Logger;

  constructor(private readonly options: HistoryScanLedgerOptions) {
    this.logger = options.logger.child({ component: 'reminder-ledger' });
  }

  async wasSentOn(day: DateTime): Promise<boolean> {
    const { timezone, signature, scanLimit } = this.options;
    const channel = await this.options.resolveChannel();
    if (!channel) {
      throw new ChannelError('Reminder channel could not be resolved', 'reminder');
    }
    const botUserId = this.options.botUserId();
    if (!botUserId) {
      throw new ChannelError('Bot user is not known yet', 'reminder');
    }

    const target = localDate(day, timezone);
    const recent = await channel.fetchRecent(scanLimit);

    const match = recent.find(
      (msg) =>
        msg.author.id === botUserId &&
        localDate(DateTime.fromJSDate(msg.createdAt), timezone) === target &&
        msg.content.includes(signature)
    );

    if (match) {
      this.logger.info(
        { messageId: match.id, sentAt: match.createdAt.toISOString() },
        "Today's reminder found in history"
      );
      return true;
    }
    this.logger.debug({ scanned: recent.length, day: target }, "No reminder for today in history");
    return false;
  }

  recordSent(): Promise<void> {
    // The posted message is the record
    return Promise.resolve();
  }
}

const ledgerStateSchema = z.object({
  lastSentDate: z.string(),
  lastSentAt: z.string(),
});

export interface FileReminderLedgerOptions {
  /** Path of the JSON state file */
  filePath: string;
  timezone: string;
  logger: Logger;
}

/**
 * Persists the last send date, for deployments that cannot read history.
 */
export class FileReminderLedger implements ReminderLedger {
  readonly kind = 'file';
  private readonly logger: Logger;

  constructor(private readonly options: FileReminderLedgerOptions) {
    this.logger = options.logger.child({ component: 'reminder-ledger' });
  }

  async wasSentOn(day: DateTime): Promise<boolean> {
    const state = await this.load();
    return state !== null && state.lastSentDate === localDate(day, this.options.timezone);
  }

  async recordSent(at: DateTime): Promise<void> {
    const { filePath, timezone } = this.options;
    const state = {
      lastSentDate: localDate(at, timezone),
      lastSentAt: at.toUTC().toISO() ?? at.toString(),
    };

    await mkdir(dirname(filePath), { recursive: true });
    // Atomic write: temp file + rename
    const tempPath = `${filePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(state, null, 2), 'utf-8');
    await rename(tempPath, filePath);
    this.logger.debug({ filePath, lastSentDate: state.lastSentDate }, 'Reminder send recorded');
  }

  private async load(): Promise<z.infer<typeof ledgerStateSchema> | null> {
    let content: string;
    try {
      content = await readFile(this.options.filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error['code'] === 'ENOENT') return null;
      throw error;
    }

    try {
      const parsed = ledgerStateSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Reminder state file is not valid JSON');
      return null;
    }
    this.logger.warn({ filePath: this.options.filePath }, 'Reminder state file has an unexpected shape');
    return null;
  }
}
