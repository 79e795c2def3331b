/**
 * Reminder Service
 *
 * Posts the daily countdown at a fixed local time and, once at startup,
 * recovers a countdown missed while the bot was down.
 */

import { CronExpressionParser } from 'cron-parser';
import { DateTime } from 'luxon';
import type { ChatChannel } from '../channels/channel.js';
import type { Logger } from '../types/logger.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import { errorMessage } from '../utils/guards.js';
import type { ReminderComposer } from './reminder-composer.js';
import type { ReminderLedger } from './reminder-ledger.js';

export type RecoveryOutcome = 'before_cutoff' | 'already_sent' | 'sent' | 'error';

export interface ReminderSchedule {
  /** IANA zone the schedule and "today" are evaluated in */
  timezone: string;
  hour: number;
  minute: number;
  /** Recovery does nothing before this local hour */
  cutoffHour: number;
}

export interface ReminderServiceOptions {
  composer: ReminderComposer;
  ledger: ReminderLedger;
  resolveChannel: () => Promise<ChatChannel | null>;
  schedule: ReminderSchedule;
  logger: Logger;
  /** Injected for tests */
  clock?: (() => DateTime) | undefined;
}

export class ReminderService {
  private readonly logger: Logger;
  private readonly clock: () => DateTime;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: ReminderServiceOptions) {
    this.logger = options.logger.child({ component: 'reminder' });
    this.clock = options.clock ?? (() => DateTime.now());
  }

  /**
   * Compose and post today's countdown. Resolves to whether it was posted;
   * failures are logged, not thrown.
   */
  sendReminder(): Promise<boolean> {
    return withTraceContext(createTraceContext('reminder'), async () => {
      const channel = await this.options.resolveChannel();
      if (!channel) {
        this.logger.error('Reminder channel could not be resolved, skipping reminder');
        return false;
      }

      const now = this.clock().setZone(this.options.schedule.timezone);
      try {
        const message = await this.options.composer.computeMessage(now);
        await channel.send(message);
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Failed to send daily reminder');
        return false;
      }

      try {
        await this.options.ledger.recordSent(now);
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, 'Reminder sent but not recorded');
      }

      this.logger.info({ sentAt: now.toISO(), channelId: channel.id }, 'Daily reminder sent');
      return true;
    });
  }

  /**
   * Send today's countdown if it is past the cutoff hour and the ledger has
   * no record of it. Meant to run once at startup.
   */
  async checkMissedReminder(now: DateTime = this.clock()): Promise<RecoveryOutcome> {
    const { timezone, cutoffHour } = this.options.schedule;
    const local = now.setZone(timezone);

    if (local.hour < cutoffHour) {
      this.logger.info(
        { localTime: local.toFormat('HH:mm'), cutoffHour, timezone },
        'Before reminder cutoff, no need to check for a missed reminder'
      );
      return 'before_cutoff';
    }

    try {
      if (await this.options.ledger.wasSentOn(local)) {
        return 'already_sent';
      }
    } catch (error) {
      this.logger.error(
        { ledger: this.options.ledger.kind, error: errorMessage(error) },
        'Error checking for missed reminder'
      );
      return 'error';
    }

    this.logger.warn({ localTime: local.toISO() }, 'Missed reminder detected, sending now');
    return (await this.sendReminder()) ? 'sent' : 'error';
  }

  /**
   * Next scheduled fire time strictly after `from`.
   */
  nextFireAt(from: DateTime): DateTime {
    const { timezone, hour, minute } = this.options.schedule;
    const expression = CronExpressionParser.parse(`${String(minute)} ${String(hour)} * * *`, {
      currentDate: from.toJSDate(),
      tz: timezone,
    });
    return DateTime.fromJSDate(expression.next().toDate()).setZone(timezone);
  }

  /**
   * Start the daily timer.
   */
  start(): void {
    if (this.timer) {
      this.logger.warn('Reminder scheduler already running');
      return;
    }
    this.scheduleNext();
    const { timezone, hour, minute } = this.options.schedule;
    this.logger.info(
      { time: `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`, timezone },
      'Reminder scheduler started'
    );
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.logger.info('Reminder scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private scheduleNext(): void {
    const now = this.clock();
    const next = this.nextFireAt(now);
    const delayMs = Math.max(0, next.toMillis() - now.toMillis());
    this.logger.debug({ nextFireAt: next.toISO(), delayMs }, 'Next reminder scheduled');

    this.timer = setTimeout(() => {
      this.fire().catch((error: unknown) => {
        this.logger.error({ error: errorMessage(error) }, 'Reminder job failed');
      });
    }, delayMs);
  }

  private async fire(): Promise<void> {
    try {
      await this.sendReminder();
    } finally {
      // stop() may have run while sending
      if (this.timer) this.scheduleNext();
    }
  }
}
