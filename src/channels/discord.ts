/**
 * Discord gateway using discord.js.
 *
 * - Inbound: messages that mention the bot → MentionHandler
 * - Outbound: send / reply / history fetch / typing on text channels
 */

import { Client, Events, GatewayIntentBits } from 'discord.js';
import type { Message, SendableChannels } from 'discord.js';
import type { Logger } from '../types/logger.js';
import type { ChatChannel, ChatGateway, ChatMessage, MentionHandler } from './channel.js';
import { ChannelError } from './channel.js';
import { errorMessage } from '../utils/guards.js';

/**
 * Discord configuration.
 */
export interface DiscordConfig {
  /** Bot token */
  token: string;
  /** Typing indicator refresh interval in ms (Discord shows it for ~10s) */
  typingIntervalMs?: number | undefined;
}

const DEFAULT_TYPING_INTERVAL = 8000;

function toChatMessage(message: Message): ChatMessage {
  return {
    id: message.id,
    channelId: message.channelId,
    author: {
      id: message.author.id,
      displayName: message.member?.displayName ?? message.author.displayName,
      isBot: message.author.bot,
    },
    content: message.content,
    createdAt: message.createdAt,
    mentionIds: message.mentions.users.map((user) => user.id),
    replyToId: message.reference?.messageId,
  };
}

/**
 * One Discord text channel.
 */
class DiscordChannel implements ChatChannel {
  readonly id: string;

  constructor(
    private readonly channel: SendableChannels,
    private readonly logger: Logger,
    private readonly typingIntervalMs: number
  ) {
    this.id = channel.id;
  }

  async send(text: string): Promise<void> {
    try {
      await this.channel.send({ content: text });
    } catch (error) {
      throw new ChannelError(`Failed to send message: ${errorMessage(error)}`, 'discord', {
        cause: error,
      });
    }
    this.logger.debug({ channelId: this.id, textLength: text.length }, 'Message sent');
  }

  async reply(messageId: string, text: string): Promise<void> {
    try {
      await this.channel.send({
        content: text,
        reply: { messageReference: messageId, failIfNotExists: false },
      });
    } catch (error) {
      throw new ChannelError(`Failed to send reply: ${errorMessage(error)}`, 'discord', {
        cause: error,
      });
    }
    this.logger.debug({ channelId: this.id, messageId, textLength: text.length }, 'Reply sent');
  }

  async fetchRecent(limit: number): Promise<ChatMessage[]> {
    // Discord caps a single history page at 100
    const messages = await this.channel.messages.fetch({ limit: Math.min(limit, 100) });
    return [...messages.values()]
      .sort((a, b) => b.createdTimestamp - a.createdTimestamp)
      .map(toChatMessage);
  }

  async fetchMessage(messageId: string): Promise<ChatMessage | null> {
    try {
      return toChatMessage(await this.channel.messages.fetch(messageId));
    } catch (error) {
      this.logger.warn({ messageId, error: errorMessage(error) }, 'Could not fetch message');
      return null;
    }
  }

  async withTyping<T>(fn: () => Promise<T>): Promise<T> {
    const pulse = (): void => {
      this.channel.sendTyping().catch((error: unknown) => {
        this.logger.debug({ error: errorMessage(error) }, 'Typing indicator failed');
      });
    };

    pulse();
    const interval = setInterval(pulse, this.typingIntervalMs);
    try {
      return await fn();
    } finally {
      clearInterval(interval);
    }
  }
}

/**
 * Discord gateway.
 */
export class DiscordGateway implements ChatGateway {
  readonly name = 'discord';

  private readonly client: Client;
  private readonly logger: Logger;
  private readonly token: string;
  private readonly typingIntervalMs: number;
  private mentionHandler: MentionHandler | null = null;
  private readyHandler: (() => Promise<void>) | null = null;

  constructor(config: DiscordConfig, logger: Logger) {
    this.token = config.token;
    this.typingIntervalMs = config.typingIntervalMs ?? DEFAULT_TYPING_INTERVAL;
    this.logger = logger.child({ component: 'discord' });
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        // Required to read message content
        GatewayIntentBits.MessageContent,
      ],
    });
  }

  get botUserId(): string | null {
    return this.client.user?.id ?? null;
  }

  onMention(handler: MentionHandler): void {
    this.mentionHandler = handler;
  }

  onReady(handler: () => Promise<void>): void {
    this.readyHandler = handler;
  }

  async resolveChannel(channelId: string): Promise<ChatChannel | null> {
    try {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel || !channel.isTextBased() || !channel.isSendable()) {
        return null;
      }
      return new DiscordChannel(channel, this.logger, this.typingIntervalMs);
    } catch (error) {
      this.logger.warn({ channelId, error: errorMessage(error) }, 'Could not resolve channel');
      return null;
    }
  }

  async start(): Promise<void> {
    this.client.once(Events.ClientReady, (readyClient) => {
      this.logger.info({ user: readyClient.user.tag }, 'Discord gateway ready');
      if (this.readyHandler) {
        this.readyHandler().catch((error: unknown) => {
          this.logger.error({ error: errorMessage(error) }, 'Ready handler failed');
        });
      }
    });

    this.client.on(Events.MessageCreate, (message) => {
      this.onMessage(message).catch((error: unknown) => {
        this.logger.error({ error: errorMessage(error), messageId: message.id }, 'Mention handler failed');
      });
    });

    this.client.on(Events.Error, (error) => {
      this.logger.error({ error: error.message }, 'Discord client error');
    });

    await this.client.login(this.token);
  }

  async stop(): Promise<void> {
    await this.client.destroy();
    this.logger.info('Discord gateway stopped');
  }

  private async onMessage(message: Message): Promise<void> {
    const botId = this.client.user?.id;
    if (!botId || !this.mentionHandler) return;

    // Ignore our own messages and messages that don't mention us
    if (message.author.id === botId) return;
    if (!message.mentions.users.has(botId)) return;

    const channel = message.channel;
    if (!channel.isSendable()) return;

    this.logger.debug(
      { messageId: message.id, channelId: message.channelId, author: message.author.id },
      'Mention received'
    );

    await this.mentionHandler(
      toChatMessage(message),
      new DiscordChannel(channel, this.logger, this.typingIntervalMs),
      botId
    );
  }
}
