/**
 * Chat channel ports.
 *
 * The conversation loop and the reminder only see these interfaces; the
 * Discord adapter implements them, and tests use an in-memory fake.
 */

/**
 * A message as the core sees it.
 */
export interface ChatMessage {
  id: string;
  channelId: string;
  author: {
    id: string;
    displayName: string;
    isBot: boolean;
  };
  content: string;
  createdAt: Date;
  /** User IDs mentioned in the message */
  mentionIds: readonly string[];
  /** ID of the message this one replies to */
  replyToId?: string | undefined;
}

/**
 * Outbound operations on one channel. Send failures throw.
 */
export interface ChatChannel {
  readonly id: string;

  /** Post a plain message */
  send(text: string): Promise<void>;

  /** Post a message as a reply to `messageId` */
  reply(messageId: string, text: string): Promise<void>;

  /** Most recent messages, newest first */
  fetchRecent(limit: number): Promise<ChatMessage[]>;

  /** A single message, or null when it cannot be fetched */
  fetchMessage(messageId: string): Promise<ChatMessage | null>;

  /**
   * Run `fn` while showing the typing indicator.
   */
  withTyping<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Handler for a message that mentions the bot.
 */
export type MentionHandler = (
  message: ChatMessage,
  channel: ChatChannel,
  botUserId: string
) => Promise<void>;

/**
 * Connection to the chat workspace.
 */
export interface ChatGateway {
  /** Gateway name (for logging) */
  readonly name: string;

  /** The bot's own user ID; null until connected */
  readonly botUserId: string | null;

  /** Resolve a channel by ID; null when unknown or not a text channel */
  resolveChannel(channelId: string): Promise<ChatChannel | null>;

  /** Register the mention handler (one per gateway) */
  onMention(handler: MentionHandler): void;

  /** Register a callback for when the connection is ready */
  onReady(handler: () => Promise<void>): void;

  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Error from a chat gateway operation.
 */
export class ChannelError extends Error {
  readonly channelName: string;
  readonly retryable: boolean;

  constructor(message: string, channelName: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ChannelError';
    this.channelName = channelName;
    this.retryable = options?.retryable ?? false;
  }
}
