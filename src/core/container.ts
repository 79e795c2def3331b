import { join } from 'node:path';
import type { Logger } from '../types/logger.js';
import { createLogger, createTranscriptLogger } from './logger.js';
import { type MergedConfig, ConfigLoader, type ConfigLoaderOptions } from '../config/index.js';
import { type LLMProvider, VercelAIProvider } from '../llm/index.js';
import { CrmClient } from '../crm/crm-client.js';
import { ToolCatalog, ToolExecutor, createCrmTools } from '../tools/index.js';
import { ArticleFetcher, type ArticleReader } from '../article/article-fetcher.js';
import { ConversationLoop } from '../conversation/conversation-loop.js';
import { type ChatChannel, type ChatGateway, DiscordGateway } from '../channels/index.js';
import { ReminderComposer } from '../reminder/reminder-composer.js';
import { ReminderService } from '../reminder/reminder-service.js';
import { parseDate } from '../reminder/deadlines.js';
import {
  type QuoteSource,
  SeededQuoteSource,
  GeneratedQuoteSource,
} from '../reminder/quote-source.js';
import {
  type ReminderLedger,
  HistoryScanLedger,
  FileReminderLedger,
} from '../reminder/reminder-ledger.js';

/**
 * Raised when the bot cannot start with the given configuration.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly hint?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Application context: every long-lived object, built once at startup.
 */
export interface Container {
  config: MergedConfig;
  logger: Logger;
  /** Null when no model credential is configured */
  llm: LLMProvider | null;
  crm: CrmClient;
  catalog: ToolCatalog;
  executor: ToolExecutor;
  articles: ArticleReader;
  conversation: ConversationLoop;
  gateway: ChatGateway;
  /** Null when no reminder channel is configured */
  reminder: ReminderService | null;
  /** Start the gateway; reminders start once it is ready */
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Collaborators that tests (or embedders) replace.
 */
export interface ContainerOverrides {
  logger?: Logger | undefined;
  transcript?: Logger | undefined;
  gateway?: ChatGateway | undefined;
  /** Replace the model; null disables it */
  llm?: LLMProvider | null | undefined;
  fetch?: typeof globalThis.fetch | undefined;
}

function createLLMProvider(config: MergedConfig, logger: Logger, transcript?: Logger): LLMProvider | null {
  const { llm } = config;
  const requestOptions = { timeoutMs: llm.timeoutMs, maxRetries: llm.maxRetries };

  if (llm.local.baseUrl && llm.local.model) {
    return new VercelAIProvider(
      { baseUrl: llm.local.baseUrl, model: llm.local.model, ...requestOptions },
      logger,
      transcript
    );
  }

  if (llm.openRouterApiKey) {
    return new VercelAIProvider(
      { apiKey: llm.openRouterApiKey, model: llm.model, appName: llm.appName, ...requestOptions },
      logger,
      transcript
    );
  }

  return null;
}

function createQuoteSource(config: MergedConfig, llm: LLMProvider | null, logger: Logger): QuoteSource {
  const { reminder } = config;
  if (reminder.quoteStrategy === 'generated') {
    return new GeneratedQuoteSource({
      llm,
      topics: reminder.quoteTopics,
      fallbackQuotes: reminder.quotes,
      maxTokens: config.llm.quoteMaxOutputTokens,
      logger,
    });
  }
  return new SeededQuoteSource(reminder.quotes);
}

function createLedger(
  config: MergedConfig,
  gateway: ChatGateway,
  resolveChannel: () => Promise<ChatChannel | null>,
  logger: Logger
): ReminderLedger {
  const { reminder } = config;
  if (reminder.ledger === 'file') {
    return new FileReminderLedger({
      filePath: join(config.paths.state, 'reminder.json'),
      timezone: reminder.timezone,
      logger,
    });
  }
  return new HistoryScanLedger({
    resolveChannel,
    botUserId: () => gateway.botUserId,
    signature: reminder.signature,
    timezone: reminder.timezone,
    scanLimit: reminder.scanLimit,
    logger,
  });
}

/**
 * Build the application context from a loaded configuration.
 */
export function createContainer(config: MergedConfig, overrides: ContainerOverrides = {}): Container {
  const token = config.discord.token;
  if (!token && !overrides.gateway) {
    throw new ConfigurationError(
      'DISCORD_TOKEN not found in environment variables',
      'Please create a .env file with your Discord bot token'
    );
  }

  // Reject impossible dates (e.g. 2026-02-30) up front
  for (const deadline of config.reminder.deadlines) {
    parseDate(deadline.date);
  }

  const logger: Logger =
    overrides.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });
  const transcript: Logger | undefined =
    overrides.transcript ??
    (overrides.logger ? undefined : createTranscriptLogger(config.logging.logDir, 'info', config.logging.maxFiles));

  const llm = overrides.llm !== undefined ? overrides.llm : createLLMProvider(config, logger, transcript);

  const crm = new CrmClient(
    {
      apiKey: config.crm.apiKey,
      baseUrl: config.crm.baseUrl,
      dealObject: config.crm.dealObject,
      timeoutMs: config.crm.timeoutMs,
      fetch: overrides.fetch,
    },
    logger
  );

  // Tools are only advertised when the CRM is reachable
  const catalog = new ToolCatalog(crm.isAvailable() ? createCrmTools(crm) : []);
  const executor = new ToolExecutor(catalog, logger);

  const articles = new ArticleFetcher(
    {
      timeoutMs: config.article.timeoutMs,
      maxChars: config.article.maxChars,
      userAgent: config.article.userAgent,
      fetch: overrides.fetch,
    },
    logger
  );

  const conversation = new ConversationLoop({
    llm,
    catalog,
    executor,
    articles,
    deadlines: config.reminder.deadlines,
    settings: { ...config.chat, maxOutputTokens: config.llm.maxOutputTokens },
    logger,
  });

  const gateway = overrides.gateway ?? new DiscordGateway({ token: token ?? '' }, logger);

  const channelId = config.discord.channelId;
  let reminder: ReminderService | null = null;
  if (channelId) {
    const resolveChannel = (): Promise<ChatChannel | null> => gateway.resolveChannel(channelId);
    reminder = new ReminderService({
      composer: new ReminderComposer(
        config.reminder.deadlines,
        config.reminder.signature,
        createQuoteSource(config, llm, logger)
      ),
      ledger: createLedger(config, gateway, resolveChannel, logger),
      resolveChannel,
      schedule: {
        timezone: config.reminder.timezone,
        hour: config.reminder.hour,
        minute: config.reminder.minute,
        cutoffHour: config.reminder.cutoffHour,
      },
      logger,
    });
  } else {
    logger.warn("CHANNEL_ID not configured. The bot will start but won't send reminders until configured");
  }

  if (!llm) {
    logger.warn(
      "No language model configured (OPENROUTER_API_KEY or LLM_LOCAL_BASE_URL). The bot will start but won't respond to mentions until configured"
    );
  }

  if (!crm.isAvailable()) {
    logger.warn("CRM_API_KEY not configured. The bot will start but won't have CRM access until configured");
  }

  gateway.onMention(async (message, channel, botUserId) => {
    await conversation.handleMention(message, channel, botUserId);
  });

  gateway.onReady(async () => {
    if (!reminder || reminder.isRunning()) return;
    reminder.start();
    await reminder.checkMissedReminder();
  });

  return {
    config,
    logger,
    llm,
    crm,
    catalog,
    executor,
    articles,
    conversation,
    gateway,
    reminder,
    async start() {
      logger.info(
        { gateway: gateway.name, llm: llm?.name ?? null, tools: catalog.size, reminders: !!reminder },
        'Starting'
      );
      await gateway.start();
    },
    async shutdown() {
      logger.info('Shutting down...');
      reminder?.stop();
      await gateway.stop();
      logger.info('Shutdown complete');
    },
  };
}

/**
 * Load configuration and build the application context.
 */
export async function createContainerAsync(
  options: ConfigLoaderOptions = {},
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const loader = new ConfigLoader(options);
  const config = await loader.load();
  const container = createContainer(config, overrides);

  for (const warning of loader.getWarnings()) {
    container.logger.warn(warning);
  }

  return container;
}
