import { IANAZone } from 'luxon';
import { z } from 'zod';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

/** How the daily quote line is chosen */
export const QUOTE_STRATEGIES = ['seeded', 'generated'] as const;
export type QuoteStrategy = (typeof QUOTE_STRATEGIES)[number];

/** Where "was today's reminder sent" is answered from */
export const LEDGER_KINDS = ['history', 'file'] as const;
export type LedgerKind = (typeof LEDGER_KINDS)[number];

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const deadlineSchema = z.object({
  name: z.string().min(1),
  date: isoDate,
});

const DEFAULT_QUOTES = [
  'The way to get started is to quit talking and begin doing. – Walt Disney',
  'Stay hungry, stay foolish. – Steve Jobs',
  'Chase the vision, not the money; the money will end up following you. – Tony Hsieh',
];

const DEFAULT_QUOTE_TOPICS = [
  'startup growth',
  'leadership',
  'perseverance',
  'innovation',
  'teamwork',
  'taking risks',
  'focus and discipline',
  'customer obsession',
  'learning from failure',
  'building culture',
  'ambition',
  'creativity',
  'execution over ideas',
  'resilience',
  'thinking big',
];

/**
 * Schema of data/config/bot.json.
 *
 * Every field is optional in the file; parsing fills in the defaults, so the
 * parsed output is the complete non-secret settings tree.
 */
export const configFileSchema = z.object({
  version: z.number().int().default(CONFIG_FILE_VERSION),

  discord: z
    .object({
      /** Channel that receives the daily countdown */
      channelId: z.string().min(1).nullable().default(null),
    })
    .default({}),

  llm: z
    .object({
      /** Model used for chat, summaries and quotes */
      model: z.string().min(1).default('anthropic/claude-sonnet-4.5'),
      /** Output ceiling for chat and summary calls */
      maxOutputTokens: z.number().int().positive().default(1024),
      /** Output ceiling for quote generation */
      quoteMaxOutputTokens: z.number().int().positive().default(150),
      /** Per-request timeout in ms */
      timeoutMs: z.number().int().positive().default(120_000),
      /** Retries for retryable provider errors */
      maxRetries: z.number().int().min(0).default(2),
      /** App name for provider dashboards */
      appName: z.string().default('Deal Desk'),
      /** Local OpenAI-compatible server, used instead of OpenRouter when set */
      local: z
        .object({
          baseUrl: z.string().url().nullable().default(null),
          model: z.string().nullable().default(null),
        })
        .default({}),
    })
    .default({}),

  crm: z
    .object({
      baseUrl: z.string().url().default('https://api.attio.com/v2'),
      /** Deal object slug in the records query path */
      dealObject: z.string().min(1).default('deals'),
      timeoutMs: z.number().int().positive().default(15_000),
    })
    .default({}),

  chat: z
    .object({
      /** Recent messages included as conversation context */
      historyWindow: z.number().int().positive().default(25),
      /** Recent messages searched for a link to summarize */
      urlLookback: z.number().int().positive().default(10),
      /** Tool rounds allowed per turn before the fallback reply */
      maxToolRounds: z.number().int().positive().default(6),
      /** Transport limit per message */
      chunkSize: z.number().int().positive().default(2000),
    })
    .default({}),

  reminder: z
    .object({
      timezone: z
        .string()
        .refine((zone) => IANAZone.isValidZone(zone), { message: 'unknown IANA time zone' })
        .default('America/New_York'),
      hour: z.number().int().min(0).max(23).default(8),
      minute: z.number().int().min(0).max(59).default(0),
      /** Startup recovery does nothing before this local hour */
      cutoffHour: z.number().int().min(0).max(23).default(8),
      /** Leading line that identifies a countdown message in history */
      signature: z.string().min(1).default("Hey team, here's the deadline countdown:"),
      /** Messages inspected by the history ledger */
      scanLimit: z.number().int().positive().default(50),
      quoteStrategy: z.enum(QUOTE_STRATEGIES).default('seeded'),
      ledger: z.enum(LEDGER_KINDS).default('history'),
      deadlines: z.array(deadlineSchema).default([]),
      quotes: z.array(z.string().min(1)).min(1).default(DEFAULT_QUOTES),
      quoteTopics: z.array(z.string().min(1)).min(1).default(DEFAULT_QUOTE_TOPICS),
    })
    .default({}),

  article: z
    .object({
      timeoutMs: z.number().int().positive().default(15_000),
      maxChars: z.number().int().positive().default(8000),
      userAgent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'
        ),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      pretty: z.boolean().default(true),
      maxFiles: z.number().int().positive().default(10),
    })
    .default({}),
});

/** Raw shape accepted in the config file */
export type BotConfigFile = z.input<typeof configFileSchema>;

/** Parsed non-secret settings */
export type FileSettings = z.output<typeof configFileSchema>;

export type DeadlineConfig = z.output<typeof deadlineSchema>;
export type LlmSettings = FileSettings['llm'];
export type CrmSettings = FileSettings['crm'];
export type ChatSettings = FileSettings['chat'];
export type ReminderSettings = FileSettings['reminder'];
export type ArticleSettings = FileSettings['article'];
export type LogLevelSetting = FileSettings['logging']['level'];

/**
 * Merged application configuration.
 *
 * Defaults ← config file ← environment variables. Secrets only come from the
 * environment.
 */
export interface MergedConfig {
  discord: FileSettings['discord'] & {
    /** Bot token; required to start */
    token: string | null;
  };
  llm: LlmSettings & {
    openRouterApiKey: string | null;
  };
  crm: CrmSettings & {
    apiKey: string | null;
  };
  chat: ChatSettings;
  reminder: ReminderSettings;
  article: ArticleSettings;
  logging: FileSettings['logging'] & {
    logDir: string;
  };
  paths: {
    data: string;
    config: string;
    state: string;
    logs: string;
  };
}

/**
 * Build the merged config from parsed file settings, before env overrides.
 */
export function fromFileSettings(settings: FileSettings, dataPath = 'data'): MergedConfig {
  const paths = {
    data: dataPath,
    config: `${dataPath}/config`,
    state: `${dataPath}/state`,
    logs: `${dataPath}/logs`,
  };
  return {
    discord: { ...settings.discord, token: null },
    llm: { ...settings.llm, openRouterApiKey: null },
    crm: { ...settings.crm, apiKey: null },
    chat: settings.chat,
    reminder: settings.reminder,
    article: settings.article,
    logging: { ...settings.logging, logDir: paths.logs },
    paths,
  };
}

/**
 * Default configuration values (no config file, no environment).
 */
export const DEFAULT_CONFIG: MergedConfig = fromFileSettings(configFileSchema.parse({}));
