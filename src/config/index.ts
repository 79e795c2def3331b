/**
 * Config module exports.
 */

export type {
  BotConfigFile,
  MergedConfig,
  DeadlineConfig,
  ReminderSettings,
  ChatSettings,
  CrmSettings,
  ArticleSettings,
  LlmSettings,
  QuoteStrategy,
  LedgerKind,
} from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, configFileSchema } from './config-schema.js';
export { ConfigLoader, loadConfig } from './config-loader.js';
export type { ConfigLoaderOptions } from './config-loader.js';
