import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { IANAZone } from 'luxon';
import type { MergedConfig } from './config-schema.js';
import { configFileSchema, fromFileSettings, CONFIG_FILE_VERSION } from './config-schema.js';
import { errorMessage, isRecord } from '../utils/guards.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function isLogLevel(value: string): value is MergedConfig['logging']['level'] {
  return LOG_LEVELS.some((level) => level === value);
}

export interface ConfigLoaderOptions {
  /** Root data directory; DATA_PATH wins when set */
  dataPath?: string | undefined;
  /** Environment source (process.env by default) */
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets always come from here)
 * 2. Config file (data/config/bot.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly env: NodeJS.ProcessEnv;
  private readonly dataPath: string;
  private warnings: string[] = [];

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.dataPath = this.env['DATA_PATH'] || options.dataPath || 'data';
  }

  /**
   * Load and merge configuration from all sources.
   * Throws when the config file exists but is malformed.
   */
  async load(): Promise<MergedConfig> {
    this.warnings = [];
    const raw = await this.loadConfigFile();

    const parsed = configFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid config file: ${issues}`);
    }

    if (parsed.data.version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    const config = fromFileSettings(parsed.data, this.dataPath);
    this.mergeEnvironment(config);
    return config;
  }

  /**
   * Non-fatal problems found during the last load, for the caller to log
   * once a logger exists.
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private async loadConfigFile(): Promise<unknown> {
    const filePath = join(this.dataPath, 'config', 'bot.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error['code'] === 'ENOENT') {
        // No file - defaults apply
        return null;
      }
      throw new Error(`Failed to load config file: ${errorMessage(error)}`);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to parse config file ${filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const env = this.env;

    // Secrets
    config.discord.token = env['DISCORD_TOKEN'] || null;
    config.llm.openRouterApiKey = env['OPENROUTER_API_KEY'] || null;
    config.crm.apiKey = env['CRM_API_KEY'] || null;

    const channelId = env['CHANNEL_ID'];
    if (channelId) {
      config.discord.channelId = channelId;
    }

    const model = env['LLM_MODEL'];
    if (model) {
      config.llm.model = model;
    }

    const localBaseUrl = env['LLM_LOCAL_BASE_URL'];
    if (localBaseUrl) {
      config.llm.local.baseUrl = localBaseUrl;
    }

    const localModel = env['LLM_LOCAL_MODEL'];
    if (localModel) {
      config.llm.local.model = localModel;
    }

    const crmBaseUrl = env['CRM_BASE_URL'];
    if (crmBaseUrl) {
      config.crm.baseUrl = crmBaseUrl;
    }

    const timezone = env['REMINDER_TIMEZONE'];
    if (timezone) {
      if (!IANAZone.isValidZone(timezone)) {
        throw new Error(`Invalid REMINDER_TIMEZONE "${timezone}": unknown IANA time zone`);
      }
      config.reminder.timezone = timezone;
    }

    const logLevel = env['LOG_LEVEL'];
    if (logLevel) {
      if (isLogLevel(logLevel)) {
        config.logging.level = logLevel;
      } else {
        this.warnings.push(`Ignoring unknown LOG_LEVEL "${logLevel}"`);
      }
    }
  }
}

/**
 * Load configuration from the default locations.
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<MergedConfig> {
  return new ConfigLoader(options).load();
}
