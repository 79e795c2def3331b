/**
 * Vercel AI SDK Provider
 *
 * LLM provider implementation using the Vercel AI SDK (ai package v5), backed
 * by OpenRouter or by a local OpenAI-compatible server.
 */

import type { Logger } from '../../types/logger.js';
import type {
  CompletionRequest,
  CompletionResponse,
  ContentBlock,
  Message,
  StopReason,
} from '../../llm/provider.js';
import { BaseLLMProvider, LLMError } from '../../llm/provider.js';
import { toInputSchema } from '../../llm/tool-schema.js';
import { errorMessage } from '../../utils/guards.js';

// Vercel AI SDK imports
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, generateText, jsonSchema, tool } from 'ai';
import type { LanguageModel, ModelMessage, ToolSet } from 'ai';

/**
 * OpenRouter configuration for VercelAIProvider.
 */
export interface VercelAIOpenRouterConfig {
  /** API key (required for OpenRouter) */
  apiKey: string;
  /** Default model */
  model: string;
  /** App name for OpenRouter dashboard */
  appName?: string | undefined;
}

/**
 * Local OpenAI-compatible server configuration for VercelAIProvider.
 */
export interface VercelAILocalConfig {
  /** Base URL of local server (e.g., http://localhost:1234/v1) */
  baseUrl: string;
  /** Model name to use */
  model: string;
}

/**
 * Settings shared by both backends.
 */
export interface VercelAIRequestOptions {
  /** Per-request timeout in ms */
  timeoutMs?: number | undefined;
  /** Retries after the first attempt for retryable errors */
  maxRetries?: number | undefined;
  /** Base delay for linear backoff in ms */
  retryDelayMs?: number | undefined;
}

/**
 * Configuration for VercelAIProvider.
 */
export type VercelAIProviderConfig = (VercelAIOpenRouterConfig | VercelAILocalConfig) &
  VercelAIRequestOptions;

/**
 * Discriminate between config types.
 */
function isOpenRouterConfig(
  config: VercelAIProviderConfig
): config is VercelAIOpenRouterConfig & VercelAIRequestOptions {
  return 'apiKey' in config;
}

const DEFAULT_TIMEOUT = 120_000; // 2 minutes
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY = 1000;

/**
 * Vercel AI SDK LLM provider.
 *
 * Uses generateText() for single-step, non-streaming completions. Tools are
 * declared without an execute function, so a tool request ends the step and
 * comes back as tool_use blocks for the caller to run. The SDK's own retry is
 * disabled in favour of executeWithRetry().
 */
export class VercelAIProvider extends BaseLLMProvider {
  readonly name: string;
  private readonly config: VercelAIProviderConfig;
  private readonly providerLogger?: Logger | undefined;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(config: VercelAIProviderConfig, logger?: Logger, transcript?: Logger) {
    super(logger, transcript);

    this.config = config;
    this.name = isOpenRouterConfig(config) ? 'openrouter' : 'local';
    this.providerLogger = logger?.child({ component: 'vercel-ai-provider' });
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT;

    this.providerLogger?.info(
      {
        provider: this.name,
        model: config.model,
        ...(!isOpenRouterConfig(config) && { baseUrl: config.baseUrl }),
      },
      'VercelAIProvider initialized'
    );
  }

  isAvailable(): boolean {
    if (isOpenRouterConfig(this.config)) {
      return Boolean(this.config.apiKey);
    }
    return Boolean(this.config.baseUrl && this.config.model);
  }

  private getModel(modelId: string): LanguageModel {
    if (isOpenRouterConfig(this.config)) {
      return createOpenRouter({ apiKey: this.config.apiKey })(modelId);
    }
    return createOpenAI({
      baseURL: this.config.baseUrl,
      apiKey: 'no-key-required',
    }).chat(modelId);
  }

  protected async doComplete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.isAvailable()) {
      throw new LLMError('VercelAIProvider not configured', this.name);
    }

    const modelId = request.model ?? this.config.model;
    return this.executeWithRetry(() => this.executeRequest(request, modelId));
  }

  /**
   * Calculate backoff delay with exponential scaling for 429 rate limits.
   */
  private calculateBackoff(attempt: number, isRateLimit: boolean): number {
    if (isRateLimit) {
      // 2x, 4x, 8x the base delay
      return 2 * this.retryDelayMs * Math.pow(2, attempt);
    }
    return this.retryDelayMs * (attempt + 1);
  }

  private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (error instanceof LLMError && !error.retryable) {
          this.providerLogger?.error(
            { message: error.message, statusCode: error.statusCode },
            'Non-retryable LLM error'
          );
          throw error;
        }

        const isRateLimit = error instanceof LLMError && error.statusCode === 429;
        if (attempt < this.maxRetries) {
          const backoffMs = this.calculateBackoff(attempt, isRateLimit);
          this.providerLogger?.warn(
            {
              attempt: attempt + 1,
              maxRetries: this.maxRetries,
              backoffMs,
              backoffReason: isRateLimit ? 'rate_limit_exponential' : 'linear',
              message: errorMessage(error),
            },
            'Retrying after transient error'
          );
          await this.sleep(backoffMs);
        } else {
          this.providerLogger?.error(
            { attempts: this.maxRetries + 1, message: errorMessage(error) },
            'All retry attempts exhausted'
          );
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error(errorMessage(lastError));
  }

  private async executeRequest(
    request: CompletionRequest,
    modelId: string
  ): Promise<CompletionResponse> {
    const tools = this.convertTools(request.tools);
    const headers = this.buildHeaders();

    const result = await generateText({
      model: this.getModel(modelId),
      messages: this.convertMessages(request.messages),
      maxOutputTokens: request.maxTokens,
      // Retries are handled by executeWithRetry
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
      ...(request.system !== undefined && { system: request.system }),
      ...(tools && { tools }),
      ...(headers && { headers }),
    }).catch((error: unknown) => {
      throw this.mapAIErrorToLLMError(error);
    });

    const content: ContentBlock[] = [];
    for (const part of result.content) {
      if (part.type === 'text') {
        if (part.text.length > 0) content.push({ type: 'text', text: part.text });
      } else if (part.type === 'tool-call') {
        content.push({
          type: 'tool_use',
          id: part.toolCallId,
          name: part.toolName,
          input: part.input,
        });
      }
    }

    const { inputTokens, outputTokens } = result.usage;
    return {
      stopReason: this.mapFinishReason(result.finishReason),
      content,
      model: result.response.modelId || modelId,
      usage:
        inputTokens !== undefined && outputTokens !== undefined
          ? {
              promptTokens: inputTokens,
              completionTokens: outputTokens,
              totalTokens: result.usage.totalTokens ?? inputTokens + outputTokens,
            }
          : undefined,
    };
  }

  /**
   * Convert provider-neutral messages to AI SDK ModelMessages.
   */
  private convertMessages(messages: Message[]): ModelMessage[] {
    return messages.map((msg): ModelMessage => {
      switch (msg.role) {
        case 'user':
          return { role: 'user', content: msg.content };
        case 'assistant':
          return {
            role: 'assistant',
            content: msg.content.map((block) =>
              block.type === 'text'
                ? { type: 'text' as const, text: block.text }
                : {
                    type: 'tool-call' as const,
                    toolCallId: block.id,
                    toolName: block.name,
                    input: block.input,
                  }
            ),
          };
        case 'tool':
          return {
            role: 'tool',
            content: msg.results.map((result) => ({
              type: 'tool-result' as const,
              toolCallId: result.invocationId,
              toolName: result.name,
              output: result.isError
                ? { type: 'error-text' as const, value: result.content }
                : { type: 'text' as const, value: result.content },
            })),
          };
      }
    });
  }

  /**
   * Declare tools without execute so calls are returned, not run.
   */
  private convertTools(specs: CompletionRequest['tools']): ToolSet | undefined {
    if (!specs || specs.length === 0) return undefined;

    const tools: ToolSet = {};
    for (const spec of specs) {
      tools[spec.name] = tool({
        description: spec.description,
        inputSchema: jsonSchema(toInputSchema(spec)),
      });
    }
    return tools;
  }

  private buildHeaders(): Record<string, string> | undefined {
    if (isOpenRouterConfig(this.config) && this.config.appName) {
      return { 'X-Title': this.config.appName };
    }
    return undefined;
  }

  private mapFinishReason(reason: string): StopReason {
    switch (reason) {
      case 'stop':
        return 'end';
      case 'tool-calls':
        return 'tool_use';
      case 'length':
        return 'length';
      default:
        return 'other';
    }
  }

  /**
   * Map AI SDK error to LLMError.
   */
  private mapAIErrorToLLMError(error: unknown): LLMError {
    const message = errorMessage(error);

    // APICallError carries a structured statusCode
    const statusCode = APICallError.isInstance(error) ? error.statusCode : undefined;

    if (statusCode === 429) {
      return new LLMError(`Rate limit: ${message}`, this.name, {
        statusCode: 429,
        retryable: true,
        cause: error,
      });
    }

    if (statusCode !== undefined && statusCode >= 500) {
      return new LLMError(`Server error: ${message}`, this.name, {
        statusCode,
        retryable: true,
        cause: error,
      });
    }

    if (statusCode === 408) {
      return new LLMError(`Request timeout: ${message}`, this.name, {
        statusCode: 408,
        retryable: true,
        cause: error,
      });
    }

    // AbortSignal.timeout() rejects with TimeoutError, a manual abort with AbortError
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new LLMError('Request timed out', this.name, { retryable: true, cause: error });
    }

    if (statusCode === undefined && message.toLowerCase().includes('rate limit')) {
      return new LLMError(`Rate limit: ${message}`, this.name, {
        statusCode: 429,
        retryable: true,
        cause: error,
      });
    }

    return new LLMError(message, this.name, {
      statusCode,
      retryable: false,
      cause: error,
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
