/**
 * LLM Provider interface.
 *
 * Abstracts the completion backend (OpenRouter, a local OpenAI-compatible
 * server) so the conversation loop and the reminder only see provider-neutral
 * messages and content blocks.
 */

import type { Logger } from '../types/logger.js';
import type { ToolResult, ToolSpec } from '../tools/types.js';
import { errorMessage } from '../utils/guards.js';

/**
 * Plain text produced by the model.
 */
export interface TextBlock {
  type: 'text';
  text: string;
}

/**
 * Tool invocation requested by the model.
 */
export interface ToolUseBlock {
  type: 'tool_use';
  /** Correlation id issued by the model (links to the tool result) */
  id: string;
  name: string;
  input: unknown;
}

export type ContentBlock = TextBlock | ToolUseBlock;

/**
 * Message in a conversation turn.
 *
 * - user: prompt text
 * - assistant: raw content blocks from a previous response (text and tool calls)
 * - tool: results of the previous assistant message's tool calls
 */
export type Message =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: ContentBlock[] }
  | { role: 'tool'; results: ToolResult[] };

/**
 * Why the model stopped generating.
 */
export type StopReason = 'end' | 'tool_use' | 'length' | 'other';

/**
 * Request to generate a completion.
 */
export interface CompletionRequest {
  /** System instructions */
  system?: string | undefined;

  /** Conversation messages */
  messages: Message[];

  /** Tools the model may call; omitted or empty means no tool access */
  tools?: readonly ToolSpec[] | undefined;

  /** Maximum tokens to generate */
  maxTokens: number;

  /** Explicit model to use (provider default otherwise) */
  model?: string | undefined;
}

/**
 * Response from a completion request.
 */
export interface CompletionResponse {
  stopReason: StopReason;

  /** Ordered content blocks */
  content: ContentBlock[];

  /** Model that was used */
  model: string;

  usage?:
    | {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
      }
    | undefined;
}

/**
 * LLM Provider interface.
 */
export interface LLMProvider {
  /** Provider name (for logging) */
  readonly name: string;

  /** Check if provider is configured */
  isAvailable(): boolean;

  /** Generate a completion */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Error from LLM provider.
 */
export class LLMError extends Error {
  readonly provider: string;
  readonly statusCode?: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    provider: string,
    options?: { statusCode?: number | undefined; retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LLMError';
    this.provider = provider;
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Concatenate the text blocks of a response, in order.
 */
export function textOf(content: readonly ContentBlock[]): string {
  let text = '';
  for (const block of content) {
    if (block.type === 'text') text += block.text;
  }
  return text;
}

/**
 * Tool invocations of a response, in the order the model listed them.
 */
export function toolUsesOf(content: readonly ContentBlock[]): ToolUseBlock[] {
  return content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

const INDENT = '  ';

function indent(text: string, depth = 1): string {
  return text.split('\n').join('\n' + INDENT.repeat(depth));
}

function formatJson(value: unknown): string {
  if (typeof value === 'string') {
    try {
      return JSON.stringify(JSON.parse(value), null, 2);
    } catch {
      return value;
    }
  }
  return JSON.stringify(value, null, 2);
}

function formatBlocks(blocks: readonly ContentBlock[]): string[] {
  return blocks.map((block) =>
    block.type === 'text'
      ? `${INDENT}${indent(block.text)}`
      : `${INDENT}📞 ${block.name}(${block.id}):\n${INDENT}${INDENT}${indent(formatJson(block.input), 2)}`
  );
}

/**
 * Base LLM provider with detailed logging.
 *
 * Wraps complete() with request/response logging and writes each exchange to
 * the transcript log. Subclasses implement doComplete() for the actual call.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  protected readonly logger?: Logger | undefined;
  private readonly transcript?: Logger | undefined;
  private requestCounter = 0;

  constructor(logger?: Logger, transcript?: Logger) {
    this.logger = logger?.child({ component: 'llm' });
    this.transcript = transcript;
  }

  abstract isAvailable(): boolean;

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const requestId = `req_${String(++this.requestCounter)}`;
    const startTime = Date.now();

    this.logger?.debug(
      {
        requestId,
        provider: this.name,
        model: request.model,
        maxTokens: request.maxTokens,
        messageCount: request.messages.length,
        toolCount: request.tools?.length ?? 0,
      },
      '🤖 LLM request started'
    );

    this.transcript?.info(this.formatRequest(requestId, request));

    try {
      const response = await this.doComplete(request);
      const duration = Date.now() - startTime;

      this.logger?.debug(
        {
          requestId,
          provider: this.name,
          model: response.model,
          durationMs: duration,
          stopReason: response.stopReason,
          promptTokens: response.usage?.promptTokens,
          completionTokens: response.usage?.completionTokens,
          toolCalls: toolUsesOf(response.content).map((block) => block.name),
        },
        '🤖 LLM response received'
      );

      const tokens = String(response.usage?.totalTokens ?? '?');
      this.transcript?.info(
        [
          '─'.repeat(60),
          `← RESPONSE [${String(duration)}ms, ${tokens} tokens, ${response.stopReason}]`,
          ...formatBlocks(response.content),
          '═'.repeat(60),
        ].join('\n')
      );

      return response;
    } catch (error) {
      const duration = Date.now() - startTime;
      const message = errorMessage(error);

      this.logger?.error(
        {
          requestId,
          provider: this.name,
          durationMs: duration,
          error: message,
          retryable: error instanceof LLMError ? error.retryable : false,
        },
        '🤖 LLM request failed'
      );
      this.transcript?.info(
        `${'─'.repeat(60)}\n✗ ERROR [${String(duration)}ms]: ${message}\n${'═'.repeat(60)}`
      );

      throw error;
    }
  }

  private formatRequest(requestId: string, request: CompletionRequest): string {
    const lines: string[] = [];
    lines.push(`\n${'═'.repeat(60)}`);
    lines.push(`→ REQUEST [${requestId}] to ${this.name} (${request.model ?? 'default'})`);
    lines.push('─'.repeat(60));

    if (request.tools && request.tools.length > 0) {
      lines.push(`tools: ${request.tools.map((tool) => tool.name).join(', ')}`);
    }
    if (request.system) {
      lines.push(`SYSTEM:\n${INDENT}${indent(request.system)}`);
    }

    request.messages.forEach((msg, i) => {
      const idx = String(i);
      switch (msg.role) {
        case 'user':
          lines.push(`► [${idx}] USER:\n${INDENT}${indent(msg.content)}`);
          break;
        case 'assistant':
          lines.push(`► [${idx}] ASSISTANT:`, ...formatBlocks(msg.content));
          break;
        case 'tool':
          for (const result of msg.results) {
            const flag = result.isError ? ' ERROR' : '';
            lines.push(
              `► [${idx}] TOOL RESULT${flag} (${result.invocationId}):\n${INDENT}${indent(result.content)}`
            );
          }
          break;
      }
    });

    return lines.join('\n');
  }

  /**
   * Perform the actual completion request.
   */
  protected abstract doComplete(request: CompletionRequest): Promise<CompletionResponse>;
}
