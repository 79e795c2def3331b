/**
 * Conversation Loop
 *
 * Handles one mention of the bot. A turn goes
 * BUILD_CONTEXT → CALL_MODEL → (TOOL_ROUND)* → RENDER_REPLY → DONE, or ends in
 * FAILED with a single apology reply. Mentions asking for a summary take the
 * summary path instead: one completion over the linked article, no tools.
 */

import type { ChatChannel, ChatMessage } from '../channels/channel.js';
import type { ArticleReader } from '../article/article-fetcher.js';
import type { DeadlineConfig } from '../config/config-schema.js';
import type { LLMProvider, Message } from '../llm/provider.js';
import { textOf, toolUsesOf } from '../llm/provider.js';
import type { ToolCatalog } from '../tools/catalog.js';
import type { ToolExecutor } from '../tools/tool-executor.js';
import type { ToolResult } from '../tools/types.js';
import type { Logger } from '../types/logger.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import { errorMessage } from '../utils/guards.js';
import { splitIntoChunks } from './chunking.js';
import { renderHistory, stripMention } from './history-builder.js';
import { extractUrls, hasSummaryIntent } from './url-extractor.js';
import {
  NOTICES,
  buildSummaryPrompt,
  buildSystemPrompt,
  buildUserPrompt,
} from './prompts.js';

export type TurnState = 'BUILD_CONTEXT' | 'CALL_MODEL' | 'TOOL_ROUND' | 'RENDER_REPLY' | 'DONE' | 'FAILED';

export type TurnPath = 'chat' | 'summary' | 'not_configured';

export type TurnOutcome =
  | {
      state: 'DONE';
      path: TurnPath;
      /** Tool rounds run */
      rounds: number;
      /** Messages posted */
      posted: number;
      /** Whether the tool round cap ended the turn */
      capped: boolean;
    }
  | {
      state: 'FAILED';
      path: TurnPath;
      /** State the turn was in when it failed */
      failedIn: TurnState;
      error: string;
    };

export interface ConversationSettings {
  historyWindow: number;
  urlLookback: number;
  maxToolRounds: number;
  chunkSize: number;
  maxOutputTokens: number;
}

export interface ConversationLoopDeps {
  /** Null when no model credential is configured */
  llm: LLMProvider | null;
  catalog: ToolCatalog;
  executor: ToolExecutor;
  articles: ArticleReader;
  deadlines: readonly DeadlineConfig[];
  settings: ConversationSettings;
  logger: Logger;
}

/**
 * Per-turn bookkeeping shared by both paths.
 */
interface Turn {
  message: ChatMessage;
  channel: ChatChannel;
  botUserId: string;
  state: TurnState;
  posted: number;
}

export class ConversationLoop {
  private readonly logger: Logger;

  constructor(private readonly deps: ConversationLoopDeps) {
    this.logger = deps.logger.child({ component: 'conversation' });
  }

  /**
   * Handle a message that mentions the bot. Resolves once every reply has
   * been posted; never rejects.
   */
  handleMention(message: ChatMessage, channel: ChatChannel, botUserId: string): Promise<TurnOutcome> {
    return withTraceContext(createTraceContext('turn', message.id), () =>
      this.runTurn(message, channel, botUserId)
    );
  }

  private async runTurn(
    message: ChatMessage,
    channel: ChatChannel,
    botUserId: string
  ): Promise<TurnOutcome> {
    const turn: Turn = { message, channel, botUserId, state: 'BUILD_CONTEXT', posted: 0 };
    const llm = this.deps.llm;

    if (!llm) {
      this.logger.info({ messageId: message.id }, 'Mention received but no model is configured');
      try {
        await this.post(turn, NOTICES.notConfigured);
        return { state: 'DONE', path: 'not_configured', rounds: 0, posted: turn.posted, capped: false };
      } catch (error) {
        return this.fail(turn, 'not_configured', error);
      }
    }

    const question = stripMention(message.content, botUserId);
    const path: TurnPath = hasSummaryIntent(question) ? 'summary' : 'chat';

    this.logger.info(
      { messageId: message.id, author: message.author.id, path, questionLength: question.length },
      'Turn started'
    );

    try {
      const outcome = await channel.withTyping(() =>
        path === 'summary' ? this.runSummary(turn, llm) : this.runChat(turn, llm, question)
      );
      this.logger.info({ ...outcome }, 'Turn finished');
      return outcome;
    } catch (error) {
      return this.fail(turn, path, error);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Chat path
  // ─────────────────────────────────────────────────────────────

  private async runChat(turn: Turn, llm: LLMProvider, question: string): Promise<TurnOutcome> {
    const { catalog, executor, settings } = this.deps;

    turn.state = 'BUILD_CONTEXT';
    const recent = await turn.channel.fetchRecent(settings.historyWindow);
    const conversation = renderHistory(recent, turn.message.id, turn.botUserId);

    const tools = catalog.size > 0 ? catalog.listTools() : undefined;
    const system = buildSystemPrompt(this.deps.deadlines, { crmTools: tools !== undefined });
    const messages: Message[] = [{ role: 'user', content: buildUserPrompt(conversation, question) }];

    turn.state = 'CALL_MODEL';
    let response = await llm.complete({ system, messages, tools, maxTokens: settings.maxOutputTokens });

    let rounds = 0;
    for (;;) {
      const calls = toolUsesOf(response.content);
      if (calls.length === 0) break;

      if (rounds >= settings.maxToolRounds) {
        this.logger.warn(
          { rounds, pendingCalls: calls.map((call) => call.name) },
          'Tool round cap reached, ending turn'
        );
        turn.state = 'RENDER_REPLY';
        await this.postReply(turn, NOTICES.roundCap);
        turn.state = 'DONE';
        return { state: 'DONE', path: 'chat', rounds, posted: turn.posted, capped: true };
      }

      turn.state = 'TOOL_ROUND';
      rounds++;
      const results: ToolResult[] = [];
      for (const call of calls) {
        results.push(await executor.execute(call.name, call.input, call.id));
      }
      this.logger.debug(
        {
          round: rounds,
          tools: results.map((result) => result.name),
          errors: results.filter((result) => result.isError).length,
        },
        'Tool round complete'
      );

      messages.push({ role: 'assistant', content: response.content });
      messages.push({ role: 'tool', results });

      turn.state = 'CALL_MODEL';
      response = await llm.complete({ system, messages, tools, maxTokens: settings.maxOutputTokens });
    }

    turn.state = 'RENDER_REPLY';
    const reply = textOf(response.content) || NOTICES.emptyReply;
    await this.postReply(turn, reply);

    turn.state = 'DONE';
    return { state: 'DONE', path: 'chat', rounds, posted: turn.posted, capped: false };
  }

  // ─────────────────────────────────────────────────────────────
  // Summary path
  // ─────────────────────────────────────────────────────────────

  private async runSummary(turn: Turn, llm: LLMProvider): Promise<TurnOutcome> {
    const done = (): TurnOutcome => {
      turn.state = 'DONE';
      return { state: 'DONE', path: 'summary', rounds: 0, posted: turn.posted, capped: false };
    };

    turn.state = 'BUILD_CONTEXT';
    const url = await this.findUrl(turn);
    if (!url) {
      this.logger.info({ messageId: turn.message.id }, 'No link found to summarize');
      await this.postReply(turn, NOTICES.noUrl);
      return done();
    }

    await turn.channel.reply(turn.message.id, NOTICES.reading);
    turn.posted++;

    const article = await this.deps.articles.read(url);
    if (!article.ok) {
      this.logger.warn({ url, code: article.error.code, error: article.error.message }, 'Article unavailable');
      await this.post(turn, NOTICES.fetchFailed);
      return done();
    }

    turn.state = 'CALL_MODEL';
    const response = await llm.complete({
      messages: [{ role: 'user', content: buildSummaryPrompt(article.text) }],
      maxTokens: this.deps.settings.maxOutputTokens,
    });

    turn.state = 'RENDER_REPLY';
    const summary = textOf(response.content) || NOTICES.emptyReply;
    for (const chunk of splitIntoChunks(summary, this.deps.settings.chunkSize)) {
      await this.post(turn, chunk);
    }
    return done();
  }

  /**
   * First link in the mention, else in the message it replies to, else in the
   * newest recent message that has one.
   */
  private async findUrl(turn: Turn): Promise<string | undefined> {
    const own = extractUrls(turn.message.content);
    if (own[0]) return own[0];

    if (turn.message.replyToId) {
      const parent = await turn.channel.fetchMessage(turn.message.replyToId);
      const fromParent = parent ? extractUrls(parent.content) : [];
      if (fromParent[0]) return fromParent[0];
    }

    const recent = await turn.channel.fetchRecent(this.deps.settings.urlLookback);
    for (const msg of recent) {
      if (msg.id === turn.message.id) continue;
      const found = extractUrls(msg.content);
      if (found[0]) return found[0];
    }
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────

  private async post(turn: Turn, text: string): Promise<void> {
    await turn.channel.send(text);
    turn.posted++;
  }

  /**
   * First chunk as a reply to the trigger, the rest as plain posts.
   */
  private async postReply(turn: Turn, text: string): Promise<void> {
    const chunks = splitIntoChunks(text, this.deps.settings.chunkSize);
    for (const [i, chunk] of chunks.entries()) {
      if (i === 0) {
        await turn.channel.reply(turn.message.id, chunk);
        turn.posted++;
      } else {
        await this.post(turn, chunk);
      }
    }
  }

  private async fail(turn: Turn, path: TurnPath, error: unknown): Promise<TurnOutcome> {
    const failedIn = turn.state;
    turn.state = 'FAILED';
    const message = errorMessage(error);
    this.logger.error({ messageId: turn.message.id, path, failedIn, error: message }, 'Turn failed');

    try {
      await turn.channel.reply(turn.message.id, NOTICES.apology);
    } catch (sendError) {
      this.logger.error({ error: errorMessage(sendError) }, 'Could not deliver apology');
    }

    return { state: 'FAILED', path, failedIn, error: message };
  }
}
