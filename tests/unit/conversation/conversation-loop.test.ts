import { describe, it, expect, vi } from 'vitest';
import {
  ConversationLoop,
  type ConversationSettings,
} from '../../../src/conversation/conversation-loop.js';
import {
  NOTICES,
  buildSummaryPrompt,
  buildSystemPrompt,
  buildUserPrompt,
} from '../../../src/conversation/prompts.js';
import type { ArticleReader, ArticleResult } from '../../../src/article/article-fetcher.js';
import type { ChatMessage } from '../../../src/channels/channel.js';
import type { LLMProvider } from '../../../src/llm/provider.js';
import { ToolCatalog } from '../../../src/tools/catalog.js';
import { ToolExecutor } from '../../../src/tools/tool-executor.js';
import { createCrmTools } from '../../../src/tools/crm-tools.js';
import type { RegisteredTool } from '../../../src/tools/types.js';
import { createChatMessage, createMockLogger, loggedMessages } from '../../helpers/factories.js';
import { FakeChannel } from '../../helpers/fake-chat.js';
import {
  createScriptedLLM,
  textResponse,
  toolCallResponse,
  toolCallsResponse,
  type ScriptedResponse,
} from '../../helpers/scripted-llm.js';
import { FakeDealPort, dealRecord } from '../../helpers/crm-fixture.js';

const BOT_ID = 'bot-1';

const DEFAULT_SETTINGS: ConversationSettings = {
  historyWindow: 25,
  urlLookback: 10,
  maxToolRounds: 6,
  chunkSize: 2000,
  maxOutputTokens: 1024,
};

const bob = { id: 'user-2', displayName: 'Bob', isBot: false };

function staticArticles(result: ArticleResult) {
  const read = vi.fn<ArticleReader['read']>(() => Promise.resolve(result));
  return { read };
}

interface SetupOptions {
  script?: ScriptedResponse[];
  noModel?: boolean;
  history?: ChatMessage[];
  tools?: RegisteredTool[];
  articles?: ArticleReader;
  settings?: Partial<ConversationSettings>;
}

function setup(trigger: ChatMessage, options: SetupOptions = {}) {
  const logger = createMockLogger();
  const scripted = createScriptedLLM(options.script ?? []);
  const llm: LLMProvider | null = options.noModel ? null : scripted;
  const catalog = new ToolCatalog(options.tools ?? []);
  const channel = new FakeChannel('chan-1', [...(options.history ?? []), trigger]);
  const articles = options.articles ?? staticArticles({ ok: true, url: 'unused', text: 'unused' });

  const loop = new ConversationLoop({
    llm,
    catalog,
    executor: new ToolExecutor(catalog, logger),
    articles,
    deadlines: [],
    settings: { ...DEFAULT_SETTINGS, ...options.settings },
    logger,
  });

  return {
    loop,
    channel,
    llm: scripted,
    logger,
    run: () => loop.handleMention(trigger, channel, BOT_ID),
  };
}

describe('ConversationLoop', () => {
  describe('chat path', () => {
    const trigger = createChatMessage({ id: 'm-trigger', content: '<@bot-1> how many deals are in Demo?' });
    const history = [createChatMessage({ id: 'm-0', author: bob, content: 'morning all' })];

    it('answers with one reply built from the channel window', async () => {
      const { run, channel, llm } = setup(trigger, {
        history,
        script: [textResponse('Three deals are in Demo.')],
      });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'DONE', path: 'chat', rounds: 0, posted: 1, capped: false });
      expect(channel.sent).toEqual([{ kind: 'reply', to: 'm-trigger', text: 'Three deals are in Demo.' }]);
      expect(channel.fetchRecentLimits).toEqual([25]);
      expect(channel.typingCalls).toBe(1);
      expect(llm.requests).toEqual([
        {
          system: buildSystemPrompt([], { crmTools: false }),
          messages: [
            {
              role: 'user',
              content: buildUserPrompt(
                'Bob: morning all\nAlice: how many deals are in Demo?',
                'how many deals are in Demo?'
              ),
            },
          ],
          tools: undefined,
          maxTokens: 1024,
        },
      ]);
    });

    it('runs a tool round and feeds the result back', async () => {
      const records = [dealRecord({ id: 'rec-1', name: 'Acme', stage: 'Demo', value: 5000 })];
      const port = new FakeDealPort(records);
      const tools = createCrmTools(port);
      const { run, channel, llm } = setup(trigger, {
        tools,
        script: [toolCallResponse('list_deals', { stage: 'Demo' }), textResponse('Acme is in Demo.')],
      });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'DONE', path: 'chat', rounds: 1, posted: 1, capped: false });
      expect(port.queries).toEqual([{ limit: 20, filter: { stage: 'Demo' } }]);
      expect(channel.texts).toEqual(['Acme is in Demo.']);

      expect(llm.requests[0]?.tools?.map((t) => t.name)).toEqual(tools.map((t) => t.spec.name));
      expect(llm.requests[0]?.system).toBe(buildSystemPrompt([], { crmTools: true }));

      const followUp = llm.requests[1]?.messages ?? [];
      expect(followUp).toHaveLength(3);
      expect(followUp[1]).toEqual({
        role: 'assistant',
        content: [{ type: 'tool_use', id: 'call_0_0', name: 'list_deals', input: { stage: 'Demo' } }],
      });
      expect(followUp[2]).toEqual({
        role: 'tool',
        results: [
          {
            invocationId: 'call_0_0',
            name: 'list_deals',
            content: JSON.stringify({ data: records }, null, 2),
            isError: false,
          },
        ],
      });
    });

    it('executes every call of a round in order, including failing ones', async () => {
      const port = new FakeDealPort([]);
      const { run, llm } = setup(trigger, {
        tools: createCrmTools(port),
        script: [
          toolCallsResponse([
            { name: 'search_deals', args: { query: 'Acme' } },
            { name: 'close_deal', args: {} },
            { name: 'get_deal', args: { deal_id: 'rec-9' } },
          ]),
          textResponse('Done.'),
        ],
      });

      await run();

      expect(port.queries).toEqual([
        { limit: 50, filter: { name: { $contains: 'Acme' } } },
        { limit: 1, filter: { record_id: 'rec-9' } },
      ]);
      const toolMessage = llm.requests[1]?.messages[2];
      expect(toolMessage?.role).toBe('tool');
      if (toolMessage?.role === 'tool') {
        expect(toolMessage.results.map((r) => [r.invocationId, r.name, r.isError])).toEqual([
          ['call_0_0', 'search_deals', false],
          ['call_0_1', 'close_deal', true],
          ['call_0_2', 'get_deal', false],
        ]);
        expect(toolMessage.results[1]?.content).toBe('{\n  "error": "Unknown tool: close_deal"\n}');
      }
    });

    it('stops at the round cap with the fallback reply', async () => {
      const { run, channel, llm, logger } = setup(trigger, {
        tools: createCrmTools(new FakeDealPort([])),
        settings: { maxToolRounds: 2 },
        script: [
          toolCallResponse('list_pipeline_stages', {}),
          toolCallResponse('list_pipeline_stages', {}),
          toolCallResponse('list_pipeline_stages', {}),
        ],
      });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'DONE', path: 'chat', rounds: 2, posted: 1, capped: true });
      expect(llm.callCount).toBe(3);
      expect(channel.sent).toEqual([{ kind: 'reply', to: 'm-trigger', text: NOTICES.roundCap }]);
      expect(loggedMessages(logger, 'warn')).toContain('Tool round cap reached, ending turn');
    });

    it('replies with a fallback when the model returns no text', async () => {
      const { run, channel } = setup(trigger, { script: [{ content: '' }] });

      await run();

      expect(channel.texts).toEqual([NOTICES.emptyReply]);
    });

    it('splits a long reply into a reply and follow-up posts', async () => {
      const long = 'x'.repeat(4500);
      const { run, channel } = setup(trigger, { script: [textResponse(long)] });

      const outcome = await run();

      expect(channel.sent).toEqual([
        { kind: 'reply', to: 'm-trigger', text: 'x'.repeat(2000) },
        { kind: 'send', text: 'x'.repeat(2000) },
        { kind: 'send', text: 'x'.repeat(500) },
      ]);
      expect(outcome).toMatchObject({ state: 'DONE', posted: 3 });
    });

    it('apologizes once when the model call fails', async () => {
      const { run, channel } = setup(trigger, { script: [{ error: new Error('model down') }] });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'FAILED', path: 'chat', failedIn: 'CALL_MODEL', error: 'model down' });
      expect(channel.sent).toEqual([{ kind: 'reply', to: 'm-trigger', text: NOTICES.apology }]);
    });

    it('logs an apology that cannot be delivered', async () => {
      const { run, channel, logger } = setup(trigger, { script: [{ error: new Error('model down') }] });
      channel.failNextPosts = 1;

      const outcome = await run();

      expect(outcome.state).toBe('FAILED');
      expect(channel.sent).toEqual([]);
      expect(loggedMessages(logger, 'error')).toEqual(['Turn failed', 'Could not deliver apology']);
    });
  });

  describe('without a model', () => {
    it('posts the not-configured notice', async () => {
      const trigger = createChatMessage({ id: 'm-trigger', content: '<@bot-1> hello' });
      const { run, channel } = setup(trigger, { noModel: true });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'DONE', path: 'not_configured', rounds: 0, posted: 1, capped: false });
      expect(channel.sent).toEqual([{ kind: 'send', text: NOTICES.notConfigured }]);
      expect(channel.typingCalls).toBe(0);
    });
  });

  describe('summary path', () => {
    const article: ArticleResult = { ok: true, url: 'https://news.example/story', text: 'Article body' };

    it('summarizes a link in the mention', async () => {
      const trigger = createChatMessage({
        id: 'm-trigger',
        content: '<@bot-1> summarize https://news.example/story',
      });
      const articles = staticArticles(article);
      const { run, channel, llm } = setup(trigger, {
        articles,
        script: [textResponse('Short summary')],
      });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'DONE', path: 'summary', rounds: 0, posted: 2, capped: false });
      expect(articles.read).toHaveBeenCalledWith('https://news.example/story');
      expect(channel.sent).toEqual([
        { kind: 'reply', to: 'm-trigger', text: NOTICES.reading },
        { kind: 'send', text: 'Short summary' },
      ]);
      expect(llm.requests).toEqual([
        {
          messages: [{ role: 'user', content: buildSummaryPrompt('Article body') }],
          maxTokens: 1024,
        },
      ]);
    });

    it('takes the link from the message being replied to', async () => {
      const parent = createChatMessage({ id: 'm-parent', author: bob, content: 'https://blog.example/post' });
      const trigger = createChatMessage({
        id: 'm-trigger',
        content: '<@bot-1> tldr',
        replyToId: 'm-parent',
      });
      const articles = staticArticles(article);
      const { run } = setup(trigger, { history: [parent], articles, script: [textResponse('ok')] });

      await run();

      expect(articles.read).toHaveBeenCalledWith('https://blog.example/post');
    });

    it('falls back to the newest link in recent history', async () => {
      const history = [
        createChatMessage({ id: 'm-old', author: bob, content: 'older https://old.example/a' }),
        createChatMessage({ id: 'm-new', author: bob, content: 'newer https://new.example/b' }),
        createChatMessage({ id: 'm-chat', author: bob, content: 'no link here' }),
      ];
      const trigger = createChatMessage({ id: 'm-trigger', content: 'tl;dr <@bot-1>' });
      const articles = staticArticles(article);
      const { run, channel } = setup(trigger, { history, articles, script: [textResponse('ok')] });

      await run();

      expect(articles.read).toHaveBeenCalledWith('https://new.example/b');
      expect(channel.fetchRecentLimits).toEqual([10]);
    });

    it('says so when there is no link anywhere', async () => {
      const trigger = createChatMessage({ id: 'm-trigger', content: '<@bot-1> summarize please' });
      const articles = staticArticles(article);
      const { run, channel, llm } = setup(trigger, { articles });

      const outcome = await run();

      expect(outcome).toEqual({ state: 'DONE', path: 'summary', rounds: 0, posted: 1, capped: false });
      expect(channel.sent).toEqual([{ kind: 'reply', to: 'm-trigger', text: NOTICES.noUrl }]);
      expect(articles.read).not.toHaveBeenCalled();
      expect(llm.callCount).toBe(0);
    });

    it('reports an article that cannot be fetched', async () => {
      const trigger = createChatMessage({
        id: 'm-trigger',
        content: '<@bot-1> summarize https://paywall.example/x',
      });
      const articles = staticArticles({
        ok: false,
        error: { code: 'HTTP_ERROR', message: 'Article fetch returned status 403', status: 403, retryable: false },
      });
      const { run, channel, llm } = setup(trigger, { articles });

      await run();

      expect(channel.texts).toEqual([NOTICES.reading, NOTICES.fetchFailed]);
      expect(llm.callCount).toBe(0);
    });

    it('apologizes when summarization fails', async () => {
      const trigger = createChatMessage({
        id: 'm-trigger',
        content: '<@bot-1> summarize https://news.example/story',
      });
      const { run, channel } = setup(trigger, {
        articles: staticArticles(article),
        script: [{ error: new Error('rate limited') }],
      });

      const outcome = await run();

      expect(outcome).toEqual({
        state: 'FAILED',
        path: 'summary',
        failedIn: 'CALL_MODEL',
        error: 'rate limited',
      });
      expect(channel.sent).toEqual([
        { kind: 'reply', to: 'm-trigger', text: NOTICES.reading },
        { kind: 'reply', to: 'm-trigger', text: NOTICES.apology },
      ]);
    });

    it('posts a long summary in chunks', async () => {
      const trigger = createChatMessage({
        id: 'm-trigger',
        content: '<@bot-1> summarize https://news.example/story',
      });
      const { run, channel } = setup(trigger, {
        articles: staticArticles(article),
        settings: { chunkSize: 10 },
        script: [textResponse('abcdefghijklmnop')],
      });

      await run();

      expect(channel.sent).toEqual([
        { kind: 'reply', to: 'm-trigger', text: NOTICES.reading },
        { kind: 'send', text: 'abcdefghij' },
        { kind: 'send', text: 'klmnop' },
      ]);
    });
  });
});
