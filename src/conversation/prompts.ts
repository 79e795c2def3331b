/**
 * Prompt templates and fixed user-facing notices.
 */

import type { DeadlineConfig } from '../config/config-schema.js';
import { formatDeadlineDate } from '../reminder/deadlines.js';

export const NOTICES = {
  notConfigured: "Sorry, I'm not configured to chat yet. Please add a language model API key.",
  noUrl: "I couldn't find any URLs to summarize. Share a link or reply to a message with a link!",
  reading: 'Let me read that article for you...',
  fetchFailed:
    "Sorry, I couldn't fetch the content from that URL. It might be paywalled, require login, or block bots.",
  emptyReply: "I processed your request but couldn't generate a response.",
  roundCap:
    'I had to stop after too many CRM lookups for one question. Try asking something narrower.',
  apology: 'Sorry, I encountered an error trying to respond. Please try again.',
} as const;

function deadlineLines(deadlines: readonly DeadlineConfig[]): string {
  if (deadlines.length === 0) {
    return 'There are no team deadlines configured right now.';
  }
  const noun = deadlines.length === 1 ? 'one' : String(deadlines.length);
  const lines = deadlines.map((d) => `- ${d.name}: ${formatDeadlineDate(d.date)}`);
  return `If someone asks about deadlines, the team has ${noun} coming up:\n${lines.join('\n')}`;
}

/**
 * System instructions for the chat path.
 */
export function buildSystemPrompt(
  deadlines: readonly DeadlineConfig[],
  options: { crmTools: boolean }
): string {
  const sections = [
    `You are a helpful assistant in a Discord server. You have access to recent conversation history for context.
Keep your responses concise and friendly - this is a chat, not an essay.
${deadlineLines(deadlines)}`,
    'You can also summarize articles if someone shares a URL and asks you to summarize it.',
  ];

  if (options.crmTools) {
    sections.push(
      'You have access to CRM tools to look up deals, search for companies, and check the sales pipeline. Use these tools when users ask about deals, pipeline, CRM data, sales, prospects, or specific companies.'
    );
  }

  return sections.join('\n\n');
}

/**
 * User prompt for the chat path: the channel window plus the question.
 */
export function buildUserPrompt(conversation: string, question: string): string {
  return `Here's the recent conversation in this channel:

${conversation}

The user is asking you: ${question}

Please respond helpfully and concisely.`;
}

/**
 * Single-shot summarization prompt over extracted article text.
 */
export function buildSummaryPrompt(articleText: string): string {
  return `Please summarize this article concisely. Include:
- The main topic/thesis
- Key points (3-5 bullet points)
- Any important conclusions or takeaways

Article content:
${articleText}`;
}

/**
 * Prompt for a generated motivational quote.
 */
export function buildQuotePrompt(dayLabel: string, topic: string): string {
  return `Today is ${dayLabel}. Generate a single inspiring quote about ${topic} from a famous entrepreneur or business leader (with attribution). Pick someone unexpected, avoid the most overused quotes. Keep it to 1-2 sentences. Return ONLY the quote, nothing else.`;
}
