import type { ChatMessage } from '../channels/channel.js';

/**
 * Remove the bot's mention tokens (`<@id>` and `<@!id>`) and trim.
 */
export function stripMention(content: string, botUserId: string): string {
  return content.split(`<@${botUserId}>`).join('').split(`<@!${botUserId}>`).join('').trim();
}

/**
 * Render a newest-first history page as oldest-first
 * `"{displayName}: {content}"` lines. The triggering message has the bot
 * mention stripped.
 */
export function renderHistory(
  newestFirst: readonly ChatMessage[],
  triggerId: string,
  botUserId: string
): string {
  return [...newestFirst]
    .reverse()
    .map((msg) => {
      const content = msg.id === triggerId ? stripMention(msg.content, botUserId) : msg.content;
      return `${msg.author.displayName}: ${content}`;
    })
    .join('\n');
}
