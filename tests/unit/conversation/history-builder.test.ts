import { describe, it, expect } from 'vitest';
import { renderHistory, stripMention } from '../../../src/conversation/history-builder.js';
import { createChatMessage } from '../../helpers/factories.js';

describe('stripMention', () => {
  it('removes both mention forms and trims', () => {
    expect(stripMention('<@bot-1> what is up <@!bot-1>', 'bot-1')).toBe('what is up');
  });

  it('leaves other mentions alone', () => {
    expect(stripMention('<@bot-1> ask <@user-2>', 'bot-1')).toBe('ask <@user-2>');
  });
});

describe('renderHistory', () => {
  it('renders newest-first input oldest first, stripping the trigger mention', () => {
    const newestFirst = [
      createChatMessage({ id: 'm3', content: '<@bot-1> how is the pipeline?' }),
      createChatMessage({
        id: 'm2',
        author: { id: 'bot-1', displayName: 'Deal Desk', isBot: true },
        content: 'Morning!',
      }),
      createChatMessage({
        id: 'm1',
        author: { id: 'user-2', displayName: 'Bob', isBot: false },
        content: 'hey <@bot-1>',
      }),
    ];

    expect(renderHistory(newestFirst, 'm3', 'bot-1')).toBe(
      'Bob: hey <@bot-1>\nDeal Desk: Morning!\nAlice: how is the pipeline?'
    );
  });

  it('renders nothing for an empty window', () => {
    expect(renderHistory([], 'm1', 'bot-1')).toBe('');
  });
});
