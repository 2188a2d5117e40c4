import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GREETING,
  contentToText,
  extractLatestUserMessage,
  textItem,
  toChatItems,
} from '../../voice/chat-context.js';

describe('toChatItems', () => {
  it('normalizes string, list and single-part content', () => {
    const items = toChatItems([
      { role: 'user', content: 'plain' },
      { role: 'user', content: ['a', { type: 'text', text: 'b' }, { type: 'image_url', url: 'x' }] },
      { role: 'user', content: { type: 'text', text: 'single' } },
      { role: 'user', content: 42 },
      { role: 'user', content: null },
    ]);

    expect(items).toEqual([
      { role: 'user', content: { kind: 'text', text: 'plain' } },
      {
        role: 'user',
        content: {
          kind: 'parts',
          parts: [
            { kind: 'string', value: 'a' },
            { kind: 'text', text: 'b' },
            { kind: 'other', value: { type: 'image_url', url: 'x' } },
          ],
        },
      },
      { role: 'user', content: { kind: 'parts', parts: [{ kind: 'text', text: 'single' }] } },
      { role: 'user', content: { kind: 'text', text: '42' } },
      { role: 'user', content: { kind: 'parts', parts: [] } },
    ]);
  });

  it('drops entries without a string role', () => {
    expect(toChatItems([{ content: 'orphan' }, 'text', null, { role: 3, content: 'x' }])).toEqual([]);
  });

  it('returns nothing for non-list input', () => {
    expect(toChatItems(undefined)).toEqual([]);
    expect(toChatItems({ role: 'user', content: 'hi' })).toEqual([]);
  });
});

describe('contentToText', () => {
  it('prefers a part tagged as text over plain strings', () => {
    expect(contentToText({
      kind: 'parts',
      parts: [{ kind: 'string', value: 'ignored' }, { kind: 'text', text: 'Tagged' }],
    })).toBe('Tagged');
  });

  it('joins string parts with a space when no text part exists', () => {
    expect(contentToText({
      kind: 'parts',
      parts: [{ kind: 'string', value: 'Book' }, { kind: 'other', value: 1 }, { kind: 'string', value: 'a flight' }],
    })).toBe('Book a flight');
  });

  it('skips an empty text part', () => {
    expect(contentToText({
      kind: 'parts',
      parts: [{ kind: 'text', text: '' }, { kind: 'string', value: 'fallback' }],
    })).toBe('fallback');
  });
});

describe('extractLatestUserMessage', () => {
  it('takes the newest user message', () => {
    const items = toChatItems([
      { role: 'system', content: 'You are a travel assistant.' },
      { role: 'user', content: 'Where is Lisbon?' },
      { role: 'assistant', content: 'In Portugal.' },
      { role: 'user', content: 'How many bridges does it have?' },
      { role: 'assistant', content: 'Two major ones.' },
    ]);

    expect(extractLatestUserMessage(items)).toBe('How many bridges does it have?');
  });

  it('uses the default greeting when there is no user message', () => {
    expect(extractLatestUserMessage([])).toBe(DEFAULT_GREETING);
    expect(extractLatestUserMessage([textItem('assistant', 'Hi there')])).toBe('Hello');
  });

  it('stops at the newest user message even when it is empty', () => {
    const items = [textItem('user', 'older question'), textItem('user', '')];

    expect(extractLatestUserMessage(items)).toBe('Hello');
  });

  it('uses the greeting for unreadable content', () => {
    const items = toChatItems([{ role: 'user', content: [{ type: 'audio', data: 'x' }] }]);

    expect(extractLatestUserMessage(items)).toBe('Hello');
  });

  it('accepts a custom fallback', () => {
    expect(extractLatestUserMessage([], 'Good morning')).toBe('Good morning');
  });
});
