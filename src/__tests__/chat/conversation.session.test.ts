import { describe, it, expect, vi } from 'vitest';
import { ConversationSession } from '../../chat/conversation.session.js';
import { ConfigurationError } from '../../utils/errors.js';
import {
  createDeferred,
  createFailingBackend,
  createFakeBackend,
  createFakeBackendSet,
} from '../helpers/fakes.js';

describe('ConversationSession', () => {
  describe('construction', () => {
    it('requires an advanced backend', () => {
      const create = () => new ConversationSession({ fast: createFakeBackend('fast-model') });

      expect(create).toThrow(ConfigurationError);
      expect(create).toThrow('Backend set must provide a fast and an advanced backend: missing advanced backend');
    });

    it('requires a fast backend', () => {
      try {
        new ConversationSession({ advanced: createFakeBackend('advanced-model') });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({ code: 'CONFIGURATION_ERROR', issues: ['missing fast backend'] });
      }
    });

    it('rejects backends without a name', () => {
      const create = () => new ConversationSession({
        fast: createFakeBackend(''),
        advanced: createFakeBackend('advanced-model'),
      });

      expect(create).toThrow(ConfigurationError);
    });

    it('rejects a non-positive history limit', () => {
      expect(() => new ConversationSession(createFakeBackendSet(), { historyLimit: 0 })).toThrow(
        'historyLimit must be a positive integer, got 0'
      );
    });
  });

  it('returns the routed reply and records the turn', async () => {
    const session = new ConversationSession(createFakeBackendSet('Paris'));

    const reply = await session.invoke('What is the capital of France?');

    expect(reply).toBe('Paris');
    expect(session.getHistory()).toEqual([
      {
        userText: 'What is the capital of France?',
        assistantText: 'Paris',
        backendName: 'fast-model',
        reason: 'Simple factual query - using fast-model',
        label: 'simple',
        timestamp: expect.any(Date),
      },
    ]);
  });

  it('reports "none" before the first turn', () => {
    const session = new ConversationSession(createFakeBackendSet());

    expect(session.lastBackendUsed()).toBe('none');
    expect(session.size).toBe(0);
  });

  it('records one interaction per invoke with the backend chosen for it', async () => {
    const session = new ConversationSession(createFakeBackendSet());
    const queries = [
      'What is the capital of France?',
      'Explain how neural networks work step by step',
      'Write a Python function for binary search',
      'Book me a hotel in Rome',
    ];

    for (const query of queries) {
      await session.invoke(query);
    }

    expect(session.size).toBe(4);
    expect(session.getHistory().map(record => record.backendName)).toEqual([
      'fast-model',
      'advanced-model',
      'advanced-model',
      'fast-model',
    ]);
    expect(session.lastBackendUsed()).toBe('fast-model');
  });

  it('keeps speaking when the backend fails', async () => {
    const session = new ConversationSession({
      fast: createFailingBackend('fast-model', 'quota exceeded'),
      advanced: createFailingBackend('advanced-model', 'quota exceeded'),
    });

    const reply = await session.invoke('What is the capital of France?');

    expect(reply).toBe('Error calling model: quota exceeded');
    expect(session.size).toBe(1);
    expect(session.getHistory()[0].assistantText).toBe('Error calling model: quota exceeded');
    expect(session.lastBackendUsed()).toBe('fast-model');
  });

  it('hands out copies of the history', async () => {
    const session = new ConversationSession(createFakeBackendSet());
    await session.invoke('hi');

    const history = session.getHistory();
    expect(Object.isFrozen(history[0])).toBe(true);
    expect(history).not.toBe(session.getHistory());
  });

  it('drops the oldest records beyond the history limit', async () => {
    const session = new ConversationSession(createFakeBackendSet(), { historyLimit: 2 });

    await session.invoke('first');
    await session.invoke('second');
    await session.invoke('third');

    expect(session.getHistory().map(record => record.userText)).toEqual(['second', 'third']);
  });

  it('runs concurrent turns one at a time in call order', async () => {
    const backends = createFakeBackendSet();
    const firstReply = createDeferred<string>();
    backends.fast.invoke
      .mockImplementationOnce(() => firstReply.promise)
      .mockImplementationOnce(async () => 'second reply');
    const session = new ConversationSession(backends);

    const first = session.invoke('What is the capital of Spain?');
    const second = session.invoke('What is the capital of Italy?');

    await vi.waitFor(() => expect(backends.fast.invoke).toHaveBeenCalledTimes(1));
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(backends.fast.invoke).toHaveBeenCalledTimes(1);

    firstReply.resolve('first reply');

    await expect(Promise.all([first, second])).resolves.toEqual(['first reply', 'second reply']);
    expect(session.getHistory().map(record => record.userText)).toEqual([
      'What is the capital of Spain?',
      'What is the capital of Italy?',
    ]);
  });
});
