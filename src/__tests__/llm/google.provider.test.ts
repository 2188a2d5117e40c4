import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { BASE_URL, convertMessages, createCompletion, extractText } from '../../llm/providers/google.provider.js';
import { createBackendSet, createGeminiBackend } from '../../llm/backends.js';
import { ConversationSession } from '../../chat/conversation.session.js';
import { BackendInvocationError } from '../../utils/errors.js';
import { createTestConfig } from '../helpers/fakes.js';

const fetchMock = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function geminiReply(...texts: string[]) {
  return {
    candidates: [{ content: { parts: texts.map(text => ({ text })) }, finishReason: 'STOP' }],
    usageMetadata: { totalTokenCount: 17 },
  };
}

function requestBody(callIndex = 0) {
  const init = fetchMock.mock.calls[callIndex][1];
  return JSON.parse(init.body);
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('Google provider', () => {
  it('converts chat messages to Gemini contents', () => {
    expect(convertMessages([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
    ])).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'Hi' }] },
        { role: 'model', parts: [{ text: 'Hello' }] },
      ],
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
    });
  });

  it('skips thought parts when extracting text', () => {
    expect(extractText({
      candidates: [{ content: { parts: [{ text: 'planning', thought: true }, { text: 'Hello ' }, { text: 'there' }] } }],
    })).toBe('Hello there');
  });

  it('posts the prompt and returns the completion', async () => {
    fetchMock.mockResolvedValue(jsonResponse(geminiReply('Paris')));

    const result = await createCompletion(
      { apiKey: 'test-google-key' },
      'gemini-2.5-flash',
      [{ role: 'user', content: 'What is the capital of France?' }],
      { temperature: 0.3 }
    );

    expect(result).toEqual({ content: 'Paris', tokensUsed: 17, model: 'gemini-2.5-flash', provider: 'google' });
    expect(fetchMock).toHaveBeenCalledWith(
      `${BASE_URL}/models/gemini-2.5-flash:generateContent`,
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-goog-api-key': 'test-google-key' },
      })
    );
    expect(requestBody()).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'What is the capital of France?' }] }],
      generationConfig: { temperature: 0.3 },
    });
  });

  it('raises a backend error on a failed response', async () => {
    fetchMock.mockResolvedValue(new Response('quota exceeded', { status: 429 }));

    const call = createCompletion({ apiKey: 'test-google-key' }, 'gemini-2.5-pro', [{ role: 'user', content: 'hi' }]);

    await expect(call).rejects.toBeInstanceOf(BackendInvocationError);
    await expect(call).rejects.toMatchObject({
      message: 'Google AI completion failed: 429 quota exceeded',
      status: 429,
      backendName: 'gemini-2.5-pro',
    });
  });

  it('raises a backend error when no text comes back', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ candidates: [] }));

    await expect(
      createCompletion({ apiKey: 'test-google-key' }, 'gemini-2.5-flash', [{ role: 'user', content: 'hi' }])
    ).rejects.toThrow('Google AI returned no text (NO_CANDIDATES)');
  });

  it('refuses to call without an API key', async () => {
    await expect(
      createCompletion({ apiKey: '' }, 'gemini-2.5-flash', [{ role: 'user', content: 'hi' }])
    ).rejects.toThrow('Google AI API key not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('Gemini backends', () => {
  it('sends instructions as system instruction with the prompt', async () => {
    fetchMock.mockResolvedValue(jsonResponse(geminiReply('Sure.')));
    const backend = createGeminiBackend({
      model: 'gemini-2.5-flash',
      apiKey: 'test-google-key',
      instructions: 'Keep it short.',
    });

    const result = await backend.invoke('Plan a day in Porto');

    expect(backend.name).toBe('gemini-2.5-flash');
    expect(result).toMatchObject({ content: 'Sure.' });
    expect(requestBody()).toMatchObject({
      contents: [{ role: 'user', parts: [{ text: 'Plan a day in Porto' }] }],
      systemInstruction: { parts: [{ text: 'Keep it short.' }] },
    });
  });

  it('builds a flash and a pro backend from configuration', () => {
    const backends = createBackendSet(createTestConfig());

    expect(backends.fast.name).toBe('gemini-2.5-flash');
    expect(backends.advanced.name).toBe('gemini-2.5-pro');
  });

  it('speaks the provider error through the session', async () => {
    fetchMock.mockResolvedValue(new Response('boom', { status: 500 }));
    const session = new ConversationSession(createBackendSet(createTestConfig()));

    const reply = await session.invoke('Explain visa rules for Japan');

    expect(reply).toBe('Error calling model: Google AI completion failed: 500 boom');
    expect(session.lastBackendUsed()).toBe('gemini-2.5-pro');
    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/models/gemini-2.5-pro:generateContent`);
  });
});
