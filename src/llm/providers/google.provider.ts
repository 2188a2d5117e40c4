import type { ChatMessage, CompletionOptions, CompletionResult } from '../types.js';
import { BackendInvocationError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';

export const BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export interface GoogleCredentials {
  apiKey: string;
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: { text: string }[];
}

interface GeminiResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string; thought?: boolean }>;
    };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}

interface ConvertedMessages {
  contents: GeminiContent[];
  systemInstruction?: { parts: { text: string }[] };
}

export function convertMessages(messages: ChatMessage[]): ConvertedMessages {
  const systemMessages = messages.filter(m => m.role === 'system');
  const chatMessages = messages.filter(m => m.role !== 'system');

  const contents: GeminiContent[] = chatMessages.map(m => ({
    role: m.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: m.content }],
  }));

  const result: ConvertedMessages = { contents };

  if (systemMessages.length > 0) {
    result.systemInstruction = {
      parts: [{ text: systemMessages.map(m => m.content).join('\n\n') }],
    };
  }

  return result;
}

/**
 * Concatenate the visible text parts of the first candidate.
 * Thought parts (2.5 models with thinking enabled) are skipped.
 */
export function extractText(data: GeminiResponse): string {
  const parts = data.candidates?.[0]?.content?.parts ?? [];
  return parts
    .filter(part => !part.thought && typeof part.text === 'string')
    .map(part => part.text)
    .join('');
}

export async function createCompletion(
  credentials: GoogleCredentials,
  model: string,
  messages: ChatMessage[],
  options: CompletionOptions = {}
): Promise<CompletionResult> {
  if (!isConfigured(credentials)) {
    throw new BackendInvocationError('Google AI API key not configured', model);
  }

  const { contents, systemInstruction } = convertMessages(messages);

  const response = await fetch(`${BASE_URL}/models/${model}:generateContent`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'x-goog-api-key': credentials.apiKey,
    },
    body: JSON.stringify({
      contents,
      systemInstruction,
      generationConfig: {
        temperature: options.temperature ?? 0.7,
        maxOutputTokens: options.maxTokens,
      },
    }),
  });

  if (!response.ok) {
    const errorText = await response.text();
    logger.error('Google AI completion failed', { status: response.status, model });
    throw new BackendInvocationError(
      `Google AI completion failed: ${response.status} ${errorText}`.trim(),
      model,
      response.status
    );
  }

  const data = await response.json() as GeminiResponse;
  const content = extractText(data);

  if (!content) {
    const finishReason = data.candidates?.[0]?.finishReason ?? 'NO_CANDIDATES';
    throw new BackendInvocationError(`Google AI returned no text (${finishReason})`, model);
  }

  return {
    content,
    tokensUsed: data.usageMetadata?.totalTokenCount || 0,
    model,
    provider: 'google',
  };
}

export function isConfigured(credentials: GoogleCredentials): boolean {
  return !!credentials.apiKey;
}
