/**
 * Chat context extraction
 *
 * Voice clients send history in loose shapes: plain strings, lists of
 * strings, `{ type: 'text', text }` parts. `toChatItems` folds those into a
 * tagged variant once, so extraction never probes types.
 */

export const DEFAULT_GREETING = 'Hello';

export type ContentPart =
  | { kind: 'text'; text: string }
  | { kind: 'string'; value: string }
  | { kind: 'other'; value: unknown };

export type MessageContent =
  | { kind: 'text'; text: string }
  | { kind: 'parts'; parts: ContentPart[] };

export interface ChatItem {
  role: string;
  content: MessageContent;
}

export function textItem(role: string, text: string): ChatItem {
  return { role, content: { kind: 'text', text } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toContentPart(part: unknown): ContentPart {
  if (typeof part === 'string') {
    return { kind: 'string', value: part };
  }
  if (isRecord(part) && part.type === 'text' && typeof part.text === 'string') {
    return { kind: 'text', text: part.text };
  }
  return { kind: 'other', value: part };
}

function toMessageContent(content: unknown): MessageContent {
  if (typeof content === 'string') {
    return { kind: 'text', text: content };
  }
  if (Array.isArray(content)) {
    return { kind: 'parts', parts: content.map(toContentPart) };
  }
  if (isRecord(content)) {
    // A single part sent without the surrounding list
    return { kind: 'parts', parts: [toContentPart(content)] };
  }
  if (typeof content === 'number' || typeof content === 'boolean') {
    return { kind: 'text', text: String(content) };
  }
  return { kind: 'parts', parts: [] };
}

/**
 * Normalize raw history. Entries without a string role are dropped.
 */
export function toChatItems(raw: unknown): ChatItem[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const items: ChatItem[] = [];
  for (const entry of raw) {
    if (!isRecord(entry) || typeof entry.role !== 'string') {
      continue;
    }
    items.push({ role: entry.role, content: toMessageContent(entry.content) });
  }
  return items;
}

export function contentToText(content: MessageContent): string {
  if (content.kind === 'text') {
    return content.text;
  }

  for (const part of content.parts) {
    if (part.kind === 'text' && part.text) {
      return part.text;
    }
  }

  return content.parts
    .flatMap(part => (part.kind === 'string' ? [part.value] : []))
    .join(' ');
}

/**
 * Text of the newest user message. Only the newest user item is considered;
 * when it is empty, or there is none, the fallback greeting is used.
 */
export function extractLatestUserMessage(
  items: readonly ChatItem[],
  fallback: string = DEFAULT_GREETING
): string {
  let userMessage = '';

  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item.role === 'user') {
      userMessage = contentToText(item.content);
      break;
    }
  }

  return userMessage ? userMessage : fallback;
}
