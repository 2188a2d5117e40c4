/**
 * Query Classification
 *
 * | Label     | Signal                                       |
 * |-----------|----------------------------------------------|
 * | simple    | short (<= 8 words) factual question          |
 * | complex   | asks for explanation or reasoning            |
 * | technical | programming / software vocabulary            |
 * | creative  | creative writing vocabulary                  |
 * | general   | none of the above                            |
 *
 * Matching is plain substring containment on the lower-cased, trimmed text.
 * There are no word boundaries: "api" also matches inside "rapid" and
 * "class" inside "classic". Keep it that way unless routing behavior is
 * meant to change.
 */

import type { ClassificationLabel, ClassificationResult } from '../router.types.js';

export const SIMPLE_MAX_WORDS = 8;

const SIMPLE_PATTERNS = [
  'what is', 'who is', 'when is', 'where is',
  "what's", "who's", "when's", "where's",
  'define', 'meaning of', 'capital of',
  'how many', 'how much', 'how old',
] as const;

const COMPLEX_INDICATORS = [
  'explain', 'why', 'how does', 'how do',
  'reasoning', 'step by step', 'analyze',
  'compare', 'contrast',
  'differences between', 'relationship between',
  'implications', 'consequences', 'effect of',
] as const;

const TECHNICAL_KEYWORDS = [
  'code', 'python', 'javascript', 'function', 'algorithm',
  'implement', 'debug', 'sql', 'api', 'class',
  'programming', 'software', 'developer', 'technical',
] as const;

const CREATIVE_KEYWORDS = [
  'write a story', 'poem', 'creative', 'imagine', 'compose',
  'draft', 'marketing', 'slogan', 'brainstorm', 'design', 'invent',
] as const;

function normalizeText(text: string): string {
  return text.toLowerCase().trim();
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

function findMatches(text: string, phrases: readonly string[]): string[] {
  const normalized = normalizeText(text);
  return phrases.filter(phrase => normalized.includes(phrase));
}

/**
 * Short, direct factual question
 */
export function isSimpleQuery(text: string): boolean {
  if (countWords(text) > SIMPLE_MAX_WORDS) {
    return false;
  }
  return findMatches(text, SIMPLE_PATTERNS).length > 0;
}

/**
 * Needs explanation or multi-step reasoning. No length gate.
 */
export function isComplexQuery(text: string): boolean {
  return findMatches(text, COMPLEX_INDICATORS).length > 0;
}

export function isTechnicalQuery(text: string): boolean {
  return findMatches(text, TECHNICAL_KEYWORDS).length > 0;
}

export function isCreativeQuery(text: string): boolean {
  return findMatches(text, CREATIVE_KEYWORDS).length > 0;
}

/**
 * Label a query. Checks run in routing priority order and the first match wins.
 */
export function classify(text: string): ClassificationLabel {
  return explainClassification(text).label;
}

/**
 * Same as classify(), plus the phrases that decided the label.
 */
export function explainClassification(text: string): ClassificationResult {
  if (isSimpleQuery(text)) {
    return { label: 'simple', matchedPatterns: findMatches(text, SIMPLE_PATTERNS) };
  }

  const checks: Array<{ label: ClassificationLabel; phrases: readonly string[] }> = [
    { label: 'complex', phrases: COMPLEX_INDICATORS },
    { label: 'technical', phrases: TECHNICAL_KEYWORDS },
    { label: 'creative', phrases: CREATIVE_KEYWORDS },
  ];

  for (const { label, phrases } of checks) {
    const matchedPatterns = findMatches(text, phrases);
    if (matchedPatterns.length > 0) {
      return { label, matchedPatterns };
    }
  }

  return { label: 'general', matchedPatterns: [] };
}
