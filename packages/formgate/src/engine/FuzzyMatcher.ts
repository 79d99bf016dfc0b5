/**
 * FuzzyMatcher: token-overlap similarity between two question labels.
 *
 * Score = shared tokens / size of the larger token set, after dropping
 * filler words. A pair that passes the score is still rejected when the
 * two questions name different people, places or times (see
 * KEY_INDICATORS): "mother's name" is never "father's name".
 */

import { FUZZY_MATCH_THRESHOLD } from '../config/timing.js';

// ── Word lists ────────────────────────────────────────────────────────

const STOP_WORDS = new Set(['what', 'is', 'your', 'the', 'a', 'an', 'are', 'you', 'my', 'enter']);

const KEY_INDICATORS = new Set([
  'mother',
  'father',
  'parent',
  'emergency',
  'current',
  'previous',
  'dream',
  'favorite',
  'home',
  'work',
  'school',
  'primary',
  'alternate',
]);

// ── Helpers ───────────────────────────────────────────────────────────

export function tokenize(text: string): Set<string> {
  const words = text.toLowerCase().split(/\s+/).filter(Boolean);
  return new Set(words.filter((w) => !STOP_WORDS.has(w)));
}

function keyIndicators(tokens: Set<string>): Set<string> {
  const found = new Set<string>();
  for (const token of tokens) {
    const base = token.replace(/'s$/, '');
    if (KEY_INDICATORS.has(base)) found.add(base);
  }
  return found;
}

function sameSet(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

// ── Scoring ───────────────────────────────────────────────────────────

export function similarity(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  let shared = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) shared++;
  }
  return shared / Math.max(tokensA.size, tokensB.size);
}

export function isSimilarQuestion(a: string, b: string, threshold = FUZZY_MATCH_THRESHOLD): boolean {
  if (similarity(a, b) < threshold) return false;

  const indicatorsA = keyIndicators(tokenize(a));
  const indicatorsB = keyIndicators(tokenize(b));
  if (indicatorsA.size > 0 || indicatorsB.size > 0) {
    return sameSet(indicatorsA, indicatorsB);
  }
  return true;
}

/**
 * First entry whose question is similar to `question`, in iteration order.
 */
export function findSimilar(
  question: string,
  entries: Iterable<readonly [string, string]>,
  threshold = FUZZY_MATCH_THRESHOLD,
): { question: string; answer: string } | null {
  for (const [cached, answer] of entries) {
    if (isSimilarQuestion(question, cached, threshold)) {
      return { question: cached, answer };
    }
  }
  return null;
}
