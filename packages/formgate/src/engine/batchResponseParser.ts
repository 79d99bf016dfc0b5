/**
 * Parser for the single batched AI reply of a page.
 *
 * Expected shape, one line per question in order:
 *
 *   Q1: Springfield
 *   Q2: DATA_NOT_AVAILABLE
 *
 * Every deviation means "no answer" for the affected question; the parser
 * never throws.
 */

import { ResolutionParseError } from '../errors.js';
import type { Logger } from '../monitoring/logger.js';
import type { AnswerCandidate } from './types.js';

/** Returned verbatim by the AI when the profile has nothing for a question. */
export const NO_DATA_SENTINEL = 'DATA_NOT_AVAILABLE';

const ANSWER_LINE_RE = /^\s*Q(\d+)\s*:(.*)$/i;

export interface ParsedAnswer {
  /** 0-based position in the question list sent to the AI. */
  index: number;
  question: string;
  candidate: AnswerCandidate;
}

/** `["City", "Full Name"]` -> `["1. City", "2. Full Name"]` */
export function numberQuestions(questions: readonly string[]): string[] {
  return questions.map((q, i) => `${i + 1}. ${q}`);
}

export function parseBatchResponse(
  raw: string,
  questions: readonly string[],
  logger?: Logger,
): ParsedAnswer[] {
  const answers: ParsedAnswer[] = [];
  const seen = new Set<number>();
  let answerLines = 0;

  for (const line of raw.split(/\r?\n/)) {
    const match = ANSWER_LINE_RE.exec(line);
    if (!match) continue;
    answerLines++;

    const index = Number(match[1]) - 1;
    if (index < 0 || index >= questions.length || seen.has(index)) continue;
    seen.add(index);

    const value = match[2].trim();
    if (!value || value.includes(NO_DATA_SENTINEL)) {
      logger?.debug('AI has no data for question', { index: index + 1 });
      continue;
    }

    answers.push({
      index,
      question: questions[index],
      candidate: { value, source: 'ai' },
    });
  }

  if (answerLines === 0 && raw.trim().length > 0) {
    const err = new ResolutionParseError(raw, 'no "Qn:" lines found');
    logger?.warn('Batch AI reply ignored', { error: err.message, replyLength: raw.length });
  }

  return answers;
}
