/**
 * AnswerResolver: finds an answer for every extracted question.
 *
 * Tiers, cheapest first; a question leaves the cascade at its first hit:
 *   1. exact           learned_questions key (case-insensitive)
 *   2. fuzzy           similar learned question (FuzzyMatcher)
 *   3. keyword_pattern question starts with a known personal_info keyword
 *   4. ai              one batched call for everything still unresolved
 *
 * AI answers are also staged in the PageSession for review; nothing is
 * written to the store here.
 */

import type { AiCollaborator, BatchPromptReply } from '../adapters/types.js';
import { AI_BATCH_TIMEOUT_MS, FUZZY_MATCH_THRESHOLD } from '../config/timing.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { numberQuestions, parseBatchResponse } from './batchResponseParser.js';
import { findSimilar } from './FuzzyMatcher.js';
import type { LearnedStore } from './LearnedStore.js';
import type { PageSession } from './PageSession.js';
import type { AnswerCandidate, Question } from './types.js';

// ── Keyword table ─────────────────────────────────────────────────────
// personal_info key -> question openings that ask for it

export const KEYWORD_PATTERNS: Readonly<Record<string, readonly string[]>> = {
  full_name: ['full name', 'complete name', 'your name'],
  first_name: ['first name', 'given name'],
  last_name: ['last name', 'surname', 'family name'],
  email: ['email address', 'email', 'e-mail'],
  phone: ['phone number', 'mobile number', 'contact number'],
  address: ['address', 'street address'],
  city: ['city', 'town'],
  state: ['state', 'province'],
  country: ['country', 'nation'],
  zip_code: ['zip code', 'postal code', 'pin code'],
};

export type ResolvedAnswers = Map<string, AnswerCandidate>;

export interface AnswerResolverOptions {
  store: LearnedStore;
  /** Omit to resolve from the store and profile only. */
  ai?: AiCollaborator | null;
  aiTimeoutMs?: number;
  fuzzyThreshold?: number;
  logger?: Logger;
}

class AiTimeoutError extends Error {
  constructor(ms: number) {
    super(`AI batch call exceeded ${ms}ms`);
    this.name = 'AiTimeoutError';
  }
}

function profileValue(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() ? value.trim() : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function matchKeywordPattern(
  question: string,
  personalInfo: Readonly<Record<string, unknown>>,
): string | null {
  const q = question.toLowerCase();
  for (const [key, keywords] of Object.entries(KEYWORD_PATTERNS)) {
    if (keywords.some((kw) => q === kw || q.startsWith(kw))) {
      const value = profileValue(personalInfo[key]);
      if (value) return value;
    }
  }
  return null;
}

// ── AnswerResolver ────────────────────────────────────────────────────

export class AnswerResolver {
  private store: LearnedStore;
  private ai: AiCollaborator | null;
  private aiTimeoutMs: number;
  private fuzzyThreshold: number;
  private logger: Logger;

  constructor(opts: AnswerResolverOptions) {
    this.store = opts.store;
    this.ai = opts.ai ?? null;
    this.aiTimeoutMs = opts.aiTimeoutMs ?? AI_BATCH_TIMEOUT_MS;
    this.fuzzyThreshold = opts.fuzzyThreshold ?? FUZZY_MATCH_THRESHOLD;
    this.logger = opts.logger ?? getLogger().child({ component: 'AnswerResolver' });
  }

  async resolve(questions: readonly Question[], session: PageSession): Promise<ResolvedAnswers> {
    const answers: ResolvedAnswers = new Map();
    const unresolved: string[] = [];

    for (const { text } of questions) {
      if (answers.has(text) || unresolved.includes(text)) continue;

      const local = this.resolveLocally(text);
      if (local) {
        answers.set(text, local);
        this.logger.debug('Question resolved locally', { question: text, source: local.source });
      } else {
        unresolved.push(text);
      }
    }

    if (unresolved.length > 0) {
      for (const [question, candidate] of await this.askAi(unresolved)) {
        answers.set(question, candidate);
        session.aiFilled.set(question, candidate);
      }
    }

    this.logger.info('Answers resolved', {
      questions: questions.length,
      answered: answers.size,
      ai: session.aiFilled.size,
    });
    return answers;
  }

  /** Tiers 1-3. */
  resolveLocally(question: string): AnswerCandidate | null {
    const exact = this.store.lookupExact(question);
    if (exact !== undefined) return { value: exact, source: 'exact' };

    const similar = findSimilar(question, this.store.entries(), this.fuzzyThreshold);
    if (similar) return { value: similar.answer, source: 'fuzzy' };

    const keyword = matchKeywordPattern(question, this.store.personalInfo());
    if (keyword) return { value: keyword, source: 'keyword_pattern' };

    return null;
  }

  /** Tier 4: one batched request. Any failure means no AI answers. */
  private async askAi(questions: string[]): Promise<ResolvedAnswers> {
    const answers: ResolvedAnswers = new Map();
    if (!this.ai) {
      this.logger.info('No AI collaborator configured; leaving questions unanswered', { count: questions.length });
      return answers;
    }

    this.logger.info('Batch AI call', { count: questions.length });

    let reply: BatchPromptReply;
    try {
      reply = await this.withTimeout(this.ai.sendBatchPrompt(this.store.toJSON(), numberQuestions(questions)));
    } catch (err) {
      this.logger.warn('Batch AI call failed', { error: err });
      return answers;
    }

    let raw: string;
    if (typeof reply === 'string') {
      raw = reply;
    } else if (reply.success && typeof reply.response === 'string') {
      raw = reply.response;
    } else {
      this.logger.warn('Batch AI call unsuccessful', { error: reply.error ?? 'no response' });
      return answers;
    }

    for (const parsed of parseBatchResponse(raw, questions, this.logger)) {
      answers.set(parsed.question, parsed.candidate);
    }
    return answers;
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new AiTimeoutError(this.aiTimeoutMs)), this.aiTimeoutMs);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
