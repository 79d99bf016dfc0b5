import type { Reviewer } from '../adapters/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { validateAnswer } from './AnswerValidator.js';
import type { PageSession } from './PageSession.js';
import type { PendingReviewItem } from './types.js';

export type ReviewOutcome =
  | { accepted: true; items: PendingReviewItem[] }
  | { accepted: false; reason: 'declined' | 'empty' | 'reviewer_error' };

/** AI answers first, then manual edits, each annotated with validation issues. */
export function buildReviewItems(session: PageSession): { ai: PendingReviewItem[]; manual: PendingReviewItem[] } {
  const ai: PendingReviewItem[] = [];
  for (const [question, candidate] of session.aiFilled) {
    const { ok, issues } = validateAnswer(question, candidate.value);
    ai.push({ question, value: candidate.value, source: candidate.source, valid: ok, issues });
  }

  const manual: PendingReviewItem[] = [];
  for (const [question, change] of session.manualChanges) {
    const { ok, issues } = validateAnswer(question, change.new);
    manual.push({
      question,
      value: change.new,
      source: 'manual',
      valid: ok,
      issues,
      original: change.original,
      fieldType: change.fieldType,
    });
  }

  return { ai, manual };
}

/**
 * ReviewGate: the user's accept/decline decision on a page's AI answers
 * and manual edits. Only an accepted page reaches LearnedStore.
 */
export class ReviewGate {
  private logger: Logger;

  constructor(
    private reviewer: Reviewer,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger().child({ component: 'ReviewGate' });
  }

  async review(session: PageSession): Promise<ReviewOutcome> {
    const { ai, manual } = buildReviewItems(session);
    if (ai.length === 0 && manual.length === 0) {
      this.logger.info('Nothing to review on this page', { pageUrl: session.pageUrl });
      return { accepted: false, reason: 'empty' };
    }

    const invalid = [...ai, ...manual].filter((item) => !item.valid).length;
    this.logger.info('Presenting page for review', { ai: ai.length, manual: manual.length, invalid });

    let accepted: boolean;
    try {
      accepted = await this.reviewer.presentForReview(ai, manual);
    } catch (err) {
      this.logger.error('Reviewer failed; treating page as declined', { error: err });
      return { accepted: false, reason: 'reviewer_error' };
    }

    if (!accepted) {
      this.logger.info('Page declined by reviewer');
      return { accepted: false, reason: 'declined' };
    }
    // A manual edit of an AI-filled question supersedes the AI answer.
    const edited = new Set(manual.map((item) => item.question));
    return { accepted: true, items: [...ai.filter((item) => !edited.has(item.question)), ...manual] };
  }
}
