/**
 * PageOrchestrator: drives the per-page gates across a form session.
 *
 *   idle -> extracted -> resolved -> filled -> monitoring -> reviewing
 *        -> persisted -> next_page | done
 *
 * One PageSession per page. Filling is followed by a background
 * ChangeMonitor while the orchestrator polls the page URL; a URL change
 * means the user pressed Next/Submit. The monitor is then stopped, the page
 * reviewed, and accepted answers persisted. If the new page has questions
 * the cycle restarts there, otherwise the run is done.
 *
 * The only fatal condition is a surface that cannot report its URL.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { EventEmitter } from 'eventemitter3';
import type { AiCollaborator, FormSurface, Reviewer } from '../adapters/types.js';
import { NAVIGATION_POLL_INTERVAL_MS, PERSIST_RETRIES } from '../config/timing.js';
import { PersistenceIOError, SurfaceDisconnectedError, describeCause } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { AnswerResolver } from './AnswerResolver.js';
import { ChangeMonitor } from './ChangeMonitor.js';
import { extractQuestions } from './FieldExtractor.js';
import { FormFiller } from './FormFiller.js';
import type { LearnedStore } from './LearnedStore.js';
import { PageSession } from './PageSession.js';
import { ReviewGate, type ReviewOutcome } from './ReviewGate.js';
import type { PendingReviewItem, Question } from './types.js';

// ── Types ────────────────────────────────────────────────────────────────

export type OrchestratorState =
  | 'idle'
  | 'extracted'
  | 'resolved'
  | 'filled'
  | 'monitoring'
  | 'reviewing'
  | 'persisted'
  | 'next_page'
  | 'done';

export interface PageReport {
  pageUrl: string;
  questions: number;
  resolved: number;
  filled: number;
  review: 'accepted' | Exclude<ReviewOutcome, { accepted: true }>['reason'] | 'not_reached';
  saved: number;
  skipped: number;
  persisted: boolean;
}

export interface RunSummary {
  pagesProcessed: number;
  pagesPersisted: number;
  answersSaved: number;
  persistFailures: number;
  stoppedBy: 'complete' | 'stopped' | 'error';
  error?: string;
}

export interface OrchestratorEvents {
  state: (state: OrchestratorState, pageUrl: string | null) => void;
  page_complete: (report: PageReport) => void;
  done: (summary: RunSummary) => void;
}

export interface PageOrchestratorOptions {
  surface: FormSurface;
  store: LearnedStore;
  reviewer: Reviewer;
  ai?: AiCollaborator | null;
  /** Pages whose URL does not match are waited out in `idle`. Default: any URL. */
  formUrlPattern?: RegExp;
  navigationPollMs?: number;
  changePollMs?: number;
  stabilityThreshold?: number;
  aiTimeoutMs?: number;
  persistRetries?: number;
  logger?: Logger;
}

interface NavigationResult {
  report: PageReport;
  /** URL after navigation, or null when stopped first. */
  nextUrl: string | null;
}

// ── Implementation ──────────────────────────────────────────────────────

export class PageOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly surface: FormSurface;
  private readonly store: LearnedStore;
  private readonly resolver: AnswerResolver;
  private readonly filler: FormFiller;
  private readonly reviewGate: ReviewGate;
  private readonly opts: PageOrchestratorOptions;
  private readonly navigationPollMs: number;
  private readonly persistRetries: number;
  private readonly logger: Logger;

  private state: OrchestratorState = 'idle';
  private stopRequested = false;
  private activeMonitor: ChangeMonitor | null = null;

  constructor(opts: PageOrchestratorOptions) {
    super();
    this.opts = opts;
    this.surface = opts.surface;
    this.store = opts.store;
    this.logger = opts.logger ?? getLogger().child({ component: 'PageOrchestrator' });
    this.navigationPollMs = opts.navigationPollMs ?? NAVIGATION_POLL_INTERVAL_MS;
    this.persistRetries = opts.persistRetries ?? PERSIST_RETRIES;
    this.resolver = new AnswerResolver({ store: opts.store, ai: opts.ai, aiTimeoutMs: opts.aiTimeoutMs });
    this.filler = new FormFiller(opts.surface);
    this.reviewGate = new ReviewGate(opts.reviewer);
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  /** Ask the run loop to finish. Checked between gates and while polling. */
  stop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<RunSummary> {
    const summary: RunSummary = {
      pagesProcessed: 0,
      pagesPersisted: 0,
      answersSaved: 0,
      persistFailures: 0,
      stoppedBy: 'complete',
    };

    try {
      let pageUrl = await this.waitForForm();
      let questions: Question[] = pageUrl === null ? [] : await extractQuestions(this.surface, pageUrl);

      while (pageUrl !== null && !this.stopRequested) {
        if (questions.length === 0) {
          this.logger.info('No questions on page; form complete', { pageUrl });
          break;
        }

        const { report, nextUrl } = await this.processPage(new PageSession(pageUrl, questions));
        summary.pagesProcessed++;
        summary.answersSaved += report.saved;
        if (report.persisted) summary.pagesPersisted++;
        if (report.review === 'accepted' && report.saved > 0 && !report.persisted) summary.persistFailures++;
        this.emit('page_complete', report);

        if (nextUrl === null) break;
        pageUrl = nextUrl;

        // Give the next page a moment to render before probing it.
        await delay(this.navigationPollMs);
        questions = await extractQuestions(this.surface, pageUrl);
        if (questions.length > 0) {
          this.setState('next_page', pageUrl);
          this.logger.info('Next form page detected', { pageUrl, questions: questions.length });
        }
      }

      if (this.stopRequested) summary.stoppedBy = 'stopped';
    } catch (err) {
      summary.stoppedBy = 'error';
      summary.error = describeCause(err);
      if (err instanceof SurfaceDisconnectedError) {
        this.logger.error('Form surface lost; ending session', { error: err });
      } else {
        this.logger.error('Form session failed', { error: err });
      }
    } finally {
      if (this.activeMonitor) {
        await this.activeMonitor.stop();
        this.activeMonitor = null;
      }
    }

    this.setState('done', null);
    this.logger.info('Form session finished', { ...summary });
    this.emit('done', summary);
    return summary;
  }

  /** Gates extracted..persisted for one page. */
  async processPage(session: PageSession): Promise<NavigationResult> {
    const { pageUrl, questions } = session;
    const log = this.logger.child({ pageUrl });
    const report: PageReport = {
      pageUrl,
      questions: questions.length,
      resolved: 0,
      filled: 0,
      review: 'not_reached',
      saved: 0,
      skipped: 0,
      persisted: false,
    };
    this.setState('extracted', pageUrl);

    if (this.store.preferences.auto_fill_enabled) {
      const answers = await this.resolver.resolve(questions, session);
      report.resolved = answers.size;
      this.setState('resolved', pageUrl);

      const fill = await this.filler.fill(questions, answers);
      report.filled = fill.filled;
      this.setState('filled', pageUrl);
    } else {
      log.info('Auto-fill disabled in preferences; only watching manual edits');
    }

    const monitor = new ChangeMonitor(this.surface, session, {
      intervalMs: this.opts.changePollMs,
      threshold: this.opts.stabilityThreshold,
    });
    this.activeMonitor = monitor;
    await monitor.start();
    this.setState('monitoring', pageUrl);

    let nextUrl: string | null;
    try {
      nextUrl = await this.waitForNavigation(pageUrl);
    } finally {
      await monitor.stop();
      this.activeMonitor = null;
    }

    if (nextUrl === null) {
      log.info('Stopped before navigation; discarding page');
      session.clear();
      return { report, nextUrl };
    }

    this.setState('reviewing', pageUrl);
    const outcome = await this.reviewGate.review(session);

    if (outcome.accepted) {
      report.review = 'accepted';
      await this.learn(outcome.items, report, log);
      if (report.persisted) this.setState('persisted', pageUrl);
    } else {
      report.review = outcome.reason;
    }

    session.clear();
    return { report, nextUrl };
  }

  // ── Internal helpers ──────────────────────────────────────────────────

  private async learn(items: PendingReviewItem[], report: PageReport, log: Logger): Promise<void> {
    if (!this.store.preferences.learn_new_questions) {
      log.info('Learning disabled in preferences; nothing saved');
      return;
    }

    const merged = this.store.merge(items.map(({ question, value, source }) => ({ question, value, source })));
    report.saved = merged.saved.length;
    report.skipped = merged.skipped.length;
    if (!this.store.hasUnsavedChanges) {
      log.info('No new answers to save');
      return;
    }
    if (merged.saved.length === 0) {
      log.info('Retrying write of answers kept from an earlier page');
    }

    for (let attempt = 0; attempt <= this.persistRetries; attempt++) {
      try {
        await this.store.persist();
        report.persisted = true;
        return;
      } catch (err) {
        if (!(err instanceof PersistenceIOError)) throw err;
        log.warn('Persist attempt failed', { attempt: attempt + 1, step: err.step, error: err });
      }
    }
    log.error('Answers kept in memory only; profile file unchanged', { saved: merged.saved.length });
  }

  private async waitForForm(): Promise<string | null> {
    const pattern = this.opts.formUrlPattern;
    while (!this.stopRequested) {
      const url = await this.readUrl();
      if (!pattern || pattern.test(url)) {
        this.logger.info('Form detected', { pageUrl: url });
        return url;
      }
      await delay(this.navigationPollMs);
    }
    return null;
  }

  /** Poll until the URL differs from `pageUrl`. Null when stopped first. */
  private async waitForNavigation(pageUrl: string): Promise<string | null> {
    this.logger.debug('Waiting for Submit/Next', { pageUrl });
    while (!this.stopRequested) {
      await delay(this.navigationPollMs);
      const url = await this.readUrl();
      if (url !== pageUrl) {
        this.logger.info('Page navigation detected', { from: pageUrl, to: url });
        return url;
      }
    }
    return null;
  }

  private async readUrl(): Promise<string> {
    try {
      return await this.surface.currentPageUrl();
    } catch (err) {
      throw new SurfaceDisconnectedError(err);
    }
  }

  private setState(state: OrchestratorState, pageUrl: string | null): void {
    this.state = state;
    this.emit('state', state, pageUrl);
  }
}
