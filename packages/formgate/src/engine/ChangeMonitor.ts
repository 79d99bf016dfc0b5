/**
 * ChangeMonitor: background watcher for edits the user makes after the
 * page was filled.
 *
 * Polls every question on a fixed interval and compares against the value
 * snapshotted at start(). An edit is recorded in the session's
 * manualChanges only after the same new value has been seen on
 * STABILITY_THRESHOLD consecutive polls and passes AnswerValidator. A later
 * stable edit overwrites the earlier one; reverting to the snapshot value
 * drops the entry.
 *
 * Runs until stop(). stop() waits for an in-flight poll, so once it
 * resolves the session maps are no longer written.
 */

import type { FormSurface } from '../adapters/types.js';
import { CHANGE_POLL_INTERVAL_MS, STABILITY_THRESHOLD } from '../config/timing.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { validateAnswer } from './AnswerValidator.js';
import type { PageSession } from './PageSession.js';
import { dominantFieldKind, type Question } from './types.js';

export interface ChangeMonitorOptions {
  intervalMs?: number;
  threshold?: number;
  logger?: Logger;
}

/**
 * The value a question currently shows. Radio: label of the checked option.
 * Checkbox: labels of checked options joined by ", ".
 */
export async function readQuestionValue(surface: FormSurface, question: Question): Promise<string> {
  const { fields } = question;
  switch (dominantFieldKind(fields)) {
    case 'text':
      return surface.readFieldValue(fields.text[0]);
    case 'textarea':
      return surface.readFieldValue(fields.textarea[0]);
    case 'select':
      return surface.readFieldValue(fields.select[0]);
    case 'radio': {
      for (const radio of fields.radio) {
        if ((await surface.readFieldValue(radio)) === 'true') return radio.label ?? '';
      }
      return '';
    }
    case 'checkbox': {
      const checked: string[] = [];
      for (const box of fields.checkbox) {
        if ((await surface.readFieldValue(box)) === 'true') checked.push(box.label ?? '');
      }
      return checked.join(', ');
    }
    default:
      return '';
  }
}

export class ChangeMonitor {
  private readonly intervalMs: number;
  private readonly threshold: number;
  private readonly logger: Logger;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  /** Value seen on the previous poll, per question. */
  private lastObserved = new Map<string, string>();
  /** Last value that failed validation, so it is logged once. */
  private rejected = new Map<string, string>();

  constructor(
    private surface: FormSurface,
    private session: PageSession,
    opts: ChangeMonitorOptions = {},
  ) {
    this.intervalMs = opts.intervalMs ?? CHANGE_POLL_INTERVAL_MS;
    this.threshold = opts.threshold ?? STABILITY_THRESHOLD;
    this.logger = opts.logger ?? getLogger().child({ component: 'ChangeMonitor', pageUrl: session.pageUrl });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Snapshot current values, then begin polling. */
  async start(): Promise<void> {
    if (this.running) return;
    await this.snapshot();
    this.running = true;
    this.schedule();
    this.logger.debug('Change monitoring started', { questions: this.session.questions.length });
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
    this.logger.debug('Change monitoring stopped', { manualChanges: this.session.manualChanges.size });
  }

  /** Snapshot each question's value as its initial value. */
  async snapshot(): Promise<void> {
    for (const question of this.session.questions) {
      let value = '';
      try {
        value = await readQuestionValue(this.surface, question);
      } catch (err) {
        this.logger.debug('Initial value unreadable', { question: question.text, error: err });
      }
      this.session.initialValues.set(question.text, value);
      this.session.stabilityCounters.set(question.text, 0);
    }
  }

  /** One poll over every question. */
  async tick(): Promise<void> {
    for (const question of this.session.questions) {
      let current: string;
      try {
        current = await readQuestionValue(this.surface, question);
      } catch (err) {
        this.logger.debug('Value unreadable this poll', { question: question.text, error: err });
        continue;
      }
      this.observe(question, current);
    }
  }

  // ── Internal helpers ──────────────────────────────────────────────────

  private observe(question: Question, current: string): void {
    const key = question.text;
    const { initialValues, stabilityCounters, manualChanges } = this.session;
    const initial = initialValues.get(key) ?? '';

    if (current === initial) {
      stabilityCounters.set(key, 0);
      this.lastObserved.delete(key);
      if (manualChanges.delete(key)) {
        this.logger.debug('Manual change reverted', { question: key });
      }
      return;
    }

    const count = this.lastObserved.get(key) === current ? (stabilityCounters.get(key) ?? 0) + 1 : 1;
    stabilityCounters.set(key, count);
    this.lastObserved.set(key, current);
    if (count < this.threshold) return;

    const { ok, issues } = validateAnswer(key, current);
    if (ok) {
      const previous = manualChanges.get(key);
      manualChanges.set(key, {
        original: initial,
        new: current,
        fieldType: dominantFieldKind(question.fields) ?? 'unknown',
      });
      this.rejected.delete(key);
      if (previous?.new !== current) {
        this.logger.info('Manual change recorded', { question: key });
      }
    } else if (this.rejected.get(key) !== current) {
      this.rejected.set(key, current);
      this.logger.warn('Manual change failed validation', { question: key, issues });
    }
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick()
        .catch((err: unknown) => {
          this.logger.warn('Change poll failed', { error: err });
        })
        .finally(() => {
          this.inFlight = null;
          this.schedule();
        });
    }, this.intervalMs);
  }
}
