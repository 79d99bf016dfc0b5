import type { AnswerCandidate, ManualChange, Question } from './types.js';

/**
 * Transient state of one form page. Owned by PageOrchestrator; a fresh
 * session is created for every page and cleared after review, whatever
 * the outcome.
 *
 * Writers: AnswerResolver -> aiFilled. ChangeMonitor -> manualChanges,
 * initialValues, stabilityCounters.
 */
export class PageSession {
  readonly aiFilled = new Map<string, AnswerCandidate>();
  readonly manualChanges = new Map<string, ManualChange>();
  readonly initialValues = new Map<string, string>();
  readonly stabilityCounters = new Map<string, number>();

  constructor(
    readonly pageUrl: string,
    readonly questions: readonly Question[],
  ) {}

  get pendingCount(): number {
    return this.aiFilled.size + this.manualChanges.size;
  }

  clear(): void {
    this.aiFilled.clear();
    this.manualChanges.clear();
    this.initialValues.clear();
    this.stabilityCounters.clear();
  }
}
