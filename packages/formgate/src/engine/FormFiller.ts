/**
 * FormFiller: writes resolved answers into page fields.
 *
 * One strategy per field kind, applied to the question's dominant kind
 * only. A field that fails is logged and counted; filling continues with
 * the next question.
 */

import type { FormSurface } from '../adapters/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { ResolvedAnswers } from './AnswerResolver.js';
import { dominantFieldKind, type FieldHandle, type Question } from './types.js';

export interface FillSummary {
  filled: number;
  failed: number;
  /** Questions with no resolved answer. */
  skipped: number;
}

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export class FormFiller {
  private logger: Logger;

  constructor(
    private surface: FormSurface,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger().child({ component: 'FormFiller' });
  }

  async fill(questions: readonly Question[], answers: ResolvedAnswers): Promise<FillSummary> {
    const summary: FillSummary = { filled: 0, failed: 0, skipped: 0 };

    for (const question of questions) {
      const candidate = answers.get(question.text);
      if (!candidate || !candidate.value) {
        summary.skipped++;
        continue;
      }

      let ok = false;
      try {
        ok = await this.fillQuestion(question, candidate.value);
      } catch (err) {
        this.logger.debug('Field fill threw', { question: question.text, error: err });
      }

      if (ok) {
        summary.filled++;
      } else {
        summary.failed++;
        this.logger.warn('Field not filled', { question: question.text, source: candidate.source });
      }
    }

    this.logger.info('Form filled', { ...summary });
    return summary;
  }

  private async fillQuestion(question: Question, value: string): Promise<boolean> {
    const { fields } = question;
    switch (dominantFieldKind(fields)) {
      case 'text':
        return this.surface.setFieldValue(fields.text[0], value);
      case 'textarea':
        return this.surface.setFieldValue(fields.textarea[0], value);
      case 'radio':
        return this.fillRadio(fields.radio, value);
      case 'checkbox':
        return this.fillCheckbox(fields.checkbox, value);
      case 'select':
        return this.fillSelect(fields.select[0], value);
      default:
        return false;
    }
  }

  private async fillRadio(radios: readonly FieldHandle[], value: string): Promise<boolean> {
    const target = radios.find((r) => containsIgnoreCase(r.label ?? '', value));
    if (!target) return false;
    return this.surface.clickOption(target, target.label ?? value);
  }

  private async fillCheckbox(checkboxes: readonly FieldHandle[], value: string): Promise<boolean> {
    const target = checkboxes.find((c) => containsIgnoreCase(c.label ?? '', value));
    if (!target) return false;
    if ((await this.surface.readFieldValue(target)) === 'true') return true;
    return this.surface.clickOption(target, target.label ?? value);
  }

  private async fillSelect(select: FieldHandle, value: string): Promise<boolean> {
    const option = (select.options ?? []).find((o) => containsIgnoreCase(o, value));
    if (option === undefined) return false;
    return this.surface.clickOption(select, option);
  }
}
