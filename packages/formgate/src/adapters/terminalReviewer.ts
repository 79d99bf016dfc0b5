import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import type { Reviewer } from './types.js';
import type { PendingReviewItem } from '../engine/types.js';

export interface TerminalReviewerOptions {
  input?: Readable;
  output?: Writable;
}

function formatItem(item: PendingReviewItem, n: number): string[] {
  const lines = [`  ${n}. ${item.question}`];
  if (item.original !== undefined) {
    lines.push(`     was: ${item.original || '(empty)'}`);
    lines.push(`     now: ${item.value}`);
  } else {
    lines.push(`     answer: ${item.value}  [${item.source}]`);
  }
  for (const issue of item.issues) lines.push(`     ! ${issue}`);
  return lines;
}

/** Plain-text summary of a page's pending answers. */
export function formatReview(aiItems: PendingReviewItem[], manualItems: PendingReviewItem[]): string {
  const lines: string[] = [];
  if (aiItems.length > 0) {
    lines.push(`AI-filled answers (${aiItems.length}):`);
    aiItems.forEach((item, i) => lines.push(...formatItem(item, i + 1)));
  }
  if (manualItems.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(`Your edits (${manualItems.length}):`);
    manualItems.forEach((item, i) => lines.push(...formatItem(item, i + 1)));
  }
  return lines.join('\n');
}

/** Asks on the terminal whether to save the page's answers. Anything but y/yes declines. */
export class TerminalReviewer implements Reviewer {
  private input: Readable;
  private output: Writable;

  constructor(opts: TerminalReviewerOptions = {}) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async presentForReview(aiItems: PendingReviewItem[], manualItems: PendingReviewItem[]): Promise<boolean> {
    this.output.write(`\n${formatReview(aiItems, manualItems)}\n\n`);

    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      const answer = await rl.question('Save these answers to your profile? [y/N] ');
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  }
}
