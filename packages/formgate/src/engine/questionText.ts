/**
 * Question label normalization.
 *
 * `cleanQuestionText` produces the canonical key stored in the profile;
 * `questionKey` is its case-folded form used for lookups.
 */

export function cleanQuestionText(raw: string): string {
  return raw
    .replace(/\*/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[\s?:]+$/, '');
}

export function questionKey(raw: string): string {
  return cleanQuestionText(raw).toLowerCase();
}
