/**
 * AnswerValidator: stateless plausibility checks for a candidate answer.
 *
 * Rules are keyed off words in the question and are all evaluated; an
 * answer is valid only when no rule reports an issue.
 */

export interface ValidationResult {
  ok: boolean;
  issues: string[];
}

const EMAIL_RE = /^[^@]+@[^@]+\.[^@]+$/;
const MIN_PHONE_DIGITS = 10;

export function validateAnswer(question: string, answer: string): ValidationResult {
  const issues: string[] = [];
  const q = question.toLowerCase();

  if (answer.length < 2) {
    issues.push('Answer seems too short');
  }

  if (q.includes('name') && !q.includes('user')) {
    if (q.includes('full') || q.includes('complete')) {
      const words = answer.split(/\s+/).filter(Boolean);
      if (words.length < 2) {
        issues.push('Full name should have first and last name');
      }
    }
  }

  if (q.includes('email') || q.includes('e-mail')) {
    if (!EMAIL_RE.test(answer)) {
      issues.push('Email format appears invalid');
    }
  }

  if (q.includes('phone') || q.includes('mobile')) {
    const digits = answer.replace(/\D/g, '');
    if (digits.length < MIN_PHONE_DIGITS) {
      issues.push('Phone number seems too short');
    }
  }

  return { ok: issues.length === 0, issues };
}
