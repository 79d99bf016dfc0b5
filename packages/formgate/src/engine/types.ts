/**
 * Core types for the form-fill pipeline.
 *
 * Question, FieldSet and AnswerCandidate flow through the per-page gates;
 * ProfileDocument is the persisted JSON that LearnedStore owns on disk.
 */

import { z } from 'zod';

// ── Fields ───────────────────────────────────────────────────────────────
// Resolution and filling consult field kinds in this order; a question is
// assumed to expose one dominant kind.

export const FIELD_KIND_PRIORITY = ['text', 'textarea', 'radio', 'checkbox', 'select'] as const;

export type FieldKind = (typeof FIELD_KIND_PRIORITY)[number];

/**
 * Opaque reference to one input element. Surfaces map `id` back to their
 * own element objects; the pipeline only reads `label` and `options`.
 */
export interface FieldHandle {
  readonly id: string;
  readonly kind: FieldKind;
  /** Visible label of a single radio/checkbox option. */
  readonly label?: string;
  /** Visible option texts of a select. */
  readonly options?: readonly string[];
}

export type FieldSet = Record<FieldKind, FieldHandle[]>;

export function emptyFieldSet(): FieldSet {
  return { text: [], textarea: [], radio: [], checkbox: [], select: [] };
}

/** First populated field kind in priority order, or null when the set is empty. */
export function dominantFieldKind(fields: FieldSet): FieldKind | null {
  for (const kind of FIELD_KIND_PRIORITY) {
    if (fields[kind].length > 0) return kind;
  }
  return null;
}

// ── Questions & answers ──────────────────────────────────────────────────

export interface Question {
  /** Cleaned label text; the canonical key for every per-page map. */
  text: string;
  fields: FieldSet;
  sourcePageUrl: string;
}

export const AnswerSourceSchema = z.enum(['exact', 'fuzzy', 'keyword_pattern', 'ai', 'manual']);
export type AnswerSource = z.infer<typeof AnswerSourceSchema>;

export interface AnswerCandidate {
  value: string;
  source: AnswerSource;
}

export interface ManualChange {
  original: string;
  new: string;
  fieldType: FieldKind | 'unknown';
}

export interface PendingReviewItem {
  question: string;
  value: string;
  source: AnswerSource;
  valid: boolean;
  issues: string[];
  /** Manual items only: value observed when the page was filled. */
  original?: string;
  fieldType?: FieldKind | 'unknown';
}

// ── ProfileDocument ──────────────────────────────────────────────────────
// Sections other than learned_questions belong to other tools; unknown keys
// pass through so a write never drops them.

export const ProfilePreferencesSchema = z
  .object({
    auto_fill_enabled: z.boolean().default(true),
    learn_new_questions: z.boolean().default(true),
  })
  .passthrough();

export type ProfilePreferences = z.infer<typeof ProfilePreferencesSchema>;

const SectionSchema = z.record(z.string(), z.unknown());

export const ProfileDocumentSchema = z
  .object({
    personal_info: SectionSchema.default({}),
    education: SectionSchema.default({}),
    professional: SectionSchema.default({}),
    learned_questions: z.record(z.string(), z.string()).default({}),
    preferences: ProfilePreferencesSchema.default({}),
  })
  .passthrough();

export type ProfileDocument = z.infer<typeof ProfileDocumentSchema>;

export function defaultProfileDocument(): ProfileDocument {
  return {
    personal_info: {},
    education: {},
    professional: {},
    learned_questions: {},
    preferences: {
      auto_fill_enabled: true,
      learn_new_questions: true,
    },
  };
}
