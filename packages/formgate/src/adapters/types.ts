import type { FieldHandle, FieldSet, PendingReviewItem } from '../engine/types.js';

/** Opaque reference to one question container on the current page. */
export interface ContainerHandle {
  readonly id: string;
}

/**
 * Abstraction over the live, user-editable form page.
 *
 * All page interactions in the pipeline go through this interface. Only
 * surface implementations may import a browser driver directly.
 */
export interface FormSurface {
  /** Question containers on the current page, in document order. */
  listQuestionContainers(): Promise<ContainerHandle[]>;

  /**
   * Raw question label. Implementations try a heading-role element, then a
   * title-class element, then the container's first line of text.
   */
  extractLabel(container: ContainerHandle): Promise<string>;

  extractFields(container: ContainerHandle): Promise<FieldSet>;

  /**
   * Current value of one field. Text, textarea: the value. Select: the
   * selected option text. Radio, checkbox: "true" when checked, else "false".
   */
  readFieldValue(field: FieldHandle): Promise<string>;

  /** Clear the field, then write `value`. */
  setFieldValue(field: FieldHandle, value: string): Promise<boolean>;

  /**
   * Radio/checkbox: click the option. Select: choose the option whose text
   * is `label`.
   */
  clickOption(field: FieldHandle, label: string): Promise<boolean>;

  /** Throws when the page state cannot be read at all. */
  currentPageUrl(): Promise<string>;
}

/** Reply shapes accepted from the text-generation service. */
export type BatchPromptReply = string | { success: boolean; response?: string; error?: string };

export interface AiCollaborator {
  /**
   * Answer every numbered question from the profile. The reply holds one
   * `Qn: <answer>` line per question, in order, with the sentinel token in
   * place of answers the profile cannot support.
   */
  sendBatchPrompt(profileJson: string, numberedQuestions: string[]): Promise<BatchPromptReply>;
}

export interface Reviewer {
  /** Resolves true when the user accepts the page's answers for learning. */
  presentForReview(aiItems: PendingReviewItem[], manualItems: PendingReviewItem[]): Promise<boolean>;
}
