import type { AiCollaborator, BatchPromptReply, ContainerHandle, FormSurface, Reviewer } from './types.js';
import {
  FIELD_KIND_PRIORITY,
  emptyFieldSet,
  type FieldHandle,
  type FieldKind,
  type FieldSet,
  type PendingReviewItem,
} from '../engine/types.js';

// ── In-memory form surface ────────────────────────────────────────────────

export interface MemoryFieldSpec {
  id: string;
  /** Radio/checkbox option label. */
  label?: string;
  /** Select option texts. */
  options?: string[];
  value?: string;
  checked?: boolean;
}

export interface MemoryQuestionSpec {
  label: string;
  fields: Partial<Record<FieldKind, MemoryFieldSpec[]>>;
  /** extractLabel/extractFields throw for this container. */
  unreadable?: boolean;
}

export interface MemoryPage {
  url: string;
  questions: MemoryQuestionSpec[];
}

interface MemoryField {
  handle: FieldHandle;
  group: string;
  value: string;
  checked: boolean;
}

/**
 * Form surface backed by plain objects, for tests and dry runs. Does NOT
 * touch a browser; user activity is simulated with userType/userCheck and
 * navigation with goTo.
 */
export class MemoryFormSurface implements FormSurface {
  private pages = new Map<string, MemoryPage>();
  private fields = new Map<string, MemoryField>();
  private url: string;
  private connected = true;
  private failingFields = new Set<string>();

  readonly setCalls: Array<{ id: string; value: string }> = [];
  readonly clickCalls: Array<{ id: string; label: string }> = [];

  constructor(pages: MemoryPage[], startUrl?: string) {
    for (const page of pages) {
      this.pages.set(page.url, page);
      page.questions.forEach((q, qi) => {
        for (const kind of FIELD_KIND_PRIORITY) {
          for (const def of q.fields[kind] ?? []) {
            this.fields.set(def.id, {
              handle: { id: def.id, kind, label: def.label, options: def.options },
              group: `${page.url}#${qi}`,
              value: def.value ?? '',
              checked: def.checked ?? false,
            });
          }
        }
      });
    }
    this.url = startUrl ?? pages[0]?.url ?? 'about:blank';
  }

  // ── Simulation controls ───────────────────────────────────────────────

  goTo(url: string): void {
    this.url = url;
  }

  disconnect(): void {
    this.connected = false;
  }

  failField(id: string): void {
    this.failingFields.add(id);
  }

  userType(id: string, value: string): void {
    this.field(id).value = value;
  }

  userCheck(id: string, checked: boolean): void {
    const field = this.field(id);
    if (checked && field.handle.kind === 'radio') this.uncheckGroup(field.group);
    field.checked = checked;
  }

  valueOf(id: string): string {
    const field = this.field(id);
    return field.handle.kind === 'radio' || field.handle.kind === 'checkbox' ? String(field.checked) : field.value;
  }

  // ── FormSurface ────────────────────────────────────────────────────────

  async listQuestionContainers(): Promise<ContainerHandle[]> {
    const page = this.pages.get(this.url);
    return page ? page.questions.map((_, i) => ({ id: `${this.url}#${i}` })) : [];
  }

  async extractLabel(container: ContainerHandle): Promise<string> {
    return this.question(container).label;
  }

  async extractFields(container: ContainerHandle): Promise<FieldSet> {
    const question = this.question(container);
    const set = emptyFieldSet();
    for (const kind of FIELD_KIND_PRIORITY) {
      for (const def of question.fields[kind] ?? []) {
        set[kind].push(this.field(def.id).handle);
      }
    }
    return set;
  }

  async readFieldValue(handle: FieldHandle): Promise<string> {
    return this.valueOf(handle.id);
  }

  async setFieldValue(handle: FieldHandle, value: string): Promise<boolean> {
    const field = this.usableField(handle);
    this.setCalls.push({ id: handle.id, value });
    if (field.handle.kind !== 'text' && field.handle.kind !== 'textarea') return false;
    field.value = value;
    return true;
  }

  async clickOption(handle: FieldHandle, label: string): Promise<boolean> {
    const field = this.usableField(handle);
    this.clickCalls.push({ id: handle.id, label });
    switch (field.handle.kind) {
      case 'radio':
        this.uncheckGroup(field.group);
        field.checked = true;
        return true;
      case 'checkbox':
        field.checked = !field.checked;
        return true;
      case 'select':
        if (!(field.handle.options ?? []).includes(label)) return false;
        field.value = label;
        return true;
      default:
        return false;
    }
  }

  async currentPageUrl(): Promise<string> {
    if (!this.connected) throw new Error('surface disconnected');
    return this.url;
  }

  // ── Internal helpers ──────────────────────────────────────────────────

  private question(container: ContainerHandle): MemoryQuestionSpec {
    const cut = container.id.lastIndexOf('#');
    const url = container.id.slice(0, cut);
    const question = this.pages.get(url)?.questions[Number(container.id.slice(cut + 1))];
    if (!question) throw new Error(`Unknown container ${container.id}`);
    if (question.unreadable) throw new Error(`Container ${container.id} is detached`);
    return question;
  }

  private field(id: string): MemoryField {
    const field = this.fields.get(id);
    if (!field) throw new Error(`Unknown field ${id}`);
    return field;
  }

  private usableField(handle: FieldHandle): MemoryField {
    if (this.failingFields.has(handle.id)) throw new Error(`Field ${handle.id} is not interactable`);
    return this.field(handle.id);
  }

  private uncheckGroup(group: string): void {
    for (const field of this.fields.values()) {
      if (field.group === group && field.handle.kind === 'radio') field.checked = false;
    }
  }
}

// ── Scripted collaborators ────────────────────────────────────────────────

export type ScriptedReply = BatchPromptReply | Error | ((numberedQuestions: string[]) => BatchPromptReply);

/** AI collaborator returning canned replies in order; the last one repeats. */
export class ScriptedAiCollaborator implements AiCollaborator {
  readonly calls: Array<{ profileJson: string; numberedQuestions: string[] }> = [];

  constructor(
    private replies: ScriptedReply[],
    private delayMs = 0,
  ) {}

  async sendBatchPrompt(profileJson: string, numberedQuestions: string[]): Promise<BatchPromptReply> {
    this.calls.push({ profileJson, numberedQuestions });
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));

    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)] ?? '';
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(numberedQuestions) : reply;
  }
}

/** Reviewer answering with a fixed decision and recording what it was shown. */
export class ScriptedReviewer implements Reviewer {
  readonly presented: Array<{ ai: PendingReviewItem[]; manual: PendingReviewItem[] }> = [];

  constructor(private decision: boolean | Error) {}

  async presentForReview(aiItems: PendingReviewItem[], manualItems: PendingReviewItem[]): Promise<boolean> {
    this.presented.push({ ai: aiItems, manual: manualItems });
    if (this.decision instanceof Error) throw this.decision;
    return this.decision;
  }
}
