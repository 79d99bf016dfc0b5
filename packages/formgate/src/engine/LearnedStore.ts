/**
 * LearnedStore: the profile document on disk and its learned_questions map.
 *
 * Only reviewed, validated answers are merged. Every persist first copies
 * the current file to a timestamped sibling backup (the newest
 * MAX_PROFILE_BACKUPS are kept), then writes the whole document to
 * `<file>.tmp` and renames it over the target, so the target is either the
 * old document or the new one, never a partial write.
 *
 * Backup naming: `user_data.json` -> `user_data_backup_20260118_093005.json`,
 * with `_1`, `_2`, ... appended when that second already has a backup.
 */

import * as fsp from 'node:fs/promises';
import path from 'node:path';
import { MAX_PROFILE_BACKUPS } from '../config/timing.js';
import { PersistenceIOError, ProfileLoadError, describeCause } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { validateAnswer } from './AnswerValidator.js';
import { cleanQuestionText, questionKey } from './questionText.js';
import {
  ProfileDocumentSchema,
  defaultProfileDocument,
  type AnswerSource,
  type ProfileDocument,
  type ProfilePreferences,
} from './types.js';

// ── Types ────────────────────────────────────────────────────────────────

/** The file-system calls the store makes; `node:fs/promises` satisfies it. */
export interface StoreFileSystem {
  readFile(file: string, encoding: 'utf8'): Promise<string>;
  writeFile(file: string, data: string, encoding: 'utf8'): Promise<void>;
  copyFile(src: string, dest: string): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
  readdir(dir: string): Promise<string[]>;
  stat(file: string): Promise<{ mtimeMs: number }>;
  unlink(file: string): Promise<void>;
  rm(file: string, options: { force: boolean }): Promise<void>;
}

export interface LearnedStoreOptions {
  maxBackups?: number;
  fs?: StoreFileSystem;
  /** Clock used for backup timestamps. */
  now?: () => Date;
}

export interface MergeItem {
  question: string;
  value: string;
  source?: AnswerSource;
}

export interface MergeResult {
  saved: Array<{ question: string; source?: AnswerSource }>;
  skipped: Array<{ question: string; reason: string }>;
}

export interface PersistResult {
  backupPath: string | null;
  prunedBackups: string[];
}

// ── Helpers ──────────────────────────────────────────────────────────────

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function backupPrefix(filePath: string): string {
  return path.basename(filePath).replace(/\.json$/i, '') + '_backup_';
}

export function backupPathFor(filePath: string, date: Date, sequence = 0): string {
  const suffix = sequence > 0 ? `_${sequence}` : '';
  return path.join(path.dirname(filePath), `${backupPrefix(filePath)}${formatBackupTimestamp(date)}${suffix}.json`);
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

// ── Implementation ──────────────────────────────────────────────────────

export class LearnedStore {
  private doc: ProfileDocument;
  /** questionKey -> key as stored in learned_questions */
  private index = new Map<string, string>();
  /** Merged answers not yet written by a successful persist. */
  private dirty = false;
  private readonly fs: StoreFileSystem;
  private readonly maxBackups: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    document: ProfileDocument,
    opts: LearnedStoreOptions = {},
  ) {
    this.doc = document;
    this.fs = opts.fs ?? fsp;
    this.maxBackups = opts.maxBackups ?? MAX_PROFILE_BACKUPS;
    this.now = opts.now ?? (() => new Date());
    this.logger = getLogger().child({ component: 'LearnedStore' });
    this.rebuildIndex();
  }

  /**
   * Load the profile document at `filePath`. A missing file is created with
   * the default document; an unreadable or invalid one is an error.
   */
  static async open(filePath: string, opts: LearnedStoreOptions = {}): Promise<LearnedStore> {
    const fs = opts.fs ?? fsp;

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (!isNotFound(err)) {
        throw new ProfileLoadError(filePath, describeCause(err), err);
      }
      const store = new LearnedStore(filePath, defaultProfileDocument(), opts);
      await store.persist();
      return store;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ProfileLoadError(filePath, 'not valid JSON', err);
    }

    const parsed = ProfileDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first.path.length > 0 ? first.path.join('.') : 'document';
      throw new ProfileLoadError(filePath, `${where}: ${first.message}`, parsed.error);
    }
    return new LearnedStore(filePath, parsed.data, opts);
  }

  // ── Reads ──────────────────────────────────────────────────────────────

  get document(): Readonly<ProfileDocument> {
    return this.doc;
  }

  get preferences(): ProfilePreferences {
    return this.doc.preferences;
  }

  get size(): number {
    return Object.keys(this.doc.learned_questions).length;
  }

  personalInfo(): Readonly<Record<string, unknown>> {
    return this.doc.personal_info;
  }

  /** Case-insensitive lookup by cleaned question text. */
  lookupExact(question: string): string | undefined {
    const stored = this.index.get(questionKey(question));
    return stored === undefined ? undefined : this.doc.learned_questions[stored];
  }

  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  entries(): Array<[string, string]> {
    return Object.entries(this.doc.learned_questions);
  }

  toJSON(): string {
    return JSON.stringify(this.doc, null, 2);
  }

  // ── Writes ─────────────────────────────────────────────────────────────

  /**
   * Merge reviewed answers into memory. Items are validated again here and
   * skipped when blank or invalid. Keys are re-cleaned; a key differing
   * from an existing one only by case overwrites that entry.
   */
  merge(items: readonly MergeItem[]): MergeResult {
    const result: MergeResult = { saved: [], skipped: [] };

    for (const item of items) {
      const question = cleanQuestionText(item.question);
      if (!question) {
        result.skipped.push({ question: item.question, reason: 'empty question text' });
        continue;
      }
      if (!item.value.trim()) {
        result.skipped.push({ question, reason: 'empty answer' });
        continue;
      }

      const { ok, issues } = validateAnswer(question, item.value);
      if (!ok) {
        result.skipped.push({ question, reason: issues.join(', ') });
        continue;
      }

      const key = this.index.get(question.toLowerCase()) ?? question;
      this.doc.learned_questions[key] = item.value;
      this.index.set(question.toLowerCase(), key);
      result.saved.push({ question: key, source: item.source });
    }

    for (const skip of result.skipped) {
      this.logger.warn('Skipped learned answer', skip);
    }
    if (result.saved.length > 0) {
      this.dirty = true;
      this.logger.info('Merged learned answers', { saved: result.saved.length, skipped: result.skipped.length });
    }
    return result;
  }

  /**
   * Write the document to disk. On failure the target file is untouched and
   * a PersistenceIOError is thrown; the in-memory state is kept.
   */
  async persist(): Promise<PersistResult> {
    const tempPath = `${this.filePath}.tmp`;
    let backupPath: string | null = null;

    if (await this.exists(this.filePath)) {
      backupPath = await this.nextBackupPath();
      try {
        await this.fs.copyFile(this.filePath, backupPath);
      } catch (err) {
        throw new PersistenceIOError(this.filePath, 'backup', err);
      }
      this.logger.debug('Profile backup created', { backupPath });
    }

    const prunedBackups = await this.pruneBackups();

    let step: 'write' | 'rename' = 'write';
    try {
      await this.fs.writeFile(tempPath, this.toJSON(), 'utf8');
      step = 'rename';
      await this.fs.rename(tempPath, this.filePath);
    } catch (err) {
      await this.removeTemp(tempPath);
      throw new PersistenceIOError(this.filePath, step, err);
    }

    this.dirty = false;
    this.logger.info('Profile saved', { filePath: this.filePath, learned: this.size });
    return { backupPath, prunedBackups };
  }

  /** Backup files of this document, newest first. */
  async listBackups(): Promise<string[]> {
    const dir = path.dirname(this.filePath);
    const prefix = backupPrefix(this.filePath);
    const names = (await this.fs.readdir(dir)).filter((n) => n.startsWith(prefix) && n.endsWith('.json'));

    const stamped = await Promise.all(
      names.map(async (name) => {
        const full = path.join(dir, name);
        const { mtimeMs } = await this.fs.stat(full);
        return { full, name, mtimeMs };
      }),
    );
    stamped.sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));
    return stamped.map((b) => b.full);
  }

  // ── Internal helpers ──────────────────────────────────────────────────

  private async nextBackupPath(): Promise<string> {
    const date = this.now();
    for (let sequence = 0; ; sequence++) {
      const candidate = backupPathFor(this.filePath, date, sequence);
      if (!(await this.exists(candidate))) return candidate;
    }
  }

  private async pruneBackups(): Promise<string[]> {
    const removed: string[] = [];
    try {
      const backups = await this.listBackups();
      for (const old of backups.slice(this.maxBackups)) {
        await this.fs.unlink(old);
        removed.push(old);
      }
    } catch (err) {
      this.logger.warn('Backup pruning failed', { error: err });
    }
    if (removed.length > 0) {
      this.logger.debug('Old backups removed', { count: removed.length });
    }
    return removed;
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await this.fs.rm(tempPath, { force: true });
    } catch (err) {
      this.logger.warn('Temp file cleanup failed', { tempPath, error: err });
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await this.fs.stat(file);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new PersistenceIOError(file, 'backup', err);
    }
  }

  private rebuildIndex(): void {
    this.index.clear();
    for (const key of Object.keys(this.doc.learned_questions)) {
      const lower = questionKey(key);
      if (!this.index.has(lower)) this.index.set(lower, key);
    }
  }
}
