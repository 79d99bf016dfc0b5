import { mkdtemp, readFile, readdir, rm, utimes, writeFile } from 'node:fs/promises';
import * as fsp from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ProfileLoadError } from '../../../src/errors.js';
import {
  LearnedStore,
  backupPathFor,
  formatBackupTimestamp,
  type StoreFileSystem,
} from '../../../src/engine/LearnedStore.js';
import { defaultProfileDocument } from '../../../src/engine/types.js';
import { memoryStore, profile } from '../../fixtures/forms.js';

// ── Helpers ─────────────────────────────────────────────────────────────

const realFs: StoreFileSystem = fsp;

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await readFile(file, 'utf8'));
}

// ── Tests ────────────────────────────────────────────────────────────────

describe('backup naming', () => {
  test('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatBackupTimestamp(new Date(2026, 0, 18, 9, 30, 5))).toBe('20260118_093005');
  });

  test('places the backup beside the document', () => {
    expect(backupPathFor('/data/user_data.json', new Date(2026, 11, 1, 23, 4, 0))).toBe(
      '/data/user_data_backup_20261201_230400.json',
    );
  });
});

describe('LearnedStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'formgate-store-'));
    file = path.join(dir, 'user_data.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('open', () => {
    test('creates the default document when the file is missing', async () => {
      const store = await LearnedStore.open(file);

      expect(store.size).toBe(0);
      expect(await readJson(file)).toEqual(defaultProfileDocument());
      expect(await store.listBackups()).toEqual([]);
    });

    test('fills missing sections with defaults', async () => {
      await writeFile(file, JSON.stringify({ personal_info: { city: 'Springfield' } }));
      const store = await LearnedStore.open(file);

      expect(store.personalInfo()).toEqual({ city: 'Springfield' });
      expect(store.preferences).toEqual({ auto_fill_enabled: true, learn_new_questions: true });
    });

    test('rejects a file that is not JSON', async () => {
      await writeFile(file, '{ not json');
      await expect(LearnedStore.open(file)).rejects.toBeInstanceOf(ProfileLoadError);
    });

    test('rejects a document that fails validation and names the field', async () => {
      await writeFile(file, JSON.stringify({ learned_questions: { City: 42 } }));
      await expect(LearnedStore.open(file)).rejects.toThrow(/learned_questions\.City/);
    });

    test('wraps read errors other than a missing file', async () => {
      const fs: StoreFileSystem = {
        ...realFs,
        readFile: async () => {
          throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
        },
      };
      await expect(LearnedStore.open(file, { fs })).rejects.toMatchObject({
        code: 'profile_load_failed',
        filePath: file,
      });
    });
  });

  describe('merge', () => {
    test('stores cleaned keys and overwrites case-insensitively', () => {
      const store = memoryStore({ learned_questions: { 'Favourite Colour': 'Blue' } });

      const result = store.merge([
        { question: 'favourite colour?', value: 'Green', source: 'manual' },
        { question: 'Zip code *', value: '49007', source: 'ai' },
      ]);

      expect(result.saved).toEqual([
        { question: 'Favourite Colour', source: 'manual' },
        { question: 'Zip code', source: 'ai' },
      ]);
      expect(store.document.learned_questions).toEqual({ 'Favourite Colour': 'Green', 'Zip code': '49007' });
      expect(store.lookupExact('FAVOURITE COLOUR')).toBe('Green');
    });

    test('stores questions differing only by case under one key', () => {
      const store = memoryStore();
      store.merge([{ question: 'Full Name', value: 'Jane Doe' }]);
      store.merge([{ question: 'full name', value: 'Jane Q Doe' }]);

      expect(store.document.learned_questions).toEqual({ 'Full Name': 'Jane Q Doe' });
    });

    test('never stores an accepted answer that fails validation', () => {
      const store = memoryStore();
      const result = store.merge([{ question: 'Email Address *', value: 'not-an-email', source: 'manual' }]);

      expect(result.skipped).toEqual([{ question: 'Email Address', reason: 'Email format appears invalid' }]);
      expect(store.lookupExact('Email Address')).toBeUndefined();
    });

    test('skips blank questions, blank answers and invalid answers', () => {
      const store = memoryStore();

      const result = store.merge([
        { question: ' *? ', value: 'x y' },
        { question: 'City', value: '   ' },
        { question: 'Email', value: 'nope' },
      ]);

      expect(result.saved).toEqual([]);
      expect(result.skipped).toEqual([
        { question: ' *? ', reason: 'empty question text' },
        { question: 'City', reason: 'empty answer' },
        { question: 'Email', reason: 'Email format appears invalid' },
      ]);
      expect(store.size).toBe(0);
    });
  });

  describe('persist', () => {
    test('keeps unknown sections and backs up the previous file', async () => {
      const original = JSON.stringify({ personal_info: { city: 'Springfield' }, custom_section: { keep: true } });
      await writeFile(file, original);
      const store = await LearnedStore.open(file, { now: () => new Date(2026, 0, 18, 9, 30, 5) });

      store.merge([{ question: 'Favourite colour?', value: 'Blue' }]);
      const result = await store.persist();

      expect(result.backupPath).toBe(path.join(dir, 'user_data_backup_20260118_093005.json'));
      expect(await readFile(path.join(dir, 'user_data_backup_20260118_093005.json'), 'utf8')).toBe(original);
      expect(await readJson(file)).toEqual({
        ...profile({ personal_info: { city: 'Springfield' } }),
        custom_section: { keep: true },
        learned_questions: { 'Favourite colour': 'Blue' },
      });
      expect(await readdir(dir)).not.toContain('user_data.json.tmp');
    });

    test('gives a second backup in the same second its own name', async () => {
      const original = JSON.stringify(defaultProfileDocument());
      await writeFile(file, original);
      const store = await LearnedStore.open(file, { now: () => new Date(2026, 0, 1, 0, 0, 0) });

      store.merge([{ question: 'City', value: 'Springfield' }]);
      const first = await store.persist();
      const afterFirst = await readFile(file, 'utf8');
      store.merge([{ question: 'Country', value: 'Canada' }]);
      const second = await store.persist();

      expect(first.backupPath).toBe(path.join(dir, 'user_data_backup_20260101_000000.json'));
      expect(second.backupPath).toBe(path.join(dir, 'user_data_backup_20260101_000000_1.json'));
      expect((await readdir(dir)).filter((name) => name.includes('_backup_')).sort()).toEqual([
        'user_data_backup_20260101_000000.json',
        'user_data_backup_20260101_000000_1.json',
      ]);
      expect(await readFile(path.join(dir, 'user_data_backup_20260101_000000.json'), 'utf8')).toBe(original);
      expect(await readFile(path.join(dir, 'user_data_backup_20260101_000000_1.json'), 'utf8')).toBe(afterFirst);
    });

    test('reports unsaved answers until a persist succeeds', async () => {
      await writeFile(file, JSON.stringify(defaultProfileDocument()));
      const rename = vi
        .fn(realFs.rename)
        .mockRejectedValueOnce(Object.assign(new Error('resource busy'), { code: 'EBUSY' }));
      const store = await LearnedStore.open(file, { fs: { ...realFs, rename } });
      expect(store.hasUnsavedChanges).toBe(false);

      store.merge([{ question: 'City', value: 'Springfield' }]);
      expect(store.hasUnsavedChanges).toBe(true);
      await expect(store.persist()).rejects.toMatchObject({ step: 'rename' });
      expect(store.hasUnsavedChanges).toBe(true);

      store.merge([{ question: 'Email', value: 'nope' }]);
      await store.persist();

      expect(store.hasUnsavedChanges).toBe(false);
      expect(await readJson(file)).toMatchObject({ learned_questions: { City: 'Springfield' } });
    });

    test('keeps only the newest backups', async () => {
      await writeFile(file, JSON.stringify(defaultProfileDocument()));
      await writeFile(path.join(dir, 'other_backup_20200101_000000.json'), '{}');
      const old: string[] = [];
      for (let day = 1; day <= 7; day++) {
        const backup = path.join(dir, `user_data_backup_2020010${day}_000000.json`);
        await writeFile(backup, '{}');
        const stamp = new Date(2020, 0, day);
        await utimes(backup, stamp, stamp);
        old.push(backup);
      }

      const store = await LearnedStore.open(file, { maxBackups: 5 });
      const result = await store.persist();

      expect(result.prunedBackups).toEqual([old[2], old[1], old[0]]);
      const backups = await store.listBackups();
      expect(backups).toHaveLength(5);
      expect(backups.slice(1)).toEqual([old[6], old[5], old[4], old[3]]);
      expect(await readdir(dir)).toContain('other_backup_20200101_000000.json');
    });

    test('leaves the target untouched and keeps memory when the rename fails', async () => {
      const original = JSON.stringify(defaultProfileDocument());
      await writeFile(file, original);
      const rename = vi.fn(async () => {
        throw Object.assign(new Error('cross-device link'), { code: 'EXDEV' });
      });
      const store = await LearnedStore.open(file, { fs: { ...realFs, rename } });
      store.merge([{ question: 'City', value: 'Springfield' }]);

      await expect(store.persist()).rejects.toMatchObject({
        name: 'PersistenceIOError',
        code: 'persistence_io',
        step: 'rename',
      });
      expect(rename).toHaveBeenCalledTimes(1);
      expect(await readFile(file, 'utf8')).toBe(original);
      expect(await readdir(dir)).not.toContain('user_data.json.tmp');
      expect(store.lookupExact('City')).toBe('Springfield');
    });

    test('reports a failed backup copy as a backup step error', async () => {
      await writeFile(file, JSON.stringify(defaultProfileDocument()));
      const copyFile = async () => {
        throw new Error('disk full');
      };
      const store = await LearnedStore.open(file, { fs: { ...realFs, copyFile } });

      await expect(store.persist()).rejects.toMatchObject({ step: 'backup' });
    });
  });
});
