import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { MemoryFormSurface } from '../../../src/adapters/memory.js';
import { ChangeMonitor, readQuestionValue } from '../../../src/engine/ChangeMonitor.js';
import { extractQuestions } from '../../../src/engine/FieldExtractor.js';
import { PageSession } from '../../../src/engine/PageSession.js';
import { Logger } from '../../../src/monitoring/logger.js';
import type { Question } from '../../../src/engine/types.js';
import { PAGE_ONE } from '../../fixtures/forms.js';

// ── Helpers ─────────────────────────────────────────────────────────────

function page() {
  return new MemoryFormSurface([
    {
      url: PAGE_ONE,
      questions: [
        { label: 'City', fields: { text: [{ id: 'city', value: 'Springfield' }] } },
        { label: 'Email', fields: { text: [{ id: 'email' }] } },
        {
          label: 'Preferred contact',
          fields: {
            radio: [
              { id: 'contact-email', label: 'Email' },
              { id: 'contact-post', label: 'Post' },
            ],
          },
        },
        {
          label: 'Languages',
          fields: {
            checkbox: [
              { id: 'lang-en', label: 'English' },
              { id: 'lang-fr', label: 'French' },
            ],
          },
        },
        { label: 'Country', fields: { select: [{ id: 'country', options: ['Canada', 'Mexico'], value: 'Canada' }] } },
      ],
    },
  ]);
}

async function ticks(monitor: ChangeMonitor, n: number): Promise<void> {
  for (let i = 0; i < n; i++) await monitor.tick();
}

// ── Tests ────────────────────────────────────────────────────────────────

describe('readQuestionValue', () => {
  test('reads each field kind as the user sees it', async () => {
    const surface = page();
    const questions = await extractQuestions(surface, PAGE_ONE);
    surface.userCheck('contact-post', true);
    surface.userCheck('lang-en', true);
    surface.userCheck('lang-fr', true);

    const values = await Promise.all(questions.map((q) => readQuestionValue(surface, q)));
    expect(values).toEqual(['Springfield', '', 'Post', 'English, French', 'Canada']);
  });
});

describe('ChangeMonitor', () => {
  let surface: MemoryFormSurface;
  let questions: Question[];
  let session: PageSession;
  let logger: Logger;
  let monitor: ChangeMonitor;

  beforeEach(async () => {
    surface = page();
    questions = await extractQuestions(surface, PAGE_ONE);
    session = new PageSession(PAGE_ONE, questions);
    logger = new Logger({ level: 'error' });
    monitor = new ChangeMonitor(surface, session, { threshold: 3, logger });
    await monitor.snapshot();
  });

  afterEach(async () => {
    await monitor.stop();
  });

  test('snapshots initial values with zeroed counters', () => {
    expect(Object.fromEntries(session.initialValues)).toEqual({
      City: 'Springfield',
      Email: '',
      'Preferred contact': '',
      Languages: '',
      Country: 'Canada',
    });
    expect([...session.stabilityCounters.values()]).toEqual([0, 0, 0, 0, 0]);
  });

  test('records an edit only after it is stable for the threshold', async () => {
    surface.userType('city', 'Shelbyville');

    await ticks(monitor, 2);
    expect(session.manualChanges.size).toBe(0);
    expect(session.stabilityCounters.get('City')).toBe(2);

    await monitor.tick();
    expect(session.manualChanges.get('City')).toEqual({
      original: 'Springfield',
      new: 'Shelbyville',
      fieldType: 'text',
    });
  });

  test('restarts debouncing when the value keeps changing', async () => {
    surface.userType('city', 'Shel');
    await ticks(monitor, 2);
    surface.userType('city', 'Shelbyville');
    await monitor.tick();

    expect(session.stabilityCounters.get('City')).toBe(1);
    expect(session.manualChanges.size).toBe(0);

    await ticks(monitor, 2);
    expect(session.manualChanges.get('City')?.new).toBe('Shelbyville');
  });

  test('never records an edit reverted before it became stable', async () => {
    surface.userType('city', 'Shelbyville');
    await ticks(monitor, 2);
    surface.userType('city', 'Springfield');
    await ticks(monitor, 4);

    expect(session.manualChanges.size).toBe(0);
    expect(session.stabilityCounters.get('City')).toBe(0);
  });

  test('keeps the latest stable value', async () => {
    surface.userType('city', 'Shelbyville');
    await ticks(monitor, 3);
    surface.userType('city', 'Capital City');
    await ticks(monitor, 3);

    expect(session.manualChanges.get('City')).toEqual({
      original: 'Springfield',
      new: 'Capital City',
      fieldType: 'text',
    });
  });

  test('drops a recorded change when the user reverts it', async () => {
    surface.userType('city', 'Shelbyville');
    await ticks(monitor, 3);
    surface.userType('city', 'Springfield');
    await monitor.tick();

    expect(session.manualChanges.has('City')).toBe(false);
    expect(session.stabilityCounters.get('City')).toBe(0);
  });

  test('does not record an invalid edit and warns once per value', async () => {
    const warn = vi.spyOn(logger, 'warn');
    surface.userType('email', 'not-an-email');

    await ticks(monitor, 5);

    expect(session.manualChanges.has('Email')).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('Manual change failed validation');
  });

  test('records option edits with their field type', async () => {
    surface.userCheck('contact-post', true);
    surface.userCheck('lang-fr', true);
    surface.userType('country', 'Mexico');

    await ticks(monitor, 3);

    expect(Object.fromEntries(session.manualChanges)).toEqual({
      'Preferred contact': { original: '', new: 'Post', fieldType: 'radio' },
      Languages: { original: '', new: 'French', fieldType: 'checkbox' },
      Country: { original: 'Canada', new: 'Mexico', fieldType: 'select' },
    });
  });

  test('polls on its own until stopped', async () => {
    monitor = new ChangeMonitor(surface, session, { threshold: 2, intervalMs: 5, logger });
    await monitor.start();
    expect(monitor.isRunning).toBe(true);

    surface.userType('city', 'Shelbyville');
    await vi.waitFor(() => expect(session.manualChanges.get('City')?.new).toBe('Shelbyville'));

    await monitor.stop();
    expect(monitor.isRunning).toBe(false);

    surface.userType('city', 'Capital City');
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(session.manualChanges.get('City')?.new).toBe('Shelbyville');
  });
});
