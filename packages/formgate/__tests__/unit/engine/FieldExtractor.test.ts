import { describe, expect, test, vi } from 'vitest';
import { MemoryFormSurface } from '../../../src/adapters/memory.js';
import { extractQuestions } from '../../../src/engine/FieldExtractor.js';
import { dominantFieldKind } from '../../../src/engine/types.js';
import { PAGE_ONE, contactPage } from '../../fixtures/forms.js';

describe('extractQuestions', () => {
  test('returns cleaned labels with their fields, in page order', async () => {
    const surface = new MemoryFormSurface([contactPage()]);
    const questions = await extractQuestions(surface, PAGE_ONE);

    expect(questions.map((q) => q.text)).toEqual([
      'City',
      'Tell us about yourself',
      'Preferred contact',
      'Languages',
      'Country',
      'Anything else',
    ]);
    expect(questions.map((q) => dominantFieldKind(q.fields))).toEqual([
      'text',
      'textarea',
      'radio',
      'checkbox',
      'select',
      'text',
    ]);
    expect(questions.every((q) => q.sourcePageUrl === PAGE_ONE)).toBe(true);
    expect(questions[2].fields.radio.map((f) => f.label)).toEqual(['Email', 'Phone']);
  });

  test('skips blank labels, containers without fields and unreadable containers', async () => {
    const surface = new MemoryFormSurface([
      {
        url: PAGE_ONE,
        questions: [
          { label: ' * ', fields: { text: [{ id: 'blank' }] } },
          { label: 'Section: Contact details', fields: {} },
          { label: 'Email', fields: { text: [{ id: 'email' }] }, unreadable: true },
          { label: 'Zip code', fields: { text: [{ id: 'zip' }] } },
        ],
      },
    ]);

    const questions = await extractQuestions(surface, PAGE_ONE);
    expect(questions.map((q) => q.text)).toEqual(['Zip code']);
  });

  test('returns no questions for a page without containers', async () => {
    const surface = new MemoryFormSurface([contactPage()], 'https://forms.test/elsewhere');
    expect(await extractQuestions(surface, 'https://forms.test/elsewhere')).toEqual([]);
  });

  test('treats a failed container listing as an empty page', async () => {
    const surface = new MemoryFormSurface([contactPage()]);
    vi.spyOn(surface, 'listQuestionContainers').mockRejectedValue(new Error('execution context destroyed'));

    expect(await extractQuestions(surface, PAGE_ONE)).toEqual([]);
  });
});
