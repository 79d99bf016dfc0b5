import { describe, expect, test, vi } from 'vitest';
import {
  NO_DATA_SENTINEL,
  numberQuestions,
  parseBatchResponse,
} from '../../../src/engine/batchResponseParser.js';
import { Logger } from '../../../src/monitoring/logger.js';

const QUESTIONS = ['City', 'Zip code', 'Favourite colour'];

describe('numberQuestions', () => {
  test('prefixes 1-based positions', () => {
    expect(numberQuestions(['City', 'Full Name'])).toEqual(['1. City', '2. Full Name']);
  });
});

describe('parseBatchResponse', () => {
  test('maps Qn lines to questions and skips the sentinel', () => {
    const raw = `Q1: Springfield\nQ2: ${NO_DATA_SENTINEL}\nq3 : blue`;
    expect(parseBatchResponse(raw, QUESTIONS)).toEqual([
      { index: 0, question: 'City', candidate: { value: 'Springfield', source: 'ai' } },
      { index: 2, question: 'Favourite colour', candidate: { value: 'blue', source: 'ai' } },
    ]);
  });

  test('yields an answer only for the question the AI could answer', () => {
    const parsed = parseBatchResponse(`Q1: ${NO_DATA_SENTINEL}\nQ2: Jane Doe`, ['City', 'Full Name']);
    expect(parsed).toEqual([{ index: 1, question: 'Full Name', candidate: { value: 'Jane Doe', source: 'ai' } }]);
  });

  test('ignores preamble, blank answers and CRLF line endings', () => {
    const raw = 'Answers:\r\nQ1:\r\n  Q2: 49007  \r\n';
    expect(parseBatchResponse(raw, QUESTIONS)).toEqual([
      { index: 1, question: 'Zip code', candidate: { value: '49007', source: 'ai' } },
    ]);
  });

  test('treats an answer containing the sentinel as no answer', () => {
    expect(parseBatchResponse(`Q1: ${NO_DATA_SENTINEL} (not in profile)`, QUESTIONS)).toEqual([]);
  });

  test('ignores out-of-range indices', () => {
    expect(parseBatchResponse('Q0: zero\nQ4: four', QUESTIONS)).toEqual([]);
  });

  test('keeps the first answer for a repeated index', () => {
    const parsed = parseBatchResponse('Q1: Springfield\nQ1: Shelbyville', QUESTIONS);
    expect(parsed.map((p) => p.candidate.value)).toEqual(['Springfield']);
  });

  test('keeps colons inside the answer', () => {
    const parsed = parseBatchResponse('Q3: 09:30 slot', QUESTIONS);
    expect(parsed[0].candidate.value).toBe('09:30 slot');
  });

  test('warns when a non-empty reply has no answer lines', () => {
    const logger = new Logger({ level: 'error' });
    const warn = vi.spyOn(logger, 'warn');

    expect(parseBatchResponse('Sorry, I cannot help with that.', QUESTIONS, logger)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('Batch AI reply ignored');
  });

  test('does not warn on an empty reply', () => {
    const logger = new Logger({ level: 'error' });
    const warn = vi.spyOn(logger, 'warn');

    expect(parseBatchResponse('  ', QUESTIONS, logger)).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });
});
