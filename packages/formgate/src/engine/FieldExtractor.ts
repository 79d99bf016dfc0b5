/**
 * FieldExtractor: reads the current page's question containers into
 * Question records.
 *
 * Containers with no usable label or no input fields are skipped, as are
 * containers that fail to read. An empty result is not an error: the
 * orchestrator treats it as "nothing to do on this page".
 */

import type { ContainerHandle, FormSurface } from '../adapters/types.js';
import { getLogger } from '../monitoring/logger.js';
import { cleanQuestionText } from './questionText.js';
import { dominantFieldKind, type Question } from './types.js';

export async function extractQuestions(surface: FormSurface, pageUrl: string): Promise<Question[]> {
  const logger = getLogger().child({ component: 'FieldExtractor', pageUrl });

  let containers: ContainerHandle[];
  try {
    containers = await surface.listQuestionContainers();
  } catch (err) {
    logger.warn('Question containers could not be listed', { error: err });
    return [];
  }

  const questions: Question[] = [];
  for (const container of containers) {
    try {
      const text = cleanQuestionText(await surface.extractLabel(container));
      if (!text) continue;

      const fields = await surface.extractFields(container);
      if (dominantFieldKind(fields) === null) continue;

      questions.push({ text, fields, sourcePageUrl: pageUrl });
    } catch (err) {
      logger.debug('Skipping unreadable question container', { containerId: container.id, error: err });
    }
  }

  logger.info('Questions extracted', { containers: containers.length, questions: questions.length });
  return questions;
}
