export * from './types.js';
export { cleanQuestionText, questionKey } from './questionText.js';
export { validateAnswer, type ValidationResult } from './AnswerValidator.js';
export { findSimilar, isSimilarQuestion, similarity, tokenize } from './FuzzyMatcher.js';
export { NO_DATA_SENTINEL, numberQuestions, parseBatchResponse, type ParsedAnswer } from './batchResponseParser.js';
export { PageSession } from './PageSession.js';
export { extractQuestions } from './FieldExtractor.js';
export {
  LearnedStore,
  backupPathFor,
  formatBackupTimestamp,
  type LearnedStoreOptions,
  type MergeItem,
  type MergeResult,
  type PersistResult,
  type StoreFileSystem,
} from './LearnedStore.js';
export {
  AnswerResolver,
  KEYWORD_PATTERNS,
  matchKeywordPattern,
  type AnswerResolverOptions,
  type ResolvedAnswers,
} from './AnswerResolver.js';
export { FormFiller, type FillSummary } from './FormFiller.js';
export { ChangeMonitor, readQuestionValue, type ChangeMonitorOptions } from './ChangeMonitor.js';
export { ReviewGate, buildReviewItems, type ReviewOutcome } from './ReviewGate.js';
export {
  PageOrchestrator,
  type OrchestratorEvents,
  type OrchestratorState,
  type PageOrchestratorOptions,
  type PageReport,
  type RunSummary,
} from './PageOrchestrator.js';
