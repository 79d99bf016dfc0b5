export type { AiCollaborator, BatchPromptReply, ContainerHandle, FormSurface, Reviewer } from './types.js';
export {
  MemoryFormSurface,
  ScriptedAiCollaborator,
  ScriptedReviewer,
  type MemoryFieldSpec,
  type MemoryPage,
  type MemoryQuestionSpec,
  type ScriptedReply,
} from './memory.js';
export { GOOGLE_FORMS_URL_PATTERN, PlaywrightFormSurface } from './playwrightSurface.js';
export {
  AnthropicCollaborator,
  buildBatchPrompt,
  createAnthropicClient,
  type AnthropicCollaboratorOptions,
  type CompletionClient,
  type CompletionRequest,
} from './anthropicCollaborator.js';
export { TerminalReviewer, formatReview, type TerminalReviewerOptions } from './terminalReviewer.js';
