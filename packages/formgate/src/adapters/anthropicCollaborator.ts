/**
 * AiCollaborator backed by the Anthropic Messages API.
 *
 * The whole unresolved question list of a page goes out as one prompt; the
 * reply is returned as-is for batchResponseParser to pick apart.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AiCollaborator, BatchPromptReply } from './types.js';
import { NO_DATA_SENTINEL } from '../engine/batchResponseParser.js';
import { AI_BATCH_TIMEOUT_MS } from '../config/timing.js';
import { describeCause } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';

// ── Client seam ──────────────────────────────────────────────────────────

export interface CompletionRequest {
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

/** Minimal text-completion client; tests substitute their own. */
export interface CompletionClient {
  complete(prompt: string, request: CompletionRequest): Promise<string>;
}

export function createAnthropicClient(apiKey: string): CompletionClient {
  const client = new Anthropic({ apiKey });
  return {
    async complete(prompt, { model, maxTokens, timeoutMs }) {
      const response = await client.messages.create(
        {
          model,
          max_tokens: maxTokens,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: timeoutMs, maxRetries: 0 },
      );
      return response.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
    },
  };
}

// ── Prompt ───────────────────────────────────────────────────────────────

export function buildBatchPrompt(profileJson: string, numberedQuestions: readonly string[]): string {
  return `You help fill in web forms using only the facts in a person's saved profile.

PROFILE (JSON):
${profileJson}

QUESTIONS:
${numberedQuestions.join('\n')}

How to answer:
- Use only information present in the profile. Do not guess or invent values.
- When the profile has nothing for a question, answer with exactly: ${NO_DATA_SENTINEL}
- Keep answers short: the value itself, no explanation.
- Write one line per question, in the same order, formatted as "Q<number>: <answer>".

Example:
Q1: Springfield
Q2: ${NO_DATA_SENTINEL}

Answers:`;
}

// ── Collaborator ─────────────────────────────────────────────────────────

export interface AnthropicCollaboratorOptions {
  client: CompletionClient;
  model: string;
  timeoutMs?: number;
  maxTokens?: number;
  logger?: Logger;
}

export class AnthropicCollaborator implements AiCollaborator {
  private client: CompletionClient;
  private model: string;
  private timeoutMs: number;
  private maxTokens: number;
  private logger: Logger;

  constructor(opts: AnthropicCollaboratorOptions) {
    this.client = opts.client;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs ?? AI_BATCH_TIMEOUT_MS;
    this.maxTokens = opts.maxTokens ?? 1024;
    this.logger = opts.logger ?? getLogger().child({ component: 'AnthropicCollaborator' });
  }

  async sendBatchPrompt(profileJson: string, numberedQuestions: string[]): Promise<BatchPromptReply> {
    const prompt = buildBatchPrompt(profileJson, numberedQuestions);
    const started = Date.now();
    try {
      const response = await this.client.complete(prompt, {
        model: this.model,
        maxTokens: this.maxTokens,
        timeoutMs: this.timeoutMs,
      });
      this.logger.debug('Batch reply received', {
        questions: numberedQuestions.length,
        durationMs: Date.now() - started,
        replyLength: response.length,
      });
      return { success: true, response };
    } catch (err) {
      this.logger.warn('Batch request failed', { model: this.model, error: err });
      return { success: false, error: describeCause(err) };
    }
  }
}
