#!/usr/bin/env tsx
/**
 * Fill Form: attach to a running Chrome and assist with a multi-page form.
 *
 * Answers what it can from the profile document (learned answers, personal
 * info, then one AI call per page), watches your own edits, and asks before
 * saving anything back when you press Next/Submit.
 *
 * Prerequisites:
 *   1. Chrome started with remote debugging:
 *        google-chrome --remote-debugging-port=9222
 *   2. The form open in one of its tabs
 *   3. (optional) ANTHROPIC_API_KEY in the environment for AI answers
 *
 * Usage:
 *   npx tsx src/scripts/fill-form.ts
 *   npx tsx src/scripts/fill-form.ts --profile=./me.json --cdp-url=http://127.0.0.1:9333
 *
 * Flags:
 *   --profile=<path>        Profile document (default: FORMGATE_PROFILE_PATH or user_data.json)
 *   --cdp-url=<url>         Chrome DevTools endpoint (default: FORMGATE_CDP_URL)
 *   --url-pattern=<regex>   Only start on tabs whose URL matches (default: Google Forms)
 */

import { PlaywrightFormSurface, GOOGLE_FORMS_URL_PATTERN } from '../adapters/playwrightSurface.js';
import { AnthropicCollaborator, createAnthropicClient } from '../adapters/anthropicCollaborator.js';
import { TerminalReviewer } from '../adapters/terminalReviewer.js';
import { getEnv } from '../config/env.js';
import { LearnedStore } from '../engine/LearnedStore.js';
import { PageOrchestrator } from '../engine/PageOrchestrator.js';
import { getLogger } from '../monitoring/logger.js';

// --- Parse args ---

function parseArg(flag: string): string | null {
  const arg = process.argv.find((a) => a.startsWith(`--${flag}=`));
  if (!arg) return null;
  const value = arg.split('=').slice(1).join('=');
  return value || null;
}

function parsePattern(source: string | null | undefined): RegExp {
  if (!source) return GOOGLE_FORMS_URL_PATTERN;
  try {
    return new RegExp(source);
  } catch {
    console.error(`Error: --url-pattern is not a valid regular expression: ${source}`);
    process.exit(1);
  }
}

// --- Main ---

async function main(): Promise<void> {
  const env = getEnv();
  const logger = getLogger().child({ component: 'fill-form' });

  const profilePath = parseArg('profile') ?? env.FORMGATE_PROFILE_PATH;
  const cdpUrl = parseArg('cdp-url') ?? env.FORMGATE_CDP_URL;
  const urlPattern = parsePattern(parseArg('url-pattern') ?? env.FORMGATE_FORM_URL_PATTERN);

  const store = await LearnedStore.open(profilePath);
  console.log(`Profile:  ${profilePath} (${store.size} learned answers)`);

  const ai = env.ANTHROPIC_API_KEY
    ? new AnthropicCollaborator({
        client: createAnthropicClient(env.ANTHROPIC_API_KEY),
        model: env.FORMGATE_AI_MODEL,
        timeoutMs: env.FORMGATE_AI_TIMEOUT_MS,
      })
    : null;
  if (!ai) console.log('AI:       disabled (set ANTHROPIC_API_KEY to enable)');

  const { surface, browser } = await PlaywrightFormSurface.attach(cdpUrl, urlPattern);
  console.log(`Chrome:   ${cdpUrl}`);

  const orchestrator = new PageOrchestrator({
    surface,
    store,
    reviewer: new TerminalReviewer(),
    ai,
    formUrlPattern: urlPattern,
    aiTimeoutMs: env.FORMGATE_AI_TIMEOUT_MS,
  });

  orchestrator.on('page_complete', (report) => {
    const unwritten = !report.persisted && report.saved > 0 ? ' (NOT written to disk)' : '';
    console.log(
      `\nPage done: ${report.filled}/${report.questions} filled, review ${report.review}, ` +
        `${report.saved} saved${unwritten}`,
    );
  });

  process.once('SIGINT', () => {
    console.log('\nStopping after the current step...');
    orchestrator.stop();
  });

  console.log('\nWaiting for the form. Fill/adjust answers, then press Next or Submit.\n');

  try {
    const summary = await orchestrator.run();
    console.log('\nSession finished');
    console.log(`   Pages:        ${summary.pagesProcessed}`);
    console.log(`   Saved:        ${summary.answersSaved}`);
    console.log(`   Ended by:     ${summary.stoppedBy}${summary.error ? ` (${summary.error})` : ''}`);
    if (summary.stoppedBy === 'error') process.exitCode = 1;
  } finally {
    // Closing a CDP connection detaches; the user's Chrome keeps running.
    await browser.close().catch((err: unknown) => {
      logger.warn('Failed to detach from Chrome', { error: err });
    });
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
