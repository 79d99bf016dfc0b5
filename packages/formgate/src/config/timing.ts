/**
 * Pipeline timing and threshold constants.
 *
 * The poll intervals are defaults; PageOrchestrator and ChangeMonitor accept
 * overrides so tests can run without real-time waits.
 */

/** ChangeMonitor poll interval. */
export const CHANGE_POLL_INTERVAL_MS = 500;

/** Consecutive unchanged polls before a manual edit is accepted. */
export const STABILITY_THRESHOLD = 3;

/** Orchestrator poll interval while waiting for Submit/Next navigation. */
export const NAVIGATION_POLL_INTERVAL_MS = 1_000;

/** Minimum token-overlap score for a cached question to count as the same question. */
export const FUZZY_MATCH_THRESHOLD = 0.75;

/** Upper bound for the single batched AI call per page. */
export const AI_BATCH_TIMEOUT_MS = 30_000;

/** Profile backups kept next to the profile document. */
export const MAX_PROFILE_BACKUPS = 5;

/** Extra attempts after a failed persist before giving up on that page. */
export const PERSIST_RETRIES = 1;
