export { getEnv, resetEnv, type Env } from './env.js';
export {
  CHANGE_POLL_INTERVAL_MS,
  STABILITY_THRESHOLD,
  NAVIGATION_POLL_INTERVAL_MS,
  FUZZY_MATCH_THRESHOLD,
  AI_BATCH_TIMEOUT_MS,
  MAX_PROFILE_BACKUPS,
  PERSIST_RETRIES,
} from './timing.js';
