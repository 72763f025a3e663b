/**
 * @prepscout/core - shared constants and utilities
 */

export { tokenize, indelRatio, tokenSetRatio, similarity } from './fuzzy';
export { SOURCE_LABELS, hostOf, sourceLabelFor, normalizeUrl } from './sources';
export {
  INTERVIEW_KEYWORDS,
  CREDIBLE_SOURCES,
  SEARCH_DOMAINS,
  CHARS_PER_TOKEN,
  NO_TITLE,
  DEFAULT_USER_AGENT,
  DIRECT_SOURCES,
  INTERVIEW_SUBREDDITS,
} from './constants';
export {
  sleep,
  Semaphore,
  HostPool,
  TokenBucket,
  runPool,
  type Sleep,
  type Clock,
  type HostPoolOptions,
  type TokenBucketOptions,
  type PoolOptions,
} from './concurrency';
export {
  RENDER_RETRY_DELAYS_MS,
  fixedDelayPolicy,
  retryWithPolicy,
  type RetryPolicy,
  type RetryOutcome,
  type RetryOptions,
} from './retry';
export { configSchema, loadConfig, type AppConfig } from './config';
export {
  agentLog,
  getAgentLogs,
  clearAgentLogs,
  createLogger,
  describeError,
  shouldPrint,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger';
