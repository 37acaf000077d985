/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the engine. Every entry carries a timestamp and level; player contact and
 * name fields are redacted before anything is written.
 */

import { loadEnvironmentConfig } from '../config/environment';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
}

/**
 * Draft commit log entry
 */
interface DraftCommitLogEntry extends BaseLogEntry {
  log_type: 'DRAFT_COMMIT';
  player_id: string;
  year: number;
  outcome: string;
  candidate_id?: string;
  was_new_candidate?: boolean;
  latency_ms: number;
  reason?: string;
}

/**
 * Season transition stage log entry
 */
interface TransitionStageLogEntry extends BaseLogEntry {
  log_type: 'SEASON_TRANSITION';
  from_year: number;
  to_year: number;
  stage: string;
  dry_run: boolean;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Store error log entry
 */
interface StoreErrorLogEntry extends BaseLogEntry {
  log_type: 'STORE_ERROR';
  operation: string;
  error_name: string;
  error_message: string;
  retryable: boolean;
}

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'player_name',
  'first_name',
  'last_name',
  'firstname',
  'lastname',
  'email',
  'phone',
  'phone_number',
  'phonenumber',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value instanceof Error) {
    return { name: value.name, message: sanitizeString(value.message) };
  }
  if (value && typeof value === 'object') {
    return sanitizeObject(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
export function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

function parseLogLevel(value: string): LogLevel {
  switch (value.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function isEnabled(level: LogLevel): boolean {
  const threshold = parseLogLevel(loadEnvironmentConfig().logLevel);
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Write log entry to console (CloudWatch)
 */
function writeLog(entry: BaseLogEntry): void {
  if (!isEnabled(entry.level)) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

export type DraftCommitOutcome =
  | 'COMMITTED'
  | 'ALREADY_DRAFTED'
  | 'CAPACITY_EXCEEDED'
  | 'CONFLICT'
  | 'REJECTED'
  | 'FAILED';

/**
 * Log the outcome of a draft commit
 *
 * Successful commits log at INFO, game-rule rejections (already drafted,
 * capacity exceeded, invalid input) at WARN, anything else at ERROR.
 */
export function logDraftCommit(params: {
  playerId: string;
  year: number;
  outcome: DraftCommitOutcome;
  candidateId?: string;
  wasNewCandidate?: boolean;
  latencyMs: number;
  reason?: string;
  requestId?: string;
}): void {
  const level =
    params.outcome === 'COMMITTED'
      ? LogLevel.INFO
      : params.outcome === 'FAILED'
      ? LogLevel.ERROR
      : LogLevel.WARN;

  const entry: DraftCommitLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    log_type: 'DRAFT_COMMIT',
    request_id: params.requestId,
    player_id: params.playerId,
    year: params.year,
    outcome: params.outcome,
    candidate_id: params.candidateId,
    was_new_candidate: params.wasNewCandidate,
    latency_ms: params.latencyMs,
    reason: params.reason === undefined ? undefined : sanitizeString(params.reason),
  };

  writeLog(entry);
}

/**
 * Log a season transition stage
 *
 * @example
 * ```typescript
 * logTransitionStage({
 *   fromYear: 2025,
 *   toYear: 2026,
 *   stage: 'BUILD_DRAFT_ORDER',
 *   dryRun: false,
 *   message: 'Draft order written',
 *   context: { players: 12 }
 * });
 * ```
 */
export function logTransitionStage(params: {
  fromYear: number;
  toYear: number;
  stage: string;
  dryRun: boolean;
  message: string;
  level?: LogLevel;
  context?: Record<string, unknown>;
}): void {
  const entry: TransitionStageLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.level ?? LogLevel.INFO,
    log_type: 'SEASON_TRANSITION',
    from_year: params.fromYear,
    to_year: params.toYear,
    stage: params.stage,
    dry_run: params.dryRun,
    message: params.message,
    context: params.context ? sanitizeObject(params.context) : undefined,
  };

  writeLog(entry);
}

/**
 * Log a store failure
 *
 * Retryable failures (throttling, timeouts) log at WARN, others at ERROR.
 */
export function logStoreError(params: {
  operation: string;
  error: Error;
  retryable: boolean;
}): void {
  const entry: StoreErrorLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.retryable ? LogLevel.WARN : LogLevel.ERROR,
    log_type: 'STORE_ERROR',
    operation: params.operation,
    error_name: params.error.name,
    error_message: sanitizeString(params.error.message),
    retryable: params.retryable,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * General-purpose logging function for custom log entries.
 * Automatically sanitizes context to remove PII.
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry: BaseLogEntry & Record<string, unknown> = {
    ...sanitizedContext,
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  writeLog(entry);
}
