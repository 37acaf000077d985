/**
 * Tests for Structured Logging Module
 *
 * Validates structured logging functions, PII sanitization,
 * level filtering and log format consistency.
 */

import {
  log,
  logDraftCommit,
  LogLevel,
  logStoreError,
  logTransitionStage,
  sanitizeObject,
} from '../../src/utils/logger';

describe('Structured Logging Module', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  const originalLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
  });

  describe('logDraftCommit', () => {
    it('should log a committed draft at INFO', () => {
      logDraftCommit({
        playerId: 'p-1',
        year: 2026,
        outcome: 'COMMITTED',
        candidateId: 'c-1',
        wasNewCandidate: true,
        latencyMs: 42,
      });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.log_type).toBe('DRAFT_COMMIT');
      expect(logEntry.level).toBe('INFO');
      expect(logEntry.player_id).toBe('p-1');
      expect(logEntry.year).toBe(2026);
      expect(logEntry.candidate_id).toBe('c-1');
      expect(logEntry.was_new_candidate).toBe(true);
      expect(logEntry.latency_ms).toBe(42);
      expect(new Date(logEntry.timestamp).toISOString()).toBe(logEntry.timestamp);
    });

    it('should log game-rule rejections at WARN', () => {
      logDraftCommit({
        playerId: 'p-1',
        year: 2026,
        outcome: 'CAPACITY_EXCEEDED',
        latencyMs: 5,
        reason: 'Player p-1 already has 20 of 20 active picks for 2026',
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.level).toBe('WARN');
      expect(logEntry.outcome).toBe('CAPACITY_EXCEEDED');
    });

    it('should log failures at ERROR on stderr', () => {
      logDraftCommit({ playerId: 'p-1', year: 2026, outcome: 'FAILED', latencyMs: 5, reason: 'boom' });

      expect(consoleLogSpy).not.toHaveBeenCalled();
      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.level).toBe('ERROR');
      expect(logEntry.reason).toBe('boom');
    });

    it('should scrub contact details from the reason', () => {
      logDraftCommit({
        playerId: 'p-1',
        year: 2026,
        outcome: 'REJECTED',
        latencyMs: 1,
        reason: 'contact ada@example.com or 555-123-4567',
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.reason).toBe('contact [EMAIL_REDACTED] or [PHONE_REDACTED]');
    });
  });

  describe('logTransitionStage', () => {
    it('should log the stage with sanitized context', () => {
      logTransitionStage({
        fromYear: 2025,
        toYear: 2026,
        stage: 'CARRY_FORWARD_PICKS',
        dryRun: true,
        message: 'Player carried forward',
        context: { player_id: 'p-1', player_name: 'Ada Lovelace', picks_carried: 3 },
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry).toMatchObject({
        level: 'INFO',
        log_type: 'SEASON_TRANSITION',
        from_year: 2025,
        to_year: 2026,
        stage: 'CARRY_FORWARD_PICKS',
        dry_run: true,
        message: 'Player carried forward',
        context: { player_id: 'p-1', player_name: '[PII_REDACTED]', picks_carried: 3 },
      });
    });
  });

  describe('logStoreError', () => {
    it('should log retryable failures at WARN', () => {
      logStoreError({ operation: 'PutItem', error: new Error('Rate exceeded'), retryable: true });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry).toMatchObject({
        level: 'WARN',
        log_type: 'STORE_ERROR',
        operation: 'PutItem',
        error_name: 'Error',
        error_message: 'Rate exceeded',
        retryable: true,
      });
    });

    it('should log permanent failures at ERROR', () => {
      logStoreError({ operation: 'Query', error: new Error('Bad key'), retryable: false });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('log (generic)', () => {
    it('should log message with context', () => {
      log(LogLevel.INFO, 'Engine ready', { table: 'Deadpool' });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.level).toBe('INFO');
      expect(logEntry.message).toBe('Engine ready');
      expect(logEntry.table).toBe('Deadpool');
    });

    it('should drop entries below LOG_LEVEL', () => {
      log(LogLevel.DEBUG, 'hidden');
      expect(consoleLogSpy).not.toHaveBeenCalled();

      process.env.LOG_LEVEL = 'debug';
      log(LogLevel.DEBUG, 'shown');
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);

      process.env.LOG_LEVEL = 'error';
      log(LogLevel.WARN, 'hidden');
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('sanitizeObject', () => {
    it('should redact PII fields at any depth', () => {
      expect(
        sanitizeObject({
          player: { first_name: 'Ada', last_name: 'Lovelace', id: 'p-1' },
          Email: 'ada@example.com',
          notes: ['call 555-123-4567'],
        })
      ).toEqual({
        player: { first_name: '[PII_REDACTED]', last_name: '[PII_REDACTED]', id: 'p-1' },
        Email: '[PII_REDACTED]',
        notes: ['call [PHONE_REDACTED]'],
      });
    });

    it('should reduce errors to name and message', () => {
      expect(sanitizeObject({ error: new TypeError('bad input') })).toEqual({
        error: { name: 'TypeError', message: 'bad input' },
      });
    });
  });
});
