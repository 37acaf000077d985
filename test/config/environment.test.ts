/**
 * Environment Configuration Tests
 */

import { loadEnvironmentConfig, validateEnvironmentConfig } from '../../src/config/environment';

const VARIABLES = [
  'DYNAMODB_TABLE_NAME',
  'AWS_REGION',
  'DYNAMODB_MAX_ATTEMPTS',
  'NAME_SIMILARITY_THRESHOLD',
  'TRANSITION_CONCURRENCY',
  'LOG_LEVEL',
  'NODE_ENV',
];

describe('Environment Configuration', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARIABLES) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARIABLES) {
      if (saved[name] === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = saved[name];
      }
    }
  });

  it('should fall back to defaults', () => {
    expect(loadEnvironmentConfig()).toEqual({
      dynamodbTableName: 'Deadpool',
      awsRegion: 'us-east-1',
      dynamodbMaxAttempts: 3,
      nameSimilarityThreshold: 0.85,
      transitionConcurrency: 3,
      logLevel: 'info',
      nodeEnv: 'development',
    });
  });

  it('should read overrides from the environment', () => {
    process.env.DYNAMODB_TABLE_NAME = 'Deadpool-test';
    process.env.NAME_SIMILARITY_THRESHOLD = '0.9';
    process.env.TRANSITION_CONCURRENCY = '8';

    const config = loadEnvironmentConfig();

    expect(config.dynamodbTableName).toBe('Deadpool-test');
    expect(config.nameSimilarityThreshold).toBe(0.9);
    expect(config.transitionConcurrency).toBe(8);
  });

  describe('validateEnvironmentConfig', () => {
    it('should accept the defaults', () => {
      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).not.toThrow();
    });

    it('should reject a missing table name', () => {
      expect(() => validateEnvironmentConfig({ ...loadEnvironmentConfig(), dynamodbTableName: '' })).toThrow(
        'Missing required environment variables: dynamodbTableName'
      );
    });

    it('should reject out-of-range values', () => {
      process.env.NAME_SIMILARITY_THRESHOLD = '1.5';
      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).toThrow(
        'NAME_SIMILARITY_THRESHOLD must be in (0, 1]'
      );

      process.env.NAME_SIMILARITY_THRESHOLD = '0.85';
      process.env.TRANSITION_CONCURRENCY = '0';
      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).toThrow(
        'TRANSITION_CONCURRENCY must be a positive integer'
      );

      process.env.TRANSITION_CONCURRENCY = '3';
      process.env.DYNAMODB_MAX_ATTEMPTS = 'many';
      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).toThrow(
        'DYNAMODB_MAX_ATTEMPTS must be a positive integer'
      );
    });
  });
});
