/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

export interface EnvironmentConfig {
  // DynamoDB configuration
  dynamodbTableName: string;
  awsRegion: string;
  dynamodbMaxAttempts: number;

  // Draft configuration
  nameSimilarityThreshold: number;
  transitionConcurrency: number;

  // Application configuration
  logLevel: string;
  nodeEnv: string;
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dynamodbTableName: process.env.DYNAMODB_TABLE_NAME || 'Deadpool',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
    dynamodbMaxAttempts: parseInt(process.env.DYNAMODB_MAX_ATTEMPTS || '3', 10),
    nameSimilarityThreshold: parseFloat(process.env.NAME_SIMILARITY_THRESHOLD || '0.85'),
    transitionConcurrency: parseInt(process.env.TRANSITION_CONCURRENCY || '3', 10),
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set and in range
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = [
    'dynamodbTableName',
    'awsRegion',
  ];

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  if (!Number.isInteger(config.dynamodbMaxAttempts) || config.dynamodbMaxAttempts < 1) {
    throw new Error('DYNAMODB_MAX_ATTEMPTS must be a positive integer');
  }

  if (
    Number.isNaN(config.nameSimilarityThreshold) ||
    config.nameSimilarityThreshold <= 0 ||
    config.nameSimilarityThreshold > 1
  ) {
    throw new Error('NAME_SIMILARITY_THRESHOLD must be in (0, 1]');
  }

  if (!Number.isInteger(config.transitionConcurrency) || config.transitionConcurrency < 1) {
    throw new Error('TRANSITION_CONCURRENCY must be a positive integer');
  }
}
