/**
 * DynamoDB Client Module
 *
 * Provides the shared DynamoDB DocumentClient used by the entity store.
 * Throttling and transient failures are retried by the SDK's standard retry
 * strategy, bounded by DYNAMODB_MAX_ATTEMPTS.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { loadEnvironmentConfig } from './environment';

// Global DynamoDB client instance for Lambda warm starts
let dynamodbClient: DynamoDBDocumentClient | null = null;

/**
 * Get or create the DynamoDB DocumentClient
 * Reuses client across Lambda invocations for performance
 */
export function getDynamoDBClient(): DynamoDBDocumentClient {
  if (!dynamodbClient) {
    const config = loadEnvironmentConfig();
    const client = new DynamoDBClient({
      region: config.awsRegion,
      maxAttempts: config.dynamodbMaxAttempts,
      retryMode: 'standard',
    });

    // Create DocumentClient with marshalling options
    dynamodbClient = DynamoDBDocumentClient.from(client, {
      marshallOptions: {
        removeUndefinedValues: true,
        convertEmptyValues: false,
      },
      unmarshallOptions: {
        wrapNumbers: false,
      },
    });
  }
  return dynamodbClient;
}

/**
 * Reset DynamoDB client instance (for testing only)
 * @internal
 */
export function resetDynamoDBClient(): void {
  dynamodbClient = null;
}
