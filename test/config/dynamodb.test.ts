/**
 * DynamoDB Client Module Tests
 */

import { getDynamoDBClient, resetDynamoDBClient } from '../../src/config/dynamodb';

jest.mock('../../src/config/environment', () => ({
  loadEnvironmentConfig: jest.fn().mockReturnValue({
    dynamodbTableName: 'test-table',
    awsRegion: 'us-east-1',
    dynamodbMaxAttempts: 5,
  }),
}));

describe('DynamoDB Client Module', () => {
  beforeEach(() => {
    resetDynamoDBClient();
  });

  it('should create and return a DynamoDB DocumentClient', () => {
    const client = getDynamoDBClient();
    expect(client).toBeDefined();
  });

  it('should reuse the same client instance across calls', () => {
    expect(getDynamoDBClient()).toBe(getDynamoDBClient());
  });

  it('should create a fresh client after a reset', () => {
    const first = getDynamoDBClient();
    resetDynamoDBClient();
    expect(getDynamoDBClient()).not.toBe(first);
  });

  it('should drop undefined attributes when marshalling', () => {
    const client = getDynamoDBClient();
    expect(client.config.translateConfig?.marshallOptions?.removeUndefinedValues).toBe(true);
  });

  it('should bound retries by the configured attempts', async () => {
    const client = getDynamoDBClient();
    await expect(client.config.maxAttempts()).resolves.toBe(5);
  });
});
