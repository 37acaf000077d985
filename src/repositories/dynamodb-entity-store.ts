/**
 * DynamoDB Entity Store
 *
 * EntityStore implementation over a single DynamoDB table keyed by PK/SK.
 * Conditional check failures are reported as results, not exceptions.
 * Throttling and service faults have already been retried by the SDK client
 * when they reach this layer; they surface as TransientStoreError.
 * Transaction conflicts, which the SDK does not retry, are retried here with
 * exponential backoff before the outcome is classified.
 */

import {
  ConditionalCheckFailedException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  BatchGetCommand,
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  TransactWriteCommand,
} from '@aws-sdk/lib-dynamodb';
import { setTimeout as sleep } from 'node:timers/promises';
import { getDynamoDBClient } from '../config/dynamodb';
import { loadEnvironmentConfig } from '../config/environment';
import { TransientStoreError } from '../models/errors';
import { logStoreError } from '../utils/logger';
import { emitStoreThrottle } from '../utils/metrics';
import {
  EntityStore,
  StoreItem,
  StoreKey,
  TransactionResult,
  TransactionWrite,
  WriteCondition,
  toStoreItem,
} from './entity-store';

/**
 * DynamoDB limit on keys per BatchGetItem request
 */
const BATCH_GET_LIMIT = 100;

/**
 * DynamoDB limit on items per TransactWriteItems request
 */
const TRANSACTION_LIMIT = 100;

/**
 * Rounds spent re-requesting UnprocessedKeys before giving up
 */
const UNPROCESSED_KEY_ROUNDS = 5;

/**
 * Attempts at a conditional write that keeps colliding with concurrent
 * transactions, and the base delay doubled between them
 */
export const TRANSACTION_CONFLICT_ATTEMPTS = 4;
const TRANSACTION_CONFLICT_BACKOFF_MS = 20;

const TRANSIENT_ERROR_NAMES = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'InternalServerError',
  'ServiceUnavailable',
  'TransactionConflictException',
  'TimeoutError',
]);

const THROTTLE_ERROR_NAMES = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
]);

interface ConditionParams {
  ConditionExpression: string;
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, unknown>;
}

/**
 * Translate a WriteCondition into DynamoDB condition parameters.
 * Version 0 also accepts an existing item that was never versioned.
 */
export function buildConditionParams(condition: WriteCondition): ConditionParams {
  if (condition.type === 'notExists') {
    return { ConditionExpression: 'attribute_not_exists(PK)' };
  }
  if (condition.version === 0) {
    return {
      ConditionExpression: 'attribute_not_exists(#version)',
      ExpressionAttributeNames: { '#version': 'Version' },
    };
  }
  return {
    ConditionExpression: '#version = :expected_version',
    ExpressionAttributeNames: { '#version': 'Version' },
    ExpressionAttributeValues: { ':expected_version': condition.version },
  };
}

/**
 * Whether a DynamoDB error is worth retrying by the caller
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }
  const fault = Reflect.get(error, '$fault');
  return fault === 'server';
}

/**
 * Whether a write lost to a concurrent transaction rather than to one of its
 * own conditions
 */
export function isTransactionConflict(error: unknown): error is Error {
  if (error instanceof TransactionCanceledException) {
    const codes = (error.CancellationReasons ?? []).map((reason) => reason.Code);
    return codes.includes('TransactionConflict') && !codes.includes('ConditionalCheckFailed');
  }
  return error instanceof Error && error.name === 'TransactionConflictException';
}

function keyOf(item: StoreKey): StoreKey {
  return { PK: item.PK, SK: item.SK };
}

export class DynamoDBEntityStore implements EntityStore {
  private client: DynamoDBDocumentClient;
  private tableName: string;

  constructor(client?: DynamoDBDocumentClient, tableName?: string) {
    this.client = client ?? getDynamoDBClient();
    this.tableName = tableName ?? loadEnvironmentConfig().dynamodbTableName;
  }

  async get(key: StoreKey): Promise<StoreItem | null> {
    try {
      const result = await this.client.send(
        new GetCommand({
          TableName: this.tableName,
          Key: keyOf(key),
        })
      );
      return result.Item ? toStoreItem(result.Item) : null;
    } catch (error) {
      throw await this.translateError('GetItem', error);
    }
  }

  async put(item: StoreItem): Promise<void> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
        })
      );
    } catch (error) {
      throw await this.translateError('PutItem', error);
    }
  }

  async putIfAbsent(item: StoreItem): Promise<boolean> {
    return this.putConditional(item, { type: 'notExists' });
  }

  async putConditional(item: StoreItem, condition: WriteCondition): Promise<boolean> {
    try {
      await this.retryTransactionConflicts('PutItem', () =>
        this.client.send(
          new PutCommand({
            TableName: this.tableName,
            Item: item,
            ...buildConditionParams(condition),
          })
        )
      );
      return true;
    } catch (error) {
      if (error instanceof TransientStoreError) {
        throw error;
      }
      if (error instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw await this.translateError('PutItem', error);
    }
  }

  async queryByPrefix(partition: string, sortPrefix: string): Promise<StoreItem[]> {
    const items: StoreItem[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    try {
      do {
        const result = await this.client.send(
          new QueryCommand({
            TableName: this.tableName,
            KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk_prefix)',
            ExpressionAttributeValues: {
              ':pk': partition,
              ':sk_prefix': sortPrefix,
            },
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        for (const raw of result.Items ?? []) {
          const item = toStoreItem(raw);
          if (item) {
            items.push(item);
          }
        }
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw await this.translateError('Query', error);
    }

    return items;
  }

  async batchGet(keys: StoreKey[]): Promise<StoreItem[]> {
    // BatchGetItem rejects requests that repeat a key
    const uniqueKeys = new Map<string, StoreKey>();
    for (const key of keys) {
      uniqueKeys.set(`${key.PK}|${key.SK}`, keyOf(key));
    }

    const pending = [...uniqueKeys.values()];
    const items: StoreItem[] = [];

    for (let start = 0; start < pending.length; start += BATCH_GET_LIMIT) {
      let chunk: Record<string, unknown>[] = pending.slice(start, start + BATCH_GET_LIMIT);

      for (let round = 0; chunk.length > 0; round++) {
        if (round >= UNPROCESSED_KEY_ROUNDS) {
          const error = new TransientStoreError(
            `BatchGetItem left ${chunk.length} keys unprocessed after ${UNPROCESSED_KEY_ROUNDS} rounds`
          );
          logStoreError({ operation: 'BatchGetItem', error, retryable: true });
          throw error;
        }
        if (round > 0) {
          await sleep(50 * 2 ** round);
        }

        try {
          const result = await this.client.send(
            new BatchGetCommand({
              RequestItems: {
                [this.tableName]: { Keys: chunk },
              },
            })
          );

          for (const raw of result.Responses?.[this.tableName] ?? []) {
            const item = toStoreItem(raw);
            if (item) {
              items.push(item);
            }
          }
          chunk = result.UnprocessedKeys?.[this.tableName]?.Keys ?? [];
        } catch (error) {
          throw await this.translateError('BatchGetItem', error);
        }
      }
    }

    return items;
  }

  async delete(key: StoreKey): Promise<void> {
    try {
      await this.client.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: keyOf(key),
        })
      );
    } catch (error) {
      throw await this.translateError('DeleteItem', error);
    }
  }

  async transactWrite(writes: TransactionWrite[]): Promise<TransactionResult> {
    if (writes.length === 0) {
      return { committed: true, failedIndexes: [] };
    }
    if (writes.length > TRANSACTION_LIMIT) {
      throw new Error(`A transaction accepts at most ${TRANSACTION_LIMIT} writes, got ${writes.length}`);
    }

    const transactItems = writes.map((write) =>
      write.type === 'put'
        ? {
            Put: {
              TableName: this.tableName,
              Item: write.item,
              ...(write.condition ? buildConditionParams(write.condition) : {}),
            },
          }
        : {
            Delete: {
              TableName: this.tableName,
              Key: keyOf(write.key),
            },
          }
    );

    try {
      await this.retryTransactionConflicts('TransactWriteItems', () =>
        this.client.send(new TransactWriteCommand({ TransactItems: transactItems }))
      );
      return { committed: true, failedIndexes: [] };
    } catch (error) {
      if (error instanceof TransientStoreError) {
        throw error;
      }
      if (error instanceof TransactionCanceledException) {
        const failedIndexes = (error.CancellationReasons ?? []).flatMap((reason, index) =>
          reason.Code === 'ConditionalCheckFailed' ? [index] : []
        );
        if (failedIndexes.length > 0) {
          return { committed: false, failedIndexes };
        }
        // Cancelled for throttling or capacity; nothing was applied
        const transient = new TransientStoreError(
          `TransactWriteItems cancelled: ${error.message}`,
          error
        );
        logStoreError({ operation: 'TransactWriteItems', error: transient, retryable: true });
        throw transient;
      }
      throw await this.translateError('TransactWriteItems', error);
    }
  }

  /**
   * Re-send a write while it collides with concurrent transactions
   *
   * @throws TransientStoreError once TRANSACTION_CONFLICT_ATTEMPTS are spent
   */
  private async retryTransactionConflicts<T>(operation: string, send: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await send();
      } catch (error) {
        if (!isTransactionConflict(error)) {
          throw error;
        }
        if (attempt >= TRANSACTION_CONFLICT_ATTEMPTS) {
          const transient = new TransientStoreError(
            `DynamoDB ${operation} conflicted with concurrent transactions ${attempt} times`,
            error
          );
          logStoreError({ operation, error: transient, retryable: true });
          throw transient;
        }
        await sleep(TRANSACTION_CONFLICT_BACKOFF_MS * 2 ** (attempt - 1));
      }
    }
  }

  /**
   * Log the failure and map it onto the engine's error taxonomy
   */
  private async translateError(operation: string, error: unknown): Promise<Error> {
    const err = error instanceof Error ? error : new Error(String(error));
    const retryable = isTransientError(err);

    logStoreError({ operation, error: err, retryable });

    if (!retryable) {
      return new Error(`Failed to ${operation}: ${err.message}`, { cause: err });
    }

    if (THROTTLE_ERROR_NAMES.has(err.name)) {
      await emitStoreThrottle(operation);
    }
    return new TransientStoreError(`DynamoDB ${operation} failed: ${err.message}`, err);
  }
}
