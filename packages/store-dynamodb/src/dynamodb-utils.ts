import {
  BatchWriteCommand,
  QueryCommand,
  ScanCommand,
  type DynamoDBDocumentClient,
  type QueryCommandInput,
  type ScanCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { StorageError } from '@http-cache-kit/core';

export type DynamoItem = Record<string, unknown>;

export interface SendOptions {
  abortSignal?: AbortSignal;
}

const MAX_BATCH_WRITE_RETRIES = 8;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getRetryDelayMs(attempt: number): number {
  const backoff = Math.min(1000, 50 * 2 ** attempt);
  const jitter = Math.floor(Math.random() * 25);
  return backoff + jitter;
}

export async function batchDeleteWithRetries(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: Array<DynamoItem>,
  options: SendOptions = {},
): Promise<void> {
  for (let i = 0; i < keys.length; i += 25) {
    const batch = keys.slice(i, i + 25);

    let pendingWrites = batch.map((key) => ({ DeleteRequest: { Key: key } }));

    for (let attempt = 0; pendingWrites.length > 0; attempt++) {
      const response = await docClient.send(
        new BatchWriteCommand({
          RequestItems: {
            [tableName]: pendingWrites,
          },
        }),
        options,
      );

      const unprocessed = response.UnprocessedItems?.[tableName] ?? [];

      if (unprocessed.length === 0) {
        break;
      }

      if (attempt >= MAX_BATCH_WRITE_RETRIES) {
        throw new StorageError(
          `Failed to delete all items from table "${tableName}" after ${MAX_BATCH_WRITE_RETRIES + 1} attempts`,
        );
      }

      pendingWrites = unprocessed
        .map((request) => request.DeleteRequest?.Key)
        .filter((key): key is DynamoItem => Boolean(key))
        .map((key) => ({ DeleteRequest: { Key: key } }));
      await sleep(getRetryDelayMs(attempt));
    }
  }
}

export async function queryItemsAllPages(
  docClient: DynamoDBDocumentClient,
  input: QueryCommandInput,
  options: SendOptions = {},
): Promise<Array<DynamoItem>> {
  const items: Array<DynamoItem> = [];
  let lastEvaluatedKey: DynamoItem | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        ...input,
        ExclusiveStartKey: lastEvaluatedKey,
      }),
      options,
    );

    if (result.Items?.length) {
      items.push(...result.Items);
    }

    lastEvaluatedKey = result.LastEvaluatedKey;
  } while (lastEvaluatedKey);

  return items;
}

/**
 * Scan every page of a table, handing each page to `onPage` as it
 * arrives.
 */
export async function scanAllPages(
  docClient: DynamoDBDocumentClient,
  input: ScanCommandInput,
  onPage: (items: Array<DynamoItem>) => Promise<void> | void,
  options: SendOptions = {},
): Promise<void> {
  let lastEvaluatedKey: DynamoItem | undefined;

  do {
    const result = await docClient.send(
      new ScanCommand({
        ...input,
        ExclusiveStartKey: lastEvaluatedKey,
      }),
      options,
    );

    const items = result.Items ?? [];
    if (items.length > 0) {
      await onPage(items);
    }

    lastEvaluatedKey = result.LastEvaluatedKey;
  } while (lastEvaluatedKey);
}
