import { ResourceNotFoundException } from '@aws-sdk/client-dynamodb';
import { StorageError } from '@http-cache-kit/core';

export function throwIfDynamoTableMissing(
  error: unknown,
  tableName: string,
): void {
  if (
    error instanceof ResourceNotFoundException ||
    (error &&
      typeof error === 'object' &&
      'name' in error &&
      error.name === 'ResourceNotFoundException')
  ) {
    throw new StorageError(
      `DynamoDB table "${tableName}" was not found. Create the table using your infrastructure before using the DynamoDB cache manager.`,
      { cause: error },
    );
  }
}
