import { ResourceNotFoundException } from '@aws-sdk/client-dynamodb';

function isTableMissing(error: unknown): boolean {
  if (error instanceof ResourceNotFoundException) {
    return true;
  }
  return error instanceof Error && error.name === 'ResourceNotFoundException';
}

/**
 * Replace DynamoDB's generic "Requested resource not found" with an error
 * that names the table. Any other error is left for the caller to rethrow.
 */
export function throwIfDynamoTableMissing(error: unknown, tableName: string): void {
  if (isTableMissing(error)) {
    throw new Error(
      `DynamoDB table "${tableName}" was not found. Create the table using your infrastructure ` +
        `(string keys "pk" and "sk", TTL on "ttl") or pass ensureTableExists: true.`,
      { cause: error },
    );
  }
}
