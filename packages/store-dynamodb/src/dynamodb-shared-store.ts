import {
  DynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { SharedStore } from '@reddit-relay/core';
import { assertDynamoKeyPart, expiryEpochSeconds } from './dynamodb-utils.js';
import { DEFAULT_TABLE_NAME, TTL_ATTRIBUTE, ensureTable } from './table.js';
import { throwIfDynamoTableMissing } from './table-missing-error.js';

export interface DynamoDBSharedStoreOptions {
  client?: DynamoDBDocumentClient | DynamoDBClient;
  region?: string;
  tableName?: string;
  ensureTableExists?: boolean;
}

/**
 * `SharedStore` on a single DynamoDB table.
 *
 * Keys are stored as `KV#<key>` items with a `ttl` attribute. DynamoDB
 * deletes expired items lazily, so reads also compare `ttl` with the clock.
 * Map fields are `MAP#<mapKey>` / `FIELD#<field>` items that never expire.
 */
export class DynamoDBSharedStore implements SharedStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly rawClient: DynamoDBClient | undefined;
  private readonly isClientManaged: boolean;
  private readonly tableName: string;
  private readonly readyPromise: Promise<void>;
  private isDestroyed = false;

  constructor({
    client,
    region,
    tableName = DEFAULT_TABLE_NAME,
    ensureTableExists = false,
  }: DynamoDBSharedStoreOptions = {}) {
    this.tableName = tableName;

    if (client instanceof DynamoDBDocumentClient) {
      this.docClient = client;
      this.isClientManaged = false;
    } else if (client instanceof DynamoDBClient) {
      this.docClient = DynamoDBDocumentClient.from(client);
      this.isClientManaged = false;
    } else {
      const config: DynamoDBClientConfig = {};
      if (region) config.region = region;
      this.rawClient = new DynamoDBClient(config);
      this.docClient = DynamoDBDocumentClient.from(this.rawClient);
      this.isClientManaged = true;
    }

    if (ensureTableExists) {
      this.readyPromise = this.provisionTable(client);
      // Rejections surface from the first store call
      this.readyPromise.catch(() => undefined);
    } else {
      this.readyPromise = Promise.resolve();
    }
  }

  async get(key: string): Promise<string | undefined> {
    await this.ready();
    assertDynamoKeyPart(key, 'key');

    const pk = `KV#${key}`;
    let result;
    try {
      result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { pk, sk: pk },
          ConsistentRead: true,
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }

    const item = result.Item;
    if (!item) {
      return undefined;
    }

    const ttl: unknown = item[TTL_ATTRIBUTE];
    const now = Math.floor(Date.now() / 1000);
    if (typeof ttl === 'number' && now >= ttl) {
      return undefined;
    }

    const value: unknown = item['value'];
    return typeof value === 'string' ? value : undefined;
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.ready();
    assertDynamoKeyPart(key, 'key');

    const pk = `KV#${key}`;
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk,
            sk: pk,
            value,
            [TTL_ATTRIBUTE]: expiryEpochSeconds(ttlSeconds),
          },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async incrementField(mapKey: string, field: string, delta: number): Promise<number> {
    await this.ready();
    assertDynamoKeyPart(mapKey, 'mapKey');
    assertDynamoKeyPart(field, 'field');

    let result;
    try {
      result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { pk: `MAP#${mapKey}`, sk: `FIELD#${field}` },
          UpdateExpression: 'ADD #count :delta REMOVE #value',
          ExpressionAttributeNames: { '#count': 'count', '#value': 'value' },
          ExpressionAttributeValues: { ':delta': delta },
          ReturnValues: 'UPDATED_NEW',
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }

    const count: unknown = result.Attributes?.['count'];
    if (typeof count !== 'number') {
      throw new Error(`Increment of ${mapKey}.${field} returned no count`);
    }
    return count;
  }

  async setField(mapKey: string, field: string, value: string): Promise<void> {
    await this.ready();
    assertDynamoKeyPart(mapKey, 'mapKey');
    assertDynamoKeyPart(field, 'field');

    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { pk: `MAP#${mapKey}`, sk: `FIELD#${field}`, value },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async getField(mapKey: string, field: string): Promise<string | undefined> {
    await this.ready();
    assertDynamoKeyPart(mapKey, 'mapKey');
    assertDynamoKeyPart(field, 'field');

    let result;
    try {
      result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { pk: `MAP#${mapKey}`, sk: `FIELD#${field}` },
          ConsistentRead: true,
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }

    const value: unknown = result.Item?.['value'];
    if (typeof value === 'string') {
      return value;
    }
    // Counters are stored as numbers
    const count: unknown = result.Item?.['count'];
    return typeof count === 'number' ? String(count) : undefined;
  }

  async close(): Promise<void> {
    this.isDestroyed = true;

    if (this.isClientManaged && this.rawClient) {
      this.rawClient.destroy();
    }
  }

  destroy(): void {
    this.isDestroyed = true;

    if (this.isClientManaged && this.rawClient) {
      this.rawClient.destroy();
    }
  }

  private async provisionTable(client: DynamoDBSharedStoreOptions['client']): Promise<void> {
    if (this.rawClient) {
      return ensureTable(this.rawClient, this.tableName);
    }
    if (client instanceof DynamoDBClient) {
      return ensureTable(client, this.tableName);
    }

    // A document client does not expose its base client, so provision
    // through a short-lived one on the same region, credentials and endpoint
    const { region, credentials, endpoint } = this.docClient.config;
    const provisioner = new DynamoDBClient({ region, credentials, endpoint });
    try {
      await ensureTable(provisioner, this.tableName);
    } finally {
      provisioner.destroy();
    }
  }

  private async ready(): Promise<void> {
    if (this.isDestroyed) {
      throw new Error('Shared store has been destroyed');
    }
    await this.readyPromise;
  }
}
