import {
  CreateTableCommand,
  DescribeTableCommand,
  DescribeTimeToLiveCommand,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
  type AttributeDefinition,
  type DynamoDBClient,
  type KeySchemaElement,
} from '@aws-sdk/client-dynamodb';

export const DEFAULT_TABLE_NAME = 'reddit-relay';

/** Epoch-seconds attribute DynamoDB's TTL sweeper deletes expired items by. */
export const TTL_ATTRIBUTE = 'ttl';

export const TABLE_SCHEMA: {
  KeySchema: Array<KeySchemaElement>;
  AttributeDefinitions: Array<AttributeDefinition>;
} = {
  KeySchema: [
    { AttributeName: 'pk', KeyType: 'HASH' },
    { AttributeName: 'sk', KeyType: 'RANGE' },
  ],
  AttributeDefinitions: [
    { AttributeName: 'pk', AttributeType: 'S' },
    { AttributeName: 'sk', AttributeType: 'S' },
  ],
};

export interface TableProvisioningOptions {
  /** Status checks before giving up on a table that is not ACTIVE. Defaults to 30. */
  maxAttempts?: number;
  /** Pause between status checks. Defaults to 1000ms. */
  delayMs?: number;
}

/** Create the table, wait for it to become ACTIVE, then turn on TTL expiry. */
export async function createTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options: TableProvisioningOptions = {},
): Promise<void> {
  await client.send(
    new CreateTableCommand({
      TableName: tableName,
      KeySchema: TABLE_SCHEMA.KeySchema,
      AttributeDefinitions: TABLE_SCHEMA.AttributeDefinitions,
      BillingMode: 'PAY_PER_REQUEST',
    }),
  );

  await untilActive(client, tableName, options);
  await enableExpiry(client, tableName);
}

/**
 * Make the table usable by the shared store. A missing table is created; an
 * existing one is awaited while it is not ACTIVE and gets TTL expiry on
 * `ttl` if it was provisioned without it.
 */
export async function ensureTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options: TableProvisioningOptions = {},
): Promise<void> {
  const status = await tableStatus(client, tableName);
  if (status === undefined) {
    await createTable(client, tableName, options);
    return;
  }

  if (status !== 'ACTIVE') {
    await untilActive(client, tableName, options);
  }
  await enableExpiry(client, tableName);
}

/** `undefined` when the table does not exist. */
async function tableStatus(
  client: DynamoDBClient,
  tableName: string,
): Promise<string | undefined> {
  try {
    const { Table } = await client.send(new DescribeTableCommand({ TableName: tableName }));
    return Table?.TableStatus ?? '';
  } catch (error: unknown) {
    if (error instanceof ResourceNotFoundException) {
      return undefined;
    }
    throw error;
  }
}

async function untilActive(
  client: DynamoDBClient,
  tableName: string,
  { maxAttempts = 30, delayMs = 1000 }: TableProvisioningOptions,
): Promise<void> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if ((await tableStatus(client, tableName)) === 'ACTIVE') {
      return;
    }
    if (attempt < maxAttempts) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
  throw new Error(`Table ${tableName} was not ACTIVE after ${maxAttempts} status checks`);
}

async function enableExpiry(client: DynamoDBClient, tableName: string): Promise<void> {
  const { TimeToLiveDescription } = await client.send(
    new DescribeTimeToLiveCommand({ TableName: tableName }),
  );
  const status = TimeToLiveDescription?.TimeToLiveStatus;

  if (status === 'ENABLED' || status === 'ENABLING') {
    const attribute = TimeToLiveDescription?.AttributeName;
    if (attribute === TTL_ATTRIBUTE) {
      return;
    }
    // DynamoDB allows one TTL attribute per table
    throw new Error(
      `Table ${tableName} expires items by "${attribute ?? ''}" instead of "${TTL_ATTRIBUTE}"`,
    );
  }

  await client.send(
    new UpdateTimeToLiveCommand({
      TableName: tableName,
      TimeToLiveSpecification: { AttributeName: TTL_ATTRIBUTE, Enabled: true },
    }),
  );
}
