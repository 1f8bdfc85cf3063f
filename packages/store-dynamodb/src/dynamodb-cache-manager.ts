import {
  DynamoDBClient,
  TransactionCanceledException,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  TransactWriteCommand,
  type TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import {
  SerializationError,
  StorageError,
  calculateCurrentAge,
  calculateTimeToLive,
  createLogger,
  decodeCachedResponse,
  encodeCachedResponse,
  errorMessage,
  evaluateFreshness,
  indexableWords,
  tokenize,
  type CachedResponse,
  type FreshnessPolicy,
  type HttpResponseRecord,
  type IndexedCacheManager,
  type Logger,
  type RangeField,
  type StoredEntry,
} from '@http-cache-kit/core';
import { z } from 'zod';
import { CACHE_PREFIX, DEFAULT_TABLE_NAME, TAG_PREFIX } from './table.js';
import { throwIfDynamoTableMissing } from './table-missing-error.js';
import {
  batchDeleteWithRetries,
  queryItemsAllPages,
  scanAllPages,
  type SendOptions,
} from './dynamodb-utils.js';

export interface DynamoDBCacheManagerOptions {
  client?: DynamoDBDocumentClient | DynamoDBClient;
  region?: string;
  /** DynamoDB endpoint, e.g. a local instance. Ignored when `client` is given. */
  endpoint?: string;
  tableName?: string;
  /** Strongly consistent reads for get, tag lookups and scans. Default: true */
  consistentRead?: boolean;
  /** Abort a storage operation that takes longer than this. */
  requestTimeoutMs?: number;
  /** Entries whose encoded form is larger than this are not stored. Default: 390 KiB */
  maxEntrySizeBytes?: number;
  logger?: Logger;
}

type TransactItems = NonNullable<TransactWriteCommandInput['TransactItems']>;

const MAX_TRANSACTION_ATTEMPTS = 5;

const PrimaryItemSchema = z.object({
  key: z.string(),
  url: z.string(),
  record: z.string(),
  version: z.number().int(),
});

type PrimaryItem = z.infer<typeof PrimaryItemSchema>;

// What a write needs of the item it replaces; lenient so that an item
// with an unexpected shape can still be overwritten or deleted.
const CurrentItemSchema = z.object({
  url: z.string().optional().catch(undefined),
  version: z.number().optional().catch(undefined),
});

type CurrentItem = z.infer<typeof CurrentItemSchema>;

const TagItemSchema = z.object({ key: z.string() });

function cacheKeyOf(key: string): { pk: string; sk: string } {
  const pk = `${CACHE_PREFIX}${key}`;
  return { pk, sk: pk };
}

function tagKeyOf(url: string, key: string): { pk: string; sk: string } {
  return { pk: `${TAG_PREFIX}${url}`, sk: `${CACHE_PREFIX}${key}` };
}

function isConditionConflict(error: unknown): boolean {
  return (
    error instanceof TransactionCanceledException &&
    (error.CancellationReasons ?? []).some(
      (reason) => reason.Code === 'ConditionalCheckFailed',
    )
  );
}

function isAbort(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

/**
 * Persisted indexed cache manager backed by a single DynamoDB table.
 *
 * Every entry is a primary item holding the encoded response and policy,
 * plus a tag item keyed by the response URL. Both are written in one
 * transaction conditioned on the version last read, so the tag index
 * never points at a missing or different entry. Conflicting writers are
 * retried.
 *
 * Age, time-to-live and staleness depend on the clock, so `range`,
 * `staleView` and `search` scan the entries and evaluate them at query
 * time.
 */
export class DynamoDBCacheManager implements IndexedCacheManager {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly rawClient: DynamoDBClient | undefined;
  private readonly isClientManaged: boolean;
  private readonly tableName: string;
  private readonly consistentRead: boolean;
  private readonly requestTimeoutMs: number | undefined;
  private readonly maxEntrySizeBytes: number;
  private readonly logger: Logger;
  private isDestroyed = false;

  constructor({
    client,
    region,
    endpoint,
    tableName = DEFAULT_TABLE_NAME,
    consistentRead = true,
    requestTimeoutMs,
    maxEntrySizeBytes = 390 * 1024,
    logger = createLogger(),
  }: DynamoDBCacheManagerOptions = {}) {
    if (
      requestTimeoutMs !== undefined &&
      (!Number.isInteger(requestTimeoutMs) || requestTimeoutMs < 1)
    ) {
      throw new RangeError('requestTimeoutMs must be a positive integer');
    }

    this.tableName = tableName;
    this.consistentRead = consistentRead;
    this.requestTimeoutMs = requestTimeoutMs;
    this.maxEntrySizeBytes = maxEntrySizeBytes;
    this.logger = logger.child({ tableName });

    if (client instanceof DynamoDBDocumentClient) {
      this.docClient = client;
      this.isClientManaged = false;
    } else if (client instanceof DynamoDBClient) {
      this.docClient = DynamoDBDocumentClient.from(client);
      this.isClientManaged = false;
    } else {
      const config: DynamoDBClientConfig = {};
      if (region) config.region = region;
      if (endpoint) config.endpoint = endpoint;
      this.rawClient = new DynamoDBClient(config);
      this.docClient = DynamoDBDocumentClient.from(this.rawClient);
      this.isClientManaged = true;
    }
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    const item = await this.run('get', (options) =>
      this.readPrimary(key, this.consistentRead, options),
    );
    if (!item) {
      return undefined;
    }
    return this.decode(item)?.cached;
  }

  async put(
    key: string,
    response: HttpResponseRecord,
    policy: FreshnessPolicy,
  ): Promise<void> {
    const record = encodeCachedResponse({ response, policy });
    const size = Buffer.byteLength(record, 'utf8');

    if (size > this.maxEntrySizeBytes) {
      this.logger.warn(
        { key, size, maxEntrySizeBytes: this.maxEntrySizeBytes },
        'Entry too large to store',
      );
      return;
    }

    await this.withOptimisticRetry('put', key, async (options) => {
      const current = await this.readCurrent(key, options);
      const items: TransactItems = [
        {
          Put: {
            TableName: this.tableName,
            Item: {
              ...cacheKeyOf(key),
              key,
              url: response.url,
              record,
              version: (current?.version ?? 0) + 1,
            },
            ...this.versionCondition(current),
          },
        },
        {
          Put: {
            TableName: this.tableName,
            Item: { ...tagKeyOf(response.url, key), key },
          },
        },
      ];

      if (current?.url !== undefined && current.url !== response.url) {
        items.push({
          Delete: {
            TableName: this.tableName,
            Key: tagKeyOf(current.url, key),
          },
        });
      }

      return this.transact(items, options);
    });
  }

  async delete(key: string): Promise<void> {
    await this.withOptimisticRetry('delete', key, async (options) => {
      const current = await this.readCurrent(key, options);
      if (!current) {
        return true;
      }

      const items: TransactItems = [
        {
          Delete: {
            TableName: this.tableName,
            Key: cacheKeyOf(key),
            ...this.versionCondition(current),
          },
        },
      ];
      if (current.url !== undefined) {
        items.push({
          Delete: {
            TableName: this.tableName,
            Key: tagKeyOf(current.url, key),
          },
        });
      }

      return this.transact(items, options);
    });
  }

  async clear(): Promise<void> {
    await this.run('clear', (options) =>
      scanAllPages(
        this.docClient,
        {
          TableName: this.tableName,
          FilterExpression:
            'begins_with(pk, :cachePrefix) OR begins_with(pk, :tagPrefix)',
          ExpressionAttributeValues: {
            ':cachePrefix': CACHE_PREFIX,
            ':tagPrefix': TAG_PREFIX,
          },
          ProjectionExpression: 'pk, sk',
        },
        (items) =>
          batchDeleteWithRetries(
            this.docClient,
            this.tableName,
            items.map((item) => ({ pk: item['pk'], sk: item['sk'] })),
            options,
          ),
        options,
      ),
    );
  }

  async lookupByTag(url: string): Promise<Array<StoredEntry>> {
    return this.run('lookupByTag', async (options) => {
      const tags = await queryItemsAllPages(
        this.docClient,
        {
          TableName: this.tableName,
          KeyConditionExpression: 'pk = :pk',
          ExpressionAttributeValues: { ':pk': `${TAG_PREFIX}${url}` },
          ConsistentRead: this.consistentRead,
        },
        options,
      );

      const entries: Array<StoredEntry> = [];
      for (const tag of tags) {
        const parsed = TagItemSchema.safeParse(tag);
        if (!parsed.success) continue;

        const item = await this.readPrimary(
          parsed.data.key,
          this.consistentRead,
          options,
        );
        // A concurrent overwrite may have moved the entry to another URL.
        if (item?.url === url) {
          const decoded = this.decode(item);
          if (decoded) entries.push(decoded.entry);
        }
      }
      return entries;
    });
  }

  async range(
    field: RangeField,
    low: number,
    high: number,
  ): Promise<Array<StoredEntry>> {
    const entries = await this.scanEntries('range');
    const now = Date.now();

    return entries.filter((entry) => {
      const value =
        field === 'age'
          ? calculateCurrentAge(entry.policy, now)
          : calculateTimeToLive(entry.policy, now);
      return value >= low && value <= high;
    });
  }

  async staleView(): Promise<Array<StoredEntry>> {
    const entries = await this.scanEntries('staleView');
    const now = Date.now();

    return entries.filter(
      (entry) => evaluateFreshness(entry.policy, now).status === 'stale',
    );
  }

  async search(term: string): Promise<Array<StoredEntry>> {
    const words = tokenize(term);
    if (words.length === 0) {
      return [];
    }

    const entries = await this.scanEntries('search');
    return entries.filter((entry) => {
      const bodyWords = indexableWords(entry.response);
      return words.every((word) => bodyWords.has(word));
    });
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    this.isDestroyed = true;

    if (this.isClientManaged && this.rawClient) {
      this.rawClient.destroy();
    }
  }

  private async scanEntries(operation: string): Promise<Array<StoredEntry>> {
    return this.run(operation, async (options) => {
      const entries: Array<StoredEntry> = [];

      await scanAllPages(
        this.docClient,
        {
          TableName: this.tableName,
          FilterExpression: 'begins_with(pk, :prefix)',
          ExpressionAttributeValues: { ':prefix': CACHE_PREFIX },
          ConsistentRead: this.consistentRead,
        },
        (items) => {
          for (const raw of items) {
            const parsed = PrimaryItemSchema.safeParse(raw);
            if (!parsed.success) {
              this.logger.warn(
                { pk: raw['pk'] },
                'Treating cache item with an unexpected shape as absent',
              );
              continue;
            }
            const decoded = this.decode(parsed.data);
            if (decoded) entries.push(decoded.entry);
          }
        },
        options,
      );

      return entries;
    });
  }

  private async getItem(
    key: string,
    consistentRead: boolean,
    options: SendOptions,
  ): Promise<Record<string, unknown> | undefined> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: cacheKeyOf(key),
        ConsistentRead: consistentRead,
      }),
      options,
    );
    return result.Item;
  }

  private async readPrimary(
    key: string,
    consistentRead: boolean,
    options: SendOptions,
  ): Promise<PrimaryItem | undefined> {
    const item = await this.getItem(key, consistentRead, options);
    if (!item) {
      return undefined;
    }

    const parsed = PrimaryItemSchema.safeParse(item);
    if (!parsed.success) {
      this.logger.warn(
        { key, issues: parsed.error.issues },
        'Treating cache item with an unexpected shape as absent',
      );
      return undefined;
    }
    return parsed.data;
  }

  /** The item a write replaces, read strongly consistent. */
  private async readCurrent(
    key: string,
    options: SendOptions,
  ): Promise<CurrentItem | undefined> {
    const item = await this.getItem(key, true, options);
    if (!item) {
      return undefined;
    }

    if (!PrimaryItemSchema.safeParse(item).success) {
      this.logger.warn({ key }, 'Replacing cache item with an unexpected shape');
    }
    const parsed = CurrentItemSchema.safeParse(item);
    return parsed.success ? parsed.data : {};
  }

  private decode(
    item: PrimaryItem,
  ): { cached: CachedResponse; entry: StoredEntry } | undefined {
    try {
      const cached = decodeCachedResponse(item.record);
      return { cached, entry: { key: item.key, ...cached } };
    } catch (error) {
      if (!(error instanceof SerializationError)) throw error;
      this.logger.warn(
        { key: item.key, err: error },
        'Treating undecodable cache item as absent',
      );
      return undefined;
    }
  }

  private versionCondition(current: CurrentItem | undefined): {
    ConditionExpression: string;
    ExpressionAttributeNames?: Record<string, string>;
    ExpressionAttributeValues?: Record<string, unknown>;
  } {
    if (!current) {
      return { ConditionExpression: 'attribute_not_exists(pk)' };
    }
    if (current.version === undefined) {
      return {
        ConditionExpression:
          'attribute_not_exists(#version) OR NOT attribute_type(#version, :number)',
        ExpressionAttributeNames: { '#version': 'version' },
        ExpressionAttributeValues: { ':number': 'N' },
      };
    }
    return {
      ConditionExpression: '#version = :version',
      ExpressionAttributeNames: { '#version': 'version' },
      ExpressionAttributeValues: { ':version': current.version },
    };
  }

  /** Resolves false when a version condition failed. */
  private async transact(
    items: TransactItems,
    options: SendOptions,
  ): Promise<boolean> {
    try {
      await this.docClient.send(
        new TransactWriteCommand({ TransactItems: items }),
        options,
      );
      return true;
    } catch (error) {
      if (isConditionConflict(error)) {
        return false;
      }
      throw error;
    }
  }

  private async withOptimisticRetry(
    operation: string,
    key: string,
    attempt: (options: SendOptions) => Promise<boolean>,
  ): Promise<void> {
    for (let i = 1; i <= MAX_TRANSACTION_ATTEMPTS; i++) {
      const committed = await this.run(operation, attempt);
      if (committed) {
        return;
      }
      this.logger.debug({ key, operation, attempt: i }, 'Write conflict');
    }

    throw new StorageError(
      `DynamoDB ${operation} of "${key}" kept conflicting with concurrent writers after ${MAX_TRANSACTION_ATTEMPTS} attempts`,
    );
  }

  private async run<T>(
    operation: string,
    call: (options: SendOptions) => Promise<T>,
  ): Promise<T> {
    if (this.isDestroyed) {
      throw new StorageError('Cache manager has been destroyed');
    }

    const options: SendOptions =
      this.requestTimeoutMs === undefined
        ? {}
        : { abortSignal: AbortSignal.timeout(this.requestTimeoutMs) };

    try {
      return await call(options);
    } catch (error: unknown) {
      if (error instanceof StorageError) {
        throw error;
      }
      throwIfDynamoTableMissing(error, this.tableName);
      if (isAbort(error)) {
        throw new StorageError(
          `DynamoDB ${operation} timed out after ${this.requestTimeoutMs}ms`,
          { cause: error },
        );
      }
      throw new StorageError(
        `DynamoDB ${operation} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
