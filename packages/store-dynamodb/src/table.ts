import type {
  KeySchemaElement,
  AttributeDefinition,
} from '@aws-sdk/client-dynamodb';

export const DEFAULT_TABLE_NAME = 'http-cache-kit';

/**
 * Single-table layout:
 *
 * | pk            | sk            | item                          |
 * |---------------|---------------|-------------------------------|
 * | `CACHE#<key>` | `CACHE#<key>` | encoded entry, url, version   |
 * | `TAG#<url>`   | `CACHE#<key>` | tag index entry               |
 */
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

export const CACHE_PREFIX = 'CACHE#';
export const TAG_PREFIX = 'TAG#';
