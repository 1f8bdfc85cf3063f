import * as dynamodb from './index.js';

describe('store-dynamodb index exports', () => {
  it('re-exports the DynamoDB cache manager and table schema constants', () => {
    expect(dynamodb.DynamoDBCacheManager).toBeTypeOf('function');
    expect(dynamodb.DEFAULT_TABLE_NAME).toBe('http-cache-kit');
    expect(dynamodb.TABLE_SCHEMA).toBeDefined();
  });
});
