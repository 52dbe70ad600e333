/**
 * DynamoDB helper utilities for the field advisory engine
 * Provides common database operations with error handling
 */

import { DynamoDB } from 'aws-sdk';
import { DocumentClient } from 'aws-sdk/clients/dynamodb';
import { errorMessage } from './errors';

export type Item = DocumentClient.AttributeMap;

export interface QueryOptions {
  indexName?: string;
  expressionAttributeNames?: DocumentClient.ExpressionAttributeNameMap;
  filterExpression?: string;
  scanIndexForward?: boolean;
}

// DynamoDB transaction and batch limits
const MAX_TRANSACTION_ITEMS = 100;
const MAX_BATCH_ITEMS = 25;

export class DynamoDBHelper {
  private docClient: DocumentClient;

  constructor(docClient?: DocumentClient) {
    this.docClient = docClient ?? new DynamoDB.DocumentClient({
      region: process.env.AWS_REGION || 'us-east-1',
    });
  }

  /**
   * Put an item into a DynamoDB table
   */
  async putItem(tableName: string, item: Item, conditionExpression?: string): Promise<void> {
    const params: DocumentClient.PutItemInput = {
      TableName: tableName,
      Item: item,
      ConditionExpression: conditionExpression,
    };

    try {
      await this.docClient.put(params).promise();
    } catch (error) {
      throw new Error(`Failed to put item to ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Get an item from a DynamoDB table
   */
  async getItem(tableName: string, key: DocumentClient.Key): Promise<Item | null> {
    const params: DocumentClient.GetItemInput = {
      TableName: tableName,
      Key: key,
    };

    try {
      const result = await this.docClient.get(params).promise();
      return result.Item || null;
    } catch (error) {
      throw new Error(`Failed to get item from ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Update an item with an object of attributes to set
   */
  async simpleUpdate(tableName: string, key: DocumentClient.Key, updates: Item): Promise<Item | undefined> {
    const updateExpressions: string[] = [];
    const expressionAttributeValues: DocumentClient.ExpressionAttributeValueMap = {};
    const expressionAttributeNames: DocumentClient.ExpressionAttributeNameMap = {};

    let index = 0;
    for (const [field, value] of Object.entries(updates)) {
      const attrName = `#attr${index}`;
      const attrValue = `:val${index}`;
      updateExpressions.push(`${attrName} = ${attrValue}`);
      expressionAttributeNames[attrName] = field;
      expressionAttributeValues[attrValue] = value;
      index++;
    }

    const params: DocumentClient.UpdateItemInput = {
      TableName: tableName,
      Key: key,
      UpdateExpression: `SET ${updateExpressions.join(', ')}`,
      ExpressionAttributeNames: expressionAttributeNames,
      ExpressionAttributeValues: expressionAttributeValues,
      ReturnValues: 'ALL_NEW',
    };

    try {
      const result = await this.docClient.update(params).promise();
      return result.Attributes;
    } catch (error) {
      throw new Error(`Failed to update item in ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Query all pages of a key condition
   */
  async queryItems(
    tableName: string,
    keyConditionExpression: string,
    expressionAttributeValues: DocumentClient.ExpressionAttributeValueMap,
    options: QueryOptions = {}
  ): Promise<Item[]> {
    const items: Item[] = [];
    let exclusiveStartKey: DocumentClient.Key | undefined;

    try {
      do {
        const params: DocumentClient.QueryInput = {
          TableName: tableName,
          IndexName: options.indexName,
          KeyConditionExpression: keyConditionExpression,
          FilterExpression: options.filterExpression,
          ExpressionAttributeValues: expressionAttributeValues,
          ExpressionAttributeNames: options.expressionAttributeNames,
          ScanIndexForward: options.scanIndexForward,
          ExclusiveStartKey: exclusiveStartKey,
        };
        const result = await this.docClient.query(params).promise();
        items.push(...(result.Items || []));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw new Error(`Failed to query items from ${tableName}: ${errorMessage(error)}`, { cause: error });
    }

    return items;
  }

  /**
   * Write several items atomically. All writes succeed or none do.
   */
  async transactWrite(items: DocumentClient.TransactWriteItemList): Promise<void> {
    if (items.length > MAX_TRANSACTION_ITEMS) {
      throw new Error(`Transaction of ${items.length} items exceeds the limit of ${MAX_TRANSACTION_ITEMS}`);
    }

    try {
      await this.docClient.transactWrite({ TransactItems: items }).promise();
    } catch (error) {
      throw new Error(`Failed to write transaction: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Batch delete keys from a table
   */
  async batchDeleteItems(tableName: string, keys: DocumentClient.Key[]): Promise<void> {
    for (let i = 0; i < keys.length; i += MAX_BATCH_ITEMS) {
      const batch = keys.slice(i, i + MAX_BATCH_ITEMS);
      let requestItems: DocumentClient.BatchWriteItemRequestMap | undefined = {
        [tableName]: batch.map(key => ({ DeleteRequest: { Key: key } })),
      };

      try {
        // Resubmit whatever DynamoDB reports as unprocessed
        while (requestItems && Object.keys(requestItems).length > 0) {
          const result: DocumentClient.BatchWriteItemOutput = await this.docClient
            .batchWrite({ RequestItems: requestItems })
            .promise();
          requestItems = result.UnprocessedItems;
        }
      } catch (error) {
        throw new Error(`Failed to batch delete items from ${tableName}: ${errorMessage(error)}`, { cause: error });
      }
    }
  }

  /**
   * Delete an item from a DynamoDB table
   */
  async deleteItem(tableName: string, key: DocumentClient.Key): Promise<void> {
    try {
      await this.docClient.delete({ TableName: tableName, Key: key }).promise();
    } catch (error) {
      throw new Error(`Failed to delete item from ${tableName}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
