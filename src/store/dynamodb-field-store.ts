/**
 * DynamoDB-backed field store
 * Fields (pk fieldId), MetricSamples (pk fieldId, sk date) and
 * Advisories (pk advisoryId, GSI FieldIdIndex on fieldId/createdAt).
 */

import { DocumentClient } from 'aws-sdk/clients/dynamodb';
import { FieldAdvisory } from '../types/advisory';
import { Field, FieldSnapshot, MetricSample } from '../types/field';
import { DynamoDBHelper } from '../shared/utils/dynamodb-helper';
import { PersistenceError, errorMessage } from '../shared/utils/errors';
import { Logger } from '../shared/utils/logger';
import { FieldStore } from './field-store';
import { advisoryFromItem, fieldFromItem, sampleFromItem, toItem } from './records';

export interface FieldStoreTables {
  fieldsTableName: string;
  metricSamplesTableName: string;
  advisoriesTableName: string;
}

export const ADVISORY_FIELD_INDEX = 'FieldIdIndex';

// `date` is a DynamoDB reserved word
const DATE_NAMES = { '#date': 'date' };

export class DynamoDbFieldStore implements FieldStore {
  constructor(
    private readonly db: DynamoDBHelper,
    private readonly tables: FieldStoreTables,
    private readonly logger: Logger
  ) {}

  async getField(fieldId: string): Promise<Field | null> {
    return this.guard('getField', async () => {
      const item = await this.db.getItem(this.tables.fieldsTableName, { fieldId });
      return item ? fieldFromItem(item) : null;
    });
  }

  async putField(field: Field): Promise<void> {
    await this.guard('putField', () => this.db.putItem(this.tables.fieldsTableName, toItem(field)));
  }

  async deleteField(fieldId: string): Promise<void> {
    await this.guard('deleteField', async () => {
      const samples = await this.db.queryItems(
        this.tables.metricSamplesTableName,
        'fieldId = :fieldId',
        { ':fieldId': fieldId }
      );
      const advisories = await this.queryAdvisoryItems(fieldId);

      await this.db.batchDeleteItems(
        this.tables.metricSamplesTableName,
        samples.map(sample => ({ fieldId, date: sample.date }))
      );
      await this.db.batchDeleteItems(
        this.tables.advisoriesTableName,
        advisories.map(advisory => ({ advisoryId: advisory.advisoryId }))
      );
      await this.db.deleteItem(this.tables.fieldsTableName, { fieldId });

      this.logger.info('Field deleted', { fieldId, samples: samples.length, advisories: advisories.length });
    });
  }

  async listSamples(fieldId: string, fromDate: string): Promise<MetricSample[]> {
    return this.guard('listSamples', async () => {
      const items = await this.db.queryItems(
        this.tables.metricSamplesTableName,
        'fieldId = :fieldId AND #date >= :fromDate',
        { ':fieldId': fieldId, ':fromDate': fromDate },
        { expressionAttributeNames: DATE_NAMES, scanIndexForward: true }
      );
      return items.map(sampleFromItem);
    });
  }

  async recordAnalysis(sample: MetricSample, advisories: FieldAdvisory[], snapshot: FieldSnapshot): Promise<void> {
    const transaction: DocumentClient.TransactWriteItemList = [
      {
        Put: {
          TableName: this.tables.metricSamplesTableName,
          Item: toItem(sample),
          // One sample per field and date
          ConditionExpression: 'attribute_not_exists(fieldId) AND attribute_not_exists(#date)',
          ExpressionAttributeNames: DATE_NAMES,
        },
      },
      ...advisories.map(advisory => ({
        Put: {
          TableName: this.tables.advisoriesTableName,
          Item: toItem(advisory),
          ConditionExpression: 'attribute_not_exists(advisoryId)',
        },
      })),
      {
        Update: {
          TableName: this.tables.fieldsTableName,
          Key: { fieldId: sample.fieldId },
          UpdateExpression:
            'SET soilMoisture = :soilMoisture, temperature = :temperature, healthStatus = :healthStatus, updatedAt = :updatedAt',
          ConditionExpression: 'attribute_exists(fieldId)',
          ExpressionAttributeValues: {
            ':soilMoisture': snapshot.soilMoisture,
            ':temperature': snapshot.temperature,
            ':healthStatus': snapshot.healthStatus,
            ':updatedAt': sample.createdAt,
          },
        },
      },
    ];

    try {
      await this.db.transactWrite(transaction);
    } catch (error) {
      throw new PersistenceError(
        `Failed to record analysis for field ${sample.fieldId} on ${sample.date}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async deleteSample(fieldId: string, date: string): Promise<void> {
    await this.guard('deleteSample', async () => {
      const item = await this.db.getItem(this.tables.metricSamplesTableName, { fieldId, date });
      if (!item) {
        return;
      }
      const sample = sampleFromItem(item);
      const linked = await this.db.queryItems(
        this.tables.advisoriesTableName,
        'fieldId = :fieldId',
        { ':fieldId': fieldId, ':sampleId': sample.sampleId },
        { indexName: ADVISORY_FIELD_INDEX, filterExpression: 'sampleId = :sampleId' }
      );

      for (const advisory of linked) {
        await this.db.simpleUpdate(this.tables.advisoriesTableName, { advisoryId: advisory.advisoryId }, { sampleId: null });
      }
      await this.db.deleteItem(this.tables.metricSamplesTableName, { fieldId, date });

      this.logger.info('Sample deleted', { fieldId, date, detachedAdvisories: linked.length });
    });
  }

  async listAdvisories(fieldId: string): Promise<FieldAdvisory[]> {
    return this.guard('listAdvisories', async () => {
      const items = await this.queryAdvisoryItems(fieldId);
      return items.map(advisoryFromItem);
    });
  }

  private queryAdvisoryItems(fieldId: string): Promise<DocumentClient.ItemList> {
    return this.db.queryItems(
      this.tables.advisoriesTableName,
      'fieldId = :fieldId',
      { ':fieldId': fieldId },
      { indexName: ADVISORY_FIELD_INDEX, scanIndexForward: true }
    );
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw new PersistenceError(`Field store ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
