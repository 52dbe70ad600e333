/**
 * Field Advisory Stack
 * DynamoDB tables, the field Lambda functions and the REST API in front of them
 */

import * as cdk from 'aws-cdk-lib';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';

export interface FieldAdvisoryStackProps extends cdk.StackProps {
  stage: string;
  sentinelHubClientId?: string;
  sentinelHubClientSecret?: string;
}

const HANDLER_MODULE = 'src/handlers/field-handlers';

export class FieldAdvisoryStack extends cdk.Stack {
  // DynamoDB Tables
  public readonly fieldsTable: dynamodb.Table;
  public readonly metricSamplesTable: dynamodb.Table;
  public readonly advisoriesTable: dynamodb.Table;

  // Lambda functions
  public readonly createFieldFunction: lambda.Function;
  public readonly getFieldFunction: lambda.Function;
  public readonly analyzeFieldFunction: lambda.Function;
  public readonly fieldHistoryFunction: lambda.Function;

  public readonly api: apigateway.RestApi;

  constructor(scope: Construct, id: string, props: FieldAdvisoryStackProps) {
    super(scope, id, props);

    const removalPolicy = props.stage === 'production' ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY;

    // Fields Table - field registry and latest analysis snapshot
    this.fieldsTable = new dynamodb.Table(this, 'FieldsTable', {
      tableName: `FieldAdvisory-Fields-${props.stage}`,
      partitionKey: {
        name: 'fieldId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      pointInTimeRecovery: true,
      removalPolicy,
    });

    // Metric Samples Table - one sample per field and day
    this.metricSamplesTable = new dynamodb.Table(this, 'MetricSamplesTable', {
      tableName: `FieldAdvisory-MetricSamples-${props.stage}`,
      partitionKey: {
        name: 'fieldId',
        type: dynamodb.AttributeType.STRING,
      },
      sortKey: {
        name: 'date',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      pointInTimeRecovery: true,
      removalPolicy,
    });

    // Advisories Table - advisories generated by analysis runs
    this.advisoriesTable = new dynamodb.Table(this, 'AdvisoriesTable', {
      tableName: `FieldAdvisory-Advisories-${props.stage}`,
      partitionKey: {
        name: 'advisoryId',
        type: dynamodb.AttributeType.STRING,
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      pointInTimeRecovery: true,
      removalPolicy,
    });

    this.advisoriesTable.addGlobalSecondaryIndex({
      indexName: 'FieldIdIndex',
      partitionKey: {
        name: 'fieldId',
        type: dynamodb.AttributeType.STRING,
      },
      sortKey: {
        name: 'createdAt',
        type: dynamodb.AttributeType.STRING,
      },
    });

    const environment: Record<string, string> = {
      // DynamoDB Tables
      FIELDS_TABLE_NAME: this.fieldsTable.tableName,
      METRIC_SAMPLES_TABLE_NAME: this.metricSamplesTable.tableName,
      ADVISORIES_TABLE_NAME: this.advisoriesTable.tableName,

      // Application Settings
      STAGE: props.stage,
      LOG_LEVEL: props.stage === 'production' ? 'INFO' : 'DEBUG',
      SOURCE_TIMEOUT_MS: '10000',
      MAX_RETRIES: '2',
    };
    if (props.sentinelHubClientId && props.sentinelHubClientSecret) {
      environment.SENTINEL_HUB_CLIENT_ID = props.sentinelHubClientId;
      environment.SENTINEL_HUB_CLIENT_SECRET = props.sentinelHubClientSecret;
    }

    const createFunction = (id: string, exportName: string, timeout: cdk.Duration): lambda.Function =>
      new lambda.Function(this, id, {
        functionName: `FieldAdvisory-${id}-${props.stage}`,
        runtime: lambda.Runtime.NODEJS_20_X,
        handler: `${HANDLER_MODULE}.${exportName}`,
        code: lambda.Code.fromAsset('dist'), // Built from TypeScript
        timeout,
        memorySize: 512,
        environment,
        logRetention: logs.RetentionDays.ONE_MONTH,
        tracing: lambda.Tracing.ACTIVE,
      });

    this.createFieldFunction = createFunction('CreateField', 'createField', cdk.Duration.seconds(10));
    this.getFieldFunction = createFunction('GetField', 'getField', cdk.Duration.seconds(10));
    // Three bounded source calls plus training and persistence
    this.analyzeFieldFunction = createFunction('AnalyzeField', 'analyzeField', cdk.Duration.minutes(2));
    this.fieldHistoryFunction = createFunction('FieldHistory', 'fieldHistory', cdk.Duration.seconds(15));

    // Grant permissions to DynamoDB tables
    this.fieldsTable.grantReadWriteData(this.createFieldFunction);
    this.fieldsTable.grantReadData(this.getFieldFunction);
    this.fieldsTable.grantReadWriteData(this.analyzeFieldFunction);
    this.metricSamplesTable.grantReadWriteData(this.analyzeFieldFunction);
    this.advisoriesTable.grantReadWriteData(this.analyzeFieldFunction);
    this.fieldsTable.grantReadData(this.fieldHistoryFunction);
    this.metricSamplesTable.grantReadData(this.fieldHistoryFunction);
    this.advisoriesTable.grantReadData(this.fieldHistoryFunction);

    // Grant permissions for AWS X-Ray tracing
    for (const fn of [this.createFieldFunction, this.getFieldFunction, this.analyzeFieldFunction, this.fieldHistoryFunction]) {
      fn.addToRolePolicy(
        new iam.PolicyStatement({
          effect: iam.Effect.ALLOW,
          actions: ['xray:PutTraceSegments', 'xray:PutTelemetryRecords'],
          resources: ['*'],
        })
      );
    }

    // REST API
    this.api = new apigateway.RestApi(this, 'FieldAdvisoryApi', {
      restApiName: `FieldAdvisory-Api-${props.stage}`,
      deployOptions: { stageName: props.stage },
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: ['GET', 'POST', 'OPTIONS'],
      },
    });

    const fields = this.api.root.addResource('fields');
    fields.addMethod('POST', new apigateway.LambdaIntegration(this.createFieldFunction));
    const field = fields.addResource('{fieldId}');
    field.addMethod('GET', new apigateway.LambdaIntegration(this.getFieldFunction));
    field.addResource('analysis').addMethod('POST', new apigateway.LambdaIntegration(this.analyzeFieldFunction));
    field.addResource('history').addMethod('GET', new apigateway.LambdaIntegration(this.fieldHistoryFunction));

    // Outputs
    new cdk.CfnOutput(this, 'ApiUrl', {
      value: this.api.url,
      description: 'Field advisory API endpoint',
    });

    new cdk.CfnOutput(this, 'FieldsTableName', {
      value: this.fieldsTable.tableName,
      exportName: `FieldAdvisory-FieldsTable-${props.stage}`,
    });

    new cdk.CfnOutput(this, 'MetricSamplesTableName', {
      value: this.metricSamplesTable.tableName,
      exportName: `FieldAdvisory-MetricSamplesTable-${props.stage}`,
    });

    new cdk.CfnOutput(this, 'AdvisoriesTableName', {
      value: this.advisoriesTable.tableName,
      exportName: `FieldAdvisory-AdvisoriesTable-${props.stage}`,
    });
  }
}
