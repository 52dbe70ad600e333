/**
 * Field analysis Lambda functions
 * POST /fields, GET /fields/{fieldId}, POST /fields/{fieldId}/analysis,
 * GET /fields/{fieldId}/history?days=N
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { CreateFieldInput } from '../types/field';
import { getEnvironment } from '../shared/config/environment';
import { ValidationError } from '../shared/utils/errors';
import { LambdaResponse, handleLambdaError } from '../shared/utils/lambda-response';
import { Logger, createLambdaLogger } from '../shared/utils/logger';
import { Validator, toPolygon } from '../shared/utils/validation';
import { FieldServices, createFieldServices } from './service-factory';

// The parts of the API Gateway event the handlers read
export type ApiEvent = Pick<APIGatewayProxyEvent, 'body' | 'path' | 'httpMethod' | 'pathParameters' | 'queryStringParameters'>;

export type ApiHandler = (
  event: ApiEvent,
  context: Pick<Context, 'awsRequestId'>
) => Promise<APIGatewayProxyResult>;

export interface FieldHandlers {
  createField: ApiHandler;
  getField: ApiHandler;
  analyzeField: ApiHandler;
  fieldHistory: ApiHandler;
}

function requireFieldId(event: ApiEvent): string {
  const fieldId = event.pathParameters?.fieldId;
  if (!fieldId || fieldId.trim().length === 0) {
    throw new ValidationError('fieldId path parameter is required');
  }
  return fieldId;
}

function parseBody(event: ApiEvent): unknown {
  try {
    const body: unknown = JSON.parse(event.body || '{}');
    return body;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

export function parseCreateFieldRequest(body: unknown): CreateFieldInput {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const record = Object.fromEntries(Object.entries(body));
  const boundary = toPolygon(record.boundary);
  if (!boundary) {
    throw new ValidationError('Boundary must be a GeoJSON Polygon');
  }

  return {
    userId: optionalString(record, 'userId') ?? '',
    name: optionalString(record, 'name') ?? '',
    boundary,
    region: optionalString(record, 'region'),
    district: optionalString(record, 'district'),
    cropType: optionalString(record, 'cropType'),
    cropStage: optionalString(record, 'cropStage'),
    season: optionalString(record, 'season'),
  };
}

function parseDays(event: ApiEvent, fallback: number): number {
  const raw = event.queryStringParameters?.days;
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  const days = Number(raw);
  Validator.throwIfInvalid(Validator.validateWindowDays(days));
  return days;
}

/**
 * Build the handlers around a service provider. The provider is called per
 * request so configuration errors surface as a 500 response.
 */
export function createFieldHandlers(services: () => FieldServices): FieldHandlers {
  const wrap = (
    name: string,
    action: (event: ApiEvent, logger: Logger) => Promise<APIGatewayProxyResult>
  ): ApiHandler => async (event, context) => {
    const logger = createLambdaLogger(name, context.awsRequestId);
    try {
      logger.info('Request received', { path: event.path, method: event.httpMethod });
      return await action(event, logger);
    } catch (error) {
      return handleLambdaError(error, logger);
    }
  };

  return {
    createField: wrap('create-field', async event => {
      const field = await services().fieldManager.createField(parseCreateFieldRequest(parseBody(event)));
      return LambdaResponse.success(field, 201);
    }),

    getField: wrap('get-field', async event => {
      const field = await services().fieldManager.getField(requireFieldId(event));
      return LambdaResponse.success(field);
    }),

    analyzeField: wrap('analyze-field', async (event, logger) => {
      const fieldId = requireFieldId(event);
      const result = await services().analysisService.analyzeField(fieldId);
      logger.info('Analysis completed', { fieldId, sampleId: result.sampleId, healthStatus: result.healthStatus });
      return LambdaResponse.success(result);
    }),

    fieldHistory: wrap('field-history', async event => {
      const fieldId = requireFieldId(event);
      const { historyAggregator, historyDays } = services();
      const days = parseDays(event, historyDays);
      const [history, advisoryFeed] = await Promise.all([
        historyAggregator.getFieldHistory(fieldId, days),
        historyAggregator.getAdvisoryFeed(fieldId, days),
      ]);
      return LambdaResponse.success({ history, advisoryFeed });
    }),
  };
}

// Built once per container so trend models survive warm invocations
let cachedServices: FieldServices | undefined;

function defaultServices(): FieldServices {
  if (!cachedServices) {
    const config = getEnvironment();
    cachedServices = createFieldServices(config, new Logger({ service: 'field-advisory' }, { level: config.logLevel }));
  }
  return cachedServices;
}

export const { createField, getField, analyzeField, fieldHistory } = createFieldHandlers(defaultServices);
