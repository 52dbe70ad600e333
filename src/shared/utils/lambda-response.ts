/**
 * Lambda response utilities for consistent API responses
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { FieldNotFoundError, PersistenceError, ValidationError } from './errors';
import { Logger } from './logger';

export class LambdaResponse {
  private static defaultHeaders = {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
    'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  };

  /**
   * Create a successful response
   */
  static success(data: unknown, statusCode: number = 200): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create an error response
   */
  static error(message: string, statusCode: number = 500, details?: unknown): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: false,
        error: {
          message,
          details,
        },
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create a validation error response
   */
  static validationError(errors: string[]): APIGatewayProxyResult {
    return this.error('Validation failed', 400, { validationErrors: errors });
  }

  static notFound(message: string): APIGatewayProxyResult {
    return this.error(message, 404);
  }
}

/**
 * Map the engine's error taxonomy onto HTTP responses
 */
export function handleLambdaError(error: unknown, logger: Logger): APIGatewayProxyResult {
  if (error instanceof FieldNotFoundError) {
    logger.warn('Field not found', { fieldId: error.fieldId });
    return LambdaResponse.notFound(error.message);
  }

  if (error instanceof ValidationError) {
    logger.warn('Request rejected', { reason: error.message });
    return LambdaResponse.validationError([error.message]);
  }

  if (error instanceof PersistenceError) {
    logger.error('Persistence failure', error);
    return LambdaResponse.error(error.message, 500);
  }

  logger.error('Lambda function error', error);
  return LambdaResponse.error('Internal server error', 500);
}
