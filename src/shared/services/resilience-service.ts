/**
 * System Resilience Service
 * Wraps external source calls so a failure, timeout or malformed response
 * degrades to a documented default instead of aborting the caller
 */

import { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { SourceOutcome } from '../../types/external-data';

/**
 * Service health status enumeration
 */
export enum ServiceStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNAVAILABLE = 'unavailable'
}

/**
 * Service health information
 */
export interface ServiceHealth {
  serviceName: string;
  status: ServiceStatus;
  lastSuccessfulCall?: Date;
  lastFailure?: Date;
  failureCount: number;
  usingFallback: boolean;
  message?: string;
}

export interface FallbackOptions {
  timeoutMs: number;
}

// Consecutive failures before a source is reported unavailable
const UNAVAILABLE_AFTER_FAILURES = 3;

export class SourceTimeoutError extends Error {
  constructor(serviceName: string, timeoutMs: number) {
    super(`${serviceName} did not respond within ${timeoutMs}ms`);
    this.name = 'SourceTimeoutError';
  }
}

/**
 * System Resilience Service
 * Manages fallback outcomes and service health tracking
 */
export class ResilienceService {
  private serviceHealthMap = new Map<string, ServiceHealth>();

  constructor(private readonly logger: Logger) {}

  /**
   * Run a source operation with a timeout. Never rejects: any failure yields
   * a degraded outcome carrying the fallback value. The operation's signal
   * aborts when the timeout fires.
   */
  async withFallback<T>(
    serviceName: string,
    operation: (signal: AbortSignal) => Promise<T>,
    fallback: T,
    options: FallbackOptions
  ): Promise<SourceOutcome<T>> {
    const startTime = Date.now();

    try {
      const value = await this.withTimeout(serviceName, operation, options.timeoutMs);
      this.recordServiceSuccess(serviceName);
      this.logger.performance(serviceName, Date.now() - startTime);
      return { status: 'ok', source: serviceName, value };
    } catch (error) {
      const reason = errorMessage(error);
      this.recordServiceFailure(serviceName, reason);
      this.logger.warn('Source degraded, using default values', {
        serviceName,
        reason,
        duration: Date.now() - startTime,
      });
      return { status: 'degraded', source: serviceName, value: fallback, reason };
    }
  }

  private async withTimeout<T>(
    serviceName: string,
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
  ): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new SourceTimeoutError(serviceName, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([operation(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Record service failure and update health status
   */
  private recordServiceFailure(serviceName: string, message: string): void {
    const health = this.getOrCreateHealth(serviceName);

    health.lastFailure = new Date();
    health.failureCount += 1;
    health.usingFallback = true;
    health.message = message;
    health.status = health.failureCount >= UNAVAILABLE_AFTER_FAILURES
      ? ServiceStatus.UNAVAILABLE
      : ServiceStatus.DEGRADED;

    this.serviceHealthMap.set(serviceName, health);
  }

  /**
   * Record successful service call and update health status
   */
  private recordServiceSuccess(serviceName: string): void {
    const health = this.getOrCreateHealth(serviceName);

    health.lastSuccessfulCall = new Date();
    health.failureCount = 0;
    health.status = ServiceStatus.HEALTHY;
    health.usingFallback = false;
    health.message = undefined;

    this.serviceHealthMap.set(serviceName, health);
  }

  private getOrCreateHealth(serviceName: string): ServiceHealth {
    return this.serviceHealthMap.get(serviceName) || {
      serviceName,
      status: ServiceStatus.HEALTHY,
      failureCount: 0,
      usingFallback: false,
    };
  }

  /**
   * Get service health status
   */
  getServiceHealth(serviceName: string): ServiceHealth | null {
    const health = this.serviceHealthMap.get(serviceName);
    return health ? { ...health } : null;
  }

  /**
   * Check if system is in degraded state
   */
  isSystemDegraded(): boolean {
    return Array.from(this.serviceHealthMap.values()).some(s => s.status !== ServiceStatus.HEALTHY);
  }
}
