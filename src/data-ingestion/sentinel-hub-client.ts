/**
 * Sentinel Hub client
 * OAuth client-credentials authentication and Statistical API requests
 * returning per-band statistics over a bounding box and time window
 */

import axios from 'axios';
import { BoundingBox, TimeWindow } from '../types/core';
import { Logger } from '../shared/utils/logger';
import { asFiniteNumber, callWithRetry, isRecord } from './http-retry';

export interface SentinelHubConfig {
  baseUrl: string;
  clientId?: string;
  clientSecret?: string;
  timeoutMs: number;
  maxRetries: number;
}

export type SentinelCollection = 'sentinel-2-l1c' | 'sentinel-1-grd';

export interface StatisticsRequest {
  collection: SentinelCollection;
  bbox: BoundingBox;
  window: TimeWindow;
  evalscript: string;
  dataFilter?: Record<string, string>;
}

export interface BandStatistics {
  min: number;
  max: number;
  mean: number;
  sampleCount: number;
  noDataCount: number;
}

const CRS84 = 'http://www.opengis.net/def/crs/OGC/1.3/CRS84';
const OUTPUT_SIZE = 512;
// Refresh the token this long before it expires
const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

function parseBandStatistics(value: unknown): BandStatistics | null {
  if (!isRecord(value) || !isRecord(value.stats)) return null;
  const { stats } = value;
  const sampleCount = asFiniteNumber(stats.sampleCount);
  const noDataCount = asFiniteNumber(stats.noDataCount);
  if (sampleCount === undefined || noDataCount === undefined) return null;

  const validCount = sampleCount - noDataCount;
  const min = asFiniteNumber(stats.min);
  const max = asFiniteNumber(stats.max);
  const mean = asFiniteNumber(stats.mean);
  if (validCount > 0 && (min === undefined || max === undefined || mean === undefined)) return null;

  return { min: min ?? NaN, max: max ?? NaN, mean: mean ?? NaN, sampleCount, noDataCount };
}

/**
 * Extract the single-band statistics of every interval in a Statistical API response
 */
export function parseStatisticsResponse(body: unknown): BandStatistics[] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new Error('Statistical API response has no data array');
  }

  return body.data.map((interval: unknown, index: number) => {
    const outputs = isRecord(interval) && isRecord(interval.outputs) ? interval.outputs : undefined;
    const output = outputs && isRecord(outputs.default) ? outputs.default : undefined;
    const bands = output && isRecord(output.bands) ? output.bands : undefined;
    const statistics = bands ? parseBandStatistics(bands.B0) : null;
    if (!statistics) {
      throw new Error(`Statistical API interval ${index} has no usable band statistics`);
    }
    return statistics;
  });
}

export class SentinelHubClient {
  private token?: { value: string; expiresAt: number };

  constructor(
    private readonly config: SentinelHubConfig,
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {}

  get isConfigured(): boolean {
    return Boolean(this.config.clientId && this.config.clientSecret);
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt > this.clock()) {
      return this.token.value;
    }

    const { clientId, clientSecret } = this.config;
    if (!clientId || !clientSecret) {
      throw new Error('Sentinel Hub credentials not configured');
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
    });

    const response = await callWithRetry(this.logger, 'Sentinel Hub token', this.config.maxRetries, () =>
      axios.post<unknown>(`${this.config.baseUrl}/oauth/token`, form.toString(), {
        timeout: this.config.timeoutMs,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        signal,
      }),
      signal
    );

    const body = response.data;
    const accessToken = isRecord(body) && typeof body.access_token === 'string' ? body.access_token : undefined;
    const expiresIn = isRecord(body) ? asFiniteNumber(body.expires_in) : undefined;
    if (!accessToken || expiresIn === undefined) {
      throw new Error('Sentinel Hub token response is malformed');
    }

    this.token = {
      value: accessToken,
      expiresAt: this.clock() + expiresIn * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    this.logger.debug('Sentinel Hub token refreshed', { expiresIn });
    return accessToken;
  }

  async fetchStatistics(request: StatisticsRequest, signal?: AbortSignal): Promise<BandStatistics[]> {
    const token = await this.getAccessToken(signal);
    const days = Math.max(1, Math.round((request.window.to.getTime() - request.window.from.getTime()) / 86400000));

    const payload = {
      input: {
        bounds: {
          bbox: request.bbox,
          properties: { crs: CRS84 },
        },
        data: [
          {
            type: request.collection,
            dataFilter: request.dataFilter ?? {},
          },
        ],
      },
      aggregation: {
        timeRange: {
          from: request.window.from.toISOString(),
          to: request.window.to.toISOString(),
        },
        aggregationInterval: { of: `P${days}D`, lastIntervalBehavior: 'SHORTEN' },
        width: OUTPUT_SIZE,
        height: OUTPUT_SIZE,
        evalscript: request.evalscript,
      },
    };

    const response = await callWithRetry(this.logger, `Sentinel Hub ${request.collection}`, this.config.maxRetries, () =>
      axios.post<unknown>(`${this.config.baseUrl}/api/v1/statistics`, payload, {
        timeout: this.config.timeoutMs,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        signal,
      }),
      signal
    );

    return parseStatisticsResponse(response.data);
  }
}

/**
 * Combine per-interval statistics into one, weighting means by valid sample count
 */
export function combineStatistics(intervals: BandStatistics[]): BandStatistics {
  let sampleCount = 0;
  let noDataCount = 0;
  let weightedSum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const interval of intervals) {
    sampleCount += interval.sampleCount;
    noDataCount += interval.noDataCount;
    const valid = interval.sampleCount - interval.noDataCount;
    if (valid > 0) {
      weightedSum += interval.mean * valid;
      min = Math.min(min, interval.min);
      max = Math.max(max, interval.max);
    }
  }

  const validCount = sampleCount - noDataCount;
  return {
    min: validCount > 0 ? min : NaN,
    max: validCount > 0 ? max : NaN,
    mean: validCount > 0 ? weightedSum / validCount : NaN,
    sampleCount,
    noDataCount,
  };
}
