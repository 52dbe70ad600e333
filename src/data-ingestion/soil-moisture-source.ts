/**
 * Sentinel-1 soil-moisture proxy source
 * Mean normalized VV/VH backscatter difference over the field's bounding box
 */

import { BoundingBox, TimeWindow } from '../types/core';
import { SoilMoistureSource } from '../types/external-data';
import { SentinelHubClient, combineStatistics } from './sentinel-hub-client';

export const SOIL_MOISTURE_EVALSCRIPT = `//VERSION=3
function setup() {
  return {
    input: [{ bands: ["VV", "VH", "dataMask"] }],
    output: [{ id: "default", bands: 1 }, { id: "dataMask", bands: 1 }]
  };
}
function evaluatePixel(sample) {
  const ratio = (sample.VV - sample.VH) / (sample.VV + sample.VH);
  const valid = sample.dataMask === 1 && isFinite(ratio);
  return { default: [ratio], dataMask: [valid ? 1 : 0] };
}`;

export class SentinelSoilMoistureSource implements SoilMoistureSource {
  readonly name = 'sentinel-1-soil-moisture';

  constructor(private readonly client: SentinelHubClient) {}

  async fetch(bbox: BoundingBox, window: TimeWindow, signal?: AbortSignal): Promise<number> {
    const intervals = await this.client.fetchStatistics({
      collection: 'sentinel-1-grd',
      bbox,
      window,
      evalscript: SOIL_MOISTURE_EVALSCRIPT,
    }, signal);

    const stats = combineStatistics(intervals);
    if (stats.sampleCount - stats.noDataCount <= 0) {
      throw new Error('No valid radar samples in the acquisition window');
    }
    return stats.mean;
  }
}
