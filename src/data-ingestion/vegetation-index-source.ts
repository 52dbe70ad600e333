/**
 * Sentinel-2 vegetation index source
 * Cloud-masked NDVI statistics over the field's bounding box
 */

import { BoundingBox, TimeWindow } from '../types/core';
import { VegetationIndexReading, VegetationIndexSource } from '../types/external-data';
import { SentinelHubClient, combineStatistics } from './sentinel-hub-client';

export const NDVI_EVALSCRIPT = `//VERSION=3
function setup() {
  return {
    input: [{ bands: ["B04", "B08", "CLM", "dataMask"] }],
    output: [{ id: "default", bands: 1 }, { id: "dataMask", bands: 1 }]
  };
}
function evaluatePixel(sample) {
  const ndvi = (sample.B08 - sample.B04) / (sample.B08 + sample.B04);
  const valid = sample.dataMask === 1 && sample.CLM === 0 && isFinite(ndvi);
  return { default: [ndvi], dataMask: [valid ? 1 : 0] };
}`;

export class SentinelVegetationIndexSource implements VegetationIndexSource {
  readonly name = 'sentinel-2-ndvi';

  constructor(private readonly client: SentinelHubClient) {}

  async fetch(bbox: BoundingBox, window: TimeWindow, signal?: AbortSignal): Promise<VegetationIndexReading> {
    const intervals = await this.client.fetchStatistics({
      collection: 'sentinel-2-l1c',
      bbox,
      window,
      evalscript: NDVI_EVALSCRIPT,
      dataFilter: { mosaickingOrder: 'leastCC' },
    }, signal);

    const stats = combineStatistics(intervals);
    const validPixels = stats.sampleCount - stats.noDataCount;
    if (validPixels <= 0) {
      throw new Error('No cloud-free pixels in the acquisition window');
    }

    return {
      ndviMean: stats.mean,
      ndviMin: stats.min,
      ndviMax: stats.max,
      cloudCoverage: stats.noDataCount / stats.sampleCount,
      validPixels,
    };
  }
}
