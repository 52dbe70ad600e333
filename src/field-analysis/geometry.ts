/**
 * Field geometry derived from the boundary polygon
 */

import area from '@turf/area';
import turfBbox from '@turf/bbox';
import turfCentroid from '@turf/centroid';
import { polygon } from '@turf/helpers';
import type { Polygon } from 'geojson';
import { BoundingBox, Coordinates } from '../types/core';

export interface GeometryProvider {
  bbox(boundary: Polygon): BoundingBox;
  centroid(boundary: Polygon): Coordinates;
  areaHectares(boundary: Polygon): number;
}

const SQUARE_METERS_PER_HECTARE = 10_000;

export class TurfGeometryProvider implements GeometryProvider {
  bbox(boundary: Polygon): BoundingBox {
    const [minLon, minLat, maxLon, maxLat] = turfBbox(boundary);
    return [minLon, minLat, maxLon, maxLat];
  }

  centroid(boundary: Polygon): Coordinates {
    const [longitude, latitude] = turfCentroid(boundary).geometry.coordinates;
    return { latitude, longitude };
  }

  areaHectares(boundary: Polygon): number {
    return area(polygon(boundary.coordinates)) / SQUARE_METERS_PER_HECTARE;
  }
}
