/**
 * Fully wired services over an in-memory store, fake sources and a settable clock
 */

import { createFieldServices } from '../../src/handlers/service-factory';
import { loadEnvironment } from '../../src/shared/config/environment';
import { InMemoryFieldStore } from '../../src/store/in-memory-field-store';
import { FakeSoilMoistureSource, FakeVegetationSource, FakeWeatherSource, testLogger } from './fixtures';

export const TEST_CONFIG = loadEnvironment({
  FIELDS_TABLE_NAME: 'fields-test',
  METRIC_SAMPLES_TABLE_NAME: 'samples-test',
  ADVISORIES_TABLE_NAME: 'advisories-test',
  SOURCE_TIMEOUT_MS: '1000',
});

export function createTestServices(store: InMemoryFieldStore = new InMemoryFieldStore()) {
  const clock = { now: new Date('2026-04-15T09:00:00.000Z') };
  const vegetation = new FakeVegetationSource({
    ndviMean: 0.55,
    ndviMin: 0.4,
    ndviMax: 0.7,
    cloudCoverage: 0.1,
    validPixels: 800,
  });
  const soilMoisture = new FakeSoilMoistureSource(0.4);
  const weather = new FakeWeatherSource({ tempMean: 22, rainfallTotal: 5, humidityMean: 65, windSpeedMean: 2 });

  const services = createFieldServices(TEST_CONFIG, testLogger(), {
    store,
    sources: { vegetation, soilMoisture, weather },
    clock: () => clock.now,
  });

  return { ...services, store, clock, vegetation, soilMoisture, weather };
}
