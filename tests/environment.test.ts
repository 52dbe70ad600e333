import { loadEnvironment } from '../src/shared/config/environment';

const TABLES = {
  FIELDS_TABLE_NAME: 'fields-test',
  METRIC_SAMPLES_TABLE_NAME: 'samples-test',
  ADVISORIES_TABLE_NAME: 'advisories-test',
};

describe('loadEnvironment', () => {
  it('applies defaults when only the tables are set', () => {
    const config = loadEnvironment(TABLES);

    expect(config).toMatchObject({
      region: 'us-east-1',
      stage: 'development',
      fieldsTableName: 'fields-test',
      metricSamplesTableName: 'samples-test',
      advisoriesTableName: 'advisories-test',
      sentinelHubBaseUrl: 'https://services.sentinel-hub.com',
      nasaPowerApiUrl: 'https://power.larc.nasa.gov/api/temporal/daily/point',
      logLevel: 'INFO',
      sourceTimeoutMs: 10000,
      maxRetries: 2,
      weatherDays: 7,
      historyDays: 7,
      trainingWindowDays: 30,
    });
    expect(config.sentinelHubClientId).toBeUndefined();
  });

  it('reads overrides', () => {
    const config = loadEnvironment({
      ...TABLES,
      STAGE: 'production',
      AWS_REGION: 'ap-south-1',
      SOURCE_TIMEOUT_MS: '5000',
      MAX_RETRIES: '3',
      WEATHER_DAYS: '14',
      SENTINEL_HUB_CLIENT_ID: 'test-client',
      SENTINEL_HUB_CLIENT_SECRET: 'test-secret',
    });

    expect(config.stage).toBe('production');
    expect(config.region).toBe('ap-south-1');
    expect(config.sourceTimeoutMs).toBe(5000);
    expect(config.maxRetries).toBe(3);
    expect(config.weatherDays).toBe(14);
    expect(config.sentinelHubClientSecret).toBe('test-secret');
  });

  it('requires the table names', () => {
    expect(() => loadEnvironment({ ...TABLES, FIELDS_TABLE_NAME: undefined }))
      .toThrow('Required environment variable FIELDS_TABLE_NAME is not set');
  });

  it('reports every invalid setting in one error', () => {
    expect(() => loadEnvironment({ ...TABLES, SOURCE_TIMEOUT_MS: '500', MAX_RETRIES: '9' }))
      .toThrow(/SOURCE_TIMEOUT_MS must be between 1000 and 60000 milliseconds\nMAX_RETRIES must be between 1 and 5/);
  });

  it('rejects a client id without its secret', () => {
    expect(() => loadEnvironment({ ...TABLES, SENTINEL_HUB_CLIENT_ID: 'test-client' }))
      .toThrow('SENTINEL_HUB_CLIENT_ID and SENTINEL_HUB_CLIENT_SECRET must be set together');
  });

  it('rejects an unknown stage', () => {
    expect(() => loadEnvironment({ ...TABLES, STAGE: 'qa' }))
      .toThrow('STAGE must be one of: development, staging, production');
  });
});
