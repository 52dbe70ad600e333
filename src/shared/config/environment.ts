/**
 * Environment configuration for the field advisory Lambda functions
 * Centralizes environment variable management and validation
 */

export type Stage = 'development' | 'staging' | 'production';

export interface EnvironmentConfig {
  // AWS Configuration
  region: string;
  stage: Stage;

  // DynamoDB Tables
  fieldsTableName: string;
  metricSamplesTableName: string;
  advisoriesTableName: string;

  // External API Configuration
  sentinelHubClientId?: string;
  sentinelHubClientSecret?: string;
  sentinelHubBaseUrl: string;
  nasaPowerApiUrl: string;

  // Application Settings
  logLevel: string;

  // Acquisition
  sourceTimeoutMs: number;
  maxRetries: number;
  weatherDays: number;

  // Analysis windows
  historyDays: number;
  trainingWindowDays: number;
}

type EnvSource = Record<string, string | undefined>;

const VALID_STAGES: Stage[] = ['development', 'staging', 'production'];
const VALID_LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

class EnvironmentManager {
  private config: EnvironmentConfig;

  constructor(private readonly env: EnvSource) {
    this.config = this.loadConfiguration();
    this.validateConfiguration();
  }

  private loadConfiguration(): EnvironmentConfig {
    const env = this.env;
    return {
      // AWS Configuration
      region: env.AWS_REGION || 'us-east-1',
      stage: this.parseStage(env.STAGE || 'development'),

      // DynamoDB Tables
      fieldsTableName: this.requireEnv('FIELDS_TABLE_NAME'),
      metricSamplesTableName: this.requireEnv('METRIC_SAMPLES_TABLE_NAME'),
      advisoriesTableName: this.requireEnv('ADVISORIES_TABLE_NAME'),

      // External API Configuration
      sentinelHubClientId: env.SENTINEL_HUB_CLIENT_ID,
      sentinelHubClientSecret: env.SENTINEL_HUB_CLIENT_SECRET,
      sentinelHubBaseUrl: env.SENTINEL_HUB_BASE_URL || 'https://services.sentinel-hub.com',
      nasaPowerApiUrl: env.NASA_POWER_API_URL || 'https://power.larc.nasa.gov/api/temporal/daily/point',

      // Application Settings
      logLevel: env.LOG_LEVEL || 'INFO',

      // Acquisition
      sourceTimeoutMs: parseInt(env.SOURCE_TIMEOUT_MS || '10000', 10),
      maxRetries: parseInt(env.MAX_RETRIES || '2', 10),
      weatherDays: parseInt(env.WEATHER_DAYS || '7', 10),

      // Analysis windows
      historyDays: parseInt(env.HISTORY_DAYS || '7', 10),
      trainingWindowDays: parseInt(env.TRAINING_WINDOW_DAYS || '30', 10),
    };
  }

  private requireEnv(name: string): string {
    const value = this.env[name];
    if (!value) {
      throw new Error(`Required environment variable ${name} is not set`);
    }
    return value;
  }

  private parseStage(value: string): Stage {
    const stage = VALID_STAGES.find(candidate => candidate === value);
    if (!stage) {
      throw new Error(`STAGE must be one of: ${VALID_STAGES.join(', ')}`);
    }
    return stage;
  }

  private validateConfiguration(): void {
    const errors: string[] = [];

    if (!(this.config.sourceTimeoutMs >= 1000 && this.config.sourceTimeoutMs <= 60000)) {
      errors.push('SOURCE_TIMEOUT_MS must be between 1000 and 60000 milliseconds');
    }

    if (!(this.config.maxRetries >= 1 && this.config.maxRetries <= 5)) {
      errors.push('MAX_RETRIES must be between 1 and 5');
    }

    if (!(this.config.weatherDays >= 1 && this.config.weatherDays <= 90)) {
      errors.push('WEATHER_DAYS must be between 1 and 90');
    }

    if (!(this.config.historyDays >= 1 && this.config.historyDays <= 365)) {
      errors.push('HISTORY_DAYS must be between 1 and 365');
    }

    if (!(this.config.trainingWindowDays >= 1 && this.config.trainingWindowDays <= 365)) {
      errors.push('TRAINING_WINDOW_DAYS must be between 1 and 365');
    }

    if (!VALID_LOG_LEVELS.includes(this.config.logLevel.toUpperCase())) {
      errors.push(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
    }

    if (Boolean(this.config.sentinelHubClientId) !== Boolean(this.config.sentinelHubClientSecret)) {
      errors.push('SENTINEL_HUB_CLIENT_ID and SENTINEL_HUB_CLIENT_SECRET must be set together');
    }

    if (errors.length > 0) {
      throw new Error(`Environment configuration errors:\n${errors.join('\n')}`);
    }
  }

  getConfig(): EnvironmentConfig {
    return { ...this.config };
  }
}

/**
 * Build and validate a configuration from an explicit variable map
 */
export function loadEnvironment(env: EnvSource): EnvironmentConfig {
  return new EnvironmentManager(env).getConfig();
}

// Singleton instance
let environmentManager: EnvironmentManager | undefined;

export function getEnvironment(): EnvironmentConfig {
  if (!environmentManager) {
    environmentManager = new EnvironmentManager(process.env);
  }
  return environmentManager.getConfig();
}
