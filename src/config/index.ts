import * as dotenv from 'dotenv';
import * as Joi from 'joi';
import path from 'path';

// Load environment variables silently
dotenv.config({ debug: false });

const DEFAULT_DATA_DIR = path.join(__dirname, '../../library_data');

// Define validation schema
const envSchema = Joi.object({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),

  // Dataset
  LIBRARY_DATA_DIR: Joi.string().default(DEFAULT_DATA_DIR),
  LIBRARY_DB_PATH: Joi.string(),
  POSTAL_CENTROIDS_PATH: Joi.string(),
  SUPPORTED_YEARS: Joi.string()
    .pattern(/^\s*\d{4}(\s*,\s*\d{4})*\s*$/)
    .default('2017,2018,2019'),

  // Library Locator
  LOCATOR_DISPLAY_LIMIT: Joi.number().integer().min(1).max(50).default(5),

  // Caching
  RESULT_CACHE_SIZE: Joi.number().integer().min(0).max(500).default(20),
}).unknown();

// Validate environment variables
const { error, value: envVars } = envSchema.validate(process.env);

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const dataDir = envVars.LIBRARY_DATA_DIR as string;

export interface PortalConfig {
  nodeEnv: string;
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
  logging: { level: string };
  dataset: {
    dataDir: string;
    dbPath: string;
    centroidsPath: string;
    supportedYears: number[];
  };
  locator: { displayLimit: number };
  cache: { resultCacheSize: number };
}

// Export configuration
export const config: PortalConfig = {
  nodeEnv: envVars.NODE_ENV as string,
  isProduction: envVars.NODE_ENV === 'production',
  isDevelopment: envVars.NODE_ENV === 'development',
  isTest: envVars.NODE_ENV === 'test',

  logging: {
    level: envVars.LOG_LEVEL as string,
  },

  dataset: {
    dataDir,
    dbPath: (envVars.LIBRARY_DB_PATH as string | undefined) ?? path.join(dataDir, 'libraries.db'),
    centroidsPath:
      (envVars.POSTAL_CENTROIDS_PATH as string | undefined) ??
      path.join(dataDir, 'postal-centroids.json'),
    supportedYears: [
      ...new Set((envVars.SUPPORTED_YEARS as string).split(',').map(year => parseInt(year.trim(), 10))),
    ].sort((a, b) => a - b),
  },

  locator: {
    displayLimit: envVars.LOCATOR_DISPLAY_LIMIT as number,
  },

  cache: {
    resultCacheSize: envVars.RESULT_CACHE_SIZE as number,
  },
};
