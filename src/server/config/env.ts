/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables the report indexer reads.
 * Values are parsed once, checked, and cached as an immutable `Env`.
 */

// Load dotenv early so the variables are present before validation runs
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((candidate) => candidate === value);
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // LOG_LEVEL and LOG_PRETTY are read by utils/logger.ts when it is first imported

  // Index store (MongoDB)
  MONGODB_URI?: string;
  DB_NAME: string;
  REPORT_INDEX_COLLECTION: string;

  // Processing metadata stamped on every index document
  REPORT_PROCESSOR_VERSION: string;
  REPORT_PROCESSED_BY?: string;
  REPORT_PROCESSED_AT?: string;

  // Report retrieval
  REPORT_FETCH_TIMEOUT_MS: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const fetchTimeout = parseNumericEnv(process.env.REPORT_FETCH_TIMEOUT_MS, 30000);
  if (fetchTimeout <= 0) {
    errors.push(`REPORT_FETCH_TIMEOUT_MS: Invalid value "${process.env.REPORT_FETCH_TIMEOUT_MS}". Must be a positive number of milliseconds.`);
  }

  const mongoUri = nonEmpty(process.env.MONGODB_URI);
  if (mongoUri && !/^mongodb(\+srv)?:\/\//.test(mongoUri)) {
    errors.push('MONGODB_URI: Must start with mongodb:// or mongodb+srv://.');
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,

    MONGODB_URI: mongoUri,
    DB_NAME: nonEmpty(process.env.DB_NAME) ?? 'test_reports',
    REPORT_INDEX_COLLECTION: nonEmpty(process.env.REPORT_INDEX_COLLECTION) ?? 'test_results',

    REPORT_PROCESSOR_VERSION: nonEmpty(process.env.REPORT_PROCESSOR_VERSION) ?? '2.0.3',
    REPORT_PROCESSED_BY: nonEmpty(process.env.REPORT_PROCESSED_BY),
    REPORT_PROCESSED_AT: nonEmpty(process.env.REPORT_PROCESSED_AT),

    REPORT_FETCH_TIMEOUT_MS: fetchTimeout,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
