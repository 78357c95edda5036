/**
 * Processing context for a report indexing run
 *
 * Built once from configuration at start-up and passed into the parser; the core
 * never reads environment variables itself.
 */

import os from 'os';
import type { ProcessingContext } from '../etl/contracts/types.js';
import { validateProcessingContext } from '../etl/contracts/validation.js';
import { formatNaiveUtc } from '../utils/dateUtils.js';
import type { Env } from './env.js';

export interface ProcessingContextOverrides {
  processedBy?: string;
  processedAt?: string;
}

function defaultProcessedBy(): string {
  try {
    return os.userInfo().username || 'unknown';
  } catch {
    // userInfo() throws when the uid has no passwd entry (common in containers)
    return 'unknown';
  }
}

/**
 * Create the immutable processing context
 *
 * Precedence: explicit overrides, then REPORT_PROCESSED_BY / REPORT_PROCESSED_AT,
 * then the current OS user and `now` formatted as `YYYY-MM-DD HH:MM:SS` (UTC).
 *
 * @throws {ContractValidationError} if the resulting context is invalid
 */
export function createProcessingContext(
  env: Pick<Env, 'REPORT_PROCESSOR_VERSION' | 'REPORT_PROCESSED_BY' | 'REPORT_PROCESSED_AT'>,
  overrides: ProcessingContextOverrides = {},
  now: Date = new Date()
): Readonly<ProcessingContext> {
  const context = validateProcessingContext({
    processed_by: overrides.processedBy ?? env.REPORT_PROCESSED_BY ?? defaultProcessedBy(),
    processed_at: overrides.processedAt ?? env.REPORT_PROCESSED_AT ?? formatNaiveUtc(now),
    processor_version: env.REPORT_PROCESSOR_VERSION,
  });
  return Object.freeze(context);
}
