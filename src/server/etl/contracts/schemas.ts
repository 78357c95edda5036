/**
 * Test Report Contract Schemas (Zod)
 *
 * Runtime validation for values crossing the parser/builder/index boundaries.
 */

import { z } from 'zod';
import { NAIVE_TIMESTAMP_PATTERN, isProcessingTimestamp } from '../../utils/dateUtils.js';

export { NAIVE_TIMESTAMP_PATTERN };

/**
 * Canonical UTC instant: `YYYY-MM-DDTHH:MM:SSZ`
 */
export const CANONICAL_UTC_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;


export const packageVersionsSchema = z.object({
  pytest: z.string(),
  pluggy: z.string(),
});

export const pluginVersionsSchema = z.object({
  base_url: z.string(),
  playwright: z.string(),
  asyncio: z.string(),
  html: z.string(),
  metadata: z.string(),
});

export const environmentRecordSchema = z.object({
  interpreter_version: z.string(),
  platform: z.string(),
  packages: packageVersionsSchema,
  plugins: pluginVersionsSchema,
  platform_type: z.string(),
  base_url: z.string(),
});

export const attachmentSchema = z.object({
  name: z.string().min(1),
  format_type: z.literal('image'),
  content: z.string().min(1),
});

export const testCaseRecordSchema = z.object({
  test_id: z.string().min(1, 'test_id is required'),
  result: z.string().min(1, 'result is required'),
  duration: z.string().min(1, 'duration is required'),
  log: z.string(),
  attachments: z.array(attachmentSchema),
});

/**
 * Processing context schema
 */
export const processingContextSchema = z.object({
  processed_by: z.string().min(1, 'processed_by is required'),
  processed_at: z
    .string()
    .refine(isProcessingTimestamp, {
      message: 'processed_at must be a valid "YYYY-MM-DD HH:MM:SS" time or an ISO 8601 instant with a zone',
    }),
  processor_version: z.string().min(1, 'processor_version is required'),
});

/**
 * Index document schema
 */
export const indexDocumentSchema = z.object({
  id: z.string().uuid(),
  testId: z.string().min(1),
  result: z.string().min(1),
  duration: z.string().min(1),
  log: z.string(),
  timestamp: z.string().regex(CANONICAL_UTC_PATTERN, 'timestamp must be YYYY-MM-DDTHH:MM:SSZ'),
  environment: environmentRecordSchema,
  attachments: z.array(attachmentSchema),
  processed_by: z.string().min(1),
  processed_at: z.string().regex(CANONICAL_UTC_PATTERN, 'processed_at must be YYYY-MM-DDTHH:MM:SSZ'),
  processor_version: z.string().min(1),
  title: z.string(),
});
