/**
 * Test Report Contracts
 */

// Types
export type {
  Attachment,
  AttachmentFormat,
  EnvironmentRecord,
  IndexDocument,
  PackageVersions,
  PluginVersions,
  ProcessingContext,
  ReportDocument,
  TestCaseRecord,
} from './types.js';

// Schemas
export {
  CANONICAL_UTC_PATTERN,
  NAIVE_TIMESTAMP_PATTERN,
  attachmentSchema,
  environmentRecordSchema,
  indexDocumentSchema,
  processingContextSchema,
  testCaseRecordSchema,
} from './schemas.js';

// Validation
export { formatZodIssues, validateIndexDocument, validateProcessingContext } from './validation.js';
